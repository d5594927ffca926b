import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogType, Role } from './types.js';
import { eventBus } from './events/index.js';
import { escapeRegExp, isTruthyEnv } from './utils.js';

const ROLE_COLORS: Record<Role, (text: string) => string> = {
  Mafia: chalk.red,
  Doctor: chalk.cyan,
  Villager: chalk.green,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  PHASE: chalk.magenta.bold,
  CHAT: chalk.white,
  NIGHT_CHAT: chalk.red,
  ACTION: chalk.yellow,
  VOTE: chalk.blue,
  CONFIRMATION: chalk.blueBright,
  DEATH: chalk.bgRed.white,
  WIN: chalk.green.bold,
  THOUGHT: chalk.gray.italic,
  ERROR: chalk.redBright,
};

const PLAYER_COLOR = chalk.hex('#FFA500');
const ROLE_WORD_PATTERN = /\b(mafia|doctor|villager)s?\b/gi;

function roleForWord(word: string): Role | undefined {
  const lower = word.toLowerCase().replace(/s$/, '');
  if (lower === 'mafia') return 'Mafia';
  if (lower === 'doctor') return 'Doctor';
  if (lower === 'villager') return 'Villager';
  return undefined;
}

export class GameLogger {
  private readonly logDir: string;
  private readonly sessionFile: string;
  private consoleOutputEnabled = true;
  private persistenceEnabled = true;
  private printThoughts = isTruthyEnv(process.env.MAFIA_PRINT_THOUGHTS);
  private logDirReady = false;
  // gameId -> player -> role. Several games may be logging at once.
  private rolesByGame: Map<string, Map<string, Role>> = new Map();

  constructor(logDir = path.join(process.cwd(), 'logs')) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logDir = logDir;
    this.sessionFile = path.join(logDir, `session-${timestamp}.jsonl`);

    // The logger subscribes to the global event bus and persists/prints entries.
    eventBus.subscribe(entry => {
      this.handleEntry(entry);
    });
  }

  /**
   * Enable or disable writing the JSON-lines session log and the per-game
   * transcripts. Tests and dry runs switch this off so they leave no files.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  setPrintThoughts(enabled: boolean) {
    this.printThoughts = enabled;
  }

  /** Lets later entries of this game be tagged and coloured by role. */
  registerGame(gameId: string, roles: Record<string, Role>) {
    this.rolesByGame.set(gameId, new Map(Object.entries(roles)));
  }

  forgetGame(gameId: string) {
    this.rolesByGame.delete(gameId);
  }

  /**
   * Emit a log entry to the global event bus, returning the fully materialized entry.
   *
   * The logger itself listens on the bus and persists/prints entries.
   */
  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    eventBus.emit(enriched);
    return enriched;
  }

  private roleOf(gameId: string | undefined, player: string | undefined): Role | undefined {
    if (gameId === undefined || player === undefined) return undefined;
    return this.rolesByGame.get(gameId)?.get(player);
  }

  private enrichEntry(entry: GameLogEntry): GameLogEntry {
    // An explicit `role` key (even undefined) wins over the registered role.
    const hasRoleProperty = entry.metadata !== undefined && 'role' in entry.metadata;
    if (hasRoleProperty) return entry;
    const inferredRole = this.roleOf(entry.gameId, entry.player);
    if (inferredRole === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), role: inferredRole },
    };
  }

  private handleEntry(entry: GameLogEntry) {
    this.persist(entry);

    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'THOUGHT' && !this.printThoughts) return;

    console.log(this.formatForConsole(entry));
  }

  private formatForConsole(entry: GameLogEntry): string {
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const gameTag = entry.gameId ? ` ${chalk.dim(`#${entry.gameId.slice(0, 8)}`)}` : '';
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const role = entry.metadata?.role ?? this.roleOf(entry.gameId, entry.player);
      const roleStr = role ? ` ${ROLE_COLORS[role](role)}` : '';
      playerInfo = ` <${PLAYER_COLOR(entry.player)}${roleStr}>`;
    }

    // Highlight roles in content
    let content = entry.content.replace(ROLE_WORD_PATTERN, match => {
      const role = roleForWord(match);
      return role ? ROLE_COLORS[role](match) : match;
    });

    // Highlight the players of this game in content
    const names = entry.gameId ? [...(this.rolesByGame.get(entry.gameId)?.keys() ?? [])] : [];
    if (names.length > 0) {
      const playerPattern = new RegExp(`\\b(${names.map(escapeRegExp).join('|')})\\b`, 'g');
      content = content.replace(playerPattern, match => PLAYER_COLOR(match));
    }

    return `${prefix}${gameTag} ${typeStr}${playerInfo}: ${content}`;
  }

  private persist(entry: GameLogEntry) {
    if (!this.persistenceEnabled) return;
    if (!this.logDirReady) {
      fs.mkdirSync(this.logDir, { recursive: true });
      this.logDirReady = true;
    }
    fs.appendFileSync(this.sessionFile, `${JSON.stringify(entry)}\n`);

    const line = transcriptLine(entry);
    if (line !== null && entry.gameId) {
      fs.appendFileSync(path.join(this.logDir, `transcript-${entry.gameId}.txt`), `${line}\n`);
    }
  }
}

/**
 * Public transcript line for an entry, or null when the entry must stay out
 * of the transcript (thoughts, night chat, private actions).
 */
export function transcriptLine(entry: GameLogEntry): string | null {
  // Prefer explicit visibility if present. If absent, fall back to a conservative
  // include-list so we don't leak private events.
  const visibility = entry.metadata?.visibility;
  if (visibility === 'private' || visibility === 'faction') return null;
  if (entry.type === 'THOUGHT' || entry.type === 'NIGHT_CHAT' || entry.type === 'ACTION') return null;
  if (visibility !== 'public' && entry.type === 'ERROR') return null;

  switch (entry.type) {
    case 'PHASE':
      return entry.content;
    case 'CHAT':
      return entry.player ? `${entry.player}: ${entry.content}` : `[CHAT] ${entry.content}`;
    case 'VOTE':
    case 'CONFIRMATION':
    case 'DEATH':
      return `[${entry.type}] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd();
    default:
      return `[${entry.type}] ${entry.content}`;
  }
}

export const logger = new GameLogger();
