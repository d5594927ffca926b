import { randomUUID } from 'crypto';
import type { EnginePhase, GameConfig, GameLogEntry, GameResult, LogVisibility, RoundRecord, Winner } from '../types.js';
import { AgentIO, type GenerationContext, type TextGenerator } from '../agentIo.js';
import { logger } from '../logger.js';
import { InvariantViolationError } from '../errors.js';
import { buildRoster, type Player, type Roster } from '../roster.js';
import { loadDefaultNamePool } from '../namePool.js';
import { PublicLedger } from '../publicLedger.js';
import { sanitizeResponse } from '../actions/sanitizer.js';
import type { Seat } from '../actions/extractor.js';
import { defaultPromptBuilder, type GameSnapshot, type PromptBuilder, type PromptPhase } from '../prompts/promptBuilder.js';
import { deepFreeze, type Rng } from '../utils.js';
import { NightPhase } from '../phases/nightPhase.js';
import { DayDiscussionPhase } from '../phases/dayDiscussionPhase.js';
import { DayVotingPhase } from '../phases/dayVotingPhase.js';

export interface GameEngineDeps {
  generate: TextGenerator;
  rng: Rng;
  gameId?: string;
  promptBuilder?: PromptBuilder;
  namePool?: readonly string[];
}

export type GameOverCheck = { over: false; winner: null } | { over: true; winner: Winner };

type LogInput = Omit<GameLogEntry, 'id' | 'timestamp' | 'gameId'>;

export interface TurnOptions {
  // Extra "Name: message" lines appended after the public discussion.
  extraHistory?: readonly string[];
  voteCount?: number;
}

export class GameEngine {
  readonly gameId: string;
  readonly config: Readonly<GameConfig>;
  readonly roster: Roster;
  readonly rng: Rng;
  readonly agentIO: AgentIO;
  readonly promptBuilder: PromptBuilder;
  readonly ledger = new PublicLedger();

  phase: EnginePhase = 'setup';
  roundNumber = 1;
  readonly rounds: RoundRecord[] = [];
  currentRound: RoundRecord | null = null;
  // Players removed by the most recent death, for the state line in prompts.
  lastEliminated: string[] = [];

  private nightPhaseRunner = new NightPhase();
  private dayDiscussionPhaseRunner = new DayDiscussionPhase();
  private dayVotingPhaseRunner = new DayVotingPhase();

  constructor(config: Readonly<GameConfig>, deps: GameEngineDeps) {
    this.config = config;
    this.rng = deps.rng;
    this.gameId = deps.gameId ?? randomUUID();
    this.promptBuilder = deps.promptBuilder ?? defaultPromptBuilder;
    this.agentIO = new AgentIO(deps.generate, config);

    this.roster = buildRoster({
      config,
      rng: this.rng,
      namePool: deps.namePool ?? config.name_pool ?? loadDefaultNamePool(),
    });

    // Let the logger tag and colour future entries of this game by role.
    logger.registerGame(this.gameId, this.roster.roles());
    for (const p of this.roster.players) {
      this.recordPrivate({
        type: 'SYSTEM',
        player: p.name,
        content: `Assigned role ${p.role} to ${p.name} (${p.modelId})`,
      });
    }
  }

  /** All seats, dead ones included, as the extractor sees them. */
  seats(): Seat[] {
    return this.roster.players.map(p => ({ name: p.name, role: p.role, alive: p.alive }));
  }

  checkGameOver(): GameOverCheck {
    const { mafia, villagers, doctor } = this.roster.counts();
    const town = villagers + doctor;
    if (mafia === 0) return { over: true, winner: 'Villagers' };
    if (mafia >= town) return { over: true, winner: 'Mafia' };
    if (this.roundNumber >= this.config.max_rounds) {
      return { over: true, winner: town > mafia ? 'Villagers' : 'Mafia' };
    }
    return { over: false, winner: null };
  }

  snapshot(phase: GameSnapshot['phase']): GameSnapshot {
    const { mafia, villagers, doctor } = this.roster.counts();
    return {
      roundNumber: this.roundNumber,
      phase,
      alive: mafia + villagers + doctor,
      mafia,
      town: villagers + doctor,
      lastEliminated: [...this.lastEliminated],
    };
  }

  startRound(): RoundRecord {
    if (this.currentRound) {
      throw new InvariantViolationError(`Round ${this.currentRound.roundNumber} is still open.`);
    }
    this.currentRound = {
      roundNumber: this.roundNumber,
      messages: [],
      actions: {},
      eliminated: [],
      eliminatedByVote: [],
      targetedByMafia: [],
      protectedByDoctor: [],
      outcome: '',
    };
    return this.currentRound;
  }

  requireRound(): RoundRecord {
    if (!this.currentRound) throw new InvariantViolationError('No round is open.');
    return this.currentRound;
  }

  /** Append the open round to the history and move to the next round number. */
  finishRound(): void {
    this.rounds.push(this.requireRound());
    this.currentRound = null;
    this.roundNumber++;
  }

  eliminate(name: string): void {
    this.roster.eliminate(name);
    this.requireRound().eliminated.push(name);
    this.lastEliminated = [name];
  }

  recordPublic(entry: LogInput): GameLogEntry {
    return logger.log({
      ...entry,
      gameId: this.gameId,
      metadata: { round: this.roundNumber, ...(entry.metadata ?? {}), visibility: 'public' },
    });
  }

  recordPrivate(entry: LogInput, visibility: Exclude<LogVisibility, 'public'> = 'private'): GameLogEntry {
    return logger.log({
      ...entry,
      gameId: this.gameId,
      metadata: { round: this.roundNumber, ...(entry.metadata ?? {}), visibility },
    });
  }

  private generationContext(player: Player, phase: GenerationContext['phase'], candidate?: string): GenerationContext {
    return {
      gameId: this.gameId,
      player: player.name,
      role: player.role,
      phase,
      language: player.language,
      roundNumber: this.roundNumber,
      alivePlayers: this.roster.aliveNames(),
      teammates: this.roster.teammatesOf(player.name),
      candidate,
    };
  }

  /** Prompt one player for a turn and return the sanitized reply. */
  async askTurn(player: Player, phase: PromptPhase, opts: TurnOptions = {}): Promise<string> {
    const alive = this.roster.aliveNames();
    const history = [this.ledger.render(this.config.discussion_history_limit), ...(opts.extraHistory ?? [])]
      .filter(Boolean)
      .join('\n\n');

    const prompt = this.promptBuilder.buildTurnPrompt({
      player,
      phase,
      roundNumber: this.roundNumber,
      snapshot: this.snapshot(phase === 'night' ? 'night' : 'day'),
      alivePlayers: alive,
      mafiaTeammates: this.roster.teammatesOf(player.name),
      discussionHistory: history,
      maxOutputTokens: this.config.max_output_tokens,
      voteCount: opts.voteCount,
    });

    const raw = await this.agentIO.ask(player.modelId, prompt, this.generationContext(player, phase));
    return sanitizeResponse(raw, player.name, alive, phase);
  }

  /** Ask a player whether `candidate` should be eliminated. */
  async askConfirmation(player: Player, candidate: string): Promise<string> {
    const prompt = this.promptBuilder.buildConfirmationPrompt({
      player,
      candidate,
      snapshot: this.snapshot('day'),
      maxOutputTokens: this.config.max_output_tokens,
    });
    const raw = await this.agentIO.ask(
      player.modelId,
      prompt,
      this.generationContext(player, 'confirmation', candidate)
    );
    // A confirmation reply is a single answer; no other names need cutting.
    return sanitizeResponse(raw, player.name, [], 'confirmation');
  }

  async run(): Promise<GameResult> {
    const names = this.roster.players.map(p => p.name);
    this.recordPublic({
      type: 'SYSTEM',
      content: `Game starting with ${names.length} players: ${names.join(', ')}`,
    });

    try {
      const winner = await this.playUntilOver();

      // A game that ends right after a night leaves its round open.
      if (this.currentRound) {
        this.rounds.push(this.currentRound);
        this.currentRound = null;
      }
      this.phase = 'game_over';
      this.recordPublic({ type: 'WIN', content: `Game Over! Winners: ${winner}` });

      return deepFreeze({
        gameId: this.gameId,
        winner,
        roundCount: this.roundNumber,
        language: this.config.language,
        participants: this.roster.participants(),
        rounds: this.rounds,
      });
    } finally {
      logger.forgetGame(this.gameId);
    }
  }

  private async playUntilOver(): Promise<Winner> {
    for (;;) {
      let check = this.checkGameOver();
      if (check.over) return check.winner;

      this.phase = 'night';
      await this.nightPhaseRunner.run(this);

      check = this.checkGameOver();
      if (check.over) return check.winner;

      this.phase = 'day_discussion';
      await this.dayDiscussionPhaseRunner.run(this);

      this.phase = 'day_voting';
      await this.dayVotingPhaseRunner.run(this);
    }
  }
}
