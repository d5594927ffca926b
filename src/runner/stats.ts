import chalk from 'chalk';
import type { GameResult, Role } from '../types.js';

export interface ModelStats {
  games: number;
  wins: number;
  mafia_games: number;
  mafia_wins: number;
  villager_games: number;
  villager_wins: number;
  doctor_games: number;
  doctor_wins: number;
}

export interface BatchStats {
  total: number;
  completed: number;
  failed: number;
  mafiaWins: number;
  villagerWins: number;
  // Counted per seat: a model that fills two seats plays two games.
  models: Record<string, ModelStats>;
  elapsedMs: number;
}

const ROLE_KEYS: Record<Role, { games: keyof ModelStats; wins: keyof ModelStats }> = {
  Mafia: { games: 'mafia_games', wins: 'mafia_wins' },
  Villager: { games: 'villager_games', wins: 'villager_wins' },
  Doctor: { games: 'doctor_games', wins: 'doctor_wins' },
};

export function createBatchStats(total: number): BatchStats {
  return { total, completed: 0, failed: 0, mafiaWins: 0, villagerWins: 0, models: {}, elapsedMs: 0 };
}

function emptyModelStats(): ModelStats {
  return {
    games: 0,
    wins: 0,
    mafia_games: 0,
    mafia_wins: 0,
    villager_games: 0,
    villager_wins: 0,
    doctor_games: 0,
    doctor_wins: 0,
  };
}

export function recordGameResult(stats: BatchStats, result: GameResult): void {
  stats.completed++;
  if (result.winner === 'Mafia') stats.mafiaWins++;
  else stats.villagerWins++;

  for (const { role, modelId } of Object.values(result.participants)) {
    const entry = (stats.models[modelId] ??= emptyModelStats());
    const keys = ROLE_KEYS[role];
    const won = (role === 'Mafia') === (result.winner === 'Mafia');

    entry.games++;
    entry[keys.games]++;
    if (won) {
      entry.wins++;
      entry[keys.wins]++;
    }
  }
}

function pct(part: number, whole: number): string {
  return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : '-';
}

export function formatBatchSummary(stats: BatchStats): string {
  const lines = [
    chalk.magenta.bold('=== Simulation summary ==='),
    `Games: ${stats.completed}/${stats.total} completed${stats.failed > 0 ? chalk.redBright(`, ${stats.failed} failed`) : ''}`,
    `${chalk.red('Mafia')} wins: ${stats.mafiaWins} (${pct(stats.mafiaWins, stats.completed)})`,
    `${chalk.green('Villager')} wins: ${stats.villagerWins} (${pct(stats.villagerWins, stats.completed)})`,
    `Elapsed: ${(stats.elapsedMs / 1000).toFixed(1)}s`,
  ];

  const models = Object.entries(stats.models).sort((a, b) => a[0].localeCompare(b[0]));
  if (models.length > 0) {
    lines.push('', chalk.bold('Per model:'));
    for (const [modelId, m] of models) {
      lines.push(
        `  ${modelId}: ${m.wins}/${m.games} wins (${pct(m.wins, m.games)}); ` +
          `Mafia ${m.mafia_wins}/${m.mafia_games}, Villager ${m.villager_wins}/${m.villager_games}, Doctor ${m.doctor_wins}/${m.doctor_games}`
      );
    }
  }
  return lines.join('\n');
}
