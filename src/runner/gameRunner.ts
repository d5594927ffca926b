import { GameEngine } from '../engine/gameEngine.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { persistResult, type ResultStore } from '../persistence/resultStore.js';
import type { TextGenerator } from '../agentIo.js';
import type { PromptBuilder } from '../prompts/promptBuilder.js';
import type { GameConfig, GameResult } from '../types.js';
import { deriveGameSeed, mulberry32 } from '../utils.js';
import { createBatchStats, recordGameResult, type BatchStats } from './stats.js';

export interface RunGameOptions {
  config: Readonly<GameConfig>;
  generate: TextGenerator;
  // Seeds the game's own RNG; every random draw of the game comes from it.
  seed: number;
  gameId?: string;
  store?: ResultStore;
  namePool?: readonly string[];
  promptBuilder?: PromptBuilder;
}

/** Play one game to the end and hand the result to the store. */
export async function runGame(opts: RunGameOptions): Promise<GameResult> {
  const engine = new GameEngine(opts.config, {
    generate: opts.generate,
    rng: mulberry32(opts.seed),
    gameId: opts.gameId,
    namePool: opts.namePool,
    promptBuilder: opts.promptBuilder,
  });
  const result = await engine.run();
  await persistResult(opts.store, result);
  return result;
}

export interface BatchOptions {
  config: Readonly<GameConfig>;
  // Called once per game with that game's seed.
  createGenerator: (gameSeed: number) => TextGenerator;
  store?: ResultStore;
  // Wins over `config.random_seed`.
  seed?: number;
  namePool?: readonly string[];
}

export interface BatchOutcome {
  seed: number;
  stats: BatchStats;
  // Index order; `undefined` where the game failed.
  results: Array<GameResult | undefined>;
}

/**
 * Run `num_games` games, up to `max_workers` at a time when `parallel` is
 * set. Game `i` is seeded from the batch seed and `i` alone, so the batch
 * replays identically however the games interleave. A game that throws is
 * counted as failed and the rest carry on.
 */
export async function runBatch(opts: BatchOptions): Promise<BatchOutcome> {
  const { config } = opts;
  const configuredSeed = opts.seed ?? config.random_seed;
  const seed = configuredSeed ?? Date.now();
  if (configuredSeed === undefined) {
    logger.log({ type: 'SYSTEM', content: `No random seed configured; using ${seed}.` });
  }

  const total = config.num_games;
  const workerCount = config.parallel ? Math.max(1, Math.min(config.max_workers, total)) : 1;
  const stats = createBatchStats(total);
  const results: Array<GameResult | undefined> = Array.from({ length: total }, () => undefined);
  const startedAt = Date.now();

  logger.log({
    type: 'SYSTEM',
    content: `Starting ${total} game(s) with seed ${seed} (${workerCount} worker${workerCount === 1 ? '' : 's'}).`,
  });

  let next = 0;
  const worker = async () => {
    while (next < total) {
      const index = next++;
      const gameSeed = deriveGameSeed(seed, index);
      try {
        const result = await runGame({
          config,
          generate: opts.createGenerator(gameSeed),
          seed: gameSeed,
          store: opts.store,
          namePool: opts.namePool,
        });
        results[index] = result;
        recordGameResult(stats, result);
        logger.log({
          type: 'SYSTEM',
          gameId: result.gameId,
          content: `Game ${index + 1}/${total} finished: ${result.winner} won in round ${result.roundCount}.`,
        });
      } catch (error) {
        stats.failed++;
        logger.log({
          type: 'ERROR',
          content: `Game ${index + 1}/${total} failed: ${errorMessage(error)}`,
          metadata: { error, gameSeed },
        });
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  stats.elapsedMs = Date.now() - startedAt;
  return { seed, stats, results };
}
