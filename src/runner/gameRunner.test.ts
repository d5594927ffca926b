import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runBatch, runGame } from './gameRunner.js';
import { createDryRunGenerator } from '../agent.js';
import { parseConfig } from '../config.js';
import { logger } from '../logger.js';
import { subscribeToGame } from '../events/index.js';
import { JsonFileResultStore, type ResultStore } from '../persistence/resultStore.js';
import { deriveGameSeed } from '../utils.js';
import type { GameConfig, GameLogEntry, GameResult } from '../types.js';

logger.setConsoleOutputEnabled(false);
logger.setPersistenceEnabled(false);

function batchConfig(overrides: Partial<GameConfig> = {}): Readonly<GameConfig> {
  return parseConfig({
    models: ['openai/gpt-4o', 'anthropic/claude-3-5-haiku'],
    players_per_game: 6,
    max_rounds: 5,
    num_games: 4,
    ...overrides,
  });
}

// Game ids are random; everything else follows from the seed.
function comparable(results: Array<GameResult | undefined>) {
  return results.map(r => r && { winner: r.winner, participants: r.participants, rounds: r.rounds });
}

test('runBatch: parallel and sequential runs of one seed play the same games', async () => {
  const sequential = await runBatch({ config: batchConfig(), createGenerator: createDryRunGenerator, seed: 7 });
  const parallel = await runBatch({
    config: batchConfig({ parallel: true, max_workers: 3 }),
    createGenerator: createDryRunGenerator,
    seed: 7,
  });

  assert.equal(sequential.stats.completed, 4);
  assert.equal(parallel.stats.completed, 4);
  assert.deepEqual(comparable(parallel.results), comparable(sequential.results));
  assert.equal(parallel.stats.mafiaWins, sequential.stats.mafiaWins);
});

test('runBatch: the configured seed is used when none is passed', async () => {
  const outcome = await runBatch({
    config: batchConfig({ num_games: 1, random_seed: 99 }),
    createGenerator: createDryRunGenerator,
  });
  assert.equal(outcome.seed, 99);
});

test('runBatch: a game that throws is counted and the others finish', async () => {
  const broken = deriveGameSeed(5, 1);
  const outcome = await runBatch({
    config: batchConfig({ num_games: 3 }),
    seed: 5,
    createGenerator: gameSeed => {
      if (gameSeed === broken) throw new Error('generator unavailable');
      return createDryRunGenerator(gameSeed);
    },
  });

  assert.equal(outcome.stats.completed, 2);
  assert.equal(outcome.stats.failed, 1);
  assert.equal(outcome.results[1], undefined);
  assert.ok(outcome.results[0]);
  assert.ok(outcome.results[2]);
});

test('runGame: a failing store is logged and the result still returned', async () => {
  const store: ResultStore = {
    save: async () => {
      throw new Error('disk full');
    },
  };
  const errors: GameLogEntry[] = [];
  const stop = subscribeToGame('store-fails', entry => {
    if (entry.type === 'ERROR') errors.push(entry);
  });

  try {
    const result = await runGame({
      config: batchConfig(),
      generate: createDryRunGenerator(3),
      seed: 3,
      gameId: 'store-fails',
      store,
    });
    assert.equal(result.gameId, 'store-fails');
  } finally {
    stop();
  }
  assert.deepEqual(
    errors.map(e => e.content),
    ['Failed to save result of game store-fails: disk full']
  );
});

test('JsonFileResultStore: writes one JSON file per game', async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mafia-results-'));
  try {
    const result = await runGame({
      config: batchConfig(),
      generate: createDryRunGenerator(4),
      seed: 4,
      gameId: 'saved-game',
      store: new JsonFileResultStore(path.join(dir, 'nested')),
    });

    const saved: unknown = JSON.parse(fs.readFileSync(path.join(dir, 'nested', 'saved-game.json'), 'utf-8'));
    assert.deepEqual(saved, JSON.parse(JSON.stringify(result)));
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
