import test from 'node:test';
import assert from 'node:assert/strict';
import { createBatchStats, formatBatchSummary, recordGameResult } from './stats.js';
import type { GameResult, Winner } from '../types.js';

function game(winner: Winner): GameResult {
  return {
    gameId: `g-${winner}`,
    winner,
    roundCount: 2,
    language: 'English',
    participants: {
      Alex: { role: 'Mafia', modelId: 'openai/gpt-4o' },
      Blake: { role: 'Doctor', modelId: 'anthropic/claude-3-5-haiku' },
      Casey: { role: 'Villager', modelId: 'openai/gpt-4o' },
      Dana: { role: 'Villager', modelId: 'anthropic/claude-3-5-haiku' },
    },
    rounds: [],
  };
}

const ANSI = /\u001b\[[0-9;]*m/g;

test('recordGameResult: counts wins per seat and role', () => {
  const stats = createBatchStats(2);
  recordGameResult(stats, game('Mafia'));
  recordGameResult(stats, game('Villagers'));

  assert.equal(stats.completed, 2);
  assert.equal(stats.mafiaWins, 1);
  assert.equal(stats.villagerWins, 1);
  assert.deepEqual(stats.models['openai/gpt-4o'], {
    games: 4,
    wins: 2,
    mafia_games: 2,
    mafia_wins: 1,
    villager_games: 2,
    villager_wins: 1,
    doctor_games: 0,
    doctor_wins: 0,
  });
  assert.deepEqual(stats.models['anthropic/claude-3-5-haiku'], {
    games: 4,
    wins: 2,
    mafia_games: 0,
    mafia_wins: 0,
    villager_games: 2,
    villager_wins: 1,
    doctor_games: 2,
    doctor_wins: 1,
  });
});

test('formatBatchSummary: totals, failures and per-model lines', () => {
  const stats = createBatchStats(3);
  recordGameResult(stats, game('Mafia'));
  recordGameResult(stats, game('Mafia'));
  stats.failed = 1;
  stats.elapsedMs = 1500;

  const lines = formatBatchSummary(stats).replace(ANSI, '').split('\n');
  assert.deepEqual(lines, [
    '=== Simulation summary ===',
    'Games: 2/3 completed, 1 failed',
    'Mafia wins: 2 (100.0%)',
    'Villager wins: 0 (0.0%)',
    'Elapsed: 1.5s',
    '',
    'Per model:',
    '  anthropic/claude-3-5-haiku: 0/4 wins (0.0%); Mafia 0/0, Villager 0/2, Doctor 0/2',
    '  openai/gpt-4o: 2/4 wins (50.0%); Mafia 2/2, Villager 0/2, Doctor 0/0',
  ]);
});

test('formatBatchSummary: no completed games shows dashes', () => {
  const text = formatBatchSummary(createBatchStats(1)).replace(ANSI, '');
  assert.ok(text.includes('Mafia wins: 0 (-)'));
  assert.ok(!text.includes('Per model:'));
});
