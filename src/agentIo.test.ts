import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentIO, NO_RESPONSE, type AgentIOConfig, type GenerationContext, type TextGenerator } from './agentIo.js';
import { logger } from './logger.js';
import { subscribeToGame } from './events/index.js';
import type { GameLogEntry } from './types.js';

logger.setConsoleOutputEnabled(false);
logger.setPersistenceEnabled(false);

const CONTEXT: GenerationContext = {
  gameId: 'agent-io-test',
  player: 'Alex',
  role: 'Villager',
  phase: 'day_discussion',
  language: 'English',
  roundNumber: 1,
  alivePlayers: ['Alex', 'Blake', 'Casey'],
  teammates: [],
};

function config(overrides: Partial<AgentIOConfig> = {}): AgentIOConfig {
  return { api_timeout_ms: 1_000, model_timeouts_ms: {}, max_attempts: 3, log_thoughts: false, ...overrides };
}

function captureLogs(): { entries: GameLogEntry[]; stop: () => void } {
  const entries: GameLogEntry[] = [];
  const stop = subscribeToGame(CONTEXT.gameId, entry => entries.push(entry));
  return { entries, stop };
}

test('AgentIO.ask: retries after a failure and returns the next reply', async () => {
  let calls = 0;
  const generate: TextGenerator = async () => {
    calls++;
    if (calls === 1) throw new Error('boom');
    return 'Hello there.';
  };
  const logs = captureLogs();
  try {
    const reply = await new AgentIO(generate, config()).ask('test/model', 'prompt', CONTEXT);
    assert.equal(reply, 'Hello there.');
  } finally {
    logs.stop();
  }
  assert.equal(calls, 2);
  assert.deepEqual(
    logs.entries.filter(e => e.type === 'ERROR').map(e => e.content),
    ['Alex (test/model) failed (attempt 1/3): boom']
  );
});

test('AgentIO.ask: gives the sentinel after the last failed attempt', async () => {
  let calls = 0;
  const generate: TextGenerator = async () => {
    calls++;
    throw new Error('offline');
  };
  const reply = await new AgentIO(generate, config({ max_attempts: 2 })).ask('test/model', 'prompt', CONTEXT);
  assert.equal(reply, NO_RESPONSE);
  assert.equal(calls, 2);
});

test('AgentIO.ask: a slow model is aborted at its timeout', async () => {
  let signal: AbortSignal | undefined;
  const generate: TextGenerator = (_model, _prompt, context) =>
    new Promise<string>((_, reject) => {
      signal = context.abortSignal;
      context.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  const logs = captureLogs();
  try {
    const reply = await new AgentIO(generate, config({ api_timeout_ms: 20, max_attempts: 1 })).ask(
      'test/model',
      'prompt',
      CONTEXT
    );
    assert.equal(reply, NO_RESPONSE);
  } finally {
    logs.stop();
  }
  assert.equal(signal?.aborted, true);
  assert.deepEqual(
    logs.entries.filter(e => e.type === 'ERROR').map(e => e.content),
    ['Alex (test/model) failed (attempt 1/1): Timeout after 20ms']
  );
});

test('AgentIO.timeoutFor: per-model overrides win over the default', () => {
  const io = new AgentIO(async () => '', config({ api_timeout_ms: 5_000, model_timeouts_ms: { 'slow/model': 90_000 } }));
  assert.equal(io.timeoutFor('slow/model'), 90_000);
  assert.equal(io.timeoutFor('fast/model'), 5_000);
});

test('AgentIO.ask: private thoughts are removed and optionally logged', async () => {
  const logs = captureLogs();
  try {
    const io = new AgentIO(async () => '<think>Blake is lying</think>I trust Casey.', config({ log_thoughts: true }));
    assert.equal(await io.ask('test/model', 'prompt', CONTEXT), 'I trust Casey.');
  } finally {
    logs.stop();
  }
  assert.deepEqual(
    logs.entries.filter(e => e.type === 'THOUGHT').map(e => e.content),
    ['Blake is lying']
  );
});

test('AgentIO.ask: a reply of only thoughts counts as a failed attempt', async () => {
  const logs = captureLogs();
  try {
    const io = new AgentIO(async () => '<think>hmm</think>', config({ max_attempts: 1 }));
    assert.equal(await io.ask('test/model', 'prompt', CONTEXT), NO_RESPONSE);
  } finally {
    logs.stop();
  }
  assert.deepEqual(
    logs.entries.filter(e => e.type === 'ERROR').map(e => e.content),
    ['Alex (test/model) failed (attempt 1/1): Reply held only private thoughts']
  );
});
