import test, { mock } from 'node:test';
import assert from 'node:assert/strict';
import { logger } from './logger.js';

logger.setPersistenceEnabled(false);

test('GameLogger.setPrintThoughts: thoughts reach the console only when enabled', () => {
  const print = mock.method(console, 'log', () => {});
  try {
    logger.setPrintThoughts(false);
    logger.log({ type: 'THOUGHT', gameId: 'thoughts', player: 'Alex', content: 'Blake is lying' });
    assert.equal(print.mock.callCount(), 0);

    logger.setPrintThoughts(true);
    logger.log({ type: 'THOUGHT', gameId: 'thoughts', player: 'Alex', content: 'Blake is lying' });
    assert.equal(print.mock.callCount(), 1);
    assert.ok(String(print.mock.calls[0]?.arguments[0]).includes('Blake is lying'));
  } finally {
    print.mock.restore();
  }
});
