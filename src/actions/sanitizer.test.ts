import test from 'node:test';
import assert from 'node:assert/strict';
import { extractPrivateThoughts, sanitizeResponse, stripPrivateThoughts } from './sanitizer.js';
import type { TurnPhase } from '../types.js';

const LIVING = ['Alex', 'Blake', 'Casey', 'Dana'];

test('sanitizeResponse: cuts at a line another player "speaks"', () => {
  const raw = 'I think Blake is lying.\nBlake: No I am not!\nAlex: yes you are';
  assert.equal(sanitizeResponse(raw, 'Alex', LIVING, 'day_discussion'), 'I think Blake is lying.');
});

test('sanitizeResponse: impersonation labels match case-insensitively', () => {
  assert.equal(sanitizeResponse('ok then\n  blake : hi', 'Alex', LIVING, 'day_discussion'), 'ok then');
});

test('sanitizeResponse: a name mid-line is not a label', () => {
  const raw = 'I agree with Blake: Casey is quiet.';
  assert.equal(sanitizeResponse(raw, 'Alex', LIVING, 'day_discussion'), raw);
});

test('sanitizeResponse: echoed instructions twice keep only the final answer', () => {
  const raw = 'Your response:\nfirst draft\nYour response:\nfinal answer';
  assert.equal(sanitizeResponse(raw, 'Alex', LIVING, 'day_voting'), 'final answer');
});

test('sanitizeResponse: second echo on the last line keeps the text after the phrase', () => {
  const raw = 'Your response:\nfirst\nYour response is Casey';
  assert.equal(sanitizeResponse(raw, 'Alex', LIVING, 'day_voting'), 'is Casey');
});

test('sanitizeResponse: a single echo line is deleted', () => {
  const raw = 'Sure.\nYour response: hmm\nMore text';
  assert.equal(sanitizeResponse(raw, 'Alex', LIVING, 'day_voting'), 'Sure.\nMore text');
});

test('sanitizeResponse: localized echo lines are recognised', () => {
  assert.equal(sanitizeResponse('당신의 응답:\n좋아요', 'Alex', LIVING, 'day_voting'), '좋아요');
});

test('sanitizeResponse: discussion drops everything from an action marker on', () => {
  assert.equal(sanitizeResponse('I suspect Dana.\nACTION: Kill Dana', 'Alex', LIVING, 'day_discussion'), 'I suspect Dana.');
  assert.equal(sanitizeResponse('We should vote: Dana', 'Alex', LIVING, 'day_discussion'), 'We should');
  assert.equal(sanitizeResponse('Creo que VOTO: Dana', 'Alex', LIVING, 'day_discussion'), 'Creo que');
});

test('sanitizeResponse: discussion drops shouted action verbs but not prose', () => {
  assert.equal(sanitizeResponse('Honestly I would KILL for a clue', 'Alex', LIVING, 'day_discussion'), 'Honestly I would');
  const prose = 'This skill matters; we cannot kill time.';
  assert.equal(sanitizeResponse(prose, 'Alex', LIVING, 'day_discussion'), prose);
  assert.equal(sanitizeResponse('나는 죽이기 원해', 'Alex', LIVING, 'day_discussion'), '나는');
});

test('sanitizeResponse: night drops a vote but keeps the action', () => {
  assert.equal(sanitizeResponse('ACTION: Kill Dana\nVOTE: Dana', 'Alex', LIVING, 'night'), 'ACTION: Kill Dana');
  assert.equal(sanitizeResponse('ACCIÓN: Matar Dana VOTO: Casey', 'Alex', LIVING, 'night'), 'ACCIÓN: Matar Dana');
});

test('sanitizeResponse: voting keeps the vote marker', () => {
  assert.equal(sanitizeResponse('Dana is shady.\nVOTE: Dana', 'Alex', LIVING, 'day_voting'), 'Dana is shady.\nVOTE: Dana');
});

test('sanitizeResponse: strips repeated self labels', () => {
  assert.equal(sanitizeResponse('Alex: Alex: I am innocent', 'Alex', LIVING, 'day_discussion'), 'I am innocent');
  assert.equal(sanitizeResponse('alex:  hi', 'Alex', LIVING, 'day_discussion'), 'hi');
});

test('sanitizeResponse: empty or non-string input gives ""', () => {
  assert.equal(sanitizeResponse('', 'Alex', LIVING, 'night'), '');
  assert.equal(sanitizeResponse(undefined, 'Alex', LIVING, 'night'), '');
  assert.equal(sanitizeResponse(42, 'Alex', LIVING, 'night'), '');
  assert.equal(sanitizeResponse('   \n\n ', 'Alex', LIVING, 'night'), '');
});

const SAMPLES = [
  'Plain talk about Casey.',
  'Your response:\nYour response:\nBlake: hi\nAlex: Alex: me',
  'Alex: first\nYour response: x\nCasey: second\nVOTE: Dana',
  'ACTION: Protect Alex\nyour response\nyour RESPONSE\nDana: bye',
  '  \nAlex:\nAlex: KILL\n',
  'Your response\nAlex: Your response: Blake: VOTE: Casey',
  '행동: 죽이기 Dana\n투표: Casey',
];
const PHASES: TurnPhase[] = ['night', 'day_discussion', 'day_voting', 'confirmation', 'last_words'];

test('sanitizeResponse: sanitizing twice changes nothing', () => {
  for (const phase of PHASES) {
    for (const raw of SAMPLES) {
      const once = sanitizeResponse(raw, 'Alex', LIVING, phase);
      assert.equal(sanitizeResponse(once, 'Alex', LIVING, phase), once, `${phase}: ${JSON.stringify(raw)}`);
    }
  }
});

test('sanitizeResponse: no other living player survives as a line label', () => {
  const foreignLabel = /^\s*(?:Blake|Casey|Dana)\s*:/im;
  for (const phase of PHASES) {
    for (const raw of SAMPLES) {
      assert.doesNotMatch(sanitizeResponse(raw, 'Alex', LIVING, phase), foreignLabel);
    }
  }
});

test('stripPrivateThoughts: removes closed and unclosed think blocks', () => {
  assert.equal(stripPrivateThoughts('a<think>x</think>b'), 'ab');
  assert.equal(stripPrivateThoughts('Hello<THINK>secret'), 'Hello');
  assert.equal(stripPrivateThoughts('a\n\n\n\nb'), 'a\n\nb');
});

test('extractPrivateThoughts: returns block contents in order', () => {
  assert.deepEqual(extractPrivateThoughts('<think> one </think>mid<think>two'), ['one', 'two']);
  assert.deepEqual(extractPrivateThoughts('nothing here'), []);
});
