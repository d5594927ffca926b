import test from 'node:test';
import assert from 'node:assert/strict';
import {
  classifyConfirmation,
  extractConfirmationVote,
  extractNightAction,
  extractVote,
  type Seat,
} from './extractor.js';

const SEATS: Seat[] = [
  { name: 'Alex', role: 'Mafia', alive: true },
  { name: 'Blake', role: 'Mafia', alive: true },
  { name: 'Casey', role: 'Doctor', alive: true },
  { name: 'Dana', role: 'Villager', alive: true },
  { name: 'Emery', role: 'Villager', alive: false },
];

test('extractNightAction: Mafia kill of a living townsperson', () => {
  assert.deepEqual(extractNightAction('Mafia', 'Tough call.\nACTION: Kill Dana', SEATS, 'Alex', 'English'), {
    kind: 'kill',
    target: 'Dana',
  });
});

test('extractNightAction: brackets, quotes, emphasis and trailing punctuation are trimmed', () => {
  for (const text of ['action: kill [dana].', 'ACTION: Kill **Dana**', 'ACTION: Kill "Dana"!', 'ACTION:Kill Dana...']) {
    assert.deepEqual(extractNightAction('Mafia', text, SEATS, 'Alex', 'English'), { kind: 'kill', target: 'Dana' }, text);
  }
});

test('extractNightAction: Mafia targets that are rejected', () => {
  const reasonFor = (text: string) => {
    const action = extractNightAction('Mafia', text, SEATS, 'Alex', 'English');
    return action.kind === 'invalid' ? action.reason : action.kind;
  };
  assert.equal(reasonFor('ACTION: Kill Alex'), 'self_target');
  assert.equal(reasonFor('ACTION: Kill Blake'), 'mafia_target');
  assert.equal(reasonFor('ACTION: Kill Emery'), 'dead_target');
  assert.equal(reasonFor('ACTION: Kill Zed'), 'unknown_target');
  assert.equal(reasonFor('ACTION: Kill Dan'), 'unknown_target');
  assert.equal(reasonFor('I will kill Dana'), 'no_marker');
});

test('extractNightAction: only the first marker counts', () => {
  const action = extractNightAction('Mafia', 'ACTION: Kill Zed\nACTION: Kill Dana', SEATS, 'Alex', 'English');
  assert.deepEqual(action, { kind: 'invalid', reason: 'unknown_target' });
});

test('extractNightAction: the Doctor may protect anyone alive, self included', () => {
  assert.deepEqual(extractNightAction('Doctor', 'ACTION: Protect Casey', SEATS, 'Casey', 'English'), {
    kind: 'protect',
    target: 'Casey',
  });
  assert.deepEqual(extractNightAction('Doctor', 'ACTION: Protect Alex', SEATS, 'Casey', 'English'), {
    kind: 'protect',
    target: 'Alex',
  });
  assert.deepEqual(extractNightAction('Doctor', 'ACTION: Protect Emery', SEATS, 'Casey', 'English'), {
    kind: 'invalid',
    reason: 'dead_target',
  });
});

test('extractNightAction: Villagers have no night action', () => {
  assert.deepEqual(extractNightAction('Villager', 'ACTION: Kill Alex', SEATS, 'Dana', 'English'), {
    kind: 'invalid',
    reason: 'no_night_action',
  });
});

test('extractNightAction: localized markers', () => {
  assert.deepEqual(extractNightAction('Mafia', 'ACCIÓN: Matar Dana', SEATS, 'Alex', 'Spanish'), { kind: 'kill', target: 'Dana' });
  assert.deepEqual(extractNightAction('Mafia', 'ACTION: Tuer Dana', SEATS, 'Alex', 'French'), { kind: 'kill', target: 'Dana' });
  assert.deepEqual(extractNightAction('Mafia', '행동: 죽이기 Dana', SEATS, 'Alex', 'Korean'), { kind: 'kill', target: 'Dana' });
  assert.deepEqual(extractNightAction('Doctor', 'ACCIÓN: Proteger Dana', SEATS, 'Casey', 'Spanish'), {
    kind: 'protect',
    target: 'Dana',
  });
  assert.deepEqual(extractNightAction('Doctor', 'ACTION: Protéger Dana', SEATS, 'Casey', 'French'), {
    kind: 'protect',
    target: 'Dana',
  });
  assert.deepEqual(extractNightAction('Doctor', '행동: 보호하기 Dana', SEATS, 'Casey', 'Korean'), {
    kind: 'protect',
    target: 'Dana',
  });
});

test("extractNightAction: another language's marker does not count", () => {
  assert.deepEqual(extractNightAction('Mafia', 'ACTION: Kill Dana', SEATS, 'Alex', 'Spanish'), {
    kind: 'invalid',
    reason: 'no_marker',
  });
});

test('extractNightAction: never yields a dead, self or Mafia kill target', () => {
  for (const actor of ['Alex', 'Blake']) {
    for (const seat of SEATS) {
      const action = extractNightAction('Mafia', `ACTION: Kill ${seat.name}`, SEATS, actor, 'English');
      if (action.kind !== 'kill') continue;
      const target = SEATS.find(s => s.name === action.target);
      assert.ok(target?.alive);
      assert.notEqual(target?.role, 'Mafia');
      assert.notEqual(action.target, actor);
    }
  }
});

test('extractVote: a living player other than the voter', () => {
  assert.deepEqual(extractVote('Dana dodged every question.\nVOTE: Dana', SEATS, 'Alex', 'English'), {
    kind: 'vote',
    target: 'Dana',
  });
  // Voting for a teammate is legal.
  assert.deepEqual(extractVote('VOTE: Blake', SEATS, 'Alex', 'English'), { kind: 'vote', target: 'Blake' });
  assert.deepEqual(extractVote('VOTO: dana!', SEATS, 'Alex', 'Spanish'), { kind: 'vote', target: 'Dana' });
  assert.deepEqual(extractVote('투표: Dana', SEATS, 'Alex', 'Korean'), { kind: 'vote', target: 'Dana' });
});

test('extractVote: self, dead and missing votes are invalid', () => {
  assert.deepEqual(extractVote('VOTE: Alex', SEATS, 'Alex', 'English'), { kind: 'invalid', reason: 'self_target' });
  assert.deepEqual(extractVote('VOTE: Emery', SEATS, 'Alex', 'English'), { kind: 'invalid', reason: 'dead_target' });
  assert.deepEqual(extractVote('I vote Dana', SEATS, 'Alex', 'English'), { kind: 'invalid', reason: 'no_marker' });
  assert.deepEqual(extractVote('no response', SEATS, 'Alex', 'English'), { kind: 'invalid', reason: 'no_marker' });
});

test('classifyConfirmation: English agree and disagree classes', () => {
  assert.equal(classifyConfirmation('AGREE. The case is strong.', 'English'), 'agree');
  assert.equal(classifyConfirmation('Agreed', 'English'), 'agree');
  assert.equal(classifyConfirmation('Yes, eliminate them', 'English'), 'agree');
  assert.equal(classifyConfirmation('I disagree', 'English'), 'disagree');
  assert.equal(classifyConfirmation('No way', 'English'), 'disagree');
  assert.equal(classifyConfirmation('Hmm, maybe later', 'English'), null);
  // "not" and "nobody" are not "no".
  assert.equal(classifyConfirmation('nobody knows, not sure', 'English'), null);
});

test('classifyConfirmation: localized classes', () => {
  assert.equal(classifyConfirmation('Estoy de acuerdo', 'Spanish'), 'agree');
  assert.equal(classifyConfirmation('Estoy en desacuerdo', 'Spanish'), 'disagree');
  assert.equal(classifyConfirmation('Sí', 'Spanish'), 'agree');
  assert.equal(classifyConfirmation("Je suis d'accord", 'French'), 'agree');
  assert.equal(classifyConfirmation("PAS D'ACCORD", 'French'), 'disagree');
  assert.equal(classifyConfirmation('Non', 'French'), 'disagree');
  assert.equal(classifyConfirmation('동의합니다', 'Korean'), 'agree');
  assert.equal(classifyConfirmation('반대합니다', 'Korean'), 'disagree');
});

test('extractConfirmationVote: unclear replies count as disagree', () => {
  assert.deepEqual(extractConfirmationVote('AGREE', 'English'), { kind: 'confirmation', choice: 'agree' });
  assert.deepEqual(extractConfirmationVote('Hmm, maybe later', 'English'), { kind: 'confirmation', choice: 'disagree' });
  assert.deepEqual(extractConfirmationVote('', 'English'), { kind: 'confirmation', choice: 'disagree' });
});
