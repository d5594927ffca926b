import type { Language, Role } from '../types.js';
import type { Action, ConfirmationChoice, InvalidReason } from './types.js';
import { agreePattern, disagreePattern, killPattern, protectPattern, votePattern } from './markers.js';

/** What the extractor needs to know about a seat. */
export interface Seat {
  name: string;
  role: Role;
  alive: boolean;
}

const TRAILING_PUNCTUATION = /[.:,;!?)\]"'*”’-]+$/u;

function cleanToken(token: string): string {
  return token.trim().replace(TRAILING_PUNCTUATION, '');
}

function invalid(reason: InvalidReason): Action {
  return { kind: 'invalid', reason };
}

type TargetCheck = (seat: Seat) => InvalidReason | null;

function resolveTarget(
  text: string,
  pattern: RegExp,
  seats: readonly Seat[],
  check: TargetCheck
): { name: string } | { reason: InvalidReason } {
  const token = pattern.exec(text)?.[1];
  if (token === undefined) return { reason: 'no_marker' };

  const wanted = cleanToken(token).toLowerCase();
  const seat = seats.find(s => s.name.toLowerCase() === wanted);
  if (!seat) return { reason: 'unknown_target' };
  if (!seat.alive) return { reason: 'dead_target' };

  const rejected = check(seat);
  return rejected ? { reason: rejected } : { name: seat.name };
}

/**
 * Night action of `actorName`. Mafia must name a living non-Mafia player
 * other than themselves; the Doctor may protect any living player. Only the
 * first marker in the text counts.
 */
export function extractNightAction(
  role: Role,
  text: string,
  alivePlayers: readonly Seat[],
  actorName: string,
  language: Language
): Action {
  if (role === 'Mafia') {
    const target = resolveTarget(text, killPattern(language), alivePlayers, seat => {
      if (seat.name === actorName) return 'self_target';
      if (seat.role === 'Mafia') return 'mafia_target';
      return null;
    });
    return 'name' in target ? { kind: 'kill', target: target.name } : invalid(target.reason);
  }

  if (role === 'Doctor') {
    const target = resolveTarget(text, protectPattern(language), alivePlayers, () => null);
    return 'name' in target ? { kind: 'protect', target: target.name } : invalid(target.reason);
  }

  return invalid('no_night_action');
}

/**
 * Day vote of `selfName`. Returns `invalid` for anything unusable; choosing a
 * replacement target is the tally's job.
 */
export function extractVote(
  text: string,
  alivePlayers: readonly Seat[],
  selfName: string,
  language: Language
): Action {
  const target = resolveTarget(text, votePattern(language), alivePlayers, seat =>
    seat.name === selfName ? 'self_target' : null
  );
  return 'name' in target ? { kind: 'vote', target: target.name } : invalid(target.reason);
}

/**
 * Lexical class of a confirmation reply, agree checked first; null when
 * the reply contains neither class.
 */
export function classifyConfirmation(text: string, language: Language): ConfirmationChoice | null {
  const lowered = text.toLowerCase();
  if (agreePattern(language).test(lowered)) return 'agree';
  if (disagreePattern(language).test(lowered)) return 'disagree';
  return null;
}

/** Unclear replies count as disagree. */
export function extractConfirmationVote(text: string, language: Language): Action {
  return { kind: 'confirmation', choice: classifyConfirmation(text, language) ?? 'disagree' };
}
