import type { TurnPhase } from '../types.js';
import { escapeRegExp } from '../utils.js';
import { ANY_INTENT_LABEL, ANY_VOTE_LABEL, BARE_ACTION_VERB, RESPONSE_CUE } from './markers.js';

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const OPEN_THINK_TAIL = /<think>[\s\S]*$/i;

/** Remove `<think>` blocks, including one the model never closed. */
export function stripPrivateThoughts(text: string): string {
  return text
    .replace(THINK_BLOCK, '')
    .replace(OPEN_THINK_TAIL, '')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();
}

/** Contents of the `<think>` blocks, in order. */
export function extractPrivateThoughts(text: string): string[] {
  const thoughts: string[] = [];
  for (const match of text.matchAll(/<think>([\s\S]*?)(?:<\/think>|$)/gi)) {
    const inner = match[1]?.trim();
    if (inner) thoughts.push(inner);
  }
  return thoughts;
}

function cutAtImpersonation(text: string, otherNames: readonly string[]): string {
  if (otherNames.length === 0) return text;
  const label = new RegExp(`^\\s*(?:${otherNames.map(escapeRegExp).join('|')})\\s*:`, 'iu');
  const lines = text.split('\n');
  const cut = lines.findIndex(line => label.test(line));
  return cut < 0 ? text : lines.slice(0, cut).join('\n');
}

function cutAtEchoedInstructions(text: string): string {
  const cues = [...text.matchAll(RESPONSE_CUE)];
  const second = cues[1];
  if (second?.index !== undefined) {
    // Instructions echoed twice: the answer is whatever follows the second echo.
    const endOfLine = text.indexOf('\n', second.index);
    return endOfLine < 0 ? text.slice(second.index + second[0].length) : text.slice(endOfLine + 1);
  }
  if (cues.length === 1) {
    return text
      .split('\n')
      .filter(line => !new RegExp(RESPONSE_CUE.source, 'iu').test(line))
      .join('\n');
  }
  return text;
}

function cutFrom(text: string, pattern: RegExp): string {
  const match = pattern.exec(text);
  return match ? text.slice(0, match.index) : text;
}

function cutPhaseKeywords(text: string, phase: TurnPhase): string {
  if (phase === 'day_discussion') {
    return cutFrom(cutFrom(text, ANY_INTENT_LABEL), BARE_ACTION_VERB);
  }
  if (phase === 'night') {
    return cutFrom(text, ANY_VOTE_LABEL);
  }
  return text;
}

function stripSelfLabel(text: string, speaker: string): string {
  if (!speaker) return text;
  const label = new RegExp(`^\\s*(?:${escapeRegExp(speaker)}\\s*:\\s*)+`, 'iu');
  return text.replace(label, '');
}

function sanitizeOnce(
  text: string,
  speaker: string,
  otherNames: readonly string[],
  phase: TurnPhase
): string {
  let out = cutAtImpersonation(text, otherNames);
  out = cutAtEchoedInstructions(out);
  out = cutPhaseKeywords(out, phase);
  out = stripSelfLabel(out, speaker);
  return out.trim();
}

/**
 * Truncate a raw reply to the speaker's own turn before it is stored or
 * parsed. Passes repeat until the text stops changing, so sanitizing a
 * sanitized reply is a no-op. Never throws; anything but a string yields "".
 */
export function sanitizeResponse(
  raw: unknown,
  speaker: string,
  otherLivingNames: readonly string[],
  phase: TurnPhase
): string {
  if (typeof raw !== 'string' || raw.length === 0) return '';
  const otherNames = otherLivingNames.filter(n => n !== speaker && n.length > 0);

  let current = raw;
  for (;;) {
    const next = sanitizeOnce(current, speaker, otherNames, phase);
    // Every pass only removes text, so this terminates.
    if (next === current) return next;
    current = next;
  }
}
