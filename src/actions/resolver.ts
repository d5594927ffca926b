import type { NightResolutionInput, ResolvedNight } from './types.js';
import { pluralityByPosition } from './voteTally.js';

/**
 * Resolve one night. The kill target is the plurality of the Mafia's valid
 * picks (positional tie-break over the living players); it dies unless a
 * Doctor protected it. With no valid pick the night passes without a kill.
 */
export function resolveNightActions(input: NightResolutionInput): ResolvedNight {
  const alive = new Set(input.alivePlayers);

  const votes = new Map<string, number>();
  for (const k of input.kills) {
    // Stale targets are ignored.
    if (!alive.has(k.actor) || !alive.has(k.target)) continue;
    votes.set(k.target, (votes.get(k.target) ?? 0) + 1);
  }
  const killVotes = Object.fromEntries(votes);

  const protectedPlayers = new Set<string>();
  for (const p of input.protections) {
    if (!alive.has(p.actor) || !alive.has(p.target)) continue;
    protectedPlayers.add(p.target);
  }

  const killTarget = pluralityByPosition(votes, input.alivePlayers).winner;
  if (killTarget === null) {
    return { killTarget, killVotes, protectedPlayers, death: null, outcome: 'no_kill' };
  }
  if (protectedPlayers.has(killTarget)) {
    return { killTarget, killVotes, protectedPlayers, death: null, outcome: 'protected' };
  }
  return { killTarget, killVotes, protectedPlayers, death: killTarget, outcome: 'killed' };
}
