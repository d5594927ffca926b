import { InvariantViolationError } from '../errors.js';
import { pickOne, type Rng } from '../utils.js';

export interface Plurality {
  winner: string | null;
  count: number;
}

/**
 * Strict plurality over `order`. An exact tie goes to the candidate that comes
 * first in `order`, never to a random pick.
 */
export function pluralityByPosition(counts: ReadonlyMap<string, number>, order: readonly string[]): Plurality {
  let winner: string | null = null;
  let count = 0;
  for (const candidate of order) {
    const votes = counts.get(candidate) ?? 0;
    if (votes > count) {
      winner = candidate;
      count = votes;
    }
  }
  return { winner, count };
}

export interface CastVote {
  target: string;
  // True when the ballot was unusable and a random target was substituted.
  auto: boolean;
}

export interface TallyInput {
  // Voter name -> parsed target, or null when nothing usable was parsed.
  ballots: ReadonlyMap<string, string | null>;
  // Living players in seat order; every one of them votes.
  alivePlayers: readonly string[];
  rng: Rng;
}

export interface VoteTallyResult {
  eliminated: string | null;
  maxVotes: number;
  voteCounts: Record<string, number>;
  // Target -> voters, in seat order.
  voteDetails: Record<string, string[]>;
  cast: Map<string, CastVote>;
}

/**
 * Count a day vote. Missing, self, dead or unknown targets are replaced by a
 * uniformly random other living player, so each living voter with someone
 * to vote for contributes exactly one vote.
 */
export function tallyVotes({ ballots, alivePlayers, rng }: TallyInput): VoteTallyResult {
  if (alivePlayers.length === 0) {
    throw new InvariantViolationError('Cannot tally votes without living players.');
  }

  const living = new Set(alivePlayers);
  // Keyed by player name, so Maps rather than object literals.
  const voteCounts = new Map<string, number>();
  const voteDetails = new Map<string, string[]>();
  const cast = new Map<string, CastVote>();

  for (const voter of alivePlayers) {
    const ballot = ballots.get(voter);
    let vote: CastVote | undefined;
    if (ballot && ballot !== voter && living.has(ballot)) {
      vote = { target: ballot, auto: false };
    } else {
      const fallback = pickOne(
        alivePlayers.filter(p => p !== voter),
        rng
      );
      if (fallback !== undefined) vote = { target: fallback, auto: true };
    }
    if (!vote) continue;

    cast.set(voter, vote);
    voteCounts.set(vote.target, (voteCounts.get(vote.target) ?? 0) + 1);
    const voters = voteDetails.get(vote.target);
    if (voters) voters.push(voter);
    else voteDetails.set(vote.target, [voter]);
  }

  const { winner, count } = pluralityByPosition(voteCounts, alivePlayers);
  return {
    eliminated: winner,
    maxVotes: count,
    voteCounts: Object.fromEntries(voteCounts),
    voteDetails: Object.fromEntries(voteDetails),
    cast,
  };
}

/** Strict majority of the polled population; exactly half rejects. */
export function isEliminationConfirmed(agreeCount: number, population: number): boolean {
  return agreeCount * 2 > population;
}
