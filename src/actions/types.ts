export type InvalidReason =
  | 'no_marker'
  | 'unknown_target'
  | 'self_target'
  | 'dead_target'
  | 'mafia_target'
  | 'no_night_action';

export type ConfirmationChoice = 'agree' | 'disagree';

/**
 * A command decoded from agent text. `invalid` is an ordinary result: the
 * caller applies its phase policy instead of catching anything.
 */
export type Action =
  | { kind: 'kill'; target: string }
  | { kind: 'protect'; target: string }
  | { kind: 'vote'; target: string }
  | { kind: 'confirmation'; choice: ConfirmationChoice }
  | { kind: 'invalid'; reason: InvalidReason };

export interface NightIntent {
  actor: string;
  target: string;
}

export interface NightResolutionInput {
  kills: readonly NightIntent[];
  protections: readonly NightIntent[];
  // Seat order of the players alive when the night began.
  alivePlayers: readonly string[];
}

interface NightTally {
  killVotes: Record<string, number>;
  protectedPlayers: Set<string>;
}

export type ResolvedNight = NightTally &
  (
    | { outcome: 'no_kill'; killTarget: null; death: null }
    | { outcome: 'protected'; killTarget: string; death: null }
    | { outcome: 'killed'; killTarget: string; death: string }
  );
