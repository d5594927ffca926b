import { z } from 'zod';

// --- Configuration Types ---

export const RoleSchema = z.enum(['Mafia', 'Doctor', 'Villager']);
export type Role = z.infer<typeof RoleSchema>;

export const LanguageSchema = z.enum(['English', 'Spanish', 'French', 'Korean']);
export type Language = z.infer<typeof LanguageSchema>;

export const GameConfigSchema = z.object({
  // AI Gateway model ids in `provider/model` format, e.g. `openai/gpt-4o`.
  // Seats are sampled from this pool with replacement.
  models: z.array(z.string().min(1)).min(1),
  players_per_game: z.number().int().positive().default(8),
  mafia_count: z.number().int().nonnegative().default(2),
  doctor_count: z.number().int().nonnegative().default(1),
  max_rounds: z.number().int().positive().default(20),
  language: LanguageSchema.default('English'),
  random_seed: z.number().int().optional(),
  num_games: z.number().int().positive().default(1),
  parallel: z.boolean().default(false),
  max_workers: z.number().int().positive().default(4),
  api_timeout_ms: z.number().int().nonnegative().default(60_000),
  // Per-model timeout overrides, keyed by model id.
  model_timeouts_ms: z.record(z.string(), z.number().int().nonnegative()).default({}),
  max_attempts: z.number().int().positive().default(2),
  max_output_tokens: z.number().int().positive().default(400),
  temperature: z.number().min(0).max(2).default(0.7),
  // How many recent day messages each agent sees.
  discussion_history_limit: z.number().int().positive().default(20),
  // Overrides data/player-names.json when set.
  name_pool: z.array(z.string().min(1)).optional(),
  results_dir: z.string().default('results'),
  log_thoughts: z.boolean().default(false),
});
export type GameConfig = z.infer<typeof GameConfigSchema>;

// --- Game State Types ---

export type Winner = 'Mafia' | 'Villagers';

/** The kind of turn a player is asked to take. */
export type TurnPhase = 'night' | 'day_discussion' | 'day_voting' | 'confirmation' | 'last_words';

export type EnginePhase = 'setup' | 'night' | 'day_discussion' | 'day_voting' | 'game_over';

export interface RoundMessage {
  speaker: string;
  phase: TurnPhase;
  role: Role;
  content: string;
}

export interface ConfirmationVotes {
  agree: string[];
  disagree: string[];
}

/**
 * One night followed by the day after it. Opened when the night begins and
 * appended to the game history once that day's vote is settled.
 */
export interface RoundRecord {
  roundNumber: number;
  messages: RoundMessage[];
  // Display text per actor, e.g. "Kill Alex" or "Vote Dana (auto-selected)".
  actions: Record<string, string>;
  eliminated: string[];
  eliminatedByVote: string[];
  targetedByMafia: string[];
  protectedByDoctor: string[];
  outcome: string;
  voteCounts?: Record<string, number>;
  voteDetails?: Record<string, string[]>;
  confirmationVotes?: ConfirmationVotes;
  lastWords?: string;
}

export interface Participant {
  role: Role;
  modelId: string;
}

export interface GameResult {
  gameId: string;
  winner: Winner;
  roundCount: number;
  language: Language;
  participants: Record<string, Participant>;
  rounds: RoundRecord[];
}

// --- Logging Types ---

export type LogType =
  | 'SYSTEM'
  | 'PHASE'
  | 'CHAT'
  | 'NIGHT_CHAT'
  | 'ACTION'
  | 'VOTE'
  | 'CONFIRMATION'
  | 'DEATH'
  | 'WIN'
  | 'THOUGHT'
  | 'ERROR';

export type LogVisibility = 'public' | 'private' | 'faction';

export interface GameLogMetadata {
  role?: Role;
  visibility?: LogVisibility;
  round?: number;
  phase?: TurnPhase;

  target?: string;
  vote?: string;
  reason?: string;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  gameId?: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}
