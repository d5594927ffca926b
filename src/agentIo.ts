import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import { extractPrivateThoughts, stripPrivateThoughts } from './actions/sanitizer.js';
import type { GameConfig, GameLogEntry, Language, Role, TurnPhase } from './types.js';

/** What a failed or silent agent contributes to the game. */
export const NO_RESPONSE = 'no response';

/** Who is being asked, and about what. Generators may use it; prompts carry the rest. */
export interface GenerationContext {
  gameId: string;
  player: string;
  role: Role;
  phase: TurnPhase;
  language: Language;
  roundNumber: number;
  alivePlayers: readonly string[];
  teammates: readonly string[];
  // Set for confirmation and last-words turns.
  candidate?: string;
  abortSignal?: AbortSignal;
}

export type TextGenerator = (modelId: string, prompt: string, context: GenerationContext) => Promise<string>;

export type AgentIOConfig = Pick<GameConfig, 'api_timeout_ms' | 'model_timeouts_ms' | 'max_attempts' | 'log_thoughts'>;

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => void): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => {
        onTimeout();
        reject(new Error(`Timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

/**
 * The only path from the engine to a model. Each call gets a timeout and a
 * bounded number of attempts; whatever goes wrong, the caller receives a
 * string and the game goes on. `<think>` blocks are removed from replies.
 */
export class AgentIO {
  private readonly generate: TextGenerator;
  private readonly cfg: AgentIOConfig;

  constructor(generate: TextGenerator, cfg: AgentIOConfig) {
    this.generate = generate;
    this.cfg = cfg;
  }

  timeoutFor(modelId: string): number {
    return this.cfg.model_timeouts_ms[modelId] ?? this.cfg.api_timeout_ms;
  }

  async ask(modelId: string, prompt: string, context: GenerationContext): Promise<string> {
    const timeoutMs = this.timeoutFor(modelId);
    const attemptMetaBase = { kind: context.phase, modelId, round: context.roundNumber } as const;

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.cfg.max_attempts; attempt++) {
      const controller = new AbortController();
      try {
        const text = await withTimeout(
          this.generate(modelId, prompt, { ...context, abortSignal: controller.signal }),
          timeoutMs,
          () => controller.abort()
        );
        this.recordThoughts(context, text);
        const reply = stripPrivateThoughts(text);
        if (reply) return reply;
        lastError = new Error(text.trim() ? 'Reply held only private thoughts' : 'Empty response');
      } catch (err) {
        lastError = err;
      }

      logger.log({
        type: 'ERROR',
        gameId: context.gameId,
        player: context.player,
        content: `${context.player} (${modelId}) failed (attempt ${attempt}/${this.cfg.max_attempts}): ${errorMessage(lastError)}`,
        metadata: { ...attemptMetaBase, attempt, visibility: 'private' } satisfies GameLogEntry['metadata'],
      });
    }

    return NO_RESPONSE;
  }

  private recordThoughts(context: GenerationContext, text: string): void {
    if (!this.cfg.log_thoughts) return;
    for (const thought of extractPrivateThoughts(text)) {
      logger.log({
        type: 'THOUGHT',
        gameId: context.gameId,
        player: context.player,
        content: thought,
        metadata: { visibility: 'private', round: context.roundNumber, phase: context.phase },
      });
    }
  }
}
