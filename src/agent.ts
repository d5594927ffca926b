import { generateText, gateway } from 'ai';
import { logger } from './logger.js';
import { fnv1a32 } from './utils.js';
import { MARKERS } from './actions/markers.js';
import type { TextGenerator } from './agentIo.js';
import type { GameConfig } from './types.js';

export function normalizeModelId(modelId: string): string {
  // AI Gateway expects `provider/model` (e.g. `openai/gpt-4o`, `anthropic/claude-3-5-haiku`).
  if (!/^[^/\s]+\/\S+$/.test(modelId)) {
    throw new Error(
      `Invalid model id "${modelId}". Use AI Gateway format "provider/model" (e.g. "openai/gpt-4o").`
    );
  }
  return modelId;
}

export type GatewayOptions = Pick<GameConfig, 'temperature' | 'max_output_tokens'>;

/** Live generator backed by the Vercel AI Gateway (needs AI_GATEWAY_API_KEY). */
export function createGatewayGenerator(options: GatewayOptions): TextGenerator {
  const models = new Map<string, ReturnType<typeof gateway>>();

  const getModel = (modelId: string) => {
    const normalized = normalizeModelId(modelId);
    const cached = models.get(normalized);
    if (cached) return cached;

    const model = gateway(normalized);
    models.set(normalized, model);
    logger.log({ type: 'SYSTEM', content: `Model ready: ${normalized}` });
    return model;
  };

  return async (modelId, prompt, context) => {
    const result = await generateText({
      model: getModel(modelId),
      prompt,
      temperature: options.temperature,
      maxOutputTokens: options.max_output_tokens,
      abortSignal: context.abortSignal,
    });
    return result.text;
  };
}

const CHATTER = [
  "I'm not fully sure yet, but {target} feels suspicious.",
  'No strong reads yet. {target} has been very quiet, which worries me.',
  "Let's compare notes. I'd like to hear {target} explain their last vote.",
  "{target}'s reasoning doesn't add up for me.",
];

const LAST_WORDS = [
  'You are making a mistake. Watch who pushed hardest for this.',
  'Good luck, everyone. Keep your eyes open.',
];

/**
 * Deterministic stand-in for the gateway: answers every turn with
 * well-formed text derived from the seed and the turn context, so games run
 * offline and replay identically.
 */
export function createDryRunGenerator(seed: number): TextGenerator {
  return async (_modelId, _prompt, context) => {
    const pick = <T>(items: readonly T[], salt: string): T | undefined => {
      if (items.length === 0) return undefined;
      const h = fnv1a32(`${seed}|${context.player}|${context.roundNumber}|${context.phase}|${salt}`);
      return items[h % items.length];
    };
    const m = MARKERS[context.language];
    const others = context.alivePlayers.filter(n => n !== context.player);
    const thought = `<think>${context.role} in round ${context.roundNumber}.</think>\n`;

    switch (context.phase) {
      case 'night': {
        if (context.role === 'Mafia') {
          const victims = others.filter(n => !context.teammates.includes(n));
          const target = pick(victims, 'kill');
          return target ? `${thought}${m.actionLabel} ${m.killVerb} ${target}` : thought;
        }
        if (context.role === 'Doctor') {
          const target = pick(context.alivePlayers, 'protect');
          return target ? `${thought}${m.actionLabel} ${m.protectVerb} ${target}` : thought;
        }
        return '';
      }
      case 'day_discussion': {
        const target = pick(others, 'suspect') ?? 'nobody';
        return (pick(CHATTER, 'line') ?? '').replace('{target}', target);
      }
      case 'day_voting': {
        const target = pick(others, 'vote');
        const line = (pick(CHATTER, 'line') ?? '').replace('{target}', target ?? 'nobody');
        return target ? `${thought}${line}\n${m.voteLabel} ${target}` : line;
      }
      case 'confirmation': {
        // Three in four agree.
        const agree = fnv1a32(`${seed}|${context.player}|${context.roundNumber}|${context.candidate ?? ''}`) % 4 !== 0;
        return agree ? m.agreeWord : m.disagreeWord;
      }
      case 'last_words':
        return pick(LAST_WORDS, 'last') ?? '';
    }
  };
}
