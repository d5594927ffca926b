import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { GameConfig, GameConfigSchema, LanguageSchema } from './types.js';
import { logger } from './logger.js';
import { assertPlayableSetup } from './roster.js';
import { errorMessage } from './errors.js';

const envInt = z.coerce.number().int();

interface EnvOverride {
  env: string;
  key: keyof GameConfig;
  parse: (raw: string) => unknown;
}

// Environment variables win over the file; the YAML keeps the defaults.
const ENV_OVERRIDES: readonly EnvOverride[] = [
  { env: 'PLAYERS_PER_GAME', key: 'players_per_game', parse: raw => envInt.parse(raw) },
  { env: 'MAFIA_COUNT', key: 'mafia_count', parse: raw => envInt.parse(raw) },
  { env: 'DOCTOR_COUNT', key: 'doctor_count', parse: raw => envInt.parse(raw) },
  { env: 'MAX_ROUNDS', key: 'max_rounds', parse: raw => envInt.parse(raw) },
  { env: 'GAME_LANGUAGE', key: 'language', parse: raw => LanguageSchema.parse(raw.trim()) },
  { env: 'RANDOM_SEED', key: 'random_seed', parse: raw => envInt.parse(raw) },
  { env: 'NUM_GAMES', key: 'num_games', parse: raw => envInt.parse(raw) },
  // Seconds, like the rest of the ops tooling.
  { env: 'API_TIMEOUT', key: 'api_timeout_ms', parse: raw => envInt.parse(raw) * 1000 },
  { env: 'MAX_OUTPUT_TOKENS', key: 'max_output_tokens', parse: raw => envInt.parse(raw) },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const override of ENV_OVERRIDES) {
    const value = env[override.env];
    if (value === undefined || value.trim() === '') continue;
    merged[override.key] = override.parse(value);
  }
  return merged;
}

/**
 * Validate a raw configuration object and check that its role counts make a
 * playable game. The result is frozen.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): Readonly<GameConfig> {
  const base = isRecord(raw) ? raw : {};
  const config = GameConfigSchema.parse(applyEnvOverrides(base, env));
  assertPlayableSetup(config);
  return Object.freeze(config);
}

export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Readonly<GameConfig> {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const parsedYaml: unknown = yaml.parse(fileContents);

    const config = parseConfig(parsedYaml, env);

    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    logger.log({
      type: 'ERROR',
      content: `Failed to load config: ${errorMessage(error)}`,
      metadata: { error },
    });
    throw error;
  }
}
