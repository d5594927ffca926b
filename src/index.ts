#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { loadConfig, parseConfig } from './config.js';
import { logger } from './logger.js';
import { createDryRunGenerator, createGatewayGenerator } from './agent.js';
import { JsonFileResultStore } from './persistence/resultStore.js';
import { runBatch } from './runner/gameRunner.js';
import { formatBatchSummary } from './runner/stats.js';
import { LanguageSchema, type GameConfig, type Language } from './types.js';

interface CliArgs {
  configFile: string;
  games?: number;
  parallel: boolean;
  workers?: number;
  seed?: number;
  language?: Language;
  dryRun: boolean;
  persist: boolean;
  quiet: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  const args: Omit<CliArgs, 'configFile'> = { parallel: false, dryRun: false, persist: true, quiet: false };

  const intValue = (flag: string, raw: string | undefined): number => {
    if (!raw) throw new Error(`Missing value for ${flag}`);
    const n = Number(raw);
    if (!Number.isInteger(n)) throw new Error(`Invalid value "${raw}" for ${flag}`);
    return n;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    // Package managers often forward a literal `--`.
    if (arg === '--') continue;

    switch (arg) {
      case '--dry-run':
      case '--dryrun':
        args.dryRun = true;
        continue;
      case '--parallel':
        args.parallel = true;
        continue;
      case '--no-persist':
        args.persist = false;
        continue;
      case '--quiet':
        args.quiet = true;
        continue;
      case '--games':
        args.games = intValue(arg, argv[++i]);
        continue;
      case '--workers':
        args.workers = intValue(arg, argv[++i]);
        continue;
      case '--seed':
        args.seed = intValue(arg, argv[++i]);
        continue;
      case '--language': {
        const next = argv[++i];
        if (!next) throw new Error('Missing value for --language');
        args.language = LanguageSchema.parse(next);
        continue;
      }
      case '--config': {
        const next = argv[++i];
        if (!next) throw new Error('Missing value for --config');
        configFile = next;
        continue;
      }
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    configFile ??= arg;
  }

  return { configFile: configFile ?? 'game-config.yaml', ...args };
}

function applyCliOverrides(config: Readonly<GameConfig>, args: CliArgs): Readonly<GameConfig> {
  return parseConfig({
    ...config,
    ...(args.games !== undefined ? { num_games: args.games } : {}),
    ...(args.parallel ? { parallel: true } : {}),
    ...(args.workers !== undefined ? { max_workers: args.workers } : {}),
    ...(args.language !== undefined ? { language: args.language } : {}),
  });
}

async function main() {
  // Load local environment variables from .env (Node.js quickstart style)
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (args.quiet) logger.setConsoleOutputEnabled(false);
  if (!args.persist) logger.setPersistenceEnabled(false);

  // Fail fast on missing auth for the Vercel AI Gateway, except in dry-run mode.
  if (!args.dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  const config = applyCliOverrides(loadConfig(path.resolve(process.cwd(), args.configFile)), args);
  if (config.log_thoughts) logger.setPrintThoughts(true);

  if (args.dryRun) {
    logger.log({ type: 'SYSTEM', content: 'Dry-run mode: replies are generated offline.' });
  }
  const gateway = args.dryRun ? undefined : createGatewayGenerator(config);

  const outcome = await runBatch({
    config,
    seed: args.seed,
    createGenerator: gameSeed => gateway ?? createDryRunGenerator(gameSeed),
    store: args.persist ? new JsonFileResultStore(path.resolve(process.cwd(), config.results_dir)) : undefined,
  });

  console.log(formatBatchSummary(outcome.stats));
}

main().catch(error => {
  console.error('Fatal Error:', error);
  process.exit(1);
});
