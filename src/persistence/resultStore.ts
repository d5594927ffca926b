import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { GameResult } from '../types.js';

/** Where finished games go. Implementations may throw; callers use `persistResult`. */
export interface ResultStore {
  save(result: GameResult): Promise<void>;
}

/** One pretty-printed `<gameId>.json` per game under `dir`. */
export class JsonFileResultStore implements ResultStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async save(result: GameResult): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    await fs.promises.writeFile(path.join(this.dir, `${result.gameId}.json`), `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
  }
}

/** Best-effort save: a failure is logged and reported as `false`, never thrown. */
export async function persistResult(store: ResultStore | undefined, result: GameResult): Promise<boolean> {
  if (!store) return false;
  try {
    await store.save(result);
    return true;
  } catch (error) {
    logger.log({
      type: 'ERROR',
      gameId: result.gameId,
      content: `Failed to save result of game ${result.gameId}: ${errorMessage(error)}`,
      metadata: { error },
    });
    return false;
  }
}
