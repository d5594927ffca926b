import * as fs from 'fs';
import { z } from 'zod';

const NAME_POOL_URL = new URL('../data/player-names.json', import.meta.url);

let cachedPool: readonly string[] | undefined;

/** Visible player names handed out at setup, read once from data/player-names.json. */
export function loadDefaultNamePool(): readonly string[] {
  cachedPool ??= Object.freeze(
    z.array(z.string().min(1)).parse(JSON.parse(fs.readFileSync(NAME_POOL_URL, 'utf-8')))
  );
  return cachedPool;
}
