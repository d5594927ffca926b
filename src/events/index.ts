import type { GameLogEntry } from '../types.js';
import { EventBus, type Unsubscribe } from './eventBus.js';

/** Log entries of every game in the process; each carries its `gameId`. */
export const eventBus = new EventBus<GameLogEntry>();

/** Entries of one game only, e.g. to collect a single game's transcript. */
export function subscribeToGame(gameId: string, cb: (entry: GameLogEntry) => void): Unsubscribe {
  return eventBus.subscribe(cb, entry => entry.gameId === gameId);
}
