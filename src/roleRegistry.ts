import type { GameEngine } from './engine/gameEngine.js';
import type { NightIntent } from './actions/types.js';
import { collectMafiaActions } from './roleModules/mafia.js';
import { collectDoctorActions } from './roleModules/doctor.js';

export interface NightActions {
  kills: NightIntent[];
  protections: NightIntent[];
}

/** Night turns in role order: the Mafia first, then the Doctor. Villagers sleep. */
export async function collectNightActions(engine: GameEngine): Promise<NightActions> {
  const kills = await collectMafiaActions(engine);
  const protections = await collectDoctorActions(engine);
  return { kills, protections };
}
