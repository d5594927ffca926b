import type { GameConfig, Language, Participant, Role } from './types.js';
import { GameSetupError, InvariantViolationError } from './errors.js';
import { pickOne, shuffled, type Rng } from './utils.js';

export interface Player {
  readonly name: string;
  // Hidden from other players; identifies the backing model.
  readonly modelId: string;
  readonly role: Role;
  readonly language: Language;
  alive: boolean;
  protectedThisRound: boolean;
}

export interface FactionCounts {
  mafia: number;
  villagers: number;
  doctor: number;
}

/**
 * The seats of one game in seat order. Eliminated players stay in the
 * roster; only the engine flips `alive` and `protectedThisRound`.
 */
export class Roster {
  private readonly seats: readonly Player[];
  private readonly byName: Map<string, Player>;

  constructor(players: readonly Player[]) {
    this.seats = players;
    this.byName = new Map(players.map(p => [p.name, p] as const));
    if (this.byName.size !== players.length) {
      throw new InvariantViolationError('Player names must be unique within a game.');
    }
  }

  get players(): readonly Player[] {
    return this.seats;
  }

  alive(): Player[] {
    return this.seats.filter(p => p.alive);
  }

  aliveNames(): string[] {
    return this.alive().map(p => p.name);
  }

  aliveWithRole(role: Role): Player[] {
    return this.seats.filter(p => p.alive && p.role === role);
  }

  find(name: string): Player | undefined {
    return this.byName.get(name);
  }

  get(name: string): Player {
    const player = this.byName.get(name);
    if (!player) throw new InvariantViolationError(`Unknown player "${name}".`);
    return player;
  }

  counts(): FactionCounts {
    const counts: FactionCounts = { mafia: 0, villagers: 0, doctor: 0 };
    for (const p of this.alive()) {
      if (p.role === 'Mafia') counts.mafia++;
      else if (p.role === 'Doctor') counts.doctor++;
      else counts.villagers++;
    }
    return counts;
  }

  eliminate(name: string): void {
    const player = this.get(name);
    if (!player.alive) throw new InvariantViolationError(`${name} is already eliminated.`);
    player.alive = false;
  }

  protect(name: string): void {
    this.get(name).protectedThisRound = true;
  }

  resetProtection(): void {
    for (const p of this.seats) p.protectedThisRound = false;
  }

  /** Living fellow Mafia members of `name`; empty for everyone else. */
  teammatesOf(name: string): string[] {
    const player = this.get(name);
    if (player.role !== 'Mafia') return [];
    return this.aliveWithRole('Mafia')
      .filter(p => p.name !== name)
      .map(p => p.name);
  }

  roles(): Record<string, Role> {
    return Object.fromEntries(this.seats.map(p => [p.name, p.role] as const));
  }

  participants(): Record<string, Participant> {
    return Object.fromEntries(this.seats.map(p => [p.name, { role: p.role, modelId: p.modelId }] as const));
  }
}

export type SetupCounts = Pick<GameConfig, 'players_per_game' | 'mafia_count' | 'doctor_count'>;

export function assertPlayableSetup(counts: SetupCounts): void {
  const { players_per_game: seats, mafia_count: mafia, doctor_count: doctor } = counts;
  if (mafia < 1) {
    throw new GameSetupError(`mafia_count must be at least 1 (got ${mafia}).`);
  }
  if (doctor !== 0 && doctor !== 1) {
    throw new GameSetupError(`doctor_count must be 0 or 1 (got ${doctor}).`);
  }
  if (mafia + doctor >= seats) {
    throw new GameSetupError(
      `mafia_count + doctor_count (${mafia + doctor}) must leave at least one Villager among ${seats} seats.`
    );
  }
}

export function buildRoleList(counts: SetupCounts): Role[] {
  const roles: Role[] = [];
  for (let i = 0; i < counts.mafia_count; i++) roles.push('Mafia');
  for (let i = 0; i < counts.doctor_count; i++) roles.push('Doctor');
  while (roles.length < counts.players_per_game) roles.push('Villager');
  return roles;
}

export interface RosterSetup {
  config: Pick<GameConfig, 'models' | 'players_per_game' | 'mafia_count' | 'doctor_count' | 'language'>;
  rng: Rng;
  namePool: readonly string[];
}

/**
 * Seat the players: shuffle the role list, then give each seat a model
 * sampled from the pool (with replacement) and an unused name.
 */
export function buildRoster({ config, rng, namePool }: RosterSetup): Roster {
  assertPlayableSetup(config);

  const roles = shuffled(buildRoleList(config), rng);

  const used = new Set<string>();
  const players: Player[] = [];
  roles.forEach((role, i) => {
    const modelId = pickOne(config.models, rng);
    if (modelId === undefined) throw new GameSetupError('At least one model id is required.');

    const available = namePool.filter(n => !used.has(n));
    let name = pickOne(available, rng) ?? `Player_${i + 1}`;
    for (let suffix = 2; used.has(name); suffix++) name = `Player_${i + 1}_${suffix}`;
    used.add(name);

    players.push({ name, modelId, role, language: config.language, alive: true, protectedThisRound: false });
  });

  return new Roster(players);
}
