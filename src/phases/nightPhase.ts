import type { GameEngine } from '../engine/gameEngine.js';
import { collectNightActions } from '../roleRegistry.js';
import { resolveNightActions } from '../actions/resolver.js';

export class NightPhase {
  async run(engine: GameEngine): Promise<void> {
    engine.roster.resetProtection();
    const round = engine.startRound();
    engine.recordPublic({ type: 'PHASE', content: `--- Night ${round.roundNumber} ---` });

    const { kills, protections } = await collectNightActions(engine);
    const resolved = resolveNightActions({ kills, protections, alivePlayers: engine.roster.aliveNames() });

    for (const name of resolved.protectedPlayers) engine.roster.protect(name);
    round.targetedByMafia = resolved.killTarget ? [resolved.killTarget] : [];
    round.protectedByDoctor = [...resolved.protectedPlayers];

    switch (resolved.outcome) {
      case 'killed': {
        const victim = resolved.death;
        engine.eliminate(victim);
        round.outcome = `${victim} was killed by the Mafia.`;
        engine.recordPublic({
          type: 'DEATH',
          player: victim,
          content: 'was killed by the Mafia during the night.',
          metadata: { phase: 'night' },
        });
        break;
      }
      case 'protected':
        round.outcome = `The Doctor protected ${resolved.killTarget} from the Mafia.`;
        engine.recordPublic({ type: 'SYSTEM', content: 'The Mafia struck, but the Doctor saved their target.' });
        break;
      case 'no_kill':
        round.outcome = 'No one was killed during the night.';
        engine.recordPublic({ type: 'SYSTEM', content: round.outcome });
        break;
    }
  }
}
