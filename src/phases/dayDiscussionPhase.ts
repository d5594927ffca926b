import type { GameEngine } from '../engine/gameEngine.js';
import { NO_RESPONSE } from '../agentIo.js';

/**
 * One pass over the living players in seat order. Speech only: the
 * sanitizer has already cut any vote or action a speaker tried to slip in.
 */
export class DayDiscussionPhase {
  async run(engine: GameEngine): Promise<void> {
    const round = engine.requireRound();
    engine.recordPublic({ type: 'PHASE', content: `--- Day ${round.roundNumber} Discussion ---` });

    for (const speaker of engine.roster.alive()) {
      const message = await engine.askTurn(speaker, 'day_discussion');
      if (!message || message === NO_RESPONSE) {
        engine.recordPrivate({ type: 'SYSTEM', player: speaker.name, content: 'said nothing usable this turn' });
        continue;
      }

      round.messages.push({ speaker: speaker.name, phase: 'day_discussion', role: speaker.role, content: message });
      engine.ledger.add(round.roundNumber, speaker.name, message);
      engine.recordPublic({ type: 'CHAT', player: speaker.name, content: message, metadata: { phase: 'day_discussion' } });
    }
  }
}
