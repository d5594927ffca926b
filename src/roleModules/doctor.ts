import type { GameEngine } from '../engine/gameEngine.js';
import type { NightIntent } from '../actions/types.js';
import { extractNightAction } from '../actions/extractor.js';
import { NO_RESPONSE } from '../agentIo.js';

export async function collectDoctorActions(engine: GameEngine): Promise<NightIntent[]> {
  const round = engine.requireRound();
  const intents: NightIntent[] = [];

  for (const doc of engine.roster.aliveWithRole('Doctor')) {
    const message = await engine.askTurn(doc, 'night');
    if (message && message !== NO_RESPONSE) {
      round.messages.push({ speaker: doc.name, phase: 'night', role: doc.role, content: message });
      engine.recordPrivate({ type: 'NIGHT_CHAT', player: doc.name, content: message });
    }

    const action = extractNightAction('Doctor', message, engine.seats(), doc.name, engine.config.language);
    if (action.kind === 'protect') {
      round.actions[doc.name] = `Protect ${action.target}`;
      intents.push({ actor: doc.name, target: action.target });
      engine.recordPrivate({
        type: 'ACTION',
        player: doc.name,
        content: `chose to protect ${action.target}`,
        metadata: { target: action.target },
      });
    } else {
      round.actions[doc.name] = 'Invalid action';
      engine.recordPrivate({
        type: 'ACTION',
        player: doc.name,
        content: 'made no valid protection choice',
        metadata: { reason: action.kind === 'invalid' ? action.reason : action.kind },
      });
    }
  }

  return intents;
}
