import type { GameEngine } from '../engine/gameEngine.js';
import type { NightIntent } from '../actions/types.js';
import { extractNightAction } from '../actions/extractor.js';
import { NO_RESPONSE } from '../agentIo.js';

/**
 * Ask each living Mafia member, in seat order, for tonight's kill. Members
 * who speak later see what their teammates already said tonight.
 */
export async function collectMafiaActions(engine: GameEngine): Promise<NightIntent[]> {
  const round = engine.requireRound();
  const mafiaTeam = engine.roster.aliveWithRole('Mafia');
  const factionChat: string[] = [];
  const intents: NightIntent[] = [];

  for (const member of mafiaTeam) {
    const message = await engine.askTurn(member, 'night', { extraHistory: factionChat });

    if (message && message !== NO_RESPONSE) {
      round.messages.push({ speaker: member.name, phase: 'night', role: member.role, content: message });
      factionChat.push(`${member.name}: ${message}`);
      engine.recordPrivate(
        { type: 'NIGHT_CHAT', player: member.name, content: message, metadata: { faction: 'mafia' } },
        'faction'
      );
    }

    const action = extractNightAction('Mafia', message, engine.seats(), member.name, engine.config.language);
    if (action.kind === 'kill') {
      round.actions[member.name] = `Kill ${action.target}`;
      intents.push({ actor: member.name, target: action.target });
      engine.recordPrivate(
        { type: 'ACTION', player: member.name, content: `chose to kill ${action.target}`, metadata: { target: action.target } },
        'faction'
      );
    } else {
      round.actions[member.name] = 'Invalid action';
      engine.recordPrivate({
        type: 'ACTION',
        player: member.name,
        content: 'made no valid kill choice',
        metadata: { reason: action.kind === 'invalid' ? action.reason : action.kind },
      });
    }
  }

  return intents;
}
