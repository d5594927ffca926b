import type { GameEngine } from '../engine/gameEngine.js';
import type { Player } from '../roster.js';
import type { ConfirmationVotes, RoundRecord } from '../types.js';
import { NO_RESPONSE } from '../agentIo.js';
import { extractConfirmationVote, extractVote } from '../actions/extractor.js';
import { isEliminationConfirmed, tallyVotes } from '../actions/voteTally.js';

export class DayVotingPhase {
  async run(engine: GameEngine): Promise<void> {
    const round = engine.requireRound();
    engine.recordPublic({ type: 'PHASE', content: `--- Day ${round.roundNumber} Voting ---` });

    const voters = engine.roster.alive();
    const ballots = new Map<string, string | null>();

    for (const voter of voters) {
      const message = await engine.askTurn(voter, 'day_voting');
      if (message && message !== NO_RESPONSE) {
        round.messages.push({ speaker: voter.name, phase: 'day_voting', role: voter.role, content: message });
        engine.ledger.add(round.roundNumber, voter.name, message);
        engine.recordPublic({ type: 'CHAT', player: voter.name, content: message, metadata: { phase: 'day_voting' } });
      }
      const action = extractVote(message, engine.seats(), voter.name, engine.config.language);
      ballots.set(voter.name, action.kind === 'vote' ? action.target : null);
    }

    const tally = tallyVotes({ ballots, alivePlayers: voters.map(v => v.name), rng: engine.rng });

    for (const voter of voters) {
      const cast = tally.cast.get(voter.name);
      if (!cast) continue;
      const suffix = cast.auto ? ' (auto-selected)' : '';
      round.actions[voter.name] = `Vote ${cast.target}${suffix}`;
      engine.recordPublic({
        type: 'VOTE',
        player: voter.name,
        content: `voted for ${cast.target}${suffix}`,
        metadata: { vote: cast.target, auto: cast.auto },
      });
    }
    round.voteCounts = tally.voteCounts;
    round.voteDetails = tally.voteDetails;

    const candidate = tally.eliminated ? engine.roster.get(tally.eliminated) : undefined;
    if (!candidate) {
      this.appendOutcome(round, 'No one was eliminated by vote.');
      engine.recordPublic({ type: 'SYSTEM', content: 'No one was eliminated by vote.' });
      engine.finishRound();
      return;
    }

    engine.recordPublic({
      type: 'SYSTEM',
      content: `The town has voted to eliminate ${candidate.name} with ${tally.maxVotes} votes. Confirmation vote follows.`,
    });

    const confirmation = await this.runConfirmation(engine, candidate);
    round.confirmationVotes = confirmation;
    const population = confirmation.agree.length + confirmation.disagree.length;

    if (!isEliminationConfirmed(confirmation.agree.length, population)) {
      this.appendOutcome(round, `The elimination of ${candidate.name} was rejected by the town.`);
      engine.recordPublic({
        type: 'SYSTEM',
        content: `The town rejected eliminating ${candidate.name} (${confirmation.agree.length} agree, ${confirmation.disagree.length} disagree).`,
      });
      engine.finishRound();
      return;
    }

    // Last words come before the elimination is final.
    const lastWords = await engine.askTurn(candidate, 'last_words', { voteCount: tally.maxVotes });
    if (lastWords && lastWords !== NO_RESPONSE) {
      round.lastWords = lastWords;
      engine.recordPublic({ type: 'CHAT', player: candidate.name, content: lastWords, metadata: { phase: 'last_words' } });
    }

    engine.eliminate(candidate.name);
    round.eliminatedByVote.push(candidate.name);
    this.appendOutcome(round, `${candidate.name} was eliminated by vote with ${tally.maxVotes} votes.`);
    engine.recordPublic({
      type: 'DEATH',
      player: candidate.name,
      content: `was eliminated by vote with ${tally.maxVotes} votes.`,
      metadata: { phase: 'day_voting' },
    });
    engine.finishRound();
  }

  /** Every other living player answers; unclear answers count as disagree. */
  private async runConfirmation(engine: GameEngine, candidate: Player): Promise<ConfirmationVotes> {
    const votes: ConfirmationVotes = { agree: [], disagree: [] };
    for (const voter of engine.roster.alive()) {
      if (voter.name === candidate.name) continue;
      const reply = await engine.askConfirmation(voter, candidate.name);
      const action = extractConfirmationVote(reply, engine.config.language);
      const choice = action.kind === 'confirmation' ? action.choice : 'disagree';
      votes[choice].push(voter.name);
      engine.recordPublic({
        type: 'CONFIRMATION',
        player: voter.name,
        content: `${choice === 'agree' ? 'agrees' : 'disagrees'} with eliminating ${candidate.name}`,
        metadata: { target: candidate.name, choice },
      });
    }
    return votes;
  }

  private appendOutcome(round: RoundRecord, text: string): void {
    round.outcome = round.outcome ? `${round.outcome} ${text}` : text;
  }
}
