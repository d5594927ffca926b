import type { Language, Role } from '../types.js';
import { LOCALES, markersFor, type GameSnapshot } from './templates.js';

export type { GameSnapshot } from './templates.js';

export type PromptPhase = 'night' | 'day_discussion' | 'day_voting' | 'last_words';

export interface PromptPlayer {
  name: string;
  role: Role;
  language: Language;
}

export interface TurnPromptInput {
  player: PromptPlayer;
  phase: PromptPhase;
  roundNumber: number;
  snapshot: GameSnapshot;
  alivePlayers: readonly string[];
  // Only filled for Mafia players.
  mafiaTeammates: readonly string[];
  // Already rendered "Name: message" lines, oldest first.
  discussionHistory: string;
  maxOutputTokens: number;
  // Votes against the player, for last words.
  voteCount?: number;
}

export interface ConfirmationPromptInput {
  player: PromptPlayer;
  candidate: string;
  snapshot: GameSnapshot;
  maxOutputTokens: number;
}

/** Turns game context into the text sent to a model. Swappable per engine. */
export interface PromptBuilder {
  buildTurnPrompt(input: TurnPromptInput): string;
  buildConfirmationPrompt(input: ConfirmationPromptInput): string;
}

function phaseInstruction(input: TurnPromptInput): string {
  const { player, phase, roundNumber } = input;
  const locale = LOCALES[player.language];
  const m = markersFor(player.language);

  switch (phase) {
    case 'night':
      // Villagers are never prompted at night.
      return player.role === 'Villager' ? '' : locale.nightInstruction[player.role](roundNumber, m);
    case 'day_discussion':
      return locale.discussionInstruction(roundNumber);
    case 'day_voting':
      return locale.votingInstruction(roundNumber, m);
    case 'last_words':
      return locale.lastWordsInstruction(input.voteCount ?? 0);
  }
}

export function buildTurnPrompt(input: TurnPromptInput): string {
  const { player, phase } = input;
  const locale = LOCALES[player.language];
  const m = markersFor(player.language);

  const sections: string[] = [locale.intro[player.role](player.name), locale.rules];

  if (player.role === 'Mafia' && input.mafiaTeammates.length > 0) {
    sections.push(`${locale.mafiaMembers}: ${input.mafiaTeammates.join(', ')}`);
  }
  sections.push(`${locale.allPlayers}: ${input.alivePlayers.join(', ')}`);
  sections.push(`${locale.gameState}: ${locale.snapshot(input.snapshot)}`);

  sections.push(
    [locale.instructionsHeading, ...locale.roleInstructions[player.role](m).map(line => `- ${line}`)].join('\n')
  );

  const instruction = phaseInstruction(input);
  if (instruction) sections.push(instruction);

  const warning = locale.dayWarning[player.role];
  if (warning && (phase === 'day_discussion' || phase === 'day_voting')) {
    sections.push(warning(m));
  }

  sections.push(locale.thinking(input.maxOutputTokens));
  sections.push(`${locale.previousDiscussion}:\n${input.discussionHistory.trim() || locale.noDiscussion}`);
  sections.push(locale.responseLabel);

  return sections.join('\n\n');
}

export function buildConfirmationPrompt(input: ConfirmationPromptInput): string {
  const { player, candidate } = input;
  const locale = LOCALES[player.language];
  const m = markersFor(player.language);

  return [
    locale.confirmation.intro(player.name, candidate),
    `${locale.gameState}: ${locale.snapshot(input.snapshot)}`,
    locale.confirmation.explanation(candidate),
    locale.confirmation.question(candidate, m),
    locale.thinking(input.maxOutputTokens),
    locale.responseLabel,
  ].join('\n\n');
}

export const defaultPromptBuilder: PromptBuilder = {
  buildTurnPrompt,
  buildConfirmationPrompt,
};
