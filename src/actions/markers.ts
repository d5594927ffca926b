import type { Language } from '../types.js';
import { escapeRegExp } from '../utils.js';

// Unicode-aware word edges; `\b` only knows ASCII letters.
const START = '(?<![\\p{L}\\p{N}_])';
const END = '(?![\\p{L}\\p{N}_])';

export interface LocalizedMarkers {
  actionLabel: string;
  killVerb: string;
  protectVerb: string;
  voteLabel: string;
  // What the prompt asks for in a confirmation poll.
  agreeWord: string;
  disagreeWord: string;
  // Regex sources, matched after a word start against lower-cased text.
  agreeTerms: readonly string[];
  disagreeTerms: readonly string[];
  // Lines that close an instruction block in the prompt, e.g. "Your response:".
  responseCue: string;
}

/**
 * The action syntax agents must use, per language. Prompts are written from
 * this table and the extractor parses with it, so the two never drift apart.
 */
export const MARKERS: Record<Language, LocalizedMarkers> = {
  English: {
    actionLabel: 'ACTION:',
    killVerb: 'Kill',
    protectVerb: 'Protect',
    voteLabel: 'VOTE:',
    agreeWord: 'AGREE',
    disagreeWord: 'DISAGREE',
    agreeTerms: [`agree[sd]?${END}`, `yes${END}`, `confirm${END}`, `approve${END}`],
    disagreeTerms: [`disagree[sd]?${END}`, `no${END}`, `reject${END}`, `disapprove${END}`],
    responseCue: 'your response',
  },
  Spanish: {
    actionLabel: 'ACCIÓN:',
    killVerb: 'Matar',
    protectVerb: 'Proteger',
    voteLabel: 'VOTO:',
    agreeWord: 'ACUERDO',
    disagreeWord: 'DESACUERDO',
    agreeTerms: [`acuerdo${END}`, `sí${END}`, `confirmo${END}`, `apruebo${END}`],
    disagreeTerms: [`desacuerdo${END}`, `no${END}`, `rechazo${END}`, `desapruebo${END}`],
    responseCue: 'tu respuesta',
  },
  French: {
    actionLabel: 'ACTION:',
    killVerb: 'Tuer',
    protectVerb: 'Protéger',
    voteLabel: 'VOTE:',
    agreeWord: "D'ACCORD",
    disagreeWord: "PAS D'ACCORD",
    agreeTerms: [`(?<!pas )d['’]accord${END}`, `oui${END}`, `confirme${END}`, `approuve${END}`],
    disagreeTerms: [`pas d['’]accord${END}`, `non${END}`, `rejette${END}`, `désapprouve${END}`],
    responseCue: 'votre réponse',
  },
  Korean: {
    actionLabel: '행동:',
    killVerb: '죽이기',
    protectVerb: '보호하기',
    voteLabel: '투표:',
    agreeWord: '동의',
    disagreeWord: '반대',
    // Korean attaches endings to the stem ("동의합니다"), so only "예" needs a word end.
    agreeTerms: ['동의', `예${END}`, '확인', '승인'],
    disagreeTerms: ['반대', '아니오', '거부', '불승인'],
    responseCue: '당신의 응답',
  },
};

const ALL_MARKERS = Object.values(MARKERS);

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

// Captures the token after a marker, skipping an opening bracket or quote.
const TARGET_CAPTURE = `[\\[("'*“]*([\\p{L}\\p{N}_.\\-]+)`;

export function killPattern(language: Language): RegExp {
  const m = MARKERS[language];
  return new RegExp(`${escapeRegExp(m.actionLabel)}\\s*${escapeRegExp(m.killVerb)}\\s+${TARGET_CAPTURE}`, 'iu');
}

export function protectPattern(language: Language): RegExp {
  const m = MARKERS[language];
  return new RegExp(`${escapeRegExp(m.actionLabel)}\\s*${escapeRegExp(m.protectVerb)}\\s+${TARGET_CAPTURE}`, 'iu');
}

export function votePattern(language: Language): RegExp {
  return new RegExp(`${escapeRegExp(MARKERS[language].voteLabel)}\\s*${TARGET_CAPTURE}`, 'iu');
}

export function agreePattern(language: Language): RegExp {
  return new RegExp(`${START}(?:${MARKERS[language].agreeTerms.join('|')})`, 'iu');
}

export function disagreePattern(language: Language): RegExp {
  return new RegExp(`${START}(?:${MARKERS[language].disagreeTerms.join('|')})`, 'iu');
}

/** Any language's action or vote label, e.g. `ACTION:`, `VOTO:`, `행동:`. */
export const ANY_INTENT_LABEL = new RegExp(
  unique(ALL_MARKERS.flatMap(m => [m.actionLabel, m.voteLabel])).map(escapeRegExp).join('|'),
  'iu'
);

/** Any language's vote label. */
export const ANY_VOTE_LABEL = new RegExp(
  unique(ALL_MARKERS.map(m => m.voteLabel)).map(escapeRegExp).join('|'),
  'iu'
);

/**
 * A bare action verb shouted in capitals (`KILL`, `PROTÉGER`) or a Korean
 * action verb. Case-sensitive so "skill" or "kill time" in prose survive.
 */
export const BARE_ACTION_VERB = new RegExp(
  `${START}(?:${unique(ALL_MARKERS.flatMap(m => [m.killVerb, m.protectVerb]).map(v => v.toLocaleUpperCase()))
    .map(escapeRegExp)
    .join('|')})${END}`,
  'u'
);

export const RESPONSE_CUE = new RegExp(unique(ALL_MARKERS.map(m => m.responseCue)).map(escapeRegExp).join('|'), 'giu');
