import type { Language, Role } from '../types.js';
import { MARKERS, type LocalizedMarkers } from '../actions/markers.js';

/** Counts a prompt may show; never reveals who holds which role. */
export interface GameSnapshot {
  roundNumber: number;
  phase: 'night' | 'day';
  alive: number;
  mafia: number;
  town: number;
  lastEliminated: readonly string[];
}

export interface PromptLocale {
  rules: string;
  intro: Record<Role, (name: string) => string>;
  mafiaMembers: string;
  allPlayers: string;
  gameState: string;
  instructionsHeading: string;
  roleInstructions: Record<Role, (m: LocalizedMarkers) => string[]>;
  nightInstruction: Record<'Mafia' | 'Doctor', (round: number, m: LocalizedMarkers) => string>;
  discussionInstruction: (round: number) => string;
  votingInstruction: (round: number, m: LocalizedMarkers) => string;
  dayWarning: Partial<Record<Role, (m: LocalizedMarkers) => string>>;
  lastWordsInstruction: (votes: number) => string;
  thinking: (maxTokens: number) => string;
  previousDiscussion: string;
  noDiscussion: string;
  responseLabel: string;
  snapshot: (s: GameSnapshot) => string;
  confirmation: {
    intro: (name: string, candidate: string) => string;
    explanation: (candidate: string) => string;
    question: (candidate: string, m: LocalizedMarkers) => string;
  };
}

const english: PromptLocale = {
  rules: `GAME RULES:
- The game alternates between night and day phases
- During night: Mafia members secretly choose a villager to kill, the Doctor can protect one player
- During day: All players discuss and vote to eliminate one suspected Mafia member
- Mafia wins when they equal or outnumber the villagers
- Villagers win when all Mafia members are eliminated`,
  intro: {
    Mafia: name => `You are ${name}, playing a Mafia game as a Mafia member. Your PRIMARY goal is to WIN the game.`,
    Doctor: name => `You are ${name}, playing a Mafia game as the Doctor. Your PRIMARY goal is to help the Villagers WIN the game.`,
    Villager: name => `You are ${name}, playing a Mafia game as a Villager. Your PRIMARY goal is to WIN the game.`,
  },
  mafiaMembers: 'Other Mafia members',
  allPlayers: 'All players',
  gameState: 'Current game state',
  instructionsHeading: 'IMPORTANT INSTRUCTIONS:',
  roleInstructions: {
    Mafia: m => [
      `During NIGHT phase ONLY: You must kill a non-Mafia player. Use format: ${m.actionLabel} ${m.killVerb} [player]`,
      `During DAY phase: DO NOT use "${m.actionLabel} ${m.killVerb}" as it will reveal your identity as Mafia!`,
      'During DAY phase: Act like a villager and convince others you are innocent',
      `During DAY VOTING phase: End your message with your vote using format: ${m.voteLabel} [player]`,
    ],
    Doctor: m => [
      'During NIGHT phase ONLY: You MUST protect exactly one player from being killed by the Mafia',
      `You MUST end your night message with: ${m.actionLabel} ${m.protectVerb} [player]`,
      `During DAY phase: DO NOT use the "${m.protectVerb}" action`,
      `During DAY VOTING phase: End your message with your vote using format: ${m.voteLabel} [player]`,
    ],
    Villager: m => [
      'During DAY DISCUSSION phase: Work to identify the Mafia members',
      'During DAY VOTING phase: You MUST vote to eliminate a suspected Mafia member',
      `During DAY VOTING phase: End your message with your vote using format: ${m.voteLabel} [player]`,
    ],
  },
  nightInstruction: {
    Mafia: (round, m) =>
      `It's night time (Round ${round}). As the Mafia, you MUST choose exactly one player to kill tonight. You cannot skip this action. End your response with ${m.actionLabel} ${m.killVerb} [player].`,
    Doctor: (round, m) =>
      `It's night time (Round ${round}). As the Doctor, you MUST choose exactly one player to protect from the Mafia tonight. You cannot skip this action. End your response with ${m.actionLabel} ${m.protectVerb} [player].`,
  },
  discussionInstruction: round =>
    `It's day time (Round ${round}). Discuss with other players about who might be Mafia. This is the DISCUSSION PHASE ONLY - DO NOT VOTE YET. You will vote in the next round.`,
  votingInstruction: (round, m) =>
    `It's now the VOTING PHASE (Round ${round}). Make your final arguments and YOU MUST VOTE to eliminate a suspected Mafia member. End your message with ${m.voteLabel} [player name].`,
  dayWarning: {
    Mafia: m => `IMPORTANT: This is the DAY phase. Do NOT use '${m.actionLabel} ${m.killVerb}' now. Instead, use '${m.voteLabel} [player]' to vote like other villagers.`,
    Doctor: m => `IMPORTANT: This is the DAY phase. Do NOT use your protection ability now. Only use ${m.actionLabel} ${m.protectVerb} during night phase.`,
  },
  lastWordsInstruction: votes =>
    `You have been voted out with ${votes} votes and will be eliminated. Share your final thoughts before leaving the game.`,
  thinking: maxTokens =>
    `IMPORTANT: You can use <think>your private thoughts here</think> tags to reason privately.
Other players will NOT see anything inside these tags. Use this to plan your strategy.
Your answer is limited to ${maxTokens} tokens maximum. Be concise and focused.`,
  previousDiscussion: 'Previous discussion',
  noDiscussion: '(nothing has been said yet)',
  responseLabel: 'Your response:',
  snapshot: s => {
    let text = `Round ${s.roundNumber}, ${s.phase === 'night' ? 'Night' : 'Day'} phase. ${s.alive} players alive (${s.mafia} Mafia, ${s.town} Villagers/Doctor).`;
    if (s.lastEliminated.length > 0) {
      text += ` In the previous round, ${s.lastEliminated.join(', ')} ${s.lastEliminated.length === 1 ? 'was' : 'were'} eliminated.`;
    }
    return text;
  },
  confirmation: {
    intro: (name, candidate) =>
      `You are ${name}, playing a Mafia game. The town has voted to eliminate ${candidate}.
Before the elimination is carried out, a confirmation vote is needed.`,
    explanation: candidate => `ABOUT CONFIRMATION VOTES:
- This is the final chance to reconsider the town's decision
- If the majority agrees, ${candidate} will be eliminated
- If the majority disagrees, no one will be eliminated this round`,
    question: (candidate, m) =>
      `Do you agree with eliminating ${candidate}?
Respond with either "${m.agreeWord}" or "${m.disagreeWord}" and a brief explanation of your reasoning.`,
  },
};

const spanish: PromptLocale = {
  rules: `REGLAS DEL JUEGO:
- El juego alterna entre fases de noche y día
- Durante la noche: Los miembros de la Mafia eligen secretamente a un aldeano para matar, el Doctor puede proteger a un jugador
- Durante el día: Todos los jugadores discuten y votan para eliminar a un sospechoso de ser miembro de la Mafia
- La Mafia gana cuando iguala o supera en número a los aldeanos
- Los aldeanos ganan cuando todos los miembros de la Mafia son eliminados`,
  intro: {
    Mafia: name => `Eres ${name}, jugando un juego de Mafia como miembro de la Mafia. Tu objetivo PRINCIPAL es GANAR el juego.`,
    Doctor: name => `Eres ${name}, jugando un juego de Mafia como el Doctor. Tu objetivo PRINCIPAL es ayudar a los aldeanos a GANAR el juego.`,
    Villager: name => `Eres ${name}, jugando un juego de Mafia como Aldeano. Tu objetivo PRINCIPAL es GANAR el juego.`,
  },
  mafiaMembers: 'Otros miembros de la Mafia',
  allPlayers: 'Todos los jugadores',
  gameState: 'Estado actual del juego',
  instructionsHeading: 'INSTRUCCIONES IMPORTANTES:',
  roleInstructions: {
    Mafia: m => [
      `SOLO durante la fase NOCTURNA: Debes matar a un jugador que no sea de la Mafia. Usa el formato: ${m.actionLabel} ${m.killVerb} [jugador]`,
      `Durante la fase DIURNA: ¡NO uses "${m.actionLabel} ${m.killVerb}" ya que revelará tu identidad como Mafia!`,
      'Durante la fase DIURNA: Actúa como un aldeano y convence a los demás de que eres inocente',
      `Durante la VOTACIÓN: Termina tu mensaje con tu voto usando el formato: ${m.voteLabel} [jugador]`,
    ],
    Doctor: m => [
      'SOLO durante la fase NOCTURNA: DEBES proteger exactamente a un jugador de ser asesinado por la Mafia',
      `DEBES terminar tu mensaje nocturno con: ${m.actionLabel} ${m.protectVerb} [jugador]`,
      `Durante la fase DIURNA: NO uses la acción "${m.protectVerb}"`,
      `Durante la VOTACIÓN: Termina tu mensaje con tu voto usando el formato: ${m.voteLabel} [jugador]`,
    ],
    Villager: m => [
      'Durante la DISCUSIÓN diurna: Trabaja para identificar a los miembros de la Mafia',
      'Durante la VOTACIÓN: DEBES votar para eliminar a un sospechoso de ser Mafia',
      `Durante la VOTACIÓN: Termina tu mensaje con tu voto usando el formato: ${m.voteLabel} [jugador]`,
    ],
  },
  nightInstruction: {
    Mafia: (round, m) =>
      `Es de noche (Ronda ${round}). Como Mafia, DEBES elegir exactamente a un jugador para matar esta noche. No puedes omitir esta acción. Termina tu mensaje con ${m.actionLabel} ${m.killVerb} [jugador].`,
    Doctor: (round, m) =>
      `Es de noche (Ronda ${round}). Como Doctor, DEBES elegir exactamente a un jugador para proteger de la Mafia esta noche. No puedes omitir esta acción. Termina tu mensaje con ${m.actionLabel} ${m.protectVerb} [jugador].`,
  },
  discussionInstruction: round =>
    `Es de día (Ronda ${round}). Discute con los demás jugadores quién podría ser de la Mafia. Esta es SOLO la fase de DISCUSIÓN: NO VOTES TODAVÍA. Votarás en la siguiente ronda.`,
  votingInstruction: (round, m) =>
    `Ahora es la fase de VOTACIÓN (Ronda ${round}). Presenta tus argumentos finales y DEBES VOTAR para eliminar a un sospechoso de ser Mafia. Termina tu mensaje con ${m.voteLabel} [nombre del jugador].`,
  dayWarning: {
    Mafia: m => `IMPORTANTE: Esta es la fase DIURNA. NO uses '${m.actionLabel} ${m.killVerb}' ahora. En su lugar, usa '${m.voteLabel} [jugador]' para votar como los demás aldeanos.`,
    Doctor: m => `IMPORTANTE: Esta es la fase DIURNA. NO uses tu habilidad de protección ahora. Solo usa ${m.actionLabel} ${m.protectVerb} durante la fase nocturna.`,
  },
  lastWordsInstruction: votes =>
    `Has sido expulsado con ${votes} votos y serás eliminado. Comparte tus últimas palabras antes de dejar el juego.`,
  thinking: maxTokens =>
    `IMPORTANTE: Puedes usar etiquetas <think>tus pensamientos privados aquí</think> para razonar en privado.
Los otros jugadores NO verán nada dentro de estas etiquetas. Úsalas para planificar tu estrategia.
Tu mensaje está limitado a un máximo de ${maxTokens} tokens. Sé conciso y enfocado.`,
  previousDiscussion: 'Discusión previa',
  noDiscussion: '(todavía no se ha dicho nada)',
  responseLabel: 'Tu respuesta:',
  snapshot: s => {
    let text = `Ronda ${s.roundNumber}, fase de ${s.phase === 'night' ? 'noche' : 'día'}. ${s.alive} jugadores vivos (${s.mafia} Mafia, ${s.town} Aldeanos/Doctor).`;
    if (s.lastEliminated.length > 0) {
      text += ` En la ronda anterior fue eliminado: ${s.lastEliminated.join(', ')}.`;
    }
    return text;
  },
  confirmation: {
    intro: (name, candidate) =>
      `Eres ${name}, jugando un juego de Mafia. El pueblo ha votado para eliminar a ${candidate}.
Antes de que se lleve a cabo la eliminación, se necesita un voto de confirmación.`,
    explanation: candidate => `SOBRE LOS VOTOS DE CONFIRMACIÓN:
- Esta es la última oportunidad para reconsiderar la decisión del pueblo
- Si la mayoría está de acuerdo, ${candidate} será eliminado
- Si la mayoría está en desacuerdo, nadie será eliminado en esta ronda`,
    question: (candidate, m) =>
      `¿Estás de acuerdo con eliminar a ${candidate}?
Responde con "${m.agreeWord}" o "${m.disagreeWord}" y una breve explicación de tu razonamiento.`,
  },
};

const french: PromptLocale = {
  rules: `RÈGLES DU JEU:
- Le jeu alterne entre les phases de nuit et de jour
- Pendant la nuit: Les membres de la Mafia choisissent secrètement un villageois à tuer, le Docteur peut protéger un joueur
- Pendant le jour: Tous les joueurs discutent et votent pour éliminer un membre suspecté de la Mafia
- La Mafia gagne quand elle égale ou dépasse en nombre les villageois
- Les villageois gagnent quand tous les membres de la Mafia sont éliminés`,
  intro: {
    Mafia: name => `Vous êtes ${name}, jouant à un jeu de Mafia en tant que membre de la Mafia. Votre objectif PRINCIPAL est de GAGNER la partie.`,
    Doctor: name => `Vous êtes ${name}, jouant à un jeu de Mafia en tant que Docteur. Votre objectif PRINCIPAL est d'aider les villageois à GAGNER la partie.`,
    Villager: name => `Vous êtes ${name}, jouant à un jeu de Mafia en tant que Villageois. Votre objectif PRINCIPAL est de GAGNER la partie.`,
  },
  mafiaMembers: 'Autres membres de la Mafia',
  allPlayers: 'Tous les joueurs',
  gameState: 'État actuel du jeu',
  instructionsHeading: 'INSTRUCTIONS IMPORTANTES:',
  roleInstructions: {
    Mafia: m => [
      `UNIQUEMENT pendant la NUIT: Vous devez tuer un joueur qui n'est pas de la Mafia. Utilisez le format: ${m.actionLabel} ${m.killVerb} [joueur]`,
      `Pendant le JOUR: N'utilisez PAS "${m.actionLabel} ${m.killVerb}" car cela révélerait votre identité!`,
      'Pendant le JOUR: Agissez comme un villageois et convainquez les autres de votre innocence',
      `Pendant le VOTE: Terminez votre message par votre vote au format: ${m.voteLabel} [joueur]`,
    ],
    Doctor: m => [
      'UNIQUEMENT pendant la NUIT: Vous DEVEZ protéger exactement un joueur contre la Mafia',
      `Vous DEVEZ terminer votre message de nuit par: ${m.actionLabel} ${m.protectVerb} [joueur]`,
      `Pendant le JOUR: N'utilisez PAS l'action "${m.protectVerb}"`,
      `Pendant le VOTE: Terminez votre message par votre vote au format: ${m.voteLabel} [joueur]`,
    ],
    Villager: m => [
      'Pendant la DISCUSSION: Essayez d\'identifier les membres de la Mafia',
      'Pendant le VOTE: Vous DEVEZ voter pour éliminer un membre suspecté de la Mafia',
      `Pendant le VOTE: Terminez votre message par votre vote au format: ${m.voteLabel} [joueur]`,
    ],
  },
  nightInstruction: {
    Mafia: (round, m) =>
      `C'est la nuit (Tour ${round}). En tant que Mafia, vous DEVEZ choisir exactement un joueur à tuer cette nuit. Vous ne pouvez pas passer votre tour. Terminez par ${m.actionLabel} ${m.killVerb} [joueur].`,
    Doctor: (round, m) =>
      `C'est la nuit (Tour ${round}). En tant que Docteur, vous DEVEZ choisir exactement un joueur à protéger cette nuit. Vous ne pouvez pas passer votre tour. Terminez par ${m.actionLabel} ${m.protectVerb} [joueur].`,
  },
  discussionInstruction: round =>
    `C'est le jour (Tour ${round}). Discutez avec les autres joueurs de qui pourrait être de la Mafia. C'est UNIQUEMENT la phase de DISCUSSION: NE VOTEZ PAS ENCORE. Vous voterez au tour suivant.`,
  votingInstruction: (round, m) =>
    `C'est maintenant la phase de VOTE (Tour ${round}). Présentez vos derniers arguments et vous DEVEZ VOTER pour éliminer un membre suspecté de la Mafia. Terminez votre message par ${m.voteLabel} [nom du joueur].`,
  dayWarning: {
    Mafia: m => `IMPORTANT: C'est la phase de JOUR. N'utilisez PAS '${m.actionLabel} ${m.killVerb}' maintenant. À la place, utilisez '${m.voteLabel} [joueur]' pour voter comme les autres villageois.`,
    Doctor: m => `IMPORTANT: C'est la phase de JOUR. N'utilisez PAS votre capacité de protection maintenant. Utilisez ${m.actionLabel} ${m.protectVerb} uniquement pendant la nuit.`,
  },
  lastWordsInstruction: votes =>
    `Vous avez été désigné avec ${votes} votes et allez être éliminé. Partagez vos dernières pensées avant de quitter la partie.`,
  thinking: maxTokens =>
    `IMPORTANT: Vous pouvez utiliser les balises <think>vos pensées privées ici</think> pour réfléchir en privé.
Les autres joueurs ne verront rien à l'intérieur de ces balises. Utilisez-les pour planifier votre stratégie.
Votre message est limité à ${maxTokens} tokens maximum. Soyez concis et concentré.`,
  previousDiscussion: 'Discussion précédente',
  noDiscussion: '(rien n\'a encore été dit)',
  responseLabel: 'Votre réponse:',
  snapshot: s => {
    let text = `Tour ${s.roundNumber}, phase de ${s.phase === 'night' ? 'nuit' : 'jour'}. ${s.alive} joueurs en vie (${s.mafia} Mafia, ${s.town} Villageois/Docteur).`;
    if (s.lastEliminated.length > 0) {
      text += ` Au tour précédent, éliminé: ${s.lastEliminated.join(', ')}.`;
    }
    return text;
  },
  confirmation: {
    intro: (name, candidate) =>
      `Vous êtes ${name}, jouant à un jeu de Mafia. La ville a voté pour éliminer ${candidate}.
Avant que l'élimination ne soit effectuée, un vote de confirmation est nécessaire.`,
    explanation: candidate => `À PROPOS DES VOTES DE CONFIRMATION:
- C'est la dernière chance de reconsidérer la décision de la ville
- Si la majorité est d'accord, ${candidate} sera éliminé
- Si la majorité n'est pas d'accord, personne ne sera éliminé ce tour-ci`,
    question: (candidate, m) =>
      `Êtes-vous d'accord pour éliminer ${candidate}?
Répondez par "${m.agreeWord}" ou "${m.disagreeWord}" et une brève explication de votre raisonnement.`,
  },
};

const korean: PromptLocale = {
  rules: `게임 규칙:
- 게임은 밤과 낮 단계를 번갈아 진행합니다
- 밤 동안: 마피아 멤버들은 비밀리에 죽일 마을 사람을 선택하고, 의사는 한 플레이어를 보호할 수 있습니다
- 낮 동안: 모든 플레이어가 토론하고 마피아로 의심되는 한 명을 제거하기 위해 투표합니다
- 마피아는 마을 사람과 같거나 더 많아지면 승리합니다
- 마을 사람들은 모든 마피아 멤버가 제거되면 승리합니다`,
  intro: {
    Mafia: name => `당신은 ${name}으로, 마피아 멤버로서 마피아 게임을 하고 있습니다. 당신의 주요 목표는 게임에서 승리하는 것입니다.`,
    Doctor: name => `당신은 ${name}으로, 의사로서 마피아 게임을 하고 있습니다. 당신의 주요 목표는 마을 사람들의 승리를 돕는 것입니다.`,
    Villager: name => `당신은 ${name}으로, 마을 사람으로서 마피아 게임을 하고 있습니다. 당신의 주요 목표는 게임에서 승리하는 것입니다.`,
  },
  mafiaMembers: '다른 마피아 멤버',
  allPlayers: '모든 플레이어',
  gameState: '현재 게임 상태',
  instructionsHeading: '중요 지침:',
  roleInstructions: {
    Mafia: m => [
      `밤 단계에서만: 마피아가 아닌 플레이어 한 명을 죽여야 합니다. 형식: ${m.actionLabel} ${m.killVerb} [플레이어]`,
      `낮 단계에서: "${m.actionLabel} ${m.killVerb}"를 사용하지 마세요. 정체가 드러납니다!`,
      '낮 단계에서: 마을 사람처럼 행동하고 다른 사람들에게 당신이 결백하다고 설득하세요',
      `낮 투표 단계에서: 메시지 끝에 다음 형식으로 투표하세요: ${m.voteLabel} [플레이어]`,
    ],
    Doctor: m => [
      '밤 단계에서만: 마피아로부터 정확히 한 명의 플레이어를 보호해야 합니다',
      `밤 메시지는 반드시 다음으로 끝내야 합니다: ${m.actionLabel} ${m.protectVerb} [플레이어]`,
      `낮 단계에서: "${m.protectVerb}" 행동을 사용하지 마세요`,
      `낮 투표 단계에서: 메시지 끝에 다음 형식으로 투표하세요: ${m.voteLabel} [플레이어]`,
    ],
    Villager: m => [
      '낮 토론 단계에서: 마피아 구성원을 식별하기 위해 노력하세요',
      '낮 투표 단계에서: 반드시 의심되는 마피아 구성원을 제거하기 위해 투표해야 합니다',
      `낮 투표 단계에서: 메시지 끝에 다음 형식으로 투표하세요: ${m.voteLabel} [플레이어]`,
    ],
  },
  nightInstruction: {
    Mafia: (round, m) =>
      `밤입니다 (라운드 ${round}). 마피아로서 오늘 밤 죽일 플레이어를 정확히 한 명 선택해야 합니다. 이 행동은 건너뛸 수 없습니다. 메시지를 ${m.actionLabel} ${m.killVerb} [플레이어]로 끝내세요.`,
    Doctor: (round, m) =>
      `밤입니다 (라운드 ${round}). 의사로서 오늘 밤 마피아로부터 보호할 플레이어를 정확히 한 명 선택해야 합니다. 이 행동은 건너뛸 수 없습니다. 메시지를 ${m.actionLabel} ${m.protectVerb} [플레이어]로 끝내세요.`,
  },
  discussionInstruction: round =>
    `낮입니다 (라운드 ${round}). 누가 마피아일지 다른 플레이어들과 토론하세요. 지금은 토론 단계입니다. 아직 투표하지 마세요. 다음 라운드에서 투표하게 됩니다.`,
  votingInstruction: (round, m) =>
    `이제 투표 단계입니다 (라운드 ${round}). 마지막 주장을 하고 의심되는 마피아를 제거하기 위해 반드시 투표하세요. 메시지를 ${m.voteLabel} [플레이어 이름]으로 끝내세요.`,
  dayWarning: {
    Mafia: m => `중요: 지금은 낮 단계입니다. '${m.actionLabel} ${m.killVerb}'를 사용하지 마세요. 대신 다른 마을 사람들처럼 '${m.voteLabel} [플레이어]'를 사용하여 투표하세요.`,
    Doctor: m => `중요: 지금은 낮 단계입니다. 지금은 보호 능력을 사용하지 마세요. ${m.actionLabel} ${m.protectVerb}는 밤 단계에서만 사용하세요.`,
  },
  lastWordsInstruction: votes =>
    `당신은 ${votes}표로 투표에서 지목되어 제거됩니다. 게임을 떠나기 전에 마지막 생각을 남기세요.`,
  thinking: maxTokens =>
    `IMPORTANT: 당신은 <think>당신의 개인적인 생각을 여기에 적으세요</think> 태그를 사용하여 개인적으로 생각할 수 있습니다.
다른 플레이어는 이 태그 안에 있는 것을 볼 수 없습니다. 이를 사용하여 전략을 계획하세요.
메시지는 최대 ${maxTokens} 토큰으로 제한됩니다. 간결하고 집중적으로 작성하세요.`,
  previousDiscussion: '이전 토론',
  noDiscussion: '(아직 아무 말도 없었습니다)',
  responseLabel: '당신의 응답:',
  snapshot: s => {
    let text = `라운드 ${s.roundNumber}, ${s.phase === 'night' ? '밤' : '낮'} 단계. 생존자 ${s.alive}명 (마피아 ${s.mafia}명, 마을 사람/의사 ${s.town}명).`;
    if (s.lastEliminated.length > 0) {
      text += ` 이전 라운드에서 제거됨: ${s.lastEliminated.join(', ')}.`;
    }
    return text;
  },
  confirmation: {
    intro: (name, candidate) =>
      `당신은 ${name}으로, 마피아 게임을 하고 있습니다. 마을은 ${candidate}을(를) 제거하기로 투표했습니다.
제거가 실행되기 전에 확인 투표가 필요합니다.`,
    explanation: candidate => `확인 투표에 대하여:
- 이것은 마을의 결정을 재고할 수 있는 마지막 기회입니다
- 과반수가 동의하면 ${candidate}이(가) 제거됩니다
- 과반수가 반대하면 이번 라운드에서는 아무도 제거되지 않습니다`,
    question: (candidate, m) =>
      `${candidate}을(를) 제거하는 것에 동의하십니까?
"${m.agreeWord}" 또는 "${m.disagreeWord}"로 응답하고 간단한 이유를 설명해 주세요.`,
  },
};

export const LOCALES: Record<Language, PromptLocale> = {
  English: english,
  Spanish: spanish,
  French: french,
  Korean: korean,
};

export function markersFor(language: Language): LocalizedMarkers {
  return MARKERS[language];
}
