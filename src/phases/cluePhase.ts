import type { GameEngine } from '../engine/gameEngine.js';
import type { ParticipantState } from '../types.js';
import type { AgentPrompt } from '../agent.js';
import { formatTranscript } from './transcript.js';

export function buildCitizenCluePrompt(player: ParticipantState, previousClues: string): AgentPrompt {
  return {
    kind: 'clue',
    system: `
ROLE: CITIZEN. Your secret word is "${player.word ?? ''}".
TASK: give ONE clue word that proves you know the secret word without revealing it.
Constraints:
- Not the secret word itself, and no direct synonym, rhyme or translation of it.
- Mid-specific: helpful to other citizens, but not so obvious that the impostor can safely copy it.
    `.trim(),
    user: `
Clues given so far:
${previousClues}

Give your clue now.
    `.trim(),
  };
}

export function buildImpostorCluePrompt(player: ParticipantState, citizenClues: string): AgentPrompt {
  const wordLine = player.word
    ? `You were handed the word "${player.word}", but it is NOT the citizens' word: theirs is related but different.`
    : 'You do NOT know the secret word.';
  return {
    kind: 'clue',
    system: `
ROLE: IMPOSTOR. ${wordLine}
Every other player has already given a clue about the citizens' secret word.
TASK: give ONE clue word that plausibly fits the majority theme of their clues so you blend in.
Avoid generic fillers ("thing", "object") and oddly specific giveaways.
    `.trim(),
    user: `
Citizens' clues:
${citizenClues}

Give your clue now.
    `.trim(),
  };
}

/**
 * Citizens give clues one at a time in roster order, each seeing every earlier
 * clue. The impostor goes last, after all citizen clues.
 */
export class CluePhase {
  async run(engine: GameEngine): Promise<void> {
    const alive = engine.getAlive();
    const citizens = alive.filter(p => p.role === 'citizen');
    const impostor = engine.getImpostor();

    for (const player of citizens) {
      const previous = formatTranscript(engine.state.messages, '(none, you are first)');
      const clue = await engine.respond(player, buildCitizenCluePrompt(player, previous));
      engine.appendMessage(player.name, 'clue', 0, clue);
    }

    const citizenClues = formatTranscript(engine.state.messages, '(none)');
    const clue = await engine.respond(impostor, buildImpostorCluePrompt(impostor, citizenClues));
    engine.appendMessage(impostor.name, 'clue', 0, clue);
  }
}
