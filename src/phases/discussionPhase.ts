import type { GameEngine } from '../engine/gameEngine.js';
import type { ParticipantState } from '../types.js';
import type { AgentPrompt } from '../agent.js';
import { formatTranscript, publicTalk } from './transcript.js';

export const DISCUSSION_ROUNDS = 2;

export function buildDiscussionPrompt(
  player: ParticipantState,
  round: number,
  transcript: string,
  others: readonly string[]
): AgentPrompt {
  const goal =
    player.role === 'impostor'
      ? 'ROLE: IMPOSTOR. GOAL: deflect suspicion so the others vote for anybody but you. Sound natural.'
      : `ROLE: CITIZEN with word "${player.word ?? ''}". GOAL: get the impostor eliminated. Their clue is usually the one least connected to "${player.word ?? ''}", or the one that feels too generic or safe.`;

  return {
    kind: 'discussion',
    system: `
${goal}
Be decisive and brief: at most two short sentences (60 words).
    `.trim(),
    user: `
Discussion round ${round} of ${DISCUSSION_ROUNDS}.
Other players: ${others.join(', ')}.

Transcript so far:
${transcript}

Who seems suspicious to you, and why?
    `.trim(),
    options: others,
  };
}

/**
 * Two rounds; in each round every surviving player speaks once in roster order
 * with the full clue transcript and prior discussion as context.
 */
export class DiscussionPhase {
  async run(engine: GameEngine): Promise<void> {
    for (let round = 1; round <= DISCUSSION_ROUNDS; round++) {
      engine.record({ type: 'SYSTEM', content: `Discussion round ${round}`, metadata: { round, kind: 'discussion_round' } });

      for (const player of engine.getAlive()) {
        const others = engine
          .getAlive()
          .filter(p => p.name !== player.name)
          .map(p => p.name);
        const transcript = formatTranscript(publicTalk(engine.state.messages));
        const remark = await engine.respond(player, buildDiscussionPrompt(player, round, transcript, others));
        engine.appendMessage(player.name, 'discussion', round, remark);
      }
    }
  }
}
