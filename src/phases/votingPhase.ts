import type { GameEngine } from '../engine/gameEngine.js';
import type { ParticipantState } from '../types.js';
import type { AgentPrompt } from '../agent.js';
import { formatTranscript, publicTalk } from './transcript.js';

export function buildVotePrompt(player: ParticipantState, shuffledTranscript: string, options: readonly string[]): AgentPrompt {
  const stance =
    player.role === 'impostor'
      ? 'ROLE: IMPOSTOR. You win if you SURVIVE. Vote to push attention elsewhere; avoid reciprocal suspicion.'
      : `ROLE: CITIZEN with word "${player.word ?? ''}". You win if the impostor is eliminated. The impostor saw the other clues before giving theirs, so similarity alone is not innocence. Focus on the clue least connected to "${player.word ?? ''}" or overly generic.`;

  return {
    kind: 'vote',
    system: `
FINAL VOTE. ${stance}
TASK: name ONE player to eliminate. You cannot vote for yourself.
    `.trim(),
    user: `
All messages (order randomized):
${shuffledTranscript}

Choose exactly one of: ${options.join(', ')}.
    `.trim(),
    options,
  };
}

/**
 * Every surviving player votes once for another surviving player, in roster
 * order. Each voter reads an independently shuffled copy of the clue and
 * discussion messages so position in the transcript carries no signal; the
 * stored transcript keeps its insertion order.
 */
export class VotingPhase {
  async run(engine: GameEngine): Promise<void> {
    const voters = engine.getAlive();
    const talk = publicTalk(engine.state.messages);

    for (const voter of voters) {
      const options = voters.filter(p => p.name !== voter.name).map(p => p.name);
      const transcript = formatTranscript(engine.shuffledCopy(talk));
      const target = await engine.decide(voter, buildVotePrompt(voter, transcript, options), options);

      engine.state.votes.push({ voter: voter.name, target });
      engine.appendMessage(voter.name, 'voting', 1, target);
    }
  }
}
