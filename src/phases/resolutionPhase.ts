import type { GameEngine } from '../engine/gameEngine.js';
import type { GameResult, ParticipantResult } from '../types.js';
import { determineWinner, formatVoteTally, resolveElimination, tallyVotes, validateVotes } from '../actions/resolver.js';
import { deepFreeze } from '../utils.js';

/** Tally, eliminate, decide the winner and snapshot the game. Terminal. */
export class ResolutionPhase {
  run(engine: GameEngine): GameResult {
    const alive = engine.getAlive();
    const aliveNames = alive.map(p => p.name);
    validateVotes(engine.state.votes, aliveNames);

    const tally = tallyVotes(engine.state.votes, aliveNames);
    const eliminatedName = resolveElimination(tally, aliveNames);
    const eliminated = alive.find(p => p.name === eliminatedName);
    if (!eliminated) throw new Error(`Eliminated player ${eliminatedName} is not alive`);
    eliminated.isAlive = false;

    const impostor = engine.getImpostor();
    const winner = determineWinner(eliminated.name, impostor.name);

    engine.record({ type: 'SYSTEM', content: `Vote tally: ${formatVoteTally(tally)}`, metadata: { kind: 'vote_tally', tally } });
    engine.record({
      type: 'ELIMINATION',
      player: eliminated.name,
      content: `was eliminated with ${tally[eliminated.name] ?? 0} votes. They were a ${eliminated.role}.`,
    });
    engine.record({
      type: 'WIN',
      content:
        winner === 'citizens'
          ? `Game ${engine.gameId}: Citizens win! ${impostor.name} was the impostor. The word was "${engine.words.word}".`
          : `Game ${engine.gameId}: Impostor ${impostor.name} wins! An innocent was eliminated. The word was "${engine.words.word}".`,
      metadata: { kind: 'game_over', winner },
    });

    const participants: ParticipantResult[] = engine.state.participants.map(p => ({
      seat: p.seat,
      name: p.name,
      role: p.role,
      provider: p.model.provider,
      model: p.model.model,
      word: p.word,
      survived: p.isAlive,
      votesReceived: tally[p.name] ?? 0,
    }));

    return deepFreeze({
      gameIndex: engine.gameIndex,
      gameId: engine.gameId,
      startedAt: engine.state.startedAt,
      words: { ...engine.words },
      winner,
      impostor: impostor.name,
      impostorModel: { ...impostor.model },
      eliminated: eliminated.name,
      eliminatedModel: { ...eliminated.model },
      voteTally: { ...tally },
      votes: engine.state.votes.map(v => ({ ...v })),
      participants,
      messages: engine.state.messages.map(m => ({ ...m })),
    });
  }
}
