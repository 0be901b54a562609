import type { AgentClient } from '../agent.js';
import { AgentIO } from '../agentIo.js';
import { assignGame, validateRoster, validateWordPool } from '../assignment.js';
import { GameEngine } from '../engine/gameEngine.js';
import { GameAbortedError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type {
  GameResult,
  ResolvedTournamentConfig,
  RosterEntry,
  TournamentFailure,
  TournamentResult,
} from '../types.js';
import { TournamentLedger } from './ledger.js';

export interface RunTournamentOptions {
  agents: Record<string, AgentClient>;
  signal?: AbortSignal;
  // Called after each game is committed, with the ledger snapshot that includes it.
  onGameComplete?: (result: GameResult, snapshot: TournamentResult) => void;
}

export function rosterFromConfig(config: ResolvedTournamentConfig): RosterEntry[] {
  return config.players.map(p => ({
    name: p.name,
    provider: p.provider,
    model: p.model,
    temperature: p.temperature,
  }));
}

function failureFrom(error: GameAbortedError): TournamentFailure {
  return {
    gameIndex: error.gameIndex,
    gameId: error.gameIndex + 1,
    phase: error.phase,
    ...(error.participant ? { participant: error.participant } : {}),
    reason: error.reason,
    message: error.message,
  };
}

function describeGame(result: GameResult): string {
  const verdict = result.winner === 'citizens' ? 'citizens win' : 'impostor wins';
  return `Game ${result.gameId}: ${result.eliminated} eliminated, impostor was ${result.impostor} (${result.impostorModel.provider}/${result.impostorModel.model}), ${verdict}. Word: ${result.words.word}`;
}

/**
 * Play `config.games` games in order and return the ledger snapshot.
 *
 * A game that aborts stops the run: the result is `partial`, holds every game
 * committed before it and names where it failed. A throwing `onGameComplete`
 * stops the run the same way, with reason `internal_error`. Roster and word pool
 * problems are thrown as `ConfigurationError` before the first game.
 */
export async function runTournament(
  config: ResolvedTournamentConfig,
  opts: RunTournamentOptions
): Promise<TournamentResult> {
  const roster = rosterFromConfig(config);
  validateRoster(roster);
  validateWordPool(config.word_pairs);

  const seed = config.seed ?? Date.now();
  const ledger = new TournamentLedger({ plannedGames: config.games, seed, models: roster });
  const agentIO = new AgentIO(opts.agents, {
    responseTimeoutMs: config.agent.response_timeout_ms,
    maxAttempts: config.agent.max_attempts,
  });

  logger.log({
    type: 'SYSTEM',
    content: `Starting tournament: ${config.games} games, ${roster.length} players, seed ${seed}, impostor mode ${config.impostor_mode}.`,
    metadata: { kind: 'tournament_start', seed },
  });

  let failure: TournamentFailure | undefined;

  for (let gameIndex = 0; gameIndex < config.games; gameIndex++) {
    if (opts.signal?.aborted) {
      failure = {
        gameIndex,
        gameId: gameIndex + 1,
        phase: 'setup',
        reason: 'cancelled',
        message: `Run cancelled before game ${gameIndex + 1}`,
      };
      break;
    }

    const engine = new GameEngine({
      gameIndex,
      roster,
      assignment: assignGame(roster, gameIndex, config.word_pairs, seed),
      agentIO,
      impostorMode: config.impostor_mode,
      seed,
      signal: opts.signal,
    });

    let result: GameResult;
    try {
      result = await engine.run();
    } catch (error) {
      if (!(error instanceof GameAbortedError)) throw error;
      failure = failureFrom(error);
      break;
    }

    ledger.commit(result);
    logger.log({
      type: 'SYSTEM',
      content: `[${ledger.committedGames}/${config.games}] ${describeGame(result)}`,
      metadata: { kind: 'game_complete', gameIndex, winner: result.winner },
    });
    try {
      opts.onGameComplete?.(result, ledger.snapshot());
    } catch (error) {
      // The game itself is committed; the run stops so nothing after it goes unrecorded.
      failure = {
        gameIndex,
        gameId: gameIndex + 1,
        phase: 'resolution',
        reason: 'internal_error',
        message: `Game completion handler failed: ${errorMessage(error)}`,
      };
      break;
    }
  }

  if (failure) {
    logger.log({
      type: 'SYSTEM',
      content: `Tournament stopped at game ${failure.gameId} (${failure.phase} phase${failure.participant ? `, ${failure.participant}` : ''}, ${failure.reason}): ${failure.message}`,
      metadata: { kind: 'tournament_failure', gameIndex: failure.gameIndex, reason: failure.reason },
    });
  }

  const snapshot = ledger.snapshot(failure);
  logger.log({
    type: 'SYSTEM',
    content: `Tournament ${snapshot.status}: ${snapshot.games.length}/${snapshot.plannedGames} games. Citizens ${snapshot.sideWins.citizens}, impostor ${snapshot.sideWins.impostor}.`,
    metadata: { kind: 'tournament_complete', status: snapshot.status },
  });
  return snapshot;
}
