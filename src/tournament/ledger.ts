import type { GameResult, ModelRef, ModelStats, Side, TournamentFailure, TournamentResult } from '../types.js';
import { deepFreeze } from '../utils.js';
import { applyGameResult, seedModelStats } from './stats.js';

/**
 * Append-only record of one tournament run. Each `commit` folds a finished
 * game into the totals in a single step, so a snapshot never sees a game
 * half-counted. Created per run; nothing is shared across runs.
 */
export class TournamentLedger {
  readonly plannedGames: number;
  readonly seed: number;

  private games: GameResult[] = [];
  private stats: Map<string, ModelStats>;
  private sideWins: Record<Side, number> = { citizens: 0, impostor: 0 };

  constructor(opts: { plannedGames: number; seed: number; models?: readonly ModelRef[] }) {
    this.plannedGames = opts.plannedGames;
    this.seed = opts.seed;
    this.stats = seedModelStats(opts.models ?? []);
  }

  get committedGames(): number {
    return this.games.length;
  }

  commit(result: GameResult): void {
    if (result.gameIndex !== this.games.length) {
      throw new Error(`Out-of-order commit: expected game ${this.games.length}, got ${result.gameIndex}`);
    }
    const stats = applyGameResult(this.stats, result);

    this.games.push(result);
    this.stats = stats;
    this.sideWins = { ...this.sideWins, [result.winner]: this.sideWins[result.winner] + 1 };
  }

  /** Frozen copy of everything committed so far. */
  snapshot(failure?: TournamentFailure): TournamentResult {
    const complete = !failure && this.games.length === this.plannedGames;
    return deepFreeze({
      status: complete ? 'complete' : 'partial',
      plannedGames: this.plannedGames,
      seed: this.seed,
      games: [...this.games],
      modelStats: Object.fromEntries([...this.stats].map(([key, row]) => [key, { ...row }])),
      sideWins: { ...this.sideWins },
      ...(failure ? { failure: { ...failure } } : {}),
    } satisfies TournamentResult);
  }
}
