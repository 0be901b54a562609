import { type GameResult, type ModelRef, type ModelStats, modelKey } from '../types.js';

export interface StandingsRow extends ModelStats {
  model: string;
}

export function emptyModelStats(): ModelStats {
  return {
    gamesPlayed: 0,
    gamesAsImpostor: 0,
    winsAsImpostor: 0,
    gamesAsCitizen: 0,
    winsAsCitizen: 0,
    totalWins: 0,
    eliminatedCount: 0,
    survivedCount: 0,
    votesReceived: 0,
    winRate: 0,
    impostorWinRate: 0,
    citizenWinRate: 0,
    survivalRate: 0,
    avgVotesReceived: 0,
  };
}

const ratio = (part: number, whole: number) => (whole > 0 ? part / whole : 0);

function withRates(row: ModelStats): ModelStats {
  return {
    ...row,
    winRate: ratio(row.totalWins, row.gamesPlayed),
    impostorWinRate: ratio(row.winsAsImpostor, row.gamesAsImpostor),
    citizenWinRate: ratio(row.winsAsCitizen, row.gamesAsCitizen),
    survivalRate: ratio(row.survivedCount, row.gamesPlayed),
    avgVotesReceived: ratio(row.votesReceived, row.gamesPlayed),
  };
}

/**
 * Fold one game into per-model stats. Returns a new map; `stats` is not touched.
 * A model seated twice in a roster is counted once per seat.
 */
export function applyGameResult(
  stats: ReadonlyMap<string, ModelStats>,
  result: GameResult
): Map<string, ModelStats> {
  const next = new Map(stats);

  for (const p of result.participants) {
    const key = modelKey(p);
    const row = { ...(next.get(key) ?? emptyModelStats()) };
    const won = p.role === 'impostor' ? result.winner === 'impostor' : result.winner === 'citizens';

    row.gamesPlayed += 1;
    if (p.role === 'impostor') {
      row.gamesAsImpostor += 1;
      if (won) row.winsAsImpostor += 1;
    } else {
      row.gamesAsCitizen += 1;
      if (won) row.winsAsCitizen += 1;
    }
    if (won) row.totalWins += 1;
    if (p.survived) row.survivedCount += 1;
    else row.eliminatedCount += 1;
    row.votesReceived += p.votesReceived;

    next.set(key, withRates(row));
  }

  return next;
}

export function seedModelStats(models: readonly ModelRef[]): Map<string, ModelStats> {
  return new Map(models.map(m => [modelKey(m), emptyModelStats()]));
}

/** Win rate, then total wins, then fewer eliminations; model name breaks what is left. */
export function rankModels(stats: Readonly<Record<string, ModelStats>>): StandingsRow[] {
  return Object.entries(stats)
    .map(([model, row]) => ({ model, ...row }))
    .sort((a, b) => {
      if (b.winRate !== a.winRate) {
        return b.winRate - a.winRate;
      }
      if (b.totalWins !== a.totalWins) {
        return b.totalWins - a.totalWins;
      }
      if (a.eliminatedCount !== b.eliminatedCount) {
        return a.eliminatedCount - b.eliminatedCount;
      }
      return a.model.localeCompare(b.model);
    });
}
