import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { RoleSchema, SideSchema, WordPairSchema, type TournamentResult } from '../types.js';
import { rankModels } from '../tournament/stats.js';

const PhaseSchema = z.enum(['setup', 'clue', 'discussion', 'voting', 'resolution']);
const ModelRefSchema = z.object({ provider: z.string(), model: z.string() });

const GameResultSchema = z.object({
  gameIndex: z.number().int(),
  gameId: z.number().int(),
  startedAt: z.string(),
  words: WordPairSchema,
  winner: SideSchema,
  impostor: z.string(),
  impostorModel: ModelRefSchema,
  eliminated: z.string(),
  eliminatedModel: ModelRefSchema,
  voteTally: z.record(z.number()),
  votes: z.array(z.object({ voter: z.string(), target: z.string() })),
  participants: z.array(
    z.object({
      seat: z.number().int(),
      name: z.string(),
      role: RoleSchema,
      provider: z.string(),
      model: z.string(),
      word: z.string().nullable(),
      survived: z.boolean(),
      votesReceived: z.number(),
    })
  ),
  messages: z.array(
    z.object({
      index: z.number().int(),
      speaker: z.string(),
      phase: z.enum(['clue', 'discussion', 'voting']),
      round: z.number().int(),
      content: z.string(),
    })
  ),
});

const ModelStatsSchema = z.object({
  gamesPlayed: z.number(),
  gamesAsImpostor: z.number(),
  winsAsImpostor: z.number(),
  gamesAsCitizen: z.number(),
  winsAsCitizen: z.number(),
  totalWins: z.number(),
  eliminatedCount: z.number(),
  survivedCount: z.number(),
  votesReceived: z.number(),
  winRate: z.number(),
  impostorWinRate: z.number(),
  citizenWinRate: z.number(),
  survivalRate: z.number(),
  avgVotesReceived: z.number(),
});

export const TournamentResultSchema = z.object({
  status: z.enum(['complete', 'partial']),
  plannedGames: z.number().int(),
  seed: z.number(),
  games: z.array(GameResultSchema),
  modelStats: z.record(ModelStatsSchema),
  sideWins: z.object({ citizens: z.number(), impostor: z.number() }),
  failure: z
    .object({
      gameIndex: z.number().int(),
      gameId: z.number().int(),
      phase: PhaseSchema,
      participant: z.string().optional(),
      reason: z.enum(['timeout', 'provider_error', 'malformed_response', 'cancelled', 'internal_error']),
      message: z.string(),
    })
    .optional(),
});

const TOURNAMENT_SUFFIX = '_tournament.json';

/**
 * Resolves a results path. 'latest' picks the most recently written
 * `*_tournament.json` in `resultsDir`; a bare name is also looked up there.
 */
export function resolveResultsPath(arg: string, resultsDir = path.join(process.cwd(), 'results')): string {
  if (arg === 'latest') {
    if (!fs.existsSync(resultsDir)) {
      throw new Error(`Results directory not found: ${resultsDir}`);
    }
    const newest = fs
      .readdirSync(resultsDir)
      .filter(f => f.endsWith(TOURNAMENT_SUFFIX))
      .map(f => ({ file: path.join(resultsDir, f), mtime: fs.statSync(path.join(resultsDir, f)).mtimeMs }))
      .sort((a, b) => b.mtime - a.mtime || b.file.localeCompare(a.file))[0];

    if (!newest) {
      throw new Error(`No tournament results found in ${resultsDir}`);
    }
    return newest.file;
  }

  if (!fs.existsSync(arg)) {
    const inResults = path.join(resultsDir, arg);
    if (fs.existsSync(inResults)) return inResults;
  }

  return path.resolve(process.cwd(), arg);
}

export function loadTournamentResult(filePath: string): TournamentResult {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Results file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    if (err instanceof Error) {
      throw new Error(`Failed to parse results file: ${err.message}`);
    }
    throw err;
  }

  const parsed = TournamentResultSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Not a tournament result: ${issue ? `${issue.path.join('.')}: ${issue.message}` : filePath}`);
  }
  return parsed.data;
}

const pct = (x: number) => `${(x * 100).toFixed(1)}%`;

/** Plain-text summary: side totals, failure (if any) and models ranked by win rate. */
export function formatTournamentReport(result: TournamentResult): string {
  const played = result.games.length;
  const lines: string[] = [];

  lines.push(`Tournament ${result.status}: ${played}/${result.plannedGames} games (seed ${result.seed})`);
  lines.push(
    `Citizens won ${result.sideWins.citizens}, impostor won ${result.sideWins.impostor}` +
      (played > 0 ? ` (impostor win rate ${pct(result.sideWins.impostor / played)})` : '')
  );

  if (result.failure) {
    const f = result.failure;
    lines.push(
      `Stopped at game ${f.gameId} in the ${f.phase} phase${f.participant ? ` (${f.participant})` : ''}: ${f.reason}`
    );
  }

  lines.push('');
  lines.push('Rankings:');
  rankModels(result.modelStats).forEach((row, i) => {
    lines.push(
      `${i + 1}. ${row.model}  win ${pct(row.winRate)} (${row.totalWins}/${row.gamesPlayed})` +
        `  impostor ${row.winsAsImpostor}/${row.gamesAsImpostor}` +
        `  citizen ${row.winsAsCitizen}/${row.gamesAsCitizen}` +
        `  eliminated ${row.eliminatedCount}` +
        `  avg votes ${row.avgVotesReceived.toFixed(2)}`
    );
  });

  return lines.join('\n');
}
