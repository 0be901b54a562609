import * as fs from 'fs';
import * as path from 'path';
import type { GameResult, TournamentResult } from '../types.js';
import { modelKey } from '../types.js';
import { formatVoteTally } from '../actions/resolver.js';
import { rankModels } from '../tournament/stats.js';

type CsvValue = string | number | boolean | null | undefined;

const GAME_COLUMNS = [
  'game_id',
  'started_at',
  'word',
  'decoy',
  'impostor',
  'impostor_model',
  'eliminated',
  'eliminated_model',
  'winner',
  'vote_tally',
] as const;

const PLAYER_COLUMNS = [
  'game_id',
  'seat',
  'name',
  'model',
  'role',
  'word',
  'survived',
  'votes_received',
  'voted_for',
  'won',
] as const;

const MESSAGE_COLUMNS = ['game_id', 'index', 'phase', 'round', 'speaker', 'content'] as const;

const MODEL_STATS_COLUMNS = [
  'rank',
  'model',
  'games_played',
  'games_as_impostor',
  'wins_as_impostor',
  'games_as_citizen',
  'wins_as_citizen',
  'total_wins',
  'eliminated',
  'survived',
  'votes_received',
  'win_rate',
  'impostor_win_rate',
  'citizen_win_rate',
  'survival_rate',
  'avg_votes_received',
] as const;

const rate = (x: number) => x.toFixed(3);

export function csvEscape(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvRow(values: readonly CsvValue[]): string {
  return `${values.map(csvEscape).join(',')}\n`;
}

export interface ResultsPaths {
  games: string;
  players: string;
  messages: string;
  modelStats: string;
  tournament: string;
}

/**
 * Writes tournament results under `dir`. CSV rows are appended as each game
 * is committed, so an interrupted run still leaves every finished game on
 * disk; the per-model standings and the full JSON result are written once
 * at the end.
 */
export class ResultsWriter {
  readonly dir: string;
  readonly baseName: string;
  readonly paths: ResultsPaths;

  private started = false;

  constructor(opts: { dir: string; baseName?: string }) {
    this.dir = opts.dir;
    this.baseName = opts.baseName ?? `tournament_${new Date().toISOString().replace(/[:.]/g, '-')}`;
    const file = (suffix: string) => path.join(this.dir, `${this.baseName}_${suffix}`);
    this.paths = {
      games: file('games.csv'),
      players: file('players.csv'),
      messages: file('messages.csv'),
      modelStats: file('model_stats.csv'),
      tournament: file('tournament.json'),
    };
  }

  appendGame(result: GameResult): void {
    this.ensureStarted();

    fs.appendFileSync(
      this.paths.games,
      csvRow([
        result.gameId,
        result.startedAt,
        result.words.word,
        result.words.decoy,
        result.impostor,
        modelKey(result.impostorModel),
        result.eliminated,
        modelKey(result.eliminatedModel),
        result.winner,
        formatVoteTally(result.voteTally),
      ])
    );

    const votedFor = new Map(result.votes.map(v => [v.voter, v.target]));
    fs.appendFileSync(
      this.paths.players,
      result.participants
        .map(p =>
          csvRow([
            result.gameId,
            p.seat,
            p.name,
            modelKey(p),
            p.role,
            p.word,
            p.survived,
            p.votesReceived,
            votedFor.get(p.name),
            p.role === 'impostor' ? result.winner === 'impostor' : result.winner === 'citizens',
          ])
        )
        .join('')
    );

    fs.appendFileSync(
      this.paths.messages,
      result.messages.map(m => csvRow([result.gameId, m.index, m.phase, m.round, m.speaker, m.content])).join('')
    );
  }

  writeTournament(result: TournamentResult): string {
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(
      this.paths.modelStats,
      csvRow(MODEL_STATS_COLUMNS) +
        rankModels(result.modelStats)
          .map((row, i) =>
            csvRow([
              i + 1,
              row.model,
              row.gamesPlayed,
              row.gamesAsImpostor,
              row.winsAsImpostor,
              row.gamesAsCitizen,
              row.winsAsCitizen,
              row.totalWins,
              row.eliminatedCount,
              row.survivedCount,
              row.votesReceived,
              rate(row.winRate),
              rate(row.impostorWinRate),
              rate(row.citizenWinRate),
              rate(row.survivalRate),
              rate(row.avgVotesReceived),
            ])
          )
          .join('')
    );
    fs.writeFileSync(this.paths.tournament, JSON.stringify(result, null, 2));
    return this.paths.tournament;
  }

  private ensureStarted() {
    if (this.started) return;
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(this.paths.games, csvRow(GAME_COLUMNS));
    fs.writeFileSync(this.paths.players, csvRow(PLAYER_COLUMNS));
    fs.writeFileSync(this.paths.messages, csvRow(MESSAGE_COLUMNS));
    this.started = true;
  }
}
