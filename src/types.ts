import { z } from 'zod';

// --- Configuration Types ---

export const RoleSchema = z.enum(['citizen', 'impostor']);
export type Role = z.infer<typeof RoleSchema>;

export const SideSchema = z.enum(['citizens', 'impostor']);
export type Side = z.infer<typeof SideSchema>;

export const PlayerConfigSchema = z.object({
  // AI Gateway provider slug, e.g. `openai`, `anthropic`, `mistral`.
  provider: z.string().min(1),
  model: z.string().min(1),
  // Seat name shown to the other players. Defaults to a name list by seat.
  name: z.string().min(1).optional(),
  temperature: z.number().default(0.7),
});
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

export const WordPairSchema = z.object({
  word: z.string().min(1),
  decoy: z.string().min(1),
});
export type SecretWordPair = z.infer<typeof WordPairSchema>;

export const AgentIOSettingsSchema = z.object({
  response_timeout_ms: z.number().int().positive().default(90_000),
  max_attempts: z.number().int().positive().default(2),
});

export const TournamentConfigSchema = z
  .object({
    games: z.number().int().positive().default(10),
    // Base seed for word selection and voting-transcript shuffles. Time-based when omitted.
    seed: z.number().int().optional(),
    // 'blind': the impostor gets no word. 'decoy': the impostor gets the decoy word.
    impostor_mode: z.enum(['blind', 'decoy']).default('blind'),
    verbose: z.boolean().default(false),
    show_progress: z.boolean().default(true),
    log_thoughts: z.boolean().default(false),
    results_dir: z.string().default('results'),
    agent: AgentIOSettingsSchema.default({}),
    players: z.array(PlayerConfigSchema),
    word_pairs: z.array(WordPairSchema).optional(),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.players.forEach((p, i) => {
      if (!p.name) return;
      const key = p.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['players', i, 'name'],
          message: `Duplicate player name "${p.name}"`,
        });
      }
      seen.add(key);
    });
  });
export type TournamentConfigInput = z.input<typeof TournamentConfigSchema>;
export type TournamentConfig = z.infer<typeof TournamentConfigSchema>;

/** A config with every default resolved: names assigned and a word pool present. */
export interface ResolvedTournamentConfig extends Omit<TournamentConfig, 'word_pairs' | 'players'> {
  players: Array<PlayerConfig & { name: string }>;
  word_pairs: SecretWordPair[];
}

// --- Game State Types ---

export type Phase = 'setup' | 'clue' | 'discussion' | 'voting' | 'resolution';

export interface ModelRef {
  provider: string;
  model: string;
}

export function modelKey(ref: ModelRef): string {
  return `${ref.provider}/${ref.model}`;
}

/** One seat of the roster; stable across every game of a tournament. */
export interface RosterEntry extends ModelRef {
  name: string;
  temperature: number;
}

export interface ParticipantState {
  seat: number;
  name: string;
  role: Role;
  model: ModelRef;
  // What this player was shown: the true word, the decoy, or nothing.
  word: string | null;
  isAlive: boolean;
}

export interface Message {
  index: number;
  speaker: string;
  phase: Exclude<Phase, 'setup' | 'resolution'>;
  round: number;
  content: string;
}

export interface VoteRecord {
  voter: string;
  target: string;
}

export interface ParticipantResult {
  seat: number;
  name: string;
  role: Role;
  provider: string;
  model: string;
  word: string | null;
  survived: boolean;
  votesReceived: number;
}

export interface GameResult {
  readonly gameIndex: number;
  readonly gameId: number;
  readonly startedAt: string;
  readonly words: SecretWordPair;
  readonly winner: Side;
  readonly impostor: string;
  readonly impostorModel: ModelRef;
  readonly eliminated: string;
  readonly eliminatedModel: ModelRef;
  readonly voteTally: Readonly<Record<string, number>>;
  readonly votes: readonly VoteRecord[];
  readonly participants: readonly ParticipantResult[];
  readonly messages: readonly Message[];
}

export interface ModelStats {
  gamesPlayed: number;
  gamesAsImpostor: number;
  winsAsImpostor: number;
  gamesAsCitizen: number;
  winsAsCitizen: number;
  totalWins: number;
  eliminatedCount: number;
  survivedCount: number;
  votesReceived: number;
  winRate: number;
  impostorWinRate: number;
  citizenWinRate: number;
  survivalRate: number;
  avgVotesReceived: number;
}

export type FailureReason = 'timeout' | 'provider_error' | 'malformed_response' | 'cancelled' | 'internal_error';

export interface TournamentFailure {
  gameIndex: number;
  gameId: number;
  phase: Phase;
  participant?: string;
  reason: FailureReason;
  message: string;
}

export interface TournamentResult {
  readonly status: 'complete' | 'partial';
  readonly plannedGames: number;
  readonly seed: number;
  readonly games: readonly GameResult[];
  readonly modelStats: Readonly<Record<string, ModelStats>>;
  readonly sideWins: Readonly<Record<Side, number>>;
  readonly failure?: TournamentFailure;
}

// --- Logging Types ---

export type LogType = 'SYSTEM' | 'CLUE' | 'CHAT' | 'VOTE' | 'ELIMINATION' | 'WIN' | 'THOUGHT';

export type LogVisibility = 'public' | 'private';

export interface GameLogMetadata {
  role?: Role;
  visibility?: LogVisibility;
  kind?: string;

  gameIndex?: number;
  phase?: Phase;
  round?: number;
  target?: string;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}
