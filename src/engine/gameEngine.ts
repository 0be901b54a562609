import type {
  GameLogEntry,
  GameResult,
  Message,
  ParticipantState,
  Phase,
  Role,
  RosterEntry,
  SecretWordPair,
  VoteRecord,
} from '../types.js';
import type { AgentPrompt } from '../agent.js';
import type { AgentIO } from '../agentIo.js';
import type { GameAssignment } from '../assignment.js';
import { logger } from '../logger.js';
import { AgentFailure, GameAbortedError, GameCancelledError } from '../errors.js';
import { fnv1a32, mulberry32, shuffled } from '../utils.js';
import { CluePhase } from '../phases/cluePhase.js';
import { DiscussionPhase } from '../phases/discussionPhase.js';
import { VotingPhase } from '../phases/votingPhase.js';
import { ResolutionPhase } from '../phases/resolutionPhase.js';

export type ImpostorMode = 'blind' | 'decoy';

export interface GameEngineOptions {
  gameIndex: number;
  roster: readonly RosterEntry[];
  assignment: GameAssignment;
  agentIO: AgentIO;
  impostorMode?: ImpostorMode;
  // Seeds the per-voter transcript shuffles. Ignored when `rng` is given.
  seed?: number;
  rng?: () => number;
  signal?: AbortSignal;
}

export interface GameState {
  phase: Phase;
  startedAt: string;
  participants: ParticipantState[];
  messages: Message[];
  votes: VoteRecord[];
  result?: GameResult;
}

/**
 * Runs one game from setup to resolution. Every instance owns its own state.
 */
export class GameEngine {
  readonly gameIndex: number;
  readonly roster: readonly RosterEntry[];
  readonly assignment: GameAssignment;
  readonly agentIO: AgentIO;
  readonly impostorMode: ImpostorMode;

  state: GameState;

  private rng: () => number;
  private signal?: AbortSignal;
  private currentParticipant?: string;

  private cluePhaseRunner = new CluePhase();
  private discussionPhaseRunner = new DiscussionPhase();
  private votingPhaseRunner = new VotingPhase();
  private resolutionPhaseRunner = new ResolutionPhase();

  constructor(opts: GameEngineOptions) {
    this.gameIndex = opts.gameIndex;
    this.roster = opts.roster;
    this.assignment = opts.assignment;
    this.agentIO = opts.agentIO;
    this.impostorMode = opts.impostorMode ?? 'blind';
    this.signal = opts.signal;
    this.rng = opts.rng ?? mulberry32(fnv1a32(`${opts.seed ?? 0}|${opts.gameIndex}|voting`));

    this.state = {
      phase: 'setup',
      startedAt: new Date().toISOString(),
      participants: [],
      messages: [],
      votes: [],
    };
  }

  get gameId(): number {
    return this.gameIndex + 1;
  }

  get words(): SecretWordPair {
    return this.assignment.words;
  }

  /**
   * Drive the game through every phase and return its frozen result.
   * Any failure is rethrown as a `GameAbortedError` naming the phase and participant.
   */
  async run(): Promise<GameResult> {
    try {
      this.enterPhase('setup');
      this.setup();

      this.enterPhase('clue');
      await this.cluePhaseRunner.run(this);

      this.enterPhase('discussion');
      await this.discussionPhaseRunner.run(this);

      this.enterPhase('voting');
      await this.votingPhaseRunner.run(this);

      this.enterPhase('resolution');
      const result = this.resolutionPhaseRunner.run(this);
      this.state.result = result;
      return result;
    } catch (error) {
      const participant = error instanceof AgentFailure ? error.actor : this.currentParticipant;
      throw new GameAbortedError({ gameIndex: this.gameIndex, phase: this.state.phase, participant }, error);
    }
  }

  getAlive(): ParticipantState[] {
    return this.state.participants.filter(p => p.isAlive);
  }

  getImpostor(): ParticipantState {
    const impostor = this.state.participants.find(p => p.role === 'impostor');
    if (!impostor) throw new Error('Game has no impostor; setup has not run');
    return impostor;
  }

  throwIfCancelled(): void {
    if (this.signal?.aborted) throw new GameCancelledError();
  }

  /** Ask for free text. The participant is remembered so a failure can name them. */
  async respond(participant: ParticipantState, prompt: AgentPrompt): Promise<string> {
    this.throwIfCancelled();
    this.currentParticipant = participant.name;
    const text = await this.agentIO.respond(participant.name, participant.role, prompt, this.signal);
    this.currentParticipant = undefined;
    return text;
  }

  async decide(participant: ParticipantState, prompt: AgentPrompt, options: readonly string[]): Promise<string> {
    this.throwIfCancelled();
    this.currentParticipant = participant.name;
    const choice = await this.agentIO.decide(participant.name, participant.role, prompt, options, this.signal);
    this.currentParticipant = undefined;
    return choice;
  }

  /** Append to the canonical transcript (insertion order is the stored order) and publish it. */
  appendMessage(speaker: string, phase: Message['phase'], round: number, content: string): Message {
    const message: Message = { index: this.state.messages.length, speaker, phase, round, content };
    this.state.messages.push(message);
    const type: GameLogEntry['type'] = phase === 'clue' ? 'CLUE' : phase === 'voting' ? 'VOTE' : 'CHAT';
    this.record({
      type,
      player: speaker,
      content: phase === 'voting' ? `voted for ${content}` : content,
      metadata: { round, target: phase === 'voting' ? content : undefined },
    });
    return message;
  }

  /** A copy of `items` in a fresh random order; the source array is not touched. */
  shuffledCopy<T>(items: readonly T[]): T[] {
    return shuffled(items, this.rng);
  }

  record(entry: Omit<GameLogEntry, 'id' | 'timestamp'>, visibility: 'public' | 'private' = 'public'): GameLogEntry {
    return logger.log({
      ...entry,
      metadata: { ...(entry.metadata ?? {}), gameIndex: this.gameIndex, phase: this.state.phase, visibility },
    });
  }

  private enterPhase(phase: Phase) {
    this.throwIfCancelled();
    this.state.phase = phase;
    this.record({
      type: 'SYSTEM',
      content: `--- Game ${this.gameId}: ${phase} ---`,
      metadata: { kind: 'phase' },
    });
  }

  private setup() {
    const { impostorSeat, words } = this.assignment;
    if (impostorSeat < 0 || impostorSeat >= this.roster.length) {
      throw new Error(`Impostor seat ${impostorSeat} is outside the roster of ${this.roster.length}`);
    }

    this.state.messages = [];
    this.state.votes = [];
    this.state.participants = this.roster.map((entry, seat) => {
      const role: Role = seat === impostorSeat ? 'impostor' : 'citizen';
      const word = role === 'citizen' ? words.word : this.impostorMode === 'decoy' ? words.decoy : null;
      return {
        seat,
        name: entry.name,
        role,
        model: { provider: entry.provider, model: entry.model },
        word,
        isAlive: true,
      };
    });

    logger.setKnownPlayers(this.state.participants.map(p => p.name));
    logger.setPlayerRoles(Object.fromEntries(this.state.participants.map(p => [p.name, p.role])));

    for (const p of this.state.participants) {
      this.record(
        {
          type: 'SYSTEM',
          content: `Assigned role ${p.role} to ${p.name} (${p.model.provider}/${p.model.model}), word: ${p.word ?? '(none)'}`,
          metadata: { role: p.role, player: p.name, kind: 'role_assignment' },
        },
        'private'
      );
    }
  }
}
