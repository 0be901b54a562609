import type { FailureReason, Phase } from './types.js';

/** Invalid roster or word pool. Raised before any game starts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type AgentFailureKind = 'timeout' | 'provider_error' | 'malformed_response';

/**
 * An agent call that could not produce a usable answer within its retry budget.
 * Aborts the current game only.
 */
export class AgentFailure extends Error {
  readonly kind: AgentFailureKind;
  readonly actor: string;

  constructor(kind: AgentFailureKind, actor: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentFailure';
    this.kind = kind;
    this.actor = actor;
  }
}

export class GameCancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'GameCancelledError';
  }
}

export interface GameAbortContext {
  gameIndex: number;
  phase: Phase;
  participant?: string;
}

/** Carries where a game stopped: index, phase and (when known) the participant being asked. */
export class GameAbortedError extends Error {
  readonly gameIndex: number;
  readonly phase: Phase;
  readonly participant?: string;
  readonly reason: FailureReason;

  constructor(ctx: GameAbortContext, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    const who = ctx.participant ? ` (${ctx.participant})` : '';
    super(`Game ${ctx.gameIndex + 1} aborted in ${ctx.phase} phase${who}: ${details}`, { cause });
    this.name = 'GameAbortedError';
    this.gameIndex = ctx.gameIndex;
    this.phase = ctx.phase;
    this.participant = ctx.participant;
    this.reason = failureReasonOf(cause);
  }
}

export function failureReasonOf(error: unknown): FailureReason {
  if (error instanceof AgentFailure) return error.kind;
  if (error instanceof GameCancelledError) return 'cancelled';
  return 'internal_error';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
