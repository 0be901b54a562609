import { logger } from './logger.js';
import type { AgentClient, AgentPrompt } from './agent.js';
import type { GameLogEntry, Role } from './types.js';
import { AgentFailure, type AgentFailureKind, GameCancelledError, errorMessage } from './errors.js';

export interface AgentIOConfig {
  responseTimeoutMs: number;
  maxAttempts: number;
}

class CallTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

/**
 * Run one agent call under a deadline. The call gets its own signal, aborted on
 * timeout or when `outer` is aborted, so the underlying request is torn down too.
 */
function callWithDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<T> {
  if (outer?.aborted) return Promise.reject(new GameCancelledError());

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    onAbort = () => {
      controller.abort();
      reject(new GameCancelledError());
    };
    outer?.addEventListener('abort', onAbort, { once: true });
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CallTimeoutError(timeoutMs));
      }, timeoutMs);
    }
  });

  return Promise.race([run(controller.signal), guard]).finally(() => {
    if (timer) clearTimeout(timer);
    if (onAbort) outer?.removeEventListener('abort', onAbort);
  });
}

/**
 * Resolve a free-text vote to one of `options`: exact (case-insensitive) first,
 * then a single option named as a whole word ("I vote for Alice" -> "Alice").
 * Answers naming several options, or none, do not resolve.
 */
export function matchOption<T extends string>(answer: string, options: readonly T[]): T | undefined {
  const normalized = answer
    .trim()
    .replace(/^["'`*\s]+|["'`*.!\s]+$/g, '')
    .toLowerCase();
  if (!normalized) return undefined;

  const exact = options.find(o => o.toLowerCase() === normalized);
  if (exact) return exact;

  const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  // Word boundaries over letters and digits of any script, so "Zoë" matches in "i vote zoë".
  const mentioned = options.filter(o =>
    new RegExp(`(?<![\\p{L}\\p{N}_])${escape(o.toLowerCase())}(?![\\p{L}\\p{N}_])`, 'u').test(normalized)
  );
  return mentioned.length === 1 ? mentioned[0] : undefined;
}

/**
 * Turn-level access to the players' agents: deadline, bounded retries and
 * answer validation. Never substitutes an answer; when the retry budget runs
 * out it throws an `AgentFailure`.
 */
export class AgentIO {
  private agents: Record<string, AgentClient>;
  private cfg: AgentIOConfig;

  constructor(agents: Record<string, AgentClient>, cfg?: Partial<AgentIOConfig>) {
    this.agents = agents;
    this.cfg = {
      responseTimeoutMs: cfg?.responseTimeoutMs ?? 90_000,
      maxAttempts: Math.max(1, cfg?.maxAttempts ?? 2),
    };
  }

  /** Free-text answer (clues, discussion remarks). Empty answers count as malformed. */
  async respond(actor: string, role: Role, prompt: AgentPrompt, signal?: AbortSignal): Promise<string> {
    return this.withRetries<string>(actor, role, prompt, signal, text => {
      const trimmed = text.trim();
      return trimmed ? { ok: trimmed } : { error: 'Empty response' };
    });
  }

  /** An answer that must name exactly one of `options`. */
  async decide<T extends string>(
    actor: string,
    role: Role,
    prompt: AgentPrompt,
    options: readonly T[],
    signal?: AbortSignal
  ): Promise<T> {
    if (options.length === 0) throw new Error(`No options to choose from for ${actor}`);
    return this.withRetries<T>(actor, role, { ...prompt, options }, signal, text => {
      const matched = matchOption(text, options);
      return matched ? { ok: matched } : { error: `Invalid choice "${text.trim()}"` };
    });
  }

  private async withRetries<T>(
    actor: string,
    role: Role,
    prompt: AgentPrompt,
    signal: AbortSignal | undefined,
    validate: (text: string) => { ok: T } | { error: string }
  ): Promise<T> {
    const agent = this.agents[actor];
    if (!agent) throw new Error(`No agent registered for ${actor}`);

    let lastKind: AgentFailureKind = 'provider_error';
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
      try {
        const text = await callWithDeadline(s => agent.ask(role, prompt, s), this.cfg.responseTimeoutMs, signal);
        const checked = validate(text);
        if ('ok' in checked) return checked.ok;
        lastKind = 'malformed_response';
        lastError = new Error(checked.error);
      } catch (err) {
        if (err instanceof GameCancelledError) throw err;
        lastKind = err instanceof CallTimeoutError ? 'timeout' : 'provider_error';
        lastError = err;
      }

      logger.log({
        type: 'SYSTEM',
        content: `AgentIO: ${actor} ${prompt.kind} failed (attempt ${attempt}/${this.cfg.maxAttempts}, ${lastKind}): ${errorMessage(lastError)}`,
        metadata: { actor, kind: 'agent_retry', attempt, failure: lastKind, visibility: 'private' } satisfies GameLogEntry['metadata'],
      });
    }

    throw new AgentFailure(
      lastKind,
      actor,
      `${actor} gave no usable ${prompt.kind} answer after ${this.cfg.maxAttempts} attempt(s) (${lastKind}): ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }
}
