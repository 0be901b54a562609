import { generateText, gateway, type ModelMessage } from 'ai';
import type { RosterEntry, Role } from './types.js';
import { logger } from './logger.js';
import { dryRunSeed, pickDeterministic } from './utils.js';

export type PromptKind = 'clue' | 'discussion' | 'vote';

export interface AgentPrompt {
  kind: PromptKind;
  // Role- and phase-specific instructions.
  system: string;
  // Situational context: transcript so far and the concrete request.
  user: string;
  // For votes (and suspect naming in dry-run): the names the answer must come from.
  options?: readonly string[];
}

/**
 * The capability the game core depends on: ask a player something, get text back.
 * Implementations may throw; `AgentIO` classifies and retries.
 */
export interface AgentClient {
  readonly name: string;
  ask(role: Role, prompt: AgentPrompt, signal?: AbortSignal): Promise<string>;
}

const GAME_RULES = `
You are playing "Find the Impostor", a word-based social deduction game.
Every citizen receives the same secret word. One player, the impostor, does not know it.
Players give one clue each, discuss for two rounds, then vote to eliminate one player.
Citizens win if the impostor is eliminated. The impostor wins otherwise.
`.trim();

const DRY_RUN_CLUES = ['classic', 'warm', 'everyday', 'shared', 'bright', 'seasonal', 'popular', 'quiet', 'crowded', 'sweet'];

export class Agent implements AgentClient {
  private config: RosterEntry;
  private dryRun: boolean;
  private logThoughts: boolean;

  private didLogModelInit = false;
  private cachedModel?: ReturnType<typeof gateway>;

  constructor(config: RosterEntry, opts?: { dryRun?: boolean; logThoughts?: boolean }) {
    this.config = config;
    this.dryRun = opts?.dryRun ?? false;
    this.logThoughts = opts?.logThoughts ?? false;
  }

  get name() {
    return this.config.name;
  }

  get modelId() {
    return this.normalizeModelId(`${this.config.provider}/${this.config.model}`);
  }

  async ask(role: Role, prompt: AgentPrompt, signal?: AbortSignal): Promise<string> {
    if (this.dryRun) return this.dryRunAnswer(role, prompt);

    const result = await generateText({
      model: this.getModel(),
      system: this.buildSystemPrompt(prompt),
      messages: [{ role: 'user', content: prompt.user }] satisfies ModelMessage[],
      temperature: this.config.temperature,
      abortSignal: signal,
    });

    const parsed = this.tryParseJsonObject(result.text);
    if (parsed && typeof parsed === 'object') {
      const say = 'say' in parsed && typeof parsed.say === 'string' ? parsed.say.trim() : '';
      const reasoning = 'reasoning' in parsed && typeof parsed.reasoning === 'string' ? parsed.reasoning.trim() : '';
      if (reasoning && this.logThoughts) {
        logger.log({
          type: 'THOUGHT',
          player: this.config.name,
          content: reasoning,
          metadata: { visibility: 'private', kind: `${prompt.kind}_reasoning` },
        });
      }
      if (say) return say;
    }

    // Fallback: treat the model output as the answer; AgentIO validates it.
    return result.text;
  }

  private getModel() {
    if (this.cachedModel) return this.cachedModel;
    const modelId = this.modelId;
    this.cachedModel = gateway(modelId);

    if (!this.didLogModelInit) {
      this.didLogModelInit = true;
      logger.log({
        type: 'SYSTEM',
        content: `Model ready for ${this.config.name}: ${modelId}`,
        metadata: { visibility: 'private' },
      });
    }
    return this.cachedModel;
  }

  private buildSystemPrompt(prompt: AgentPrompt): string {
    const answerShape =
      prompt.kind === 'vote'
        ? '"say" MUST be exactly one name from the list you were given.'
        : prompt.kind === 'clue'
          ? '"say" is your clue: a single lowercase word, no punctuation.'
          : '"say" is what you tell the table: at most two short sentences.';

    return `
${GAME_RULES}

Your Name: ${this.config.name}

${prompt.system.trim()}

Output format:
- Return a single JSON object: {"say": string, "reasoning": string}
- ${answerShape}
- "reasoning" is a short private explanation (max 2 sentences). It is never shown to other players.
    `.trim();
  }

  private tryParseJsonObject(text: string): unknown {
    const trimmed = text.trim();
    try {
      return JSON.parse(trimmed);
    } catch {
      // Common case: model wraps JSON in prose or code fences.
      const start = trimmed.indexOf('{');
      const end = trimmed.lastIndexOf('}');
      if (start < 0 || end <= start) return null;
      try {
        return JSON.parse(trimmed.slice(start, end + 1));
      } catch {
        return null;
      }
    }
  }

  private dryRunAnswer(role: Role, prompt: AgentPrompt): string {
    const key = `${dryRunSeed()}|${this.config.name}|${prompt.kind}|${prompt.user}`;
    const others = (prompt.options ?? []).filter(n => n !== this.config.name);
    const suspect = pickDeterministic(others, key);

    switch (prompt.kind) {
      case 'clue':
        return pickDeterministic(DRY_RUN_CLUES, key) ?? 'classic';
      case 'discussion':
        if (!suspect) return 'No strong reads yet, the clues all fit together.';
        return role === 'impostor'
          ? `${suspect}'s clue felt a little too safe to me.`
          : `I'm not fully sure yet, but ${suspect}'s clue feels off.`;
      case 'vote':
        return suspect ?? '';
    }
  }

  private normalizeModelId(modelId: string): string {
    // AI Gateway expects `provider/model` (e.g. `openai/gpt-4o`).
    const [provider, ...rest] = modelId.split('/');
    if (!provider || rest.length === 0 || !rest.join('/')) {
      throw new Error(`Invalid model id "${modelId}". Use AI Gateway format "provider/model".`);
    }
    return modelId;
  }
}

export function createAgents(
  roster: readonly RosterEntry[],
  opts?: { dryRun?: boolean; logThoughts?: boolean }
): Record<string, AgentClient> {
  return Object.fromEntries(roster.map(entry => [entry.name, new Agent(entry, opts)]));
}
