import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogType, Role } from './types.js';
import { eventBus } from './events/index.js';
import { shouldPrintThoughts } from './utils.js';

const ROLE_COLORS: Record<Role, (text: string) => string> = {
  citizen: chalk.green,
  impostor: chalk.red,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  CLUE: chalk.cyan,
  CHAT: chalk.white,
  VOTE: chalk.blue,
  ELIMINATION: chalk.bgRed.white,
  WIN: chalk.green.bold,
  THOUGHT: chalk.gray.italic,
};

// Shown on the console even when verbose output is off.
const QUIET_TYPES: ReadonlySet<LogType> = new Set<LogType>(['SYSTEM', 'WIN']);

function isRole(value: unknown): value is Role {
  return value === 'citizen' || value === 'impostor';
}

export class GameLogger {
  private logFile?: string;
  private transcriptFile?: string;
  private readonly logDir = path.join(process.cwd(), 'logs');
  private logs: GameLogEntry[] = [];
  private knownPlayers: Set<string> = new Set();
  private consoleOutputEnabled = true;
  private persistenceEnabled = true;
  private verbose = true;
  private showProgress = true;
  private subscribers: Set<(entry: GameLogEntry) => void> = new Set();
  private playerRoles: Map<string, Role> = new Map();

  constructor() {
    // The logger subscribes to the global event bus and persists/prints entries.
    eventBus.subscribe(entry => {
      this.handleEntry(entry);
    });
  }

  /**
   * Enable or disable writing `logs/tournament-*.json` and `logs/transcript-*.txt`.
   * Console output and in-memory logs are unaffected.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setKnownPlayers(names: string[]) {
    this.knownPlayers = new Set(names);
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  /** When off, only SYSTEM and WIN entries reach the console. */
  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  /** When off, per-game completion lines are kept out of the console. */
  setShowProgress(enabled: boolean) {
    this.showProgress = enabled;
  }

  subscribe(cb: (entry: GameLogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  /** Roles change every game, so the engine resets this map at setup. */
  setPlayerRoles(roles: Record<string, Role>) {
    this.playerRoles = new Map(Object.entries(roles));
  }

  getLogs(): GameLogEntry[] {
    return this.logs.slice();
  }

  /**
   * Emit a log entry to the global event bus, returning the fully materialized entry.
   * The logger itself listens on the bus and persists/prints entries.
   */
  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    eventBus.emit(enriched);
    return enriched;
  }

  private enrichEntry(entry: GameLogEntry): GameLogEntry {
    const hasRoleProperty = entry.metadata && 'role' in entry.metadata;
    const inferredRole = entry.player && !hasRoleProperty ? this.playerRoles.get(entry.player) : undefined;
    if (inferredRole === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), role: inferredRole },
    };
  }

  private handleEntry(entry: GameLogEntry) {
    this.logs.push(entry);
    this.flush();

    for (const sub of this.subscribers) {
      try {
        sub(entry);
      } catch (error) {
        process.stderr.write(`log subscriber failed: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }

    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'THOUGHT' && !shouldPrintThoughts()) return;
    if (!this.verbose && (!QUIET_TYPES.has(entry.type) || entry.metadata?.kind === 'phase')) return;
    if (!this.showProgress && entry.metadata?.kind === 'game_complete') return;

    console.log(this.formatConsoleLine(entry));
  }

  private formatConsoleLine(entry: GameLogEntry): string {
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const metaRole = entry.metadata?.role;
      const role = isRole(metaRole) ? metaRole : this.playerRoles.get(entry.player);
      const roleStr = role ? ` ${ROLE_COLORS[role](role)}` : '';
      playerInfo = ` <${chalk.hex('#FFA500')(entry.player)}${roleStr}>`;
    }

    let content = entry.content.replace(/\b(citizen|impostor)s?\b/gi, match => {
      const lower = match.toLowerCase().replace(/s$/, '');
      return isRole(lower) ? ROLE_COLORS[lower](match) : match;
    });

    if (this.knownPlayers.size > 0) {
      const names = Array.from(this.knownPlayers).map(n => n.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      const playerPattern = new RegExp(`\\b(${names.join('|')})\\b`, 'g');
      content = content.replace(playerPattern, match => chalk.hex('#FFA500')(match));
    }

    return `${prefix} ${typeStr}${playerInfo}: ${content}`;
  }

  private flush() {
    if (!this.persistenceEnabled) return;
    if (!this.logFile || !this.transcriptFile) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.mkdirSync(this.logDir, { recursive: true });
      this.logFile = path.join(this.logDir, `tournament-${timestamp}.json`);
      this.transcriptFile = path.join(this.logDir, `transcript-${timestamp}.txt`);
    }
    fs.writeFileSync(this.logFile, JSON.stringify(this.logs, null, 2));
    fs.writeFileSync(this.transcriptFile, buildTranscriptText(this.logs));
  }
}

/** Public, human-readable transcript. Private entries (agent notes, retry warnings) are left out. */
export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    if (entry.type === 'THOUGHT' || entry.metadata?.visibility === 'private') continue;
    const who = entry.player ? `${entry.player} ` : '';

    switch (entry.type) {
      case 'SYSTEM':
        lines.push(`[SYSTEM] ${entry.content}`);
        break;
      case 'CLUE':
        lines.push(`[CLUE] ${entry.player ?? '?'}: ${entry.content}`);
        break;
      case 'CHAT':
        lines.push(entry.player ? `${entry.player}: ${entry.content}` : `[CHAT] ${entry.content}`);
        break;
      case 'VOTE':
      case 'ELIMINATION':
        lines.push(`[${entry.type}] ${who}${entry.content}`.trimEnd());
        break;
      case 'WIN':
        lines.push(`[WIN] ${entry.content}`);
        break;
    }
  }

  return `${lines.join('\n')}\n`;
}

export const logger = new GameLogger();
