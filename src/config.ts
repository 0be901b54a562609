import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import {
  type ResolvedTournamentConfig,
  type SecretWordPair,
  TournamentConfigSchema,
  WordPairSchema,
} from './types.js';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

const DATA_DIR = new URL('../data/', import.meta.url);

function readDataFile(name: string): unknown {
  return JSON.parse(fs.readFileSync(new URL(name, DATA_DIR), 'utf-8'));
}

export function loadDefaultWordPairs(): SecretWordPair[] {
  return z.array(WordPairSchema).parse(readDataFile('word-pairs.json'));
}

export function loadDefaultPlayerNames(): string[] {
  return z.array(z.string().min(1)).parse(readDataFile('player-names.json'));
}

/**
 * Validate a parsed config object and fill in everything the tournament needs:
 * seat names for unnamed players and the built-in word pool when none is given.
 */
export function resolveConfig(raw: unknown): ResolvedTournamentConfig {
  const config = TournamentConfigSchema.parse(raw);

  const taken = new Set(config.players.flatMap(p => (p.name ? [p.name.toLowerCase()] : [])));
  const spare = loadDefaultPlayerNames().filter(n => !taken.has(n.toLowerCase()));
  const players = config.players.map((p, i) => {
    if (p.name) return { ...p, name: p.name };
    let name = spare.shift() ?? `Player ${i + 1}`;
    for (let k = 2; taken.has(name.toLowerCase()); k++) name = `Player ${i + 1}-${k}`;
    taken.add(name.toLowerCase());
    return { ...p, name };
  });

  return {
    ...config,
    players,
    word_pairs: config.word_pairs ?? loadDefaultWordPairs(),
  };
}

export function loadConfig(configPath: string): ResolvedTournamentConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const config = resolveConfig(yaml.parse(fileContents));

    logger.log({
      type: 'SYSTEM',
      content: `Configuration loaded: ${config.players.length} players, ${config.games} games, ${config.word_pairs.length} word pairs.`,
    });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${errorMessage(error)}`,
      metadata: { error },
    });
    throw error;
  }
}

const ResultsDirSchema = z.object({ results_dir: z.string().default('results') });

/**
 * The `results_dir` a config file points at, resolved against `baseDir`.
 * Only that key is read, so it works for configs that would not start a run.
 * A missing file yields the default unless `mustExist` is set.
 */
export function resultsDirFrom(configPath: string, baseDir = process.cwd(), mustExist = false): string {
  const exists = fs.existsSync(configPath);
  if (!exists && mustExist) throw new Error(`Config file not found: ${configPath}`);
  const raw: unknown = exists ? yaml.parse(fs.readFileSync(configPath, 'utf-8')) : null;
  return path.resolve(baseDir, ResultsDirSchema.parse(raw ?? {}).results_dir);
}
