import type { RosterEntry, SecretWordPair } from './types.js';
import { ConfigurationError } from './errors.js';
import { fnv1a32 } from './utils.js';

export interface GameAssignment {
  gameIndex: number;
  // Roster seat of the impostor.
  impostorSeat: number;
  words: SecretWordPair;
}

export function validateRoster(roster: readonly RosterEntry[]): void {
  if (roster.length < 2) {
    throw new ConfigurationError(
      `At least 2 players are required (got ${roster.length}); a lone impostor has no citizens to out-vote it.`
    );
  }
  const seen = new Set<string>();
  for (const entry of roster) {
    const key = entry.name.toLowerCase();
    if (seen.has(key)) throw new ConfigurationError(`Duplicate player name "${entry.name}" in roster.`);
    seen.add(key);
  }
}

export function validateWordPool(pool: readonly SecretWordPair[]): void {
  if (pool.length === 0) {
    throw new ConfigurationError('Word pool is empty; configure at least one word pair.');
  }
}

/**
 * Impostor rotates through the roster by game index, so over G games every
 * seat is the impostor floor(G/N) or ceil(G/N) times.
 */
export function impostorSeatFor(gameIndex: number, rosterSize: number): number {
  return ((gameIndex % rosterSize) + rosterSize) % rosterSize;
}

/** The word pair depends only on the seed and game index, never on who sits where. */
export function wordPairFor(pool: readonly SecretWordPair[], seed: number, gameIndex: number): SecretWordPair {
  validateWordPool(pool);
  const pair = pool[fnv1a32(`${seed}|${gameIndex}|words`) % pool.length];
  if (!pair) throw new ConfigurationError('Word pool is empty; configure at least one word pair.');
  return pair;
}

export function assignGame(
  roster: readonly RosterEntry[],
  gameIndex: number,
  pool: readonly SecretWordPair[],
  seed: number
): GameAssignment {
  validateRoster(roster);
  return {
    gameIndex,
    impostorSeat: impostorSeatFor(gameIndex, roster.length),
    words: wordPairFor(pool, seed, gameIndex),
  };
}
