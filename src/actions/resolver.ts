import type { Side, VoteRecord } from '../types.js';

/**
 * Count votes per candidate. Every candidate appears in the tally (in the
 * order given), including those nobody voted for.
 */
export function tallyVotes(votes: readonly VoteRecord[], candidates: readonly string[]): Record<string, number> {
  const counts = new Map<string, number>(candidates.map(c => [c, 0]));
  for (const v of votes) {
    const count = counts.get(v.target);
    if (count === undefined) throw new Error(`Vote for unknown candidate "${v.target}" by ${v.voter}`);
    counts.set(v.target, count + 1);
  }
  // Own properties only, so names like "constructor" or "__proto__" are plain keys.
  return Object.fromEntries(counts);
}

/**
 * Checks the voting-phase invariants: each voter votes exactly once, never for
 * themselves, and only for a surviving participant.
 */
export function validateVotes(votes: readonly VoteRecord[], voters: readonly string[]): void {
  const expected = new Set(voters);
  const cast = new Set<string>();
  for (const v of votes) {
    if (!expected.has(v.voter)) throw new Error(`${v.voter} is not eligible to vote`);
    if (cast.has(v.voter)) throw new Error(`${v.voter} voted more than once`);
    if (v.voter === v.target) throw new Error(`${v.voter} voted for themselves`);
    if (!expected.has(v.target)) throw new Error(`${v.voter} voted for ineligible ${v.target}`);
    cast.add(v.voter);
  }
  const missing = voters.filter(v => !cast.has(v));
  if (missing.length) throw new Error(`Missing votes from: ${missing.join(', ')}`);
}

/**
 * The candidate with the most votes. Ties go to the tied candidate that comes
 * first in `rosterOrder`.
 */
export function resolveElimination(tally: Readonly<Record<string, number>>, rosterOrder: readonly string[]): string {
  let eliminated: string | null = null;
  let best = 0;
  for (const name of rosterOrder) {
    const count = Object.hasOwn(tally, name) ? (tally[name] ?? 0) : 0;
    if (count > best) {
      best = count;
      eliminated = name;
    }
  }
  if (eliminated === null) throw new Error('Cannot resolve elimination: no votes were cast');
  return eliminated;
}

/** Citizens win iff the eliminated participant is the impostor. */
export function determineWinner(eliminated: string, impostor: string): Side {
  return eliminated === impostor ? 'citizens' : 'impostor';
}

export function formatVoteTally(tally: Readonly<Record<string, number>>): string {
  const entries = Object.entries(tally)
    .filter(([, v]) => v > 0)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (entries.length === 0) return '(no votes)';
  return entries.map(([k, v]) => `${k}: ${v}`).join(', ');
}
