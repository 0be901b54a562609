import test from 'node:test';
import assert from 'node:assert/strict';
import { determineWinner, formatVoteTally, resolveElimination, tallyVotes, validateVotes } from './resolver.js';
import type { VoteRecord } from '../types.js';

// --- Helpers ---

const vote = (voter: string, target: string): VoteRecord => ({ voter, target });
const ROSTER = ['Alice', 'Bob', 'Carol', 'Dave'];

// --- Tests ---

test('tallyVotes: counts votes and keeps zero entries in roster order', () => {
  const tally = tallyVotes([vote('Alice', 'Bob'), vote('Carol', 'Bob'), vote('Bob', 'Dave')], ROSTER);
  assert.deepEqual(tally, { Alice: 0, Bob: 2, Carol: 0, Dave: 1 });
  assert.deepEqual(Object.keys(tally), ROSTER);
});

test('tallyVotes: rejects a vote for someone outside the candidates', () => {
  assert.throws(() => tallyVotes([vote('Alice', 'Zed')], ROSTER), /unknown candidate "Zed"/);
});

test('tallyVotes: names that shadow object built-ins are counted like any other', () => {
  const names = ['__proto__', 'constructor', 'Bob'];
  const tally = tallyVotes([vote('Bob', '__proto__'), vote('constructor', '__proto__'), vote('__proto__', 'constructor')], names);
  assert.deepEqual(Object.keys(tally), names);
  assert.equal(tally['__proto__'], 2);
  assert.equal(tally['constructor'], 1);
  assert.equal(tally['Bob'], 0);
  assert.equal(resolveElimination(tally, names), '__proto__');
  assert.throws(() => tallyVotes([vote('Bob', 'toString')], names), /unknown candidate "toString"/);
});

test('resolveElimination: strict majority wins', () => {
  assert.equal(resolveElimination({ Alice: 1, Bob: 0, Carol: 3, Dave: 0 }, ROSTER), 'Carol');
});

test('resolveElimination: tie goes to the lowest roster index', () => {
  assert.equal(resolveElimination({ Alice: 0, Bob: 2, Carol: 0, Dave: 2 }, ROSTER), 'Bob');
  assert.equal(resolveElimination({ Alice: 1, Bob: 1, Carol: 1, Dave: 1 }, ROSTER), 'Alice');
});

test('resolveElimination: same tally always yields the same result', () => {
  const tally = { Alice: 0, Bob: 2, Carol: 2, Dave: 0 };
  const first = resolveElimination(tally, ROSTER);
  for (let i = 0; i < 5; i++) assert.equal(resolveElimination({ ...tally }, ROSTER), first);
});

test('resolveElimination: tally key order does not matter, roster order does', () => {
  const tally = { Dave: 2, Carol: 0, Bob: 2, Alice: 0 };
  assert.equal(resolveElimination(tally, ROSTER), 'Bob');
});

test('resolveElimination: throws when nobody voted', () => {
  assert.throws(() => resolveElimination({ Alice: 0, Bob: 0 }, ['Alice', 'Bob']), /no votes/);
});

test('determineWinner: citizens win iff the impostor is eliminated', () => {
  assert.equal(determineWinner('Dave', 'Dave'), 'citizens');
  assert.equal(determineWinner('Alice', 'Dave'), 'impostor');
});

test('validateVotes: accepts one vote per voter for someone else', () => {
  validateVotes([vote('Alice', 'Bob'), vote('Bob', 'Alice'), vote('Carol', 'Alice')], ['Alice', 'Bob', 'Carol']);
});

test('validateVotes: rejects a self vote', () => {
  assert.throws(() => validateVotes([vote('Alice', 'Alice'), vote('Bob', 'Alice')], ['Alice', 'Bob']), /voted for themselves/);
});

test('validateVotes: rejects double votes and missing voters', () => {
  assert.throws(() => validateVotes([vote('Alice', 'Bob'), vote('Alice', 'Bob')], ['Alice', 'Bob']), /more than once/);
  assert.throws(() => validateVotes([vote('Alice', 'Bob')], ['Alice', 'Bob']), /Missing votes from: Bob/);
});

test('formatVoteTally: sorted by count then name, zeros dropped', () => {
  assert.equal(formatVoteTally({ Alice: 0, Bob: 1, Carol: 3, Dave: 1 }), 'Carol: 3, Bob: 1, Dave: 1');
  assert.equal(formatVoteTally({ Alice: 0 }), '(no votes)');
});
