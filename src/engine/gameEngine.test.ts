import test from 'node:test';
import assert from 'node:assert/strict';
import { GameEngine, type GameEngineOptions } from './gameEngine.js';
import { AgentIO, type AgentIOConfig } from '../agentIo.js';
import { logger } from '../logger.js';
import { GameAbortedError } from '../errors.js';
import { scriptedTable, type TableScript } from '../testing/scriptedAgent.js';
import type { RosterEntry } from '../types.js';

logger.setConsoleOutputEnabled(false);
logger.setPersistenceEnabled(false);

// --- Helpers ---

const NAMES = ['Alice', 'Bob', 'Carol', 'Dave'];
const ROSTER: RosterEntry[] = NAMES.map((name, i) => ({
  name,
  provider: 'openai',
  model: `model-${i}`,
  temperature: 0.7,
}));

function makeEngine(script: TableScript, overrides: Partial<GameEngineOptions> = {}, ioCfg: Partial<AgentIOConfig> = { maxAttempts: 1 }) {
  const { agents, calls } = scriptedTable(NAMES, script);
  const engine = new GameEngine({
    gameIndex: 0,
    roster: ROSTER,
    assignment: { gameIndex: 0, impostorSeat: 3, words: { word: 'coffee', decoy: 'tea' } },
    agentIO: new AgentIO(agents, ioCfg),
    seed: 7,
    ...overrides,
  });
  return { engine, calls };
}

async function expectAbort(engine: GameEngine): Promise<GameAbortedError> {
  try {
    await engine.run();
  } catch (error) {
    assert.ok(error instanceof GameAbortedError, `expected GameAbortedError, got ${String(error)}`);
    return error;
  }
  assert.fail('game should have aborted');
}

// --- Tests ---

test('GameEngine: citizens unanimously vote the impostor, impostor votes a citizen => citizens win', async () => {
  const { engine } = makeEngine({ vote: (name) => (name === 'Dave' ? 'Alice' : 'Dave') });

  const result = await engine.run();

  assert.equal(result.impostor, 'Dave');
  assert.equal(result.eliminated, 'Dave');
  assert.equal(result.winner, 'citizens');
  assert.deepEqual(result.voteTally, { Alice: 1, Bob: 0, Carol: 0, Dave: 3 });
  assert.deepEqual(result.impostorModel, { provider: 'openai', model: 'model-3' });
  assert.deepEqual(
    result.participants.map(p => [p.name, p.role, p.survived, p.votesReceived]),
    [
      ['Alice', 'citizen', true, 1],
      ['Bob', 'citizen', true, 0],
      ['Carol', 'citizen', true, 0],
      ['Dave', 'impostor', false, 3],
    ]
  );
});

test('GameEngine: eliminating a citizen means the impostor wins', async () => {
  const { engine } = makeEngine({ vote: (name) => (name === 'Bob' ? 'Carol' : 'Bob') });
  const result = await engine.run();
  assert.equal(result.eliminated, 'Bob');
  assert.equal(result.winner, 'impostor');
});

test('GameEngine: a tied vote eliminates the earliest seat among the tied', async () => {
  // Alice->Carol, Bob->Carol, Carol->Bob, Dave->Bob: Bob and Carol tie on 2.
  const votes: Record<string, string> = { Alice: 'Carol', Bob: 'Carol', Carol: 'Bob', Dave: 'Bob' };
  const { engine } = makeEngine({ vote: (name) => votes[name] ?? '' });
  const result = await engine.run();
  assert.equal(result.eliminated, 'Bob');
});

test('GameEngine: citizens clue in roster order seeing earlier clues; the impostor clues last without the word', async () => {
  const { engine, calls } = makeEngine({});
  await engine.run();

  const clueCalls = calls.filter(c => c.prompt.kind === 'clue');
  assert.deepEqual(clueCalls.map(c => c.name), ['Alice', 'Bob', 'Carol', 'Dave']);

  const bob = clueCalls[1];
  assert.ok(bob?.prompt.user.includes('Alice: clue-Alice'));
  assert.ok(!bob?.prompt.user.includes('clue-Carol'));
  assert.ok(bob?.prompt.system.includes('"coffee"'));

  const dave = clueCalls[3];
  assert.equal(dave?.role, 'impostor');
  assert.ok(dave?.prompt.user.includes('Alice: clue-Alice\nBob: clue-Bob\nCarol: clue-Carol'));
  assert.ok(!dave?.prompt.system.includes('coffee'));
  assert.ok(!dave?.prompt.user.includes('coffee'));
});

test('GameEngine: exactly two discussion rounds with role-specific goals', async () => {
  const { engine, calls } = makeEngine({});
  const result = await engine.run();

  const talk = result.messages.filter(m => m.phase === 'discussion');
  assert.deepEqual(
    talk.map(m => `${m.round}:${m.speaker}`),
    ['1:Alice', '1:Bob', '1:Carol', '1:Dave', '2:Alice', '2:Bob', '2:Carol', '2:Dave']
  );

  const discussionCalls = calls.filter(c => c.prompt.kind === 'discussion');
  const daveFirst = discussionCalls.find(c => c.name === 'Dave');
  const aliceFirst = discussionCalls.find(c => c.name === 'Alice');
  assert.ok(daveFirst?.prompt.system.includes('deflect suspicion'));
  assert.ok(aliceFirst?.prompt.system.includes('get the impostor eliminated'));

  // Round 2 speakers see round 1 remarks.
  const aliceSecond = discussionCalls.filter(c => c.name === 'Alice')[1];
  assert.ok(aliceSecond?.prompt.user.includes('Dave: remark-Dave'));
});

test('GameEngine: every surviving participant votes exactly once and never for themselves', async () => {
  const { engine, calls } = makeEngine({});
  const result = await engine.run();

  assert.deepEqual(result.votes.map(v => v.voter), NAMES);
  for (const v of result.votes) assert.notEqual(v.voter, v.target);

  for (const call of calls.filter(c => c.prompt.kind === 'vote')) {
    assert.ok(!call.prompt.options?.includes(call.name), `${call.name} was offered themselves`);
    assert.equal(call.prompt.options?.length, 3);
  }
});

test('GameEngine: stored transcript keeps insertion order; voters get shuffled copies', async () => {
  const { engine, calls } = makeEngine({}, { rng: () => 0 });
  const result = await engine.run();

  assert.deepEqual(
    result.messages.map(m => m.index),
    result.messages.map((_, i) => i)
  );
  assert.deepEqual(
    result.messages.map(m => m.phase),
    [...Array<string>(4).fill('clue'), ...Array<string>(8).fill('discussion'), ...Array<string>(4).fill('voting')]
  );

  // With rng() === 0 Fisher-Yates rotates the first message to the end.
  const talkLines = result.messages.filter(m => m.phase !== 'voting').map(m => `${m.speaker}: ${m.content}`);
  const expected = [...talkLines.slice(1), talkLines[0]].join('\n');
  for (const call of calls.filter(c => c.prompt.kind === 'vote')) {
    assert.ok(call.prompt.user.includes(`All messages (order randomized):\n${expected}\n`));
  }
});

test('GameEngine: shuffles are drawn independently for each voter', async () => {
  const { engine, calls } = makeEngine({});
  const result = await engine.run();
  const talkLines = result.messages.filter(m => m.phase !== 'voting').map(m => `${m.speaker}: ${m.content}`);

  const transcripts = calls
    .filter(c => c.prompt.kind === 'vote')
    .map(c => c.prompt.user.split('\n').slice(1, 1 + talkLines.length));
  for (const lines of transcripts) assert.deepEqual([...lines].sort(), [...talkLines].sort());
  assert.notDeepEqual(transcripts[0], transcripts[1]);
});

test('GameEngine: a self vote is a malformed response that aborts the game in voting', async () => {
  const { engine } = makeEngine({ vote: (name) => (name === 'Alice' ? 'Alice' : 'Dave') });
  const error = await expectAbort(engine);
  assert.equal(error.phase, 'voting');
  assert.equal(error.participant, 'Alice');
  assert.equal(error.reason, 'malformed_response');
  assert.equal(engine.state.votes.length, 0);
});

test('GameEngine: a provider error on a clue aborts in the clue phase with the participant', async () => {
  const { engine } = makeEngine({
    clue: (name) => {
      if (name === 'Carol') throw new Error('upstream 503');
      return `clue-${name}`;
    },
  });
  const error = await expectAbort(engine);
  assert.equal(error.gameIndex, 0);
  assert.equal(error.phase, 'clue');
  assert.equal(error.participant, 'Carol');
  assert.equal(error.reason, 'provider_error');
  assert.equal(engine.state.messages.length, 2);
  assert.equal(engine.state.result, undefined);
});

test('GameEngine: a hung agent surfaces as a timeout, distinct from malformed responses', async () => {
  const { engine } = makeEngine(
    {
      discussion: (name) =>
        name === 'Bob' ? new Promise<string>(() => undefined) : `remark-${name}`,
    },
    {},
    { maxAttempts: 1, responseTimeoutMs: 20 }
  );
  const error = await expectAbort(engine);
  assert.equal(error.phase, 'discussion');
  assert.equal(error.participant, 'Bob');
  assert.equal(error.reason, 'timeout');
});

test('GameEngine: cancellation stops further agent calls and yields no result', async () => {
  const controller = new AbortController();
  const { engine, calls } = makeEngine(
    {
      discussion: (name) => {
        if (name === 'Alice') controller.abort();
        return `remark-${name}`;
      },
    },
    { signal: controller.signal }
  );

  const error = await expectAbort(engine);
  assert.equal(error.reason, 'cancelled');
  assert.equal(error.phase, 'discussion');
  assert.equal(calls.at(-1)?.name, 'Alice');
  assert.equal(calls.filter(c => c.prompt.kind === 'discussion').length, 1);
  assert.equal(engine.state.result, undefined);
});

test('GameEngine: blind mode gives the impostor no word, decoy mode gives the decoy', async () => {
  const blind = await makeEngine({}).engine.run();
  assert.deepEqual(blind.participants.map(p => p.word), ['coffee', 'coffee', 'coffee', null]);

  const decoy = await makeEngine({}, { impostorMode: 'decoy' }).engine.run();
  assert.deepEqual(decoy.participants.map(p => p.word), ['coffee', 'coffee', 'coffee', 'tea']);
});

test('GameEngine: the result is frozen', async () => {
  const result = await makeEngine({}).engine.run();
  assert.ok(Object.isFrozen(result));
  assert.ok(Object.isFrozen(result.messages));
  assert.ok(Object.isFrozen(result.messages[0]));
  assert.ok(Object.isFrozen(result.participants[0]));
});
