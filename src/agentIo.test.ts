import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentIO, matchOption } from './agentIo.js';
import { AgentFailure, GameCancelledError } from './errors.js';
import { logger } from './logger.js';
import { ScriptedAgent, type RecordedCall } from './testing/scriptedAgent.js';
import type { AgentPrompt } from './agent.js';

logger.setConsoleOutputEnabled(false);
logger.setPersistenceEnabled(false);

const CLUE: AgentPrompt = { kind: 'clue', system: 'give a clue', user: 'go' };
const VOTE: AgentPrompt = { kind: 'vote', system: 'vote', user: 'go' };
const OPTIONS = ['Alice', 'Bob', 'Carol'];

function sequence(answers: Array<string | Error>) {
  const calls: RecordedCall[] = [];
  let i = 0;
  const agent = new ScriptedAgent(
    'Alice',
    () => {
      const next = answers[Math.min(i++, answers.length - 1)];
      if (next instanceof Error) throw next;
      return next ?? '';
    },
    calls
  );
  return { agent, calls };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  assert.fail('expected the call to reject');
}

test('matchOption: exact match ignores case, quotes and trailing punctuation', () => {
  assert.equal(matchOption('bob', OPTIONS), 'Bob');
  assert.equal(matchOption('"Carol".', OPTIONS), 'Carol');
  assert.equal(matchOption('  **Alice**  ', OPTIONS), 'Alice');
});

test('matchOption: a single whole-word mention resolves', () => {
  assert.equal(matchOption('I vote for Bob', OPTIONS), 'Bob');
});

test('matchOption: whole-word mentions work for names with non-ASCII letters', () => {
  assert.equal(matchOption('I vote Zoë.', ['Zoë', 'Bob']), 'Zoë');
  assert.equal(matchOption('Zoëlle seems off', ['Zoë', 'Bob']), undefined);
  assert.equal(matchOption('my vote goes to José', ['José', 'Bob']), 'José');
});

test('matchOption: several names, partial words or nothing do not resolve', () => {
  assert.equal(matchOption('Alice or Bob', OPTIONS), undefined);
  assert.equal(matchOption('Bobby', OPTIONS), undefined);
  assert.equal(matchOption('Dave', OPTIONS), undefined);
  assert.equal(matchOption('   ', OPTIONS), undefined);
});

test('AgentIO.respond: trims the answer', async () => {
  const { agent } = sequence(['  lantern \n']);
  const io = new AgentIO({ Alice: agent });
  assert.equal(await io.respond('Alice', 'citizen', CLUE), 'lantern');
});

test('AgentIO.respond: retries a provider error and returns the next good answer', async () => {
  const { agent, calls } = sequence([new Error('rate limited'), 'lantern']);
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 2 });
  assert.equal(await io.respond('Alice', 'citizen', CLUE), 'lantern');
  assert.equal(calls.length, 2);
});

test('AgentIO.respond: exhausted retries raise provider_error naming the actor', async () => {
  const { agent, calls } = sequence([new Error('rate limited')]);
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 3 });
  const error = await rejection(io.respond('Alice', 'citizen', CLUE));
  assert.ok(error instanceof AgentFailure);
  assert.equal(error.kind, 'provider_error');
  assert.equal(error.actor, 'Alice');
  assert.equal(calls.length, 3);
});

test('AgentIO.respond: an empty answer is malformed', async () => {
  const { agent } = sequence(['   ']);
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 1 });
  const error = await rejection(io.respond('Alice', 'citizen', CLUE));
  assert.ok(error instanceof AgentFailure);
  assert.equal(error.kind, 'malformed_response');
});

test('AgentIO.respond: a call past the deadline is a timeout', async () => {
  let aborted = false;
  const agent = new ScriptedAgent('Alice', (_role, _prompt, signal) => {
    return new Promise<string>((_, reject) => {
      signal?.addEventListener('abort', () => {
        aborted = true;
        reject(new Error('aborted'));
      });
    });
  });
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 1, responseTimeoutMs: 20 });
  const error = await rejection(io.respond('Alice', 'citizen', CLUE));
  assert.ok(error instanceof AgentFailure);
  assert.equal(error.kind, 'timeout');
  assert.equal(aborted, true);
});

test('AgentIO.decide: returns the canonical option name', async () => {
  const { agent } = sequence(['I think it is carol.']);
  const io = new AgentIO({ Alice: agent });
  assert.equal(await io.decide('Alice', 'citizen', VOTE, ['Bob', 'Carol']), 'Carol');
});

test('AgentIO.decide: passes the options through to the agent', async () => {
  const { agent, calls } = sequence(['Bob']);
  const io = new AgentIO({ Alice: agent });
  await io.decide('Alice', 'citizen', VOTE, ['Bob', 'Carol']);
  assert.deepEqual(calls[0]?.prompt.options, ['Bob', 'Carol']);
});

test('AgentIO.decide: a choice outside the options is malformed after every attempt', async () => {
  const { agent, calls } = sequence(['Alice']);
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 2 });
  const error = await rejection(io.decide('Alice', 'citizen', VOTE, ['Bob', 'Carol']));
  assert.ok(error instanceof AgentFailure);
  assert.equal(error.kind, 'malformed_response');
  assert.equal(calls.length, 2);
});

test('AgentIO.decide: a malformed answer followed by a valid one succeeds', async () => {
  const { agent } = sequence(['nobody', 'Bob']);
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 2 });
  assert.equal(await io.decide('Alice', 'citizen', VOTE, ['Bob', 'Carol']), 'Bob');
});

test('AgentIO: an already cancelled run never reaches the agent', async () => {
  const { agent, calls } = sequence(['lantern']);
  const io = new AgentIO({ Alice: agent });
  const controller = new AbortController();
  controller.abort();
  const error = await rejection(io.respond('Alice', 'citizen', CLUE, controller.signal));
  assert.ok(error instanceof GameCancelledError);
  assert.equal(calls.length, 0);
});

test('AgentIO: cancelling mid-call is not retried', async () => {
  const controller = new AbortController();
  let attempts = 0;
  const agent = new ScriptedAgent('Alice', () => {
    attempts++;
    controller.abort();
    return new Promise<string>(() => undefined);
  });
  const io = new AgentIO({ Alice: agent }, { maxAttempts: 3, responseTimeoutMs: 1000 });
  const error = await rejection(io.respond('Alice', 'citizen', CLUE, controller.signal));
  assert.ok(error instanceof GameCancelledError);
  assert.equal(attempts, 1);
});

test('AgentIO: an unknown actor is rejected', async () => {
  const io = new AgentIO({});
  const error = await rejection(io.respond('Nobody', 'citizen', CLUE));
  assert.ok(error instanceof Error);
  assert.match(error.message, /No agent registered for Nobody/);
});
