import test from 'node:test';
import assert from 'node:assert/strict';
import { Agent, createAgents, type AgentPrompt } from './agent.js';
import { logger } from './logger.js';
import type { RosterEntry } from './types.js';

logger.setConsoleOutputEnabled(false);
logger.setPersistenceEnabled(false);

const entry = (name: string, provider = 'openai', model = 'gpt-4o-mini'): RosterEntry => ({
  name,
  provider,
  model,
  temperature: 0.7,
});

test('Agent: model id uses the gateway provider/model form', () => {
  assert.equal(new Agent(entry('Alice', 'anthropic', 'claude-3-5-haiku')).modelId, 'anthropic/claude-3-5-haiku');
});

test('Agent: an empty model is rejected', () => {
  assert.throws(() => new Agent(entry('Alice', 'openai', '')).modelId, /Invalid model id "openai\/"/);
});

test('Agent (dry-run): clues are single words and repeatable', async () => {
  const agent = new Agent(entry('Alice'), { dryRun: true });
  const prompt: AgentPrompt = { kind: 'clue', system: 's', user: 'Clues given so far:\n(none)' };
  const first = await agent.ask('citizen', prompt);
  assert.match(first, /^[a-z]+$/);
  assert.equal(await agent.ask('citizen', prompt), first);
});

test('Agent (dry-run): votes name an offered player other than itself', async () => {
  const agent = new Agent(entry('Alice'), { dryRun: true });
  for (const user of ['a', 'b', 'c', 'd']) {
    const vote = await agent.ask('citizen', { kind: 'vote', system: 's', user, options: ['Alice', 'Bob', 'Carol'] });
    assert.ok(vote === 'Bob' || vote === 'Carol', `unexpected vote ${vote}`);
  }
});

test('Agent (dry-run): discussion without anyone to suspect stays neutral', async () => {
  const agent = new Agent(entry('Alice'), { dryRun: true });
  const remark = await agent.ask('impostor', { kind: 'discussion', system: 's', user: 'u', options: [] });
  assert.equal(remark, 'No strong reads yet, the clues all fit together.');
});

test('createAgents: one agent per roster name', () => {
  const agents = createAgents([entry('Alice'), entry('Bob')], { dryRun: true });
  assert.deepEqual(Object.keys(agents), ['Alice', 'Bob']);
  assert.equal(agents.Bob?.name, 'Bob');
});
