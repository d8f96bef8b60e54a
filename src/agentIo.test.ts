import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentIO, SILENCE, withTimeout, type ActorContext, type AgentIOConfig } from './agentIo.js';
import type { Decision, DecisionRequest, PlayerAgent, TalkRequest } from './agent.js';
import type { GameLogEntry, LogInput } from './types.js';
import { mulberry32 } from './utils.js';

class StubAgent implements PlayerAgent {
  calls = 0;
  lastRequest?: DecisionRequest;

  constructor(
    readonly name: string,
    private readonly reply: (attempt: number) => Promise<Decision>,
    private readonly line: () => Promise<string> = async () => 'Hello.'
  ) {}

  decide(request: DecisionRequest): Promise<Decision> {
    this.calls++;
    this.lastRequest = request;
    return this.reply(this.calls);
  }

  speak(_request: TalkRequest): Promise<string> {
    return this.line();
  }
}

const context: ActorContext = {
  role: 'chef',
  team: 'Good',
  privateFacts: ['[night 1] fact'],
  publicState: { game: 'clocktower', phase: 'night', round: 1, night: 1, day: 0, alive: ['A', 'B'], dead: [], board: {} },
};

function harness(agents: PlayerAgent[], config: Partial<AgentIOConfig> = {}) {
  const log: LogInput[] = [];
  const io = new AgentIO(Object.fromEntries(agents.map(a => [a.name, a])), {
    rng: mulberry32(1),
    record: (entry): GameLogEntry => {
      log.push(entry);
      return { id: String(log.length), timestamp: '', ...entry };
    },
    contextFor: () => context,
    config: { maxAttempts: 2, decisionTimeoutMs: 20, responseTimeoutMs: 20, ...config },
  });
  return { io, log };
}

const never = () => new Promise<never>(() => {});

test('AgentIO.decide: legal answer passes through, matched case-insensitively', async () => {
  const agent = new StubAgent('A', async () => '  bob ');
  const { io, log } = harness([agent]);
  assert.equal(await io.decide('A', { kind: 'kill', prompt: 'p', options: ['Bob', 'Carol'] }), 'Bob');
  assert.equal(log.length, 0);
  assert.equal(agent.lastRequest?.role, 'chef');
  assert.deepEqual(agent.lastRequest?.options, ['Bob', 'Carol']);
  assert.equal(agent.lastRequest?.maxPick, 1);
});

test('AgentIO.decide: retries an illegal answer', async () => {
  const agent = new StubAgent('A', async attempt => (attempt === 1 ? 'Nobody' : 'Carol'));
  const { io, log } = harness([agent]);
  assert.equal(await io.decide('A', { kind: 'kill', prompt: 'p', options: ['Bob', 'Carol'] }), 'Carol');
  assert.equal(agent.calls, 2);
  assert.equal(log.length, 0);
});

test('AgentIO.decide: persistent illegal answers fall back to the declared default', async () => {
  const agent = new StubAgent('A', async () => 'MAYBE');
  const { io, log } = harness([agent]);
  const vote = await io.decide('A', { kind: 'vote', prompt: 'p', options: ['YES', 'NO'], fallback: 'NO' });
  assert.equal(vote, 'NO');
  assert.equal(agent.calls, 2);
  assert.equal(log.length, 1);
  assert.equal(log[0].metadata?.kind, 'illegal_decision');
  assert.equal(log[0].metadata?.visibility, 'private');
  assert.equal(log[0].content, 'A gave no legal vote decision (invalid choice "MAYBE"); using NO.');
});

test('AgentIO.decide: a hanging agent times out into a legal random choice', async () => {
  const agent = new StubAgent('A', never);
  const { io, log } = harness([agent], { maxAttempts: 1 });
  const choice = await io.decide('A', { kind: 'kill', prompt: 'p', options: ['Bob', 'Carol'] });
  assert.ok(choice === 'Bob' || choice === 'Carol');
  assert.equal(log[0].content, `A gave no legal kill decision (Timeout after 20ms); using ${choice}.`);
});

test('AgentIO.decide: throwing agent and missing seat are absorbed', async () => {
  const agent = new StubAgent('A', async () => {
    throw new Error('rate limited');
  });
  const { io, log } = harness([agent]);
  assert.equal(await io.decide('A', { kind: 'cancel', prompt: 'p', options: ['ALLOW'] }), 'ALLOW');
  assert.equal(await io.decide('Ghost', { kind: 'cancel', prompt: 'p', options: ['ALLOW'] }), 'ALLOW');
  assert.deepEqual(
    log.map(e => e.content),
    ['A gave no legal cancel decision (rate limited); using ALLOW.', 'Ghost gave no legal cancel decision (no agent for seat); using ALLOW.']
  );
});

test('AgentIO.decide: empty option list asks nobody', async () => {
  const agent = new StubAgent('A', async () => 'x');
  const { io } = harness([agent]);
  assert.equal(await io.decide('A', { kind: 'kill', prompt: 'p', options: [] }), null);
  assert.equal(agent.calls, 0);
});

test('AgentIO.decideMany: distinct legal picks, comma-separated text accepted', async () => {
  const agent = new StubAgent('A', async () => 'Bob, Carol');
  const { io, log } = harness([agent]);
  const picks = await io.decideMany('A', { kind: 'sense', prompt: 'p', options: ['Bob', 'Carol', 'Dan'], min: 2, max: 2 });
  assert.deepEqual(picks, ['Bob', 'Carol']);
  assert.equal(agent.lastRequest?.minPick, 2);
  assert.equal(log.length, 0);
});

test('AgentIO.decideMany: duplicates are illegal and replaced', async () => {
  const agent = new StubAgent('A', async () => ['Bob', 'Bob']);
  const { io, log } = harness([agent]);
  const picks = await io.decideMany('A', { kind: 'sense', prompt: 'p', options: ['Bob', 'Carol', 'Dan'], min: 2, max: 2 });
  assert.equal(picks.length, 2);
  assert.equal(new Set(picks).size, 2);
  assert.equal(log[0].metadata?.kind, 'illegal_decision');
});

test('AgentIO.respond: silence on failure', async () => {
  const talker = new StubAgent('A', async () => '', async () => '   ');
  const { io, log } = harness([talker]);
  assert.equal(await io.respond('A', { prompt: 'talk', recentTalk: [] }), SILENCE);
  assert.equal(log[0].metadata?.kind, 'agent_silent');
  assert.equal(log[0].content, 'A said nothing: Empty response');
});

test('AgentIO.respond: trims the line', async () => {
  const talker = new StubAgent('A', async () => '', async () => '  I trust Bob. ');
  const { io } = harness([talker]);
  assert.equal(await io.respond('A', { prompt: 'talk', recentTalk: [] }), 'I trust Bob.');
});

test('withTimeout: resolves when the promise wins and rejects when it does not', async () => {
  assert.equal(await withTimeout(Promise.resolve(7), 50), 7);
  await assert.rejects(withTimeout(never(), 5), /Timeout after 5ms/);
  assert.equal(await withTimeout(Promise.resolve('x'), 0), 'x');
});
