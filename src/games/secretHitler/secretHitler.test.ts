import test from 'node:test';
import assert from 'node:assert/strict';
import { SecretHitlerEngine } from './engine.js';
import { POLICY_TOTAL, presidentialPower } from './roles.js';
import { ScriptedAgent, type ScriptedAnswer } from '../../testing/scriptedAgent.js';
import { MemoryRecorder, agentsByName, contents, tableConfig } from '../../testing/harness.js';
import type { DecisionKind } from '../../agent.js';

const FIVE = { Ann: 'liberal', Ben: 'hitler', Cat: 'fascist', Dan: 'liberal', Eve: 'liberal' };
const SEVEN = { Ann: 'liberal', Ben: 'hitler', Cat: 'fascist', Dan: 'liberal', Eve: 'liberal', Fay: 'fascist', Gus: 'liberal' };

type Script = Partial<Record<DecisionKind, ScriptedAnswer>>;

function setup(scripts: Record<string, Script>, overrides: { max_rounds?: number } = {}) {
  const agents = Object.keys(FIVE).map(name => new ScriptedAgent(name, scripts[name] ?? {}));
  const recorder = new MemoryRecorder();
  const engine = new SecretHitlerEngine(tableConfig('secret_hitler', FIVE, overrides), { agents: agentsByName(agents), recorder });
  return { engine, agents, recorder };
}

test('secret hitler: electing Hitler chancellor after three fascist policies ends the game at once', async () => {
  const { engine, agents } = setup({ Ann: { nominate: 'Ben' } });
  engine.board.fascist = 3;
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Fascists', reason: 'Hitler was elected Chancellor after 3 Fascist policies.', forced: false });
  assert.equal(engine.deck.size, POLICY_TOTAL);
  assert.deepEqual(
    agents.flatMap(a => a.requestsOf('discard')),
    []
  );
  assert.equal(engine.governments[0].flags.hitlerElected, true);
  assert.equal(engine.state.counters.round, 1);
});

test('secret hitler: three failed elections enact the top policy and reset the tracker', async () => {
  const no = { vote: 'NEIN' };
  const { engine, agents, recorder } = setup({ Ann: no, Ben: no, Cat: no, Dan: no, Eve: no }, { max_rounds: 3 });
  const outcome = await engine.start();

  assert.equal(outcome.forced, true);
  assert.equal(engine.tracker.value, 0);
  assert.equal(engine.board.liberal + engine.board.fascist, 1);
  assert.equal(engine.deck.size, POLICY_TOTAL - 1);
  assert.equal(engine.policyCount(), POLICY_TOTAL);
  assert.deepEqual(engine.lastElected, {});
  const enacted = recorder.entries.filter(e => e.metadata?.kind === 'enact');
  assert.equal(enacted.length, 1);
  assert.match(enacted[0].content, /^(Liberal|Fascist) policy enacted from the top of the deck\./);
  assert.deepEqual(
    recorder.entries.filter(e => e.metadata?.kind === 'tracker').map(e => e.content),
    ['Election tracker: 1/3.', 'Election tracker: 2/3.', 'Election tracker: 3/3.']
  );
  assert.deepEqual(
    agents.flatMap(a => a.requestsOf('discard')),
    []
  );
});

test('secret hitler: presidents rotate by seat', async () => {
  const no = { vote: 'NEIN' };
  const { engine, recorder } = setup({ Ann: no, Ben: no, Cat: no, Dan: no, Eve: no }, { max_rounds: 2 });
  await engine.start();
  assert.deepEqual(
    recorder.entries.filter(e => e.metadata?.kind === 'president').map(e => e.player),
    ['Ann', 'Ben']
  );
});

test('secret hitler: an accepted veto discards both policies and moves the tracker', async () => {
  const { engine, recorder } = setup(
    { Ann: { nominate: 'Dan', veto: 'ACCEPT' }, Dan: { discard: 'VETO' } },
    { max_rounds: 1 }
  );
  engine.board.fascist = 5;
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Fascists', reason: 'Round limit of 1 reached; More Fascist policies (5-0).', forced: true });
  assert.equal(engine.deck.size, POLICY_TOTAL - 3);
  assert.equal(engine.deck.discardSize, 3);
  assert.deepEqual(engine.hand, []);
  assert.equal(engine.tracker.value, 1);
  assert.equal(engine.governments[0].flags.vetoed, true);
  assert.ok(contents(recorder.entries, 'SYSTEM').includes('Dan is confirmed not to be Hitler.'));
});

test('secret hitler: a rejected veto forces the chancellor to enact', async () => {
  const { engine, recorder } = setup(
    {
      Ann: { nominate: 'Dan', veto: 'REJECT' },
      Dan: { discard: req => (req.options.includes('VETO') ? 'VETO' : req.options[0]) },
    },
    { max_rounds: 1 }
  );
  engine.board.fascist = 5;
  await engine.start();

  assert.equal(engine.deck.size, POLICY_TOTAL - 3);
  assert.equal(engine.deck.discardSize, 2);
  assert.equal(engine.board.liberal + engine.board.fascist, 6);
  assert.equal(engine.tracker.value, 0);
  assert.ok(contents(recorder.entries, 'GOVERNMENT').includes('Ann rejects the veto.'));
  assert.equal(engine.governments[0].flags.vetoed, false);
});

test('secret hitler: a normal session keeps every policy accounted for', async () => {
  const { engine, agents } = setup({ Ann: { nominate: 'Dan' } }, { max_rounds: 1 });
  await engine.start();

  assert.equal(engine.board.liberal + engine.board.fascist, 1);
  assert.equal(engine.deck.discardSize, 2);
  assert.equal(engine.policyCount(), POLICY_TOTAL);
  assert.equal(agents[0].requestsOf('discard').length, 1);
  assert.equal(agents[3].requestsOf('discard').length, 1);
  assert.equal(agents[3].requestsOf('discard')[0].options.includes('VETO'), false);
});

test('secret hitler: term limits', () => {
  const five = setup({}).engine;
  five.lastElected = { president: 'Ann', chancellor: 'Ben' };
  assert.deepEqual(five.chancellorCandidates('Cat'), ['Dan', 'Eve']);

  const seven = new SecretHitlerEngine(tableConfig('secret_hitler', SEVEN), { agents: {}, recorder: new MemoryRecorder() });
  seven.lastElected = { president: 'Ann', chancellor: 'Ben' };
  assert.deepEqual(seven.chancellorCandidates('Cat'), ['Ann', 'Dan', 'Eve', 'Fay', 'Gus']);
});

test('secret hitler: special election does not move the rotation', () => {
  const { engine } = setup({});
  engine.specialPresident = 'Dan';
  assert.equal(engine.nextPresident(), 'Dan');
  assert.equal(engine.nextPresident(), 'Ann');
  assert.equal(engine.nextPresident(), 'Ben');
});

test('secret hitler: who knows whom at the start', async () => {
  const five = setup({}, { max_rounds: 1 }).engine;
  five.openGame();
  assert.equal(five.knowledge.latest('Ben', 'allies')?.text, 'Your fellow fascist: Cat.');
  assert.equal(five.knowledge.latest('Cat', 'allies')?.text, 'Hitler is Ben.');
  assert.equal(five.knowledge.latest('Ann', 'allies'), undefined);

  const seven = new SecretHitlerEngine(tableConfig('secret_hitler', SEVEN), { agents: {}, recorder: new MemoryRecorder() });
  seven.openGame();
  assert.equal(seven.knowledge.latest('Ben', 'allies'), undefined);
  assert.equal(seven.knowledge.latest('Cat', 'allies')?.text, 'Hitler is Ben. Other fascists: Fay.');
});

test('presidentialPower: powers by table size', () => {
  assert.equal(presidentialPower(5, 1), undefined);
  assert.equal(presidentialPower(5, 3), 'peek');
  assert.equal(presidentialPower(7, 2), 'investigate');
  assert.equal(presidentialPower(7, 3), 'special_election');
  assert.equal(presidentialPower(9, 1), 'investigate');
  assert.equal(presidentialPower(10, 4), 'execute');
  assert.equal(presidentialPower(6, 5), 'execute');
});
