import test from 'node:test';
import assert from 'node:assert/strict';
import { ClocktowerEngine } from './engine.js';
import { ScriptedAgent, inOrder } from '../../testing/scriptedAgent.js';
import { MemoryRecorder, agentsByName, contents, tableConfig } from '../../testing/harness.js';

const SEVEN = {
  Ann: 'imp',
  Ben: 'poisoner',
  Cat: 'empath',
  Dan: 'chef',
  Eve: 'undertaker',
  Fay: 'monk',
  Gus: 'slayer',
};

function sevenPlayerTable(...votes: string[]) {
  const good = (name: string) =>
    new ScriptedAgent(name, { nominate: inOrder('Ben', 'Ann'), vote: inOrder(...votes), slay: 'NONE', protect: 'Gus' });
  return [
    new ScriptedAgent('Ann', { kill: inOrder('Dan', 'Fay'), nominate: inOrder('Ben', 'Ann'), vote: 'NO' }),
    new ScriptedAgent('Ben', { poison: 'Cat', nominate: 'Ben', vote: 'NO' }),
    good('Cat'),
    good('Dan'),
    good('Eve'),
    good('Fay'),
    good('Gus'),
  ];
}

test('clocktower: night kill, poisoned empath and the undertaker after an execution', async () => {
  const agents = sevenPlayerTable('YES', 'YES');
  const recorder = new MemoryRecorder();
  const engine = new ClocktowerEngine(tableConfig('clocktower', SEVEN), { agents: agentsByName(agents), recorder });
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Good', reason: 'The Imp is dead.', forced: false });
  assert.deepEqual(contents(recorder.entries, 'DEATH'), [
    'Dan died (killed by the Demon). Their role was chef.',
    'Ben died (executed). Their role was poisoner.',
    'Fay died (killed by the Demon). Their role was monk.',
    'Ann died (executed). Their role was imp.',
  ]);

  const senses = engine.knowledge.factsFor('Cat').filter(f => f.kind === 'sense');
  assert.equal(senses.length, 2);
  assert.equal(senses[0].round, 1);
  assert.equal(senses[0].reliable, false);
  assert.notEqual(senses[0].data?.count, 1);
  assert.equal(senses[1].reliable, true);
  assert.equal(senses[1].text, '1 of your alive neighbours are evil.');

  const undertaker = engine.knowledge.factsFor('Eve').filter(f => f.kind === 'retrospective');
  assert.equal(undertaker.length, 1);
  assert.equal(undertaker[0].round, 2);
  assert.equal(undertaker[0].text, "Yesterday's executed player, Ben, was the poisoner.");
  assert.equal(engine.lastExecution?.name, 'Ann');
});

test('clocktower: a night kill alone gives the undertaker nothing', async () => {
  const agents = sevenPlayerTable('NO');
  const engine = new ClocktowerEngine(tableConfig('clocktower', SEVEN, { max_rounds: 2 }), {
    agents: agentsByName(agents),
    recorder: new MemoryRecorder(),
  });
  const outcome = await engine.start();

  assert.equal(outcome.forced, true);
  assert.equal(outcome.winner, 'Evil');
  assert.equal(engine.lastExecution, undefined);
  assert.deepEqual(
    engine.knowledge.factsFor('Eve').filter(f => f.kind === 'retrospective'),
    []
  );
});

test('clocktower: evil players learn each other', async () => {
  const engine = new ClocktowerEngine(tableConfig('clocktower', SEVEN, { max_rounds: 1 }), {
    agents: agentsByName(sevenPlayerTable('NO')),
    recorder: new MemoryRecorder(),
  });
  await engine.start();
  assert.equal(engine.knowledge.latest('Ann', 'allies')?.text, 'Your evil partner: Ben (poisoner).');
  assert.equal(engine.knowledge.latest('Cat', 'allies'), undefined);
});

const FIVE = { Ann: 'imp', Ben: 'poisoner', Cat: 'butler', Dan: 'mayor', Eve: 'chef' };

test("clocktower: the butler's YES only counts when the master votes YES", async () => {
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Eve', nominate: 'Dan', vote: 'YES' }),
    new ScriptedAgent('Ben', { poison: 'Eve', nominate: 'Dan', vote: 'YES' }),
    new ScriptedAgent('Cat', { master: 'Dan', nominate: 'Dan', vote: 'YES' }),
    new ScriptedAgent('Dan', { nominate: 'Dan', vote: 'NO' }),
    new ScriptedAgent('Eve', { nominate: 'Dan' }),
  ];
  const recorder = new MemoryRecorder();
  const engine = new ClocktowerEngine(tableConfig('clocktower', FIVE, { max_rounds: 1 }), { agents: agentsByName(agents), recorder });
  await engine.start();

  const catVote = agents[2].requestsOf('vote');
  assert.equal(catVote.length, 1);
  assert.match(catVote[0].prompt, /Dan voted NO\. Your YES only counts if Dan voted YES\./);
  assert.ok(contents(recorder.entries, 'VOTE').includes('Cat votes NO'));
  assert.ok(contents(recorder.entries, 'SYSTEM').includes('Vote on Dan: 2 YES of 4. Not executed.'));
  assert.equal(engine.roster.isAlive('Dan'), true);
});

test('clocktower: the mayor can cancel their own execution', async () => {
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Eve', nominate: 'Dan', vote: 'YES' }),
    new ScriptedAgent('Ben', { poison: 'Eve', nominate: 'Dan', vote: 'YES' }),
    new ScriptedAgent('Cat', { master: 'Ann', nominate: 'Dan', vote: 'YES' }),
    new ScriptedAgent('Dan', { nominate: 'Dan', vote: 'YES', cancel: 'CANCEL' }),
    new ScriptedAgent('Eve'),
  ];
  const recorder = new MemoryRecorder();
  const engine = new ClocktowerEngine(tableConfig('clocktower', FIVE, { max_rounds: 1 }), { agents: agentsByName(agents), recorder });
  await engine.start();

  assert.equal(engine.roster.isAlive('Dan'), true);
  assert.ok(contents(recorder.entries, 'ACTION').includes('Dan cancels their own execution.'));
  const tally = recorder.entries.find(e => e.metadata?.kind === 'tally');
  assert.equal(tally?.metadata?.result, 'cancelled');
});

const SLAYER_TABLE = { Ann: 'imp', Ben: 'poisoner', Cat: 'slayer', Dan: 'chef', Eve: 'monk' };

test('clocktower: a sober slayer kills the imp', async () => {
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Dan' }),
    new ScriptedAgent('Ben', { poison: 'Dan' }),
    new ScriptedAgent('Cat', { slay: 'Ann' }),
    new ScriptedAgent('Dan'),
    new ScriptedAgent('Eve', { protect: 'Cat' }),
  ];
  const engine = new ClocktowerEngine(tableConfig('clocktower', SLAYER_TABLE), { agents: agentsByName(agents), recorder: new MemoryRecorder() });
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Good', reason: 'The Imp is dead.', forced: false });
  assert.deepEqual(engine.state.counters, { round: 1, night: 1, day: 1 });
  assert.deepEqual(agents[2].requestsOf('slay')[0].options, ['Ann', 'Ben', 'Eve', 'NONE']);
});

test('clocktower: poison wears off at dawn, so a slayer poisoned overnight still kills the imp', async () => {
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Dan', vote: 'NO' }),
    new ScriptedAgent('Ben', { poison: 'Cat', vote: 'NO' }),
    new ScriptedAgent('Cat', { slay: 'Ann', vote: 'NO' }),
    new ScriptedAgent('Dan'),
    new ScriptedAgent('Eve', { protect: 'Cat', vote: 'NO' }),
  ];
  const recorder = new MemoryRecorder();
  const engine = new ClocktowerEngine(tableConfig('clocktower', SLAYER_TABLE, { max_rounds: 1 }), {
    agents: agentsByName(agents),
    recorder,
  });
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Good', reason: 'The Imp is dead.', forced: false });
  assert.equal(engine.roster.require('Cat').flags.abilityUsed, true);
  assert.equal(contents(recorder.entries, 'SYSTEM').includes('Nothing happens.'), false);
});

test('clocktower: the ravenkeeper learns a false role for a poisoned player', async () => {
  const table = { Ann: 'imp', Ben: 'poisoner', Cat: 'ravenkeeper', Dan: 'empath', Eve: 'chef' };
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Cat' }),
    new ScriptedAgent('Ben', { poison: 'Dan' }),
    new ScriptedAgent('Cat', { death_trigger: 'Dan' }),
    new ScriptedAgent('Dan'),
    new ScriptedAgent('Eve'),
  ];
  const engine = new ClocktowerEngine(tableConfig('clocktower', table, { max_rounds: 1 }), {
    agents: agentsByName(agents),
    recorder: new MemoryRecorder(),
  });
  await engine.start();

  const [reveal] = engine.knowledge.factsFor('Cat').filter(f => f.kind === 'death_trigger');
  assert.equal(reveal.reliable, false);
  assert.match(reveal.text, /^Dan is the /);
  assert.notEqual(reveal.text, 'Dan is the empath.');

  const [chef] = engine.knowledge.factsFor('Eve').filter(f => f.kind === 'sense');
  assert.equal(chef.reliable, true);
  assert.equal(chef.text, 'There are 1 pairs of evil players sitting together.');
});

test('clocktower: a fortune teller checking a poisoned demon is told NO', async () => {
  const table = { Ann: 'imp', Ben: 'poisoner', Cat: 'fortune_teller', Dan: 'chef', Eve: 'monk' };
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Dan' }),
    new ScriptedAgent('Ben', { poison: 'Ann' }),
    new ScriptedAgent('Cat', { sense: ['Ann', 'Eve'] }),
    new ScriptedAgent('Dan'),
    new ScriptedAgent('Eve', { protect: 'Cat' }),
  ];
  const engine = new ClocktowerEngine(tableConfig('clocktower', table, { max_rounds: 1 }), {
    agents: agentsByName(agents),
    recorder: new MemoryRecorder(),
  });
  await engine.start();

  const [reading] = engine.knowledge.factsFor('Cat').filter(f => f.kind === 'sense');
  assert.equal(reading.text, 'NO: neither Ann nor Eve is the Demon.');
  assert.equal(reading.reliable, false);
  // The poisoned imp's kill does nothing.
  assert.equal(engine.nightDeaths.length, 0);
});

async function empathReading(poisonTarget: string) {
  const table = { Ann: 'imp', Ben: 'poisoner', Cat: 'empath', Dan: 'monk', Eve: 'chef' };
  const agents = [
    new ScriptedAgent('Ann', { kill: 'Eve' }),
    new ScriptedAgent('Ben', { poison: poisonTarget }),
    new ScriptedAgent('Cat'),
    new ScriptedAgent('Dan', { protect: 'Cat' }),
    new ScriptedAgent('Eve'),
  ];
  const engine = new ClocktowerEngine(tableConfig('clocktower', table, { max_rounds: 1 }), {
    agents: agentsByName(agents),
    recorder: new MemoryRecorder(),
  });
  await engine.start();
  const [reading] = engine.knowledge.factsFor('Cat').filter(f => f.kind === 'sense');
  return reading;
}

test('clocktower: the empath reading is spoiled by a poisoned neighbour only', async () => {
  // Cat sits between Ben (evil) and Dan.
  const spoiled = await empathReading('Dan');
  assert.equal(spoiled.reliable, false);
  assert.notEqual(spoiled.data?.count, 1);

  const sober = await empathReading('Ann');
  assert.equal(sober.reliable, true);
  assert.equal(sober.text, '1 of your alive neighbours are evil.');
});
