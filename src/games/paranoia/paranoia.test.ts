import test from 'node:test';
import assert from 'node:assert/strict';
import { ParanoiaEngine } from './engine.js';
import { judge } from './hearingPhase.js';
import { announceMissionResult, missionTeamSize } from './missionPhase.js';
import { ScriptedAgent, type ScriptedAnswer } from '../../testing/scriptedAgent.js';
import { MemoryRecorder, agentsByName, contents, tableConfig } from '../../testing/harness.js';
import type { DecisionKind } from '../../agent.js';
import type { GameConfigInput } from '../../types.js';

const FOUR = { Ann: 'traitor', Ben: 'loyalist', Cat: 'loyalist', Dan: 'loyalist' };

type Script = Partial<Record<DecisionKind, ScriptedAnswer>>;

// No whims and no secrets unless a test asks for them.
const CALM = { termination_chance: 0, intel_chance: 0 };

function setup(scripts: Record<string, Script>, overrides: Partial<GameConfigInput> = {}) {
  const agents = Object.keys(FOUR).map(name => new ScriptedAgent(name, scripts[name] ?? {}));
  const recorder = new MemoryRecorder();
  const config = tableConfig('paranoia', FOUR, { paranoia: CALM, ...overrides });
  const engine = new ParanoiaEngine(config, { agents: agentsByName(agents), recorder });
  return { engine, agents, recorder };
}

test('judge: the mood decides who dies', () => {
  assert.equal(judge('ANGRY', 'Ben', 'Ann').executed, 'Ann');
  assert.equal(judge('SUSPICIOUS', 'Ben', 'Ann').executed, 'Ann');
  assert.equal(judge('SATISFIED', 'Ben', 'Ann').executed, 'Ben');
});

test('judge: secret intelligence on the accused overrides a satisfied Computer', () => {
  assert.deepEqual(judge('SATISFIED', 'Ben', 'Ann', { secretSociety: true, mutantPower: false }), {
    executed: 'Ann',
    verdict: 'SECRET INTELLIGENCE: ANN BELONGS TO A SECRET SOCIETY. GUILTY.',
  });
  assert.deepEqual(judge('SATISFIED', 'Ben', 'Ann', { secretSociety: false, mutantPower: true }), {
    executed: 'Ann',
    verdict: 'SECRET INTELLIGENCE: ANN HAS MUTANT POWERS. GUILTY.',
  });
  assert.equal(judge('ANGRY', 'Ben', 'Ann', { secretSociety: true, mutantPower: true }).executed, 'Ann');
});

test('announceMissionResult', () => {
  assert.equal(
    announceMissionResult(true, 0),
    'MISSION SUCCESS! The Computer is pleased with your loyalty. But remain vigilant for traitors. 0 sabotage attempt(s).'
  );
  assert.equal(announceMissionResult(false, 2), 'MISSION FAILURE! The Computer is displeased. Someone is clearly a traitor. 2 sabotage attempt(s).');
});

test('missionTeamSize: half the table, at least two', () => {
  assert.equal(missionTeamSize(1), 1);
  assert.equal(missionTeamSize(3), 2);
  assert.equal(missionTeamSize(4), 2);
  assert.equal(missionTeamSize(5), 3);
  assert.equal(missionTeamSize(8), 4);
});

test('paranoia: an accusation only its target backs is dismissed', async () => {
  const self: Script = { nominate: req => req.actor };
  const { engine, recorder } = setup({ Ann: { ...self, mission: 'SABOTAGE' }, Ben: self, Cat: self, Dan: self }, { max_rounds: 1 });
  const outcome = await engine.start();

  assert.equal(engine.accusations.length, 1);
  assert.equal(engine.accusations[0].flags.selfBlocked, true);
  assert.equal(engine.roster.aliveNames().length, 4);
  assert.equal(engine.mood, 'SUSPICIOUS');
  assert.ok(contents(recorder.entries, 'SYSTEM').includes('THE COMPUTER IS NOW SUSPICIOUS.'));
  assert.ok(contents(recorder.entries, 'SYSTEM').includes(announceMissionResult(false, 1)));
  assert.equal(engine.missionHistory.length, 1);
  assert.deepEqual(
    { leader: engine.missionHistory[0].leader, team: engine.missionHistory[0].team, sabotages: engine.missionHistory[0].sabotages },
    { leader: 'Ann', team: ['Ann', 'Ben'], sabotages: 1 }
  );
  assert.deepEqual(outcome, { winner: 'Traitors', reason: 'Round limit of 1 reached; Missions 1-0 sabotaged.', forced: true });
});

test('paranoia: a satisfied Computer executes the accuser', async () => {
  const accuse: Script = { nominate: 'Ann' };
  const { engine, recorder } = setup({ Ann: { nominate: 'Ben' }, Ben: accuse, Cat: accuse, Dan: accuse }, { max_rounds: 1 });
  const outcome = await engine.start();

  const accusation = recorder.entries.find(e => e.metadata?.kind === 'accusation');
  const accuser = accusation?.player;
  assert.ok(accuser === 'Ben' || accuser === 'Cat' || accuser === 'Dan');
  assert.equal(engine.roster.isAlive('Ann'), true);
  assert.deepEqual(engine.roster.deadNames(), [accuser]);
  assert.equal(engine.missions.successes, 1);
  assert.deepEqual(outcome, { winner: 'Loyalists', reason: "Round limit of 1 reached; Missions 1-0 in the Computer's favour.", forced: true });
});

test('paranoia: an angry Computer executes the accused traitor', async () => {
  const accuse: Script = { nominate: 'Ann' };
  const { engine } = setup({ Ann: { nominate: 'Ben' }, Ben: accuse, Cat: accuse, Dan: accuse });
  engine.mood = 'ANGRY';
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Loyalists', reason: 'Every traitor has been executed.', forced: false });
  assert.deepEqual(engine.roster.deadNames(), ['Ann']);
  assert.equal(engine.mood, 'SATISFIED');
});

test('paranoia: three sabotaged missions win for the traitors', async () => {
  const quiet: Script = { vote: 'NO' };
  const { engine, agents } = setup({ Ann: { vote: 'NO', mission: 'SABOTAGE' }, Ben: quiet, Cat: quiet, Dan: quiet });
  const outcome = await engine.start();

  assert.deepEqual(outcome, { winner: 'Traitors', reason: '3 missions were sabotaged.', forced: false });
  assert.equal(engine.missions.failures, 3);
  assert.deepEqual(
    ['Ann', 'Ben', 'Cat'].map(name => agents.find(a => a.name === name)?.requestsOf('team').length),
    [1, 1, 1]
  );
  assert.equal(engine.roster.aliveNames().length, 4);
});

test('paranoia: intelligence on the accused sends them to the vats even when the Computer is satisfied', async () => {
  const accuse: Script = { nominate: 'Ann' };
  const { engine } = setup({ Ann: { nominate: 'Ben' }, Ben: accuse, Cat: accuse, Dan: accuse }, { paranoia: { termination_chance: 0, intel_chance: 1 } });
  const outcome = await engine.start();

  assert.deepEqual(engine.intelOn('Ann'), { secretSociety: true, mutantPower: true });
  assert.equal(engine.knowledge.factsFor('Ann').filter(f => f.kind === 'secret').length, 2);
  assert.deepEqual(outcome, { winner: 'Loyalists', reason: 'Every traitor has been executed.', forced: false });
  assert.deepEqual(engine.roster.deadNames(), ['Ann']);
});

test('paranoia: the Computer can end the game on a whim', async () => {
  const { engine, recorder } = setup({}, { paranoia: { termination_chance: 1, intel_chance: 0 } });
  const outcome = await engine.start();

  const termination = engine.termination;
  assert.ok(termination);
  assert.equal(termination.winner, engine.roster.require(termination.chosen).team);
  assert.deepEqual(outcome, {
    winner: termination.winner,
    reason: `The Computer ended the game on a whim and named ${termination.chosen} (${termination.winner}) the winner.`,
    forced: false,
  });
  // Ended straight after the first mission, before any hearing.
  assert.equal(engine.missionHistory.length, 1);
  assert.equal(engine.missionHistory[0].succeeded, true);
  assert.deepEqual(engine.accusations, []);
  assert.equal(recorder.entries.filter(e => e.metadata?.kind === 'termination').length, 1);
});
