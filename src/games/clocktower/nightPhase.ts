import type { PhaseRunner } from '../../engine/phaseMachine.js';
import type { NightIntent } from '../../actions/types.js';
import { resolveNightActions } from '../../actions/resolver.js';
import { countEvilNeighbors, evilPairs, fabricateNumber, fabricateRole, isReliable } from '../../actions/information.js';
import { CLOCKTOWER_ROLES, isEvilRole } from './roles.js';
import type { ClocktowerEngine } from './engine.js';

/**
 * Every night, first night included. Decisions that do not depend on the
 * outcome are gathered together; the Ravenkeeper asks only after the kill
 * has resolved. Information roles act last. Poison lasts for this night only.
 */
export class ClocktowerNightPhase implements PhaseRunner<ClocktowerEngine> {
  readonly name = 'night';
  readonly counter = 'night';

  async run(engine: ClocktowerEngine): Promise<void> {
    const night = engine.state.counters.night;
    const alive = engine.aliveNames();
    const others = (actor: string) => alive.filter(n => n !== actor);
    const holder = (role: 'poisoner' | 'monk' | 'imp' | 'butler' | 'fortune_teller') => engine.roster.withRole(role)[0]?.name;

    const poisoner = holder('poisoner');
    const monk = holder('monk');
    const imp = holder('imp');
    const butler = holder('butler');
    const fortuneTeller = holder('fortune_teller');

    const [poisonTarget, protectTarget, killTarget, master, pair] = await Promise.all([
      poisoner
        ? engine.agentIO.decide(poisoner, { kind: 'poison', prompt: `Night ${night}. Choose ONE player to poison tonight.`, options: alive })
        : null,
      monk
        ? engine.agentIO.decide(monk, { kind: 'protect', prompt: `Night ${night}. Choose ONE other player to protect from the Demon.`, options: others(monk) })
        : null,
      imp ? engine.agentIO.decide(imp, { kind: 'kill', prompt: `Night ${night}. Choose ONE player to kill.`, options: others(imp) }) : null,
      butler
        ? engine.agentIO.decide(butler, {
            kind: 'master',
            prompt: `Night ${night}. Choose your master. Tomorrow your YES vote only counts if your master votes YES.`,
            options: others(butler),
          })
        : null,
      fortuneTeller
        ? engine.agentIO.decideMany(fortuneTeller, {
            kind: 'sense',
            prompt: `Night ${night}. Choose TWO players. You learn whether either of them is the Demon.`,
            options: alive,
            min: 2,
            max: 2,
          })
        : [],
    ]);

    const intents: NightIntent[] = [];
    if (poisoner && poisonTarget) intents.push({ kind: 'poison', actor: poisoner, target: poisonTarget });
    if (monk && protectTarget) intents.push({ kind: 'protect', actor: monk, target: protectTarget });
    if (imp && killTarget) intents.push({ kind: 'kill', actor: imp, target: killTarget });
    for (const intent of intents) {
      engine.record({
        type: 'ACTION',
        player: intent.actor,
        content: `${intent.kind}s ${intent.target}`,
        metadata: { kind: intent.kind, target: intent.target, visibility: 'private' },
      });
    }

    if (butler && master) {
      engine.roster.require(butler).flags.master = master;
      engine.learn(butler, { kind: 'master', text: `Your master for tomorrow is ${master}.` });
    }

    const resolved = resolveNightActions({ intents, isEvil: name => engine.isEvil(name) });
    const poisoned = resolved.poisoned;

    // eliminate
    engine.nightDeaths = [];
    for (const name of resolved.deaths) {
      if (engine.eliminate(name, 'killed by the Demon')) engine.nightDeaths.push(name);
    }
    if (engine.nightDeaths.length === 0) engine.recordPublic({ type: 'SYSTEM', content: 'Nobody died tonight.' });

    // death_trigger
    const ravenkeeper = engine.roster.all().find(p => p.role === 'ravenkeeper' && engine.nightDeaths.includes(p.name));
    if (ravenkeeper) {
      const choice = await engine.agentIO.decide(ravenkeeper.name, {
        kind: 'death_trigger',
        prompt: `You were killed tonight. Choose ONE player to learn their role.`,
        options: engine.roster.all().map(p => p.name).filter(n => n !== ravenkeeper.name),
      });
      if (choice) {
        const truth = engine.roster.require(choice).role;
        const reliable = isReliable(ravenkeeper.name, [choice], poisoned);
        const shown = reliable ? truth : fabricateRole(truth, CLOCKTOWER_ROLES, engine.rng);
        engine.learn(ravenkeeper.name, { kind: 'death_trigger', text: `${choice} is the ${shown}.`, reliable, data: { target: choice } });
      }
    }

    // retrospective: only a day execution from the day just gone counts
    const undertaker = engine.roster.withRole('undertaker')[0];
    const executed = engine.lastExecution;
    if (undertaker && night > 1 && executed && executed.day === night - 1) {
      const reliable = isReliable(undertaker.name, [executed.name], poisoned);
      const shown = reliable ? executed.role : fabricateRole(executed.role, CLOCKTOWER_ROLES, engine.rng);
      engine.learn(undertaker.name, {
        kind: 'retrospective',
        text: `Yesterday's executed player, ${executed.name}, was the ${shown}.`,
        reliable,
        data: { target: executed.name },
      });
    }

    // sense
    const empath = engine.roster.withRole('empath')[0];
    if (empath) {
      const truth = countEvilNeighbors(engine.roster, empath.name, isEvilRole);
      const neighbours = engine.roster.aliveNeighbors(empath.name).map(p => p.name);
      const reliable = isReliable(empath.name, neighbours, poisoned);
      const shown = reliable ? truth : fabricateNumber(truth, 0, 2, engine.rng);
      engine.learn(empath.name, { kind: 'sense', text: `${shown} of your alive neighbours are evil.`, reliable, data: { count: shown } });
    }

    const chef = engine.roster.withRole('chef')[0];
    if (chef && night === 1) {
      const pairs = evilPairs(engine.roster, isEvilRole);
      const truth = pairs.length;
      const reliable = isReliable(chef.name, pairs.flat(), poisoned);
      const shown = reliable ? truth : fabricateNumber(truth, 0, 1, engine.rng);
      engine.learn(chef.name, { kind: 'sense', text: `There are ${shown} pairs of evil players sitting together.`, reliable, data: { count: shown } });
    }

    if (fortuneTeller && engine.roster.isAlive(fortuneTeller) && pair.length === 2) {
      const truth = pair.some(n => engine.isDemon(n));
      const reliable = isReliable(fortuneTeller, pair, poisoned);
      const shown = reliable ? truth : !truth;
      engine.learn(fortuneTeller, {
        kind: 'sense',
        text: shown ? `YES: one of ${pair[0]} and ${pair[1]} is the Demon.` : `NO: neither ${pair[0]} nor ${pair[1]} is the Demon.`,
        reliable,
        data: { pair: pair.join(','), demon: shown },
      });
    }
  }
}
