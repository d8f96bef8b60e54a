import type { PhaseRunner } from '../../engine/phaseMachine.js';
import type { NightIntent } from '../../actions/types.js';
import { resolveNightActions } from '../../actions/resolver.js';
import { selectNominee, type Proposal } from '../../engine/voting.js';
import { formatList } from '../../utils.js';
import type { MafiaEngine } from './engine.js';

export class MafiaNightPhase implements PhaseRunner<MafiaEngine> {
  readonly name = 'night';
  readonly counter = 'night';

  async run(engine: MafiaEngine): Promise<void> {
    const night = engine.state.counters.night;
    const alive = engine.aliveNames();
    const mafia = engine.roster.withRole('mafia').map(p => p.name);
    const doctors = engine.roster.withRole('doctor').map(p => p.name);
    const detectives = engine.roster.withRole('detective').map(p => p.name);
    const killable = alive.filter(n => !engine.isMafia(n));

    const [killPicks, protectPicks, investigatePicks] = await Promise.all([
      Promise.all(
        mafia.map(actor =>
          engine.agentIO.decide(actor, {
            kind: 'kill',
            prompt: `Night ${night}. Mafia members: ${formatList(mafia)}. Choose ONE player for the Mafia to kill. The most-chosen target is attacked.`,
            options: killable,
          })
        )
      ),
      Promise.all(
        doctors.map(actor =>
          engine.agentIO.decide(actor, {
            kind: 'protect',
            prompt: `Night ${night}. You are the Doctor. Choose ONE player to protect tonight (you may choose yourself).`,
            options: alive,
          })
        )
      ),
      Promise.all(
        detectives.map(actor =>
          engine.agentIO.decide(actor, {
            kind: 'investigate',
            prompt: `Night ${night}. You are the Detective. Choose ONE player to investigate.`,
            options: alive.filter(n => n !== actor),
          })
        )
      ),
    ]);

    const intents: NightIntent[] = [];

    const proposals: Proposal[] = [];
    mafia.forEach((actor, i) => {
      const target = killPicks[i];
      if (target === null) return;
      proposals.push({ proposer: actor, target });
      engine.recordFaction('Mafia', { type: 'ACTION', player: actor, content: `wants to kill ${target}`, metadata: { kind: 'kill_vote', target } });
    });
    const chosen = selectNominee(proposals, engine.rng);
    if (chosen) {
      intents.push({ kind: 'kill', actor: chosen.nominator, target: chosen.target });
      engine.recordFaction('Mafia', {
        type: 'ACTION',
        player: chosen.nominator,
        content: `carries out the Mafia kill on ${chosen.target}`,
        metadata: { kind: 'kill', target: chosen.target },
      });
    }

    doctors.forEach((actor, i) => {
      const target = protectPicks[i];
      if (target === null) return;
      intents.push({ kind: 'protect', actor, target });
      engine.record({ type: 'ACTION', player: actor, content: `protects ${target}`, metadata: { kind: 'protect', target, visibility: 'private' } });
    });

    detectives.forEach((actor, i) => {
      const target = investigatePicks[i];
      if (target === null) return;
      intents.push({ kind: 'investigate', actor, target });
    });

    const resolved = resolveNightActions({
      intents,
      isEvil: name => engine.isMafia(name),
      killImmune: target => engine.isMafia(target),
    });

    for (const inv of resolved.investigations) {
      engine.learn(inv.actor, {
        kind: 'investigation',
        text: `Investigation result: ${inv.target} is ${inv.reportedEvil ? 'MAFIA' : 'NOT Mafia'}.`,
        reliable: inv.reliable,
        data: { target: inv.target, evil: inv.reportedEvil },
      });
    }

    engine.lastNightDeaths = [];
    for (const name of resolved.deaths) {
      if (engine.eliminate(name, 'killed in the night')) engine.lastNightDeaths.push(name);
    }
    if (engine.lastNightDeaths.length === 0) {
      engine.recordPublic({ type: 'SYSTEM', content: 'Nobody died last night.' });
    }
  }
}
