import type { PhaseRunner } from '../../engine/phaseMachine.js';
import { VoteRecord } from '../../engine/records.js';
import { runTableTalk } from '../../phases/tableTalk.js';
import { runNomination } from '../../phases/nomination.js';
import { runBallot } from '../../phases/ballot.js';
import { formatList } from '../../utils.js';
import type { ClocktowerEngine } from './engine.js';

const NO_SHOT = 'NONE';

export class ClocktowerDayPhase implements PhaseRunner<ClocktowerEngine> {
  readonly name = 'day';
  readonly counter = 'day';

  async run(engine: ClocktowerEngine): Promise<void> {
    const day = engine.state.counters.day;

    await runTableTalk(engine, {
      prompt: `Day ${day}. Died last night: ${formatList(engine.nightDeaths)}. Share what you know (or claim to know).`,
    });

    await this.slayerShot(engine, day);
    if (engine.checkWin()) return;

    const alive = engine.aliveNames();
    const nomination = await runNomination(engine, {
      proposers: alive,
      targetsFor: () => alive,
      prompt: () => `Day ${day}. Nominate ONE player for execution (yourself included).`,
    });
    if (!nomination) {
      engine.recordPublic({ type: 'SYSTEM', content: 'Nobody was nominated today.' });
      return;
    }

    const { target, nominator } = nomination;
    engine.recordPublic({ type: 'SYSTEM', content: `${nominator} nominates ${target} for execution.`, metadata: { kind: 'trial', target } });

    const record = new VoteRecord(engine.state.counters.round, nominator, target, alive);
    const tally = await runBallot(engine, {
      record,
      voters: alive,
      labels: { approve: 'YES', reject: 'NO' },
      prompt: () => `Day ${day}. Execute ${target}? Vote YES or NO.`,
      dependsOn: voter => {
        const p = engine.roster.require(voter);
        return p.role === 'butler' ? (p.flags.master ?? '') : undefined;
      },
    });

    let cancelled = false;
    if (tally.passed && engine.roster.require(target).role === 'mayor') {
      const choice = await engine.agentIO.decide(target, {
        kind: 'cancel',
        prompt: `You are the Mayor and the town voted to execute you. CANCEL the execution or ALLOW it?`,
        options: ['CANCEL', 'ALLOW'],
      });
      cancelled = choice === 'CANCEL';
      if (cancelled) engine.recordPublic({ type: 'ACTION', player: target, content: 'cancels their own execution.', metadata: { kind: 'cancel' } });
    }
    record.finalize({ cancelled });

    engine.recordPublic({
      type: 'SYSTEM',
      content: `Vote on ${target}: ${tally.approve} YES of ${tally.eligible}. ${tally.passed && !cancelled ? 'Executed.' : 'Not executed.'}`,
      metadata: { kind: 'tally', target, result: tally.passed ? (cancelled ? 'cancelled' : 'passed') : 'failed' },
    });

    if (tally.passed && !cancelled) {
      const { role } = engine.roster.require(target);
      if (engine.eliminate(target, 'executed')) engine.lastExecution = { name: target, role, day };
    }
  }

  /** One shot per game: if the target is the Imp, the Imp dies. */
  private async slayerShot(engine: ClocktowerEngine, day: number): Promise<void> {
    const slayer = engine.roster.withRole('slayer')[0];
    if (!slayer || slayer.flags.abilityUsed) return;

    const choice = await engine.agentIO.decide(slayer.name, {
      kind: 'slay',
      prompt: `Day ${day}. You may publicly shoot ONE player once per game; if they are the Demon they die. Choose ${NO_SHOT} to wait.`,
      options: [...engine.aliveNames().filter(n => n !== slayer.name), NO_SHOT],
      fallback: NO_SHOT,
    });
    if (!choice || choice === NO_SHOT) return;

    slayer.flags.abilityUsed = true;
    engine.recordPublic({ type: 'ACTION', player: slayer.name, content: `claims Slayer and shoots ${choice}.`, metadata: { kind: 'slay', target: choice } });
    if (engine.isDemon(choice)) {
      engine.eliminate(choice, 'slain by the Slayer');
    } else {
      engine.recordPublic({ type: 'SYSTEM', content: 'Nothing happens.' });
    }
  }
}
