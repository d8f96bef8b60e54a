import type { PhaseRunner } from '../../engine/phaseMachine.js';
import { VoteRecord } from '../../engine/records.js';
import { runTableTalk } from '../../phases/tableTalk.js';
import { runNomination } from '../../phases/nomination.js';
import { runBallot } from '../../phases/ballot.js';
import { pickRandom } from '../../utils.js';
import type { Mood } from './roles.js';
import type { ParanoiaEngine } from './engine.js';

export interface Intel {
  secretSociety: boolean;
  mutantPower: boolean;
}

const NO_INTEL: Intel = { secretSociety: false, mutantPower: false };

/**
 * Who the Computer executes when an accusation reaches it. Secret
 * intelligence on the accused overrides a satisfied Computer's leniency.
 */
export function judge(mood: Mood, accuser: string, accused: string, intel: Intel = NO_INTEL): { executed: string; verdict: string } {
  if (mood === 'SATISFIED' && intel.secretSociety) {
    return { executed: accused, verdict: `SECRET INTELLIGENCE: ${accused.toUpperCase()} BELONGS TO A SECRET SOCIETY. GUILTY.` };
  }
  if (mood === 'SATISFIED' && intel.mutantPower) {
    return { executed: accused, verdict: `SECRET INTELLIGENCE: ${accused.toUpperCase()} HAS MUTANT POWERS. GUILTY.` };
  }
  switch (mood) {
    case 'ANGRY':
      return { executed: accused, verdict: 'THE COMPUTER IS ANGRY. SOMEONE MUST DIE.' };
    case 'SUSPICIOUS':
      return { executed: accused, verdict: 'SUSPICIOUS BEHAVIOUR DETECTED. GUILTY.' };
    case 'SATISFIED':
      return { executed: accuser, verdict: 'FALSE ACCUSATION IS TREASON.' };
  }
}

/**
 * Table talk, then an accusation. The accused is referred to the Computer
 * if the table agrees; the Computer's mood decides who dies.
 */
export class HearingPhase implements PhaseRunner<ParanoiaEngine> {
  readonly name = 'hearing';

  async run(engine: ParanoiaEngine): Promise<void> {
    const round = engine.state.counters.round;
    const executed = await this.hearing(engine, round);
    engine.updateMood(executed);
    engine.considerTermination();
  }

  private async hearing(engine: ParanoiaEngine, round: number): Promise<boolean> {
    await runTableTalk(engine, {
      prompt: `Treason hearing ${round}. The Computer is ${engine.mood}. Who sabotaged the mission?`,
    });

    const alive = engine.aliveNames();
    const nomination = await runNomination(engine, {
      proposers: alive,
      targetsFor: () => alive,
      prompt: () => `Accuse ONE player of treason.`,
    });
    if (!nomination) {
      engine.recordPublic({ type: 'SYSTEM', content: 'No accusation was made.' });
      return false;
    }

    const accused = nomination.target;
    const accuser = pickRandom(
      nomination.backers.filter(b => b !== accused),
      engine.rng
    );
    if (accuser === undefined) {
      const dismissed = new VoteRecord(round, accused, accused, alive);
      dismissed.finalize({ selfBlocked: true });
      engine.accusations.push(dismissed);
      engine.recordPublic({ type: 'SYSTEM', content: `Only ${accused} accused ${accused}. The accusation is dismissed.`, metadata: { kind: 'accusation', result: 'dismissed' } });
      return false;
    }

    engine.recordPublic({ type: 'ACTION', player: accuser, content: `accuses ${accused} of treason.`, metadata: { kind: 'accusation', target: accused } });

    const record = new VoteRecord(round, accuser, accused, alive);
    engine.accusations.push(record);
    const tally = await runBallot(engine, {
      record,
      voters: alive,
      labels: { approve: 'YES', reject: 'NO' },
      prompt: () => `${accuser} accuses ${accused}. Refer the case to the Computer? Vote YES or NO.`,
    });
    record.finalize();
    if (!tally.passed) {
      engine.recordPublic({ type: 'SYSTEM', content: `The referral failed (${tally.approve} YES of ${tally.eligible}).`, metadata: { kind: 'referral', result: 'failed' } });
      return false;
    }

    const { executed, verdict } = judge(engine.mood, accuser, accused, engine.intelOn(accused));
    engine.recordPublic({ type: 'SYSTEM', content: `THE COMPUTER JUDGES: ${verdict}`, metadata: { kind: 'judgement', target: executed } });
    return engine.eliminate(executed, 'executed by the Computer');
  }
}
