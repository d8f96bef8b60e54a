import type { PhaseRunner } from '../../engine/phaseMachine.js';
import { VoteRecord } from '../../engine/records.js';
import { runTableTalk } from '../../phases/tableTalk.js';
import { runNomination } from '../../phases/nomination.js';
import { runBallot } from '../../phases/ballot.js';
import { formatList } from '../../utils.js';
import type { MafiaEngine } from './engine.js';

export class MafiaDayPhase implements PhaseRunner<MafiaEngine> {
  readonly name = 'day';
  readonly counter = 'day';

  async run(engine: MafiaEngine): Promise<void> {
    const day = engine.state.counters.day;
    const alive = engine.aliveNames();

    await runTableTalk(engine, {
      prompt: `Day ${day}. Died last night: ${formatList(engine.lastNightDeaths)}. Discuss who you suspect.`,
    });

    const nomination = await runNomination(engine, {
      proposers: alive,
      targetsFor: proposer => alive.filter(n => n !== proposer),
      prompt: () => `Day ${day}. Nominate ONE player to put on trial.`,
    });
    if (!nomination) {
      engine.recordPublic({ type: 'SYSTEM', content: 'No nomination was made today.' });
      return;
    }

    const { target, nominator } = nomination;
    engine.recordPublic({
      type: 'SYSTEM',
      content: `${target} is on trial (nominated by ${nominator}, ${nomination.votes} nomination(s)).`,
      metadata: { kind: 'trial', target },
    });

    const record = new VoteRecord(engine.state.counters.round, nominator, target, alive);
    const tally = await runBallot(engine, {
      record,
      voters: alive,
      labels: { approve: 'YES', reject: 'NO' },
      prompt: () => `Day ${day}. Should ${target} be eliminated? Vote YES or NO.`,
    });
    record.finalize();

    engine.recordPublic({
      type: 'SYSTEM',
      content: `Vote on ${target}: ${tally.approve} YES, ${tally.reject} NO of ${tally.eligible}. ${tally.passed ? 'Passed.' : 'Failed.'}`,
      metadata: { kind: 'tally', target, result: tally.passed ? 'passed' : 'failed' },
    });
    if (tally.passed) engine.eliminate(target, 'voted out');
  }
}
