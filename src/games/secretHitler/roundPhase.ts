import type { PhaseRunner } from '../../engine/phaseMachine.js';
import { VoteRecord } from '../../engine/records.js';
import { runTableTalk } from '../../phases/tableTalk.js';
import { runNomination } from '../../phases/nomination.js';
import { runBallot } from '../../phases/ballot.js';
import { presidentialPower, type Policy } from './roles.js';
import { HITLER_ZONE, type SecretHitlerEngine } from './engine.js';

const VETO = 'VETO';
const VETO_UNLOCK = 5;

function policyOptions(hand: readonly Policy[]): Policy[] {
  return [...new Set(hand)];
}

function removeOne(hand: Policy[], policy: Policy): void {
  const i = hand.indexOf(policy);
  if (i >= 0) hand.splice(i, 1);
}

/** Nomination, table talk, election, then the legislative session and any presidential power. */
export class SecretHitlerRoundPhase implements PhaseRunner<SecretHitlerEngine> {
  readonly name = 'round';

  async run(engine: SecretHitlerEngine): Promise<void> {
    const round = engine.state.counters.round;
    const president = engine.nextPresident();
    engine.recordPublic({ type: 'GOVERNMENT', player: president, content: 'is President.', metadata: { kind: 'president' } });

    const nomination = await runNomination(engine, {
      proposers: [president],
      targetsFor: p => engine.chancellorCandidates(p),
      prompt: () => `Round ${round}. You are President. Nominate a Chancellor.`,
    });
    if (!nomination) {
      engine.recordPublic({ type: 'GOVERNMENT', content: 'No Chancellor could be nominated.' });
      engine.failGovernment();
      return;
    }
    const chancellor = nomination.target;

    await runTableTalk(engine, {
      prompt: `Round ${round}. President ${president} nominated ${chancellor} for Chancellor. Discuss before voting.`,
    });

    const alive = engine.aliveNames();
    const record = new VoteRecord(round, president, chancellor, alive);
    engine.governments.push(record);
    const tally = await runBallot(engine, {
      record,
      voters: alive,
      labels: { approve: 'JA', reject: 'NEIN' },
      prompt: () => `Round ${round}. Vote on the government: President ${president}, Chancellor ${chancellor}. JA or NEIN?`,
    });

    if (!tally.passed) {
      record.finalize();
      engine.recordPublic({ type: 'GOVERNMENT', content: `Government failed (${tally.approve} JA of ${tally.eligible}).`, metadata: { kind: 'election', result: 'failed' } });
      engine.failGovernment();
      return;
    }

    engine.recordPublic({ type: 'GOVERNMENT', content: `Government elected (${tally.approve} JA of ${tally.eligible}).`, metadata: { kind: 'election', result: 'passed' } });

    if (engine.board.fascist >= HITLER_ZONE) {
      if (engine.roster.require(chancellor).role === 'hitler') {
        record.finalize({ hitlerElected: true });
        engine.hitlerElected = true;
        engine.recordPublic({ type: 'GOVERNMENT', player: chancellor, content: 'is Hitler and has been elected Chancellor.', metadata: { kind: 'hitler_elected' } });
        return;
      }
      engine.recordPublic({ type: 'SYSTEM', content: `${chancellor} is confirmed not to be Hitler.` });
    }

    engine.lastElected = { president, chancellor };
    const vetoed = await this.legislate(engine, president, chancellor);
    record.finalize({ vetoed });
  }

  /** Returns true when the agenda was vetoed. */
  private async legislate(engine: SecretHitlerEngine, president: string, chancellor: string): Promise<boolean> {
    engine.hand = engine.deck.draw(3);
    engine.learn(president, { kind: 'draw', text: `You drew: ${engine.hand.join(', ')}.` });

    const presidentDiscard = await engine.agentIO.decide(president, {
      kind: 'discard',
      prompt: `You drew ${engine.hand.join(', ')}. Choose the policy type to DISCARD; the other two go to ${chancellor}.`,
      options: policyOptions(engine.hand),
    });
    if (presidentDiscard) {
      removeOne(engine.hand, presidentDiscard);
      engine.deck.discard(presidentDiscard);
    }
    engine.learn(chancellor, { kind: 'draw', text: `President ${president} passed you: ${engine.hand.join(', ')}.` });

    const vetoAvailable = engine.board.fascist >= VETO_UNLOCK;
    const chancellorChoice = await engine.agentIO.decide<string>(chancellor, {
      kind: 'discard',
      prompt: `You hold ${engine.hand.join(', ')}. Choose the policy type to DISCARD; the other is enacted.${vetoAvailable ? ` Or propose ${VETO}.` : ''}`,
      options: vetoAvailable ? [...policyOptions(engine.hand), VETO] : policyOptions(engine.hand),
    });

    let discard = policyOptions(engine.hand).find(p => p === chancellorChoice);
    if (chancellorChoice === VETO) {
      engine.recordPublic({ type: 'GOVERNMENT', player: chancellor, content: 'proposes a veto.', metadata: { kind: 'veto' } });
      const answer = await engine.agentIO.decide(president, {
        kind: 'veto',
        prompt: `Chancellor ${chancellor} proposes to veto this agenda. ACCEPT (both policies are discarded) or REJECT?`,
        options: ['ACCEPT', 'REJECT'],
      });
      if (answer === 'ACCEPT') {
        engine.recordPublic({ type: 'GOVERNMENT', player: president, content: 'accepts the veto. Both policies are discarded.', metadata: { kind: 'veto', result: 'accepted' } });
        engine.deck.discard(...engine.hand);
        engine.hand = [];
        engine.failGovernment();
        return true;
      }
      engine.recordPublic({ type: 'GOVERNMENT', player: president, content: 'rejects the veto.', metadata: { kind: 'veto', result: 'rejected' } });
      discard =
        (await engine.agentIO.decide(chancellor, {
          kind: 'discard',
          prompt: `The veto was rejected. You hold ${engine.hand.join(', ')}. Choose the policy type to DISCARD.`,
          options: policyOptions(engine.hand),
        })) ?? undefined;
    }

    if (discard) {
      removeOne(engine.hand, discard);
      engine.deck.discard(discard);
    }
    const [enacted] = engine.hand;
    engine.hand = [];
    engine.enact(enacted, `by President ${president} and Chancellor ${chancellor}`);

    if (enacted === 'Fascist') await this.usePower(engine, president);
    return false;
  }

  private async usePower(engine: SecretHitlerEngine, president: string): Promise<void> {
    const power = presidentialPower(engine.roster.all().length, engine.board.fascist);
    if (!power || engine.checkWin()) return;
    const others = engine.aliveNames().filter(n => n !== president);

    switch (power) {
      case 'peek': {
        const top = engine.deck.peek(3);
        engine.learn(president, { kind: 'peek', text: `The next three policies are: ${top.join(', ')}.` });
        engine.recordPublic({ type: 'GOVERNMENT', player: president, content: 'peeks at the top three policies.', metadata: { kind: 'peek' } });
        return;
      }
      case 'investigate': {
        const candidates = others.filter(n => !engine.investigated.has(n));
        const target = await engine.agentIO.decide(president, {
          kind: 'investigate',
          prompt: 'Choose ONE player whose party membership you will see.',
          options: candidates,
        });
        if (!target) return;
        engine.investigated.add(target);
        const party = engine.roster.require(target).team === 'Fascists' ? 'Fascist' : 'Liberal';
        engine.learn(president, { kind: 'investigation', text: `${target} is a member of the ${party} party.`, data: { target, party } });
        engine.recordPublic({ type: 'GOVERNMENT', player: president, content: `investigates ${target}.`, metadata: { kind: 'investigate', target } });
        return;
      }
      case 'special_election': {
        const target = await engine.agentIO.decide(president, {
          kind: 'special_election',
          prompt: 'Choose the next President (special election).',
          options: others,
        });
        if (!target) return;
        engine.specialPresident = target;
        engine.recordPublic({ type: 'GOVERNMENT', player: president, content: `calls a special election: ${target} will be the next President.`, metadata: { kind: 'special_election', target } });
        return;
      }
      case 'execute': {
        const target = await engine.agentIO.decide(president, { kind: 'execute', prompt: 'Choose ONE player to execute.', options: others });
        if (!target) return;
        const wasHitler = engine.roster.require(target).role === 'hitler';
        engine.eliminate(target, `executed by President ${president}`, wasHitler);
        return;
      }
    }
  }
}
