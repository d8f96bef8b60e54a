import type { GameConfig, GameOutcome } from '../../types.js';
import { GameEngine, type EngineOptions } from '../../engine/gameEngine.js';
import { PhaseMachine } from '../../engine/phaseMachine.js';
import { WinEvaluator } from '../../engine/winEvaluator.js';
import { Deck } from '../../engine/deck.js';
import { FailureTracker } from '../../engine/tracker.js';
import type { VoteRecord } from '../../engine/records.js';
import {
  FASCIST_POLICIES,
  LIBERAL_POLICIES,
  secretHitlerRoleTable,
  type Policy,
  type SecretHitlerRole,
  type SecretHitlerTeam,
} from './roles.js';
import { SecretHitlerRoundPhase } from './roundPhase.js';

export type SecretHitlerWinner = SecretHitlerTeam;

export const ELECTION_TRACKER_LIMIT = 3;
export const LIBERAL_POLICIES_TO_WIN = 5;
export const FASCIST_POLICIES_TO_WIN = 6;
export const HITLER_ZONE = 3;

export interface PolicyBoard {
  liberal: number;
  fascist: number;
}

const secretHitlerWins = new WinEvaluator<SecretHitlerEngine, SecretHitlerWinner>(
  [
    {
      name: 'hitler elected',
      check: g => (g.hitlerElected ? { winner: 'Fascists', reason: `Hitler was elected Chancellor after ${HITLER_ZONE} Fascist policies.` } : null),
    },
    {
      name: 'hitler executed',
      check: g => (g.roster.withRole('hitler').length === 0 ? { winner: 'Liberals', reason: 'Hitler was executed.' } : null),
    },
    {
      name: 'liberal board',
      check: g =>
        g.board.liberal >= LIBERAL_POLICIES_TO_WIN ? { winner: 'Liberals', reason: `${LIBERAL_POLICIES_TO_WIN} Liberal policies enacted.` } : null,
    },
    {
      name: 'fascist board',
      check: g =>
        g.board.fascist >= FASCIST_POLICIES_TO_WIN ? { winner: 'Fascists', reason: `${FASCIST_POLICIES_TO_WIN} Fascist policies enacted.` } : null,
    },
  ],
  g =>
    g.board.fascist > g.board.liberal
      ? { winner: 'Fascists', reason: `More Fascist policies (${g.board.fascist}-${g.board.liberal}).` }
      : { winner: 'Liberals', reason: `Liberal policies hold (${g.board.liberal}-${g.board.fascist}).` }
);

export class SecretHitlerEngine extends GameEngine<SecretHitlerRole, SecretHitlerTeam, SecretHitlerWinner> {
  readonly deck: Deck<Policy>;
  readonly tracker = new FailureTracker(ELECTION_TRACKER_LIMIT);
  readonly board: PolicyBoard = { liberal: 0, fascist: 0 };
  readonly governments: VoteRecord[] = [];
  // Policies in a president's or chancellor's hand mid-session.
  hand: Policy[] = [];
  lastElected: { president?: string; chancellor?: string } = {};
  hitlerElected = false;
  // Seat of the last president in regular rotation; special elections do not move it.
  presidentSeat = -1;
  specialPresident?: string;
  readonly investigated: Set<string> = new Set();

  constructor(config: GameConfig, options: EngineOptions) {
    super(config, secretHitlerRoleTable, options);
    this.deck = new Deck<Policy>(
      [...new Array<Policy>(LIBERAL_POLICIES).fill('Liberal'), ...new Array<Policy>(FASCIST_POLICIES).fill('Fascist')],
      this.rng
    );
  }

  checkWin(): Readonly<GameOutcome<SecretHitlerWinner>> | null {
    return secretHitlerWins.evaluate(this.state, this);
  }

  forceWin(cause: string): Readonly<GameOutcome<SecretHitlerWinner>> {
    return secretHitlerWins.force(this.state, this, cause);
  }

  /** Every policy card is in exactly one of these places. */
  policyCount(): number {
    return this.deck.size + this.deck.discardSize + this.board.liberal + this.board.fascist + this.hand.length;
  }

  protected boardSummary() {
    return {
      liberalPolicies: this.board.liberal,
      fascistPolicies: this.board.fascist,
      electionTracker: this.tracker.value,
      drawPile: this.deck.size,
      lastPresident: this.lastElected.president ?? 'none',
      lastChancellor: this.lastElected.chancellor ?? 'none',
    };
  }

  nextPresident(): string {
    if (this.specialPresident && this.roster.isAlive(this.specialPresident)) {
      const special = this.specialPresident;
      this.specialPresident = undefined;
      return special;
    }
    this.specialPresident = undefined;
    const next = this.roster.nextAlive(this.presidentSeat);
    if (!next) throw new Error('No alive player can be president');
    this.presidentSeat = next.seat;
    return next.name;
  }

  /**
   * Chancellor candidates under term limits. The last chancellor is always
   * barred; the last president too while six or fewer are alive. Limits
   * lapse when they would leave nobody.
   */
  chancellorCandidates(president: string): string[] {
    const others = this.aliveNames().filter(n => n !== president);
    const barred = new Set<string>();
    if (this.lastElected.chancellor) barred.add(this.lastElected.chancellor);
    if (this.roster.alive().length <= 6 && this.lastElected.president) barred.add(this.lastElected.president);
    const eligible = others.filter(n => !barred.has(n));
    return eligible.length > 0 ? eligible : others;
  }

  /** Enact a policy. Any enactment resets the election tracker. */
  enact(policy: Policy, how: string): void {
    if (policy === 'Liberal') this.board.liberal++;
    else this.board.fascist++;
    this.tracker.reset();
    this.recordPublic({
      type: 'GOVERNMENT',
      content: `${policy} policy enacted ${how}. Board: ${this.board.liberal} Liberal, ${this.board.fascist} Fascist.`,
      metadata: { kind: 'enact', result: policy },
    });
  }

  /**
   * One failed government (rejected vote or accepted veto). The third in a row
   * enacts the top policy with no power and clears term limits.
   */
  failGovernment(): void {
    const forced = this.tracker.recordFailure();
    this.recordPublic({
      type: 'GOVERNMENT',
      content: `Election tracker: ${this.tracker.value}/${this.tracker.threshold}.`,
      metadata: { kind: 'tracker', result: String(this.tracker.value) },
    });
    if (!forced) return;
    const [top] = this.deck.draw(1);
    this.enact(top, 'from the top of the deck');
    this.lastElected = {};
  }

  openGame(): void {
    const total = this.roster.all().length;
    const fascists = this.roster.all().filter(p => p.team === 'Fascists');
    this.beginGame(`${total - fascists.length} liberal, ${fascists.length - 1} fascist, 1 hitler`);

    const hitler = fascists.find(p => p.role === 'hitler');
    for (const p of fascists) {
      if (p.role === 'hitler') {
        if (total <= 6) {
          const others = fascists.filter(o => o.role !== 'hitler').map(o => o.name);
          this.learn(p.name, { kind: 'allies', text: `Your fellow fascist: ${others.join(', ')}.` });
        }
        continue;
      }
      const others = fascists.filter(o => o.role === 'fascist' && o.name !== p.name).map(o => o.name);
      this.learn(p.name, {
        kind: 'allies',
        text: `Hitler is ${hitler?.name ?? 'unknown'}.${others.length ? ` Other fascists: ${others.join(', ')}.` : ''}`,
      });
    }
  }

  async start(): Promise<Readonly<GameOutcome<SecretHitlerWinner>>> {
    this.openGame();
    return new PhaseMachine<SecretHitlerEngine, SecretHitlerWinner>(this, [new SecretHitlerRoundPhase()]).run();
  }
}
