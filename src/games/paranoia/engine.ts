import type { GameConfig, GameOutcome } from '../../types.js';
import { GameEngine, type EngineOptions } from '../../engine/gameEngine.js';
import { PhaseMachine } from '../../engine/phaseMachine.js';
import { WinEvaluator } from '../../engine/winEvaluator.js';
import type { VoteRecord } from '../../engine/records.js';
import { pickRandom } from '../../utils.js';
import { MOODS, paranoiaRoleTable, type Mood, type ParanoiaRole, type ParanoiaTeam } from './roles.js';
import { MissionPhase } from './missionPhase.js';
import { HearingPhase, type Intel } from './hearingPhase.js';

export type ParanoiaWinner = ParanoiaTeam;

export const MISSIONS_TO_WIN = 3;

export interface MissionRecord {
  round: number;
  mission: string;
  leader: string;
  team: string[];
  sabotages: number;
  succeeded: boolean;
}

export interface Termination {
  chosen: string;
  winner: ParanoiaWinner;
}

const paranoiaWins = new WinEvaluator<ParanoiaEngine, ParanoiaWinner>(
  [
    {
      name: 'computer whim',
      check: g =>
        g.termination
          ? {
              winner: g.termination.winner,
              reason: `The Computer ended the game on a whim and named ${g.termination.chosen} (${g.termination.winner}) the winner.`,
            }
          : null,
    },
    {
      name: 'traitors eliminated',
      check: g => (g.roster.aliveOnTeam('Traitors').length === 0 ? { winner: 'Loyalists', reason: 'Every traitor has been executed.' } : null),
    },
    {
      name: 'traitor parity',
      check: g => {
        const traitors = g.roster.aliveOnTeam('Traitors').length;
        const loyalists = g.roster.aliveOnTeam('Loyalists').length;
        return traitors >= loyalists ? { winner: 'Traitors', reason: `Traitors (${traitors}) match or outnumber loyalists (${loyalists}).` } : null;
      },
    },
    {
      name: 'sabotage',
      check: g => (g.missions.failures >= MISSIONS_TO_WIN ? { winner: 'Traitors', reason: `${MISSIONS_TO_WIN} missions were sabotaged.` } : null),
    },
    {
      name: 'service',
      check: g => (g.missions.successes >= MISSIONS_TO_WIN ? { winner: 'Loyalists', reason: `${MISSIONS_TO_WIN} missions succeeded.` } : null),
    },
  ],
  g =>
    g.missions.successes >= g.missions.failures
      ? { winner: 'Loyalists', reason: `Missions ${g.missions.successes}-${g.missions.failures} in the Computer's favour.` }
      : { winner: 'Traitors', reason: `Missions ${g.missions.failures}-${g.missions.successes} sabotaged.` }
);

export class ParanoiaEngine extends GameEngine<ParanoiaRole, ParanoiaTeam, ParanoiaWinner> {
  mood: Mood = 'SATISFIED';
  readonly missions = { successes: 0, failures: 0 };
  readonly missionHistory: MissionRecord[] = [];
  lastMissionFailed = false;
  termination?: Termination;
  leaderSeat = -1;
  readonly accusations: VoteRecord[] = [];

  constructor(config: GameConfig, options: EngineOptions) {
    super(config, paranoiaRoleTable, options);
  }

  checkWin(): Readonly<GameOutcome<ParanoiaWinner>> | null {
    return paranoiaWins.evaluate(this.state, this);
  }

  forceWin(cause: string): Readonly<GameOutcome<ParanoiaWinner>> {
    return paranoiaWins.force(this.state, this, cause);
  }

  protected boardSummary() {
    return {
      computerMood: this.mood,
      missionsSucceeded: this.missions.successes,
      missionsFailed: this.missions.failures,
    };
  }

  nextLeader(): string {
    const next = this.roster.nextAlive(this.leaderSeat);
    if (!next) throw new Error('No alive player can lead a mission');
    this.leaderSeat = next.seat;
    return next.name;
  }

  /** What the Computer holds against a player: secret society membership, mutant power. */
  intelOn(name: string): Intel {
    const { flags } = this.roster.require(name);
    return { secretSociety: flags.secretSociety ?? false, mutantPower: flags.mutantPower ?? false };
  }

  /**
   * The Computer may end the game after any phase. It names a random
   * survivor, whose team wins.
   */
  considerTermination(): void {
    const chance = this.config.paranoia.termination_chance;
    if (this.termination || this.checkWin() || chance <= 0 || this.rng() >= chance) return;
    const survivor = pickRandom(this.roster.alive(), this.rng);
    if (!survivor) return;
    this.termination = { chosen: survivor.name, winner: survivor.team };
    this.recordPublic({
      type: 'SYSTEM',
      content: `THE COMPUTER IS BORED. THIS OPERATION IS TERMINATED. ${survivor.name.toUpperCase()} IS DECLARED THE WINNER.`,
      metadata: { kind: 'termination', target: survivor.name },
    });
  }

  /** Executions please the Computer, failed missions worry it, otherwise it is unpredictable. */
  updateMood(executed: boolean): void {
    const previous = this.mood;
    if (executed) this.mood = 'SATISFIED';
    else if (this.lastMissionFailed) this.mood = 'SUSPICIOUS';
    else this.mood = pickRandom(MOODS, this.rng) ?? 'SATISFIED';
    if (this.mood !== previous) {
      this.recordPublic({ type: 'SYSTEM', content: `THE COMPUTER IS NOW ${this.mood}.`, metadata: { kind: 'mood', result: this.mood } });
    }
  }

  /** Each player may secretly belong to a secret society and may have a mutant power. Only they know. */
  private dealIntel(): void {
    const chance = this.config.paranoia.intel_chance;
    if (chance <= 0) return;
    for (const p of this.roster.all()) {
      p.flags.secretSociety = this.rng() < chance;
      p.flags.mutantPower = this.rng() < chance;
      if (p.flags.secretSociety) this.learn(p.name, { kind: 'secret', text: 'You secretly belong to a secret society. This is treason.' });
      if (p.flags.mutantPower) this.learn(p.name, { kind: 'secret', text: 'You have an unregistered mutant power. This is treason.' });
    }
  }

  async start(): Promise<Readonly<GameOutcome<ParanoiaWinner>>> {
    const traitors = this.roster.all().filter(p => p.team === 'Traitors');
    this.beginGame(`${traitors.length} traitor(s), ${this.roster.all().length - traitors.length} loyalist(s)`);
    this.dealIntel();
    for (const t of traitors) {
      const others = traitors.filter(o => o.name !== t.name).map(o => o.name);
      this.learn(t.name, {
        kind: 'allies',
        text: others.length ? `Your fellow traitors: ${others.join(', ')}.` : 'You are the only traitor.',
      });
    }
    return new PhaseMachine<ParanoiaEngine, ParanoiaWinner>(this, [new MissionPhase(), new HearingPhase()]).run();
  }
}
