import type { GameConfig, GameOutcome } from '../../types.js';
import { GameEngine, type EngineOptions } from '../../engine/gameEngine.js';
import { PhaseMachine } from '../../engine/phaseMachine.js';
import { WinEvaluator } from '../../engine/winEvaluator.js';
import { clocktowerRoleTable, isEvilRole, type ClocktowerRole, type ClocktowerTeam } from './roles.js';
import { ClocktowerNightPhase } from './nightPhase.js';
import { ClocktowerDayPhase } from './dayPhase.js';

export type ClocktowerWinner = ClocktowerTeam;

export interface ExecutionRecord {
  name: string;
  role: ClocktowerRole;
  day: number;
}

const clocktowerWins = new WinEvaluator<ClocktowerEngine, ClocktowerWinner>(
  [
    {
      name: 'demon dead',
      check: g => (g.roster.withRole('imp').length === 0 ? { winner: 'Good', reason: 'The Imp is dead.' } : null),
    },
    {
      name: 'two left',
      check: g =>
        g.roster.alive().length <= 2 ? { winner: 'Evil', reason: `Only ${g.roster.alive().length} players remain with the Imp alive.` } : null,
    },
  ],
  g =>
    g.roster.withRole('imp').length > 0
      ? { winner: 'Evil', reason: 'The Imp survived.' }
      : { winner: 'Good', reason: 'The Imp did not survive.' }
);

export class ClocktowerEngine extends GameEngine<ClocktowerRole, ClocktowerTeam, ClocktowerWinner> {
  // Set only by a day execution; night deaths never touch it.
  lastExecution?: ExecutionRecord;
  nightDeaths: string[] = [];

  constructor(config: GameConfig, options: EngineOptions) {
    super(config, clocktowerRoleTable, options);
  }

  isEvil(name: string): boolean {
    const p = this.roster.get(name);
    return p !== undefined && isEvilRole(p.role);
  }

  isDemon(name: string): boolean {
    return this.roster.get(name)?.role === 'imp';
  }

  checkWin(): Readonly<GameOutcome<ClocktowerWinner>> | null {
    return clocktowerWins.evaluate(this.state, this);
  }

  forceWin(cause: string): Readonly<GameOutcome<ClocktowerWinner>> {
    return clocktowerWins.force(this.state, this, cause);
  }

  protected boardSummary() {
    return {
      lastExecution: this.lastExecution ? `${this.lastExecution.name} (day ${this.lastExecution.day})` : 'none',
      diedLastNight: this.nightDeaths.join(', ') || 'none',
    };
  }

  /** Role facts plus the evil team's mutual knowledge. */
  openGame(): void {
    const rolesInPlay = this.roster
      .all()
      .map(p => p.role)
      .filter(r => !isEvilRole(r))
      .sort();
    this.beginGame(`imp, poisoner, ${rolesInPlay.join(', ')}`);

    const evil = this.roster.all().filter(p => isEvilRole(p.role));
    for (const p of evil) {
      const partners = evil.filter(o => o.name !== p.name).map(o => `${o.name} (${o.role})`);
      this.learn(p.name, { kind: 'allies', text: `Your evil partner: ${partners.join(', ')}.` });
    }
  }

  async start(): Promise<Readonly<GameOutcome<ClocktowerWinner>>> {
    this.openGame();
    return new PhaseMachine<ClocktowerEngine, ClocktowerWinner>(this, [new ClocktowerNightPhase(), new ClocktowerDayPhase()]).run();
  }
}
