import type { GameConfig, GameOutcome } from '../../types.js';
import { GameEngine, type EngineOptions } from '../../engine/gameEngine.js';
import { PhaseMachine } from '../../engine/phaseMachine.js';
import { WinEvaluator } from '../../engine/winEvaluator.js';
import { mafiaRoleTable, type MafiaRole, type MafiaTeam } from './roles.js';
import { MafiaNightPhase } from './nightPhase.js';
import { MafiaDayPhase } from './dayPhase.js';

export type MafiaWinner = MafiaTeam;

const mafiaWins = new WinEvaluator<MafiaEngine, MafiaWinner>(
  [
    {
      name: 'mafia eliminated',
      check: g => (g.roster.aliveOnTeam('Mafia').length === 0 ? { winner: 'Town', reason: 'All Mafia have been eliminated.' } : null),
    },
    {
      name: 'mafia parity',
      check: g => {
        const mafia = g.roster.aliveOnTeam('Mafia').length;
        const town = g.roster.aliveOnTeam('Town').length;
        return mafia >= town ? { winner: 'Mafia', reason: `Mafia (${mafia}) match or outnumber the Town (${town}).` } : null;
      },
    },
  ],
  () => ({ winner: 'Town', reason: 'The Town held out.' })
);

export class MafiaEngine extends GameEngine<MafiaRole, MafiaTeam, MafiaWinner> {
  lastNightDeaths: string[] = [];

  constructor(config: GameConfig, options: EngineOptions) {
    super(config, mafiaRoleTable, options);
  }

  isMafia(name: string): boolean {
    return this.roster.get(name)?.role === 'mafia';
  }

  checkWin(): Readonly<GameOutcome<MafiaWinner>> | null {
    return mafiaWins.evaluate(this.state, this);
  }

  forceWin(cause: string): Readonly<GameOutcome<MafiaWinner>> {
    return mafiaWins.force(this.state, this, cause);
  }

  protected boardSummary() {
    return { lastNightDeaths: this.lastNightDeaths.join(', ') || 'none' };
  }

  async start(): Promise<Readonly<GameOutcome<MafiaWinner>>> {
    const mafia = this.roster.all().filter(p => p.role === 'mafia').length;
    this.beginGame(`${mafia} mafia, 1 doctor, 1 detective, ${this.roster.all().length - mafia - 2} townsperson`);

    const members = this.roster.all().filter(p => p.role === 'mafia').map(p => p.name);
    for (const name of members) {
      const allies = members.filter(m => m !== name);
      this.learn(name, {
        kind: 'allies',
        text: allies.length ? `Your fellow Mafia: ${allies.join(', ')}.` : 'You are the only Mafia member.',
      });
    }

    return new PhaseMachine<MafiaEngine, MafiaWinner>(this, [new MafiaNightPhase(), new MafiaDayPhase()]).run();
  }
}
