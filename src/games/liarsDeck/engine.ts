import type { GameConfig, GameOutcome } from '../../types.js';
import { GameEngine, type EngineOptions } from '../../engine/gameEngine.js';
import { PhaseMachine } from '../../engine/phaseMachine.js';
import { WinEvaluator } from '../../engine/winEvaluator.js';
import { Deck } from '../../engine/deck.js';
import { buildDeck, CHAMBERS, liarsDeckRoleTable, type Card, type LiarsDeckRole, type LiarsDeckTeam, type Rank } from './roles.js';
import { LiarsDeckRoundPhase } from './roundPhase.js';

export const FIRST_IMPRESSION = "Still don't know this player.";

// The last gambler standing, by name.
export type LiarsDeckWinner = string;

const liarsDeckWins = new WinEvaluator<LiarsDeckEngine, LiarsDeckWinner>(
  [
    {
      name: 'last survivor',
      check: g => {
        const alive = g.roster.alive();
        return alive.length === 1 ? { winner: alive[0].name, reason: `${alive[0].name} is the last gambler standing.` } : null;
      },
    },
  ],
  g => {
    let best = g.roster.alive()[0] ?? g.roster.all()[0];
    for (const p of g.roster.alive()) {
      if (g.handOf(p.name).length > g.handOf(best.name).length) best = p;
    }
    return { winner: best.name, reason: `${best.name} holds the most cards (${g.handOf(best.name).length}).` };
  }
);

export class LiarsDeckEngine extends GameEngine<LiarsDeckRole, LiarsDeckTeam, LiarsDeckWinner> {
  readonly deck: Deck<Card>;
  readonly hands: Map<string, Card[]> = new Map();
  // Cards played face down this round.
  pile: Card[] = [];
  target: Rank = 'Q';
  starterSeat = -1;

  constructor(config: GameConfig, options: EngineOptions) {
    super(config, liarsDeckRoleTable, options);
    this.deck = new Deck(buildDeck(), this.rng);
    for (const p of this.roster.all()) {
      p.flags.bullet = Math.floor(this.rng() * CHAMBERS);
      p.flags.chamber = 0;
    }
  }

  /** The owner's latest impression of another player, from their opinion facts. */
  opinionOf(owner: string, other: string): string {
    const facts = this.knowledge.factsFor(owner);
    for (let i = facts.length - 1; i >= 0; i--) {
      const { kind, data } = facts[i];
      if (kind === 'opinion' && data?.target === other && typeof data.opinion === 'string') return data.opinion;
    }
    return FIRST_IMPRESSION;
  }

  handOf(name: string): Card[] {
    return this.hands.get(name) ?? [];
  }

  /** Every card is in the deck, the discard, a hand or the pile. */
  cardCount(): number {
    let held = 0;
    for (const hand of this.hands.values()) held += hand.length;
    return this.deck.size + this.deck.discardSize + held + this.pile.length;
  }

  checkWin(): Readonly<GameOutcome<LiarsDeckWinner>> | null {
    return liarsDeckWins.evaluate(this.state, this);
  }

  forceWin(cause: string): Readonly<GameOutcome<LiarsDeckWinner>> {
    return liarsDeckWins.force(this.state, this, cause);
  }

  protected boardSummary() {
    const summary: Record<string, string | number> = { targetRank: this.target, cardsOnTable: this.pile.length };
    for (const p of this.roster.alive()) summary[`cards:${p.name}`] = this.handOf(p.name).length;
    return summary;
  }

  /** Returns true when the chamber held the bullet. */
  pullTrigger(name: string): boolean {
    const { flags } = this.roster.require(name);
    const chamber = flags.chamber ?? 0;
    const fired = chamber === flags.bullet;
    flags.chamber = chamber + 1;
    this.recordPublic({
      type: 'ACTION',
      player: name,
      content: fired ? `pulls the trigger on chamber ${chamber + 1}. BANG.` : `pulls the trigger on chamber ${chamber + 1}. Click.`,
      metadata: { kind: 'trigger', result: fired ? 'fired' : 'empty' },
    });
    if (fired) this.eliminate(name, 'shot');
    return fired;
  }

  async start(): Promise<Readonly<GameOutcome<LiarsDeckWinner>>> {
    this.beginGame(`${this.roster.all().length} gamblers, 6 Queens, 6 Kings, 6 Aces and 2 Jokers`);
    return new PhaseMachine<LiarsDeckEngine, LiarsDeckWinner>(this, [new LiarsDeckRoundPhase()]).run();
  }
}
