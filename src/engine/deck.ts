import { ResourceExhaustionError } from '../errors.js';
import { shuffled, type Rng } from '../utils.js';

/**
 * Draw pile plus discard pile. Cards are only ever moved, never created or
 * destroyed, so `size + discardSize` plus whatever callers hold is constant.
 */
export class Deck<T> {
  private drawPile: T[];
  private discardPile: T[] = [];

  constructor(
    cards: readonly T[],
    private readonly rng: Rng
  ) {
    this.drawPile = shuffled(cards, rng);
  }

  get size(): number {
    return this.drawPile.length;
  }

  get discardSize(): number {
    return this.discardPile.length;
  }

  /** Folds the discard pile into the remaining draw pile and shuffles both. */
  reshuffle(): void {
    this.drawPile = shuffled([...this.drawPile, ...this.discardPile], this.rng);
    this.discardPile = [];
  }

  private ensure(count: number): void {
    const available = this.drawPile.length + this.discardPile.length;
    if (count > available) {
      throw new ResourceExhaustionError(`Cannot draw ${count} cards; only ${available} left`, count, available);
    }
    if (this.drawPile.length < count) this.reshuffle();
  }

  draw(count: number): T[] {
    this.ensure(count);
    return this.drawPile.splice(0, count);
  }

  /** The next `count` cards without removing them. */
  peek(count: number): T[] {
    this.ensure(count);
    return this.drawPile.slice(0, count);
  }

  discard(...cards: T[]): void {
    this.discardPile.push(...cards);
  }

  /** Returns cards held outside the deck and reshuffles everything together. */
  gather(returned: readonly T[]): void {
    this.drawPile = shuffled([...this.drawPile, ...this.discardPile, ...returned], this.rng);
    this.discardPile = [];
  }
}
