import type { GameOutcome, GameState } from '../types.js';

export interface WinVerdict<W extends string> {
  winner: W;
  reason: string;
}

export interface WinPredicate<S, W extends string> {
  readonly name: string;
  check(subject: S): WinVerdict<W> | null;
}

/**
 * Ordered predicates, first match wins. The outcome is cached on the state,
 * so once a winner is declared every later call returns it unchanged.
 */
export class WinEvaluator<S, W extends string> {
  constructor(
    private readonly predicates: ReadonlyArray<WinPredicate<S, W>>,
    private readonly fallback: (subject: S) => WinVerdict<W>
  ) {}

  evaluate(state: GameState<W>, subject: S): Readonly<GameOutcome<W>> | null {
    if (state.outcome) return state.outcome;
    for (const predicate of this.predicates) {
      const verdict = predicate.check(subject);
      if (verdict) {
        state.outcome = Object.freeze({ ...verdict, forced: false });
        return state.outcome;
      }
    }
    return null;
  }

  /** Fallback winner for round caps, wall-clock limits and aborts. */
  force(state: GameState<W>, subject: S, cause: string): Readonly<GameOutcome<W>> {
    if (state.outcome) return state.outcome;
    const verdict = this.fallback(subject);
    state.outcome = Object.freeze({ winner: verdict.winner, reason: `${cause}; ${verdict.reason}`, forced: true });
    return state.outcome;
  }
}
