import type { CounterName, GameLogEntry, GameOutcome, GameState, LogInput, PhaseName } from '../types.js';
import { describeError } from '../utils.js';

export interface PhaseHost<W extends string> {
  readonly state: GameState<W>;
  readonly limits: { maxRounds: number; maxGameMs: number };
  now(): number;
  record(entry: LogInput): GameLogEntry;
  recordPublic(entry: LogInput): GameLogEntry;
  checkWin(): Readonly<GameOutcome<W>> | null;
  forceWin(cause: string): Readonly<GameOutcome<W>>;
}

export interface PhaseRunner<H> {
  readonly name: PhaseName;
  // Counter bumped on every entry to this phase; `round` itself moves once per cycle.
  readonly counter?: CounterName;
  run(host: H): Promise<void>;
}

function phaseTitle(name: PhaseName, n: number): string {
  return `${name.charAt(0).toUpperCase()}${name.slice(1)} ${n}`;
}

/**
 * Runs the phase cycle until the win evaluator reports a winner. The round
 * cap, the wall-clock budget and a throwing phase all end the game through
 * the host's fallback winner; `run` itself never rejects.
 */
export class PhaseMachine<H extends PhaseHost<W>, W extends string> {
  constructor(
    private readonly host: H,
    private readonly phases: ReadonlyArray<PhaseRunner<H>>
  ) {}

  async run(): Promise<Readonly<GameOutcome<W>>> {
    const { host } = this;
    const { state, limits } = host;

    for (;;) {
      const pending = host.checkWin();
      if (pending) return this.finish(pending);
      if (state.counters.round >= limits.maxRounds) {
        return this.finish(host.forceWin(`Round limit of ${limits.maxRounds} reached`));
      }
      state.counters.round++;

      for (const phase of this.phases) {
        if (host.now() - state.startedAt > limits.maxGameMs) {
          return this.finish(host.forceWin(`Time budget of ${limits.maxGameMs}ms exhausted`));
        }
        state.phase = phase.name;
        if (phase.counter) state.counters[phase.counter]++;
        const n = phase.counter ? state.counters[phase.counter] : state.counters.round;
        host.recordPublic({ type: 'PHASE', content: `--- ${phaseTitle(phase.name, n)} ---`, metadata: { kind: phase.name } });

        try {
          await phase.run(host);
        } catch (error) {
          host.record({
            type: 'SYSTEM',
            content: `Engine abort: ${phase.name} phase failed: ${describeError(error)}`,
            metadata: { kind: 'engine_abort', visibility: 'private' },
          });
          return this.finish(host.forceWin(`Engine abort in ${phase.name} phase`));
        }

        const outcome = host.checkWin();
        if (outcome) return this.finish(outcome);
      }
    }
  }

  private finish(outcome: Readonly<GameOutcome<W>>): Readonly<GameOutcome<W>> {
    this.host.state.phase = 'terminal';
    this.host.recordPublic({
      type: 'WIN',
      content: `Game over. Winner: ${outcome.winner}. ${outcome.reason}`,
      metadata: { kind: outcome.forced ? 'forced_win' : 'win', winner: outcome.winner, forced: outcome.forced },
    });
    return outcome;
  }
}
