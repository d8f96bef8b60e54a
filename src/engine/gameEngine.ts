import type { GameConfig, GameLogEntry, GameOutcome, GameState, LogInput, PublicState, Recorder } from '../types.js';
import type { PlayerAgent, TalkLine } from '../agent.js';
import { AgentIO, type ActorContext } from '../agentIo.js';
import { HiddenKnowledgeStore, type HiddenFact } from '../knowledge.js';
import { mulberry32, shuffled, type Rng } from '../utils.js';
import { assignRoles, type RoleTable } from './roleAssignment.js';
import { Roster } from './roster.js';
import type { PhaseHost } from './phaseMachine.js';

export interface EngineOptions {
  agents: Readonly<Record<string, PlayerAgent>>;
  recorder: Recorder;
  now?: () => number;
  rng?: Rng;
}

/** What the shared phase helpers (table talk, nomination, ballots) need from a game. */
export interface EngineContext {
  readonly config: GameConfig;
  readonly rng: Rng;
  readonly agentIO: AgentIO;
  readonly talk: TalkLine[];
  aliveNames(): string[];
  record(entry: LogInput): GameLogEntry;
  recordPublic(entry: LogInput): GameLogEntry;
}

export type LearnInput = Pick<HiddenFact, 'kind' | 'text'> & Partial<Pick<HiddenFact, 'reliable' | 'data'>>;

/**
 * State and bookkeeping shared by every game: seating, role assignment,
 * the knowledge store, the agent boundary and the event trail. Variants add
 * their boards and phases and decide who wins.
 */
export abstract class GameEngine<R extends string, T extends string, W extends string>
  implements PhaseHost<W>, EngineContext
{
  readonly config: GameConfig;
  readonly roster: Roster<R, T>;
  readonly knowledge = new HiddenKnowledgeStore();
  readonly agentIO: AgentIO;
  readonly rng: Rng;
  readonly state: GameState<W>;
  readonly limits: { maxRounds: number; maxGameMs: number };
  readonly talk: TalkLine[] = [];

  protected readonly recorder: Recorder;
  private readonly clock: () => number;

  constructor(
    config: GameConfig,
    protected readonly table: RoleTable<R, T>,
    options: EngineOptions
  ) {
    this.config = config;
    this.recorder = options.recorder;
    this.clock = options.now ?? Date.now;
    this.rng = options.rng ?? mulberry32(config.seed ?? Date.now());
    this.limits = { maxRounds: config.max_rounds, maxGameMs: config.max_game_ms };

    const names = config.players.map(p => p.name);
    const seating = config.seat_order === 'config' ? names : shuffled(names, this.rng);
    const assignment = assignRoles(seating, table, { rng: this.rng, forced: config.roles, counts: config.role_counts });
    this.roster = new Roster(
      assignment.map((a, seat) => ({ name: a.name, seat, role: a.role, team: table.teamOf(a.role), alive: true, flags: {} }))
    );

    this.state = {
      phase: 'setup',
      counters: { round: 0, night: 0, day: 0 },
      recorderFailures: 0,
      startedAt: this.clock(),
      history: [],
    };

    this.agentIO = new AgentIO(options.agents, {
      rng: this.rng,
      record: entry => this.record(entry),
      contextFor: actor => this.decisionContext(actor),
      config: {
        decisionTimeoutMs: config.decision_timeout_ms,
        responseTimeoutMs: config.response_timeout_ms,
        maxAttempts: config.max_attempts,
      },
    });
  }

  /** Runs the game to completion and returns the declared winner. */
  abstract start(): Promise<Readonly<GameOutcome<W>>>;
  abstract checkWin(): Readonly<GameOutcome<W>> | null;
  abstract forceWin(cause: string): Readonly<GameOutcome<W>>;

  now(): number {
    return this.clock();
  }

  /**
   * Append to the event trail. A throwing recorder is counted and the entry is
   * kept locally; it never interrupts the game.
   */
  record(entry: LogInput): GameLogEntry {
    const stamped: LogInput = {
      ...entry,
      metadata: { round: this.state.counters.round, phase: this.state.phase, ...entry.metadata },
    };
    let full: GameLogEntry;
    try {
      full = this.recorder.log(stamped);
    } catch {
      this.state.recorderFailures++;
      full = { id: `local-${this.state.history.length + 1}`, timestamp: new Date(this.clock()).toISOString(), ...stamped };
    }
    this.state.history.push(full);
    return full;
  }

  recordPublic(entry: LogInput): GameLogEntry {
    return this.record({ ...entry, metadata: { ...entry.metadata, visibility: 'public' } });
  }

  recordFaction(team: T, entry: LogInput): GameLogEntry {
    return this.record({ ...entry, metadata: { ...entry.metadata, visibility: 'faction', team } });
  }

  /** Store a private fact for `owner` and log it as a private FACT entry. */
  learn(owner: string, fact: LearnInput): Readonly<HiddenFact> {
    const stored = this.knowledge.append({
      owner,
      round: this.state.counters.round,
      phase: this.state.phase,
      kind: fact.kind,
      text: fact.text,
      reliable: fact.reliable ?? true,
      data: fact.data,
    });
    this.record({
      type: 'FACT',
      player: owner,
      content: stored.text,
      metadata: { kind: stored.kind, reliable: stored.reliable, visibility: 'private' },
    });
    return stored;
  }

  /** Kill and announce. Returns false when the player was already dead. */
  eliminate(name: string, cause: string, revealRole = true): boolean {
    if (!this.roster.kill(name)) return false;
    const role = this.roster.require(name).role;
    this.recordPublic({
      type: 'DEATH',
      player: name,
      content: revealRole ? `died (${cause}). Their role was ${role}.` : `died (${cause}).`,
      metadata: { kind: cause, result: revealRole ? role : 'hidden' },
    });
    return true;
  }

  aliveNames(): string[] {
    return this.roster.aliveNames();
  }

  publicState(): PublicState {
    return {
      game: this.table.game,
      phase: this.state.phase,
      round: this.state.counters.round,
      night: this.state.counters.night,
      day: this.state.counters.day,
      alive: this.roster.aliveNames(),
      dead: this.roster.deadNames(),
      board: this.boardSummary(),
    };
  }

  decisionContext(actor: string): ActorContext {
    const player = this.roster.get(actor);
    return {
      role: player?.role ?? 'unknown',
      team: player?.team ?? 'unknown',
      privateFacts: this.knowledge.textsFor(actor),
      publicState: this.publicState(),
    };
  }

  /** Variant board counters shown to every agent. */
  protected boardSummary(): Record<string, string | number | boolean> {
    return {};
  }

  /** Opening announcements and each player's own role. */
  protected beginGame(rolesInPlay: string): void {
    this.recordPublic({
      type: 'SYSTEM',
      content: `${this.table.game} starting. Seats: ${this.roster.all().map(p => p.name).join(', ')}. Roles in play: ${rolesInPlay}.`,
    });
    for (const p of this.roster.all()) {
      this.learn(p.name, { kind: 'role', text: `Your role is ${p.role} (team ${p.team}).` });
    }
  }
}
