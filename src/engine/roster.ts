export interface PlayerFlags {
  // One-shot ability (Slayer) spent.
  abilityUsed?: boolean;
  // Butler's chosen master for the current day.
  master?: string;
  // Revolver state for the card game: bullet position and next chamber, 0-5.
  bullet?: number;
  chamber?: number;
  // Illegal secrets the Computer may hold against a Troubleshooter.
  secretSociety?: boolean;
  mutantPower?: boolean;
}

export interface Player<R extends string, T extends string> {
  readonly name: string;
  readonly seat: number;
  readonly role: R;
  readonly team: T;
  alive: boolean;
  flags: PlayerFlags;
}

/**
 * Seated players in table order. `alive` flips to false exactly once; role
 * and team never change after setup.
 */
export class Roster<R extends string, T extends string> {
  private readonly players: Player<R, T>[];
  private readonly byName: Map<string, Player<R, T>>;

  constructor(players: ReadonlyArray<Player<R, T>>) {
    this.players = [...players].sort((a, b) => a.seat - b.seat);
    this.byName = new Map(this.players.map(p => [p.name, p]));
  }

  all(): ReadonlyArray<Player<R, T>> {
    return this.players;
  }

  alive(): Player<R, T>[] {
    return this.players.filter(p => p.alive);
  }

  aliveNames(): string[] {
    return this.alive().map(p => p.name);
  }

  deadNames(): string[] {
    return this.players.filter(p => !p.alive).map(p => p.name);
  }

  get(name: string): Player<R, T> | undefined {
    return this.byName.get(name);
  }

  require(name: string): Player<R, T> {
    const p = this.byName.get(name);
    if (!p) throw new Error(`Unknown player "${name}"`);
    return p;
  }

  isAlive(name: string): boolean {
    return this.byName.get(name)?.alive ?? false;
  }

  /** Alive holders of a role, in seat order. */
  withRole(role: R): Player<R, T>[] {
    return this.players.filter(p => p.alive && p.role === role);
  }

  aliveOnTeam(team: T): Player<R, T>[] {
    return this.players.filter(p => p.alive && p.team === team);
  }

  /** Returns false if the player was already dead. */
  kill(name: string): boolean {
    const p = this.require(name);
    if (!p.alive) return false;
    p.alive = false;
    return true;
  }

  /** Nearest alive player on each side, skipping the dead. Empty when alone. */
  aliveNeighbors(name: string): Player<R, T>[] {
    const p = this.require(name);
    const left = this.step(p.seat, -1);
    const right = this.step(p.seat, 1);
    const out: Player<R, T>[] = [];
    if (left && left.name !== name) out.push(left);
    if (right && right.name !== name && right.name !== left?.name) out.push(right);
    return out;
  }

  /** Next alive player strictly after `fromSeat`, wrapping around the table. */
  nextAlive(fromSeat: number): Player<R, T> | undefined {
    return this.step(fromSeat, 1);
  }

  private step(fromSeat: number, dir: 1 | -1): Player<R, T> | undefined {
    const n = this.players.length;
    for (let i = 1; i <= n; i++) {
      const p = this.players[(((fromSeat + dir * i) % n) + n) % n];
      if (p.alive) return p;
    }
    return undefined;
  }
}
