import { SetupError } from '../errors.js';
import type { GameKind } from '../types.js';
import { shuffled, type Rng } from '../utils.js';

/** Count table for one game: roles, teams and the default row per player count. */
export interface RoleTable<R extends string, T extends string> {
  readonly game: GameKind;
  readonly roles: readonly R[];
  readonly playerCounts: { min: number; max: number };
  isRole(value: string): value is R;
  teamOf(role: R): T;
  teamCounts(playerCount: number): Readonly<Record<T, number>>;
  defaultRow(playerCount: number, rng: Rng): R[];
  // Extra row constraints beyond team totals (e.g. exactly one demon). Returns a reason when illegal.
  checkRow?(row: readonly R[], playerCount: number): string | null;
}

export interface RoleAssignmentOptions {
  rng: Rng;
  // Player name -> role. Must cover every player.
  forced?: Readonly<Record<string, string>>;
  // Role -> count. Replaces the default row.
  counts?: Readonly<Record<string, number>>;
}

export interface Assignment<R extends string> {
  name: string;
  role: R;
}

function parseRole<R extends string, T extends string>(table: RoleTable<R, T>, value: string): R {
  if (!table.isRole(value)) {
    throw new SetupError(`Unknown ${table.game} role "${value}". Known roles: ${table.roles.join(', ')}`);
  }
  return value;
}

export function validateRow<R extends string, T extends string>(table: RoleTable<R, T>, row: readonly R[], playerCount: number): void {
  if (row.length !== playerCount) {
    throw new SetupError(`Role list has ${row.length} roles for ${playerCount} players`);
  }
  const expected = table.teamCounts(playerCount);
  const actual = new Map<string, number>();
  for (const role of row) {
    const team = table.teamOf(role);
    actual.set(team, (actual.get(team) ?? 0) + 1);
  }
  for (const [team, count] of Object.entries<number>(expected)) {
    const got = actual.get(team) ?? 0;
    if (got !== count) {
      throw new SetupError(`Team ${team} needs ${count} players with ${playerCount} seated, got ${got}`);
    }
  }
  const reason = table.checkRow?.(row, playerCount);
  if (reason) throw new SetupError(reason);
}

/**
 * Assign one role per player. The multiset of roles always equals a legal
 * row of the count table; anything else fails setup before play starts.
 */
export function assignRoles<R extends string, T extends string>(
  names: readonly string[],
  table: RoleTable<R, T>,
  opts: RoleAssignmentOptions
): Assignment<R>[] {
  const n = names.length;
  const { min, max } = table.playerCounts;
  if (n < min || n > max) {
    throw new SetupError(`${table.game} needs ${min}-${max} players, got ${n}`);
  }

  if (opts.forced) {
    const forced = opts.forced;
    for (const name of Object.keys(forced)) {
      if (!names.includes(name)) throw new SetupError(`Forced role for unknown player "${name}"`);
    }
    const missing = names.filter(name => forced[name] === undefined);
    if (missing.length > 0) {
      throw new SetupError(`Forced roles must cover every player; missing ${missing.join(', ')}`);
    }
    const assignment = names.map(name => ({ name, role: parseRole(table, forced[name]) }));
    validateRow(table, assignment.map(a => a.role), n);
    return assignment;
  }

  let row: R[];
  if (opts.counts) {
    row = [];
    for (const [value, count] of Object.entries(opts.counts)) {
      const role = parseRole(table, value);
      for (let i = 0; i < count; i++) row.push(role);
    }
  } else {
    row = table.defaultRow(n, opts.rng);
  }
  validateRow(table, row, n);

  const roles = shuffled(row, opts.rng);
  return names.map((name, i) => ({ name, role: roles[i] }));
}

/** Type guard for a role list declared `as const`. */
export function isOneOf<R extends string>(values: readonly R[], value: string): value is R {
  return values.some(v => v === value);
}
