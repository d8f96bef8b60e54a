import type { Roster } from '../engine/roster.js';
import { pickRandom, type Rng } from '../utils.js';

/** Evil players among the nearest alive neighbours (Empath). */
export function countEvilNeighbors<R extends string, T extends string>(
  roster: Roster<R, T>,
  name: string,
  isEvil: (role: R) => boolean
): number {
  return roster.aliveNeighbors(name).filter(p => isEvil(p.role)).length;
}

/** Adjacent alive pairs who are both evil, round the table (Chef). */
export function evilPairs<R extends string, T extends string>(roster: Roster<R, T>, isEvil: (role: R) => boolean): [string, string][] {
  const alive = roster.alive();
  if (alive.length < 2) return [];
  const count = alive.length === 2 ? 1 : alive.length;
  const pairs: [string, string][] = [];
  for (let i = 0; i < count; i++) {
    const a = alive[i];
    const b = alive[(i + 1) % alive.length];
    if (isEvil(a.role) && isEvil(b.role)) pairs.push([a.name, b.name]);
  }
  return pairs;
}

/** False when the holder, or any player the information is about, is poisoned this night. */
export function isReliable(holder: string, subjects: readonly string[], poisoned: ReadonlySet<string>): boolean {
  return !poisoned.has(holder) && !subjects.some(s => poisoned.has(s));
}

/** A wrong answer in [min, max]; the truth only when the range has nothing else. */
export function fabricateNumber(truth: number, min: number, max: number, rng: Rng): number {
  const others: number[] = [];
  for (let v = min; v <= max; v++) if (v !== truth) others.push(v);
  return pickRandom(others, rng) ?? truth;
}

export function fabricateRole<R extends string>(truth: R, pool: readonly R[], rng: Rng): R {
  return pickRandom(pool.filter(r => r !== truth), rng) ?? truth;
}
