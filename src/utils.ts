export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffleInPlace<T>(arr: T[], rng: Rng): void {
  // Fisher-Yates shuffle (deterministic given `rng`).
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

export function shuffled<T>(items: readonly T[], rng: Rng): T[] {
  const copy = [...items];
  shuffleInPlace(copy, rng);
  return copy;
}

/** Uniform pick; undefined only for an empty list. */
export function pickRandom<T>(items: readonly T[], rng: Rng): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(rng() * items.length)];
}

export function sample<T>(items: readonly T[], count: number, rng: Rng): T[] {
  return shuffled(items, rng).slice(0, Math.max(0, count));
}

function envFlag(name: string): boolean {
  const v = (process.env[name] ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isDryRun(): boolean {
  return envFlag('SOCIAL_DEDUCTION_DRY_RUN') || envFlag('DRY_RUN');
}

export function printFacts(): boolean {
  return envFlag('SOCIAL_DEDUCTION_PRINT_FACTS');
}

export function dryRunSeed(): number {
  const raw = process.env.SOCIAL_DEDUCTION_DRY_RUN_SEED;
  if (!raw) return 1;
  const n = Number(raw);
  return Number.isFinite(n) ? n : 1;
}

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatList(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}
