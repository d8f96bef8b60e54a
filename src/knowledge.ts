import type { PhaseName } from './types.js';

export interface HiddenFact {
  owner: string;
  round: number;
  phase: PhaseName;
  kind: string;
  text: string;
  // Engine-side truth. Poisoned or fabricated information is stored with `reliable: false`
  // and is never marked as such to the owner.
  reliable: boolean;
  data?: Readonly<Record<string, string | number | boolean>>;
}

/**
 * Per-player private fact log. Written only by the engine, read only when
 * building the owner's decision context. Facts are frozen on append.
 */
export class HiddenKnowledgeStore {
  private facts: Map<string, HiddenFact[]> = new Map();

  append(fact: HiddenFact): Readonly<HiddenFact> {
    const frozen = Object.freeze({ ...fact, data: fact.data ? Object.freeze({ ...fact.data }) : undefined });
    const list = this.facts.get(fact.owner);
    if (list) list.push(frozen);
    else this.facts.set(fact.owner, [frozen]);
    return frozen;
  }

  factsFor(owner: string): ReadonlyArray<Readonly<HiddenFact>> {
    return (this.facts.get(owner) ?? []).slice();
  }

  /** What the owner's agent is shown. */
  textsFor(owner: string): string[] {
    return (this.facts.get(owner) ?? []).map(f => `[${f.phase} ${f.round}] ${f.text}`);
  }

  latest(owner: string, kind: string): Readonly<HiddenFact> | undefined {
    const list = this.facts.get(owner) ?? [];
    for (let i = list.length - 1; i >= 0; i--) {
      if (list[i].kind === kind) return list[i];
    }
    return undefined;
  }

  get size(): number {
    let total = 0;
    for (const list of this.facts.values()) total += list.length;
    return total;
  }
}
