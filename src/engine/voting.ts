import type { Ballot } from './records.js';
import { pickRandom, type Rng } from '../utils.js';

export interface Proposal {
  proposer: string;
  target: string;
}

export interface NominationResult {
  target: string;
  nominator: string;
  // Everyone who proposed the winning target, in proposal order.
  backers: string[];
  votes: number;
  // Every target that shared the top count (length 1 when there was no tie).
  tied: string[];
}

/**
 * Plurality over the proposals. Ties are broken uniformly at random; the
 * nominator is a random backer of the chosen target.
 */
export function selectNominee(proposals: readonly Proposal[], rng: Rng): NominationResult | null {
  const counts = new Map<string, string[]>();
  for (const p of proposals) {
    const backers = counts.get(p.target);
    if (backers) backers.push(p.proposer);
    else counts.set(p.target, [p.proposer]);
  }
  let best = 0;
  for (const backers of counts.values()) best = Math.max(best, backers.length);
  if (best === 0) return null;

  const tied = [...counts.entries()].filter(([, b]) => b.length === best).map(([t]) => t);
  const target = pickRandom(tied, rng);
  if (target === undefined) return null;
  const backers = counts.get(target) ?? [];
  const nominator = pickRandom(backers, rng) ?? backers[0];
  return { target, nominator, backers, votes: best, tied };
}

/** Strict majority: 2 of 4 fails, 3 of 5 passes. */
export function isMajority(approvals: number, voters: number): boolean {
  return approvals > voters / 2;
}

/** Independent voters first (seat order kept), then voters whose ballot depends on another. */
export function orderVoters(voters: readonly string[], dependsOn: (voter: string) => string | undefined): string[] {
  const independent = voters.filter(v => dependsOn(v) === undefined);
  const dependent = voters.filter(v => dependsOn(v) !== undefined);
  return [...independent, ...dependent];
}

/** A dependent approval only counts when the reference voter approved too. */
export function effectiveDependentBallot(own: Ballot, reference: Ballot | undefined): Ballot {
  return own === 'approve' && reference === 'approve' ? 'approve' : 'reject';
}
