import { isMajority } from './voting.js';

export type Ballot = 'approve' | 'reject';

export interface VoteFlags {
  hitlerElected?: boolean;
  vetoed?: boolean;
  cancelled?: boolean;
  selfBlocked?: boolean;
}

export interface VoteTally {
  approve: number;
  reject: number;
  eligible: number;
  passed: boolean;
}

/**
 * One public decision: proposer, target and ballots. Each eligible voter may
 * cast once; the tally is computed once and freezes the ballots.
 */
export class VoteRecord {
  private readonly ballots: Map<string, Ballot> = new Map();
  private readonly eligible: ReadonlySet<string>;
  private cachedTally?: Readonly<VoteTally>;
  private finalFlags?: Readonly<VoteFlags>;

  constructor(
    readonly round: number,
    readonly proposer: string | null,
    readonly target: string | null,
    eligibleVoters: readonly string[]
  ) {
    this.eligible = new Set(eligibleVoters);
  }

  /** False when the voter is ineligible, already voted, or the tally is closed. */
  cast(voter: string, ballot: Ballot): boolean {
    if (this.cachedTally || !this.eligible.has(voter) || this.ballots.has(voter)) return false;
    this.ballots.set(voter, ballot);
    return true;
  }

  ballotOf(voter: string): Ballot | undefined {
    return this.ballots.get(voter);
  }

  voters(): string[] {
    return [...this.ballots.keys()];
  }

  /** Strict majority of the eligible voters, not of the ballots cast. */
  tally(): Readonly<VoteTally> {
    if (this.cachedTally) return this.cachedTally;
    let approve = 0;
    for (const b of this.ballots.values()) if (b === 'approve') approve++;
    const eligible = this.eligible.size;
    this.cachedTally = Object.freeze({
      approve,
      reject: this.ballots.size - approve,
      eligible,
      passed: isMajority(approve, eligible),
    });
    return this.cachedTally;
  }

  get isFinal(): boolean {
    return this.finalFlags !== undefined;
  }

  get flags(): Readonly<VoteFlags> {
    return this.finalFlags ?? {};
  }

  finalize(flags: VoteFlags = {}): Readonly<VoteFlags> {
    if (this.finalFlags) throw new Error('Vote record already finalized');
    this.tally();
    this.finalFlags = Object.freeze({ ...flags });
    return this.finalFlags;
  }
}
