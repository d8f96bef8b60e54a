import type { EngineContext } from '../engine/gameEngine.js';
import type { Ballot, VoteRecord, VoteTally } from '../engine/records.js';
import { effectiveDependentBallot, orderVoters } from '../engine/voting.js';

export interface BallotOptions {
  record: VoteRecord;
  voters: readonly string[];
  prompt: (voter: string) => string;
  labels: { approve: string; reject: string };
  // The voter whose ballot this voter's approval depends on (Butler -> master).
  dependsOn?: (voter: string) => string | undefined;
}

/**
 * Collect one ballot per voter into `record` and close its tally. Independent
 * ballots are gathered concurrently; dependent voters vote afterwards, one
 * at a time. A failed or illegal ballot counts as a rejection.
 */
export async function runBallot(ctx: EngineContext, opts: BallotOptions): Promise<Readonly<VoteTally>> {
  const { record, labels } = opts;
  const dependsOn = opts.dependsOn ?? (() => undefined);
  const ordered = orderVoters(opts.voters, dependsOn);
  const independent = ordered.filter(v => dependsOn(v) === undefined);
  const dependent = ordered.filter(v => dependsOn(v) !== undefined);
  const options = [labels.approve, labels.reject];
  const toBallot = (label: string | null): Ballot => (label === labels.approve ? 'approve' : 'reject');

  const replies = await Promise.all(
    independent.map(voter =>
      ctx.agentIO.decide(voter, { kind: 'vote', prompt: opts.prompt(voter), options, fallback: labels.reject })
    )
  );
  independent.forEach((voter, i) => record.cast(voter, toBallot(replies[i])));

  for (const voter of dependent) {
    const reference = dependsOn(voter) ?? '';
    const referenceBallot = record.ballotOf(reference);
    const seen = referenceBallot ? `${reference} voted ${referenceBallot === 'approve' ? labels.approve : labels.reject}.` : `${reference} has not voted.`;
    const reply = await ctx.agentIO.decide(voter, {
      kind: 'vote',
      prompt: `${opts.prompt(voter)}\n${seen} Your ${labels.approve} only counts if ${reference} voted ${labels.approve}.`,
      options,
      fallback: labels.reject,
    });
    record.cast(voter, effectiveDependentBallot(toBallot(reply), referenceBallot));
  }

  for (const voter of opts.voters) {
    const ballot = record.ballotOf(voter);
    if (!ballot) continue;
    ctx.recordPublic({
      type: 'VOTE',
      player: voter,
      content: `votes ${ballot === 'approve' ? labels.approve : labels.reject}`,
      metadata: { kind: 'ballot', vote: ballot, target: record.target ?? undefined },
    });
  }

  return record.tally();
}
