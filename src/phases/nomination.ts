import type { EngineContext } from '../engine/gameEngine.js';
import { selectNominee, type NominationResult, type Proposal } from '../engine/voting.js';

export interface NominationOptions {
  proposers: readonly string[];
  targetsFor: (proposer: string) => readonly string[];
  prompt: (proposer: string) => string;
}

/**
 * Every proposer names one legal target at once; plurality decides. Returns
 * null when nobody could propose anything.
 */
export async function runNomination(ctx: EngineContext, opts: NominationOptions): Promise<NominationResult | null> {
  const picks = await Promise.all(
    opts.proposers.map(proposer =>
      ctx.agentIO.decide(proposer, { kind: 'nominate', prompt: opts.prompt(proposer), options: opts.targetsFor(proposer) })
    )
  );

  const proposals: Proposal[] = [];
  opts.proposers.forEach((proposer, i) => {
    const target = picks[i];
    if (target === null) return;
    proposals.push({ proposer, target });
    ctx.recordPublic({ type: 'ACTION', player: proposer, content: `nominates ${target}`, metadata: { kind: 'nominate', target } });
  });

  return selectNominee(proposals, ctx.rng);
}
