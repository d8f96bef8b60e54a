import type { DecisionKind, DecisionRequest, PlayerAgent, TalkLine, TalkRequest } from './agent.js';
import type { GameLogEntry, LogInput, PublicState } from './types.js';
import { describeError, pickRandom, sample, type Rng } from './utils.js';

export interface AgentIOConfig {
  responseTimeoutMs: number;
  decisionTimeoutMs: number;
  maxAttempts: number;
}

export interface ActorContext {
  role: string;
  team: string;
  privateFacts: readonly string[];
  publicState: PublicState;
}

export interface AgentIOOptions {
  rng: Rng;
  record: (entry: LogInput) => GameLogEntry;
  contextFor: (actor: string) => ActorContext;
  config?: Partial<AgentIOConfig>;
}

export interface ChoiceRequest<T extends string> {
  kind: DecisionKind;
  prompt: string;
  options: readonly T[];
  // Used instead of a random legal option when the agent fails (e.g. reject for votes).
  fallback?: T;
}

export interface MultiChoiceRequest<T extends string> {
  kind: DecisionKind;
  prompt: string;
  options: readonly T[];
  min: number;
  max: number;
}

export interface SpeechRequest {
  prompt: string;
  recentTalk: readonly TalkLine[];
}

export const SILENCE = 'SKIP';

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

function matchOption<T extends string>(choice: string, options: readonly T[]): T | undefined {
  const normalized = choice.trim().toLowerCase();
  return options.find(o => o === choice) ?? options.find(o => o.toLowerCase() === normalized);
}

/**
 * The only path from the engine to agents. Applies timeouts and retries and
 * guarantees a legal answer: anything outside the legal set is replaced by a
 * fallback and recorded as an `illegal_decision` event.
 */
export class AgentIO {
  private cfg: AgentIOConfig;

  constructor(
    private readonly agents: Readonly<Record<string, PlayerAgent>>,
    private readonly opts: AgentIOOptions
  ) {
    this.cfg = {
      responseTimeoutMs: opts.config?.responseTimeoutMs ?? 90_000,
      decisionTimeoutMs: opts.config?.decisionTimeoutMs ?? 60_000,
      maxAttempts: opts.config?.maxAttempts ?? 2,
    };
  }

  private buildRequest(actor: string, kind: DecisionKind, prompt: string, options: readonly string[], min: number, max: number): DecisionRequest {
    return { actor, kind, prompt, options, minPick: min, maxPick: max, ...this.opts.contextFor(actor) };
  }

  private reportIllegal(actor: string, kind: DecisionKind, problem: string, substitute: string) {
    this.opts.record({
      type: 'SYSTEM',
      player: actor,
      content: `${actor} gave no legal ${kind} decision (${problem}); using ${substitute}.`,
      metadata: { kind: 'illegal_decision', decision: kind, visibility: 'private' },
    });
  }

  /** One legal option, or null when there is nothing to choose from. */
  async decide<T extends string>(actor: string, req: ChoiceRequest<T>): Promise<T | null> {
    if (req.options.length === 0) return null;

    const agent = this.agents[actor];
    let problem = 'no agent for seat';
    if (agent) {
      const request = this.buildRequest(actor, req.kind, req.prompt, req.options, 1, 1);
      for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
        try {
          const reply = await withTimeout(agent.decide(request), this.cfg.decisionTimeoutMs);
          const choice = typeof reply === 'string' ? reply : reply.length === 1 ? reply[0] : '';
          const matched = matchOption(choice, req.options);
          if (matched !== undefined) return matched;
          problem = `invalid choice "${choice}"`;
        } catch (err) {
          problem = describeError(err);
        }
      }
    }

    const substitute = req.fallback ?? pickRandom(req.options, this.opts.rng) ?? req.options[0];
    this.reportIllegal(actor, req.kind, problem, substitute);
    return substitute;
  }

  /** Between `min` and `max` distinct legal options, in the order given by the agent. */
  async decideMany<T extends string>(actor: string, req: MultiChoiceRequest<T>): Promise<T[]> {
    const max = Math.min(req.max, req.options.length);
    const min = Math.min(req.min, max);
    if (max === 0) return [];

    const agent = this.agents[actor];
    let problem = 'no agent for seat';
    if (agent) {
      const request = this.buildRequest(actor, req.kind, req.prompt, req.options, min, max);
      for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
        try {
          const reply = await withTimeout(agent.decide(request), this.cfg.decisionTimeoutMs);
          const raw = typeof reply === 'string' ? reply.split(',') : reply;
          const picks: T[] = [];
          for (const r of raw) {
            const matched = matchOption(r, req.options);
            if (matched !== undefined && !picks.includes(matched)) picks.push(matched);
          }
          if (picks.length === raw.length && picks.length >= min && picks.length <= max) return picks;
          problem = `invalid selection "${raw.join(', ')}"`;
        } catch (err) {
          problem = describeError(err);
        }
      }
    }

    const substitute = sample(req.options, max, this.opts.rng);
    this.reportIllegal(actor, req.kind, problem, substitute.join(', '));
    return substitute;
  }

  /** A table-talk line; SKIP when the agent stays silent or fails. */
  async respond(actor: string, req: SpeechRequest): Promise<string> {
    const agent = this.agents[actor];
    if (!agent) return SILENCE;

    const request: TalkRequest = { actor, prompt: req.prompt, recentTalk: req.recentTalk, ...this.opts.contextFor(actor) };
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
      try {
        const text = await withTimeout(agent.speak(request), this.cfg.responseTimeoutMs);
        const trimmed = text.trim();
        if (trimmed) return trimmed;
        lastError = new Error('Empty response');
      } catch (err) {
        lastError = err;
      }
    }

    this.opts.record({
      type: 'SYSTEM',
      player: actor,
      content: `${actor} said nothing: ${describeError(lastError)}`,
      metadata: { kind: 'agent_silent', visibility: 'private' },
    });
    return SILENCE;
  }
}
