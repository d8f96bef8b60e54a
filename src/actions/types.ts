/** Night steps in resolution order. Every night's intents are applied in this order, never in input order. */
export const NIGHT_STEP_ORDER = [
  'disrupt',
  'protect',
  'eliminate',
  'investigate',
  'death_trigger',
  'retrospective',
  'sense',
] as const;

export type NightStep = (typeof NIGHT_STEP_ORDER)[number];

export type NightIntent =
  | { kind: 'poison'; actor: string; target: string }
  | { kind: 'protect'; actor: string; target: string }
  | { kind: 'kill'; actor: string; target: string }
  | { kind: 'investigate'; actor: string; target: string };

export const STEP_OF_INTENT: Readonly<Record<NightIntent['kind'], NightStep>> = {
  poison: 'disrupt',
  protect: 'protect',
  kill: 'eliminate',
  investigate: 'investigate',
};

export interface ResolvedKill {
  actor: string;
  target: string;
  // Attempted on a protected target; voided.
  protected: boolean;
  // The killer was poisoned.
  malfunctioned: boolean;
  // The target cannot be killed by this killer (e.g. Mafia on Mafia).
  immune: boolean;
  landed: boolean;
}

export interface ResolvedInvestigation {
  actor: string;
  target: string;
  // What the investigator is told.
  reportedEvil: boolean;
  reliable: boolean;
}

export interface NightResolution {
  poisoned: Set<string>;
  protected: Set<string>;
  // Protectors whose protection did nothing because they were poisoned.
  failedProtectors: string[];
  kills: ResolvedKill[];
  // In the order the kills landed.
  deaths: string[];
  investigations: ResolvedInvestigation[];
}

export interface NightResolutionInput {
  intents: readonly NightIntent[];
  isEvil(name: string): boolean;
  killImmune?(target: string, actor: string): boolean;
}
