import {
  NIGHT_STEP_ORDER,
  STEP_OF_INTENT,
  type NightIntent,
  type NightResolution,
  type NightResolutionInput,
} from './types.js';
import { isReliable } from './information.js';

function stepRank(intent: NightIntent): number {
  return NIGHT_STEP_ORDER.indexOf(STEP_OF_INTENT[intent.kind]);
}

/**
 * Pure night resolution. Intents are stably sorted by step, so the same set
 * of decisions always resolves the same way whatever order they arrive in.
 *
 * - poison: the target's own power malfunctions tonight, and information about the target is unreliable
 * - protect: shields the target from every kill tonight
 * - kill: voided on a protected or immune target, still recorded as attempted
 * - investigate: inverted and marked unreliable when the investigator or the target is poisoned
 */
export function resolveNightActions(input: NightResolutionInput): NightResolution {
  const ordered = input.intents
    .map((intent, index) => ({ intent, index }))
    .sort((a, b) => stepRank(a.intent) - stepRank(b.intent) || a.index - b.index)
    .map(x => x.intent);

  const result: NightResolution = {
    poisoned: new Set(),
    protected: new Set(),
    failedProtectors: [],
    kills: [],
    deaths: [],
    investigations: [],
  };

  for (const intent of ordered) {
    switch (intent.kind) {
      case 'poison':
        result.poisoned.add(intent.target);
        break;
      case 'protect':
        if (result.poisoned.has(intent.actor)) result.failedProtectors.push(intent.actor);
        else result.protected.add(intent.target);
        break;
      case 'kill': {
        const malfunctioned = result.poisoned.has(intent.actor);
        const isProtected = result.protected.has(intent.target);
        const immune = input.killImmune?.(intent.target, intent.actor) ?? false;
        const landed = !malfunctioned && !isProtected && !immune && !result.deaths.includes(intent.target);
        result.kills.push({ actor: intent.actor, target: intent.target, protected: isProtected, malfunctioned, immune, landed });
        if (landed) result.deaths.push(intent.target);
        break;
      }
      case 'investigate': {
        const reliable = isReliable(intent.actor, [intent.target], result.poisoned);
        const truth = input.isEvil(intent.target);
        result.investigations.push({ actor: intent.actor, target: intent.target, reportedEvil: reliable ? truth : !truth, reliable });
        break;
      }
    }
  }

  return result;
}
