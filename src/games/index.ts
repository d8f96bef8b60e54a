import type { GameConfig, GameOutcome, GameState } from '../types.js';
import type { EngineOptions } from '../engine/gameEngine.js';
import { MafiaEngine } from './mafia/engine.js';
import { SecretHitlerEngine } from './secretHitler/engine.js';
import { ClocktowerEngine } from './clocktower/engine.js';
import { ParanoiaEngine } from './paranoia/engine.js';
import { LiarsDeckEngine } from './liarsDeck/engine.js';

/** What the CLI needs from any variant once it is set up. */
export interface RunnableGame {
  readonly state: GameState<string>;
  readonly roster: { all(): ReadonlyArray<{ name: string; role: string; team: string }> };
  start(): Promise<Readonly<GameOutcome<string>>>;
}

/** Seat the players and deal roles for the configured game. Throws SetupError on an illegal table. */
export function createGame(config: GameConfig, options: EngineOptions): RunnableGame {
  switch (config.game) {
    case 'mafia':
      return new MafiaEngine(config, options);
    case 'secret_hitler':
      return new SecretHitlerEngine(config, options);
    case 'clocktower':
      return new ClocktowerEngine(config, options);
    case 'paranoia':
      return new ParanoiaEngine(config, options);
    case 'liars_deck':
      return new LiarsDeckEngine(config, options);
  }
}
