import { z } from 'zod';

// --- Configuration Types ---

export const GameKindSchema = z.enum(['mafia', 'secret_hitler', 'clocktower', 'paranoia', 'liars_deck']);
export type GameKind = z.infer<typeof GameKindSchema>;

export const PlayerConfigSchema = z.object({
  name: z.string().min(1),
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o`.
  model: z.string().default('openai/gpt-4o'),
  temperature: z.number().default(0.7),
  systemPrompt: z.string().optional(),
});
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

export const GameConfigSchema = z
  .object({
    game: GameKindSchema.default('clocktower'),
    system_prompt: z.string().optional(),
    players: z.array(PlayerConfigSchema).min(2),
    // Map player name to role (optional, for forced assignment). Checked against the game's role table.
    roles: z.record(z.string(), z.string()).optional(),
    // Replaces the role table row for this player count. Team totals must still match the table.
    role_counts: z.record(z.string(), z.number().int().nonnegative()).optional(),
    seed: z.number().int().optional(),
    // 'shuffle' randomizes seating once at setup; 'config' keeps the order of `players`.
    seat_order: z.enum(['shuffle', 'config']).default('shuffle'),
    max_rounds: z.number().int().positive().default(20),
    max_game_ms: z.number().int().positive().default(3_600_000),
    decision_timeout_ms: z.number().int().nonnegative().default(60_000),
    response_timeout_ms: z.number().int().nonnegative().default(90_000),
    max_attempts: z.number().int().positive().default(2),
    table_talk_passes: z.number().int().nonnegative().default(2),
    talk_window: z.number().int().positive().default(8),
    paranoia: z
      .object({
        // Chance, after every mission and hearing, that the Computer ends the game on a whim.
        termination_chance: z.number().min(0).max(1).default(0.05),
        // Chance, per player, of a secret society membership and, separately, of a mutant power.
        intel_chance: z.number().min(0).max(1).default(0.25),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.players.forEach((p, i) => {
      if (seen.has(p.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['players', i, 'name'],
          message: `Duplicate player name "${p.name}"`,
        });
      }
      seen.add(p.name);
    });
  });
export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;

// --- Game State Types ---

export type PhaseName = 'setup' | 'night' | 'day' | 'round' | 'mission' | 'hearing' | 'terminal';
export type CounterName = 'round' | 'night' | 'day';

export interface GameOutcome<W extends string> {
  winner: W;
  reason: string;
  // True when the winner came from the fallback rule (round cap, wall clock, engine abort).
  forced: boolean;
}

export interface GameState<W extends string> {
  phase: PhaseName;
  counters: Record<CounterName, number>;
  outcome?: Readonly<GameOutcome<W>>;
  recorderFailures: number;
  startedAt: number;
  history: GameLogEntry[];
}

export interface PublicState {
  game: GameKind;
  phase: PhaseName;
  round: number;
  night: number;
  day: number;
  alive: string[];
  dead: string[];
  board: Record<string, string | number | boolean>;
}

// --- Logging Types ---

export type LogType = 'SYSTEM' | 'PHASE' | 'CHAT' | 'ACTION' | 'VOTE' | 'GOVERNMENT' | 'DEATH' | 'FACT' | 'WIN';

export type LogVisibility = 'public' | 'private' | 'faction';

export interface GameLogMetadata {
  role?: string;
  team?: string;
  visibility?: LogVisibility;
  kind?: string;

  player?: string; // player referred-to (not necessarily the actor)
  target?: string;
  vote?: string;
  result?: string;
  round?: number;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}

export type LogInput = Omit<GameLogEntry, 'id' | 'timestamp'>;

/**
 * Append-only event sink. The engine calls it after every mutation and only
 * cares whether the call threw.
 */
export interface Recorder {
  log(entry: LogInput): GameLogEntry;
}
