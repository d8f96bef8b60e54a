import * as fs from 'fs';
import * as yaml from 'yaml';
import type { ZodError } from 'zod';
import { GameConfigSchema, type GameConfig, type Recorder } from './types.js';
import { SetupError } from './errors.js';
import { describeError } from './utils.js';
import { logger } from './logger.js';

function formatIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Validate an already-parsed config object. Any schema violation is a SetupError. */
export function parseConfig(raw: unknown): GameConfig {
  const result = GameConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new SetupError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(configPath: string, recorder: Recorder = logger): GameConfig {
  recorder.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const config = parseConfig(yaml.parse(fileContents));

    recorder.log({ type: 'SYSTEM', content: `Configuration loaded: ${config.game} with ${config.players.length} players.` });
    return config;
  } catch (error) {
    recorder.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${describeError(error)}`,
      metadata: { visibility: 'private' },
    });
    if (error instanceof SetupError) throw error;
    throw new SetupError(`Cannot read configuration ${configPath}: ${describeError(error)}`);
  }
}
