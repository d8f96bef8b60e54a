#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { DryRunAgent, LlmAgent, type PlayerAgent } from './agent.js';
import { createGame } from './games/index.js';
import { GameKindSchema, type GameConfig, type GameKind } from './types.js';
import { describeError, isDryRun } from './utils.js';

interface CliArgs {
  configFile: string;
  dryRun: boolean;
  seed?: number;
  games: number;
  persist: boolean;
  game?: GameKind;
}

function numberArg(arg: string, next: string | undefined): number {
  if (!next) throw new Error(`Missing value for ${arg}`);
  const n = Number(next);
  if (!Number.isInteger(n)) throw new Error(`Invalid value "${next}" for ${arg}`);
  return n;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configFile: 'game-config.yaml', dryRun: isDryRun(), games: 1, persist: true };
  let positional = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    // Package managers often forward a literal `--`.
    if (arg === '--') continue;

    switch (arg) {
      case '--dry-run':
        args.dryRun = true;
        continue;
      case '--no-persist':
        args.persist = false;
        continue;
      case '--seed':
        args.seed = numberArg(arg, argv[++i]);
        continue;
      case '--games':
        args.games = Math.max(1, numberArg(arg, argv[++i]));
        continue;
      case '--config': {
        const next = argv[++i];
        if (!next) throw new Error('Missing value for --config');
        args.configFile = next;
        continue;
      }
      case '--game': {
        const parsed = GameKindSchema.safeParse(argv[++i]);
        if (!parsed.success) throw new Error(`--game must be one of ${GameKindSchema.options.join(', ')}`);
        args.game = parsed.data;
        continue;
      }
    }

    if (arg.startsWith('-')) throw new Error(`Unknown argument: ${arg}`);
    if (!positional) {
      args.configFile = arg;
      positional = true;
    }
  }
  return args;
}

function buildAgents(config: GameConfig, dryRun: boolean, seed: number): Record<string, PlayerAgent> {
  const agents: Record<string, PlayerAgent> = {};
  for (const p of config.players) {
    agents[p.name] = dryRun ? new DryRunAgent(p.name, seed) : new LlmAgent(p, config.system_prompt);
  }
  return agents;
}

async function main() {
  dotenv.config();
  const args = parseArgs(process.argv.slice(2));

  // The default provider is Vercel AI Gateway; dry runs need no key.
  if (!args.dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error('Missing AI_GATEWAY_API_KEY. Add it to your .env file, or run with --dry-run.');
  }

  logger.setPersistenceEnabled(args.persist);
  const base = loadConfig(path.resolve(process.cwd(), args.configFile));
  const baseSeed = args.seed ?? base.seed ?? Date.now();
  if (args.dryRun) logger.log({ type: 'SYSTEM', content: `Dry-run mode (seed ${baseSeed}).` });

  const results: Array<{ game: number; winner: string; forced: boolean; reason: string }> = [];
  for (let g = 1; g <= args.games; g++) {
    const config: GameConfig = { ...base, game: args.game ?? base.game, seed: baseSeed + g - 1 };
    const game = createGame(config, {
      agents: buildAgents(config, args.dryRun, baseSeed + g - 1),
      recorder: logger,
    });
    logger.startGame(config.game, game.roster.all());
    const outcome = await game.start();
    results.push({ game: g, winner: outcome.winner, forced: outcome.forced, reason: outcome.reason });
    if (game.state.recorderFailures > 0) {
      console.warn(chalk.yellow(`Game ${g}: ${game.state.recorderFailures} log entries could not be written.`));
    }
  }

  if (logger.subscriberFailures > 0) {
    console.warn(chalk.yellow(`${logger.subscriberFailures} log subscriber calls failed.`));
  }

  console.log(chalk.bold('\nSummary'));
  const tally = new Map<string, number>();
  for (const r of results) {
    tally.set(r.winner, (tally.get(r.winner) ?? 0) + 1);
    console.log(`  Game ${r.game}: ${chalk.green(r.winner)}${r.forced ? chalk.gray(' (forced)') : ''} - ${r.reason}`);
  }
  for (const [winner, wins] of tally) console.log(`  ${winner}: ${wins}/${results.length}`);
}

main().catch(error => {
  console.error(chalk.red(`Fatal error: ${describeError(error)}`));
  process.exitCode = 1;
});
