import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogInput, LogType, Recorder } from './types.js';
import { EventBus, type Unsubscribe } from './events/eventBus.js';
import { printFacts } from './utils.js';

const TEAM_COLORS: Record<string, (text: string) => string> = {
  Mafia: chalk.red,
  Town: chalk.green,
  Fascists: chalk.red,
  Liberals: chalk.blue,
  Evil: chalk.redBright,
  Good: chalk.cyan,
  Traitors: chalk.magenta,
  Loyalists: chalk.yellow,
  Gamblers: chalk.white,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  PHASE: chalk.bold,
  CHAT: chalk.white,
  ACTION: chalk.yellow,
  VOTE: chalk.blue,
  GOVERNMENT: chalk.cyan,
  DEATH: chalk.bgRed.white,
  FACT: chalk.gray.italic,
  WIN: chalk.green.bold,
};

export interface GameLoggerOptions {
  console?: boolean;
  persist?: boolean;
  logDir?: string;
}

export class GameLogger implements Recorder {
  private logDir: string;
  private logFile: string | null = null;
  private transcriptFile: string | null = null;
  private logs: GameLogEntry[] = [];
  private knownPlayers: Set<string> = new Set();
  private consoleOutputEnabled: boolean;
  private persistenceEnabled: boolean;
  private bus = new EventBus<GameLogEntry>((error, entry) => {
    console.error(`Log subscriber failed on ${entry.type} entry:`, error);
  });
  private playerTeams: Map<string, { role: string; team: string }> = new Map();

  constructor(opts: GameLoggerOptions = {}) {
    this.consoleOutputEnabled = opts.console ?? true;
    this.persistenceEnabled = opts.persist ?? false;
    this.logDir = opts.logDir ?? path.join(process.cwd(), 'logs');
  }

  /**
   * Enable or disable writing structured logs / transcripts to disk.
   *
   * Console output and in-memory logs remain unaffected.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  /** Subscriber callbacks that threw, over the logger's lifetime. */
  get subscriberFailures(): number {
    return this.bus.failureCount;
  }

  subscribe(cb: (entry: GameLogEntry) => void): Unsubscribe {
    return this.bus.subscribe(cb);
  }

  /**
   * Start a fresh log/transcript pair. Called once per game so a multi-game
   * run does not append every game to the same file.
   */
  startGame(label: string, players: ReadonlyArray<{ name: string; role: string; team: string }>) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logs = [];
    this.logFile = path.join(this.logDir, `${label}-${timestamp}.json`);
    this.transcriptFile = path.join(this.logDir, `${label}-transcript-${timestamp}.txt`);
    this.knownPlayers = new Set(players.map(p => p.name));
    this.playerTeams = new Map(players.map(p => [p.name, { role: p.role, team: p.team }]));
  }

  getLogs(): GameLogEntry[] {
    // Return a shallow copy so callers can't mutate logger state.
    return this.logs.slice();
  }

  /**
   * Materialize, persist and print an entry. Throws only if persistence fails;
   * subscriber errors never reach the caller.
   */
  log(entry: LogInput): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    this.logs.push(enriched);
    this.flush();
    this.print(enriched);
    this.bus.emit(enriched);
    return enriched;
  }

  private enrichEntry(entry: GameLogEntry): GameLogEntry {
    // Only infer role if it's not explicitly set in metadata
    const hasRoleProperty = entry.metadata !== undefined && 'role' in entry.metadata;
    const known = entry.player && !hasRoleProperty ? this.playerTeams.get(entry.player) : undefined;
    if (known === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), role: known.role, team: known.team },
    };
  }

  private print(entry: GameLogEntry) {
    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'FACT' && !printFacts()) return;

    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);

    const typeColor = TYPE_COLORS[entry.type] ?? chalk.white;
    const typeStr = typeColor(`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const team = entry.metadata?.team;
      const role = entry.metadata?.role;
      const colorFn = typeof team === 'string' ? TEAM_COLORS[team] : undefined;
      const roleStr = typeof role === 'string' ? ` ${colorFn ? colorFn(role) : role}` : '';
      playerInfo = ` <${chalk.hex('#FFA500')(entry.player)}${roleStr}>`;
    }

    let content = entry.content;
    if (this.knownPlayers.size > 0) {
      // Escape regex special characters in names just in case
      const invalidChars = /[.*+?^${}()|[\]\\]/g;
      const names = Array.from(this.knownPlayers).map(n => n.replace(invalidChars, '\\$&'));
      const playerPattern = new RegExp(`\\b(${names.join('|')})\\b`, 'g');
      content = content.replace(playerPattern, match => chalk.hex('#FFA500')(match));
    }

    console.log(`${prefix} ${typeStr}${playerInfo}: ${content}`);
  }

  private flush() {
    if (!this.persistenceEnabled || !this.logFile || !this.transcriptFile) return;
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    fs.writeFileSync(this.logFile, JSON.stringify(this.logs, null, 2));
    fs.writeFileSync(this.transcriptFile, buildTranscriptText(this.logs));
  }
}

/**
 * Public transcript: only entries everyone at the table saw. Private facts,
 * faction chatter and agent failures are left out.
 */
export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    const visibility = entry.metadata?.visibility;
    if (visibility === 'private' || visibility === 'faction') continue;
    if (entry.type === 'FACT') continue;

    switch (entry.type) {
      case 'PHASE':
        lines.push('');
        lines.push(entry.content);
        break;
      case 'CHAT':
        lines.push(entry.player ? `${entry.player}: ${entry.content}` : `[CHAT] ${entry.content}`);
        break;
      case 'VOTE':
      case 'DEATH':
        lines.push(`[${entry.type}] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd());
        break;
      default:
        lines.push(`[${entry.type}] ${entry.content}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export const logger = new GameLogger();
