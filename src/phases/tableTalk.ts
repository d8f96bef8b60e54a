import type { EngineContext } from '../engine/gameEngine.js';
import { SILENCE } from '../agentIo.js';

export interface TableTalkOptions {
  prompt: string;
  speakers?: readonly string[];
}

function post(ctx: EngineContext, speaker: string, text: string) {
  if (!text || text.toUpperCase() === SILENCE) return;
  ctx.talk.push({ speaker, text });
  ctx.recordPublic({ type: 'CHAT', player: speaker, content: text });
}

/**
 * Public discussion. The opening pass is gathered concurrently and posted in
 * seat order; later passes go round the table so each speaker sees the
 * lines before theirs.
 */
export async function runTableTalk(ctx: EngineContext, opts: TableTalkOptions): Promise<void> {
  const speakers = opts.speakers ?? ctx.aliveNames();
  const window = ctx.config.talk_window;

  for (let pass = 1; pass <= ctx.config.table_talk_passes; pass++) {
    if (pass === 1) {
      const recentTalk = ctx.talk.slice(-window);
      const lines = await Promise.all(speakers.map(s => ctx.agentIO.respond(s, { prompt: opts.prompt, recentTalk })));
      speakers.forEach((s, i) => post(ctx, s, lines[i]));
      continue;
    }
    for (const speaker of speakers) {
      const line = await ctx.agentIO.respond(speaker, { prompt: opts.prompt, recentTalk: ctx.talk.slice(-window) });
      post(ctx, speaker, line);
    }
  }
}
