import type { PhaseRunner } from '../../engine/phaseMachine.js';
import { SILENCE } from '../../agentIo.js';
import { pickRandom } from '../../utils.js';
import { HAND_SIZE, isHonestPlay, parsePlay, playOptions, RANKS, type Card } from './roles.js';
import type { LiarsDeckEngine } from './engine.js';

function removeCards(hand: Card[], cards: readonly Card[]): void {
  for (const c of cards) {
    const i = hand.indexOf(c);
    if (i >= 0) hand.splice(i, 1);
  }
}

/**
 * Deal, then play round the table until someone is challenged. A challenge
 * reveals the last play; whoever was wrong pulls the trigger and the round ends.
 * Survivors then update their impression of each other.
 */
export class LiarsDeckRoundPhase implements PhaseRunner<LiarsDeckEngine> {
  readonly name = 'round';

  async run(engine: LiarsDeckEngine): Promise<void> {
    this.deal(engine);
    const result = await this.play(engine);
    await this.reflect(engine, result);
  }

  /** Returns a one-line account of how the round ended. */
  private async play(engine: LiarsDeckEngine): Promise<string> {
    const starter = engine.roster.nextAlive(engine.starterSeat);
    if (!starter) return 'Nobody was left to play.';
    engine.starterSeat = starter.seat;

    let current = starter;
    for (;;) {
      const hand = engine.handOf(current.name);
      if (hand.length === 0) {
        const next = this.nextWithCards(engine, current.seat);
        if (!next) return 'Nobody had cards left to play.';
        current = next;
        continue;
      }

      const label = await engine.agentIO.decide(current.name, {
        kind: 'play',
        prompt: `Target rank: ${engine.target}. Your hand: ${hand.join(', ')}. Play 1-${Math.min(3, hand.length)} cards face down, claiming they are all ${engine.target}.`,
        options: playOptions(hand),
      });
      const cards = label ? parsePlay(label) : [];
      removeCards(hand, cards);
      engine.pile.push(...cards);
      engine.recordPublic({
        type: 'ACTION',
        player: current.name,
        content: `plays ${cards.length} card(s) claiming ${engine.target}. ${hand.length} left.`,
        metadata: { kind: 'play', result: String(cards.length) },
      });

      const next = this.nextWithCards(engine, current.seat);
      const challenger = next ?? engine.roster.nextAlive(current.seat);
      if (!challenger || challenger.name === current.name) return `${current.name} played the last cards unchallenged.`;

      let challenged = next === undefined;
      if (challenged) {
        engine.recordPublic({ type: 'SYSTEM', content: `Nobody else holds cards; ${challenger.name} must call.`, metadata: { kind: 'auto_challenge' } });
      } else {
        const call = await engine.agentIO.decide(challenger.name, {
          kind: 'challenge',
          prompt: `${current.name} played ${cards.length} card(s) claiming ${engine.target}. CHALLENGE (call liar) or PASS?`,
          options: ['CHALLENGE', 'PASS'],
          fallback: 'PASS',
        });
        challenged = call === 'CHALLENGE';
      }

      if (!challenged) {
        current = challenger;
        continue;
      }

      const honest = isHonestPlay(cards, engine.target);
      engine.recordPublic({
        type: 'ACTION',
        player: challenger.name,
        content: `calls liar on ${current.name}. Revealed: ${cards.join(', ')}. ${honest ? 'The claim was true.' : 'The claim was a lie.'}`,
        metadata: { kind: 'challenge', target: current.name, result: honest ? 'honest' : 'lie' },
      });
      const shooter = honest ? challenger.name : current.name;
      const fired = engine.pullTrigger(shooter);
      return `${challenger.name} called liar on ${current.name}; the claim was ${honest ? 'true' : 'a lie'}. ${shooter} pulled the trigger ${fired ? 'and died' : 'and survived'}.`;
    }
  }

  /**
   * Every survivor revises their impression of every other survivor. A silent
   * answer keeps the previous impression.
   */
  private async reflect(engine: LiarsDeckEngine, result: string): Promise<void> {
    const survivors = engine.aliveNames();
    const round = engine.state.counters.round;
    const recentTalk = engine.talk.slice(-engine.config.talk_window);

    const updates = await Promise.all(
      survivors.map(async owner => {
        const lines: { other: string; text: string }[] = [];
        for (const other of survivors) {
          if (other === owner) continue;
          const text = await engine.agentIO.respond(owner, {
            prompt: `Round ${round} is over. ${result} Your previous impression of ${other}: "${engine.opinionOf(owner, other)}" In one or two sentences, update your impression of ${other}.`,
            recentTalk,
          });
          if (text.toUpperCase() !== SILENCE) lines.push({ other, text });
        }
        return lines;
      })
    );

    survivors.forEach((owner, i) => {
      for (const { other, text } of updates[i]) {
        engine.learn(owner, { kind: 'opinion', text: `Your impression of ${other}: ${text}`, data: { target: other, opinion: text } });
      }
    });
  }

  private deal(engine: LiarsDeckEngine): void {
    const returned: Card[] = [...engine.pile];
    for (const hand of engine.hands.values()) returned.push(...hand);
    engine.hands.clear();
    engine.pile = [];
    engine.deck.gather(returned);

    engine.target = pickRandom(RANKS, engine.rng) ?? 'Q';
    engine.recordPublic({ type: 'SYSTEM', content: `Target rank this round: ${engine.target}.`, metadata: { kind: 'target', result: engine.target } });
    for (const p of engine.roster.alive()) {
      const hand = engine.deck.draw(HAND_SIZE);
      engine.hands.set(p.name, hand);
      engine.learn(p.name, { kind: 'hand', text: `Your hand: ${hand.join(', ')}.` });
    }
  }

  private nextWithCards(engine: LiarsDeckEngine, fromSeat: number) {
    let seat = fromSeat;
    for (let i = 0; i < engine.roster.all().length; i++) {
      const next = engine.roster.nextAlive(seat);
      if (!next || next.seat === fromSeat) return undefined;
      if (engine.handOf(next.name).length > 0) return next;
      seat = next.seat;
    }
    return undefined;
  }
}
