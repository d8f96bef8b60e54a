import type { RoleTable } from '../../engine/roleAssignment.js';

export type LiarsDeckRole = 'gambler';
export type LiarsDeckTeam = 'Gamblers';

export const liarsDeckRoleTable: RoleTable<LiarsDeckRole, LiarsDeckTeam> = {
  game: 'liars_deck',
  roles: ['gambler'],
  playerCounts: { min: 2, max: 4 },
  isRole: (value): value is LiarsDeckRole => value === 'gambler',
  teamOf: () => 'Gamblers',
  teamCounts: n => ({ Gamblers: n }),
  defaultRow: n => new Array<LiarsDeckRole>(n).fill('gambler'),
};

export const RANKS = ['Q', 'K', 'A'] as const;
export type Rank = (typeof RANKS)[number];
export type Card = Rank | 'Joker';

const CARD_ORDER: readonly Card[] = ['Q', 'K', 'A', 'Joker'];

export const COPIES_PER_RANK = 6;
export const JOKERS = 2;
export const HAND_SIZE = 5;
export const CHAMBERS = 6;
export const MAX_PLAY = 3;

export function buildDeck(): Card[] {
  const cards: Card[] = [];
  for (const rank of RANKS) for (let i = 0; i < COPIES_PER_RANK; i++) cards.push(rank);
  for (let i = 0; i < JOKERS; i++) cards.push('Joker');
  return cards;
}

function isCard(value: string): value is Card {
  return CARD_ORDER.some(c => c === value);
}

/** Every distinct play of 1-3 cards from the hand, e.g. "Q", "Q+Q", "K+Joker". */
export function playOptions(hand: readonly Card[]): string[] {
  const counts = new Map<Card, number>();
  for (const c of hand) counts.set(c, (counts.get(c) ?? 0) + 1);

  const out: string[] = [];
  const extend = (from: number, picked: Card[]) => {
    if (picked.length > 0) out.push(picked.join('+'));
    if (picked.length === MAX_PLAY) return;
    for (let k = from; k < CARD_ORDER.length; k++) {
      const card = CARD_ORDER[k];
      const used = picked.filter(p => p === card).length;
      if (used < (counts.get(card) ?? 0)) extend(k, [...picked, card]);
    }
  };
  extend(0, []);
  return out;
}

export function parsePlay(label: string): Card[] {
  return label.split('+').filter(isCard);
}

/** A play is honest when every card is the target rank or a Joker. */
export function isHonestPlay(cards: readonly Card[], target: Rank): boolean {
  return cards.every(c => c === target || c === 'Joker');
}
