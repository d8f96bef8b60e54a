import { isOneOf, type RoleTable } from '../../engine/roleAssignment.js';

export const PARANOIA_ROLES = ['traitor', 'loyalist'] as const;
export type ParanoiaRole = (typeof PARANOIA_ROLES)[number];
export type ParanoiaTeam = 'Traitors' | 'Loyalists';

const TRAITORS: Readonly<Record<number, number>> = { 4: 1, 5: 1, 6: 2, 7: 2, 8: 2 };

function traitorCount(n: number): number {
  return TRAITORS[n] ?? Math.max(1, Math.floor(n / 3));
}

export const paranoiaRoleTable: RoleTable<ParanoiaRole, ParanoiaTeam> = {
  game: 'paranoia',
  roles: PARANOIA_ROLES,
  playerCounts: { min: 4, max: 8 },
  isRole: (value): value is ParanoiaRole => isOneOf(PARANOIA_ROLES, value),
  teamOf: role => (role === 'traitor' ? 'Traitors' : 'Loyalists'),
  teamCounts: n => ({ Traitors: traitorCount(n), Loyalists: n - traitorCount(n) }),
  defaultRow: n => [
    ...new Array<ParanoiaRole>(traitorCount(n)).fill('traitor'),
    ...new Array<ParanoiaRole>(n - traitorCount(n)).fill('loyalist'),
  ],
};

export const MOODS = ['SATISFIED', 'SUSPICIOUS', 'ANGRY'] as const;
export type Mood = (typeof MOODS)[number];

export const MISSIONS = [
  'Locate and neutralize a suspected Communist spy in Sector R',
  'Investigate unusual energy readings from the Food Vats',
  'Test experimental happiness-enhancing drugs on volunteers',
  'Patrol Corridor 7-G for signs of mutant activity',
  'Deliver classified documents to IntSec Station 5',
  'Recalibrate the bot-brain of a malfunctioning scrubot',
  'Audit the morale of the Hygiene Department',
  'Escort a crate of unlabelled equipment to R&D',
] as const;
