import { isOneOf, type RoleTable } from '../../engine/roleAssignment.js';

export const MAFIA_ROLES = ['mafia', 'doctor', 'detective', 'townsperson'] as const;
export type MafiaRole = (typeof MAFIA_ROLES)[number];
export type MafiaTeam = 'Mafia' | 'Town';

// Player count -> number of mafia.
const MAFIA_COUNT: Readonly<Record<number, number>> = { 5: 1, 6: 2, 7: 2, 8: 2, 9: 3, 10: 3 };

function mafiaCount(playerCount: number): number {
  return MAFIA_COUNT[playerCount] ?? Math.max(1, Math.floor(playerCount / 4));
}

export const mafiaRoleTable: RoleTable<MafiaRole, MafiaTeam> = {
  game: 'mafia',
  roles: MAFIA_ROLES,
  playerCounts: { min: 5, max: 10 },
  isRole: (value): value is MafiaRole => isOneOf(MAFIA_ROLES, value),
  teamOf: role => (role === 'mafia' ? 'Mafia' : 'Town'),
  teamCounts: n => ({ Mafia: mafiaCount(n), Town: n - mafiaCount(n) }),
  defaultRow: n => {
    const mafia = mafiaCount(n);
    return [
      ...new Array<MafiaRole>(mafia).fill('mafia'),
      'doctor',
      'detective',
      ...new Array<MafiaRole>(n - mafia - 2).fill('townsperson'),
    ];
  },
};
