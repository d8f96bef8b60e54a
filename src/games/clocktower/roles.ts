import { isOneOf, type RoleTable } from '../../engine/roleAssignment.js';
import { sample } from '../../utils.js';

export const CLOCKTOWER_GOOD_ROLES = [
  'empath',
  'fortune_teller',
  'undertaker',
  'monk',
  'ravenkeeper',
  'chef',
  'slayer',
  'mayor',
  'butler',
] as const;
export const CLOCKTOWER_EVIL_ROLES = ['imp', 'poisoner'] as const;
export const CLOCKTOWER_ROLES = [...CLOCKTOWER_EVIL_ROLES, ...CLOCKTOWER_GOOD_ROLES] as const;

export type ClocktowerRole = (typeof CLOCKTOWER_ROLES)[number];
export type ClocktowerTeam = 'Good' | 'Evil';

export function isEvilRole(role: ClocktowerRole): boolean {
  return role === 'imp' || role === 'poisoner';
}

export const clocktowerRoleTable: RoleTable<ClocktowerRole, ClocktowerTeam> = {
  game: 'clocktower',
  roles: CLOCKTOWER_ROLES,
  playerCounts: { min: 5, max: 9 },
  isRole: (value): value is ClocktowerRole => isOneOf(CLOCKTOWER_ROLES, value),
  teamOf: role => (isEvilRole(role) ? 'Evil' : 'Good'),
  teamCounts: n => ({ Evil: 2, Good: n - 2 }),
  defaultRow: (n, rng) => ['imp', 'poisoner', ...sample(CLOCKTOWER_GOOD_ROLES, n - 2, rng)],
  checkRow: row => {
    if (row.filter(r => r === 'imp').length !== 1) return 'Clocktower needs exactly one imp';
    if (row.filter(r => r === 'poisoner').length !== 1) return 'Clocktower needs exactly one poisoner';
    const good = row.filter(r => !isEvilRole(r));
    if (new Set(good).size !== good.length) return 'Clocktower good roles must all be different';
    return null;
  },
};
