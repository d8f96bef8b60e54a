import { isOneOf, type RoleTable } from '../../engine/roleAssignment.js';

export const SECRET_HITLER_ROLES = ['liberal', 'fascist', 'hitler'] as const;
export type SecretHitlerRole = (typeof SECRET_HITLER_ROLES)[number];
export type SecretHitlerTeam = 'Liberals' | 'Fascists';

// Player count -> [liberals, fascists other than Hitler].
const ROW: Readonly<Record<number, readonly [number, number]>> = {
  5: [3, 1],
  6: [4, 1],
  7: [4, 2],
  8: [5, 2],
  9: [5, 3],
  10: [6, 3],
};

function split(n: number): readonly [number, number] {
  return ROW[n] ?? [n - 1 - Math.floor((n - 1) / 2), Math.floor((n - 1) / 2)];
}

export const secretHitlerRoleTable: RoleTable<SecretHitlerRole, SecretHitlerTeam> = {
  game: 'secret_hitler',
  roles: SECRET_HITLER_ROLES,
  playerCounts: { min: 5, max: 10 },
  isRole: (value): value is SecretHitlerRole => isOneOf(SECRET_HITLER_ROLES, value),
  teamOf: role => (role === 'liberal' ? 'Liberals' : 'Fascists'),
  teamCounts: n => {
    const [liberals, fascists] = split(n);
    return { Liberals: liberals, Fascists: fascists + 1 };
  },
  defaultRow: n => {
    const [liberals, fascists] = split(n);
    return [
      ...new Array<SecretHitlerRole>(liberals).fill('liberal'),
      ...new Array<SecretHitlerRole>(fascists).fill('fascist'),
      'hitler',
    ];
  },
  checkRow: row => (row.filter(r => r === 'hitler').length === 1 ? null : 'Secret Hitler needs exactly one hitler'),
};

export type Policy = 'Liberal' | 'Fascist';
export const LIBERAL_POLICIES = 6;
export const FASCIST_POLICIES = 11;
export const POLICY_TOTAL = LIBERAL_POLICIES + FASCIST_POLICIES;

export type PresidentialPower = 'investigate' | 'special_election' | 'peek' | 'execute';

/** Power granted when the nth fascist policy is enacted, by table size. */
export function presidentialPower(playerCount: number, fascistPolicies: number): PresidentialPower | undefined {
  if (fascistPolicies === 4 || fascistPolicies === 5) return 'execute';
  if (playerCount <= 6) return fascistPolicies === 3 ? 'peek' : undefined;
  if (fascistPolicies === 3) return 'special_election';
  if (fascistPolicies === 2) return 'investigate';
  if (fascistPolicies === 1 && playerCount >= 9) return 'investigate';
  return undefined;
}
