export const INDIVIDUALS = ['Josh', 'Anna'] as const;
export const JOINT_ACCOUNT = 'Joint';
export const CRITICALITIES = ['Essential', 'NonEssential'] as const;

export type Individual = (typeof INDIVIDUALS)[number];
export type Criticality = (typeof CRITICALITIES)[number];

/**
 * Maps an account label to one of the two individuals, ignoring case and surrounding space.
 * @returns The canonical name, or null for Joint and any other account
 */
export function toIndividual(account: string | null | undefined): Individual | null {
  const normalized = (account ?? '').trim().toLowerCase();
  return INDIVIDUALS.find((individual) => individual.toLowerCase() === normalized) ?? null;
}

export function isJointAccount(account: string | null | undefined): boolean {
  return (account ?? '').trim().toLowerCase() === JOINT_ACCOUNT.toLowerCase();
}

/**
 * Case-insensitive, trimmed comparison used by every account and field match.
 */
export function sameLabel(a: string | null | undefined, b: string | null | undefined): boolean {
  if (a === null || a === undefined || b === null || b === undefined) {
    return false;
  }
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
