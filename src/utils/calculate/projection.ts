import { INDIVIDUALS, isJointAccount, sameLabel, toIndividual } from '../../data/account/account';
import type { Individual } from '../../data/account/account';
import { ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import { normalizeCriticality, Transaction } from '../../data/transaction/transaction';
import { log } from '../log';

export type ProjectionInput = {
  goalAmount: number;
  daysRemaining: number;
  actualSpent: number;
  alreadyProjected: number;
};

export type Projection = {
  weeks: number;
  projectedAmount: number;
  perWeek: number;
};

export type BudgetGoalRequest = {
  person: string;
  criticality: string;
  category: string;
  goalAmount: number;
  daysRemaining: number;
  statementPeriod?: string | null;
};

export type BudgetGoalResult = Projection & {
  person: Individual;
  goalAmount: number;
  actualSpent: number;
  alreadyProjected: number;
};

export type BudgetGoalOutcome = {
  /**
   * The full projection list after the goal was applied. The input list is left as it was.
   */
  projected: ProjectedExpense[];
  results: BudgetGoalResult[];
};

/**
 * Raised when a goal request is missing a required value or holds one that is not a number.
 */
export class InvalidGoalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidGoalError';
  }
}

/**
 * Splits what is left of a spending goal across the remaining weeks.
 *
 * @example
 * ```typescript
 * calculateProjection({ goalAmount: 800, daysRemaining: 10, actualSpent: 300, alreadyProjected: 0 });
 * // Returns: { weeks: 2, projectedAmount: 500, perWeek: 250 }
 * ```
 */
export function calculateProjection(input: ProjectionInput): Projection {
  const weeks = Math.max(1, Math.ceil(input.daysRemaining / 7));
  const projectedAmount = Math.max(0, input.goalAmount - input.actualSpent - input.alreadyProjected);
  return {
    weeks,
    projectedAmount,
    perWeek: projectedAmount / weeks,
  };
}

/**
 * What one person has spent in a category: their own transactions plus half of every Joint
 * transaction, matching category and criticality while ignoring case and surrounding space.
 */
export function computeActualSpent(
  transactions: readonly Transaction[],
  person: Individual,
  criticality: string,
  category: string,
): number {
  let actualSpent = 0;
  for (const tx of transactions) {
    if (!sameLabel(tx.category, category) || !sameLabel(tx.criticality, normalizeCriticality(criticality))) {
      continue;
    }
    if (isJointAccount(tx.account)) {
      actualSpent += tx.amount / 2;
    } else if (sameLabel(tx.account, person)) {
      actualSpent += tx.amount;
    }
  }
  return actualSpent;
}

export function sumProjected(
  projected: readonly ProjectedExpense[],
  person: Individual,
  criticality: string,
  category: string,
): number {
  return projected.filter((pe) => pe.matches(person, criticality, category)).reduce((sum, pe) => sum + pe.amount, 0);
}

function validateGoalRequest(request: BudgetGoalRequest): void {
  if (typeof request.goalAmount !== 'number' || !Number.isFinite(request.goalAmount)) {
    throw new InvalidGoalError('Enter a valid number for the goal');
  }
  if (request.goalAmount < 0) {
    throw new InvalidGoalError('The goal must not be negative');
  }
  if (typeof request.daysRemaining !== 'number' || !Number.isFinite(request.daysRemaining)) {
    throw new InvalidGoalError('Enter a valid number for the days remaining');
  }
  if (request.daysRemaining < 0) {
    throw new InvalidGoalError('Days remaining must not be negative');
  }
  if (!request.category || request.category.trim() === '') {
    throw new InvalidGoalError('A category is required');
  }
  if (!request.criticality || request.criticality.trim() === '') {
    throw new InvalidGoalError('A criticality is required');
  }
}

function resolvePeople(person: string): readonly Individual[] {
  if (isJointAccount(person)) {
    return INDIVIDUALS;
  }
  const individual = toIndividual(person);
  if (!individual) {
    throw new InvalidGoalError(`Unknown person '${person}'`);
  }
  return [individual];
}

/**
 * Turns a spending goal into projected expenses.
 *
 * For each person involved (both, with half the goal each, when the goal is Joint):
 * - the amount already projected for (person, criticality, category) is summed
 * - every projected entry for that key is removed
 * - a new `goal` entry holding `max(0, goal - actual - alreadyProjected)` is added when above 0
 *
 * Applying a goal twice for one key therefore replaces the earlier entry instead of stacking.
 *
 * @throws InvalidGoalError when the goal, days, category, criticality or person are invalid
 */
export function applyBudgetGoal(
  request: BudgetGoalRequest,
  transactions: readonly Transaction[],
  projected: readonly ProjectedExpense[],
): BudgetGoalOutcome {
  validateGoalRequest(request);

  const people = resolvePeople(request.person);
  const goalAmount = isJointAccount(request.person) ? request.goalAmount / 2 : request.goalAmount;
  const criticality = normalizeCriticality(request.criticality);
  const category = request.category.trim();

  let next = [...projected];
  const results: BudgetGoalResult[] = [];
  for (const person of people) {
    const actualSpent = computeActualSpent(transactions, person, criticality, category);
    const alreadyProjected = sumProjected(next, person, criticality, category);
    next = next.filter((pe) => !pe.matches(person, criticality, category));

    const projection = calculateProjection({
      goalAmount,
      daysRemaining: request.daysRemaining,
      actualSpent,
      alreadyProjected,
    });
    if (projection.projectedAmount > 0) {
      next.push(
        new ProjectedExpense({
          person,
          criticality,
          category,
          amount: projection.projectedAmount,
          isJoint: false,
          source: 'goal',
          statementPeriod: request.statementPeriod ?? null,
          name: null,
        }),
      );
    }
    log('Applied budget goal', {
      person,
      category,
      criticality,
      goalAmount,
      actualSpent,
      alreadyProjected,
      projectedAmount: projection.projectedAmount,
    });
    results.push({ person, goalAmount, actualSpent, alreadyProjected, ...projection });
  }

  return { projected: next, results };
}
