import { Request } from 'express';
import { createProjectedExpenses, ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import type { ProjectedExpenseData } from '../../data/projectedExpense/types';
import { applyBudgetGoal, InvalidGoalError } from '../../utils/calculate/projection';
import type { BudgetGoalResult } from '../../utils/calculate/projection';
import type { BudgetConfig } from '../../utils/config/config';
import { daysRemainingInPeriod, statementPeriodFor } from '../../utils/date/statementPeriod';
import { saveProjections } from '../../utils/io/workspace';
import { log } from '../../utils/log';
import { ApiError } from '../../utils/net/errors';
import { getData } from '../../utils/net/request';
import { getBodyRecord, optionalText, requireNumber, requireText } from '../../utils/net/validate';

export type GoalResponse = {
  statementPeriod: string | null;
  projected: ProjectedExpenseData[];
  results: BudgetGoalResult[];
};

export function getProjections(request: Request, config: BudgetConfig): ProjectedExpenseData[] {
  const data = getData(request, config);
  return data.workspace.projected.map((pe) => pe.serialize());
}

/**
 * Records a planned expense. A Joint plan is stored as two halves, one per person.
 * @returns The records that were added
 */
export function addProjection(request: Request, config: BudgetConfig): ProjectedExpenseData[] {
  const data = getData(request, config);
  const body = getBodyRecord(data.data);

  let added: ProjectedExpense[];
  try {
    added = createProjectedExpenses({
      person: requireText(body, 'person'),
      criticality: requireText(body, 'criticality'),
      category: requireText(body, 'category'),
      amount: requireNumber(body, 'amount'),
      source: 'manual',
      statementPeriod: optionalText(body, 'statementPeriod'),
      name: optionalText(body, 'name'),
    });
  } catch (e) {
    if (e instanceof ApiError) {
      throw e;
    }
    throw new ApiError(e instanceof Error ? e.message : String(e), 400);
  }

  saveProjections(data.projectionsPath, [...data.workspace.projected, ...added]);
  log('Added projected expense', { person: body.person, category: body.category, records: added.length });
  return added.map((pe) => pe.serialize());
}

/**
 * Removes projected expenses by id (`{ ids: [...] }`). Unknown ids are ignored.
 */
export function removeProjections(request: Request, config: BudgetConfig): { removed: number } {
  const data = getData(request, config);
  const body = getBodyRecord(data.data);
  const ids = body.ids;
  if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
    throw new ApiError('ids must be a list of projection ids', 400);
  }

  const remaining = data.workspace.projected.filter((pe) => !ids.includes(pe.id));
  const removed = data.workspace.projected.length - remaining.length;
  if (removed > 0) {
    saveProjections(data.projectionsPath, remaining);
  }
  return { removed };
}

function toGoalNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
}

/**
 * Turns a spending goal into projected expenses and saves the new projection list.
 *
 * Body: `{ person, criticality, category, goalAmount, daysRemaining?, statementPeriod? }`.
 * Without `daysRemaining` the days left in the statement period are used: the given one, or
 * the one containing today.
 */
export function applyGoal(request: Request, config: BudgetConfig, today: Date = new Date()): GoalResponse {
  const data = getData(request, config);
  const body = getBodyRecord(data.data);

  const statementPeriod = optionalText(body, 'statementPeriod') ?? statementPeriodFor(today, data.statementDay);
  let daysRemaining = toGoalNumber(body.daysRemaining);
  if (body.daysRemaining === undefined || body.daysRemaining === null || body.daysRemaining === '') {
    const remaining = daysRemainingInPeriod(statementPeriod, today);
    if (remaining === null) {
      throw new ApiError(`Invalid statement period '${statementPeriod}'`, 400);
    }
    daysRemaining = remaining;
  }

  try {
    const outcome = applyBudgetGoal(
      {
        person: optionalText(body, 'person') ?? '',
        criticality: optionalText(body, 'criticality') ?? '',
        category: optionalText(body, 'category') ?? '',
        goalAmount: toGoalNumber(body.goalAmount),
        daysRemaining,
        statementPeriod,
      },
      data.workspace.transactions,
      data.workspace.projected,
    );
    saveProjections(data.projectionsPath, outcome.projected);
    return {
      statementPeriod,
      projected: outcome.projected.map((pe) => pe.serialize()),
      results: outcome.results,
    };
  } catch (e) {
    if (e instanceof InvalidGoalError) {
      throw new ApiError(e.message, 400);
    }
    throw e;
  }
}
