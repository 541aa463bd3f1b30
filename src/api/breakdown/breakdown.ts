import { Request } from 'express';
import { INDIVIDUALS } from '../../data/account/account';
import type { Individual } from '../../data/account/account';
import type { NestedBreakdown } from '../../data/breakdown/types';
import type { SerializedTransaction } from '../../data/transaction/types';
import { buildBreakdown } from '../../utils/calculate/breakdown';
import type { BudgetConfig } from '../../utils/config/config';
import { getData } from '../../utils/net/request';

export type BreakdownResponse = {
  includeProjected: boolean;
  breakdown: NestedBreakdown;
  totals: Record<Individual, number>;
  skipped: SerializedTransaction[];
};

/**
 * Spending by person, criticality and category. Projected expenses are included unless
 * `includeProjected=false`.
 */
export function getBreakdown(request: Request, config: BudgetConfig): BreakdownResponse {
  const data = getData(request, config);
  const { breakdown, skipped } = buildBreakdown(data.workspace.transactions, data.workspace.projected, {
    includeProjected: data.includeProjected,
  });

  const totals: Record<Individual, number> = { Josh: 0, Anna: 0 };
  for (const person of INDIVIDUALS) {
    totals[person] = breakdown.total(person);
  }
  return {
    includeProjected: data.includeProjected,
    breakdown: breakdown.toNested(),
    totals,
    skipped: skipped.map((tx) => tx.serialize()),
  };
}
