import { Request } from 'express';
import { TransactionList } from '../../data/transaction/transactionList';
import type { BudgetConfig } from '../../utils/config/config';
import { ApiError } from '../../utils/net/errors';
import { getData } from '../../utils/net/request';

export type CategoryTotalsResponse = {
  account: string;
  criticality: string;
  totals: Record<string, number>;
};

/**
 * Category totals for `account` and `criticality`. Blank categories are reported under
 * `(Uncategorized)`.
 */
export function getCategoryTotals(request: Request, config: BudgetConfig): CategoryTotalsResponse {
  const data = getData(request, config);
  if (data.account === null || data.criticality === null) {
    throw new ApiError('account and criticality are required', 400);
  }
  const list = new TransactionList(data.workspace.transactions);
  return {
    account: data.account,
    criticality: data.criticality,
    totals: Object.fromEntries(list.getCategoryTotals(data.account, data.criticality)),
  };
}
