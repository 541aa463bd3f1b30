import { Request } from 'express';
import type { SerializedTransaction } from '../../data/transaction/types';
import { TransactionList } from '../../data/transaction/transactionList';
import { buildWeeklyBreakdown } from '../../utils/calculate/weekly';
import type { BudgetConfig } from '../../utils/config/config';
import { formatDate } from '../../utils/date/date';
import { parseStatementPeriod, statementPeriodFor } from '../../utils/date/statementPeriod';
import { ApiError } from '../../utils/net/errors';
import { getData } from '../../utils/net/request';

export type WeeklyResponse = {
  statementPeriod: string;
  weeks: {
    week: number;
    label: string;
    start: string;
    end: string;
    total: number;
    transactions: SerializedTransaction[];
  }[];
};

/**
 * Weekly totals across a statement period, for an optional `category` and `account`.
 * Without `statementPeriod` the period containing today is used.
 */
export function getWeeklyBreakdown(request: Request, config: BudgetConfig, today: Date = new Date()): WeeklyResponse {
  const data = getData(request, config);
  const statementPeriod = data.statementPeriod ?? statementPeriodFor(today, data.statementDay);
  const range = parseStatementPeriod(statementPeriod);
  if (!range) {
    throw new ApiError(`Invalid statement period '${statementPeriod}'`, 400);
  }

  let list = new TransactionList(data.workspace.transactions);
  if (data.account !== null) {
    list = list.filterByAccount(data.account);
  }
  if (data.category !== null) {
    list = list.filterByCategory(data.category);
  }

  return {
    statementPeriod,
    weeks: buildWeeklyBreakdown(list.getTransactions(), range.start, range.end).map((week) => ({
      week: week.week,
      label: week.label,
      start: formatDate(week.start),
      end: formatDate(week.end),
      total: week.total,
      transactions: week.transactions.map((tx) => tx.serialize()),
    })),
  };
}
