import { Request } from 'express';
import { toIndividual } from '../../data/account/account';
import { Transaction } from '../../data/transaction/transaction';
import { TransactionList } from '../../data/transaction/transactionList';
import type { SerializedTransaction } from '../../data/transaction/types';
import type { BudgetConfig } from '../../utils/config/config';
import { log } from '../../utils/log';
import { isActiveStatus } from '../../utils/io/budgetFile';
import { saveTransactions } from '../../utils/io/workspace';
import { ApiError } from '../../utils/net/errors';
import { getData } from '../../utils/net/request';
import { getBodyRecord, optionalText, requireText } from '../../utils/net/validate';

export type TransactionListResponse = {
  description: string;
  totalAmount: number;
  totalCount: number;
  transactions: SerializedTransaction[];
};

function toResponse(list: TransactionList): TransactionListResponse {
  return {
    description: list.getDescription(),
    totalAmount: list.getTotalAmount(),
    totalCount: list.getTotalCount(),
    transactions: list.getTransactions().map((tx) => tx.serialize()),
  };
}

/**
 * Lists the working transactions, optionally filtered.
 *
 * Query parameters:
 * - `column` and `value`: filter by a budget CSV column
 * - `account`: restrict to an account; Josh and Anna include half of each Joint transaction
 */
export function getTransactions(request: Request, config: BudgetConfig): TransactionListResponse {
  const data = getData(request, config);
  const list = new TransactionList(data.workspace.transactions, 'All transactions');

  if (data.column !== null) {
    if (data.value === null) {
      throw new ApiError('A value is required when filtering by column', 400);
    }
    try {
      return toResponse(list.filter(data.column, data.value, data.account ?? undefined));
    } catch (e) {
      throw new ApiError(e instanceof Error ? e.message : String(e), 400);
    }
  }
  return toResponse(data.account !== null ? list.filterByAccount(data.account) : list);
}

/**
 * Appends a transaction to the budget CSV.
 * @throws ApiError (400) for an `active` status; planned spending is added through the projections API
 */
export function addTransaction(request: Request, config: BudgetConfig): SerializedTransaction {
  const data = getData(request, config);
  const body = getBodyRecord(data.data);
  const amount = body.amount;
  if (typeof amount !== 'number' && typeof amount !== 'string') {
    throw new ApiError('amount is required', 400);
  }
  const status = optionalText(body, 'status');
  if (status !== null && isActiveStatus(status)) {
    throw new ApiError(`Status '${status}' is reserved for projected expenses`, 400);
  }

  const transaction = new Transaction({
    name: requireText(body, 'name'),
    amount,
    category: optionalText(body, 'category') ?? '',
    criticality: requireText(body, 'criticality'),
    transactionDate: optionalText(body, 'transactionDate') ?? '',
    account: requireText(body, 'account'),
    status,
    createdTime: optionalText(body, 'createdTime'),
    paymentMethod: optionalText(body, 'paymentMethod'),
  });
  saveTransactions(data.csvPath, [...data.workspace.transactions, transaction]);
  log('Added transaction', { name: transaction.name, account: transaction.account, amount: transaction.amount });
  return transaction.serialize();
}

/**
 * Removes the transaction at a position of the unfiltered list (`/api/transactions/:index`).
 */
export function removeTransaction(request: Request, config: BudgetConfig): SerializedTransaction {
  const data = getData(request, config);
  const index = Number(request.params.index);
  const transactions = data.workspace.transactions;
  if (!Number.isInteger(index) || index < 0 || index >= transactions.length) {
    throw new ApiError(`Transaction ${request.params.index} not found`, 404);
  }

  const removed = transactions[index];
  saveTransactions(
    data.csvPath,
    transactions.filter((_, i) => i !== index),
  );
  log('Removed transaction', { index, name: removed.name });
  return removed.serialize();
}

/**
 * One person's transactions including their half of every Joint transaction.
 *
 * Query parameters: `individual` (Josh or Anna), optional `criticality`.
 */
export function getPersonalizedTransactions(request: Request, config: BudgetConfig): TransactionListResponse {
  const data = getData(request, config);
  const individual = toIndividual(data.individual);
  if (!individual) {
    throw new ApiError('individual must be Josh or Anna', 400);
  }
  const list = new TransactionList(data.workspace.transactions, 'All transactions');
  const transactions = list.getPersonalizedTransactions(individual, data.criticality ?? undefined);
  const description = `${individual}${data.criticality ? ` ${data.criticality}` : ''} transactions`;
  return toResponse(new TransactionList(transactions, description));
}
