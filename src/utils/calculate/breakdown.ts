import { INDIVIDUALS, isJointAccount, toIndividual } from '../../data/account/account';
import { Breakdown } from '../../data/breakdown/breakdown';
import { ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import { Transaction } from '../../data/transaction/transaction';
import { TransactionList } from '../../data/transaction/transactionList';
import { warn } from '../log';

export type BreakdownOptions = {
  includeProjected: boolean;
};

export type BreakdownResult = {
  breakdown: Breakdown;
  /**
   * Transactions whose account is neither Josh, Anna nor Joint. They are not counted anywhere.
   */
  skipped: Transaction[];
};

function toArray(transactions: readonly Transaction[] | TransactionList): readonly Transaction[] {
  return transactions instanceof TransactionList ? transactions.getTransactions() : transactions;
}

/**
 * Sums spending by person, criticality and category.
 *
 * Processing logic:
 * - Josh and Anna transactions go to their own bucket
 * - Joint transactions put half of the amount in each person's bucket
 * - Any other account is skipped and reported with a warning
 * - Projected expenses (already halved for Joint plans) add their full amount, unless
 *   `includeProjected` is false
 *
 * @example
 * ```typescript
 * const { breakdown } = buildBreakdown([jointGroceries120], []);
 * breakdown.get('Josh', 'Essential', 'Groceries'); // 60
 * breakdown.get('Anna', 'Essential', 'Groceries'); // 60
 * ```
 */
export function buildBreakdown(
  transactions: readonly Transaction[] | TransactionList,
  projectedExpenses: readonly ProjectedExpense[] | null = null,
  options: BreakdownOptions = { includeProjected: true },
): BreakdownResult {
  const breakdown = new Breakdown();
  const skipped: Transaction[] = [];

  for (const tx of toArray(transactions)) {
    const individual = toIndividual(tx.account);
    if (individual) {
      breakdown.add({ person: individual, criticality: tx.criticality, category: tx.category }, tx.amount);
    } else if (isJointAccount(tx.account)) {
      for (const person of INDIVIDUALS) {
        breakdown.add({ person, criticality: tx.criticality, category: tx.category }, tx.amount / 2);
      }
    } else {
      warn('Transaction skipped from breakdown: unknown account', {
        name: tx.name,
        account: tx.account,
        amount: tx.amount,
      });
      skipped.push(tx);
    }
  }

  if (options.includeProjected && projectedExpenses) {
    for (const pe of projectedExpenses) {
      breakdown.add({ person: pe.person, criticality: pe.criticality, category: pe.category }, pe.amount);
    }
  }

  return { breakdown, skipped };
}

/**
 * The actuals-only breakdown: the same sums without any projected expense.
 */
export function buildActualsBreakdown(transactions: readonly Transaction[] | TransactionList): BreakdownResult {
  return buildBreakdown(transactions, null, { includeProjected: false });
}
