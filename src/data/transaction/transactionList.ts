import { sameLabel, toIndividual } from '../account/account';
import { attributeToAccount } from '../../utils/calculate/jointSplit';
import { normalizeCriticality, Transaction } from './transaction';
import type { TransactionColumn } from './types';

export const UNCATEGORIZED = '(Uncategorized)';

type FieldColumn = Exclude<TransactionColumn, 'Account' | 'Amount'>;

const FIELD_GETTERS: Record<FieldColumn, (transaction: Transaction) => string | null> = {
  Name: (tx) => tx.name,
  Category: (tx) => tx.category,
  Criticality: (tx) => tx.criticality,
  'Transaction Date': (tx) => tx.transactionDate,
  status: (tx) => tx.status,
  'Created time': (tx) => tx.createdTime,
  'Payment Method': (tx) => tx.paymentMethod,
  'Statement Period': (tx) => tx.statementPeriod,
};

const FIELD_COLUMNS: readonly FieldColumn[] = [
  'Name',
  'Category',
  'Criticality',
  'Transaction Date',
  'status',
  'Created time',
  'Payment Method',
  'Statement Period',
];

function categoryKey(transaction: Transaction): string {
  return transaction.category.trim() === '' ? UNCATEGORIZED : transaction.category;
}

function amountMatches(transaction: Transaction, value: string): boolean {
  const wanted = value.trim();
  if (sameLabel(transaction.formattedAmount, wanted)) {
    return true;
  }
  const parsed = Number(wanted.replace(/[$,]/g, ''));
  return wanted !== '' && Number.isFinite(parsed) && parsed === transaction.amount;
}

/**
 * An immutable snapshot of transactions with filters and totals.
 *
 * Every filter returns a new list. Filtering by Josh or Anna includes their half of each
 * Joint transaction (see `attributeToAccount`), so per-person totals always carry half of
 * the shared spending.
 */
export class TransactionList {
  private readonly transactions: readonly Transaction[];
  private readonly description: string;
  private readonly totalAmount: number;
  private readonly totalCount: number;
  private categoryMap: Map<string, Transaction[]> | null = null;

  constructor(transactions: readonly Transaction[] | null | undefined, description: string = '') {
    this.transactions = Object.freeze([...(transactions ?? [])]);
    this.description = description;
    this.totalAmount = this.transactions.reduce((sum, tx) => sum + tx.amount, 0);
    this.totalCount = this.transactions.length;
  }

  getTransactions(): readonly Transaction[] {
    return this.transactions;
  }

  getDescription(): string {
    return this.description;
  }

  getTotalAmount(): number {
    return this.totalAmount;
  }

  getTotalCount(): number {
    return this.totalCount;
  }

  /**
   * Transactions grouped by category. A blank category groups under `(Uncategorized)`.
   * The result is a fresh copy each call.
   */
  byCategory(): Map<string, Transaction[]> {
    if (!this.categoryMap) {
      const map = new Map<string, Transaction[]>();
      for (const tx of this.transactions) {
        const key = categoryKey(tx);
        map.set(key, [...(map.get(key) ?? []), tx]);
      }
      this.categoryMap = map;
    }
    return new Map([...this.categoryMap].map(([category, txs]) => [category, [...txs]]));
  }

  filterByName(name: string, account?: string): TransactionList {
    return this.filterByField('Name', name, account);
  }

  /**
   * Matches either the formatted amount (`$12.50`) or the plain number (`12.5`).
   */
  filterByAmount(amount: string, account?: string): TransactionList {
    return this.filterHelper('Amount', amount, (tx) => amountMatches(tx, amount), account);
  }

  filterByCategory(category: string, account?: string): TransactionList {
    return this.filterByField('Category', category, account);
  }

  filterByCriticality(criticality: string, account?: string): TransactionList {
    return this.filterByField('Criticality', criticality, account);
  }

  filterByTransactionDate(transactionDate: string, account?: string): TransactionList {
    return this.filterByField('Transaction Date', transactionDate, account);
  }

  filterByStatus(status: string, account?: string): TransactionList {
    return this.filterByField('status', status, account);
  }

  filterByCreatedTime(createdTime: string, account?: string): TransactionList {
    return this.filterByField('Created time', createdTime, account);
  }

  filterByPaymentMethod(paymentMethod: string, account?: string): TransactionList {
    return this.filterByField('Payment Method', paymentMethod, account);
  }

  filterByStatementPeriod(statementPeriod: string, account?: string): TransactionList {
    return this.filterByField('Statement Period', statementPeriod, account);
  }

  /**
   * Keeps the transactions of one account. Josh and Anna also receive a halved copy of
   * every Joint transaction; other accounts match exactly, ignoring case.
   */
  filterByAccount(account: string): TransactionList {
    return this.filterHelper('Account', account, () => true, account, false);
  }

  /**
   * Filters by a budget CSV column name (case-insensitive).
   * @throws Error when the column is unknown
   */
  filter(column: string, value: string, account?: string): TransactionList {
    const normalized = column.trim().toLowerCase();
    if (normalized === 'account') {
      return this.filterByAccount(value);
    }
    if (normalized === 'amount') {
      return this.filterByAmount(value, account);
    }
    const match = FIELD_COLUMNS.find((key) => key.toLowerCase() === normalized);
    if (!match) {
      throw new Error(`Unknown column '${column}'`);
    }
    return this.filterByField(match, value, account);
  }

  /**
   * Transactions for one individual, including their half of every Joint transaction.
   */
  getPersonalizedTransactions(individual: string, criticality?: string): Transaction[] {
    const person = toIndividual(individual);
    if (!person) {
      return [];
    }
    const wanted = criticality === undefined ? null : normalizeCriticality(criticality);
    return this.collect(person, (tx) => wanted === null || sameLabel(tx.criticality, wanted));
  }

  /**
   * Category totals for one account and criticality. A blank category is reported under
   * `(Uncategorized)`; only categories present in the data appear.
   */
  getCategoryTotals(account: string, criticality: string): Map<string, number> {
    const groups = this.filterByAccount(account).filterByCriticality(criticality).byCategory();
    return new Map([...groups].map(([category, txs]) => [category, txs.reduce((sum, tx) => sum + tx.amount, 0)]));
  }

  private filterByField(
    field: FieldColumn,
    value: string,
    account?: string,
  ): TransactionList {
    const getter = FIELD_GETTERS[field];
    const wanted = field === 'Criticality' ? normalizeCriticality(value) : value;
    return this.filterHelper(field, value, (tx) => sameLabel(getter(tx), wanted), account);
  }

  private filterHelper(
    field: TransactionColumn,
    value: string,
    matches: (transaction: Transaction) => boolean,
    account: string | undefined,
    describeAccount: boolean = true,
  ): TransactionList {
    const filtered = account === undefined ? this.transactions.filter(matches) : this.collect(account, matches);

    let description = `${this.description} (Filtered: ${field}=${value}`.trim();
    if (account !== undefined && describeAccount) {
      description += `, Account=${account}`;
    }
    return new TransactionList(filtered, description + ')');
  }

  private collect(account: string, matches: (transaction: Transaction) => boolean): Transaction[] {
    const result: Transaction[] = [];
    for (const tx of this.transactions) {
      if (!matches(tx)) {
        continue;
      }
      const attributed = attributeToAccount(tx, account);
      if (attributed) {
        result.push(attributed);
      }
    }
    return result;
  }
}
