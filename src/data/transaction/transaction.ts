import { createHash } from 'crypto';
import { formatAmount, parseAmount } from '../../utils/csv/csv';
import { parseTransactionDate } from '../../utils/date/date';
import type { SerializedTransaction, TransactionData } from './types';

export const DEFAULT_STATUS = 'imported';

/**
 * Trims a criticality label and removes its internal spaces, so "Non Essential"
 * and "NonEssential" compare equal.
 */
export function normalizeCriticality(criticality: string | null | undefined): string {
  return (criticality ?? '').trim().replace(/\s+/g, '');
}

/**
 * SHA-256 hex digest of the given fields, each trimmed and joined with `|`.
 * Missing fields are written as `null`.
 */
export function computeTransactionHash(...fields: (string | null | undefined)[]): string {
  const source = fields.map((field) => (field === null || field === undefined ? 'null' : field.trim())).join('|');
  return createHash('sha256').update(source, 'utf8').digest('hex');
}

/**
 * One spending event from the budget CSV.
 *
 * Instances are never changed after construction; `with` returns an edited copy.
 */
export class Transaction {
  readonly name: string;
  readonly amount: number;
  readonly category: string;
  readonly criticality: string;
  readonly transactionDate: string;
  readonly account: string;
  readonly status: string;
  readonly createdTime: string;
  readonly paymentMethod: string | null;
  readonly statementPeriod: string | null;

  constructor(data: TransactionData) {
    this.name = data.name ?? '';
    this.amount = typeof data.amount === 'number' ? data.amount : parseAmount(data.amount);
    this.category = data.category ?? '';
    this.criticality = normalizeCriticality(data.criticality);
    this.transactionDate = data.transactionDate ?? '';
    this.account = data.account ?? '';
    this.status = data.status && data.status.trim() !== '' ? data.status : DEFAULT_STATUS;
    this.createdTime = data.createdTime ?? '';
    this.paymentMethod = data.paymentMethod || null;
    this.statementPeriod = data.statementPeriod || null;
  }

  /**
   * The transaction date parsed from its free-text column, or null when unreadable.
   */
  get date(): Date | null {
    return parseTransactionDate(this.transactionDate);
  }

  /**
   * The amount as written to the CSV, e.g. `$12.50`.
   */
  get formattedAmount(): string {
    return formatAmount(this.amount);
  }

  /**
   * Identity used to spot the same transaction imported twice.
   */
  get hash(): string {
    return computeTransactionHash(
      this.name,
      this.formattedAmount,
      this.category,
      this.transactionDate,
      this.account,
      this.statementPeriod,
    );
  }

  /**
   * Returns a copy with the given fields replaced. Criticality is normalized again.
   */
  with(changes: Partial<TransactionData>): Transaction {
    return new Transaction({ ...this.serialize(), ...changes });
  }

  serialize(): SerializedTransaction {
    return {
      name: this.name,
      amount: this.amount,
      category: this.category,
      criticality: this.criticality,
      transactionDate: this.transactionDate,
      account: this.account,
      status: this.status,
      createdTime: this.createdTime,
      paymentMethod: this.paymentMethod,
      statementPeriod: this.statementPeriod,
    };
  }
}
