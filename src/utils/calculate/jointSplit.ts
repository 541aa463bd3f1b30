import { isJointAccount, sameLabel, toIndividual } from '../../data/account/account';
import type { Individual } from '../../data/account/account';
import { Transaction } from '../../data/transaction/transaction';

export const SPLIT_MARKER = ' [Split Joint]';

/**
 * Derives an individual's half of a Joint transaction: amount halved, name marked as split,
 * account rewritten to the individual.
 *
 * @returns The derived copy, or null when the transaction is not on the Joint account
 */
export function splitJointForIndividual(transaction: Transaction, individual: Individual): Transaction | null {
  if (!isJointAccount(transaction.account)) {
    return null;
  }
  return transaction.with({
    name: transaction.name + SPLIT_MARKER,
    amount: transaction.amount / 2,
    account: individual,
  });
}

/**
 * What a transaction means for one person: their own transactions as they are, their half of
 * Joint transactions, nothing otherwise.
 *
 * When `account` is not Josh or Anna only exact (case-insensitive) account matches count.
 */
export function attributeToAccount(transaction: Transaction, account: string): Transaction | null {
  const individual = toIndividual(account);
  if (individual === null) {
    return sameLabel(transaction.account, account) ? transaction : null;
  }
  if (sameLabel(transaction.account, individual)) {
    return transaction;
  }
  return splitJointForIndividual(transaction, individual);
}
