import { isJointAccount, sameLabel } from '../../data/account/account';
import { Transaction } from '../../data/transaction/transaction';
import { joinLine } from '../csv/csv';

export type PaymentSummaryRow = {
  card: string;
  annaPayment: number;
  joshPayment: number;
};

export const PAYMENT_SUMMARY_HEADERS = ['Card', 'Anna Payment', 'Josh Payment'];

/**
 * What each person owes per card: their own transactions on the card plus half of the
 * Joint transactions on it. Cards are the non-blank payment methods, sorted by name and
 * compared without regard to case.
 */
export function buildPaymentSummary(transactions: readonly Transaction[]): PaymentSummaryRow[] {
  const byKey = new Map<string, string>();
  for (const tx of transactions) {
    const card = tx.paymentMethod?.trim() ?? '';
    if (card !== '' && !byKey.has(card.toLowerCase())) {
      byKey.set(card.toLowerCase(), card);
    }
  }
  const cards = [...byKey.values()].sort((a, b) => a.localeCompare(b));

  return cards.map((card) => {
    let anna = 0;
    let josh = 0;
    let joint = 0;
    for (const tx of transactions) {
      if (!sameLabel(tx.paymentMethod, card)) {
        continue;
      }
      if (sameLabel(tx.account, 'Anna')) {
        anna += tx.amount;
      } else if (sameLabel(tx.account, 'Josh')) {
        josh += tx.amount;
      } else if (isJointAccount(tx.account)) {
        joint += tx.amount;
      }
    }
    return { card, annaPayment: anna + joint / 2, joshPayment: josh + joint / 2 };
  });
}

export function paymentSummaryToCsv(rows: readonly PaymentSummaryRow[]): string {
  const lines = [
    joinLine(PAYMENT_SUMMARY_HEADERS),
    ...rows.map((row) => joinLine([row.card, row.annaPayment.toFixed(2), row.joshPayment.toFixed(2)])),
  ];
  return lines.join('\n') + '\n';
}
