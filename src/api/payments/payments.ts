import { Request } from 'express';
import { buildPaymentSummary, paymentSummaryToCsv } from '../../utils/calculate/paymentSummary';
import type { PaymentSummaryRow } from '../../utils/calculate/paymentSummary';
import type { BudgetConfig } from '../../utils/config/config';
import { getData } from '../../utils/net/request';

export function getPaymentSummary(request: Request, config: BudgetConfig): PaymentSummaryRow[] {
  const data = getData(request, config);
  return buildPaymentSummary(data.workspace.transactions);
}

/**
 * The payment summary as a CSV download.
 */
export function getPaymentSummaryCsv(request: Request, config: BudgetConfig): string {
  return paymentSummaryToCsv(getPaymentSummary(request, config));
}
