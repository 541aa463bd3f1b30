export type TransactionData = {
  name: string;
  amount: number | string;
  category: string;
  criticality: string;
  transactionDate: string;
  account: string;
  status?: string | null;
  createdTime?: string | null;
  paymentMethod?: string | null;
  statementPeriod?: string | null;
};

export type SerializedTransaction = {
  name: string;
  amount: number;
  category: string;
  criticality: string;
  transactionDate: string;
  account: string;
  status: string;
  createdTime: string;
  paymentMethod: string | null;
  statementPeriod: string | null;
};

/**
 * Column names of the budget CSV, also accepted by `TransactionList.filter`.
 */
export type TransactionColumn =
  | 'Name'
  | 'Amount'
  | 'Category'
  | 'Criticality'
  | 'Transaction Date'
  | 'Account'
  | 'status'
  | 'Created time'
  | 'Payment Method'
  | 'Statement Period';
