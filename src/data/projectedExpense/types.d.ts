import type { Individual } from '../account/account';

export type ProjectionSource = 'manual' | 'goal' | 'import';

export type ProjectedExpenseData = {
  id: string;
  person: Individual;
  criticality: string;
  category: string;
  amount: number;
  isJoint: boolean;
  source: ProjectionSource;
  statementPeriod: string | null;
  name: string | null;
};

/**
 * Input for recording a planned expense. `person` may be Josh, Anna or Joint.
 */
export type NewProjectedExpense = {
  person: string;
  criticality: string;
  category: string;
  amount: number;
  source?: ProjectionSource;
  statementPeriod?: string | null;
  name?: string | null;
};
