import type { Individual } from '../account/account';

export type BreakdownKey = {
  person: Individual;
  criticality: string;
  category: string;
};

export type BreakdownEntry = BreakdownKey & {
  amount: number;
};

/**
 * person -> criticality -> category -> amount
 */
export type NestedBreakdown = Record<Individual, Record<string, Record<string, number>>>;
