import type { BudgetWorkspace } from '../io/workspace';

export type RequestQuery = {
  column: string | null;
  value: string | null;
  account: string | null;
  criticality: string | null;
  category: string | null;
  individual: string | null;
  statementPeriod: string | null;
  includeProjected: boolean;
};

export type RequestData = RequestQuery & {
  csvPath: string;
  projectionsPath: string;
  statementDay: number;
  workspace: BudgetWorkspace;
  /**
   * The request body, JSON-parsed when it arrived as text. Handlers narrow it themselves.
   */
  data: unknown;
};
