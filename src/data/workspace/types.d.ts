import type { ProjectedExpenseData } from '../projectedExpense/types';
import type { SerializedTransaction } from '../transaction/types';

/**
 * Local settings kept between runs in the cache JSON file.
 */
export type LocalCacheState = {
  budgetCsvPath: string | null;
  lastView: string | null;
  currentStatementPeriod: string | null;
  recentBudgetFiles: string[];
  recentProjectedFiles: string[];
  statementPeriods: string[];
  statementPeriodToFileMap: Record<string, string>;
  appConfig: Record<string, string>;
  version: string;
};

export type WorkspaceSections = {
  budgetTransactions: SerializedTransaction[];
  projectedTransactions: ProjectedExpenseData[];
  localCacheState: LocalCacheState;
};

export type WorkspaceHashes = {
  budgetTransactionsHash: string;
  projectionsHash: string;
  localCacheStateHash: string;
};

/**
 * Everything the server holds for one budget, with a hash per section so a copy can be
 * checked against the files it came from.
 */
export type WorkspaceSnapshot = WorkspaceSections &
  WorkspaceHashes & {
    version: string;
    lastModified: string;
  };
