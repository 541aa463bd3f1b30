import { ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import { Transaction } from '../../data/transaction/transaction';
import type { LocalCacheState, WorkspaceSnapshot } from '../../data/workspace/types';
import { buildWorkspaceSnapshot } from '../../data/workspace/workspace';
import { readBudgetFile, saveBudgetFile } from './budgetFile';
import type { SkippedLine } from './budgetFile';
import { importTransactions } from './import';
import type { ImportResult } from './import';
import { loadCacheState } from './localCache';
import { readProjectedFile, saveProjectedFile } from './projectedFile';

export type BudgetWorkspace = {
  transactions: Transaction[];
  activeRows: Transaction[];
  projected: ProjectedExpense[];
  skipped: SkippedLine[];
};

/**
 * Reads the budget CSV and the projections beside it. Until the projections file has been
 * written, the projections are the budget CSV's `active` rows.
 */
export function loadBudgetWorkspace(csvPath: string, projectionsPath: string | null): BudgetWorkspace {
  const contents = readBudgetFile(csvPath);
  const stored = projectionsPath ? readProjectedFile(projectionsPath) : null;
  return {
    transactions: contents.transactions,
    activeRows: contents.activeRows,
    projected: stored ?? contents.planned,
    skipped: contents.skipped,
  };
}

/**
 * Replaces the actual transactions in the budget CSV. Its `active` rows are written back unchanged.
 */
export function saveTransactions(csvPath: string, transactions: readonly Transaction[]) {
  const { activeRows } = readBudgetFile(csvPath);
  saveBudgetFile(csvPath, transactions, activeRows);
}

export function saveProjections(projectionsPath: string, projected: readonly ProjectedExpense[]) {
  saveProjectedFile(projectionsPath, projected);
}

/**
 * Imports an exported CSV into the working files: new transactions and active rows are added
 * to the budget CSV, and new projected expenses to the projections file.
 */
export function importIntoWorkspace(csvPath: string, projectionsPath: string | null, csvText: string): ImportResult {
  const workspace = loadBudgetWorkspace(csvPath, projectionsPath);
  const outcome = importTransactions(csvText, [...workspace.transactions, ...workspace.activeRows]);

  if (outcome.transactions.length > 0 || outcome.activeRows.length > 0) {
    saveBudgetFile(
      csvPath,
      [...workspace.transactions, ...outcome.transactions],
      [...workspace.activeRows, ...outcome.activeRows],
    );
  }
  if (projectionsPath && outcome.planned.length > 0) {
    saveProjectedFile(projectionsPath, [...workspace.projected, ...outcome.planned]);
  }
  return outcome.result;
}

/**
 * Everything the server holds for the configured budget as one hashed snapshot.
 */
export function readWorkspaceSnapshot(
  csvPath: string,
  projectionsPath: string | null,
  cacheFile: string,
  lastModified: Date = new Date(),
): WorkspaceSnapshot {
  const workspace = loadBudgetWorkspace(csvPath, projectionsPath);
  const localCacheState: LocalCacheState = loadCacheState(cacheFile);
  return buildWorkspaceSnapshot(
    {
      budgetTransactions: workspace.transactions.map((tx) => tx.serialize()),
      projectedTransactions: workspace.projected.map((pe) => pe.serialize()),
      localCacheState,
    },
    lastModified,
  );
}
