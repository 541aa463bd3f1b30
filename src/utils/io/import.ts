import { parse as parseSync } from 'csv-parse/sync';
import { ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import { Transaction } from '../../data/transaction/transaction';
import { log, warn } from '../log';
import { activeRowToProjections, BUDGET_HEADERS, isActiveStatus } from './budgetFile';

export type ImportResult = {
  importedCount: number;
  errorCount: number;
  duplicateCount: number;
  errorLines: string[];
  importedLines: string[];
};

export type ImportOutcome = {
  result: ImportResult;
  /**
   * New actual transactions, in file order.
   */
  transactions: Transaction[];
  /**
   * New `active` rows, to be kept in the budget CSV as they were imported.
   */
  activeRows: Transaction[];
  /**
   * The active rows as projected expenses.
   */
  planned: ProjectedExpense[];
};

const REQUIRED_COLUMNS = BUDGET_HEADERS.length;

function failed(message: string): ImportOutcome {
  return {
    result: { importedCount: 0, errorCount: 1, duplicateCount: 0, errorLines: [message], importedLines: [] },
    transactions: [],
    activeRows: [],
    planned: [],
  };
}

function isRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

function readRows(csvText: string): string[][] {
  const records: unknown = parseSync(csvText, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  if (!Array.isArray(records)) {
    return [];
  }
  return records.filter(isRow);
}

function rowToTransaction(fields: string[]): Transaction {
  const [name, amount, category, criticality, transactionDate, account, status, createdTime, paymentMethod] =
    fields.map((field) => field.trim());
  if (name === '') {
    throw new Error('Name is required');
  }
  return new Transaction({
    name,
    amount,
    category,
    criticality,
    transactionDate,
    account,
    status,
    createdTime,
    paymentMethod: paymentMethod || null,
  });
}

/**
 * Reads an exported budget CSV (for example a Notion export) and returns the rows to add to
 * the working file.
 *
 * The export needs a header whose first column is `Name` and at least nine columns, in the
 * budget CSV's column order. Per row:
 * - fewer than nine fields, or no name, counts as an error and the row is left out
 * - a row whose hash matches an existing transaction, or one already read from this export,
 *   counts as a duplicate
 * - an `active` row becomes projected expenses; any other row is an actual transaction
 *
 * Problems with the file as a whole are returned as a single error line.
 */
export function importTransactions(csvText: string, existing: readonly Transaction[] = []): ImportOutcome {
  let rows: string[][];
  try {
    rows = readRows(csvText);
  } catch (e) {
    return failed(`Error reading import file: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (rows.length === 0) {
    return failed('Import file is empty.');
  }

  const headers = rows[0];
  if (headers.length < REQUIRED_COLUMNS || headers[0].trim().toLowerCase() !== 'name') {
    return failed(`Import file is missing expected columns: ${headers.join(',')}`);
  }

  const outcome: ImportOutcome = {
    result: { importedCount: 0, errorCount: 0, duplicateCount: 0, errorLines: [], importedLines: [] },
    transactions: [],
    activeRows: [],
    planned: [],
  };
  const seen = new Set(existing.map((tx) => tx.hash));

  for (const fields of rows.slice(1)) {
    const line = fields.join(',');
    if (fields.length < REQUIRED_COLUMNS) {
      outcome.result.errorCount++;
      outcome.result.errorLines.push(line);
      continue;
    }
    try {
      const tx = rowToTransaction(fields);
      if (seen.has(tx.hash)) {
        outcome.result.duplicateCount++;
        continue;
      }
      if (isActiveStatus(tx.status)) {
        outcome.planned.push(...activeRowToProjections(tx));
        outcome.activeRows.push(tx);
      } else {
        outcome.transactions.push(tx);
      }
      seen.add(tx.hash);
      outcome.result.importedCount++;
      outcome.result.importedLines.push(line);
    } catch (e) {
      warn('Import row rejected', { line, reason: e instanceof Error ? e.message : String(e) });
      outcome.result.errorCount++;
      outcome.result.errorLines.push(line);
    }
  }

  log('Imported transactions', {
    imported: outcome.result.importedCount,
    errors: outcome.result.errorCount,
    duplicates: outcome.result.duplicateCount,
  });
  return outcome;
}
