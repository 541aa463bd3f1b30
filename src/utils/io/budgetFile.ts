import { createProjectedExpenses, ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import { Transaction } from '../../data/transaction/transaction';
import { joinLine, splitLine } from '../csv/csv';
import { log, warn } from '../log';
import { checkExists, readText, writeText } from './io';

export const BUDGET_HEADERS = [
  'Name',
  'Amount',
  'Category',
  'Criticality',
  'Transaction Date',
  'Account',
  'status',
  'Created time',
  'Payment Method',
] as const;

export const BUDGET_HEADER_LINE = BUDGET_HEADERS.join(',');
const MIN_FIELDS = 8;
const ACTIVE_STATUS = 'active';

export type SkippedLine = {
  lineNumber: number;
  line: string;
  reason: string;
};

export type BudgetFileContents = {
  /**
   * Actual spending, every row whose status is not `active`.
   */
  transactions: Transaction[];
  /**
   * Rows marked `active`, kept as read so they survive a rewrite of the file.
   */
  activeRows: Transaction[];
  /**
   * The active rows as projected expenses (source `import`).
   */
  planned: ProjectedExpense[];
  skipped: SkippedLine[];
};

export function isActiveStatus(status: string): boolean {
  return status.trim().toLowerCase() === ACTIVE_STATUS;
}

/**
 * Planned spending from an `active` row. A Joint row yields one half for each person.
 *
 * Ids come from the row's content hash, so re-reading an unchanged file gives the same ids.
 * `occurrence` tells apart identical rows in one file.
 * @throws Error when the row's account is not Josh, Anna or Joint
 */
export function activeRowToProjections(row: Transaction, occurrence = 0): ProjectedExpense[] {
  const key = `import-${row.hash.slice(0, 16)}${occurrence > 0 ? `-${occurrence}` : ''}`;
  const halves = createProjectedExpenses({
    person: row.account,
    criticality: row.criticality,
    category: row.category,
    amount: row.amount,
    source: 'import',
    statementPeriod: row.statementPeriod,
    name: row.name === '' ? null : row.name,
  });
  return halves.map((pe) => new ProjectedExpense({ ...pe.serialize(), id: `${key}-${pe.person.toLowerCase()}` }));
}

function rowToTransaction(fields: string[]): Transaction {
  const [name, amount, category, criticality, transactionDate, account, status, createdTime, paymentMethod] =
    fields.map((field) => field.trim());
  return new Transaction({
    name,
    amount,
    category,
    criticality,
    transactionDate,
    account,
    status,
    createdTime,
    paymentMethod: paymentMethod ? paymentMethod : null,
  });
}

/**
 * Parses the text of a budget CSV.
 *
 * The first line is the header and is skipped. Blank lines and lines starting with a comma
 * are ignored; lines with fewer than eight fields, and active rows that name an unknown
 * person, are reported in `skipped` while the rest of the file is still read.
 */
export function parseBudgetCsv(text: string): BudgetFileContents {
  const contents: BudgetFileContents = { transactions: [], activeRows: [], planned: [], skipped: [] };
  const lines = text.split(/\r?\n/);
  const seenActive = new Map<string, number>();

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === '' || line.startsWith(',')) {
      continue;
    }
    const lineNumber = i + 1;
    const fields = splitLine(line);
    if (fields.length < MIN_FIELDS) {
      warn('Skipping budget row with too few fields', { lineNumber, fields: fields.length });
      contents.skipped.push({ lineNumber, line, reason: `Expected at least ${MIN_FIELDS} fields, found ${fields.length}` });
      continue;
    }

    const row = rowToTransaction(fields);
    if (!isActiveStatus(row.status)) {
      contents.transactions.push(row);
      continue;
    }
    const occurrence = seenActive.get(row.hash) ?? 0;
    seenActive.set(row.hash, occurrence + 1);
    try {
      contents.planned.push(...activeRowToProjections(row, occurrence));
      contents.activeRows.push(row);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      warn('Skipping active budget row', { lineNumber, reason });
      contents.skipped.push({ lineNumber, line, reason });
    }
  }

  return contents;
}

function toRow(tx: Transaction): string {
  return joinLine([
    tx.name,
    tx.formattedAmount,
    tx.category,
    tx.criticality,
    tx.transactionDate,
    tx.account,
    tx.status,
    tx.createdTime,
    tx.paymentMethod ?? '',
  ]);
}

/**
 * The budget CSV text for the given rows, header first, one row per line.
 */
export function serializeBudgetCsv(transactions: readonly Transaction[], activeRows: readonly Transaction[] = []): string {
  return [BUDGET_HEADER_LINE, ...transactions.map(toRow), ...activeRows.map(toRow)].join('\n') + '\n';
}

/**
 * Makes sure the budget CSV exists and starts with the expected header.
 *
 * - A missing or empty file is written with the header only
 * - A file whose first line is some other header gets the expected header in its place
 * - A file whose first line is data gets the header put in front of it
 *
 * @throws Error when the file cannot be read or written
 */
export function ensureBudgetFile(filePath: string) {
  if (!checkExists(filePath)) {
    log('Creating budget file', filePath);
    writeText(filePath, BUDGET_HEADER_LINE + '\n');
    return;
  }

  const lines = readText(filePath).split(/\r?\n/);
  const firstLine = lines[0].trim();
  if (firstLine === BUDGET_HEADER_LINE) {
    return;
  }

  const looksLikeHeader = firstLine === '' || firstLine.includes(',Amount,');
  const dataLines = (looksLikeHeader ? lines.slice(1) : lines).filter((line) => line.trim() !== '');
  warn('Repairing budget file header', { filePath, firstLine });
  writeText(filePath, [BUDGET_HEADER_LINE, ...dataLines].join('\n') + '\n');
}

/**
 * @throws Error when the file cannot be read
 */
export function readBudgetFile(filePath: string): BudgetFileContents {
  return parseBudgetCsv(readText(filePath));
}

/**
 * Rewrites the whole budget CSV.
 */
export function saveBudgetFile(
  filePath: string,
  transactions: readonly Transaction[],
  activeRows: readonly Transaction[] = [],
) {
  writeText(filePath, serializeBudgetCsv(transactions, activeRows));
}
