import { toIndividual } from '../../data/account/account';
import { ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import type { ProjectionSource } from '../../data/projectedExpense/types';
import { joinLine, parseAmount, splitLine } from '../csv/csv';
import { warn } from '../log';
import { checkExists, readText, writeText } from './io';

export const PROJECTED_HEADERS = [
  'Id',
  'Person',
  'Criticality',
  'Category',
  'Amount',
  'Joint',
  'Source',
  'Statement Period',
  'Name',
] as const;

export const PROJECTED_HEADER_LINE = PROJECTED_HEADERS.join(',');

const SOURCES: readonly ProjectionSource[] = ['manual', 'goal', 'import'];

function toSource(value: string): ProjectionSource {
  const normalized = value.trim().toLowerCase();
  return SOURCES.find((source) => source === normalized) ?? 'manual';
}

function rowToProjection(fields: string[]): ProjectedExpense | null {
  const [id, personText, criticality, category, amount, joint, source, statementPeriod, name] = fields.map((field) =>
    field.trim(),
  );
  const person = toIndividual(personText);
  if (!person || !category) {
    return null;
  }
  return new ProjectedExpense({
    id,
    person,
    criticality,
    category,
    amount: parseAmount(amount),
    isJoint: joint.toLowerCase() === 'true',
    source: toSource(source),
    statementPeriod: statementPeriod || null,
    name: name || null,
  });
}

/**
 * Parses the text of a projections CSV. Rows that are blank, short, or name someone other
 * than Josh or Anna are skipped with a warning.
 */
export function parseProjectedCsv(text: string): ProjectedExpense[] {
  const projected: ProjectedExpense[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === '') {
      continue;
    }
    const fields = splitLine(line);
    const row = fields.length >= PROJECTED_HEADERS.length ? rowToProjection(fields) : null;
    if (!row) {
      warn('Skipping projected row', { lineNumber: i + 1, line });
      continue;
    }
    projected.push(row);
  }
  return projected;
}

export function serializeProjectedCsv(projected: readonly ProjectedExpense[]): string {
  const rows = projected.map((pe) =>
    joinLine([
      pe.id,
      pe.person,
      pe.criticality,
      pe.category,
      String(pe.amount),
      String(pe.isJoint),
      pe.source,
      pe.statementPeriod ?? '',
      pe.name ?? '',
    ]),
  );
  return [PROJECTED_HEADER_LINE, ...rows].join('\n') + '\n';
}

/**
 * Reads the projections file.
 * @returns The projections, or null when the file does not exist yet
 */
export function readProjectedFile(filePath: string): ProjectedExpense[] | null {
  if (!checkExists(filePath)) {
    return null;
  }
  return parseProjectedCsv(readText(filePath));
}

export function saveProjectedFile(filePath: string, projected: readonly ProjectedExpense[]) {
  writeText(filePath, serializeProjectedCsv(projected));
}
