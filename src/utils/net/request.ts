import { Request } from 'express';
import { deriveProjectionsPath } from '../config/config';
import type { BudgetConfig } from '../config/config';
import { statementPeriodFor } from '../date/statementPeriod';
import { loadBudgetWorkspace } from '../io/workspace';
import { Transaction } from '../../data/transaction/transaction';
import { ApiError } from './errors';
import type { RequestData, RequestQuery } from './types';

/**
 * A single, non-blank query parameter. Repeated parameters and nested objects are ignored.
 */
export function getQueryString(request: Request, name: string): string | null {
  const value = request.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

function getBoolean(request: Request, name: string, defaultValue: boolean): boolean {
  const value = getQueryString(request, name);
  if (value === null) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

export function getQuery(request: Request): RequestQuery {
  return {
    column: getQueryString(request, 'column'),
    value: getQueryString(request, 'value'),
    account: getQueryString(request, 'account'),
    criticality: getQueryString(request, 'criticality'),
    category: getQueryString(request, 'category'),
    individual: getQueryString(request, 'individual'),
    statementPeriod: getQueryString(request, 'statementPeriod'),
    includeProjected: getBoolean(request, 'includeProjected', true),
  };
}

/**
 * Parses the body to JSON when it arrived as text; anything else is passed through.
 */
export function getBody(request: Request): unknown {
  const body: unknown = request.body;
  if (typeof body !== 'string') {
    return body;
  }
  try {
    return JSON.parse(body);
  } catch (_) {
    // Pass the raw value if it's not JSON
    return body;
  }
}

/**
 * Labels each dated transaction with the statement period it falls in.
 */
export function withStatementPeriods(transactions: readonly Transaction[], statementDay: number): Transaction[] {
  return transactions.map((tx) => {
    const date = tx.date;
    return date && !tx.statementPeriod ? tx.with({ statementPeriod: statementPeriodFor(date, statementDay) }) : tx;
  });
}

/**
 * Request data parser: query parameters, the body, and the budget files named by the configuration.
 *
 * @throws ApiError (404) when no budget CSV is configured
 */
export function getData(request: Request, config: BudgetConfig): RequestData {
  if (!config.csvPath) {
    throw new ApiError('No budget CSV is configured', 404);
  }
  const projectionsPath = config.projectionsPath ?? deriveProjectionsPath(config.csvPath);
  const workspace = loadBudgetWorkspace(config.csvPath, projectionsPath);

  return {
    ...getQuery(request),
    csvPath: config.csvPath,
    projectionsPath,
    statementDay: config.statementDay,
    workspace: {
      ...workspace,
      transactions: withStatementPeriods(workspace.transactions, config.statementDay),
    },
    data: getBody(request),
  };
}
