import os from 'os';
import path from 'path';

export const PROJECTIONS_FILE_NAME = 'projections.csv';
const DEFAULT_PORT = 5002;

/**
 * Everything the server needs to know about its files and secrets, passed explicitly
 * to the request layer instead of being read from globals.
 */
export type BudgetConfig = {
  csvPath: string | null;
  projectionsPath: string | null;
  cacheFile: string;
  lastView: string | null;
  statementDay: number;
  port: number;
  jwtSecret: string;
  passwordHash: string | null;
  logFile: string | null;
};

function blankToNull(value: string | undefined): string | null {
  return value && value.trim() !== '' ? value.trim() : null;
}

/**
 * The projections file lives beside the budget CSV.
 *
 * @example
 * ```typescript
 * deriveProjectionsPath('/home/me/budget/september.csv');
 * // Returns: '/home/me/budget/projections.csv'
 * ```
 */
export function deriveProjectionsPath(csvPath: string): string {
  return path.join(path.dirname(csvPath), PROJECTIONS_FILE_NAME);
}

function parsePort(value: string | undefined): number {
  const port = parseInt(value ?? '', 10);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

function parseStatementDay(value: string | undefined): number {
  const day = parseInt(value ?? '', 10);
  return Number.isInteger(day) && day >= 1 && day <= 31 ? day : 1;
}

/**
 * Builds the configuration from environment variables (`.env` is loaded by the entry point).
 *
 * - `BUDGET_CSV_PATH`: working budget CSV (null when unset)
 * - `PROJECTIONS_CSV_PATH`: defaults to `projections.csv` beside the budget CSV
 * - `BUDGET_CACHE_FILE`: defaults to `~/.budget-breakdown/cache.json`
 * - `BUDGET_LAST_VIEW`, `STATEMENT_DAY`, `PORT`, `JWT_SECRET`, `BUDGET_PASSWORD_HASH`, `LOG_FILE`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BudgetConfig {
  const csvPath = blankToNull(env.BUDGET_CSV_PATH);
  return {
    csvPath,
    projectionsPath: blankToNull(env.PROJECTIONS_CSV_PATH) ?? (csvPath ? deriveProjectionsPath(csvPath) : null),
    cacheFile: blankToNull(env.BUDGET_CACHE_FILE) ?? path.join(os.homedir(), '.budget-breakdown', 'cache.json'),
    lastView: blankToNull(env.BUDGET_LAST_VIEW),
    statementDay: parseStatementDay(env.STATEMENT_DAY),
    port: parsePort(env.PORT),
    jwtSecret: env.JWT_SECRET || '',
    passwordHash: blankToNull(env.BUDGET_PASSWORD_HASH),
    logFile: blankToNull(env.LOG_FILE),
  };
}
