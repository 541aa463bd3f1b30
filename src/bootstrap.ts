import { Express } from 'express';
import { createApp } from './app';
import { deriveProjectionsPath } from './utils/config/config';
import type { BudgetConfig } from './utils/config/config';
import { ensureBudgetFile } from './utils/io/budgetFile';
import { loadCacheState, rememberBudgetFile, saveCacheState, setLastView } from './utils/io/localCache';
import { err, log, setLogFile } from './utils/log';

export enum ExitCode {
  NoBudgetFile = 0,
  InitializationFailed = 1,
  WiringFailed = 2,
}

export type BootstrapResult = { app: Express } | { exitCode: ExitCode };

/**
 * Prepares the budget files and builds the application.
 *
 * - No budget CSV configured: exit code 0
 * - The budget CSV cannot be created or its header repaired: exit code 1
 * - Recording the files in the local cache or building the routes fails: exit code 2
 */
export function bootstrap(config: BudgetConfig): BootstrapResult {
  setLogFile(config.logFile);

  if (!config.csvPath) {
    log('No budget CSV configured (set BUDGET_CSV_PATH), exiting');
    return { exitCode: ExitCode.NoBudgetFile };
  }

  try {
    ensureBudgetFile(config.csvPath);
  } catch (e) {
    err('Failed to create or initialize the budget CSV', {
      csvPath: config.csvPath,
      error: e instanceof Error ? e.message : String(e),
    });
    return { exitCode: ExitCode.InitializationFailed };
  }

  try {
    const projectionsPath = config.projectionsPath ?? deriveProjectionsPath(config.csvPath);
    let cache = rememberBudgetFile(loadCacheState(config.cacheFile), config.csvPath, projectionsPath);
    if (config.lastView) {
      cache = setLastView(cache, config.lastView);
    }
    saveCacheState(config.cacheFile, cache);
    return { app: createApp(config) };
  } catch (e) {
    err('Failed to start the application', { error: e instanceof Error ? e.message : String(e) });
    return { exitCode: ExitCode.WiringFailed };
  }
}
