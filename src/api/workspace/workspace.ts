import { Request } from 'express';
import type { LocalCacheState, WorkspaceSnapshot } from '../../data/workspace/types';
import { validateWorkspaceSnapshot, verifySectionHashes } from '../../data/workspace/workspace';
import { deriveProjectionsPath } from '../../utils/config/config';
import type { BudgetConfig } from '../../utils/config/config';
import {
  loadCacheState,
  mapStatementPeriodToFile,
  saveCacheState,
  setCurrentStatementPeriod,
  setLastView,
} from '../../utils/io/localCache';
import { readWorkspaceSnapshot } from '../../utils/io/workspace';
import { ApiError } from '../../utils/net/errors';
import { getBody } from '../../utils/net/request';
import { getBodyRecord, isRecord, optionalText } from '../../utils/net/validate';

/**
 * The budget CSV, the projections and the local cache as one snapshot with section hashes.
 */
export function getWorkspace(_request: Request, config: BudgetConfig): WorkspaceSnapshot {
  if (!config.csvPath) {
    throw new ApiError('No budget CSV is configured', 404);
  }
  return readWorkspaceSnapshot(
    config.csvPath,
    config.projectionsPath ?? deriveProjectionsPath(config.csvPath),
    config.cacheFile,
  );
}

export type WorkspaceCheck = {
  problems: string[];
  hashesMatch: boolean;
};

/**
 * Checks a snapshot sent back by a client: its missing fields, and whether each section
 * still matches its hash.
 */
export function checkWorkspace(request: Request): WorkspaceCheck {
  const snapshot = getBodyRecord(getBody(request));
  const problems = validateWorkspaceSnapshot(snapshot);
  return { problems, hashesMatch: problems.length === 0 && verifySectionHashes(snapshot) };
}

export function getCache(_request: Request, config: BudgetConfig): LocalCacheState {
  return loadCacheState(config.cacheFile);
}

/**
 * Updates the local cache. Body fields, all optional:
 * - `lastView`: the view to reopen
 * - `currentStatementPeriod`: the period to make current (blank clears it)
 * - `statementPeriodFile`: `{ period, fileName }` recording where a period is archived
 */
export function updateCache(request: Request, config: BudgetConfig): LocalCacheState {
  const body = getBodyRecord(getBody(request));
  let state = loadCacheState(config.cacheFile);

  if ('lastView' in body) {
    state = setLastView(state, optionalText(body, 'lastView'));
  }
  if ('currentStatementPeriod' in body) {
    state = setCurrentStatementPeriod(state, optionalText(body, 'currentStatementPeriod'));
  }
  if ('statementPeriodFile' in body) {
    const mapping = body.statementPeriodFile;
    const period = isRecord(mapping) ? optionalText(mapping, 'period') : null;
    const fileName = isRecord(mapping) ? optionalText(mapping, 'fileName') : null;
    if (!period || !fileName) {
      throw new ApiError('statementPeriodFile needs a period and a fileName', 400);
    }
    state = mapStatementPeriodToFile(state, period, fileName);
  }

  saveCacheState(config.cacheFile, state);
  return state;
}
