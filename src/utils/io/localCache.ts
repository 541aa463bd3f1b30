import type { LocalCacheState } from '../../data/workspace/types';
import { warn } from '../log';
import { isRecord } from '../net/validate';
import { checkExists, loadJson, saveJson } from './io';

export const CACHE_VERSION = '1';
const MAX_RECENT_FILES = 10;

export function emptyCacheState(): LocalCacheState {
  return {
    budgetCsvPath: null,
    lastView: null,
    currentStatementPeriod: null,
    recentBudgetFiles: [],
    recentProjectedFiles: [],
    statementPeriods: [],
    statementPeriodToFileMap: {},
    appConfig: {},
    version: CACHE_VERSION,
  };
}

function toText(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function toTextList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string' && item !== '') : [];
}

function toTextMap(value: unknown): Record<string, string> {
  const map: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === 'string') {
        map[key] = item;
      }
    }
  }
  return map;
}

/**
 * Reads a cache state from parsed JSON. Missing or mistyped values fall back to their
 * defaults, so a file written by an older version still loads.
 */
export function normalizeCacheState(raw: unknown): LocalCacheState {
  if (!isRecord(raw)) {
    return emptyCacheState();
  }
  return {
    budgetCsvPath: toText(raw.budgetCsvPath),
    lastView: toText(raw.lastView),
    currentStatementPeriod: toText(raw.currentStatementPeriod),
    recentBudgetFiles: toTextList(raw.recentBudgetFiles),
    recentProjectedFiles: toTextList(raw.recentProjectedFiles),
    statementPeriods: toTextList(raw.statementPeriods),
    statementPeriodToFileMap: toTextMap(raw.statementPeriodToFileMap),
    appConfig: toTextMap(raw.appConfig),
    version: toText(raw.version) ?? CACHE_VERSION,
  };
}

/**
 * A cache state is usable once it names a budget CSV.
 */
export function validateCacheState(state: LocalCacheState): boolean {
  return state.budgetCsvPath !== null && state.budgetCsvPath.trim() !== '';
}

/**
 * Loads the cache file. A missing file gives the empty state; an unreadable one is reported
 * and also gives the empty state.
 */
export function loadCacheState(filePath: string): LocalCacheState {
  if (!checkExists(filePath)) {
    return emptyCacheState();
  }
  try {
    return normalizeCacheState(loadJson<unknown>(filePath));
  } catch (e) {
    warn('Could not read cache file, starting from an empty cache', {
      filePath,
      error: e instanceof Error ? e.message : String(e),
    });
    return emptyCacheState();
  }
}

export function saveCacheState(filePath: string, state: LocalCacheState) {
  saveJson(state, filePath);
}

function pushRecent(list: readonly string[], value: string): string[] {
  return [value, ...list.filter((item) => item !== value)].slice(0, MAX_RECENT_FILES);
}

/**
 * Records the working files: the budget CSV becomes current and both files move to the
 * front of their recent lists.
 */
export function rememberBudgetFile(
  state: LocalCacheState,
  budgetCsvPath: string,
  projectionsPath: string | null,
): LocalCacheState {
  return {
    ...state,
    budgetCsvPath,
    recentBudgetFiles: pushRecent(state.recentBudgetFiles, budgetCsvPath),
    recentProjectedFiles: projectionsPath
      ? pushRecent(state.recentProjectedFiles, projectionsPath)
      : state.recentProjectedFiles,
  };
}

export function setLastView(state: LocalCacheState, lastView: string | null): LocalCacheState {
  return { ...state, lastView: toText(lastView) };
}

/**
 * Makes a statement period current and adds it to the known periods once. A blank
 * period clears the current one.
 */
export function setCurrentStatementPeriod(state: LocalCacheState, period: string | null): LocalCacheState {
  const current = period ? period.trim() : '';
  if (current === '') {
    return { ...state, currentStatementPeriod: null };
  }
  return {
    ...state,
    currentStatementPeriod: current,
    statementPeriods: state.statementPeriods.includes(current)
      ? state.statementPeriods
      : [...state.statementPeriods, current],
  };
}

/**
 * Records which archived budget file holds a statement period and adds the period to the
 * known periods once. The current period is left as it is.
 */
export function mapStatementPeriodToFile(state: LocalCacheState, period: string, fileName: string): LocalCacheState {
  const key = period.trim();
  return {
    ...state,
    statementPeriods: state.statementPeriods.includes(key) ? state.statementPeriods : [...state.statementPeriods, key],
    statementPeriodToFileMap: { ...state.statementPeriodToFileMap, [key]: fileName },
  };
}
