import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CACHE_VERSION,
  emptyCacheState,
  loadCacheState,
  mapStatementPeriodToFile,
  normalizeCacheState,
  rememberBudgetFile,
  saveCacheState,
  setCurrentStatementPeriod,
  setLastView,
  validateCacheState,
} from './localCache';
import { checkExists, loadJson, saveJson } from './io';
import { warn } from '../log';

vi.mock('./io', () => ({
  checkExists: vi.fn(),
  loadJson: vi.fn(),
  saveJson: vi.fn(),
}));
vi.mock('../log');

describe('Local cache', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('normalizeCacheState', () => {
    it('should keep well-typed values', () => {
      const state = normalizeCacheState({
        budgetCsvPath: '/data/budget.csv',
        lastView: 'breakdown',
        currentStatementPeriod: '2025-10-13_to_2025-11-12',
        recentBudgetFiles: ['/data/budget.csv'],
        recentProjectedFiles: ['/data/projections.csv'],
        statementPeriods: ['2025-10-13_to_2025-11-12'],
        statementPeriodToFileMap: { '2025-09-13_to_2025-10-12': 'september.csv' },
        appConfig: { theme: 'dark' },
        version: '1',
      });

      expect(state.budgetCsvPath).toBe('/data/budget.csv');
      expect(state.statementPeriodToFileMap).toEqual({ '2025-09-13_to_2025-10-12': 'september.csv' });
      expect(state.appConfig).toEqual({ theme: 'dark' });
    });

    it('should fall back to defaults for missing and mistyped values', () => {
      expect(
        normalizeCacheState({
          budgetCsvPath: 42,
          recentBudgetFiles: ['/data/a.csv', 7, ''],
          statementPeriodToFileMap: { a: 'a.csv', b: 3 },
        }),
      ).toEqual({
        ...emptyCacheState(),
        recentBudgetFiles: ['/data/a.csv'],
        statementPeriodToFileMap: { a: 'a.csv' },
      });
    });

    it('should return the empty state for anything but an object', () => {
      expect(normalizeCacheState('nope')).toEqual(emptyCacheState());
      expect(normalizeCacheState(null).version).toBe(CACHE_VERSION);
    });
  });

  describe('validateCacheState', () => {
    it('should require a budget CSV path', () => {
      expect(validateCacheState(emptyCacheState())).toBe(false);
      expect(validateCacheState({ ...emptyCacheState(), budgetCsvPath: '/data/budget.csv' })).toBe(true);
    });
  });

  describe('loadCacheState', () => {
    it('should return the empty state when the file is missing', () => {
      vi.mocked(checkExists).mockReturnValue(false);

      expect(loadCacheState('/tmp/budget/cache.json')).toEqual(emptyCacheState());
      expect(loadJson).not.toHaveBeenCalled();
    });

    it('should normalize the stored state', () => {
      vi.mocked(checkExists).mockReturnValue(true);
      vi.mocked(loadJson).mockReturnValue({ budgetCsvPath: '/data/budget.csv', lastView: 'weekly' });

      expect(loadCacheState('/tmp/budget/cache.json')).toEqual({
        ...emptyCacheState(),
        budgetCsvPath: '/data/budget.csv',
        lastView: 'weekly',
      });
    });

    it('should warn and start empty when the file cannot be parsed', () => {
      vi.mocked(checkExists).mockReturnValue(true);
      vi.mocked(loadJson).mockImplementation(() => {
        throw new Error('Unexpected token');
      });

      expect(loadCacheState('/tmp/budget/cache.json')).toEqual(emptyCacheState());
      expect(warn).toHaveBeenCalledWith('Could not read cache file, starting from an empty cache', {
        filePath: '/tmp/budget/cache.json',
        error: 'Unexpected token',
      });
    });
  });

  describe('saveCacheState', () => {
    it('should save the state as JSON', () => {
      const state = emptyCacheState();

      saveCacheState('/tmp/budget/cache.json', state);

      expect(saveJson).toHaveBeenCalledWith(state, '/tmp/budget/cache.json');
    });
  });

  describe('rememberBudgetFile', () => {
    it('should make the file current and move it to the front of the recents', () => {
      const state = rememberBudgetFile(
        { ...emptyCacheState(), recentBudgetFiles: ['/a.csv', '/b.csv'], recentProjectedFiles: ['/p.csv'] },
        '/b.csv',
        '/q.csv',
      );

      expect(state.budgetCsvPath).toBe('/b.csv');
      expect(state.recentBudgetFiles).toEqual(['/b.csv', '/a.csv']);
      expect(state.recentProjectedFiles).toEqual(['/q.csv', '/p.csv']);
    });

    it('should keep ten recent files', () => {
      const recent = Array.from({ length: 10 }, (_, i) => `/${i}.csv`);

      const state = rememberBudgetFile({ ...emptyCacheState(), recentBudgetFiles: recent }, '/new.csv', null);

      expect(state.recentBudgetFiles).toHaveLength(10);
      expect(state.recentBudgetFiles[0]).toBe('/new.csv');
      expect(state.recentBudgetFiles[9]).toBe('/8.csv');
      expect(state.recentProjectedFiles).toEqual([]);
    });
  });

  describe('setLastView', () => {
    it('should store the view and clear it when blank', () => {
      const state = setLastView(emptyCacheState(), 'weekly');

      expect(state.lastView).toBe('weekly');
      expect(setLastView(state, ' ').lastView).toBeNull();
    });
  });

  describe('setCurrentStatementPeriod', () => {
    it('should make the period current and list it once', () => {
      let state = setCurrentStatementPeriod(emptyCacheState(), '2025-10-13_to_2025-11-12');
      state = setCurrentStatementPeriod(state, ' 2025-10-13_to_2025-11-12 ');

      expect(state.currentStatementPeriod).toBe('2025-10-13_to_2025-11-12');
      expect(state.statementPeriods).toEqual(['2025-10-13_to_2025-11-12']);
    });

    it('should clear the current period when blank', () => {
      const state = setCurrentStatementPeriod(
        setCurrentStatementPeriod(emptyCacheState(), '2025-10-13_to_2025-11-12'),
        null,
      );

      expect(state.currentStatementPeriod).toBeNull();
      expect(state.statementPeriods).toEqual(['2025-10-13_to_2025-11-12']);
    });
  });

  describe('mapStatementPeriodToFile', () => {
    it('should record the file and leave the current period alone', () => {
      const current = setCurrentStatementPeriod(emptyCacheState(), '2025-10-13_to_2025-11-12');

      const state = mapStatementPeriodToFile(current, '2025-09-13_to_2025-10-12', 'september.csv');

      expect(state.currentStatementPeriod).toBe('2025-10-13_to_2025-11-12');
      expect(state.statementPeriods).toEqual(['2025-10-13_to_2025-11-12', '2025-09-13_to_2025-10-12']);
      expect(state.statementPeriodToFileMap).toEqual({ '2025-09-13_to_2025-10-12': 'september.csv' });
    });
  });
});
