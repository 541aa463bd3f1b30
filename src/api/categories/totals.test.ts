import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../utils/io/workspace');

import { loadBudgetWorkspace } from '../../utils/io/workspace';
import { createMockConfig, createMockRequest, createWorkspace } from '../../utils/test/mockData';
import { getCategoryTotals } from './totals';

describe('Category totals API', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadBudgetWorkspace).mockReturnValue(createWorkspace());
  });

  it('totals an account and criticality by category', () => {
    const response = getCategoryTotals(
      createMockRequest({ query: { account: 'Anna', criticality: 'NonEssential' } }),
      createMockConfig(),
    );

    expect(response).toEqual({
      account: 'Anna',
      criticality: 'NonEssential',
      totals: { Dining: 40, '(Uncategorized)': 20 },
    });
  });

  it('returns no categories when nothing matches', () => {
    const response = getCategoryTotals(
      createMockRequest({ query: { account: 'Savings', criticality: 'Essential' } }),
      createMockConfig(),
    );

    expect(response.totals).toEqual({});
  });

  it('requires both account and criticality', () => {
    expect(() => getCategoryTotals(createMockRequest({ query: { account: 'Anna' } }), createMockConfig())).toThrow(
      'account and criticality are required',
    );
  });
});
