import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../utils/io/workspace');
vi.mock('../../utils/log');

import { ProjectedExpense } from '../../data/projectedExpense/projectedExpense';
import { loadBudgetWorkspace } from '../../utils/io/workspace';
import { createMockConfig, createMockRequest, createTransaction, createWorkspace } from '../../utils/test/mockData';
import { getBreakdown } from './breakdown';

const plannedGroceries = new ProjectedExpense({
  id: 'p-1',
  person: 'Anna',
  criticality: 'Essential',
  category: 'Groceries',
  amount: 100,
  isJoint: false,
  source: 'manual',
  statementPeriod: null,
  name: null,
});

describe('Breakdown API', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    const workspace = createWorkspace();
    vi.mocked(loadBudgetWorkspace).mockReturnValue({
      ...workspace,
      transactions: [
        workspace.transactions[0],
        workspace.transactions[1],
        createTransaction({ name: 'Transfer', amount: 10, account: 'Savings' }),
      ],
      projected: [plannedGroceries],
    });
  });

  it('splits Joint spending and adds projected expenses', () => {
    const response = getBreakdown(createMockRequest(), createMockConfig());

    expect(response.includeProjected).toBe(true);
    expect(response.breakdown).toEqual({
      Josh: { Essential: { Groceries: 50 }, NonEssential: { Dining: 40 } },
      Anna: { Essential: { Groceries: 100 }, NonEssential: { Dining: 40 } },
    });
    expect(response.totals).toEqual({ Josh: 90, Anna: 140 });
  });

  it('reports transactions on unknown accounts', () => {
    const response = getBreakdown(createMockRequest(), createMockConfig());

    expect(response.skipped.map((tx) => [tx.name, tx.account])).toEqual([['Transfer', 'Savings']]);
  });

  it('leaves projected expenses out on request', () => {
    const response = getBreakdown(createMockRequest({ query: { includeProjected: 'false' } }), createMockConfig());

    expect(response.includeProjected).toBe(false);
    expect(response.breakdown.Anna).toEqual({ Essential: {}, NonEssential: { Dining: 40 } });
    expect(response.totals).toEqual({ Josh: 90, Anna: 40 });
  });
});
