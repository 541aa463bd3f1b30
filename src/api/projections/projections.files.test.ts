import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../utils/io/io', () => ({
  checkExists: vi.fn(),
  readText: vi.fn(),
  writeText: vi.fn(),
}));
vi.mock('../../utils/log');

import { checkExists, readText, writeText } from '../../utils/io/io';
import { BUDGET_HEADER_LINE } from '../../utils/io/budgetFile';
import { createMockConfig, createMockRequest } from '../../utils/test/mockData';
import { getProjections, removeProjections } from './projections';

const config = createMockConfig();
const CSV_PATH = '/tmp/budget/budget.csv';
const PROJECTIONS_PATH = '/tmp/budget/projections.csv';

let files: Map<string, string>;

describe('Projections API on budget files', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    files = new Map([
      [
        CSV_PATH,
        `${BUDGET_HEADER_LINE}\n` +
          'Coffee,$4.50,Dining,Essential,"October 14, 2025",Josh,imported,,Visa\n' +
          'Rent,$1200.00,Housing,Essential,"October 1, 2025",Joint,active,,\n',
      ],
    ]);
    vi.mocked(checkExists).mockImplementation((filePath) => files.has(filePath));
    vi.mocked(readText).mockImplementation((filePath) => {
      const text = files.get(filePath);
      if (text === undefined) {
        throw new Error(`ENOENT: ${filePath}`);
      }
      return text;
    });
    vi.mocked(writeText).mockImplementation((filePath, content) => {
      files.set(filePath, content);
    });
  });

  it('lists the same ids for active rows on every request', () => {
    const first = getProjections(createMockRequest(), config);
    const second = getProjections(createMockRequest(), config);

    expect(first.map((pe) => [pe.person, pe.amount, pe.source])).toEqual([
      ['Josh', 600, 'import'],
      ['Anna', 600, 'import'],
    ]);
    expect(second.map((pe) => pe.id)).toEqual(first.map((pe) => pe.id));
  });

  it('removes an active-row projection by the id it was listed with', () => {
    const [josh, anna] = getProjections(createMockRequest(), config);

    const result = removeProjections(createMockRequest({ body: { ids: [josh.id] } }), config);

    expect(result).toEqual({ removed: 1 });
    expect(writeText).toHaveBeenCalledTimes(1);
    expect(files.has(PROJECTIONS_PATH)).toBe(true);
    expect(getProjections(createMockRequest(), config)).toEqual([anna]);
  });
});
