import { Request } from 'express';
import type { BudgetConfig } from '../../utils/config/config';
import { importIntoWorkspace } from '../../utils/io/workspace';
import type { ImportResult } from '../../utils/io/import';
import { ApiError } from '../../utils/net/errors';
import { getData } from '../../utils/net/request';
import { getBodyRecord, requireText } from '../../utils/net/validate';

/**
 * Imports an exported budget CSV into the working files. The CSV is the request body
 * (`text/csv` or `text/plain`), or the `csv` field of a JSON body.
 */
export function importCsv(request: Request, config: BudgetConfig): ImportResult {
  const data = getData(request, config);
  const csvText = typeof data.data === 'string' ? data.data : requireText(getBodyRecord(data.data), 'csv');
  if (csvText.trim() === '') {
    throw new ApiError('The import file is empty', 400);
  }
  return importIntoWorkspace(data.csvPath, data.projectionsPath, csvText);
}
