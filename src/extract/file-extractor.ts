import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FatalExternalError, ValidationError, errorMessage } from '../errors';
import { inWindow } from '../reconcile/helpers';
import type { EmployeeConfig } from '../config/types';
import type { DateRange, ExtractedEntry } from '../types/entry';
import { isLocalDate } from '../entry/time';
import { isPunchTable, parsePunchTable } from './punch-table';
import type { Extractor } from './types';

/**
 * Reads `<dir>/<employeeId>.json`, a punches table saved by the scraping job.
 * Entries with a readable date outside the range are dropped; unreadable ones are kept
 * so reconciliation can record them.
 */
export function createFileExtractor(dir: string): Extractor {
  return {
    async fetch(employee: EmployeeConfig, range: DateRange): Promise<ExtractedEntry[]> {
      const file = join(dir, `${employee.id}.json`);
      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (err) {
        throw new FatalExternalError(`[extract] cannot read ${file}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      const parsed: unknown = JSON.parse(text);
      if (!isPunchTable(parsed)) {
        throw new ValidationError(`[extract] ${file} is not a punches table`);
      }
      const { entries } = parsePunchTable(parsed, employee.id);
      return entries.filter((e) => !isLocalDate(e.date) || inWindow(e.date, range));
    },
  };
}
