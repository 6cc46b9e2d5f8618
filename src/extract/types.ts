import type { EmployeeConfig } from '../config/types';
import type { DateRange, ExtractedEntry } from '../types/entry';

/**
 * Produces raw shift records for one employee. Session and login handling live entirely
 * behind this contract. Authentication or availability problems should surface as
 * FatalExternalError; flaky transport as TransientExternalError.
 */
export interface Extractor {
  fetch(employee: EmployeeConfig, range: DateRange): Promise<ExtractedEntry[]>;
}
