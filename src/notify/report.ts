import type { Logger } from '../logger';
import { groupBy } from '../reconcile/helpers';
import type { ServiceCode } from '../types/entry';
import type { PeriodSummary } from '../types/summary';
import { formatHhmmss } from './format';
import type { Notifier } from './types';

// 报表里的列顺序
const REPORT_CODES: ServiceCode[] = [331, 320, 310];

function periodLabel(s: PeriodSummary): string {
  if (s.periodType === 'monthly') return 'Month Hours:          ';
  return s.periodStart.endsWith('-01') ? 'First Biweekly Hours: ' : 'Second Biweekly Hours:';
}

function periodLine(s: PeriodSummary): string {
  const cols = REPORT_CODES.map((code) => `${code} ${formatHhmmss(s.totalsByCode[code])}`);
  cols.push(`Total Hours ${formatHhmmss(s.totalMinutes)}`);
  return `  ${periodLabel(s)} ${cols.join(' | ')}`;
}

/**
 * Plain-text hours report, one block per month:
 *
 *   Alice 2025-07
 *     First Biweekly Hours:  331 00:00:00 | 320 00:00:00 | 310 80:00:00 | Total Hours 80:00:00
 */
export function renderSummaryReport(title: string, summaries: readonly PeriodSummary[]): string {
  const byMonth = groupBy(summaries, (s) => s.periodStart.slice(0, 7));
  const blocks = Object.keys(byMonth)
    .sort()
    .map((month) => [`${title} ${month}`, ...byMonth[month].map(periodLine)].join('\n'));
  return blocks.join('\n\n');
}

/** Writes the report to the log instead of mailing it. */
export function createLogNotifier(logger: Logger): Notifier {
  return {
    async send(recipient, summaries) {
      logger.info(`hours report for ${recipient}\n${renderSummaryReport(recipient, summaries)}`);
    },
  };
}
