import type { PeriodSummary } from '../types/summary';

export interface Notifier {
  send(recipient: string, summaries: PeriodSummary[]): Promise<void>;
}
