import type { LocalDate, ServiceCode } from './entry';

export type PeriodType = 'biweekly' | 'monthly';

export type TotalsByCode = Record<ServiceCode, number>; // minutes

export type PeriodSummary = {
  employeeId: string;
  periodType: PeriodType;
  periodStart: LocalDate;
  periodEnd: LocalDate;
  totalsByCode: TotalsByCode;
  totalMinutes: number;
  entryCount: number;
};
