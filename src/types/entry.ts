export type LocalDate = string; // yyyy-MM-dd
export type LocalTime = string; // HH:mm（24h）
export type NaturalKey = string; // `${employeeId}::${date}::${startTime}::${serviceCode}`

export const SERVICE_CODES = [310, 320, 331] as const;
export type ServiceCode = (typeof SERVICE_CODES)[number];

export type EntryStatus = 'accepted' | 'rejected' | 'duplicate';

export type WorkEntry = {
  employeeId: string;
  date: LocalDate; // 开始日期，跨午夜的班次也记在这一天
  startTime: LocalTime;
  endTime: LocalTime;
  /** Only set for shifts that end on a later day than they start. */
  endDate?: LocalDate;
  serviceCode: ServiceCode;
  durationMinutes: number;
  sourceId: string; // 来源系统分配的 Id
};

/** What an extractor hands over before validation: any field may be missing or malformed. */
export type ExtractedEntry = {
  employeeId?: string;
  date?: string;
  startTime?: string;
  endTime?: string;
  endDate?: string;
  serviceCode?: number;
  durationMinutes?: number;
  sourceId?: string;
};

export type PersistedEntry = WorkEntry & {
  id: string; // storage identity
  naturalKey: NaturalKey;
  status: EntryStatus;
  lastSyncedAt: string | null; // ISO8601
  updatedAt: string; // ISO8601
};

export type DateRange = {
  start: LocalDate; // inclusive
  end: LocalDate; // inclusive
};
