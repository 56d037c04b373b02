import type { Dayjs } from 'dayjs';

export interface HolidayEntry {
  date: Dayjs;
  description: string;
}

export interface VacationBlock {
  id: number; // 1-based position in the configured sequence
  start: Dayjs;
  end: Dayjs; // inclusive
  description: string;
}

// As declared in the document; not necessarily an integer
export type HolidayYear = number | string;

export interface HolidayConfig {
  region: string;
  year: HolidayYear;
  holidays: readonly HolidayEntry[];
}

export interface VacationConfig {
  firstName: string;
  lastName: string;
  year: number;
  region: string;
  vacationBlocks: readonly VacationBlock[];
}

// JSON shapes as they are stored on disk
export interface HolidayConfigDocument {
  region: string;
  year: number;
  holidays: { date: string; description: string }[];
}

export interface VacationConfigDocument {
  firstName: string;
  lastName: string;
  year: number;
  region: string;
  vacationBlocks: { description: string; start: string; end: string }[];
}

export type DayType = 'holiday' | 'vacation' | 'weekend' | 'weekday';

export interface DayClassification {
  type: DayType;
  display: string; // day of month, empty for grid padding
  description?: string;
  vacationBlockId?: number;
}

export interface ClassifiedDay {
  date: Dayjs;
  classification: DayClassification;
}

export interface VacationBlockStats {
  id: number;
  description: string;
  start: string; // YYYY-MM-DD
  end: string; // YYYY-MM-DD
  totalDays: number;
  workdays: number;
}

export interface YearStatistics {
  totalDays: number;
  workdays: number;
  weekends: number;
  holidays: number;
  holidayWorkdays: number; // holidays on a weekday outside every vacation block
  vacationDays: number;
  vacationWorkdays: number;
  daysOff: number;
  daysAtWork: number;
  percentageOff: number;
  vacationBlockStats: VacationBlockStats[];
}

export type ConfigKind = 'holiday' | 'vacation';

export interface Settings {
  confPath: string;
  outputPath: string;
}
