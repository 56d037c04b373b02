import type { Dayjs } from 'dayjs';
import { calendarDate, daysInYear, isDateInRange, isWeekend } from './date-utils.js';
import type {
  ClassifiedDay,
  DayClassification,
  HolidayConfig,
  HolidayEntry,
  VacationBlock,
  VacationConfig,
} from './types.js';

export function findHoliday(date: Dayjs, holidayConfig: HolidayConfig): HolidayEntry | undefined {
  return holidayConfig.holidays.find((holiday) => holiday.date.isSame(date, 'day'));
}

export function findVacationBlock(
  date: Dayjs,
  vacationConfig: VacationConfig
): VacationBlock | undefined {
  return vacationConfig.vacationBlocks.find((block) =>
    isDateInRange(date, block.start, block.end)
  );
}

/**
 * Classifies a single day. First match wins, in this order:
 * holiday, weekend, vacation, weekday. A weekend inside a vacation block
 * stays a weekend.
 */
export function classify(
  date: Dayjs,
  holidayConfig: HolidayConfig,
  vacationConfig: VacationConfig
): DayClassification {
  const display = String(date.date());

  const holiday = findHoliday(date, holidayConfig);
  if (holiday) {
    return { type: 'holiday', display, description: holiday.description };
  }

  if (isWeekend(date)) {
    return { type: 'weekend', display };
  }

  const block = findVacationBlock(date, vacationConfig);
  if (block) {
    return {
      type: 'vacation',
      display,
      description: block.description,
      vacationBlockId: block.id,
    };
  }

  return { type: 'weekday', display };
}

/**
 * Classifies a cell of a month grid. Day 0 is padding outside the month.
 */
export function getDayInfo(
  year: number,
  month: number,
  day: number,
  holidayConfig: HolidayConfig,
  vacationConfig: VacationConfig
): DayClassification {
  if (day === 0) {
    return { type: 'weekday', display: '' };
  }

  return classify(calendarDate(year, month, day), holidayConfig, vacationConfig);
}

export function* classifyYear(
  year: number,
  holidayConfig: HolidayConfig,
  vacationConfig: VacationConfig
): Generator<ClassifiedDay> {
  for (const date of daysInYear(year)) {
    yield { date, classification: classify(date, holidayConfig, vacationConfig) };
  }
}
