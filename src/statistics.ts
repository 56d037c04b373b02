import { daysInRange, daysInYear, formatDate, isDateInRange, isWeekend } from './date-utils.js';
import type { HolidayConfig, VacationBlockStats, VacationConfig, YearStatistics } from './types.js';

/**
 * Counts the days of `year` by category.
 *
 * Counters use raw membership, not classifier precedence: a holiday on a Sunday
 * counts as a weekend and as a holiday, and a day covered by two vacation blocks
 * counts once per block.
 */
export function computeStatistics(
  year: number,
  holidayConfig: HolidayConfig,
  vacationConfig: VacationConfig
): YearStatistics {
  const holidayDates = new Set(holidayConfig.holidays.map((holiday) => formatDate(holiday.date)));
  const blocks = vacationConfig.vacationBlocks;

  let totalDays = 0;
  let workdays = 0;
  let weekends = 0;
  let holidays = 0;
  let holidayWorkdays = 0;
  let vacationDays = 0;
  let vacationWorkdays = 0;

  for (const day of daysInYear(year)) {
    totalDays++;

    const weekend = isWeekend(day);
    const holiday = holidayDates.has(formatDate(day));
    const blockHits = blocks.filter((block) => isDateInRange(day, block.start, block.end)).length;

    if (holiday) holidays++;

    if (weekend) {
      weekends++;
    } else {
      workdays++;
      vacationWorkdays += blockHits;
      if (holiday && blockHits === 0) holidayWorkdays++;
    }

    vacationDays += blockHits;
  }

  const vacationBlockStats: VacationBlockStats[] = blocks.map((block) => {
    let blockDays = 0;
    let blockWorkdays = 0;

    for (const day of daysInRange(block.start, block.end)) {
      blockDays++;
      if (!isWeekend(day) && !holidayDates.has(formatDate(day))) {
        blockWorkdays++;
      }
    }

    return {
      id: block.id,
      description: block.description,
      start: formatDate(block.start),
      end: formatDate(block.end),
      totalDays: blockDays,
      workdays: blockWorkdays,
    };
  });

  const daysOff = weekends + holidayWorkdays + vacationWorkdays;

  return {
    totalDays,
    workdays,
    weekends,
    holidays,
    holidayWorkdays,
    vacationDays,
    vacationWorkdays,
    daysOff,
    daysAtWork: workdays - holidayWorkdays - vacationWorkdays,
    percentageOff: totalDays === 0 ? 0 : (daysOff / totalDays) * 100,
    vacationBlockStats,
  };
}
