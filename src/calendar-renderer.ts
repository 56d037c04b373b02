import chalk from 'chalk';
import Table from 'cli-table3';
import { getDayInfo } from './day-classifier.js';
import { calendarDate, getMonthGrid } from './date-utils.js';
import type {
  DayType,
  HolidayConfig,
  VacationConfig,
  YearStatistics,
} from './types.js';

export type CalendarColors = Record<DayType, string>;

export interface CalendarCell {
  display: string;
  type: DayType;
}

export const DEFAULT_COLORS: CalendarColors = {
  holiday: '#FFDDC1', // light orange
  vacation: '#C1FFD7', // light green
  weekend: '#C1D4FF', // light blue
  weekday: '#FFFFFF',
};

const WEEKDAY_HEADERS = ['Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa', 'Su'];

export class CalendarRenderer {
  private colors: CalendarColors;

  constructor(colors: Partial<CalendarColors> = {}) {
    this.colors = { ...DEFAULT_COLORS, ...colors };
  }

  getColors(): CalendarColors {
    return { ...this.colors };
  }

  setColors(colors: Partial<CalendarColors>): void {
    this.colors = { ...this.colors, ...colors };
  }

  buildMonthRows(
    year: number,
    month: number,
    holidayConfig: HolidayConfig,
    vacationConfig: VacationConfig
  ): CalendarCell[][] {
    return getMonthGrid(year, month).map((week) =>
      week.map((day) => {
        const { display, type } = getDayInfo(year, month, day, holidayConfig, vacationConfig);
        return { display, type };
      })
    );
  }

  renderMonth(
    year: number,
    month: number,
    holidayConfig: HolidayConfig,
    vacationConfig: VacationConfig
  ): string {
    const title = calendarDate(year, month, 1).format('MMMM');
    const table = new Table({
      head: WEEKDAY_HEADERS.map((day) => chalk.cyan(day)),
      colWidths: new Array<number>(7).fill(5),
      colAligns: new Array<'center'>(7).fill('center'),
    });

    for (const week of this.buildMonthRows(year, month, holidayConfig, vacationConfig)) {
      table.push(week.map((cell) => this.paint(cell)));
    }

    return `${chalk.bold(title)}\n${table.toString()}`;
  }

  renderLegend(): string {
    return [
      chalk.bgHex(this.colors.holiday).black(' Holidays '),
      chalk.bgHex(this.colors.vacation).black(' Vacation days '),
      chalk.bgHex(this.colors.weekend).black(' Weekends '),
    ].join('  ');
  }

  renderStatistics(stats: YearStatistics): string {
    const summary = new Table({
      head: [chalk.cyan('Metric'), chalk.cyan('Value')],
      colWidths: [30, 12],
    });

    summary.push(
      ['Total days', `${stats.totalDays}`],
      ['Workdays', `${stats.workdays}`],
      ['Weekend days', `${stats.weekends}`],
      ['Holidays', `${stats.holidays}`],
      ['Holidays on workdays', `${stats.holidayWorkdays}`],
      ['Vacation days', `${stats.vacationDays}`],
      ['Vacation workdays', `${stats.vacationWorkdays}`],
      ['Days off', `${stats.daysOff}`],
      ['Days at work', `${stats.daysAtWork}`],
      ['Time off', `${stats.percentageOff.toFixed(1)}%`]
    );

    if (stats.vacationBlockStats.length === 0) {
      return summary.toString();
    }

    const blocks = new Table({
      head: ['#', 'Description', 'Start', 'End', 'Days', 'Workdays'].map((h) => chalk.cyan(h)),
    });

    for (const block of stats.vacationBlockStats) {
      blocks.push([
        `${block.id}`,
        block.description,
        block.start,
        block.end,
        `${block.totalDays}`,
        `${block.workdays}`,
      ]);
    }

    return `${summary.toString()}\n${blocks.toString()}`;
  }

  renderYear(
    holidayConfig: HolidayConfig,
    vacationConfig: VacationConfig,
    stats: YearStatistics
  ): string {
    const { year, region, firstName, lastName } = vacationConfig;
    const sections = [chalk.blue.bold(`\n📅 Vacation plan ${year} - ${region}\n${firstName} ${lastName}\n`)];

    for (let month = 1; month <= 12; month++) {
      sections.push(this.renderMonth(year, month, holidayConfig, vacationConfig));
    }

    sections.push(this.renderLegend(), this.renderStatistics(stats));

    return sections.join('\n\n');
  }

  private paint(cell: CalendarCell): string {
    return chalk.bgHex(this.colors[cell.type]).black(cell.display.padStart(2, ' '));
  }
}
