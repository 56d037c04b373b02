import fs from 'fs/promises';
import path from 'path';
import type { Dayjs } from 'dayjs';
import { classifyYear } from './day-classifier.js';
import { FORMAT_DATE, formatIcsDate, formatIcsTimestamp } from './date-utils.js';
import { getOutputFileName } from './helper/getOutputFileName.js';
import { createConsoleLogger, type Logger } from './logger.js';
import type {
  DayClassification,
  DayType,
  HolidayConfig,
  VacationConfig,
  YearStatistics,
} from './types.js';

export const PRODID = '-//VacationPlaner//EN';

const MAX_LINE_OCTETS = 75;

type EventDayType = Exclude<DayType, 'weekday'>;

const EVENT_DETAILS: Record<EventDayType, { label: string; visibility: 'PUBLIC' | 'PRIVATE' }> = {
  holiday: { label: 'Holiday', visibility: 'PUBLIC' },
  vacation: { label: 'Vacation', visibility: 'PRIVATE' },
  weekend: { label: 'Weekend', visibility: 'PUBLIC' },
};

export interface BuildCalendarOptions {
  includeWeekends?: boolean;
  statistics?: YearStatistics;
}

export interface IcsGeneratorOptions {
  logger?: Logger;
  now?: () => Date;
}

export function escapeIcsText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Splits a content line into chunks of at most 75 octets; continuation lines
 * start with a single space.
 */
export function foldIcsLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) return line;

  const chunks: string[] = [];
  let current = '';
  let currentOctets = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8');
    if (currentOctets + octets > limit) {
      chunks.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  chunks.push(current);

  return chunks.join('\r\n ');
}

export class IcsGenerator {
  private readonly outputPath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(outputPath: string, options: IcsGeneratorOptions = {}) {
    this.outputPath = path.resolve(outputPath);
    this.logger = options.logger ?? createConsoleLogger();
    this.now = options.now ?? (() => new Date());
  }

  buildCalendar(
    holidayConfig: HolidayConfig,
    vacationConfig: VacationConfig,
    options: BuildCalendarOptions = {}
  ): string {
    const includeWeekends = options.includeWeekends ?? true;
    const name = `${vacationConfig.firstName} ${vacationConfig.lastName}`;
    const stamp = formatIcsTimestamp(this.now());

    const lines: string[] = [
      'BEGIN:VCALENDAR',
      `PRODID:${PRODID}`,
      'VERSION:2.0',
      'CALSCALE:GREGORIAN',
      'METHOD:PUBLISH',
      `X-WR-CALNAME:${escapeIcsText(`Vacation plan ${vacationConfig.year} - ${name}`)}`,
    ];

    if (options.statistics) {
      lines.push(`X-WR-CALDESC:${escapeIcsText(this.describeStatistics(options.statistics))}`);
    }

    for (const { date, classification } of classifyYear(
      vacationConfig.year,
      holidayConfig,
      vacationConfig
    )) {
      const type = classification.type;
      if (type === 'weekday') continue;
      if (type === 'weekend' && !includeWeekends) continue;

      lines.push(...this.createEvent(date, type, classification, name, stamp));
    }

    lines.push('END:VCALENDAR');

    return lines.map(foldIcsLine).join('\r\n') + '\r\n';
  }

  async generateIcs(
    holidayConfig: HolidayConfig,
    vacationConfig: VacationConfig,
    options: BuildCalendarOptions = {}
  ): Promise<string> {
    await fs.mkdir(this.outputPath, { recursive: true });

    const icsFile = path.join(this.outputPath, getOutputFileName(vacationConfig, 'ics'));
    const content = this.buildCalendar(holidayConfig, vacationConfig, options);

    this.logger.info(`Saving ICS file to: ${icsFile}`);
    await fs.writeFile(icsFile, content, 'utf-8');

    return icsFile;
  }

  private createEvent(
    date: Dayjs,
    type: EventDayType,
    classification: DayClassification,
    name: string,
    stamp: string
  ): string[] {
    const { label, visibility } = EVENT_DETAILS[type];
    const description = classification.description ?? label;
    const uid = `${date.format(FORMAT_DATE)}-${type}-${name}`.replace(/\s+/g, '-');

    return [
      'BEGIN:VEVENT',
      `UID:${uid}@vacation-planner`,
      `DTSTAMP:${stamp}`,
      `DTSTART;VALUE=DATE:${formatIcsDate(date)}`,
      `DTEND;VALUE=DATE:${formatIcsDate(date.add(1, 'day'))}`,
      `SUMMARY:${escapeIcsText(`${description} - ${name}`)}`,
      `DESCRIPTION:${escapeIcsText(`${description} - Out of Office - ${name}`)}`,
      'STATUS:CONFIRMED',
      `CLASS:${visibility}`,
      `CATEGORIES:${label}`,
      'TRANSP:TRANSPARENT',
      'X-MICROSOFT-CDO-BUSYSTATUS:OOF',
      'X-MICROSOFT-CDO-ALLDAYEVENT:TRUE',
      `ORGANIZER:${escapeIcsText(name)}`,
      'END:VEVENT',
    ];
  }

  private describeStatistics(stats: YearStatistics): string {
    return (
      `Days off: ${stats.daysOff} (${stats.percentageOff.toFixed(1)}%), ` +
      `holidays: ${stats.holidays}, vacation workdays: ${stats.vacationWorkdays}, ` +
      `days at work: ${stats.daysAtWork}`
    );
  }
}
