import fs from 'fs/promises';
import path from 'path';
import Holidays from 'date-holidays';
import { dayjs, FORMAT_DATE } from './date-utils.js';
import { createConsoleLogger, type Logger } from './logger.js';
import type { HolidayConfigDocument } from './types.js';

// Types from `date-holidays` that count as work-free days.
// Extend this set if you want to treat other types (e.g. "optional") as work-free.
const WORK_FREE_HOLIDAY_TYPES = new Set(['public', 'bank']);

export class HolidayManager {
  private readonly confPath: string;
  private readonly logger: Logger;

  constructor(confPath: string, logger: Logger = createConsoleLogger()) {
    this.confPath = path.resolve(confPath);
    this.logger = logger;
  }

  getHolidayFilePath(year: number, country: string, region?: string): string {
    const name = (region || country).toLowerCase();
    return path.join(this.confPath, `holidays-${name}-${year}.json`);
  }

  /**
   * Writes a holiday document for the given year and region into the conf directory.
   * @returns the written path, or null when the file exists and `force` is not set
   */
  async initHolidays(
    year: number,
    country: string,
    region?: string,
    force = false
  ): Promise<string | null> {
    const filePath = this.getHolidayFilePath(year, country, region);
    const label = region ? `${country}-${region}` : country;

    this.logger.info(`\n🌍 Initializing holidays for ${year} (${label})...\n`);

    if (!force && (await this.fileExists(filePath))) {
      this.logger.warn(`Holidays for ${year} (${label}) already exist: ${filePath}`);
      this.logger.warn('Use --force flag to re-initialize and replace existing holidays.');
      return null;
    }

    const config = this.buildHolidayConfig(year, country, region);

    await fs.mkdir(this.confPath, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

    this.logger.success(`Added ${config.holidays.length} holidays for ${year} to ${filePath}`);
    return filePath;
  }

  /**
   * Builds a holiday document from `date-holidays`, keeping only work-free types.
   */
  buildHolidayConfig(year: number, country: string, region?: string): HolidayConfigDocument {
    const hd = new Holidays();
    if (region) {
      hd.init(country, region);
    } else {
      hd.init(country);
    }

    const holidayDefs = hd.getHolidays(year);

    if (!Array.isArray(holidayDefs) || holidayDefs.length === 0) {
      throw new Error(
        `No holidays found for ${region ? `${country}-${region}` : country} in ${year}. Check that the country/region codes are supported by date-holidays.`
      );
    }

    const seen = new Set<string>();
    const holidays: HolidayConfigDocument['holidays'] = [];

    for (const h of holidayDefs) {
      if (!WORK_FREE_HOLIDAY_TYPES.has((h.type || '').toLowerCase())) continue;

      // Skip "observed/substitute" entries so we don't double-book a holiday.
      if (h.substitute) continue;

      // date-holidays includes a time part; normalize to YYYY-MM-DD.
      const date = dayjs(h.date.slice(0, 10), FORMAT_DATE, true);
      if (!date.isValid()) continue;

      const entry = { date: date.format(FORMAT_DATE), description: h.name };
      const key = `${entry.date}::${entry.description}`;
      if (seen.has(key)) continue;
      seen.add(key);

      holidays.push(entry);
    }

    holidays.sort((a, b) =>
      a.date === b.date
        ? a.description.localeCompare(b.description)
        : a.date.localeCompare(b.date)
    );

    return { region: region ?? country, year, holidays };
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
