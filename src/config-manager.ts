import fs from 'fs/promises';
import path from 'path';
import ICAL from 'ical.js';
import { validateHolidayConfig, validateVacationConfig } from './config-validator.js';
import type { ConfigResolver } from './config-resolver.js';
import { ConfigNotFoundError } from './errors.js';
import { createConsoleLogger, type Logger } from './logger.js';
import type { ConfigKind, HolidayConfig, HolidayConfigDocument, VacationConfig } from './types.js';

const VACATION_FILE_PATTERN = /^vacation-plann?er.*\.json$/i;
const HOLIDAY_JSON_PATTERN = /^holidays-.*\.json$/i;
const ICS_PATTERN = /\.ics$/i;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export class ConfigManager {
  private readonly confPath: string;
  private readonly logger: Logger;

  constructor(confPath: string, logger: Logger = createConsoleLogger()) {
    this.confPath = path.resolve(confPath);
    this.logger = logger;
  }

  getConfPath(): string {
    return this.confPath;
  }

  async ensureConfDirectory(): Promise<void> {
    try {
      await fs.access(this.confPath);
    } catch {
      throw new ConfigNotFoundError(`Configuration path does not exist: ${this.confPath}`);
    }
  }

  async discover(kind: ConfigKind): Promise<string[]> {
    await this.ensureConfDirectory();

    const entries = await fs.readdir(this.confPath, { withFileTypes: true });
    const matches = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) =>
        kind === 'vacation'
          ? VACATION_FILE_PATTERN.test(name)
          : HOLIDAY_JSON_PATTERN.test(name) || ICS_PATTERN.test(name)
      )
      .sort();

    return matches.map((name) => path.join(this.confPath, name));
  }

  async loadVacationConfig(resolver: ConfigResolver): Promise<VacationConfig> {
    const candidates = await this.discover('vacation');
    const selected = await resolver.resolve({ kind: 'vacation', candidates });

    if (!selected) {
      throw new ConfigNotFoundError(
        candidates.length === 0
          ? `No vacation configuration files found in ${this.confPath}`
          : 'No vacation configuration file was selected'
      );
    }

    return this.loadVacationFile(selected);
  }

  async loadHolidayConfig(
    resolver: ConfigResolver,
    region?: string,
    year?: number
  ): Promise<HolidayConfig> {
    const candidates = await this.discover('holiday');
    const selected = await resolver.resolve({ kind: 'holiday', candidates, region, year });

    if (!selected) {
      throw new ConfigNotFoundError(
        candidates.length === 0
          ? `No holiday configuration files found in ${this.confPath}`
          : 'No holiday configuration file was selected'
      );
    }

    return this.loadHolidayFile(selected);
  }

  async loadVacationFile(filePath: string): Promise<VacationConfig> {
    this.logger.info(`Loading vacation config from ${filePath}`);
    const doc = await this.readJson(filePath, 'vacation');
    return validateVacationConfig(doc, this.logger);
  }

  async loadHolidayFile(filePath: string): Promise<HolidayConfig> {
    const extension = path.extname(filePath).toLowerCase();

    if (extension === '.json') {
      this.logger.info(`Loading JSON holiday file: ${filePath}`);
      const doc = await this.readJson(filePath, 'holiday');
      return validateHolidayConfig(doc, this.logger);
    }

    if (extension === '.ics') {
      this.logger.info(`Loading iCal holiday file: ${filePath}`);
      const content = await fs.readFile(filePath, 'utf-8');
      return validateHolidayConfig(this.parseIcsHolidays(content, filePath), this.logger);
    }

    throw new Error(`Unsupported holiday config file format: ${filePath}`);
  }

  /**
   * Converts the VEVENTs of an iCal file into a holiday document. The region is
   * taken from the file name and the year from the earliest event.
   */
  parseIcsHolidays(content: string, filePath: string): HolidayConfigDocument {
    const calendar = this.parseCalendar(content, filePath);
    const holidays = calendar.getAllSubcomponents('vevent').map((component) => {
      const event = new ICAL.Event(component);
      const start = event.startDate;
      return {
        date: `${start.year}-${pad(start.month)}-${pad(start.day)}`,
        description: event.summary ?? '',
        year: start.year,
      };
    });

    const years = holidays.map((holiday) => holiday.year);

    return {
      region: path.basename(filePath).replace(ICS_PATTERN, ''),
      year: years.length > 0 ? Math.min(...years) : new Date().getFullYear(),
      holidays: holidays.map(({ date, description }) => ({ date, description })),
    };
  }

  private parseCalendar(content: string, filePath: string) {
    try {
      return ICAL.Component.fromString(content);
    } catch (error) {
      throw new Error(`Invalid iCal format in holiday file: ${filePath}`, { cause: error });
    }
  }

  private async readJson(filePath: string, kind: ConfigKind): Promise<unknown> {
    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ConfigNotFoundError(`${kind} configuration file not found: ${filePath}`);
      }
      throw error;
    }

    try {
      return JSON.parse(data);
    } catch (error) {
      throw new Error(`Invalid JSON format in ${kind} file: ${filePath}`, { cause: error });
    }
  }
}
