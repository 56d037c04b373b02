import { parseDate } from './date-utils.js';
import { ConfigValidationError, InvalidDateFormatError } from './errors.js';
import { createConsoleLogger, type Logger } from './logger.js';
import type {
  HolidayConfig,
  HolidayEntry,
  HolidayYear,
  VacationBlock,
  VacationConfig,
} from './types.js';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireFields(doc: RawRecord, fields: readonly string[], context: string): void {
  for (const field of fields) {
    if (!(field in doc)) {
      throw new ConfigValidationError(
        'MissingField',
        `Missing required field in ${context}: ${field}`,
        field
      );
    }
  }
}

function requireString(doc: RawRecord, field: string, context: string): string {
  const value = doc[field];
  if (typeof value !== 'string') {
    throw new ConfigValidationError('InvalidType', `${context} field ${field} must be a string`, field);
  }
  return value;
}

function requireInteger(doc: RawRecord, field: string, context: string): number {
  const value = doc[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigValidationError('InvalidType', `${context} field ${field} must be an integer`, field);
  }
  return value;
}

function requireList(doc: RawRecord, field: string): unknown[] {
  const value = doc[field];
  if (!Array.isArray(value)) {
    throw new ConfigValidationError('InvalidType', `${field} must be a list`, field);
  }
  return value;
}

function requireDate(doc: RawRecord, field: string) {
  const value = doc[field];
  if (typeof value !== 'string') {
    throw new InvalidDateFormatError(value, field);
  }
  return parseDate(value, field);
}

// Kept as declared; only an integer year is compared with the entry dates.
function readHolidayYear(value: unknown): HolidayYear {
  return typeof value === 'number' || typeof value === 'string' ? value : String(value);
}

/**
 * Validates a holiday document and returns it with parsed dates.
 *
 * Entries dated outside the declared year are kept; a warning is logged for each.
 */
export function validateHolidayConfig(
  doc: unknown,
  logger: Logger = createConsoleLogger()
): HolidayConfig {
  if (!isRecord(doc)) {
    throw new ConfigValidationError('InvalidType', 'Holiday config must be an object');
  }

  requireFields(doc, ['region', 'year', 'holidays'], 'holiday config');
  const rawHolidays = requireList(doc, 'holidays');
  const region = requireString(doc, 'region', 'Holiday config');
  const year = readHolidayYear(doc.year);

  const holidays: HolidayEntry[] = rawHolidays.map((raw) => {
    if (!isRecord(raw)) {
      throw new ConfigValidationError('InvalidType', 'Holiday entries must be objects', 'holidays');
    }
    requireFields(raw, ['date', 'description'], 'holiday');

    const date = requireDate(raw, 'date');
    const description = requireString(raw, 'description', 'Holiday');

    if (typeof year === 'number' && Number.isInteger(year) && date.year() !== year) {
      logger.warn(`Holiday date doesn't match configured year ${year}. Holiday: ${description}`);
    }

    return { date, description };
  });

  return { region, year, holidays };
}

/**
 * Validates a vacation document and returns it with parsed dates. Blocks are numbered
 * from 1 in the order they are listed.
 */
export function validateVacationConfig(
  doc: unknown,
  logger: Logger = createConsoleLogger()
): VacationConfig {
  if (!isRecord(doc)) {
    throw new ConfigValidationError('InvalidType', 'Vacation config must be an object');
  }

  requireFields(doc, ['firstName', 'lastName', 'year', 'region', 'vacationBlocks'], 'vacation config');
  const year = requireInteger(doc, 'year', 'Vacation config');
  const rawBlocks = requireList(doc, 'vacationBlocks');
  const firstName = requireString(doc, 'firstName', 'Vacation config');
  const lastName = requireString(doc, 'lastName', 'Vacation config');
  const region = requireString(doc, 'region', 'Vacation config');

  const vacationBlocks: VacationBlock[] = rawBlocks.map((raw, index) => {
    if (!isRecord(raw)) {
      throw new ConfigValidationError('InvalidType', 'Vacation blocks must be objects', 'vacationBlocks');
    }
    requireFields(raw, ['description', 'start', 'end'], 'vacation block');

    const description = requireString(raw, 'description', 'Vacation block');
    const start = requireDate(raw, 'start');
    const end = requireDate(raw, 'end');

    if (start.isAfter(end, 'day')) {
      throw new ConfigValidationError(
        'InvalidRange',
        `Start date ${String(raw.start)} is after end date ${String(raw.end)} in vacation block: ${description}`,
        'start'
      );
    }

    if (start.year() !== year || end.year() !== year) {
      logger.warn(`Vacation block dates don't match configured year ${year}. Block: ${description}`);
    }

    return { id: index + 1, start, end, description };
  });

  return { firstName, lastName, year, region, vacationBlocks };
}

/**
 * Compares the two documents and returns warnings for mismatching year or region.
 * Region match is case-insensitive and succeeds when either name contains the other.
 */
export function checkConfigCompatibility(
  holidayConfig: HolidayConfig,
  vacationConfig: VacationConfig
): string[] {
  const warnings: string[] = [];

  if (holidayConfig.year !== vacationConfig.year) {
    warnings.push(
      `Year mismatch: vacation config year (${vacationConfig.year}) != holiday config year (${holidayConfig.year})`
    );
  }

  const vacationRegion = vacationConfig.region.toLowerCase();
  const holidayRegion = holidayConfig.region.toLowerCase();
  if (!holidayRegion.includes(vacationRegion) && !vacationRegion.includes(holidayRegion)) {
    warnings.push(
      `Region mismatch: vacation config region (${vacationRegion}) and holiday config region (${holidayRegion})`
    );
  }

  return warnings;
}
