import { validateHolidayConfig, validateVacationConfig } from '../config-validator.js';
import { silentLogger } from '../logger.js';
import type {
  HolidayConfig,
  HolidayConfigDocument,
  VacationConfig,
  VacationConfigDocument,
} from '../types.js';

export function buildHolidayConfig(
  holidays: HolidayConfigDocument['holidays'],
  overrides: Partial<Omit<HolidayConfigDocument, 'holidays'>> = {}
): HolidayConfig {
  return validateHolidayConfig({ region: 'TG', year: 2025, ...overrides, holidays }, silentLogger);
}

export function buildVacationConfig(
  vacationBlocks: VacationConfigDocument['vacationBlocks'],
  overrides: Partial<Omit<VacationConfigDocument, 'vacationBlocks'>> = {}
): VacationConfig {
  return validateVacationConfig(
    { firstName: 'Jane', lastName: 'Doe', year: 2025, region: 'TG', ...overrides, vacationBlocks },
    silentLogger
  );
}
