import type { VacationConfig } from '../types.js';

export type OutputExtension = 'ics' | 'csv';

export function getOutputFileName(
  vacationConfig: Pick<VacationConfig, 'year' | 'firstName' | 'lastName'>,
  extension: OutputExtension
): string {
  const { year, firstName, lastName } = vacationConfig;
  return `vacation_${year}_${firstName}_${lastName}.${extension}`;
}
