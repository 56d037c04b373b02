import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { StatisticsExporter } from '../statistics-exporter.js';
import { computeStatistics } from '../statistics.js';
import { buildHolidayConfig, buildVacationConfig } from '../helper/test-fixtures.js';
import { createLoggerStub } from '../helper/test-logger-stub.js';

describe('StatisticsExporter', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vacation-planner-csv-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('writes one row per vacation block', async () => {
    const holidays = buildHolidayConfig([{ date: '2025-12-25', description: 'Christmas Day' }]);
    const vacation = buildVacationConfig([
      { description: 'Spring', start: '2025-04-14', end: '2025-04-18' },
      { description: 'Ski trip, Alps', start: '2025-12-22', end: '2025-12-28' },
    ]);
    const logger = createLoggerStub();
    const exporter = new StatisticsExporter(outputDir, logger);

    const csvPath = await exporter.exportBlocks(vacation, computeStatistics(2025, holidays, vacation));

    expect(csvPath).toBe(path.join(outputDir, 'vacation_2025_Jane_Doe.csv'));
    const lines = (await fs.readFile(csvPath, 'utf-8')).split('\n').filter(Boolean);
    expect(lines).toEqual([
      'ID,Description,Start,End,Days,Workdays',
      '1,Spring,2025-04-14,2025-04-18,5,5',
      '2,"Ski trip, Alps",2025-12-22,2025-12-28,7,4',
    ]);
    expect(logger.info).toHaveBeenCalledWith(`Saving statistics CSV to: ${csvPath}`);
  });

  it('replaces an earlier export', async () => {
    const holidays = buildHolidayConfig([]);
    const exporter = new StatisticsExporter(outputDir, createLoggerStub());

    const first = buildVacationConfig([{ description: 'Old', start: '2025-03-03', end: '2025-03-04' }]);
    await exporter.exportBlocks(first, computeStatistics(2025, holidays, first));

    const second = buildVacationConfig([{ description: 'New', start: '2025-03-10', end: '2025-03-10' }]);
    const csvPath = await exporter.exportBlocks(second, computeStatistics(2025, holidays, second));

    const lines = (await fs.readFile(csvPath, 'utf-8')).split('\n').filter(Boolean);
    expect(lines).toEqual(['ID,Description,Start,End,Days,Workdays', '1,New,2025-03-10,2025-03-10,1,1']);
  });
});
