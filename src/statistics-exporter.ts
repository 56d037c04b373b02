import fs from 'fs/promises';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { getOutputFileName } from './helper/getOutputFileName.js';
import { createConsoleLogger, type Logger } from './logger.js';
import type { VacationConfig, YearStatistics } from './types.js';

export class StatisticsExporter {
  private readonly outputPath: string;
  private readonly logger: Logger;

  constructor(outputPath: string, logger: Logger = createConsoleLogger()) {
    this.outputPath = path.resolve(outputPath);
    this.logger = logger;
  }

  /**
   * Writes one row per vacation block, in configured order. Returns the CSV path.
   */
  async exportBlocks(vacationConfig: VacationConfig, stats: YearStatistics): Promise<string> {
    await fs.mkdir(this.outputPath, { recursive: true });

    const csvPath = path.join(this.outputPath, getOutputFileName(vacationConfig, 'csv'));
    const csvWriter = createObjectCsvWriter({
      path: csvPath,
      header: [
        { id: 'id', title: 'ID' },
        { id: 'description', title: 'Description' },
        { id: 'start', title: 'Start' },
        { id: 'end', title: 'End' },
        { id: 'totalDays', title: 'Days' },
        { id: 'workdays', title: 'Workdays' },
      ],
      append: false,
    });

    await csvWriter.writeRecords(stats.vacationBlockStats);
    this.logger.info(`Saving statistics CSV to: ${csvPath}`);

    return csvPath;
  }
}
