import { CalendarRenderer } from './calendar-renderer.js';
import { ConfigManager } from './config-manager.js';
import { createDefaultResolver, type ConfigResolver } from './config-resolver.js';
import { checkConfigCompatibility } from './config-validator.js';
import { IcsGenerator } from './ics-generator.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { StatisticsExporter } from './statistics-exporter.js';
import { computeStatistics } from './statistics.js';
import type { HolidayConfig, VacationConfig, YearStatistics } from './types.js';

export interface VacationPlannerOptions {
  confPath: string;
  outputPath: string;
  vacationConfigPath?: string;
  holidayConfigPath?: string;
  resolver?: ConfigResolver;
  logger?: Logger;
  now?: () => Date;
}

export interface RunOptions {
  createIcs?: boolean;
  render?: boolean;
  exportCsv?: boolean;
  includeWeekends?: boolean;
}

export interface RunResult {
  icsFile?: string;
  csvFile?: string;
  rendering?: string;
}

interface PlannerState {
  holidayConfig: HolidayConfig;
  vacationConfig: VacationConfig;
  statistics: YearStatistics;
}

export class VacationPlanner {
  private readonly configManager: ConfigManager;
  private readonly resolver: ConfigResolver;
  private readonly logger: Logger;
  private readonly icsGenerator: IcsGenerator;
  private readonly exporter: StatisticsExporter;
  private readonly renderer = new CalendarRenderer();
  private state: PlannerState | null = null;

  constructor(options: VacationPlannerOptions) {
    this.logger = options.logger ?? createConsoleLogger();
    this.configManager = new ConfigManager(options.confPath, this.logger);
    this.resolver =
      options.resolver ??
      createDefaultResolver({
        vacationConfigPath: options.vacationConfigPath,
        holidayConfigPath: options.holidayConfigPath,
      });
    this.icsGenerator = new IcsGenerator(options.outputPath, {
      logger: this.logger,
      now: options.now,
    });
    this.exporter = new StatisticsExporter(options.outputPath, this.logger);
  }

  /**
   * Loads and validates both configs, warns about region/year mismatches and
   * computes the statistics for the vacation config's year.
   */
  async initialize(): Promise<YearStatistics> {
    const vacationConfig = await this.configManager.loadVacationConfig(this.resolver);
    this.logger.info(
      `Loaded vacation config for ${vacationConfig.firstName} ${vacationConfig.lastName}`
    );

    const holidayConfig = await this.configManager.loadHolidayConfig(
      this.resolver,
      vacationConfig.region,
      vacationConfig.year
    );
    this.logger.info(`Loaded holiday config for ${holidayConfig.region} ${holidayConfig.year}`);

    for (const warning of checkConfigCompatibility(holidayConfig, vacationConfig)) {
      this.logger.warn(warning);
    }

    const statistics = computeStatistics(vacationConfig.year, holidayConfig, vacationConfig);
    this.state = { holidayConfig, vacationConfig, statistics };

    return statistics;
  }

  getStatistics(): YearStatistics {
    return this.requireState().statistics;
  }

  getRenderer(): CalendarRenderer {
    return this.renderer;
  }

  async createIcs(includeWeekends = true): Promise<string> {
    const { holidayConfig, vacationConfig, statistics } = this.requireState();
    return this.icsGenerator.generateIcs(holidayConfig, vacationConfig, {
      includeWeekends,
      statistics,
    });
  }

  renderCalendar(): string {
    const { holidayConfig, vacationConfig, statistics } = this.requireState();
    return this.renderer.renderYear(holidayConfig, vacationConfig, statistics);
  }

  renderStatistics(): string {
    return this.renderer.renderStatistics(this.requireState().statistics);
  }

  async exportStatistics(): Promise<string> {
    const { vacationConfig, statistics } = this.requireState();
    return this.exporter.exportBlocks(vacationConfig, statistics);
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    await this.initialize();

    const result: RunResult = {};

    if (options.render ?? true) {
      result.rendering = this.renderCalendar();
    }

    if (options.createIcs ?? true) {
      result.icsFile = await this.createIcs(options.includeWeekends ?? true);
      this.logger.info(`Created ICS file: ${result.icsFile}`);
    }

    if (options.exportCsv) {
      result.csvFile = await this.exportStatistics();
    }

    return result;
  }

  private requireState(): PlannerState {
    if (!this.state) {
      throw new Error('Vacation planner not initialized. Call initialize() first.');
    }
    return this.state;
  }
}
