#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import open from 'open';
import { HolidayManager } from '../holiday-manager.js';
import { loadEnv, loadSettings } from '../loadConfig.js';
import { createConsoleLogger } from '../logger.js';
import { VacationPlanner } from '../vacation-planner.js';

interface PlanOptions {
  conf?: string;
  output?: string;
  vacationConfig?: string;
  holidayConfig?: string;
  ics: boolean;
  render: boolean;
  csv?: boolean;
  excludeWeekends?: boolean;
  open?: boolean;
}

interface HolidayInitOptions {
  conf?: string;
  year?: number;
  force?: boolean;
}

loadEnv();

const program = new Command();
const logger = createConsoleLogger();

function parseYear(value: string): number {
  const year = Number(value);
  if (!Number.isInteger(year) || year < 1) {
    throw new InvalidArgumentError('Year must be a positive integer.');
  }
  return year;
}

function createPlanner(options: Pick<PlanOptions, 'conf' | 'output' | 'vacationConfig' | 'holidayConfig'>) {
  const settings = loadSettings({ confPath: options.conf, outputPath: options.output });
  return new VacationPlanner({
    ...settings,
    vacationConfigPath: options.vacationConfig,
    holidayConfigPath: options.holidayConfig,
    logger,
  });
}

program
  .name('vacation-planner')
  .description('A CLI app to plan vacation days around holidays and export them as a calendar')
  .version('1.0.0');

program
  .command('plan', { isDefault: true })
  .description('Classify the days of the year, render the calendar and write the ICS file')
  .option('--conf <dir>', 'Path to configuration directory')
  .option('--output <dir>', 'Path to output directory')
  .option('--vacation-config <file>', 'Path to vacation configuration file')
  .option('--holiday-config <file>', 'Path to holiday configuration file (.json or .ics)')
  .option('--no-ics', 'Skip ICS file generation')
  .option('--no-render', 'Skip the calendar rendering')
  .option('--csv', 'Export vacation block statistics as CSV')
  .option('--exclude-weekends', 'Leave weekend days out of the ICS file')
  .option('--open', 'Open the generated ICS file')
  // Unknown subcommands would otherwise be taken as operands of the default command
  .allowExcessArguments(false)
  .action(async (options: PlanOptions) => {
    try {
      const planner = createPlanner(options);
      const result = await planner.run({
        createIcs: options.ics,
        render: options.render,
        exportCsv: options.csv,
        includeWeekends: !options.excludeWeekends,
      });

      if (result.rendering) {
        console.log(result.rendering);
        console.log();
      }

      logger.success('Vacation plan completed successfully!');
      if (result.icsFile) console.log(chalk.cyan(`  - ICS: ${result.icsFile}`));
      if (result.csvFile) console.log(chalk.cyan(`  - CSV: ${result.csvFile}`));

      if (options.open && result.icsFile) {
        try {
          await open(result.icsFile);
          console.log(chalk.green('📅 Opening ICS file...'));
        } catch (error) {
          logger.error('Failed to open ICS file:', error);
          console.log(chalk.gray(`File location: ${result.icsFile}`));
        }
      }
    } catch (error) {
      logger.error('Error creating vacation plan:', error);
      process.exitCode = 1;
    }
  });

program
  .command('stats')
  .description('Show time-off statistics for the configured year')
  .option('--conf <dir>', 'Path to configuration directory')
  .option('--vacation-config <file>', 'Path to vacation configuration file')
  .option('--holiday-config <file>', 'Path to holiday configuration file (.json or .ics)')
  .action(async (options: Pick<PlanOptions, 'conf' | 'vacationConfig' | 'holidayConfig'>) => {
    try {
      const planner = createPlanner(options);
      await planner.initialize();
      console.log(planner.renderStatistics());
      console.log();
    } catch (error) {
      logger.error('Error showing statistics:', error);
      process.exitCode = 1;
    }
  });

const holidaysCommand = program.command('holidays').description('Manage holiday configuration files');

holidaysCommand
  .command('init <country> [region]')
  .description('Create a holiday configuration file from the public holiday database')
  .option('--conf <dir>', 'Path to configuration directory')
  .option('--year <year>', 'Year to generate holidays for (defaults to the current year)', parseYear)
  .option('-f, --force', 'Replace an existing holiday file')
  .action(async (country: string, region: string | undefined, options: HolidayInitOptions) => {
    try {
      const { confPath } = loadSettings({ confPath: options.conf });
      const holidayManager = new HolidayManager(confPath, logger);
      await holidayManager.initHolidays(
        options.year ?? new Date().getFullYear(),
        country.toUpperCase(),
        region?.toUpperCase(),
        options.force
      );
    } catch (error) {
      logger.error('Error initializing holidays:', error);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
