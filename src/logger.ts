import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(chalk.cyan(message)),
    success: (message) => console.log(chalk.green(`✅ ${message}`)),
    warn: (message) => console.log(chalk.yellow(`⚠️  ${message}`)),
    error: (message, error) => {
      if (error === undefined) {
        console.log(chalk.red(`❌ ${message}`));
      } else {
        console.log(chalk.red(`❌ ${message}`), error instanceof Error ? error.message : error);
      }
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
