import chalk from 'chalk';

type LoggerOptions = {
  quiet?: boolean;
};

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(options: LoggerOptions) {
  const quiet = Boolean(options.quiet);
  const log = (...args: unknown[]) => {
    if (!quiet) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const warn = (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.warn(...args);
  };
  const error = (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.error(...args);
  };
  const heading = (message: string) => {
    log(chalk.magenta(message));
  };
  const success = (message: string) => {
    log(chalk.green(` ${message}`));
  };
  const notice = (message: string) => {
    log(chalk.yellow(` ${message}`));
  };
  /** Short message in red, detail in yellow, then the terminal bell */
  const failure = (message: string, detail?: string) => {
    error(chalk.red(message));
    if (detail) {
      error(chalk.yellow(detail));
    }
    process.stdout.write('\x07');
  };
  return {
    log,
    warn,
    error,
    heading,
    success,
    notice,
    failure
  };
}
