import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Hide info messages. Success, warnings and errors are always shown. */
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const quiet = options.quiet ?? false;

  return {
    info(message) {
      if (!quiet) console.log(`${chalk.cyan("[INFO]")} ${message}`);
    },
    success(message) {
      console.log(`${chalk.green("[✓]")} ${message}`);
    },
    warn(message) {
      console.warn(`${chalk.yellow("[⚠]")} ${message}`);
    },
    error(message) {
      console.error(`${chalk.red("[ERROR]")} ${message}`);
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  return { info: noop, success: noop, warn: noop, error: noop };
}
