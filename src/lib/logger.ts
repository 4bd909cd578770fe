import chalk from 'chalk';

/**
 * @description Output sink shared by the session classes and the CLI. `write` and `writeError` carry raw remote output; the other methods carry our own messages.
 */
export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  write(chunk: string | Buffer): void;
  writeError(chunk: string | Buffer): void;
}

const debugEnabled = (): boolean => Boolean(process.env.RSH_DEBUG);

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  success: (message) => console.log(chalk.green(message)),
  warn: (message) => console.warn(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message)),
  debug: (message) => {
    if (debugEnabled()) {
      console.log(chalk.dim(message));
    }
  },
  write: (chunk) => {
    process.stdout.write(chunk);
  },
  writeError: (chunk) => {
    process.stderr.write(chunk);
  },
};
