import chalk from "chalk";

/** Sink for the warnings and errors that library operations report instead of throwing. */
export interface Logger {
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  warn: (message) => console.error(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message)),
};
