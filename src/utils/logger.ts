/**
 * Console logger with verbosity levels
 */

import chalk from "chalk";
import { Verbosity } from "../interfaces/logger.js";

export { Verbosity };

/**
 * Log a message only shown in verbose mode
 */
export const verbose = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Verbose) {
    console.log(chalk.gray(message));
  }
};

export const info = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Normal) {
    console.log(chalk.blue(message));
  }
};

export const success = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Normal) {
    console.log(chalk.green(message));
  }
};

export const warning = (message: string, verbosity: number = Verbosity.Normal): void => {
  if (verbosity >= Verbosity.Normal) {
    console.warn(chalk.yellow(message));
  }
};

/**
 * Errors are shown at every verbosity level
 */
export const error = (message: string, _verbosity?: number): void => {
  console.error(chalk.red(message));
};

export const always = (message: string): void => {
  console.log(message);
};

/**
 * Map --quiet / --verbose flags to a verbosity level
 */
export const resolveVerbosity = (options: { quiet?: boolean; verbose?: boolean }): Verbosity => {
  if (options.quiet) {
    return Verbosity.Quiet;
  }
  if (options.verbose) {
    return Verbosity.Verbose;
  }
  return Verbosity.Normal;
};
