import chalk from 'chalk';

let quiet = false;

/**
 * Suppress info and warning lines (used in --json mode, where stdout must
 * carry a single JSON document). Errors are still written to stderr.
 */
export function setQuiet(value: boolean): void {
  quiet = value;
}

export function isQuiet(): boolean {
  return quiet;
}

export const log = {
  info(message: string): void {
    if (quiet) return;
    console.log(`${chalk.blue('[info]')} ${message}`);
  },

  warn(message: string): void {
    if (quiet) return;
    console.error(`${chalk.yellow('[warn]')} ${message}`);
  },

  error(message: string): void {
    console.error(`${chalk.red('[error]')} ${message}`);
  },
};
