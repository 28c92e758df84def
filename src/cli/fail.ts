import { log } from '../utils/log.js';
import { isJsonMode, jsonFailure } from './json-output.js';

/**
 * Report a fatal command error and exit with status 1.
 */
export function failCommand(command: string, error: unknown): never {
  if (isJsonMode()) {
    jsonFailure(command, error);
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}
