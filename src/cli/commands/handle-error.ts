/**
 * Shared error reporting for command handlers.
 */

import { ConfigError, getExitCode, isLlvmSwitchError } from '../../core/errors.js';
import type { OutputFormatter } from '../output.js';

/**
 * Report an error that escaped a command and return its exit code.
 */
export function handleError(output: OutputFormatter, error: unknown): number {
  if (error instanceof ConfigError && error.validationErrors) {
    output.validationError(error.message, error.validationErrors, error);
  } else if (isLlvmSwitchError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  return getExitCode(error);
}
