/**
 * Commander action wrapper. Lives in the CLI package because it writes to
 * stderr and ends the process.
 */

import pc from 'picocolors';

import { ErrorCodes } from '@depsource/core/types/index.js';
import { handleError, InstallFailedError } from '@depsource/core/utils/errors.js';

/**
 * Captured output of a failed install script, when there is any
 */
function scriptOutput(error: unknown): string | undefined {
  if (!(error instanceof InstallFailedError) || error.code !== ErrorCodes.INSTALL_SCRIPT_FAILED) {
    return undefined;
  }
  const output = error.details?.output;
  return typeof output === 'string' && output.trim() ? output.trimEnd() : undefined;
}

export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(pc.red(`ERROR: ${result.error}`));
      const output = scriptOutput(error);
      if (output) {
        console.error(pc.dim(output));
      }
      process.exit(1);
    }
  };
}
