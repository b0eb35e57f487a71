/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations.
 * Environment lookups happen here and nowhere below.
 */

import type { ExecutionContext, ExecutionOptions } from '@depsource/core/types/execution-context.js';
import { getDepsourcePaths } from '@depsource/core/core/directory.js';
import { ConfigManager } from '@depsource/core/core/config.js';
import { consoleProgress } from '@depsource/core/core/ports/console-progress.js';
import type { ProgressPort } from '@depsource/core/core/ports/progress.js';
import { logger } from '@depsource/core/utils/logger.js';
import { LogLevel } from '@depsource/core/types/index.js';
import { createClackProgress } from './clack-progress-adapter.js';

let cachedClackProgress: ProgressPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(): boolean {
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with the CLI's progress port injected.
 */
export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const paths = getDepsourcePaths({ home: options.home, sourcesListDir: options.sourcesListDir });
  const config = await new ConfigManager(paths.config).load();
  const progress = detectInteractive()
    ? (cachedClackProgress ??= createClackProgress())
    : consoleProgress;

  return { paths, config, progress, verbose: options.verbose };
}
