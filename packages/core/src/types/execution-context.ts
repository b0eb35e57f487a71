/**
 * Execution Context Types
 *
 * The execution context carries everything a command needs from the
 * outside world: resolved directories, loaded configuration, and the
 * progress port used to report what the core is doing.
 */

import type { ProgressPort } from '../core/ports/progress.js';
import type { DepsourceConfig, DepsourcePaths } from './index.js';

export interface ExecutionContext {
  /** Directories resolved at the entry point */
  paths: DepsourcePaths;

  /** Configuration loaded from the config directory */
  config: DepsourceConfig;

  /**
   * Progress port for structured progress events.
   * When not provided, resolveProgress() falls back to silentProgress.
   */
  progress?: ProgressPort;

  /** Verbose diagnostics requested by the caller */
  verbose?: boolean;
}

export interface ExecutionOptions {
  /** Override the depsource home directory */
  home?: string;
  /** Override the sources list directory */
  sourcesListDir?: string;
  verbose?: boolean;
}
