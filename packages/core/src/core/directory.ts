import * as os from 'os';
import * as path from 'path';
import { DepsourcePaths } from '../types/index.js';
import type { ExecutionOptions } from '../types/execution-context.js';
import { DIR_PATTERNS, ENV_VARS, SYSTEM_SOURCES_LIST_DIR } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Resolve depsource directories.
 *
 * Environment lookup happens here and nowhere else; everything below the
 * entry point receives the resulting DepsourcePaths.
 *
 * - config + cache live under ~/.depsource (or $DEPSOURCE_HOME)
 * - the sources list is system-wide unless $DEPSOURCE_SOURCES_LIST_DIR is set
 */
export function getDepsourcePaths(
  options: ExecutionOptions = {},
  env: NodeJS.ProcessEnv = process.env
): DepsourcePaths {
  const home = options.home
    ?? env[ENV_VARS.HOME]
    ?? path.join(os.homedir(), DIR_PATTERNS.DEPSOURCE_HOME);
  const sourcesList = options.sourcesListDir
    ?? env[ENV_VARS.SOURCES_LIST_DIR]
    ?? SYSTEM_SOURCES_LIST_DIR;

  return {
    config: home,
    sourcesList: path.resolve(sourcesList),
    sourcesCache: path.join(home, DIR_PATTERNS.SOURCES_CACHE)
  };
}

/**
 * Ensure the user-owned directories exist. The sources list directory is
 * left alone: it is usually system-owned and created by `init`.
 */
export async function ensureDepsourceDirectories(paths: DepsourcePaths): Promise<DepsourcePaths> {
  try {
    await Promise.all([
      ensureDir(paths.config),
      ensureDir(paths.sourcesCache)
    ]);
    logger.debug('depsource directories ensured', { directories: paths });
    return paths;
  } catch (error) {
    logger.error('Failed to create depsource directories', { error, directories: paths });
    throw error;
  }
}
