import type { Command } from 'commander';
import type { ExecutionOptions } from '@depsource/core/types/execution-context.js';

export type GlobalOptions = ExecutionOptions;

type RawGlobalOptions = {
  home?: string;
  sourcesListDir?: string;
  verbose?: boolean;
};

/**
 * Options declared on the root program, as seen from a subcommand
 */
export function globalOptions(command: Command): GlobalOptions {
  const raw = command.parent?.opts<RawGlobalOptions>() ?? {};
  return {
    home: raw.home,
    sourcesListDir: raw.sourcesListDir,
    verbose: raw.verbose
  };
}
