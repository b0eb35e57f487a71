import { Command } from 'commander';
import { logger } from '@depsource/core/utils/logger.js';
import { withErrorHandling } from './utils/error-handling.js';
import { getVersion } from './utils/version.js';

/**
 * depsource CLI - Main entry point
 *
 * Commands are lazily loaded via dynamic import() to minimize cold-start time.
 * Only the invoked command's module tree is loaded at runtime.
 */

const program = new Command();

program
  .name('depsource')
  .description('Fetch, cache and query dependency sources; install dependencies from source')
  .version(getVersion())
  .option('--home <dir>', 'depsource home holding config and cache (default: $DEPSOURCE_HOME or ~/.depsource)')
  .option('--sources-list-dir <dir>', 'directory of *.list files (default: $DEPSOURCE_SOURCES_LIST_DIR or /etc/depsource/sources.list.d)')
  .option('-v, --verbose', 'print debug output')
  .configureHelp({ sortSubcommands: true });

// =============================================================================
// LAZY-LOADED COMMANDS
// =============================================================================

program
  .command('init')
  .description('Download the default sources list into the sources list directory')
  .option('--url <url>', 'location of the default sources list')
  .action(withErrorHandling(async (options: { url?: string }, command: Command) => {
    const { setupInitCommand } = await import('./commands/init.js');
    await setupInitCommand(options, command);
  }));

program
  .command('update')
  .description('Re-download every source in the sources list and refresh the cache')
  .option('--concurrency <n>', 'maximum parallel downloads')
  .action(withErrorHandling(async (options: { concurrency?: string }, command: Command) => {
    const { setupUpdateCommand } = await import('./commands/update.js');
    await setupUpdateCommand(options, command);
  }));

program
  .command('sources')
  .description('List cached sources that apply to this platform')
  .option('-a, --all', 'include sources whose tags do not match')
  .action(withErrorHandling(async (options: { all?: boolean }, command: Command) => {
    const { setupSourcesCommand } = await import('./commands/sources.js');
    await setupSourcesCommand(options, command);
  }));

program
  .command('resolve')
  .argument('<keys...>', 'dependency keys to look up')
  .description('Print the composed mapping rule for each key')
  .action(withErrorHandling(async (keys: string[], options: object, command: Command) => {
    const { setupResolveCommand } = await import('./commands/resolve.js');
    await setupResolveCommand(keys, options, command);
  }));

program
  .command('install')
  .argument('<manifest>', 'rdmanifest file path or URL')
  .description('Install a dependency from source using its rdmanifest')
  .action(withErrorHandling(async (manifest: string, options: object, command: Command) => {
    const { setupInstallCommand } = await import('./commands/install.js');
    await setupInstallCommand(manifest, options, command);
  }));

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Only run main if this file is executed directly; the bin wrapper calls run() itself
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
