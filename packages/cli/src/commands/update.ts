import type { Command } from 'commander';
import pc from 'picocolors';

import { ensureDepsourceDirectories } from '@depsource/core/core/directory.js';
import { createDefaultFetchers } from '@depsource/core/core/sources/fetchers.js';
import { updateSourcesList, type SourceUpdateResult } from '@depsource/core/core/sources/update.js';
import { createHttpDownloader } from '@depsource/core/utils/download.js';
import { DownloadFailureError } from '@depsource/core/utils/errors.js';
import type { CommandResult } from '@depsource/core/types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { globalOptions, type GlobalOptions } from '../cli/global-options.js';

interface UpdateOptions {
  concurrency?: string;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

async function updateCommand(options: UpdateOptions, globals: GlobalOptions): Promise<CommandResult<SourceUpdateResult[]>> {
  const ctx = await createCliExecutionContext(globals);
  await ensureDepsourceDirectories(ctx.paths);

  const downloader = createHttpDownloader({ timeoutMs: ctx.config.downloadTimeoutMs });
  console.log(`reading in sources list data from ${pc.bold(ctx.paths.sourcesList)}`);

  const results = await updateSourcesList({
    sourcesListDir: ctx.paths.sourcesList,
    cacheDir: ctx.paths.sourcesCache,
    fetchers: createDefaultFetchers({ downloader, gbpdistroTargetsUrl: ctx.config.gbpdistroTargetsUrl }),
    concurrency: parseConcurrency(options.concurrency) ?? ctx.config.updateConcurrency,
    progress: ctx.progress
  });

  if (results.length === 0) {
    console.log(pc.yellow(`no sources found in ${ctx.paths.sourcesList}; run 'depsource init' first`));
    return { success: true, data: results };
  }

  const failed = results.filter(result => result.outcome.status === 'failed');
  if (failed.length > 0) {
    throw new DownloadFailureError(
      `Not all sources were able to be updated.\n${failed.map(result => `\t${result.source.url}`).join('\n')}`,
      { failed: failed.map(result => result.source.url) }
    );
  }
  console.log(`updated cache in ${pc.bold(ctx.paths.sourcesCache)}`);
  return { success: true, data: results };
}

export async function setupUpdateCommand(options: UpdateOptions, command: Command): Promise<void> {
  await updateCommand(options, globalOptions(command));
}
