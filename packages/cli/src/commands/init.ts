import type { Command } from 'commander';
import pc from 'picocolors';

import { DEFAULT_SOURCES_LIST_URL } from '@depsource/core/constants/index.js';
import { initSourcesList } from '@depsource/core/core/sources/init.js';
import { createHttpDownloader } from '@depsource/core/utils/download.js';
import type { CommandResult } from '@depsource/core/types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { globalOptions, type GlobalOptions } from '../cli/global-options.js';
import { Spinner } from '../utils/spinner.js';

interface InitOptions {
  url?: string;
}

async function initCommand(options: InitOptions, globals: GlobalOptions): Promise<CommandResult<string>> {
  const ctx = await createCliExecutionContext(globals);
  const url = options.url ?? ctx.config.defaultSourcesListUrl ?? DEFAULT_SOURCES_LIST_URL;
  const downloader = createHttpDownloader({ timeoutMs: ctx.config.downloadTimeoutMs });

  const target = await new Spinner(`Downloading default sources list from ${url}`).around(
    () => initSourcesList(downloader, ctx.paths.sourcesList, url),
    written => `Wrote ${pc.bold(written)}`,
    'Could not initialize the sources list'
  );
  console.log(`\nRecommended: please run\n\n\t${pc.cyan('depsource update')}\n`);
  return { success: true, data: target };
}

export async function setupInitCommand(options: InitOptions, command: Command): Promise<void> {
  await initCommand(options, globalOptions(command));
}
