import type { Command } from 'commander';

import { SourceInstaller } from '@depsource/core/core/source-install/source-installer.js';
import { createHttpDownloader } from '@depsource/core/utils/download.js';
import { isFile } from '@depsource/core/utils/fs.js';
import { createShellScriptRunner } from '@depsource/core/utils/script-runner.js';
import type { CommandResult } from '@depsource/core/types/index.js';
import type { SourceInstallOutcome } from '@depsource/core/core/source-install/install-pipeline.js';
import { createCliExecutionContext } from '../cli/context.js';
import { globalOptions, type GlobalOptions } from '../cli/global-options.js';

/**
 * Install from an rdmanifest given as a local file or a URL
 */
async function installCommand(manifest: string, globals: GlobalOptions): Promise<CommandResult<SourceInstallOutcome>> {
  const ctx = await createCliExecutionContext(globals);
  const installer = new SourceInstaller({
    downloader: createHttpDownloader({ timeoutMs: ctx.config.downloadTimeoutMs }),
    scriptRunner: createShellScriptRunner(),
    progress: ctx.progress
  });

  const outcome = await isFile(manifest)
    ? await installer.installFromFile(manifest)
    : await installer.installFromUrl(manifest);
  return { success: true, data: outcome };
}

export async function setupInstallCommand(manifest: string, _options: object, command: Command): Promise<void> {
  await installCommand(manifest, globalOptions(command));
}
