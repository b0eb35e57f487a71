import type { Command } from 'commander';
import pc from 'picocolors';

import { DataSourceMatcher } from '@depsource/core/core/sources/data-source-matcher.js';
import { loadCachedSources } from '@depsource/core/core/sources/sources-cache.js';
import type { CommandResult } from '@depsource/core/types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { globalOptions, type GlobalOptions } from '../cli/global-options.js';

interface SourcesOptions {
  all?: boolean;
}

/**
 * List cached sources; by default only those matching this platform
 */
async function sourcesCommand(options: SourcesOptions, globals: GlobalOptions): Promise<CommandResult<string[]>> {
  const ctx = await createCliExecutionContext(globals);
  const matcher = await DataSourceMatcher.fromConfig(ctx.config);
  const cached = await loadCachedSources(ctx.paths.sourcesCache, ctx.verbose);

  console.log(pc.dim(`platform tags: [${matcher.tags.join(', ')}]`));
  if (cached.length === 0) {
    console.log(pc.dim("No cached sources. Run 'depsource update'."));
    return { success: true, data: [] };
  }

  const listed: string[] = [];
  for (const source of cached) {
    const matches = matcher.matches(source);
    if (!matches && !options.all) {
      continue;
    }
    listed.push(source.url);
    const tags = source.tags.length > 0 ? ` ${pc.dim(source.tags.join(' '))}` : '';
    const marker = matches ? pc.green('*') : ' ';
    const state = source.mappingData === null ? pc.yellow(' (not cached)') : '';
    console.log(`${marker} ${source.url}${tags}${state}`);
  }
  return { success: true, data: listed };
}

export async function setupSourcesCommand(options: SourcesOptions, command: Command): Promise<void> {
  await sourcesCommand(options, globalOptions(command));
}
