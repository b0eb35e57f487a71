import type { Command } from 'commander';
import * as yaml from 'js-yaml';
import pc from 'picocolors';

import { ALL_VIEW_KEY } from '@depsource/core/constants/index.js';
import { DependencyDatabase, loadAllViews } from '@depsource/core/core/lookup/dependency-database.js';
import { DataSourceMatcher } from '@depsource/core/core/sources/data-source-matcher.js';
import { SourcesListLoader } from '@depsource/core/core/sources/sources-list-loader.js';
import { ResourceNotFoundError } from '@depsource/core/utils/errors.js';
import type { CommandResult } from '@depsource/core/types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { globalOptions, type GlobalOptions } from '../cli/global-options.js';

/**
 * Print the composed mapping rule for each dependency key
 */
async function resolveCommand(keys: string[], globals: GlobalOptions): Promise<CommandResult<Record<string, unknown>>> {
  const ctx = await createCliExecutionContext(globals);
  const loader = await SourcesListLoader.createDefault({
    cacheDir: ctx.paths.sourcesCache,
    matcher: await DataSourceMatcher.fromConfig(ctx.config),
    verbose: ctx.verbose
  });

  const db = new DependencyDatabase();
  loadAllViews(loader, db, ctx.verbose);
  const view = db.getComposedView(ALL_VIEW_KEY);
  const composed = view.found ? view.value : {};

  const resolved: Record<string, unknown> = {};
  for (const key of keys) {
    if (!Object.hasOwn(composed, key)) {
      throw new ResourceNotFoundError(key);
    }
    resolved[key] = composed[key];
    console.log(pc.bold(`#${key}`));
    console.log(yaml.dump(composed[key]).trimEnd());
  }
  return { success: true, data: resolved };
}

export async function setupResolveCommand(keys: string[], _options: object, command: Command): Promise<void> {
  await resolveCommand(keys, globalOptions(command));
}
