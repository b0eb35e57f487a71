import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Command } from 'commander';

import { program } from '../../packages/cli/src/index.js';
import { globalOptions } from '../../packages/cli/src/cli/global-options.js';
import { createCliExecutionContext } from '../../packages/cli/src/cli/context.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

describe('depsource CLI', () => {
  let home: string;

  before(async () => {
    home = await makeTempDir('cli-home');
    await writeFile(path.join(home, 'config.json'), '{ "updateConcurrency": 2 }');
  });

  after(async () => {
    await removeTempDir(home);
  });

  it('registers every command', () => {
    assert.deepEqual(program.commands.map(c => c.name()).sort(), ['init', 'install', 'resolve', 'sources', 'update']);
  });

  it('passes root options down to subcommands', () => {
    const root = new Command()
      .option('--home <dir>')
      .option('--sources-list-dir <dir>')
      .option('-v, --verbose');
    const sub = root.command('update');
    root.parse(['--home', '/tmp/ds', '--sources-list-dir', '/tmp/lists', 'update'], { from: 'user' });

    assert.deepEqual(globalOptions(sub), { home: '/tmp/ds', sourcesListDir: '/tmp/lists', verbose: undefined });
  });

  it('builds an execution context from the options and config file', async () => {
    const ctx = await createCliExecutionContext({ home, sourcesListDir: path.join(home, 'lists') });

    assert.deepEqual(ctx.paths, {
      config: home,
      sourcesList: path.join(home, 'lists'),
      sourcesCache: path.join(home, 'sources.cache')
    });
    assert.deepEqual(ctx.config, { updateConcurrency: 2 });
    assert.ok(ctx.progress);
  });
});
