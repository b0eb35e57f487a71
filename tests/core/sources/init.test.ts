import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { initSourcesList } from '../../../packages/core/src/core/sources/init.js';
import { ConfigError, InvalidDataError } from '../../../packages/core/src/utils/errors.js';
import { FakeDownloader, makeTempDir, removeTempDir } from '../../test-helpers.js';

const DEFAULTS_URL = 'https://example.org/20-default.list';

describe('initSourcesList', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('init');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes the downloaded default list', async () => {
    const contents = '# defaults\nyaml https://example.org/base.yaml\n';
    const target = await initSourcesList(new FakeDownloader({ [DEFAULTS_URL]: contents }), dir, DEFAULTS_URL);

    assert.equal(target, path.join(dir, '20-default.list'));
    assert.equal(await readFile(target, 'utf8'), contents);
  });

  it('refuses to overwrite an existing default list', async () => {
    await writeFile(path.join(dir, '20-default.list'), 'yaml https://example.org/mine.yaml\n');
    const downloader = new FakeDownloader({ [DEFAULTS_URL]: 'yaml https://example.org/base.yaml\n' });

    await assert.rejects(initSourcesList(downloader, dir, DEFAULTS_URL), ConfigError);
    assert.deepEqual(downloader.calls, []);
  });

  it('rejects an empty or malformed download', async () => {
    await assert.rejects(initSourcesList(new FakeDownloader({ [DEFAULTS_URL]: '  \n' }), dir, DEFAULTS_URL), InvalidDataError);
    await assert.rejects(initSourcesList(new FakeDownloader({ [DEFAULTS_URL]: 'yaml\n' }), dir, DEFAULTS_URL), InvalidDataError);
  });
});
