import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  computeKey,
  getEntryPath,
  loadCachedSources,
  loadEntry,
  readIndex,
  writeEntry,
  writeIndex
} from '../../../packages/core/src/core/sources/sources-cache.js';
import { CACHE_INDEX_HEADER } from '../../../packages/core/src/constants/index.js';
import { InvalidDataError } from '../../../packages/core/src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../test-helpers.js';

const BASE_URL = 'https://example.org/base.yaml';

describe('sources cache', () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await makeTempDir('cache');
  });

  afterEach(async () => {
    await removeTempDir(cacheDir);
  });

  it('keys entries by the sha1 of the url', () => {
    assert.equal(computeKey('abc'), 'a9993e364706816aba3e25717850c26c9cd0d89d');
    assert.equal(getEntryPath(cacheDir, 'abc'), path.join(cacheDir, 'a9993e364706816aba3e25717850c26c9cd0d89d'));
  });

  it('round-trips mapping data through an entry', async () => {
    const data = { foo: { ubuntu: { jammy: ['libfoo-dev'] } }, bar: { debian: ['bar'] } };
    const entryPath = await writeEntry(cacheDir, BASE_URL, data);

    assert.equal(entryPath, getEntryPath(cacheDir, BASE_URL));
    assert.deepEqual(await loadEntry(cacheDir, BASE_URL), data);
  });

  it('leaves no temp files behind', async () => {
    await writeEntry(cacheDir, BASE_URL, { foo: {} });
    await writeIndex(cacheDir, [{ kind: 'yaml', url: BASE_URL, tags: [] }]);

    const names = (await readdir(cacheDir)).sort();
    assert.deepEqual(names, [computeKey(BASE_URL), 'index'].sort());
  });

  it('returns null for a missing entry', async () => {
    assert.equal(await loadEntry(cacheDir, BASE_URL), null);
  });

  it('reads an empty entry as empty mapping data', async () => {
    await writeFile(getEntryPath(cacheDir, BASE_URL), '');
    assert.deepEqual(await loadEntry(cacheDir, BASE_URL), {});
  });

  it('rejects entries that are not dictionaries', async () => {
    await writeFile(getEntryPath(cacheDir, BASE_URL), '- a\n- b\n');
    await assert.rejects(loadEntry(cacheDir, BASE_URL), InvalidDataError);
  });

  it('writes the index header and one yaml line per source', async () => {
    await writeIndex(cacheDir, [
      { kind: 'yaml', url: BASE_URL, tags: ['ubuntu', 'jammy'] },
      { kind: 'gbpdistro', url: 'https://example.org/humble.yaml', tags: ['humble'] },
    ]);

    const content = await readFile(path.join(cacheDir, 'index'), 'utf8');
    assert.equal(content, [
      CACHE_INDEX_HEADER,
      `yaml ${BASE_URL} ubuntu jammy`,
      'yaml https://example.org/humble.yaml humble',
      '',
    ].join('\n'));
  });

  it('reads back the index it wrote', async () => {
    await writeIndex(cacheDir, [
      { kind: 'yaml', url: BASE_URL, tags: [] },
      { kind: 'yaml', url: 'https://example.org/python.yaml', tags: ['ubuntu'] },
    ]);

    assert.deepEqual(await readIndex(cacheDir), [
      { kind: 'yaml', url: BASE_URL, tags: [] },
      { kind: 'yaml', url: 'https://example.org/python.yaml', tags: ['ubuntu'] },
    ]);
  });

  it('treats a missing index as no sources', async () => {
    assert.deepEqual(await readIndex(cacheDir), []);
    assert.deepEqual(await loadCachedSources(cacheDir), []);
  });

  it('loads cached sources in index order with their entry path as origin', async () => {
    const pythonUrl = 'https://example.org/python.yaml';
    await writeEntry(cacheDir, BASE_URL, { foo: { ubuntu: ['libfoo'] } });
    await writeIndex(cacheDir, [
      { kind: 'yaml', url: BASE_URL, tags: ['ubuntu'] },
      { kind: 'yaml', url: pythonUrl, tags: [] },
    ]);

    const cached = await loadCachedSources(cacheDir);

    assert.equal(cached.length, 2);
    assert.equal(cached[0].url, BASE_URL);
    assert.deepEqual(cached[0].tags, ['ubuntu']);
    assert.equal(cached[0].origin, getEntryPath(cacheDir, BASE_URL));
    assert.deepEqual(cached[0].mappingData, { foo: { ubuntu: ['libfoo'] } });
    // listed but never fetched
    assert.equal(cached[1].url, pythonUrl);
    assert.equal(cached[1].mappingData, null);
  });
});
