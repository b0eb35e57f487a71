import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { updateSourcesList } from '../../../packages/core/src/core/sources/update.js';
import { createDefaultFetchers } from '../../../packages/core/src/core/sources/fetchers.js';
import { getEntryPath, getIndexPath, loadCachedSources } from '../../../packages/core/src/core/sources/sources-cache.js';
import { DataSourceMatcher } from '../../../packages/core/src/core/sources/data-source-matcher.js';
import { SourcesListLoader } from '../../../packages/core/src/core/sources/sources-list-loader.js';
import type { DataSource } from '../../../packages/core/src/core/sources/data-source.js';
import { CACHE_INDEX_HEADER } from '../../../packages/core/src/constants/index.js';
import { ErrorCodes } from '../../../packages/core/src/types/index.js';
import { DownloadFailureError, InvalidDataError } from '../../../packages/core/src/utils/errors.js';
import { FakeDownloader, makeTempDir, recordingProgress, removeTempDir } from '../../test-helpers.js';

const A_URL = 'http://example.org/a.yaml';
const B_URL = 'http://example.org/b.yaml';

describe('updateSourcesList', () => {
  let root: string;
  let sourcesListDir: string;
  let cacheDir: string;

  beforeEach(async () => {
    root = await makeTempDir('update');
    sourcesListDir = path.join(root, 'sources.list.d');
    cacheDir = path.join(root, 'sources.cache');
    await mkdir(sourcesListDir, { recursive: true });
    await writeFile(path.join(sourcesListDir, '20-default.list'), `yaml ${A_URL}\nyaml ${B_URL} ubuntu\n`);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function update(downloader: FakeDownloader, extra: { concurrency?: number } = {}) {
    return updateSourcesList({
      sourcesListDir,
      cacheDir,
      fetchers: createDefaultFetchers({ downloader }),
      ...extra
    });
  }

  it('caches every source and writes the index', async () => {
    const downloader = new FakeDownloader({
      [A_URL]: 'foo:\n  ubuntu: [libfoo]\n',
      [B_URL]: 'bar:\n  ubuntu: [libbar]\n',
    });

    const results = await update(downloader);

    assert.deepEqual(results.map(r => [r.source.url, r.outcome.status]), [
      [A_URL, 'updated'],
      [B_URL, 'updated'],
    ]);
    assert.deepEqual(results[0].outcome, { status: 'updated', cachePath: getEntryPath(cacheDir, A_URL) });
    assert.equal(
      await readFile(getIndexPath(cacheDir), 'utf8'),
      `${CACHE_INDEX_HEADER}\nyaml ${A_URL} \nyaml ${B_URL} ubuntu\n`
    );

    const cached = await loadCachedSources(cacheDir);
    assert.deepEqual(cached.map(c => c.mappingData), [
      { foo: { ubuntu: ['libfoo'] } },
      { bar: { ubuntu: ['libbar'] } },
    ]);
  });

  it('produces byte-identical cache files when run twice on unchanged data', async () => {
    const downloader = new FakeDownloader({
      [A_URL]: 'foo:\n  ubuntu: [libfoo]\n',
      [B_URL]: 'bar: {debian: [libbar]}\n',
    });

    await update(downloader);
    const firstEntry = await readFile(getEntryPath(cacheDir, A_URL), 'utf8');
    const firstIndex = await readFile(getIndexPath(cacheDir), 'utf8');

    await update(downloader);
    assert.equal(await readFile(getEntryPath(cacheDir, A_URL), 'utf8'), firstEntry);
    assert.equal(await readFile(getIndexPath(cacheDir), 'utf8'), firstIndex);
  });

  it('keeps going when one source fails and still indexes it', async () => {
    const downloader = new FakeDownloader({
      [A_URL]: 'foo:\n  ubuntu: [libfoo]\n',
      [B_URL]: 'bar:\n  ubuntu: [libbar]\n',
    });
    await update(downloader);

    // b becomes unreachable; its previous entry stays loadable
    downloader.set(B_URL, new Error('connection reset'));
    downloader.set(A_URL, 'foo:\n  ubuntu: [libfoo2]\n');
    const results = await update(downloader);

    assert.equal(results[0].outcome.status, 'updated');
    const failure = results[1].outcome;
    assert.equal(failure.status, 'failed');
    if (failure.status === 'failed') {
      assert.ok(failure.error instanceof DownloadFailureError);
      assert.equal(failure.error.code, ErrorCodes.DOWNLOAD_FAILURE);
      assert.equal(failure.error.message, `Failed to update ${B_URL}: connection reset`);
      assert.deepEqual(failure.error.details, { url: B_URL });
    }

    const cached = await loadCachedSources(cacheDir);
    assert.deepEqual(cached.map(c => c.url), [A_URL, B_URL]);
    assert.deepEqual(cached[0].mappingData, { foo: { ubuntu: ['libfoo2'] } });
    assert.deepEqual(cached[1].mappingData, { bar: { ubuntu: ['libbar'] } });
  });

  it('records a non-dictionary document as a failed source', async () => {
    const downloader = new FakeDownloader({
      [A_URL]: '- just\n- a list\n',
      [B_URL]: 'bar: {}\n',
    });

    const results = await update(downloader);
    const outcome = results[0].outcome;
    assert.equal(outcome.status, 'failed');
    if (outcome.status === 'failed') {
      assert.ok(outcome.error instanceof InvalidDataError);
      assert.equal(outcome.error.code, ErrorCodes.INVALID_DATA);
      assert.equal(outcome.error.message, `data from [${A_URL}] is not a YAML dictionary`);
    }
    assert.equal(results[1].outcome.status, 'updated');
  });

  it('records malformed YAML as invalid data', async () => {
    const downloader = new FakeDownloader({
      [A_URL]: 'foo: [unclosed\n',
      [B_URL]: 'bar: {}\n',
    });

    const results = await update(downloader);
    const outcome = results[0].outcome;
    assert.equal(outcome.status, 'failed');
    if (outcome.status === 'failed') {
      assert.equal(outcome.error.code, ErrorCodes.INVALID_DATA);
      assert.ok(outcome.error.message.startsWith(`Invalid YAML from [${A_URL}]: `));
    }
    assert.equal(results[1].outcome.status, 'updated');
  });

  it('calls back in sources-list order after every fetch finished', async () => {
    const downloader = new FakeDownloader({ [B_URL]: 'bar: {}\n' });
    const calls: string[] = [];

    await updateSourcesList({
      sourcesListDir,
      cacheDir,
      fetchers: createDefaultFetchers({ downloader }),
      concurrency: 2,
      onSuccess: (source: DataSource) => calls.push(`ok ${source.url}`),
      onError: (source: DataSource) => calls.push(`error ${source.url}`)
    });

    assert.deepEqual(calls, [`error ${A_URL}`, `ok ${B_URL}`]);
  });

  it('emits start, per-source and summary progress', async () => {
    const downloader = new FakeDownloader({ [A_URL]: 'foo: {}\n' });
    const progress = recordingProgress();

    await updateSourcesList({
      sourcesListDir,
      cacheDir,
      fetchers: createDefaultFetchers({ downloader }),
      concurrency: 1,
      progress
    });

    const types = progress.events.map(e => e.type);
    assert.equal(types[0], 'update:start');
    assert.equal(types[types.length - 1], 'update:complete');
    const last = progress.events[progress.events.length - 1];
    if (last.type === 'update:complete') {
      assert.deepEqual(last.summary, { updated: 1, failed: 1 });
    }
  });

  it('aborts before fetching when a sources list is malformed', async () => {
    await writeFile(path.join(sourcesListDir, '30-broken.list'), 'yaml\n');
    const downloader = new FakeDownloader({ [A_URL]: 'foo: {}\n', [B_URL]: 'bar: {}\n' });

    await assert.rejects(update(downloader), InvalidDataError);
    assert.deepEqual(downloader.calls, []);
  });

  it('loads what the platform matches, end to end', async () => {
    const downloader = new FakeDownloader({
      [A_URL]: 'foo:\n  ubuntu: [libfoo]\n',
      [B_URL]: 'bar:\n  ubuntu: [libbar]\n',
    });
    await update(downloader);

    const onUbuntu = await SourcesListLoader.createDefault({ cacheDir, matcher: new DataSourceMatcher(['ubuntu']) });
    assert.deepEqual(onUbuntu.getLoadableViews(), [A_URL, B_URL]);

    const onDebian = await SourcesListLoader.createDefault({ cacheDir, matcher: new DataSourceMatcher(['debian']) });
    assert.deepEqual(onDebian.getLoadableViews(), [A_URL]);
  });
});
