/**
 * Sources update.
 *
 * Re-downloads every configured source into the cache, then rewrites the
 * cache index. A failing source never aborts the batch, and the index
 * always lists every configured source: an older cache entry for a source
 * that failed this time is still valid and loadable.
 */

import { DEFAULT_UPDATE_CONCURRENCY } from '../../constants/index.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { DepsourceError, type MappingData } from '../../types/index.js';
import { DownloadFailureError, errorMessage, FileSystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { emitProgress, type ProgressPort } from '../ports/progress.js';
import { resolveProgress } from '../ports/resolve.js';
import type { DataSource } from './data-source.js';
import type { MappingFetchers } from './fetchers.js';
import { parseSourcesList } from './sources-list.js';
import { writeEntry, writeIndex } from './sources-cache.js';

export type SourceUpdateOutcome =
  | { status: 'updated'; cachePath: string }
  | { status: 'failed'; error: DepsourceError };

export interface SourceUpdateResult {
  source: DataSource;
  outcome: SourceUpdateOutcome;
}

export interface UpdateSourcesOptions {
  sourcesListDir: string;
  cacheDir: string;
  fetchers: MappingFetchers;
  /** Maximum parallel fetches */
  concurrency?: number;
  progress?: ProgressPort;
  /** Called once per updated source, in sources-list order, after all fetches finish */
  onSuccess?: (source: DataSource) => void;
  /** Called once per failed source, in sources-list order, after all fetches finish */
  onError?: (source: DataSource, error: DepsourceError) => void;
}

/**
 * Taxonomy error for a source that could not be fetched. Anything the
 * fetcher throws outside the taxonomy is a download failure of that URL.
 */
function toFetchFailure(source: DataSource, error: unknown): DepsourceError {
  if (error instanceof DepsourceError) {
    return error;
  }
  return new DownloadFailureError(`Failed to update ${source.url}: ${errorMessage(error)}`, { url: source.url });
}

function toWriteFailure(source: DataSource, error: unknown): DepsourceError {
  if (error instanceof DepsourceError) {
    return error;
  }
  return new FileSystemError(`could not cache ${source.url}: ${errorMessage(error)}`, { url: source.url });
}

/**
 * Fetch one source and write its cache entry
 */
async function updateSource(
  source: DataSource,
  options: UpdateSourcesOptions,
  progress: ProgressPort
): Promise<SourceUpdateOutcome> {
  const fail = (failure: DepsourceError): SourceUpdateOutcome => {
    emitProgress(progress, { type: 'update:source', url: source.url, status: 'failed', detail: failure.message });
    return { status: 'failed', error: failure };
  };

  emitProgress(progress, { type: 'update:source', url: source.url, status: 'fetching' });
  let mappingData: MappingData;
  try {
    mappingData = await options.fetchers[source.kind](source);
  } catch (error) {
    return fail(toFetchFailure(source, error));
  }

  let cachePath: string;
  try {
    cachePath = await writeEntry(options.cacheDir, source.url, mappingData);
  } catch (error) {
    return fail(toWriteFailure(source, error));
  }
  emitProgress(progress, { type: 'update:source', url: source.url, status: 'updated' });
  return { status: 'updated', cachePath };
}

/**
 * Re-download every source and update the cache.
 *
 * @returns one result per configured source, in sources-list order
 * @throws InvalidDataError when a sources list file is malformed (before any fetch)
 */
export async function updateSourcesList(options: UpdateSourcesOptions): Promise<SourceUpdateResult[]> {
  const progress = resolveProgress(options);
  const sources = await parseSourcesList(options.sourcesListDir);
  emitProgress(progress, { type: 'update:start', sources: sources.map(s => s.url) });

  const tasks = sources.map(source => () => updateSource(source, options, progress));
  const limit = options.concurrency ?? DEFAULT_UPDATE_CONCURRENCY;
  const taskResults = await runWithConcurrency(tasks, limit);

  const results = taskResults.map((entry, i): SourceUpdateResult => {
    if (entry.status === 'fulfilled') {
      return { source: sources[i], outcome: entry.value };
    }
    return { source: sources[i], outcome: { status: 'failed', error: toFetchFailure(sources[i], entry.error) } };
  });

  for (const { source, outcome } of results) {
    if (outcome.status === 'updated') {
      options.onSuccess?.(source);
    } else {
      logger.debug(`Failed to update ${source.url}`, { error: outcome.error });
      options.onError?.(source, outcome.error);
    }
  }

  await writeIndex(options.cacheDir, sources);

  const updated = results.filter(r => r.outcome.status === 'updated').length;
  emitProgress(progress, {
    type: 'update:complete',
    summary: { updated, failed: results.length - updated }
  });
  return results;
}
