/**
 * Content-addressed cache of fetched mapping data.
 *
 * Layout of the cache directory:
 *
 * ```
 * sources.cache/
 *   index                 # every configured source, one `yaml <url> <tags>` line each
 *   <sha1(url)>           # YAML mapping document fetched from <url>
 * ```
 *
 * The index is the sentinel for "update has run at least once"; an entry
 * may be missing (the source never fetched) or stale (last fetch failed).
 */

import { join } from 'path';
import * as yaml from 'js-yaml';
import { CACHE_INDEX_HEADER, FILE_PATTERNS } from '../../constants/index.js';
import type { MappingData, SourceSpec } from '../../types/index.js';
import { ensureDir, readTextFileIfExists, writeTextFileAtomic } from '../../utils/fs.js';
import { computeSha1 } from '../../utils/hash-utils.js';
import { InvalidDataError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CachedDataSource, DataSource } from './data-source.js';
import { parseSourcesData } from './sources-list.js';

export function isMappingData(value: unknown): value is MappingData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Cache key for a source URL: SHA-1 hex digest of the URL string
 */
export function computeKey(url: string): string {
  return computeSha1(url);
}

export function getEntryPath(cacheDir: string, url: string): string {
  return join(cacheDir, computeKey(url));
}

export function getIndexPath(cacheDir: string): string {
  return join(cacheDir, FILE_PATTERNS.CACHE_INDEX);
}

/**
 * Serialize mapping data for `url` into the cache. Returns the entry path.
 */
export async function writeEntry(cacheDir: string, url: string, mappingData: MappingData): Promise<string> {
  await ensureDir(cacheDir);
  const entryPath = getEntryPath(cacheDir, url);
  await writeTextFileAtomic(entryPath, yaml.dump(mappingData));
  logger.debug(`Cached ${url} at ${entryPath}`);
  return entryPath;
}

/**
 * Load the cached mapping data for `url`, or null when there is no entry.
 */
export async function loadEntry(cacheDir: string, url: string): Promise<MappingData | null> {
  const entryPath = getEntryPath(cacheDir, url);
  const content = await readTextFileIfExists(entryPath);
  if (content === null) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InvalidDataError(`corrupt cache entry for ${url}: ${errorMessage(error)}`, { origin: entryPath });
  }
  // an empty document round-trips as null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMappingData(parsed)) {
    throw new InvalidDataError(`cache entry for ${url} is not a dictionary`, { origin: entryPath });
  }
  return parsed;
}

/**
 * Rewrite the index from `sources`. The type column is always `yaml`.
 */
export async function writeIndex(cacheDir: string, sources: readonly SourceSpec[]): Promise<string> {
  await ensureDir(cacheDir);
  const lines = [CACHE_INDEX_HEADER];
  for (const source of sources) {
    lines.push(`yaml ${source.url} ${source.tags.join(' ')}`);
  }
  const indexPath = getIndexPath(cacheDir);
  await writeTextFileAtomic(indexPath, `${lines.join('\n')}\n`);
  return indexPath;
}

/**
 * Read the index. No index yet means no sources.
 */
export async function readIndex(cacheDir: string): Promise<SourceSpec[]> {
  const indexPath = getIndexPath(cacheDir);
  const content = await readTextFileIfExists(indexPath);
  if (content === null) {
    return [];
  }
  return parseSourcesData(content, indexPath).map(source => ({
    kind: source.kind,
    url: source.url,
    tags: [...source.tags]
  }));
}

/**
 * Load every source named by the index along with its cached data.
 * Each result's origin is the path of its cache entry.
 */
export async function loadCachedSources(cacheDir: string, verbose: boolean = false): Promise<CachedDataSource[]> {
  const specs = await readIndex(cacheDir);
  if (specs.length === 0 && verbose) {
    logger.info('no cached sources in index, run update first');
  }

  const cached: CachedDataSource[] = [];
  for (const entry of specs) {
    const entryPath = getEntryPath(cacheDir, entry.url);
    const mappingData = await loadEntry(cacheDir, entry.url);
    if (verbose && mappingData !== null) {
      logger.info(`loading cached data source:\n\t${entry.url}\n\t${entryPath}`);
    }
    cached.push(new CachedDataSource(new DataSource(entry.kind, entry.url, entry.tags, entryPath), mappingData));
  }
  return cached;
}
