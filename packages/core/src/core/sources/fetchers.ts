/**
 * Per-kind mapping-data fetchers.
 * Routes a data source to the loader for its kind; every fetcher returns
 * a dependency-mapping dictionary or throws DownloadFailureError /
 * InvalidDataError.
 */

import * as yaml from 'js-yaml';
import { DEFAULT_GBPDISTRO_TARGETS_URL } from '../../constants/index.js';
import type { DataSourceKind, MappingData } from '../../types/index.js';
import { downloadText, type Downloader } from '../../utils/download.js';
import { errorMessage, InvalidDataError } from '../../utils/errors.js';
import type { DataSource } from './data-source.js';
import { downloadGbpdistroAsMappingData } from './gbpdistro.js';
import { isMappingData } from './sources-cache.js';

export type MappingFetcher = (source: DataSource) => Promise<MappingData>;

export type MappingFetchers = Record<DataSourceKind, MappingFetcher>;

export interface FetcherOptions {
  downloader: Downloader;
  gbpdistroTargetsUrl?: string;
}

/**
 * Download and parse a plain dependency-mapping document.
 * Fails when the server is unreachable, the YAML is malformed, or the top
 * level is not a dictionary.
 */
export async function downloadMappingData(downloader: Downloader, url: string): Promise<MappingData> {
  const text = await downloadText(downloader, url);
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (error) {
    throw new InvalidDataError(`Invalid YAML from [${url}]: ${errorMessage(error)}`, { url });
  }
  if (!isMappingData(data)) {
    throw new InvalidDataError(`data from [${url}] is not a YAML dictionary`, { url });
  }
  return data;
}

export function createDefaultFetchers(options: FetcherOptions): MappingFetchers {
  const { downloader } = options;
  const targetsUrl = options.gbpdistroTargetsUrl ?? DEFAULT_GBPDISTRO_TARGETS_URL;
  return {
    yaml: source => downloadMappingData(downloader, source.url),
    gbpdistro: source => downloadGbpdistroAsMappingData(downloader, source.url, targetsUrl)
  };
}
