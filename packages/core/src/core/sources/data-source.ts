/**
 * Data source descriptors.
 *
 * A DataSource names one location of dependency-mapping data together with
 * the platform tags it applies to. A CachedDataSource pairs a descriptor
 * with whatever mapping data the cache holds for it.
 */

import { isDeepStrictEqual } from 'util';
import type { DataSourceKind, MappingData } from '../../types/index.js';
import { InvalidDataError } from '../../utils/errors.js';

export const VALID_KINDS: readonly DataSourceKind[] = ['yaml', 'gbpdistro'];

export function isDataSourceKind(value: string): value is DataSourceKind {
  return VALID_KINDS.some(kind => kind === value);
}

/**
 * A URL is usable as a source location when it has a scheme, a host and a
 * path other than the root.
 */
export function validateSourceUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidDataError(`url must be a fully-specified URL with scheme, hostname, and path: ${url}`);
  }
  if (!parsed.protocol || !parsed.host || parsed.pathname === '' || parsed.pathname === '/') {
    throw new InvalidDataError(`url must be a fully-specified URL with scheme, hostname, and path: ${url}`);
  }
}

export class DataSource {
  readonly kind: DataSourceKind;
  readonly url: string;
  readonly tags: readonly string[];
  /** Where this descriptor came from (list file or cache entry), for debugging */
  readonly origin?: string;

  constructor(kind: string, url: string, tags: readonly string[], origin?: string) {
    if (!isDataSourceKind(kind)) {
      throw new InvalidDataError(`type must be one of [${VALID_KINDS.join(',')}]: ${kind}`);
    }
    validateSourceUrl(url);

    this.kind = kind;
    this.url = url;
    this.tags = Object.freeze([...tags]);
    this.origin = origin;
    Object.freeze(this);
  }

  equals(other: DataSource): boolean {
    return this.kind === other.kind
      && this.url === other.url
      && this.origin === other.origin
      && this.tags.length === other.tags.length
      && this.tags.every((tag, i) => tag === other.tags[i]);
  }

  toString(): string {
    const line = `${this.kind} ${this.url} ${this.tags.join(' ')}`;
    return this.origin ? `[${this.origin}]:\n${line}` : line;
  }
}

/**
 * A data source plus the mapping data loaded from its cache entry.
 * `mappingData` is null when the source was never fetched successfully.
 */
export class CachedDataSource {
  readonly source: DataSource;
  readonly mappingData: MappingData | null;

  constructor(source: DataSource, mappingData: MappingData | null) {
    this.source = source;
    this.mappingData = mappingData;
  }

  get kind(): DataSourceKind {
    return this.source.kind;
  }

  get url(): string {
    return this.source.url;
  }

  get tags(): readonly string[] {
    return this.source.tags;
  }

  get origin(): string | undefined {
    return this.source.origin;
  }

  equals(other: CachedDataSource): boolean {
    return this.source.equals(other.source) && isDeepStrictEqual(this.mappingData, other.mappingData);
  }

  toString(): string {
    return `${this.source.toString()}\n${JSON.stringify(this.mappingData)}`;
  }
}

/** Anything carrying tags can be matched */
export interface Tagged {
  readonly tags: readonly string[];
}
