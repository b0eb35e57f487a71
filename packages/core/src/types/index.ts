/**
 * Common types and interfaces for depsource
 */

export * from './execution-context.js';

// Directory layout, resolved once at the entry point and passed down
export interface DepsourcePaths {
  /** Directory holding config.jsonc / config.json */
  config: string;
  /** Directory of `*.list` files describing the data sources */
  sourcesList: string;
  /** Content-addressed cache of fetched mapping data */
  sourcesCache: string;
}

export interface DepsourceConfig {
  /** Timeout applied to every network fetch, in milliseconds */
  downloadTimeoutMs?: number;
  /** Upper bound on parallel fetches during `update` */
  updateConcurrency?: number;
  /** Overrides platform detection when matching data sources */
  platformTags?: string[];
  /** Location of the sources list written by `init` */
  defaultSourcesListUrl?: string;
  /** Release targets document used to expand `target: all` in gbpdistro files */
  gbpdistroTargetsUrl?: string;
}

// Data source types
export type DataSourceKind = 'yaml' | 'gbpdistro';

/**
 * Raw dependency-mapping document, as fetched and cached.
 * Top level is always a dictionary keyed by dependency name.
 */
export type MappingData = Record<string, unknown>;

export interface SourceSpec {
  kind: DataSourceKind;
  url: string;
  tags: readonly string[];
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DepsourceError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DepsourceError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_DATA = 'INVALID_DATA',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  DOWNLOAD_FAILURE = 'DOWNLOAD_FAILURE',
  INSTALL_FAILED = 'INSTALL_FAILED',
  INSTALL_SCRIPT_FAILED = 'INSTALL_SCRIPT_FAILED',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
