/**
 * @depsource/core - dependency source library
 *
 * Data-source caching, sources-list views and source installs.
 * This package has no terminal/UI dependencies; progress is reported
 * through the ProgressPort interface.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export type {
  ProgressPort,
  ProgressEvent,
  ProgressEventInput,
  ProgressEventBase,
  UpdateProgressEvent,
  InstallProgressEvent,
  SourceInstallState,
} from './core/ports/progress.js';
export { emitProgress } from './core/ports/progress.js';
export { consoleProgress, silentProgress } from './core/ports/console-progress.js';
export { resolveProgress } from './core/ports/resolve.js';

// ============================================================================
// Directories & Configuration
// ============================================================================

export { getDepsourcePaths, ensureDepsourceDirectories } from './core/directory.js';
export { ConfigManager, parseDepsourceConfig } from './core/config.js';
export {
  createOsReleaseDetector,
  parseOsRelease,
  type PlatformDetector,
  type PlatformInfo,
} from './core/platform/platform-detector.js';

// ============================================================================
// Data Sources
// ============================================================================

export { DataSource, CachedDataSource, VALID_KINDS, isDataSourceKind, validateSourceUrl } from './core/sources/data-source.js';
export { DataSourceMatcher } from './core/sources/data-source-matcher.js';
export { parseSourcesData, parseSourcesFile, parseSourcesList } from './core/sources/sources-list.js';
export {
  computeKey,
  getEntryPath,
  getIndexPath,
  writeEntry,
  loadEntry,
  writeIndex,
  readIndex,
  loadCachedSources,
} from './core/sources/sources-cache.js';
export {
  createDefaultFetchers,
  downloadMappingData,
  type FetcherOptions,
  type MappingFetcher,
  type MappingFetchers,
} from './core/sources/fetchers.js';
export { gbpdistroToMappingData, downloadGbpdistroAsMappingData } from './core/sources/gbpdistro.js';
export {
  updateSourcesList,
  type SourceUpdateOutcome,
  type SourceUpdateResult,
  type UpdateSourcesOptions,
} from './core/sources/update.js';
export { initSourcesList, downloadDefaultSourcesList } from './core/sources/init.js';
export { SourcesListLoader, type SourcesListLoaderOptions } from './core/sources/sources-list-loader.js';

// ============================================================================
// Lookup
// ============================================================================

export {
  found,
  notFound,
  type DependencyLoader,
  type LookupResult,
  type ViewDataStore,
} from './core/lookup/loader.js';
export { DependencyDatabase, loadAllViews, loadViewWithDependencies, type ViewEntry } from './core/lookup/dependency-database.js';

// ============================================================================
// Source Install
// ============================================================================

export {
  ResolvedSourceInstall,
  InvalidRdmanifestError,
  downloadRdmanifest,
  loadRdmanifest,
} from './core/source-install/rdmanifest.js';
export { SourceInstaller, type SourceInstallerOptions, type InstallCommandOptions } from './core/source-install/source-installer.js';
export {
  installSource,
  installFromFile,
  installFromUrl,
  isSourceInstalled,
  type SourceInstallOptions,
  type SourceInstallOutcome,
} from './core/source-install/install-pipeline.js';

// ============================================================================
// Utilities
// ============================================================================

export { createHttpDownloader, downloadText, type Downloader, type HttpDownloaderOptions } from './utils/download.js';
export { createShellScriptRunner, type ScriptResult, type ScriptRunner } from './utils/script-runner.js';
export { runWithConcurrency } from './utils/concurrency-pool.js';
export { logger } from './utils/logger.js';
export {
  InvalidDataError,
  DownloadFailureError,
  InstallFailedError,
  ResourceNotFoundError,
  FileSystemError,
  ConfigError,
  errorMessage,
  handleError,
} from './utils/errors.js';
export * from './constants/index.js';

// ============================================================================
// Types
// ============================================================================

export type { ExecutionContext, ExecutionOptions } from './types/execution-context.js';
export { DepsourceError, ErrorCodes, LogLevel } from './types/index.js';
export type {
  CommandResult,
  DataSourceKind,
  DepsourceConfig,
  DepsourcePaths,
  MappingData,
  SourceSpec,
} from './types/index.js';
