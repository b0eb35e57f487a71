/**
 * Sources list loader.
 *
 * Exposes each cached data source as a view named by its URL. Any name
 * that is not one of those views (the aggregate `sources.list` key in
 * particular) depends on all of them, which is how precedence between
 * sources is expressed to the dependency database.
 *
 * The loader owns no concrete resources; resource lookups always come back
 * not-found. Compose it with a loader that does.
 */

import { ALL_VIEW_KEY } from '../../constants/index.js';
import { ResourceNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { found, notFound, type DependencyLoader, type LookupResult, type ViewDataStore } from '../lookup/loader.js';
import { CachedDataSource } from './data-source.js';
import { DataSourceMatcher } from './data-source-matcher.js';
import { loadCachedSources } from './sources-cache.js';

export interface SourcesListLoaderOptions {
  cacheDir: string;
  /** Defaults to a matcher built from the detected platform */
  matcher?: DataSourceMatcher;
  verbose?: boolean;
}

export class SourcesListLoader implements DependencyLoader {
  static readonly ALL_VIEW_KEY = ALL_VIEW_KEY;

  readonly sources: readonly CachedDataSource[];

  constructor(sources: readonly CachedDataSource[]) {
    this.sources = [...sources];
  }

  static async createDefault(options: SourcesListLoaderOptions): Promise<SourcesListLoader> {
    const { cacheDir, verbose = false } = options;
    const matcher = options.matcher ?? await DataSourceMatcher.createDefault();
    if (verbose) {
      logger.info(`using matcher with tags [${matcher.tags.join(', ')}]`);
    }

    const cached = await loadCachedSources(cacheDir, verbose);
    if (verbose) {
      logger.info(`loaded ${cached.length} sources`);
    }
    const matching = cached.filter(source => matcher.matches(source));
    if (verbose) {
      logger.info(`${matching.length} sources match current tags`);
    }
    return new SourcesListLoader(matching);
  }

  loadView(viewName: string, db: ViewDataStore, verbose: boolean = false): void {
    if (db.isLoaded(viewName)) {
      return;
    }
    const lookup = this.getSource(viewName);
    if (!lookup.found) {
      throw new ResourceNotFoundError(viewName);
    }
    if (verbose) {
      logger.info(`loading view [${viewName}] with sources.list loader`);
    }
    const source = lookup.value;
    db.setViewData(viewName, source.mappingData ?? {}, this.getViewDependencies(viewName), source.origin ?? viewName);
  }

  getLoadableResources(): string[] {
    return [];
  }

  getLoadableViews(): string[] {
    return this.sources.map(source => source.url);
  }

  getViewDependencies(viewName: string): string[] {
    if (viewName !== ALL_VIEW_KEY && this.sources.some(source => source.url === viewName)) {
      // concrete views are leaves
      return [];
    }
    return this.getLoadableViews();
  }

  getSource(viewName: string): LookupResult<CachedDataSource> {
    const match = this.sources.find(source => source.url === viewName);
    return match ? found(match) : notFound(viewName);
  }

  getRosdeps(resourceName: string): LookupResult<string[]> {
    return notFound(resourceName);
  }

  getViewKey(resourceName: string): LookupResult<string> {
    return notFound(resourceName);
  }
}
