/**
 * Loader contract consumed by the dependency database.
 *
 * A loader knows a set of named views (units of mapping data) and the
 * edges between them. Lookups for names a loader does not own return a
 * not-found result so a composing loader can try the next one.
 */

import type { MappingData } from '../../types/index.js';

export type LookupResult<T> =
  | { found: true; value: T }
  | { found: false; name: string };

export function found<T>(value: T): LookupResult<T> {
  return { found: true, value };
}

export function notFound<T>(name: string): LookupResult<T> {
  return { found: false, name };
}

/**
 * Storage side of a view load. DependencyDatabase is the in-process
 * implementation.
 */
export interface ViewDataStore {
  isLoaded(viewName: string): boolean;
  setViewData(viewName: string, data: MappingData, viewDependencies: string[], origin: string): void;
}

export interface DependencyLoader {
  /** Load `viewName` into `db`; does nothing when already loaded */
  loadView(viewName: string, db: ViewDataStore, verbose?: boolean): void;
  getLoadableViews(): string[];
  getLoadableResources(): string[];
  getViewDependencies(viewName: string): string[];
  /** Dependency keys declared by a concrete resource */
  getRosdeps(resourceName: string): LookupResult<string[]>;
  /** View a concrete resource belongs to */
  getViewKey(resourceName: string): LookupResult<string>;
}
