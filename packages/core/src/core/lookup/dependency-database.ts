import type { MappingData } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { ALL_VIEW_KEY } from '../../constants/index.js';
import { found, notFound, type DependencyLoader, type LookupResult, type ViewDataStore } from './loader.js';

export interface ViewEntry {
  data: MappingData;
  viewDependencies: string[];
  origin: string;
}

/**
 * In-memory store of loaded views.
 *
 * Precedence: a composed view starts from its dependencies in order, where
 * the first dependency to define a key wins, and the view's own data
 * overrides all of them.
 */
/**
 * Own-property write. Mapping keys such as `__proto__` stay data keys.
 */
function setOwn(target: MappingData, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export class DependencyDatabase implements ViewDataStore {
  private readonly views = new Map<string, ViewEntry>();

  isLoaded(viewName: string): boolean {
    return this.views.has(viewName);
  }

  setViewData(viewName: string, data: MappingData, viewDependencies: string[], origin: string): void {
    this.views.set(viewName, { data, viewDependencies: [...viewDependencies], origin });
  }

  getViewData(viewName: string): LookupResult<ViewEntry> {
    const entry = this.views.get(viewName);
    return entry ? found(entry) : notFound(viewName);
  }

  /**
   * Every view `viewName` depends on, transitively, in first-seen order
   */
  getViewDependencies(viewName: string): string[] {
    const ordered: string[] = [];
    const seen = new Set<string>([viewName]);
    const visit = (name: string): void => {
      const entry = this.views.get(name);
      if (!entry) return;
      for (const dep of entry.viewDependencies) {
        if (seen.has(dep)) continue;
        seen.add(dep);
        ordered.push(dep);
        visit(dep);
      }
    };
    visit(viewName);
    return ordered;
  }

  getComposedView(viewName: string): LookupResult<MappingData> {
    const entry = this.views.get(viewName);
    if (!entry) {
      return notFound(viewName);
    }

    const composed: MappingData = {};
    for (const dep of this.getViewDependencies(viewName)) {
      const depEntry = this.views.get(dep);
      if (!depEntry) {
        logger.debug(`View '${viewName}' depends on unloaded view '${dep}'`);
        continue;
      }
      for (const [key, value] of Object.entries(depEntry.data)) {
        if (!Object.hasOwn(composed, key)) {
          setOwn(composed, key, value);
        }
      }
    }
    for (const [key, value] of Object.entries(entry.data)) {
      setOwn(composed, key, value);
    }
    return found(composed);
  }
}

/**
 * Load `viewName` and everything it depends on from `loader` into `db`.
 * A name the loader does not own as a concrete view is registered as an
 * aggregate with no data of its own.
 */
export function loadViewWithDependencies(
  loader: DependencyLoader,
  db: DependencyDatabase,
  viewName: string,
  verbose: boolean = false
): void {
  const dependencies = loader.getViewDependencies(viewName);
  for (const dep of dependencies) {
    loader.loadView(dep, db, verbose);
  }
  if (loader.getLoadableViews().includes(viewName)) {
    loader.loadView(viewName, db, verbose);
  } else if (!db.isLoaded(viewName)) {
    db.setViewData(viewName, {}, dependencies, viewName);
  }
}

/**
 * Load the aggregate view and every view it depends on
 */
export function loadAllViews(loader: DependencyLoader, db: DependencyDatabase, verbose: boolean = false): void {
  loadViewWithDependencies(loader, db, ALL_VIEW_KEY, verbose);
}
