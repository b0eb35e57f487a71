import type { DepsourceConfig } from '../../types/index.js';
import type { Tagged } from './data-source.js';
import { createOsReleaseDetector, type PlatformDetector, type PlatformInfo } from '../platform/platform-detector.js';

/**
 * Decides whether a data source applies to the current platform: every tag
 * of the source must be among the matcher's tags.
 */
export class DataSourceMatcher {
  readonly tags: readonly string[];

  constructor(tags: readonly string[]) {
    this.tags = [...tags];
  }

  matches(source: Tagged): boolean {
    const own = new Set(this.tags);
    return source.tags.every(tag => own.has(tag));
  }

  /**
   * Tags for a detected platform: distro codename, OS name, OS codename,
   * skipping whatever is unknown.
   */
  static tagsFor(info: PlatformInfo): string[] {
    return [info.distroCodename, info.osName, info.osCodename]
      .filter((tag): tag is string => typeof tag === 'string' && tag.length > 0);
  }

  static async createDefault(detector: PlatformDetector = createOsReleaseDetector()): Promise<DataSourceMatcher> {
    return new DataSourceMatcher(DataSourceMatcher.tagsFor(await detector.detect()));
  }

  /**
   * Configured `platformTags` win over detection
   */
  static async fromConfig(config: DepsourceConfig, detector?: PlatformDetector): Promise<DataSourceMatcher> {
    if (config.platformTags) {
      return new DataSourceMatcher(config.platformTags);
    }
    return DataSourceMatcher.createDefault(detector);
  }
}
