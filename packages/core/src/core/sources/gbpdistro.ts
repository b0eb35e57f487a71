/**
 * gbpdistro support.
 *
 * A gbpdistro file lists the release repositories of one release:
 *
 * ```yaml
 * release-name: humble
 * repositories:
 *   navigation:
 *     url: https://example.org/navigation-release.git
 *     target: all            # or an explicit list of OS codenames
 * ```
 *
 * Each repository becomes a dependency key resolving to the released apt
 * package on every targeted codename. `target: all` expands to the
 * codenames the targets document lists for the release.
 */

import * as yaml from 'js-yaml';
import type { MappingData } from '../../types/index.js';
import { downloadText, type Downloader } from '../../utils/download.js';
import { InvalidDataError, errorMessage } from '../../utils/errors.js';
import { isMappingData } from './sources-cache.js';

const TARGET_OS = 'ubuntu';

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Targets documents map release names to OS codenames, either as a
 * dictionary or as a list of single-key dictionaries.
 */
export function parseTargets(targets: unknown): Map<string, string[]> {
  const entries: Array<[string, unknown]> = [];
  if (Array.isArray(targets)) {
    for (const item of targets) {
      if (!isMappingData(item)) {
        throw new InvalidDataError('targets list entries must be dictionaries');
      }
      entries.push(...Object.entries(item));
    }
  } else if (isMappingData(targets)) {
    entries.push(...Object.entries(targets));
  } else {
    throw new InvalidDataError('targets data must be a list or a dictionary');
  }

  const result = new Map<string, string[]>();
  for (const [release, codenames] of entries) {
    if (!isStringList(codenames)) {
      throw new InvalidDataError(`targets for release '${release}' must be a list of codenames`);
    }
    result.set(release, codenames);
  }
  return result;
}

export function releasePackageName(release: string, repository: string): string {
  return `ros-${release}-${repository.replaceAll('_', '-')}`;
}

export function gbpdistroToMappingData(gbpdistro: unknown, targets: unknown, url: string = '<string>'): MappingData {
  if (!isMappingData(gbpdistro)) {
    throw new InvalidDataError(`gbpdistro data from [${url}] is not a dictionary`);
  }
  const release = gbpdistro['release-name'];
  if (typeof release !== 'string' || release.length === 0) {
    throw new InvalidDataError(`gbpdistro data from [${url}] is missing 'release-name'`);
  }
  const repositories = gbpdistro.repositories;
  if (!isMappingData(repositories)) {
    throw new InvalidDataError(`gbpdistro data from [${url}] is missing a 'repositories' dictionary`);
  }

  const releaseTargets = parseTargets(targets).get(release);
  if (!releaseTargets) {
    throw new InvalidDataError(`release '${release}' from [${url}] is not listed in the targets data`);
  }

  const mapping: MappingData = {};
  for (const [name, repo] of Object.entries(repositories)) {
    if (!isMappingData(repo) || typeof repo.url !== 'string') {
      throw new InvalidDataError(`repository '${name}' in [${url}] has no url`);
    }
    let codenames: string[];
    if (repo.target === undefined || repo.target === 'all') {
      codenames = releaseTargets;
    } else if (isStringList(repo.target)) {
      codenames = repo.target;
    } else {
      throw new InvalidDataError(`repository '${name}' in [${url}] has an invalid target`);
    }

    const byCodename: MappingData = {};
    for (const codename of codenames) {
      byCodename[codename] = { apt: { packages: [releasePackageName(release, name)] } };
    }
    mapping[name] = { _is_ros: true, [TARGET_OS]: byCodename };
  }
  return mapping;
}

async function downloadYaml(downloader: Downloader, url: string): Promise<unknown> {
  const text = await downloadText(downloader, url);
  try {
    return yaml.load(text);
  } catch (error) {
    throw new InvalidDataError(`Invalid YAML from [${url}]: ${errorMessage(error)}`, { url });
  }
}

/**
 * Download a gbpdistro file plus the targets document and convert both into
 * a dependency-mapping document.
 */
export async function downloadGbpdistroAsMappingData(
  downloader: Downloader,
  url: string,
  targetsUrl: string
): Promise<MappingData> {
  const [gbpdistro, targets] = await Promise.all([
    downloadYaml(downloader, url),
    downloadYaml(downloader, targetsUrl)
  ]);
  return gbpdistroToMappingData(gbpdistro, targets, url);
}
