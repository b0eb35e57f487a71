/**
 * Platform detection shim.
 *
 * Only enough to derive matching tags: OS name and codename from
 * /etc/os-release, and the release (distro) codename from the environment.
 */

import { platform } from 'os';
import { ENV_VARS } from '../../constants/index.js';
import { readTextFileIfExists } from '../../utils/fs.js';

export interface PlatformInfo {
  /** Release codename the mapping data is keyed by, e.g. "humble" */
  distroCodename?: string;
  /** OS identifier, e.g. "ubuntu" */
  osName?: string;
  osVersion?: string;
  /** OS codename, e.g. "jammy" */
  osCodename?: string;
}

export interface PlatformDetector {
  detect(): Promise<PlatformInfo>;
}

/**
 * Parse the KEY=value lines of an os-release file
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq);
    let value = line.slice(eq + 1);
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    fields[key] = value;
  }
  return fields;
}

export function createOsReleaseDetector(
  osReleasePath: string = '/etc/os-release',
  env: NodeJS.ProcessEnv = process.env
): PlatformDetector {
  return {
    async detect(): Promise<PlatformInfo> {
      const distroCodename = env[ENV_VARS.DISTRO] || undefined;
      const content = await readTextFileIfExists(osReleasePath);
      if (content === null) {
        return { distroCodename, osName: platform() };
      }
      const fields = parseOsRelease(content);
      return {
        distroCodename,
        osName: fields.ID || platform(),
        osVersion: fields.VERSION_ID || undefined,
        osCodename: fields.VERSION_CODENAME || fields.UBUNTU_CODENAME || undefined
      };
    }
  };
}
