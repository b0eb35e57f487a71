/**
 * rdmanifest: the recipe for installing one dependency from source.
 *
 * ```yaml
 * uri: https://example.org/foo-1.0.tar.gz
 * alternate-uri: https://mirror.example.org/foo-1.0.tar.gz
 * md5sum: 0123456789abcdef0123456789abcdef
 * exec-path: foo-1.0
 * check-presence-script: test -f /usr/local/lib/libfoo.so
 * install-script: ./configure && make && make install
 * depends: [bar]
 * ```
 */

import * as yaml from 'js-yaml';
import { DepsourceError, ErrorCodes } from '../../types/index.js';
import { downloadText, type Downloader } from '../../utils/download.js';
import { DownloadFailureError, errorMessage } from '../../utils/errors.js';
import { computeMd5 } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';

export class InvalidRdmanifestError extends DepsourceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_MANIFEST, details);
    this.name = 'InvalidRdmanifestError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(manifest: Record<string, unknown>, key: string): string | undefined {
  const value = manifest[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidRdmanifestError(`'${key}' must be a string`);
  }
  return value;
}

function readDependsList(value: unknown, where: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidRdmanifestError(`'depends' in ${where} must be a list of dependency names`);
  }
  return value;
}

export class ResolvedSourceInstall {
  /** Where the manifest was loaded from (URL or file path) */
  manifestUrl: string;
  installScript = '';
  checkPresenceScript = '';
  execPath = '.';
  tarball = '';
  alternateTarball?: string;
  tarballMd5sum?: string;
  dependencies: string[] = [];

  private constructor(manifestUrl: string) {
    this.manifestUrl = manifestUrl;
  }

  static fromManifest(manifest: unknown, manifestUrl: string): ResolvedSourceInstall {
    if (!isRecord(manifest)) {
      throw new InvalidRdmanifestError(`rdmanifest from ${manifestUrl} is not a dictionary`);
    }
    logger.debug(`Loading manifest from ${manifestUrl}`, manifest);

    const tarball = optionalString(manifest, 'uri');
    if (!tarball) {
      throw new InvalidRdmanifestError('uri required for source dependencies', { manifestUrl });
    }

    const resolved = new ResolvedSourceInstall(manifestUrl);
    resolved.tarball = tarball;
    resolved.installScript = optionalString(manifest, 'install-script') ?? '';
    resolved.checkPresenceScript = optionalString(manifest, 'check-presence-script') ?? '';
    resolved.execPath = optionalString(manifest, 'exec-path') ?? '.';
    resolved.alternateTarball = optionalString(manifest, 'alternate-uri');
    resolved.tarballMd5sum = optionalString(manifest, 'md5sum');
    resolved.dependencies = readDependsList(manifest.depends, manifestUrl);
    return resolved;
  }

  toString(): string {
    return `source: ${this.manifestUrl}`;
  }
}

export function loadRdmanifest(contents: string): unknown {
  try {
    return yaml.load(contents);
  } catch (error) {
    throw new InvalidRdmanifestError(`Failed to parse yaml in ${contents}:  Error: ${errorMessage(error)}`);
  }
}

export type FetchFileResult =
  | { ok: true; contents: string }
  | { ok: false; error: string };

/**
 * Download a text file, optionally checking its md5sum. Failures are
 * returned rather than thrown so the caller can fall back to a mirror.
 */
export async function fetchFile(downloader: Downloader, url: string, md5sum?: string): Promise<FetchFileResult> {
  try {
    const contents = await downloadText(downloader, url);
    if (md5sum) {
      const actual = computeMd5(contents);
      if (actual !== md5sum) {
        return { ok: false, error: `md5sum didn't match for ${url}.  Expected ${md5sum} got ${actual}` };
      }
    }
    if (!contents) {
      return { ok: false, error: `empty response from ${url}` };
    }
    return { ok: true, contents };
  } catch (error) {
    logger.debug(`Download of file ${url} failed`, { error });
    return { ok: false, error: errorMessage(error) };
  }
}

export interface DownloadedRdmanifest {
  manifest: unknown;
  /** Either the primary URL or the mirror, whichever produced the contents */
  downloadUrl: string;
}

/**
 * Fetch an rdmanifest from `url`, falling back to `altUrl`.
 *
 * @throws DownloadFailureError naming every location tried
 * @throws InvalidRdmanifestError when the contents are not valid YAML
 */
export async function downloadRdmanifest(
  downloader: Downloader,
  url: string,
  md5sum?: string,
  altUrl?: string
): Promise<DownloadedRdmanifest> {
  let downloadUrl = url;
  let errorPrefix = `Failed to load a rdmanifest from ${url}: `;
  let result = await fetchFile(downloader, downloadUrl, md5sum);

  if (!result.ok && altUrl) {
    errorPrefix = `Failed to load a rdmanifest from either ${url} or ${altUrl}: `;
    downloadUrl = altUrl;
    result = await fetchFile(downloader, downloadUrl, md5sum);
  }
  if (!result.ok) {
    throw new DownloadFailureError(errorPrefix + result.error, { url, altUrl });
  }
  return { manifest: loadRdmanifest(result.contents), downloadUrl };
}
