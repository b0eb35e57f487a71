/**
 * Installer for dependencies that are built from source, as described by an
 * rdmanifest. Resolution downloads and parses the manifest; installation is
 * delegated to the install pipeline.
 */

import { SOURCE_INSTALL_COMMAND } from '../../constants/index.js';
import type { Downloader } from '../../utils/download.js';
import { DownloadFailureError, InvalidDataError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ScriptRunner } from '../../utils/script-runner.js';
import type { ProgressPort } from '../ports/progress.js';
import {
  installFromFile,
  installFromUrl,
  installSource,
  isSourceInstalled,
  type SourceInstallOutcome
} from './install-pipeline.js';
import { downloadRdmanifest, InvalidRdmanifestError, ResolvedSourceInstall } from './rdmanifest.js';

export interface SourceInstallerOptions {
  downloader: Downloader;
  scriptRunner: ScriptRunner;
  progress?: ProgressPort;
  tempRoot?: string;
}

export interface InstallCommandOptions {
  /** Install even when the presence check passes */
  reinstall?: boolean;
}

function optionalArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidDataError(`'${key}' must be a string for source dependencies`, { key });
  }
  return value;
}

function dependsArg(args: Record<string, unknown>): string[] {
  const value = args.depends;
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidDataError("'depends' must be a list of dependency names for source dependencies", { key: 'depends' });
  }
  return value;
}

export class SourceInstaller {
  private readonly options: SourceInstallerOptions;
  /** Resolved manifests keyed by the URL they were downloaded from */
  private readonly cache = new Map<string, ResolvedSourceInstall>();
  /** Resolutions in flight, so concurrent callers share one download */
  private readonly pending = new Map<string, Promise<ResolvedSourceInstall>>();

  constructor(options: SourceInstallerOptions) {
    this.options = options;
  }

  /**
   * Resolve the installer arguments of a dependency to an install recipe.
   *
   * `args` carries `uri` and optionally `alternate-uri` and `md5sum` for
   * the rdmanifest itself.
   *
   * @throws InvalidDataError when the manifest cannot be fetched or parsed
   */
  async resolve(args: Record<string, unknown>): Promise<ResolvedSourceInstall> {
    const url = optionalArg(args, 'uri');
    if (!url) {
      throw new InvalidDataError("'uri' key required for source dependencies");
    }
    const altUrl = optionalArg(args, 'alternate-uri');
    const md5sum = optionalArg(args, 'md5sum');

    const cached = this.cache.get(url) ?? (altUrl ? this.cache.get(altUrl) : undefined);
    if (cached) {
      return cached;
    }

    const inFlight = this.pending.get(url);
    if (inFlight) {
      return inFlight;
    }
    const resolution = this.download(url, md5sum, altUrl);
    this.pending.set(url, resolution);
    try {
      return await resolution;
    } finally {
      this.pending.delete(url);
    }
  }

  private async download(url: string, md5sum?: string, altUrl?: string): Promise<ResolvedSourceInstall> {
    logger.debug(`Downloading manifest [${url}]`);
    try {
      const { manifest, downloadUrl } = await downloadRdmanifest(this.options.downloader, url, md5sum, altUrl);
      const resolved = ResolvedSourceInstall.fromManifest(manifest, downloadUrl);
      this.cache.set(downloadUrl, resolved);
      return resolved;
    } catch (error) {
      if (error instanceof DownloadFailureError || error instanceof InvalidRdmanifestError) {
        throw new InvalidDataError(`Problem with downloading rdmanifest: ${error.message}`, { url, altUrl, cause: error.code });
      }
      throw error;
    }
  }

  /**
   * Dependencies named by the installer arguments plus those of the
   * resolved manifest. The cached recipe is left untouched.
   */
  async getDependsOn(args: Record<string, unknown>): Promise<string[]> {
    const declared = dependsArg(args);
    const resolved = await this.resolve(args);
    return [...declared, ...resolved.dependencies];
  }

  isInstalled(resolved: ResolvedSourceInstall): Promise<boolean> {
    return isSourceInstalled(resolved, this.options.scriptRunner);
  }

  /**
   * Items from `resolved` that are already present on this machine
   */
  async detect(resolved: readonly ResolvedSourceInstall[]): Promise<ResolvedSourceInstall[]> {
    const present: ResolvedSourceInstall[] = [];
    for (const item of resolved) {
      if (await this.isInstalled(item)) {
        present.push(item);
      }
    }
    return present;
  }

  /**
   * Commands that install the unresolved items, one argv per item
   */
  async getInstallCommand(
    resolved: readonly ResolvedSourceInstall[],
    options: InstallCommandOptions = {}
  ): Promise<string[][]> {
    let pending = [...resolved];
    if (!options.reinstall) {
      const present = new Set(await this.detect(resolved));
      pending = pending.filter(item => !present.has(item));
    }
    return pending.map(item => [SOURCE_INSTALL_COMMAND, 'install', item.manifestUrl]);
  }

  install(resolved: ResolvedSourceInstall): Promise<SourceInstallOutcome> {
    return installSource(resolved, this.options);
  }

  installFromUrl(manifestUrl: string): Promise<SourceInstallOutcome> {
    return installFromUrl(manifestUrl, this.options);
  }

  installFromFile(manifestPath: string): Promise<SourceInstallOutcome> {
    return installFromFile(manifestPath, this.options);
  }
}
