/**
 * Source install pipeline.
 *
 *   not-started -> presence-checked -> already-installed
 *                                   -> fetching -> verifying -> extracting
 *                                      -> executing -> cleanup -> done
 *   any state -> (cleanup) -> failed
 *
 * The working directory is removed on every exit path.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import * as tar from 'tar';

import { FILE_PATTERNS, SOURCE_INSTALLER } from '../../constants/index.js';
import { ErrorCodes } from '../../types/index.js';
import type { Downloader } from '../../utils/download.js';
import { InstallFailedError, errorMessage } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { computeFileMd5 } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import type { ScriptRunner } from '../../utils/script-runner.js';
import { emitProgress, type ProgressPort, type SourceInstallState } from '../ports/progress.js';
import { resolveProgress } from '../ports/resolve.js';
import { downloadRdmanifest, loadRdmanifest, ResolvedSourceInstall } from './rdmanifest.js';

export interface SourceInstallOptions {
  downloader: Downloader;
  scriptRunner: ScriptRunner;
  progress?: ProgressPort;
  /** Parent directory for the per-install working directory */
  tempRoot?: string;
}

export type SourceInstallOutcome = 'installed' | 'already-installed';

interface FetchedArtifact {
  path: string;
  /** Set when the download failed; the checksum step decides what that means */
  error?: string;
}

/**
 * Local file name for a downloaded artifact: the last path segment of its URL
 */
export function artifactFileName(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // not a URL, treat as a path
  }
  const segment = basename(pathname);
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // malformed escape, keep the segment as written
  }
  const name = basename(decoded);
  return name && name !== '/' ? name : 'artifact';
}

/**
 * Runs the unit's presence check. An empty check script never reports the
 * unit as installed.
 */
export async function isSourceInstalled(resolved: ResolvedSourceInstall, scriptRunner: ScriptRunner): Promise<boolean> {
  if (!resolved.checkPresenceScript.trim()) {
    return false;
  }
  const result = await scriptRunner.run(resolved.checkPresenceScript);
  return result.success;
}

async function fetchArtifact(downloader: Downloader, url: string, workDir: string): Promise<FetchedArtifact> {
  const path = join(workDir, artifactFileName(url));
  try {
    await writeFile(path, await downloader.download(url));
    return { path };
  } catch (error) {
    logger.debug(`Download of ${url} failed`, { error });
    return { path, error: errorMessage(error) };
  }
}

async function digestOf(artifact: FetchedArtifact): Promise<string> {
  if (artifact.error !== undefined || !(await exists(artifact.path))) {
    return `<download failed: ${artifact.error ?? 'no file'}>`;
  }
  return computeFileMd5(artifact.path);
}

/**
 * Verify the primary artifact against the declared md5sum, falling back to
 * the alternate location on mismatch. Returns the artifact to use.
 */
async function verifyArtifact(
  resolved: ResolvedSourceInstall,
  primary: FetchedArtifact,
  downloader: Downloader,
  workDir: string
): Promise<FetchedArtifact> {
  const expected = resolved.tarballMd5sum;
  if (!expected) {
    logger.debug('No md5sum defined for tarball, not checking.');
    return primary;
  }

  logger.debug('checking md5sum on tarball');
  const hash1 = await digestOf(primary);
  if (hash1 === expected) {
    return primary;
  }

  if (!resolved.alternateTarball) {
    throw new InstallFailedError(
      SOURCE_INSTALLER,
      `md5sum check on ${resolved.tarball} failed.  Expected ${expected} got ${hash1}`,
      ErrorCodes.INSTALL_FAILED,
      { expected, actual: [hash1] }
    );
  }

  const alternate = await fetchArtifact(downloader, resolved.alternateTarball, workDir);
  const hash2 = await digestOf(alternate);
  if (hash2 !== expected) {
    throw new InstallFailedError(
      SOURCE_INSTALLER,
      `md5sum check on ${resolved.tarball} and ${resolved.alternateTarball} failed.  Expected ${expected} got ${hash1} and ${hash2}`,
      ErrorCodes.INSTALL_FAILED,
      { expected, actual: [hash1, hash2] }
    );
  }
  return alternate;
}

async function extractArtifact(resolved: ResolvedSourceInstall, artifact: FetchedArtifact, workDir: string): Promise<void> {
  // disk images are handed to the install script as-is
  if (artifact.path.endsWith(FILE_PATTERNS.DMG_EXT)) {
    logger.debug('Bypassing tarball extraction as it is a dmg');
    return;
  }
  logger.debug('Extracting tarball');
  try {
    await tar.x({ file: artifact.path, cwd: workDir });
  } catch (error) {
    const fetchDetail = artifact.error ? ` (download failed: ${artifact.error})` : '';
    throw new InstallFailedError(
      SOURCE_INSTALLER,
      `failed to extract ${resolved.tarball}: ${errorMessage(error)}${fetchDetail}`
    );
  }
}

async function runInstallSteps(
  resolved: ResolvedSourceInstall,
  options: SourceInstallOptions,
  workDir: string,
  transition: (state: SourceInstallState, detail?: string) => void
): Promise<void> {
  transition('fetching', resolved.tarball);
  logger.debug(`Fetching tarball ${resolved.tarball}`);
  const primary = await fetchArtifact(options.downloader, resolved.tarball, workDir);

  transition('verifying');
  const artifact = await verifyArtifact(resolved, primary, options.downloader, workDir);

  transition('extracting');
  await extractArtifact(resolved, artifact, workDir);

  transition('executing');
  logger.debug('Running installation script');
  const result = await options.scriptRunner.run(resolved.installScript, join(workDir, resolved.execPath));
  if (!result.success) {
    throw new InstallFailedError(
      SOURCE_INSTALLER,
      `installation script returned with error code ${result.exitCode ?? 'unknown'}`,
      ErrorCodes.INSTALL_SCRIPT_FAILED,
      { exitCode: result.exitCode, output: result.output }
    );
  }
  logger.debug('successfully executed script');
}

/**
 * Install one resolved unit.
 *
 * @throws InstallFailedError on checksum mismatch, extraction failure or a
 *   failing install script
 */
export async function installSource(
  resolved: ResolvedSourceInstall,
  options: SourceInstallOptions
): Promise<SourceInstallOutcome> {
  const progress = resolveProgress(options);
  const manifest = resolved.manifestUrl;
  const transition = (state: SourceInstallState, detail?: string): void => {
    emitProgress(progress, { type: 'install:state', manifest, state, detail });
  };

  emitProgress(progress, { type: 'install:start', manifest });
  transition('not-started');

  let installed: boolean;
  try {
    installed = await isSourceInstalled(resolved, options.scriptRunner);
  } catch (error) {
    transition('failed', errorMessage(error));
    throw error;
  }
  transition('presence-checked');
  if (installed) {
    transition('already-installed');
    emitProgress(progress, { type: 'install:complete', manifest, success: true, alreadyInstalled: true });
    return 'already-installed';
  }

  const workDir = await mkdtemp(join(options.tempRoot ?? tmpdir(), 'depsource-install-'));
  try {
    try {
      await runInstallSteps(resolved, options, workDir, transition);
    } finally {
      logger.debug(`cleaning up tmpdir [${workDir}]`);
      await rm(workDir, { recursive: true, force: true });
      transition('cleanup');
    }
  } catch (error) {
    transition('failed', errorMessage(error));
    emitProgress(progress, { type: 'install:complete', manifest, success: false, alreadyInstalled: false });
    throw error;
  }

  transition('done');
  emitProgress(progress, { type: 'install:complete', manifest, success: true, alreadyInstalled: false });
  return 'installed';
}

/**
 * Install from an rdmanifest file on disk
 */
export async function installFromFile(manifestPath: string, options: SourceInstallOptions): Promise<SourceInstallOutcome> {
  const manifest = loadRdmanifest(await readTextFile(manifestPath));
  return installSource(ResolvedSourceInstall.fromManifest(manifest, manifestPath), options);
}

/**
 * Install from an rdmanifest URL
 */
export async function installFromUrl(manifestUrl: string, options: SourceInstallOptions): Promise<SourceInstallOutcome> {
  const { manifest, downloadUrl } = await downloadRdmanifest(options.downloader, manifestUrl);
  return installSource(ResolvedSourceInstall.fromManifest(manifest, downloadUrl), options);
}
