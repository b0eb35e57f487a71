import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { downloadText, type Downloader } from '../../utils/download.js';
import { ConfigError, InvalidDataError } from '../../utils/errors.js';
import { exists, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { parseSourcesData } from './sources-list.js';

/**
 * Download the default sources list and check that it parses.
 */
export async function downloadDefaultSourcesList(downloader: Downloader, url: string): Promise<string> {
  const data = await downloadText(downloader, url);
  if (!data.trim()) {
    throw new InvalidDataError('cannot download defaults file: empty contents', { url });
  }
  parseSourcesData(data, url);
  return data;
}

/**
 * Write the default sources list into `sourcesListDir`.
 * An existing default list is never overwritten.
 *
 * @returns path of the written file
 */
export async function initSourcesList(downloader: Downloader, sourcesListDir: string, url: string): Promise<string> {
  const target = join(sourcesListDir, FILE_PATTERNS.DEFAULT_SOURCES_LIST);
  if (await exists(target)) {
    throw new ConfigError(`default sources list file already exists:\n\t${target}\nPlease delete it if you wish to re-initialize`, { target });
  }

  const data = await downloadDefaultSourcesList(downloader, url);
  await writeTextFile(target, data);
  logger.debug(`Wrote default sources list to ${target}`, { url });
  return target;
}
