/**
 * Sources list parsing.
 *
 * Format, one source per line (tags optional):
 *
 *   # comments and empty lines allowed
 *   <type> <url> [tag...]
 *
 * e.g. `yaml http://example.org/base.yaml jammy ubuntu`. When tags are
 * present, all of them must match the current platform for the source
 * to be used.
 */

import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, listFiles, readTextFile } from '../../utils/fs.js';
import { InvalidDataError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DataSource } from './data-source.js';

/**
 * Parse sources list text into data sources, in line order
 */
export function parseSourcesData(data: string, origin: string = '<string>'): DataSource[] {
  const sources: DataSource[] = [];

  for (const rawLine of data.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    const splits = line.split(/\s+/);
    if (splits.length < 2) {
      throw new InvalidDataError(`invalid line:\n${line}`, { origin, line });
    }
    const [kind, url, ...tags] = splits;
    try {
      sources.push(new DataSource(kind, url, tags, origin));
    } catch (error) {
      if (error instanceof InvalidDataError) {
        throw new InvalidDataError(`line:\n\t${line}\n${error.message}`, { origin, line });
      }
      throw error;
    }
  }
  return sources;
}

/**
 * Parse a sources list file on disk. I/O errors surface as InvalidDataError.
 */
export async function parseSourcesFile(filePath: string): Promise<DataSource[]> {
  let content: string;
  try {
    content = await readTextFile(filePath);
  } catch (error) {
    throw new InvalidDataError(`I/O error reading sources file: ${errorMessage(error)}`, { origin: filePath });
  }
  return parseSourcesData(content, filePath);
}

/**
 * Parse every `*.list` file in `sourcesListDir`, in sorted filename order.
 * A missing directory is a valid state with no sources.
 */
export async function parseSourcesList(sourcesListDir: string): Promise<DataSource[]> {
  if (!(await exists(sourcesListDir))) {
    logger.debug(`No sources list directory at ${sourcesListDir}`);
    return [];
  }

  const listFileNames = (await listFiles(sourcesListDir))
    .filter(name => name.endsWith(FILE_PATTERNS.SOURCES_LIST_EXT))
    .sort();

  const sources: DataSource[] = [];
  for (const name of listFileNames) {
    sources.push(...(await parseSourcesFile(join(sourcesListDir, name))));
  }
  return sources;
}
