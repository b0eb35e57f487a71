import { promises as fs, constants as fsConstants } from 'fs';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { parse as parseJsonc, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a file as text, or null when it does not exist
 */
export async function readTextFileIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Write text to a sibling temp file, then rename it over `path`.
 * Readers see either the old content or the new content.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
  await ensureDir(dir);
  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile())
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Read a JSON or JSONC file and parse it.
 * The caller validates the shape.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, errors });
  }
  return result;
}
