/**
 * Hash Utilities Module
 * Digests used for cache keys and artifact verification
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/**
 * SHA-1 hex digest of a string. Used to name cache entries after their URL.
 */
export function computeSha1(value: string): string {
  return createHash('sha1').update(value, 'utf8').digest('hex');
}

/**
 * MD5 hex digest of an in-memory buffer or string
 */
export function computeMd5(content: string | Uint8Array): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * MD5 hex digest of a file, streamed in chunks
 */
export function computeFileMd5(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    const stream = createReadStream(filePath);
    stream.on('error', reject);
    stream.on('data', chunk => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}
