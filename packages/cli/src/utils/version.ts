import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * Version from the CLI package manifest
 */
export function getVersion(): string {
  const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}
