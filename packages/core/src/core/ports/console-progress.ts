/**
 * Console Progress Adapter (Default/CI)
 *
 * Plain console-based implementation of ProgressPort.
 * In CI/CD: logs structured events as single-line messages.
 */

import type { ProgressPort, ProgressEvent } from './progress.js';

/**
 * Console-based progress adapter.
 * Logs events as concise single-line messages to stdout/stderr.
 */
export const consoleProgress: ProgressPort = {
  emit(event: ProgressEvent): void {
    switch (event.type) {
      case 'update:start':
        console.log(`[progress] Updating ${event.sources.length} source(s)`);
        break;
      case 'update:source':
        if (event.status !== 'fetching') {
          console.log(`[progress] ${event.status === 'updated' ? 'Hit' : 'ERROR'} ${event.url}${event.detail ? ` - ${event.detail}` : ''}`);
        }
        break;
      case 'update:complete':
        console.log(`[progress] Update complete: ${event.summary.updated} updated, ${event.summary.failed} failed`);
        break;

      case 'install:start':
        console.log(`[progress] Installing from ${event.manifest}`);
        break;
      case 'install:state':
        if (event.state === 'failed') {
          console.log(`[progress] ${event.manifest}: failed${event.detail ? ` - ${event.detail}` : ''}`);
        }
        break;
      case 'install:complete':
        console.log(`[progress] ${event.manifest}: ${event.alreadyInstalled ? 'already installed' : event.success ? 'installed' : 'failed'}`);
        break;
    }
  },
};

/**
 * Silent progress adapter. Discards all events.
 */
export const silentProgress: ProgressPort = {
  emit(_event: ProgressEvent): void {
    // No-op
  },
};
