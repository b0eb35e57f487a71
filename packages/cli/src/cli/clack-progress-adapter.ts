/**
 * Clack Progress Adapter
 *
 * CLI-specific ProgressPort implementation that routes structured
 * progress events to @clack/prompts log output for terminal display.
 */

import { log } from '@clack/prompts';
import type { ProgressPort, ProgressEvent } from '@depsource/core/core/ports/progress.js';

/**
 * Create a Clack-based ProgressPort for interactive terminal sessions.
 *
 * Failed events are highlighted; success events are concise.
 */
export function createClackProgress(): ProgressPort {
  return {
    emit(event: ProgressEvent): void {
      switch (event.type) {
        case 'update:start':
          log.step(`Updating ${event.sources.length} source(s)`);
          break;
        case 'update:source':
          if (event.status === 'updated') {
            log.info(`Hit ${event.url}`);
          } else if (event.status === 'failed') {
            log.warn(`ERROR: unable to process source [${event.url}]${event.detail ? `:\n\t${event.detail}` : ''}`);
          }
          break;
        case 'update:complete': {
          const { updated, failed } = event.summary;
          if (failed > 0) {
            log.warn(`Update complete: ${updated} updated, ${failed} failed`);
          } else {
            log.info(`Update complete: ${updated} updated`);
          }
          break;
        }

        case 'install:start':
          log.step(`Installing from ${event.manifest}`);
          break;
        case 'install:state':
          if (event.state === 'failed') {
            log.warn(`Install failed${event.detail ? `: ${event.detail}` : ''}`);
          } else if (event.state === 'fetching' || event.state === 'executing') {
            log.message(`${event.state}${event.detail ? ` ${event.detail}` : ''}`);
          }
          break;
        case 'install:complete':
          if (event.alreadyInstalled) {
            log.info(`${event.manifest} is already installed`);
          } else if (event.success) {
            log.success(`Installed ${event.manifest}`);
          }
          break;
      }
    },
  };
}
