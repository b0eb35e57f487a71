/**
 * Core Ports
 *
 * Re-exports port interfaces and default implementations. Ports define the
 * boundary between core logic and terminal/UI concerns.
 */

export type {
  ProgressPort,
  ProgressEvent,
  ProgressEventInput,
  ProgressEventBase,
  UpdateProgressEvent,
  InstallProgressEvent,
  SourceInstallState,
} from './progress.js';
export { emitProgress } from './progress.js';
export { consoleProgress, silentProgress } from './console-progress.js';
export { resolveProgress } from './resolve.js';
