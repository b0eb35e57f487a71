import type { ProgressPort } from './progress.js';
import { silentProgress } from './console-progress.js';

/**
 * Progress port of an update or install call. Callers that pass none get
 * no events.
 */
export function resolveProgress(options?: { progress?: ProgressPort }): ProgressPort {
  return options?.progress ?? silentProgress;
}
