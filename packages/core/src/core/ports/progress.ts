/**
 * Progress Port Interface
 *
 * Defines the contract for streaming progress events from core pipelines
 * to any UI frontend. Core logic emits typed progress events; the UI
 * subscribes and renders them appropriately.
 *
 * Implementations: consoleProgress (default/CI), silentProgress, and the
 * CLI's clack adapter.
 */

// ============================================================================
// Progress Event Types
// ============================================================================

/** Base event shape -- all events carry a type discriminant and timestamp. */
export interface ProgressEventBase {
  /** ISO 8601 timestamp of when the event was emitted. */
  timestamp: string;
}

/** Sources update progress events. */
export type UpdateProgressEvent =
  | { type: 'update:start'; sources: string[] }
  | { type: 'update:source'; url: string; status: 'fetching' | 'updated' | 'failed'; detail?: string }
  | { type: 'update:complete'; summary: { updated: number; failed: number } };

/** States of a single source install. */
export type SourceInstallState =
  | 'not-started'
  | 'presence-checked'
  | 'already-installed'
  | 'fetching'
  | 'verifying'
  | 'extracting'
  | 'executing'
  | 'cleanup'
  | 'done'
  | 'failed';

/** Source install pipeline progress events. */
export type InstallProgressEvent =
  | { type: 'install:start'; manifest: string }
  | { type: 'install:state'; manifest: string; state: SourceInstallState; detail?: string }
  | { type: 'install:complete'; manifest: string; success: boolean; alreadyInstalled: boolean };

/** Union of all progress event types. */
export type ProgressEvent = ProgressEventBase & (
  | UpdateProgressEvent
  | InstallProgressEvent
);

/** Distributes over the union so callers can omit the timestamp. */
export type ProgressEventInput = UpdateProgressEvent | InstallProgressEvent;

// ============================================================================
// ProgressPort Interface
// ============================================================================

export interface ProgressPort {
  /**
   * Emit a typed progress event.
   * Events are fire-and-forget -- the core pipeline does not wait
   * for the UI to process them.
   */
  emit(event: ProgressEvent): void;
}

/**
 * Stamp an event with the current time and emit it
 */
export function emitProgress(port: ProgressPort, event: ProgressEventInput): void {
  port.emit({ ...event, timestamp: new Date().toISOString() });
}
