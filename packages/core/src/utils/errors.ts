import { DepsourceError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error taxonomy shared by the sources layer and the source installer.
 *
 * InvalidData and DownloadFailure are fatal to a single operation; the
 * update batch isolates them per source. ResourceNotFound means "ask
 * another loader".
 */

export class InvalidDataError extends DepsourceError {
  constructor(message: string, details?: Record<string, unknown>) {
    const origin = typeof details?.origin === 'string' ? details.origin : undefined;
    super(origin ? `${origin}: ${message}` : message, ErrorCodes.INVALID_DATA, details);
    this.name = 'InvalidDataError';
  }
}

export class DownloadFailureError extends DepsourceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.DOWNLOAD_FAILURE, details);
    this.name = 'DownloadFailureError';
  }
}

export class InstallFailedError extends DepsourceError {
  public readonly installer: string;

  constructor(installer: string, message: string, code: string = ErrorCodes.INSTALL_FAILED, details?: Record<string, unknown>) {
    super(`${installer}: ${message}`, code, { installer, ...details });
    this.name = 'InstallFailedError';
    this.installer = installer;
  }
}

export class ResourceNotFoundError extends DepsourceError {
  constructor(resourceName: string) {
    super(`Resource '${resourceName}' not found`, ErrorCodes.RESOURCE_NOT_FOUND, { resourceName });
    this.name = 'ResourceNotFoundError';
  }
}

export class FileSystemError extends DepsourceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends DepsourceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DepsourceError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}
