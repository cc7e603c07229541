import { CraftPkgError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure categories of the install pipeline
 */

export class ValidationError extends CraftPkgError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ResourceNotFoundError extends CraftPkgError {
  public readonly item: string;

  constructor(item: string, details?: unknown) {
    super(`Not found: ${item}`, ErrorCodes.RESOURCE_NOT_FOUND, details);
    this.name = 'ResourceNotFoundError';
    this.item = item;
  }
}

export class DownloadError extends CraftPkgError {
  /** Whether repeating the same request may succeed */
  public readonly retryable: boolean;

  constructor(message: string, details?: unknown, retryable: boolean = true) {
    super(`Download failed: ${message}`, ErrorCodes.DOWNLOAD_FAILED, details);
    this.name = 'DownloadError';
    this.retryable = retryable;
  }
}

export class IntegrityError extends DownloadError {
  public readonly expectedHash: string;
  public readonly actualHash: string;

  constructor(fileName: string, expectedHash: string, actualHash: string) {
    super(`checksum mismatch for ${fileName}`, { fileName, expectedHash, actualHash }, false);
    this.name = 'IntegrityError';
    this.expectedHash = expectedHash;
    this.actualHash = actualHash;
  }
}

export class FileSystemError extends CraftPkgError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends CraftPkgError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UnsupportedPackageTypeError extends CraftPkgError {
  constructor(packageType: string, operation: string) {
    super(
      `Cannot ${operation} resources of type '${packageType}'`,
      ErrorCodes.UNSUPPORTED_OPERATION,
      { packageType, operation }
    );
    this.name = 'UnsupportedPackageTypeError';
  }
}

export interface BatchItemFailure {
  id: string;
  error: string;
}

/**
 * Raised when at least one dependency of a batch failed. Items that did
 * succeed stay installed; the failures are listed per item.
 */
export class DependencyBatchError extends CraftPkgError {
  public readonly failures: BatchItemFailure[];
  public readonly succeeded: string[];

  constructor(failures: BatchItemFailure[], succeeded: string[]) {
    super(
      `${failures.length} dependenc${failures.length === 1 ? 'y' : 'ies'} failed to download: ${failures.map(f => f.id).join(', ')}`,
      ErrorCodes.DOWNLOAD_FAILED,
      { failures, succeeded }
    );
    this.name = 'DependencyBatchError';
    this.failures = failures;
    this.succeeded = succeeded;
  }
}

/** A question had to be asked but nobody can answer it */
export class PromptUnavailableError extends CraftPkgError {
  constructor(question: string) {
    super(
      `Cannot ask '${question}' without an interactive terminal; pass the answer as an option instead`,
      ErrorCodes.VALIDATION_ERROR,
      { question }
    );
    this.name = 'PromptUnavailableError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/** Aborted signals reject with a DOMException named AbortError */
export function isAbortError(error: unknown): boolean {
  if (error instanceof UserCancellationError) {
    return true;
  }
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export function describeError(error: unknown): string {
  if (error instanceof CraftPkgError) {
    return error.userMessage;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unknown error occurred';
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof CraftPkgError) {
    logger.error(error.message, { code: error.code, details: error.details, stack: error.stack });
    return {
      success: false,
      error: error.userMessage
    };
  } else if (error instanceof Error) {
    logger.error('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.error('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Cancelled by the user: exit quietly
      if (error instanceof UserCancellationError) {
        process.exit(0);
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
