/**
 * Custom Error Classes for FutureProof
 *
 * Standardized error handling across the sync layer.
 */

import type { ClassifiedError, CloudResult } from '@/types/sync';

export class FutureProofError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true
  ) {
    super(message);
    this.name = 'FutureProofError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StorageError extends FutureProofError {
  constructor(message: string, recoverable: boolean = true) {
    super(message, 'STORAGE_ERROR', recoverable);
    this.name = 'StorageError';
  }
}

export class BackupValidationError extends FutureProofError {
  constructor(message: string) {
    super(message, 'BACKUP_VALIDATION_ERROR', false);
    this.name = 'BackupValidationError';
  }
}

export class ConfigError extends FutureProofError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}

/**
 * A cloud drive failure that has already been classified.
 */
export class CloudDriveError extends FutureProofError {
  constructor(public classified: ClassifiedError) {
    super(
      classified.message,
      `CLOUD_${classified.kind.toUpperCase()}`,
      classified.retryable
    );
    this.name = 'CloudDriveError';
  }
}

/**
 * Returns the data of a successful result, throws CloudDriveError otherwise.
 */
export function unwrapCloudResult<T>(result: CloudResult<T>): T {
  if (!result.success) {
    throw new CloudDriveError(result.error);
  }
  return result.data;
}

/**
 * True for a filesystem error that means the path does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Handles errors in a standardized way
 */
export function handleError(error: unknown): string {
  if (error instanceof FutureProofError) {
    return error.message;
  }

  if (error instanceof Error) {
    console.error('Unknown error:', error);
    return 'Something went wrong. Please try again.';
  }

  console.error('Unknown error:', error);
  return 'An unexpected error occurred.';
}
