/**
 * Pre-flight checks run before a blob is handed to the transport.
 *
 * Every failure here is non-retryable and short-circuits the network call.
 */

import { createClassifiedError } from './error-classifier';
import type { ClassifiedError } from '@/types/sync';

const VALID_FILE_NAME = /^[A-Za-z0-9_-]{1,255}$/;

/**
 * Alphanumerics, underscore and hyphen only; 1-255 characters.
 */
export function isValidFileName(fileName: string): boolean {
  return VALID_FILE_NAME.test(fileName);
}

/**
 * Returns the classified failure for a bad name, or null when it is valid.
 */
export function checkFileName(fileName: string): ClassifiedError | null {
  if (isValidFileName(fileName)) {
    return null;
  }
  return createClassifiedError('invalidFileName', {
    technicalDetails: `Rejected file name "${fileName.slice(0, 64)}" (length ${fileName.length})`,
  });
}

/**
 * Cheap size check on the element count, before the expensive serialize.
 */
export function checkEstimatedSize(
  transactionCount: number,
  minTransactionBytes: number,
  maxDataSizeBytes: number
): ClassifiedError | null {
  const estimate = transactionCount * minTransactionBytes;
  if (estimate <= maxDataSizeBytes) {
    return null;
  }
  return createClassifiedError('quotaExceeded', {
    technicalDetails: `Estimated ${estimate} bytes for ${transactionCount} transactions exceeds ${maxDataSizeBytes}`,
  });
}

/**
 * Exact check on the serialized payload: non-empty and within the ceiling.
 */
export function checkPayload(
  payload: string,
  maxDataSizeBytes: number
): ClassifiedError | null {
  if (payload.trim().length === 0) {
    return createClassifiedError('unknown', {
      title: 'Nothing To Back Up',
      message: 'Cannot save empty backup data.',
      retryable: false,
    });
  }

  const size = Buffer.byteLength(payload, 'utf8');
  if (size > maxDataSizeBytes) {
    return createClassifiedError('quotaExceeded', {
      technicalDetails: `Payload of ${size} bytes exceeds ${maxDataSizeBytes}`,
    });
  }

  return null;
}
