/**
 * Cloud Error Classifier
 *
 * Maps unstructured transport failures onto the fixed error taxonomy.
 * The transport exposes no structured error codes, so classification is a
 * case-insensitive substring match over the failure's description. Rule
 * order is significant: the first match wins and anything unmatched is
 * treated as a retryable unknown.
 */

import { CloudDriveError } from '@/lib/errors';
import type { ClassifiedError, CloudErrorKind } from '@/types/sync';

// ============================================
// Types
// ============================================

/**
 * Seam for replacing substring matching with a structured-error classifier.
 */
export interface ErrorClassifier {
  classify(rawError: unknown): ClassifiedError;
}

interface ClassificationRule {
  kind: CloudErrorKind;
  needles: readonly string[];
}

// ============================================
// Messages
// ============================================

const ERROR_TEMPLATES: Record<
  CloudErrorKind,
  { title: string; message: string; retryable: boolean }
> = {
  network: {
    title: 'Network Error',
    message:
      'Network connection unavailable. Please check your internet connection.',
    retryable: true,
  },
  notSignedIn: {
    title: 'Cloud Account Not Signed In',
    message: 'Please sign in to your cloud account in your device settings.',
    retryable: false,
  },
  containerUnavailable: {
    title: 'Cloud Drive Unavailable',
    message: 'Cloud drive is not configured. Please check your app settings.',
    retryable: false,
  },
  quotaExceeded: {
    title: 'Data Too Large',
    message:
      'Data is too large for cloud sync. Please reduce the number of transactions.',
    retryable: false,
  },
  invalidFileName: {
    title: 'Invalid File Name',
    message: 'The backup file name is invalid.',
    retryable: false,
  },
  fileNotFound: {
    title: 'No Backup Found',
    message: 'No backup data found in the cloud drive.',
    retryable: false,
  },
  unknown: {
    title: 'Sync Failed',
    message: 'Cloud sync failed. Please try again.',
    retryable: true,
  },
};

const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { kind: 'network', needles: ['network', 'connection'] },
  { kind: 'notSignedIn', needles: ['not signed in', 'no account'] },
  { kind: 'containerUnavailable', needles: ['container', 'ubiquity'] },
  { kind: 'quotaExceeded', needles: ['quota', 'exceed', 'size'] },
  { kind: 'fileNotFound', needles: ['not found', 'no such file'] },
];

// ============================================
// Helpers
// ============================================

/**
 * Build a classified error of the given kind with its fixed message.
 */
export function createClassifiedError(
  kind: CloudErrorKind,
  overrides?: Partial<Omit<ClassifiedError, 'kind'>>
): ClassifiedError {
  const template = ERROR_TEMPLATES[kind];
  return {
    kind,
    title: template.title,
    message: template.message,
    retryable: template.retryable,
    ...overrides,
  };
}

/**
 * Textual description of a raw failure, as matched by the rules.
 */
export function describeRawError(rawError: unknown): string {
  if (rawError instanceof Error) {
    return `${rawError.name}: ${rawError.message}`;
  }
  if (typeof rawError === 'string') {
    return rawError;
  }
  if (
    typeof rawError === 'object' &&
    rawError !== null &&
    'message' in rawError &&
    typeof rawError.message === 'string'
  ) {
    return rawError.message;
  }
  try {
    return String(rawError);
  } catch {
    // Null-prototype objects and throwing toString()
    return Object.prototype.toString.call(rawError);
  }
}

function isClassifiedError(value: unknown): value is ClassifiedError {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'kind' in value &&
    typeof value.kind === 'string' &&
    value.kind in ERROR_TEMPLATES &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'title' in value &&
    typeof value.title === 'string'
  );
}

// ============================================
// Classifier
// ============================================

class SubstringErrorClassifier implements ErrorClassifier {
  classify(rawError: unknown): ClassifiedError {
    // Already classified upstream (pre-flight guard, drive service)
    if (rawError instanceof CloudDriveError) {
      return rawError.classified;
    }
    if (isClassifiedError(rawError)) {
      return rawError;
    }

    const description = describeRawError(rawError);
    const haystack = description.toLowerCase();

    for (const rule of CLASSIFICATION_RULES) {
      if (rule.needles.some((needle) => haystack.includes(needle))) {
        return createClassifiedError(rule.kind, {
          technicalDetails: description,
        });
      }
    }

    return createClassifiedError('unknown', { technicalDetails: description });
  }
}

/**
 * Default classifier used by the drive service and the coordinator.
 */
export const defaultErrorClassifier: ErrorClassifier =
  new SubstringErrorClassifier();

/**
 * Classify a raw failure with the default substring rules.
 */
export function classifyError(rawError: unknown): ClassifiedError {
  return defaultErrorClassifier.classify(rawError);
}
