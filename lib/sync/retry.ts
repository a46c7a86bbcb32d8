/**
 * Retry policy for a single sync run.
 *
 * Exponential backoff capped at `maxRetryDelayMs`, plus up to
 * `retryJitterRatio` of the delay as jitter. Only retryable classifications
 * are retried; thrown errors are classified and follow the same policy.
 */

import type { ErrorClassifier } from '@/lib/cloud/error-classifier';
import type {
  ClassifiedError,
  CloudResult,
  SyncAttempt,
  SyncConfig,
} from '@/types/sync';

export type RandomSource = () => number;

export interface RetryOptions {
  config: SyncConfig;
  classifier: ErrorClassifier;
  random: RandomSource;
  /** Aborting ends the run after the current attempt */
  signal?: AbortSignal;
}

export interface RetryOutcome {
  attempts: SyncAttempt[];
  /** Final failure, or null when an attempt succeeded */
  error: ClassifiedError | null;
}

/**
 * Delay before the attempt that follows attempt `attemptIndex` (0-based).
 */
export function calculateRetryDelay(
  attemptIndex: number,
  config: Pick<
    SyncConfig,
    'retryDelayBaseMs' | 'maxRetryDelayMs' | 'retryJitterRatio'
  >,
  random: RandomSource = Math.random
): number {
  const delay = Math.min(
    config.retryDelayBaseMs * Math.pow(2, attemptIndex),
    config.maxRetryDelayMs
  );
  const jitter = delay * config.retryJitterRatio * random();
  return Math.round(delay + jitter);
}

/**
 * Resolves true after `ms`, or false as soon as the signal aborts.
 */
export function waitForRetry(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` until it succeeds, fails non-retryably, or runs out of
 * attempts.
 */
export async function runWithRetry(
  operation: () => Promise<CloudResult<void>>,
  options: RetryOptions
): Promise<RetryOutcome> {
  const { config, classifier, random, signal } = options;
  const attempts: SyncAttempt[] = [];
  let lastError: ClassifiedError | null = null;

  for (let index = 0; index < config.maxSyncAttempts; index++) {
    const startedAt = new Date();
    let outcome: SyncAttempt['outcome'];

    try {
      const result = await operation();
      outcome = result.success ? 'success' : result.error;
    } catch (error) {
      outcome = classifier.classify(error);
    }

    attempts.push({ index, startedAt, outcome });

    if (outcome === 'success') {
      return { attempts, error: null };
    }

    lastError = outcome;
    const isLastAttempt = index === config.maxSyncAttempts - 1;
    if (!outcome.retryable || isLastAttempt) {
      break;
    }

    const delay = calculateRetryDelay(index, config, random);
    console.warn(
      `[SyncCoordinator] Attempt ${index + 1}/${config.maxSyncAttempts} failed (${outcome.kind}), retrying in ${delay}ms`
    );

    const completed = await waitForRetry(delay, signal);
    if (!completed) {
      console.log('[SyncCoordinator] Retry wait aborted');
      break;
    }
  }

  return { attempts, error: lastError };
}
