/**
 * Sync Queue
 *
 * Holds failed sync operations and retries them periodically:
 * - entries at least one retry interval old are handed to `onRetry`
 * - an operation that has kept failing for over an hour is reported through
 *   `onError` and dropped
 * - only the newest entries are kept
 */

import { v4 as uuidv4 } from 'uuid';

// ============================================
// Types
// ============================================

export type SyncOperation = 'backup' | 'restore' | 'sync';

export interface QueuedOperation {
  id: string;
  operation: SyncOperation;
  error: string;

  /** When this entry was queued */
  queuedAt: Date;

  /** When the current run of failures for this operation began */
  failingSince: Date;
}

export interface SyncQueueOptions {
  onRetry?: (operation: SyncOperation) => void;
  onError?: (message: string) => void;
  retryIntervalMs?: number;
  maxQueueAgeMs?: number;
  maxEntries?: number;
}

const DEFAULT_RETRY_INTERVAL_MS = 5 * 60 * 1000;
const DEFAULT_MAX_QUEUE_AGE_MS = 60 * 60 * 1000;
const DEFAULT_MAX_ENTRIES = 10;

// ============================================
// Sync Queue Implementation
// ============================================

export class SyncQueue {
  private queue: QueuedOperation[] = [];
  private failingSince: Map<SyncOperation, Date> = new Map();
  private retryTimer: ReturnType<typeof setInterval> | null = null;

  private readonly onRetry?: (operation: SyncOperation) => void;
  private readonly onError?: (message: string) => void;
  private readonly retryIntervalMs: number;
  private readonly maxQueueAgeMs: number;
  private readonly maxEntries: number;

  constructor(options: SyncQueueOptions = {}) {
    this.onRetry = options.onRetry;
    this.onError = options.onError;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    this.maxQueueAgeMs = options.maxQueueAgeMs ?? DEFAULT_MAX_QUEUE_AGE_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;

    this.retryTimer = setInterval(() => {
      this.processQueue();
    }, this.retryIntervalMs);
    // Never keeps the host process alive by itself
    this.retryTimer.unref();
    console.log(
      `[SyncQueue] Retry timer started (interval: ${this.retryIntervalMs / 60000} min)`
    );
  }

  /**
   * Record a failed operation.
   */
  enqueue(operation: SyncOperation, error: string): void {
    const now = new Date();
    let since = this.failingSince.get(operation);
    if (!since) {
      since = now;
      this.failingSince.set(operation, since);
    }

    this.queue.push({
      id: uuidv4(),
      operation,
      error,
      queuedAt: now,
      failingSince: since,
    });
    console.warn(
      `[SyncQueue] Sync queued: ${operation} (queue size: ${this.queue.length})`
    );
  }

  /**
   * The operation succeeded: forget its failure streak and queued entries.
   */
  markSucceeded(operation: SyncOperation): void {
    this.failingSince.delete(operation);
    this.queue = this.queue.filter((entry) => entry.operation !== operation);
  }

  /**
   * Retry or expire due entries. Runs on the retry interval.
   */
  processQueue(): void {
    if (this.queue.length === 0) {
      return;
    }

    const now = Date.now();
    const expired: QueuedOperation[] = [];
    const due: QueuedOperation[] = [];
    const waiting: QueuedOperation[] = [];

    for (const entry of this.queue) {
      if (now - entry.failingSince.getTime() > this.maxQueueAgeMs) {
        expired.push(entry);
      } else if (now - entry.queuedAt.getTime() >= this.retryIntervalMs) {
        due.push(entry);
      } else {
        waiting.push(entry);
      }
    }

    this.queue = waiting.slice(-this.maxEntries);

    for (const entry of expired) {
      this.failingSince.delete(entry.operation);
      const minutes = Math.round(this.maxQueueAgeMs / 60000);
      console.error(
        `[SyncQueue] Sync expired after ${minutes} min: ${entry.operation}`
      );
      this.notify(() =>
        this.onError?.(
          `Sync failed for ${minutes} minutes. Last error: ${entry.error}`
        )
      );
    }

    for (const entry of due) {
      console.log(`[SyncQueue] Retrying: ${entry.operation}`);
      this.notify(() => this.onRetry?.(entry.operation));
    }
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.error('[SyncQueue] Error in queue callback:', error);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get hasPendingOperations(): boolean {
    return this.queue.length > 0;
  }

  /** Snapshot of queued entries, oldest first */
  getEntries(): QueuedOperation[] {
    return this.queue.map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.queue = [];
    this.failingSince.clear();
    console.log('[SyncQueue] Sync queue cleared');
  }

  dispose(): void {
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
    console.log('[SyncQueue] Disposed');
  }
}
