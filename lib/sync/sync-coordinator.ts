/**
 * FutureProof Sync Coordinator
 *
 * Turns a stream of local mutations into infrequent cloud backups.
 *
 * - Reasons accumulate in a pending request; duplicates collapse.
 * - A debounce window (2 s) restarts on every scheduleSync call.
 * - A safety-net timer (5 min), armed by the first pending reason, bounds
 *   staleness while changes keep arriving.
 * - At most one sync is in flight. A forceSync issued while one is running
 *   is dropped.
 * - Every timer captures an epoch when armed; cancelling bumps the epoch so a
 *   late callback does nothing.
 */

import { v4 as uuidv4 } from 'uuid';
import { validateSyncConfig } from '@/lib/config/cloud-config';
import {
  createClassifiedError,
  defaultErrorClassifier,
  describeRawError,
  type ErrorClassifier,
} from '@/lib/cloud/error-classifier';
import type { CloudSyncExecutor } from '@/lib/export/backup-service';
import {
  DEFAULT_SYNC_CONFIG,
  getSyncReasonLabel,
  type PendingSyncRequest,
  type SyncCompleteListener,
  type SyncConfig,
  type SyncReason,
  type SyncRunResult,
  type SyncStatus,
  type SyncStatusListener,
  type Unsubscribe,
} from '@/types/sync';
import { runWithRetry, type RandomSource, type RetryOutcome } from './retry';
import { SyncStateMachine } from './sync-state';

// ============================================
// Sync Coordinator Interface
// ============================================

export interface SyncCoordinator {
  /** Record a reason and (re)arm the debounce window */
  scheduleSync(reason: SyncReason, detail?: string): void;

  /** Sync now. Resolves when the run finishes; never rejects */
  forceSync(): Promise<void>;

  /** Drop pending work and return to idle; leaves an in-flight sync alone */
  cancelPendingSync(): void;

  /** Subscribe to status changes (no replay) */
  subscribe(listener: SyncStatusListener): Unsubscribe;

  /** Subscribe to run results */
  onSyncComplete(listener: SyncCompleteListener): Unsubscribe;

  readonly currentStatus: SyncStatus;
  readonly isSyncing: boolean;

  /** Whether a debounce window is armed */
  readonly isSyncScheduled: boolean;

  /** Milliseconds since the last completed sync, or null */
  readonly timeSinceLastSync: number | null;
  readonly lastSyncTime: Date | null;
  readonly pendingRequest: PendingSyncRequest | null;
  readonly isDisposed: boolean;

  /** Cancel timers, abort retry waits and drop listeners */
  dispose(): void;
}

export interface SyncCoordinatorOptions {
  executor: CloudSyncExecutor;
  config?: Partial<SyncConfig>;
  classifier?: ErrorClassifier;
  /** Jitter source, [0, 1) */
  random?: RandomSource;
  /** Last completed sync known from a previous session */
  initialLastSyncTime?: Date | null;
}

interface ArmedTimer {
  handle: ReturnType<typeof setTimeout> | null;
  epoch: number;
}

interface PendingState {
  reasons: Set<SyncReason>;
  details: string[];
  createdAt: Date;
}

// ============================================
// Sync Coordinator Implementation
// ============================================

class SyncCoordinatorImpl implements SyncCoordinator {
  private readonly executor: CloudSyncExecutor;
  private readonly config: SyncConfig;
  private readonly classifier: ErrorClassifier;
  private readonly random: RandomSource;

  private readonly state = new SyncStateMachine('idle');
  private completeListeners: Set<SyncCompleteListener> = new Set();

  private pending: PendingState | null = null;
  private syncing = false;
  private disposed = false;
  private lastSync: Date | null;
  private retryAbort: AbortController | null = null;

  private debounceTimer: ArmedTimer = { handle: null, epoch: 0 };
  private safetyNetTimer: ArmedTimer = { handle: null, epoch: 0 };
  private decayTimer: ArmedTimer = { handle: null, epoch: 0 };

  constructor(options: SyncCoordinatorOptions) {
    this.config = { ...DEFAULT_SYNC_CONFIG, ...options.config };
    validateSyncConfig(this.config);

    this.executor = options.executor;
    this.classifier = options.classifier ?? defaultErrorClassifier;
    this.random = options.random ?? Math.random;
    this.lastSync = options.initialLastSyncTime ?? null;
  }

  // ============================================
  // Queries
  // ============================================

  get currentStatus(): SyncStatus {
    return this.state.getStatus();
  }

  get isSyncing(): boolean {
    return this.syncing;
  }

  get isSyncScheduled(): boolean {
    return this.debounceTimer.handle !== null;
  }

  get timeSinceLastSync(): number | null {
    return this.lastSync ? Date.now() - this.lastSync.getTime() : null;
  }

  get lastSyncTime(): Date | null {
    return this.lastSync;
  }

  get pendingRequest(): PendingSyncRequest | null {
    if (!this.pending) {
      return null;
    }
    return {
      reasons: [...this.pending.reasons],
      details: [...this.pending.details],
      createdAt: this.pending.createdAt,
    };
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============================================
  // Commands
  // ============================================

  scheduleSync(reason: SyncReason, detail?: string): void {
    if (this.disposed) {
      console.warn(`[SyncCoordinator] Ignoring ${reason}: coordinator disposed`);
      return;
    }

    this.addReason(reason, detail);

    if (!this.syncing && this.isOverdue()) {
      console.log(
        '[SyncCoordinator] Max sync interval exceeded, syncing immediately'
      );
      this.runInBackground();
      return;
    }

    this.armDebounce();
    if (this.safetyNetTimer.handle === null) {
      this.armSafetyNet();
    }

    if (!this.syncing) {
      this.cancelTimer(this.decayTimer);
      this.state.transition('scheduled');
    }
  }

  forceSync(): Promise<void> {
    if (this.disposed) {
      console.warn('[SyncCoordinator] Ignoring forceSync: coordinator disposed');
      return Promise.resolve();
    }

    if (this.syncing) {
      console.warn(
        '[SyncCoordinator] forceSync dropped: a sync is already in progress'
      );
      return Promise.resolve();
    }

    this.addReason('manual');
    return this.executeSync();
  }

  cancelPendingSync(): void {
    if (this.disposed) {
      return;
    }

    if (this.syncing) {
      this.cancelTimer(this.debounceTimer);
      this.cancelTimer(this.safetyNetTimer);
      this.pending = null;
      console.log('[SyncCoordinator] Cleared pending work; in-flight sync continues');
      return;
    }

    if (this.state.is('idle') && !this.pending) {
      return;
    }

    this.cancelTimer(this.debounceTimer);
    this.cancelTimer(this.safetyNetTimer);
    this.cancelTimer(this.decayTimer);
    this.pending = null;
    this.state.transition('idle');
    console.log('[SyncCoordinator] Pending sync cancelled');
  }

  // ============================================
  // Execution
  // ============================================

  private async executeSync(): Promise<void> {
    if (this.syncing || this.disposed) {
      return;
    }

    this.cancelTimer(this.debounceTimer);
    this.cancelTimer(this.safetyNetTimer);
    this.cancelTimer(this.decayTimer);

    const request = this.pending;
    this.pending = null;
    const reasons = request ? [...request.reasons] : [];
    const details = request ? [...request.details] : [];

    this.syncing = true;
    this.state.transition('syncing');
    console.log(
      `[SyncCoordinator] Executing cloud sync: ${reasons.map(getSyncReasonLabel).join(', ')}`
    );

    const startedAt = new Date();
    const abort = new AbortController();
    this.retryAbort = abort;

    let outcome: RetryOutcome;
    try {
      outcome = await runWithRetry(() => this.executor.triggerCloudSync(), {
        config: this.config,
        classifier: this.classifier,
        random: this.random,
        signal: abort.signal,
      });
    } catch (thrown) {
      console.error('[SyncCoordinator] Sync run threw:', thrown);
      outcome = {
        attempts: [],
        error: createClassifiedError('unknown', {
          technicalDetails: describeRawError(thrown),
        }),
      };
    } finally {
      this.retryAbort = null;
    }

    const { attempts, error } = outcome;
    const completedAt = new Date();
    if (!this.lastSync || completedAt.getTime() > this.lastSync.getTime()) {
      this.lastSync = completedAt;
    }

    if (this.disposed) {
      this.syncing = false;
      return;
    }

    const success = error === null;
    if (success) {
      console.log(
        `[SyncCoordinator] Sync completed after ${attempts.length} attempt(s)`
      );
      this.state.transition('success');
      this.armDecay('success', this.config.successStatusResetMs);
    } else {
      console.error(
        `[SyncCoordinator] Sync failed (${error.kind}):`,
        error.technicalDetails ?? error.message
      );
      this.state.transition('error');
      this.armDecay('error', this.config.errorStatusResetMs);
    }

    this.syncing = false;

    this.emitSyncComplete({
      id: uuidv4(),
      success,
      reasons,
      details,
      attempts,
      error,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    });

    if (this.disposed) {
      return;
    }

    // Work that arrived mid-flight waits for its own debounce window
    const arrivedMidFlight = this.pending !== null;

    // Unsaved changes of a failed run ride along with the next sync
    if (!success && request) {
      this.restorePending(request);
    }

    if (arrivedMidFlight) {
      this.cancelTimer(this.decayTimer);
      this.state.transition('scheduled');
      if (this.debounceTimer.handle === null) {
        this.armDebounce();
      }
      if (this.safetyNetTimer.handle === null) {
        this.armSafetyNet();
      }
    }
  }

  private runInBackground(): void {
    this.executeSync().catch((error) => {
      console.error('[SyncCoordinator] Background sync error:', error);
    });
  }

  // ============================================
  // Pending Request & Timers
  // ============================================

  private addReason(reason: SyncReason, detail?: string): void {
    if (!this.pending) {
      this.pending = { reasons: new Set(), details: [], createdAt: new Date() };
    }
    this.pending.reasons.add(reason);
    if (detail) {
      this.pending.details.push(detail);
    }
  }

  /** Put a failed request back in front of any newer pending work */
  private restorePending(request: PendingState): void {
    const newer = this.pending;
    this.pending = {
      reasons: new Set(request.reasons),
      details: [...request.details],
      createdAt: request.createdAt,
    };
    if (newer) {
      for (const reason of newer.reasons) {
        this.pending.reasons.add(reason);
      }
      this.pending.details.push(...newer.details);
    }
  }

  private isOverdue(): boolean {
    if (!this.lastSync) {
      return false;
    }
    return Date.now() - this.lastSync.getTime() > this.config.maxSyncIntervalMs;
  }

  private arm(
    timer: ArmedTimer,
    delayMs: number,
    onFire: () => void,
    keepAlive = true
  ): void {
    this.cancelTimer(timer);
    const epoch = timer.epoch;
    timer.handle = setTimeout(() => {
      if (timer.epoch !== epoch || this.disposed) {
        return;
      }
      timer.handle = null;
      onFire();
    }, delayMs);
    if (!keepAlive) {
      timer.handle.unref();
    }
  }

  private cancelTimer(timer: ArmedTimer): void {
    if (timer.handle !== null) {
      clearTimeout(timer.handle);
      timer.handle = null;
    }
    timer.epoch++;
  }

  private armDebounce(): void {
    this.arm(this.debounceTimer, this.config.debounceDelayMs, () => {
      this.runInBackground();
    });
  }

  private armSafetyNet(): void {
    // Does not hold the process open on its own
    this.arm(
      this.safetyNetTimer,
      this.config.maxSyncIntervalMs,
      () => {
        console.log('[SyncCoordinator] Safety-net timer fired');
        this.runInBackground();
      },
      false
    );
  }

  private armDecay(from: SyncStatus, delayMs: number): void {
    this.arm(this.decayTimer, delayMs, () => {
      if (this.state.is(from)) {
        this.state.transition('idle');
      }
    });
  }

  // ============================================
  // Listeners
  // ============================================

  subscribe(listener: SyncStatusListener): Unsubscribe {
    if (this.disposed) {
      return () => undefined;
    }
    return this.state.onStatusChange(listener);
  }

  onSyncComplete(listener: SyncCompleteListener): Unsubscribe {
    if (this.disposed) {
      return () => undefined;
    }
    this.completeListeners.add(listener);
    return () => {
      this.completeListeners.delete(listener);
    };
  }

  private emitSyncComplete(result: SyncRunResult): void {
    for (const listener of [...this.completeListeners]) {
      try {
        listener(result);
      } catch (err) {
        console.error('[SyncCoordinator] Error in sync complete listener:', err);
      }
    }
  }

  // ============================================
  // Lifecycle
  // ============================================

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    this.cancelTimer(this.debounceTimer);
    this.cancelTimer(this.safetyNetTimer);
    this.cancelTimer(this.decayTimer);
    this.retryAbort?.abort();
    this.pending = null;

    this.state.clearListeners();
    this.completeListeners.clear();
    console.log('[SyncCoordinator] Disposed');
  }
}

/**
 * Create a coordinator. The config is validated up front.
 *
 * @throws ConfigError when the config cannot work
 */
export function createSyncCoordinator(
  options: SyncCoordinatorOptions
): SyncCoordinator {
  return new SyncCoordinatorImpl(options);
}

export { SyncCoordinatorImpl };
