/**
 * Sync Module for FutureProof
 *
 * Debounced, single-flight cloud backup coordination.
 *
 * @module lib/sync
 */

// ============================================
// Sync Coordinator
// ============================================

export {
  createSyncCoordinator,
  type SyncCoordinator,
  type SyncCoordinatorOptions,
} from './sync-coordinator';

// ============================================
// State Machine
// ============================================

export {
  SyncStateMachine,
  isValidTransition,
  getValidTransitions,
  type SyncStateContext,
} from './sync-state';

// ============================================
// Retry & Queue
// ============================================

export {
  calculateRetryDelay,
  runWithRetry,
  waitForRetry,
  type RandomSource,
  type RetryOptions,
  type RetryOutcome,
} from './retry';

export {
  SyncQueue,
  type QueuedOperation,
  type SyncOperation,
  type SyncQueueOptions,
} from './sync-queue';
