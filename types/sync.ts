/**
 * Synchronization Types for FutureProof
 *
 * Types related to the cloud sync coordinator, the classified error
 * taxonomy and the status stream consumed by the UI.
 */

// ============================================
// Sync Reasons
// ============================================

/**
 * Why a sync was requested. Reasons accumulate between executions;
 * duplicates collapse.
 */
export type SyncReason =
  | 'manual'
  | 'vaultCreated'
  | 'vaultDeleted'
  | 'vaultUpdated'
  | 'transactionAdded'
  | 'transactionUpdated'
  | 'transactionDeleted'
  | 'batchChanges';

const SYNC_REASON_LABELS: Record<SyncReason, string> = {
  manual: 'Manual sync',
  vaultCreated: 'Vault created',
  vaultDeleted: 'Vault deleted',
  vaultUpdated: 'Vault updated',
  transactionAdded: 'Transaction added',
  transactionUpdated: 'Transaction updated',
  transactionDeleted: 'Transaction deleted',
  batchChanges: 'Multiple changes',
};

/**
 * Display name for a sync reason.
 */
export function getSyncReasonLabel(reason: SyncReason): string {
  return SYNC_REASON_LABELS[reason];
}

// ============================================
// Sync Status
// ============================================

/**
 * Exclusive state of the coordinator at any instant.
 */
export type SyncStatus = 'idle' | 'scheduled' | 'syncing' | 'success' | 'error';

/**
 * Status text shown next to the sync indicator.
 */
export function getSyncStatusMessage(status: SyncStatus): string {
  switch (status) {
    case 'idle':
      return '';
    case 'scheduled':
      return 'Sync scheduled...';
    case 'syncing':
      return 'Syncing to cloud...';
    case 'success':
      return 'Synced to cloud';
    case 'error':
      return 'Sync failed';
  }
}

/** Scheduled or syncing */
export function isActiveStatus(status: SyncStatus): boolean {
  return status === 'scheduled' || status === 'syncing';
}

// ============================================
// Cloud Errors
// ============================================

/**
 * Categories of cloud drive failures.
 */
export type CloudErrorKind =
  | 'network'
  | 'notSignedIn'
  | 'containerUnavailable'
  | 'quotaExceeded'
  | 'invalidFileName'
  | 'fileNotFound'
  | 'unknown';

/**
 * A raw transport failure mapped onto the fixed taxonomy.
 */
export interface ClassifiedError {
  /** Error category */
  kind: CloudErrorKind;

  /** User-facing message */
  message: string;

  /** Short title for dialogs and snackbars */
  title: string;

  /** Whether retrying the same operation may succeed */
  retryable: boolean;

  /** Raw description, for logs only */
  technicalDetails?: string;
}

/**
 * Result of a cloud drive operation. Drive operations never throw.
 */
export type CloudResult<T> =
  | { success: true; data: T }
  | { success: false; error: ClassifiedError };

// ============================================
// Pending Work & Attempts
// ============================================

/**
 * Accumulated-but-not-yet-executed sync intent.
 */
export interface PendingSyncRequest {
  /** Reasons in accumulation order */
  reasons: SyncReason[];

  /** Free-text details for diagnostics */
  details: string[];

  /** When the first reason of this cycle arrived */
  createdAt: Date;
}

/**
 * One call into the backup transport within a single sync run.
 */
export interface SyncAttempt {
  /** 0-based index within the run */
  index: number;

  startedAt: Date;

  /** 'success' or the classified failure */
  outcome: 'success' | ClassifiedError;
}

/**
 * Outcome of one coordinator execution, published after every run.
 */
export interface SyncRunResult {
  /** Unique run identifier */
  id: string;

  success: boolean;

  /** Reasons that were delivered to this run */
  reasons: SyncReason[];

  details: string[];

  attempts: SyncAttempt[];

  /** Final classified error when the run failed */
  error: ClassifiedError | null;

  startedAt: Date;

  completedAt: Date;

  durationMs: number;
}

// ============================================
// Sync Configuration
// ============================================

/**
 * Coordinator timing and retry policy.
 */
export interface SyncConfig {
  /** Quiet period before a scheduled sync runs */
  debounceDelayMs: number;

  /** Upper bound on staleness while changes keep arriving */
  maxSyncIntervalMs: number;

  /** Maximum transport attempts per run */
  maxSyncAttempts: number;

  /** Retry delay base (for exponential backoff) */
  retryDelayBaseMs: number;

  /** Maximum retry delay before jitter */
  maxRetryDelayMs: number;

  /** Jitter as a fraction of the backoff delay (0-1) */
  retryJitterRatio: number;

  /** How long `success` is displayed before decaying to `idle` */
  successStatusResetMs: number;

  /** How long `error` is displayed before decaying to `idle` */
  errorStatusResetMs: number;
}

/**
 * Default sync configuration.
 */
export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  debounceDelayMs: 2000,
  maxSyncIntervalMs: 5 * 60 * 1000, // 5 minutes
  maxSyncAttempts: 3,
  retryDelayBaseMs: 1000,
  maxRetryDelayMs: 30000,
  retryJitterRatio: 0.1,
  successStatusResetMs: 2000,
  errorStatusResetMs: 5000,
} as const;

// ============================================
// Listeners
// ============================================

/** Unsubscribe function for event listeners */
export type Unsubscribe = () => void;

export type SyncStatusListener = (status: SyncStatus) => void;

export type SyncCompleteListener = (result: SyncRunResult) => void;
