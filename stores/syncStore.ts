/**
 * Sync Store for FutureProof
 *
 * Zustand store mirroring the sync coordinator for UI consumers: current
 * status, last run, last error and a short run history.
 */

import { formatDistanceToNow } from 'date-fns';
import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { SyncCoordinator } from '@/lib/sync/sync-coordinator';
import {
  isActiveStatus,
  type ClassifiedError,
  type CloudErrorKind,
  type SyncRunResult,
  type SyncStatus,
  type Unsubscribe,
} from '@/types/sync';

// ============================================
// Store Types
// ============================================

/** Sync history entry */
export interface SyncHistoryEntry {
  id: string;
  result: SyncRunResult;
  timestamp: Date;
}

/** Store state */
export interface SyncState {
  status: SyncStatus;

  isSyncing: boolean;

  // Scheduled or syncing
  isActive: boolean;

  // Last completed run (successful or not)
  lastSyncAt: Date | null;
  lastResult: SyncRunResult | null;

  // Error of the last run, cleared by a successful one
  lastError: ClassifiedError | null;

  // Newest first
  history: SyncHistoryEntry[];
}

/** Store actions */
export interface SyncActions {
  setStatus: (status: SyncStatus) => void;
  setLastSyncAt: (lastSyncAt: Date | null) => void;
  recordResult: (result: SyncRunResult) => void;
  clearHistory: () => void;
  reset: () => void;
}

/** Combined store type */
export type SyncStore = SyncState & SyncActions;

/** Store handle, including the selector-aware `subscribe` */
export type SyncStoreApi = ReturnType<typeof createSyncStore>;

// ============================================
// Default Values
// ============================================

export const MAX_HISTORY_ENTRIES = 50;

const initialState: SyncState = {
  status: 'idle',
  isSyncing: false,
  isActive: false,
  lastSyncAt: null,
  lastResult: null,
  lastError: null,
  history: [],
};

// ============================================
// Store Implementation
// ============================================

export function createSyncStore() {
  return createStore<SyncStore>()(
    subscribeWithSelector((set) => ({
      ...initialState,

      setStatus: (status) =>
        set({
          status,
          isSyncing: status === 'syncing',
          isActive: isActiveStatus(status),
        }),

      setLastSyncAt: (lastSyncAt) => set({ lastSyncAt }),

      recordResult: (result) =>
        set((state) => {
          const entry: SyncHistoryEntry = {
            id: result.id,
            result,
            timestamp: result.completedAt,
          };

          return {
            lastSyncAt: result.completedAt,
            lastResult: result,
            lastError: result.error,
            history: [entry, ...state.history].slice(0, MAX_HISTORY_ENTRIES),
          };
        }),

      clearHistory: () => set({ history: [] }),

      reset: () => set({ ...initialState }),
    }))
  );
}

/**
 * Keep `store` in step with `coordinator`.
 */
export function bindSyncStore(
  store: SyncStoreApi,
  coordinator: SyncCoordinator
): Unsubscribe {
  const { setStatus, setLastSyncAt, recordResult } = store.getState();

  setStatus(coordinator.currentStatus);
  setLastSyncAt(coordinator.lastSyncTime);

  const unsubscribeStatus = coordinator.subscribe(setStatus);
  const unsubscribeResults = coordinator.onSyncComplete(recordResult);

  return () => {
    unsubscribeStatus();
    unsubscribeResults();
  };
}

// ============================================
// Selectors
// ============================================

export const selectStatus = (state: SyncStore) => state.status;

export const selectIsSyncing = (state: SyncStore) => state.isSyncing;

export const selectIsActive = (state: SyncStore) => state.isActive;

export const selectLastSyncAt = (state: SyncStore) => state.lastSyncAt;

export const selectLastError = (state: SyncStore) => state.lastError;

export const selectHasError = (state: SyncStore) => state.lastError !== null;

export const selectHistory = (state: SyncStore) => state.history;

/** Select last N history entries */
export const selectRecentSyncs = (count: number) => (state: SyncStore) =>
  state.history.slice(0, count);

// ============================================
// Utility Functions
// ============================================

export interface SyncStats {
  totalSyncs: number;
  successfulSyncs: number;
  failedSyncs: number;
  totalAttempts: number;
  averageDurationMs: number;
  errorsByKind: Partial<Record<CloudErrorKind, number>>;
}

/**
 * Calculate sync statistics from history.
 */
export function calculateSyncStats(history: SyncHistoryEntry[]): SyncStats {
  const stats: SyncStats = {
    totalSyncs: history.length,
    successfulSyncs: 0,
    failedSyncs: 0,
    totalAttempts: 0,
    averageDurationMs: 0,
    errorsByKind: {},
  };

  if (history.length === 0) {
    return stats;
  }

  let totalDuration = 0;

  for (const { result } of history) {
    if (result.success) {
      stats.successfulSyncs++;
    } else {
      stats.failedSyncs++;
    }
    if (result.error) {
      const kind = result.error.kind;
      stats.errorsByKind[kind] = (stats.errorsByKind[kind] ?? 0) + 1;
    }
    stats.totalAttempts += result.attempts.length;
    totalDuration += result.durationMs;
  }

  stats.averageDurationMs = Math.round(totalDuration / history.length);

  return stats;
}

/**
 * Format time since last sync for display.
 */
export function formatTimeSinceSync(lastSyncAt: Date | null): string {
  if (!lastSyncAt) {
    return 'Never synced';
  }
  return formatDistanceToNow(lastSyncAt, { addSuffix: true });
}
