/**
 * Unit Tests for the Sync Coordinator
 *
 * Drives the coordinator with fake timers against the real backup and drive
 * services over an in-memory transport, so transport call counts reflect
 * what a cloud drive would see.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CloudDriveService } from '@/lib/cloud/cloud-drive-service';
import type { ErrorClassifier } from '@/lib/cloud/error-classifier';
import type { CloudConfig } from '@/lib/config/cloud-config';
import { ConfigError } from '@/lib/errors';
import {
  BackupService,
  type CloudSyncExecutor,
} from '@/lib/export/backup-service';
import { MemoryPreferences } from '@/lib/storage/preferences';
import {
  createSyncCoordinator,
  type SyncCoordinator,
  type SyncCoordinatorOptions,
} from '@/lib/sync/sync-coordinator';
import type {
  CloudResult,
  SyncConfig,
  SyncRunResult,
  SyncStatus,
} from '@/types/sync';
import {
  MemoryDataSource,
  MemoryTransport,
  createTransaction,
  createVault,
  timerHasRef,
} from '../../../factories';

// ============================================
// Harness
// ============================================

interface HarnessOptions {
  sync?: Partial<SyncConfig>;
  cloud?: Partial<CloudConfig>;
  initialLastSyncTime?: Date | null;
}

function createHarness(options: HarnessOptions = {}) {
  const transport = new MemoryTransport();
  const drive = new CloudDriveService({
    transport,
    preferences: new MemoryPreferences(),
    config: options.cloud,
  });
  const dataSource = new MemoryDataSource().addVault(createVault(), [
    createTransaction(),
  ]);
  const backup = new BackupService({ dataSource, drive });

  const coordinator = createSyncCoordinator({
    executor: backup,
    config: options.sync,
    random: () => 0,
    initialLastSyncTime: options.initialLastSyncTime,
  });

  const statuses: SyncStatus[] = [];
  const results: SyncRunResult[] = [];
  coordinator.subscribe((status) => statuses.push(status));
  coordinator.onSyncComplete((result) => results.push(result));

  return { transport, coordinator, statuses, results };
}

/** Let promise chains that need no timers run to completion */
async function settle(): Promise<void> {
  await vi.advanceTimersByTimeAsync(0);
}

const OK: CloudResult<void> = { success: true, data: undefined };

class ScriptedExecutor implements CloudSyncExecutor {
  calls = 0;
  script: Array<CloudResult<void> | Error> = [];

  async triggerCloudSync(): Promise<CloudResult<void>> {
    this.calls++;
    const next = this.script.shift() ?? OK;
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

// ============================================
// Tests
// ============================================

describe('SyncCoordinator', () => {
  let coordinator: SyncCoordinator | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-06-01T09:00:00.000Z'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    coordinator?.dispose();
    coordinator = null;
  });

  // ============================================
  // Debounce
  // ============================================

  describe('debounce', () => {
    it('collapses a burst of changes into one sync', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      h.coordinator.scheduleSync('transactionAdded', 'tx-1');
      await vi.advanceTimersByTimeAsync(500);
      h.coordinator.scheduleSync('transactionAdded', 'tx-2');
      await vi.advanceTimersByTimeAsync(500);
      h.coordinator.scheduleSync('vaultUpdated');

      expect(h.coordinator.pendingRequest?.reasons).toEqual([
        'transactionAdded',
        'vaultUpdated',
      ]);
      expect(h.coordinator.isSyncScheduled).toBe(true);

      await vi.advanceTimersByTimeAsync(1999);
      expect(h.transport.saveCalls).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.results).toHaveLength(1);
      expect(h.results[0]?.reasons).toEqual(['transactionAdded', 'vaultUpdated']);
      expect(h.results[0]?.details).toEqual(['tx-1', 'tx-2']);
      expect(h.statuses).toEqual(['scheduled', 'syncing', 'success']);
    });

    it('restarts the window on every call', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      h.coordinator.scheduleSync('transactionAdded');
      await vi.advanceTimersByTimeAsync(1500);
      h.coordinator.scheduleSync('transactionUpdated');
      await vi.advanceTimersByTimeAsync(1500);

      expect(h.transport.saveCalls).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(500);

      expect(h.transport.saveCalls).toHaveLength(1);
    });

    it('clears the pending request when execution begins', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.saveDelayMs = 1000;
      const pendingAtStart: Array<unknown> = [];
      h.coordinator.subscribe((status) => {
        if (status === 'syncing') {
          pendingAtStart.push(h.coordinator.pendingRequest);
        }
      });

      h.coordinator.scheduleSync('vaultCreated');
      await vi.advanceTimersByTimeAsync(2000);

      expect(pendingAtStart).toEqual([null]);
      expect(h.coordinator.isSyncing).toBe(true);
      expect(h.coordinator.isSyncScheduled).toBe(false);
    });
  });

  // ============================================
  // Safety net
  // ============================================

  describe('safety net', () => {
    it('syncs within the max interval under continuous changes', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      for (let second = 0; second < 299; second++) {
        h.coordinator.scheduleSync('transactionAdded');
        await vi.advanceTimersByTimeAsync(1000);
      }
      h.coordinator.scheduleSync('transactionAdded');
      await vi.advanceTimersByTimeAsync(999);

      expect(h.transport.saveCalls).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.coordinator.isSyncScheduled).toBe(false);
    });

    it('syncs immediately once the last sync is older than the max interval', async () => {
      const h = createHarness({
        initialLastSyncTime: new Date(Date.now() - 300001),
      });
      coordinator = h.coordinator;

      h.coordinator.scheduleSync('transactionDeleted');
      await settle();

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.statuses).toEqual(['syncing', 'success']);
    });

    it('debounces when the last sync is exactly at the max interval', async () => {
      const h = createHarness({
        initialLastSyncTime: new Date(Date.now() - 300000),
      });
      coordinator = h.coordinator;

      h.coordinator.scheduleSync('transactionDeleted');
      await settle();

      expect(h.transport.saveCalls).toHaveLength(0);
      expect(h.coordinator.currentStatus).toBe('scheduled');
    });
  });

  // ============================================
  // Single flight
  // ============================================

  describe('single flight', () => {
    it('drops a forceSync issued while a sync is in flight', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.saveDelayMs = 10000;

      const first = h.coordinator.forceSync();
      await settle();
      expect(h.transport.saveCalls).toHaveLength(1);

      const second = h.coordinator.forceSync();
      await settle();

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.coordinator.pendingRequest).toBeNull();

      await vi.advanceTimersByTimeAsync(10000);
      await Promise.all([first, second]);

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.results).toHaveLength(1);
      expect(h.results[0]?.reasons).toEqual(['manual']);
    });

    it('runs changes that arrived mid-flight in a follow-up sync', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.saveDelayMs = 10000;

      const first = h.coordinator.forceSync();
      await settle();
      h.coordinator.scheduleSync('vaultUpdated');

      // The debounce expires mid-flight and must not start a second run
      await vi.advanceTimersByTimeAsync(2000);
      expect(h.transport.saveCalls).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(8000);
      await first;

      expect(h.coordinator.currentStatus).toBe('scheduled');
      expect(h.coordinator.isSyncScheduled).toBe(true);

      await vi.advanceTimersByTimeAsync(2000);
      expect(h.transport.saveCalls).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(10000);

      expect(h.results.map((r) => r.reasons)).toEqual([
        ['manual'],
        ['vaultUpdated'],
      ]);
      expect(h.statuses).toEqual([
        'syncing',
        'success',
        'scheduled',
        'syncing',
        'success',
      ]);
    });
  });

  // ============================================
  // Outcomes & status decay
  // ============================================

  describe('status', () => {
    it('shows success for exactly the success reset delay', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      await h.coordinator.forceSync();

      expect(h.statuses).toEqual(['syncing', 'success']);

      await vi.advanceTimersByTimeAsync(1999);
      expect(h.coordinator.currentStatus).toBe('success');

      await vi.advanceTimersByTimeAsync(1);
      expect(h.coordinator.currentStatus).toBe('idle');
      expect(h.statuses).toEqual(['syncing', 'success', 'idle']);
    });

    it('fails fast on a non-retryable error and shows it for the error reset delay', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(new Error('User is not signed in'));

      await h.coordinator.forceSync();

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.statuses).toEqual(['syncing', 'error']);
      expect(h.results[0]?.error?.kind).toBe('notSignedIn');
      expect(h.results[0]?.success).toBe(false);

      await vi.advanceTimersByTimeAsync(4999);
      expect(h.coordinator.currentStatus).toBe('error');

      await vi.advanceTimersByTimeAsync(1);
      expect(h.statuses).toEqual(['syncing', 'error', 'idle']);
    });

    it('walks a scheduled sync through scheduled, syncing, success and back to idle', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      expect(h.coordinator.currentStatus).toBe('idle');

      h.coordinator.scheduleSync('transactionAdded');
      await vi.advanceTimersByTimeAsync(2000);
      expect(h.statuses).toEqual(['scheduled', 'syncing', 'success']);

      await vi.advanceTimersByTimeAsync(1999);
      expect(h.coordinator.currentStatus).toBe('success');

      await vi.advanceTimersByTimeAsync(1);
      expect(h.statuses).toEqual(['scheduled', 'syncing', 'success', 'idle']);
    });

    it('walks a failing scheduled sync through error and back to idle', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(new Error('User is not signed in'));

      h.coordinator.scheduleSync('vaultCreated');
      await vi.advanceTimersByTimeAsync(2000);
      expect(h.statuses).toEqual(['scheduled', 'syncing', 'error']);

      await vi.advanceTimersByTimeAsync(4999);
      expect(h.coordinator.currentStatus).toBe('error');

      await vi.advanceTimersByTimeAsync(1);
      expect(h.statuses).toEqual(['scheduled', 'syncing', 'error', 'idle']);
      expect(h.transport.saveCalls).toHaveLength(1);
    });

    it('records the last sync time whatever the outcome', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(new Error('User is not signed in'));

      expect(h.coordinator.lastSyncTime).toBeNull();
      expect(h.coordinator.timeSinceLastSync).toBeNull();

      await h.coordinator.forceSync();

      expect(h.coordinator.lastSyncTime).toEqual(
        new Date('2024-06-01T09:00:00.000Z')
      );

      await vi.advanceTimersByTimeAsync(1500);
      expect(h.coordinator.timeSinceLastSync).toBe(1500);
    });

    it('never moves the last sync time backwards', async () => {
      const future = new Date('2024-06-02T00:00:00.000Z');
      const h = createHarness({ initialLastSyncTime: future });
      coordinator = h.coordinator;

      await h.coordinator.forceSync();

      expect(h.coordinator.lastSyncTime).toEqual(future);
    });

    it('suppresses consecutive duplicate statuses', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      h.coordinator.scheduleSync('transactionAdded');
      h.coordinator.scheduleSync('transactionAdded');
      h.coordinator.scheduleSync('transactionUpdated');

      expect(h.statuses).toEqual(['scheduled']);
    });

    it('keeps broadcasting when a listener throws', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      const seen: SyncStatus[] = [];
      h.coordinator.subscribe(() => {
        throw new Error('listener bug');
      });
      h.coordinator.subscribe((status) => seen.push(status));

      await h.coordinator.forceSync();

      expect(seen).toEqual(['syncing', 'success']);
      expect(h.statuses).toEqual(['syncing', 'success']);
    });

    it('stops notifying an unsubscribed listener without stopping work', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      const seen: SyncStatus[] = [];
      const unsubscribe = h.coordinator.subscribe((status) => seen.push(status));

      h.coordinator.scheduleSync('vaultCreated');
      unsubscribe();
      await vi.advanceTimersByTimeAsync(2000);

      expect(seen).toEqual(['scheduled']);
      expect(h.transport.saveCalls).toHaveLength(1);
    });
  });

  // ============================================
  // Retry
  // ============================================

  describe('retry', () => {
    it('retries network failures with exponential backoff', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(
        new Error('The network connection was lost'),
        new Error('The network connection was lost')
      );

      const run = h.coordinator.forceSync();
      await settle();
      expect(h.transport.saveCalls).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(h.transport.saveCalls).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(h.transport.saveCalls).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(1999);
      expect(h.transport.saveCalls).toHaveLength(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(h.transport.saveCalls).toHaveLength(3);

      await run;

      expect(h.statuses).toEqual(['syncing', 'success']);
      const attempts = h.results[0]?.attempts ?? [];
      expect(attempts.map((a) => a.index)).toEqual([0, 1, 2]);
      expect(attempts[2]?.outcome).toBe('success');
    });

    it('gives up after the maximum number of attempts', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(
        new Error('connection refused'),
        new Error('connection refused'),
        new Error('connection refused'),
        new Error('connection refused')
      );

      const run = h.coordinator.forceSync();
      await vi.advanceTimersByTimeAsync(3000);
      await run;

      expect(h.transport.saveCalls).toHaveLength(3);
      expect(h.coordinator.currentStatus).toBe('error');
      expect(h.results[0]?.error?.kind).toBe('network');
    });

    it('classifies and retries exceptions thrown by the executor', async () => {
      const executor = new ScriptedExecutor();
      executor.script = [new Error('Connection reset'), OK];
      coordinator = createSyncCoordinator({ executor, random: () => 0 });
      const results: SyncRunResult[] = [];
      coordinator.onSyncComplete((result) => results.push(result));

      const run = coordinator.forceSync();
      await vi.advanceTimersByTimeAsync(1000);
      await run;

      expect(executor.calls).toBe(2);
      expect(results[0]?.success).toBe(true);
      const firstOutcome = results[0]?.attempts[0]?.outcome;
      expect(firstOutcome).not.toBe('success');
      if (firstOutcome && firstOutcome !== 'success') {
        expect(firstOutcome.kind).toBe('network');
      }
    });

    it('does not retry non-retryable results from the executor', async () => {
      const executor = new ScriptedExecutor();
      executor.script = [
        {
          success: false,
          error: {
            kind: 'quotaExceeded',
            title: 'Data Too Large',
            message: 'too big',
            retryable: false,
          },
        },
      ];
      coordinator = createSyncCoordinator({ executor });

      await coordinator.forceSync();

      expect(executor.calls).toBe(1);
      expect(coordinator.currentStatus).toBe('error');
    });
  });

  // ============================================
  // Unexpected throws
  // ============================================

  describe('unexpected throws', () => {
    it('ends in error when the classifier itself throws', async () => {
      const executor = new ScriptedExecutor();
      executor.script = [new Error('upload failed')];
      const classifier: ErrorClassifier = {
        classify: () => {
          throw new Error('classifier bug');
        },
      };
      coordinator = createSyncCoordinator({ executor, classifier });
      const results: SyncRunResult[] = [];
      coordinator.onSyncComplete((result) => results.push(result));

      await expect(coordinator.forceSync()).resolves.toBeUndefined();

      expect(coordinator.isSyncing).toBe(false);
      expect(coordinator.currentStatus).toBe('error');
      expect(results[0]?.attempts).toEqual([]);
      expect(results[0]?.error).toMatchObject({
        kind: 'unknown',
        technicalDetails: 'Error: classifier bug',
      });

      await vi.advanceTimersByTimeAsync(5000);
      expect(coordinator.currentStatus).toBe('idle');

      await coordinator.forceSync();
      expect(executor.calls).toBe(2);
      expect(coordinator.currentStatus).toBe('success');
    });

    it('classifies a rejection value that has no string form', async () => {
      let calls = 0;
      const executor: CloudSyncExecutor = {
        triggerCloudSync: async () => {
          calls++;
          throw Object.create(null);
        },
      };
      coordinator = createSyncCoordinator({ executor, random: () => 0 });
      const results: SyncRunResult[] = [];
      coordinator.onSyncComplete((result) => results.push(result));

      const run = coordinator.forceSync();
      await vi.advanceTimersByTimeAsync(3000);
      await run;

      expect(calls).toBe(3);
      expect(coordinator.isSyncing).toBe(false);
      expect(coordinator.currentStatus).toBe('error');
      expect(results[0]?.error).toMatchObject({
        kind: 'unknown',
        technicalDetails: '[object Object]',
      });
    });
  });

  // ============================================
  // Failed runs
  // ============================================

  describe('failed runs', () => {
    it('keeps the reasons of a failed run for the next sync without retrying on its own', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(new Error('User is not signed in'));

      h.coordinator.scheduleSync('transactionAdded', 'tx-1');
      await vi.advanceTimersByTimeAsync(2000);

      expect(h.coordinator.pendingRequest).toMatchObject({
        reasons: ['transactionAdded'],
        details: ['tx-1'],
      });
      expect(h.coordinator.isSyncScheduled).toBe(false);

      await vi.advanceTimersByTimeAsync(60000);
      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.coordinator.currentStatus).toBe('idle');

      h.coordinator.scheduleSync('vaultUpdated', 'vault-9');
      await vi.advanceTimersByTimeAsync(2000);

      expect(h.transport.saveCalls).toHaveLength(2);
      expect(h.results[1]?.reasons).toEqual(['transactionAdded', 'vaultUpdated']);
      expect(h.results[1]?.details).toEqual(['tx-1', 'vault-9']);
    });

    it('merges a failed run with work that arrived mid-flight', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.saveDelayMs = 5000;
      h.transport.failNextSaves(new Error('User is not signed in'));

      const run = h.coordinator.forceSync();
      await settle();
      h.coordinator.scheduleSync('vaultDeleted');
      await vi.advanceTimersByTimeAsync(5000);
      await run;

      expect(h.coordinator.currentStatus).toBe('scheduled');

      await vi.advanceTimersByTimeAsync(2000);
      await vi.advanceTimersByTimeAsync(5000);

      expect(h.transport.saveCalls).toHaveLength(2);
      expect(h.results[1]?.reasons).toEqual(['manual', 'vaultDeleted']);
      expect(h.statuses).toEqual([
        'syncing',
        'error',
        'scheduled',
        'syncing',
        'success',
      ]);
    });

    it('lets cancelPendingSync drop the reasons of a failed run', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.failNextSaves(new Error('User is not signed in'));

      await h.coordinator.forceSync();
      await vi.advanceTimersByTimeAsync(5000);
      h.coordinator.cancelPendingSync();

      expect(h.coordinator.pendingRequest).toBeNull();
      expect(h.statuses).toEqual(['syncing', 'error', 'idle']);
    });
  });

  // ============================================
  // Pre-flight failures
  // ============================================

  describe('pre-flight guard', () => {
    it('fails on an invalid file name without calling the transport', async () => {
      const h = createHarness({ cloud: { vaultsFileName: '../etc' } });
      coordinator = h.coordinator;

      await h.coordinator.forceSync();

      expect(h.transport.saveCalls).toHaveLength(0);
      expect(h.results[0]?.error?.kind).toBe('invalidFileName');
      expect(h.results[0]?.attempts).toHaveLength(1);
    });

    it('fails on oversized data without calling the transport', async () => {
      const h = createHarness({ cloud: { maxDataSizeBytes: 100 } });
      coordinator = h.coordinator;

      await h.coordinator.forceSync();

      expect(h.transport.saveCalls).toHaveLength(0);
      expect(h.results[0]?.error?.kind).toBe('quotaExceeded');
    });
  });

  // ============================================
  // Cancellation
  // ============================================

  describe('cancelPendingSync', () => {
    it('is idempotent', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      h.coordinator.scheduleSync('transactionAdded');
      h.coordinator.cancelPendingSync();
      h.coordinator.cancelPendingSync();

      expect(h.statuses).toEqual(['scheduled', 'idle']);
      expect(h.coordinator.pendingRequest).toBeNull();
      expect(h.coordinator.isSyncScheduled).toBe(false);

      await vi.advanceTimersByTimeAsync(300000);

      expect(h.transport.saveCalls).toHaveLength(0);
      expect(h.statuses).toEqual(['scheduled', 'idle']);
    });

    it('does nothing when idle', () => {
      const h = createHarness();
      coordinator = h.coordinator;

      h.coordinator.cancelPendingSync();

      expect(h.statuses).toEqual([]);
    });

    it('clears pending work but leaves an in-flight sync running', async () => {
      const h = createHarness();
      coordinator = h.coordinator;
      h.transport.saveDelayMs = 5000;

      const run = h.coordinator.forceSync();
      await settle();
      h.coordinator.scheduleSync('vaultDeleted');
      h.coordinator.cancelPendingSync();

      expect(h.coordinator.currentStatus).toBe('syncing');
      expect(h.coordinator.pendingRequest).toBeNull();

      await vi.advanceTimersByTimeAsync(5000);
      await run;
      await vi.advanceTimersByTimeAsync(300000);

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.statuses).toEqual(['syncing', 'success', 'idle']);
    });

    it('returns a decaying status straight to idle', async () => {
      const h = createHarness();
      coordinator = h.coordinator;

      await h.coordinator.forceSync();
      h.coordinator.cancelPendingSync();

      expect(h.statuses).toEqual(['syncing', 'success', 'idle']);

      await vi.advanceTimersByTimeAsync(2000);
      expect(h.statuses).toEqual(['syncing', 'success', 'idle']);
    });
  });

  // ============================================
  // Lifecycle
  // ============================================

  describe('dispose', () => {
    it('cancels timers and ignores later commands', async () => {
      const h = createHarness();

      h.coordinator.scheduleSync('transactionAdded');
      h.coordinator.dispose();
      h.coordinator.dispose();
      h.coordinator.scheduleSync('transactionAdded');
      await h.coordinator.forceSync();
      await vi.advanceTimersByTimeAsync(300000);

      expect(h.coordinator.isDisposed).toBe(true);
      expect(h.transport.saveCalls).toHaveLength(0);
      expect(h.statuses).toEqual(['scheduled']);
    });

    it('aborts a retry wait', async () => {
      const h = createHarness();
      h.transport.failNextSaves(new Error('network down'));

      const run = h.coordinator.forceSync();
      await settle();
      h.coordinator.dispose();
      await run;
      await vi.advanceTimersByTimeAsync(60000);

      expect(h.transport.saveCalls).toHaveLength(1);
      expect(h.results).toEqual([]);
    });
  });

  it('does not hold the process open with the safety net', () => {
    vi.useRealTimers();
    const setTimeoutSpy = vi.spyOn(globalThis, 'setTimeout');
    const h = createHarness();
    coordinator = h.coordinator;

    h.coordinator.scheduleSync('transactionAdded');

    const [debounce, safetyNet] = setTimeoutSpy.mock.results.map(
      (result): unknown => result.value
    );
    expect(setTimeoutSpy.mock.calls.map((call) => call[1])).toEqual([
      2000, 300000,
    ]);
    expect(timerHasRef(debounce)).toBe(true);
    expect(timerHasRef(safetyNet)).toBe(false);
  });

  it('rejects an unusable config at construction', () => {
    const options: SyncCoordinatorOptions = {
      executor: new ScriptedExecutor(),
      config: { maxSyncAttempts: 0 },
    };

    expect(() => createSyncCoordinator(options)).toThrow(ConfigError);
  });
});
