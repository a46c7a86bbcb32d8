/**
 * Sync Context
 *
 * Builds the cloud sync stack once at start-up and wires its parts together:
 * drive service, backup service, coordinator, retry queue and status store.
 * `dispose()` tears all of it down.
 */

import { CloudDriveService } from '@/lib/cloud/cloud-drive-service';
import type { ErrorClassifier } from '@/lib/cloud/error-classifier';
import { FileDriveTransport } from '@/lib/cloud/file-drive-transport';
import type { RemoteBackupTransport } from '@/lib/cloud/transport';
import {
  loadCloudConfig,
  loadSyncConfig,
  type CloudConfig,
} from '@/lib/config/cloud-config';
import { ConfigError } from '@/lib/errors';
import { BackupService, type RestoreSummary } from '@/lib/export/backup-service';
import {
  MemoryPreferences,
  type PreferencesStore,
} from '@/lib/storage/preferences';
import type { RandomSource } from '@/lib/sync/retry';
import {
  createSyncCoordinator,
  type SyncCoordinator,
} from '@/lib/sync/sync-coordinator';
import { SyncQueue, type SyncOperation } from '@/lib/sync/sync-queue';
import {
  bindSyncStore,
  createSyncStore,
  type SyncStoreApi,
} from '@/stores/syncStore';
import type { VaultDataSource } from '@/types/database';
import type { CloudResult, SyncConfig } from '@/types/sync';

// ============================================
// Types
// ============================================

export interface SyncContextOptions {
  dataSource: VaultDataSource;

  /** Defaults to a FileDriveTransport on `cloudConfig.driveDirectory` */
  transport?: RemoteBackupTransport;

  /** Defaults to in-memory preferences */
  preferences?: PreferencesStore;

  /** Source of FUTUREPROOF_* overrides; defaults to process.env */
  env?: Record<string, string | undefined>;

  syncConfig?: Partial<SyncConfig>;
  cloudConfig?: Partial<CloudConfig>;
  classifier?: ErrorClassifier;
  random?: RandomSource;
  appVersion?: string;

  /** Long-running failure report from the retry queue */
  onPersistentFailure?: (message: string) => void;
}

export interface SyncContext {
  readonly drive: CloudDriveService;
  readonly backup: BackupService;
  readonly coordinator: SyncCoordinator;
  readonly queue: SyncQueue;
  readonly store: SyncStoreApi;
  readonly preferences: PreferencesStore;

  /** Restore from the cloud; retryable failures are queued */
  restoreFromCloud(): Promise<CloudResult<RestoreSummary>>;

  dispose(): void;
}

// ============================================
// Factory
// ============================================

/**
 * Build and wire the sync stack.
 *
 * @throws ConfigError when no transport is given and no drive directory is configured
 */
export async function createSyncContext(
  options: SyncContextOptions
): Promise<SyncContext> {
  const env = options.env ?? process.env;
  const cloudConfig: CloudConfig = {
    ...loadCloudConfig(env),
    ...options.cloudConfig,
  };

  let transport = options.transport;
  if (!transport) {
    if (!cloudConfig.driveDirectory) {
      throw new ConfigError(
        'No cloud drive configured: set FUTUREPROOF_CLOUD_DIR or pass a transport'
      );
    }
    transport = new FileDriveTransport(cloudConfig.driveDirectory);
  }

  const preferences = options.preferences ?? new MemoryPreferences();
  const drive = new CloudDriveService({
    transport,
    preferences,
    config: cloudConfig,
    classifier: options.classifier,
  });
  const backup = new BackupService({
    dataSource: options.dataSource,
    drive,
    appVersion: options.appVersion,
  });

  const coordinator = createSyncCoordinator({
    executor: backup,
    config: { ...loadSyncConfig(env), ...options.syncConfig },
    classifier: options.classifier,
    random: options.random,
    initialLastSyncTime: await drive.getLastSyncTime(),
  });

  const store = createSyncStore();
  const unbindStore = bindSyncStore(store, coordinator);

  const restoreFromCloud = async (): Promise<CloudResult<RestoreSummary>> => {
    const result = await backup.restoreFromCloud();
    if (result.success) {
      queue.markSucceeded('restore');
    } else if (result.error.retryable) {
      queue.enqueue('restore', result.error.message);
    }
    return result;
  };

  const retry = (operation: SyncOperation): void => {
    if (operation === 'restore') {
      restoreFromCloud().catch((error) => {
        console.error('[SyncContext] Queued restore failed:', error);
      });
      return;
    }
    coordinator.forceSync().catch((error) => {
      console.error('[SyncContext] Queued sync failed:', error);
    });
  };

  const queue = new SyncQueue({
    onRetry: retry,
    onError:
      options.onPersistentFailure ??
      ((message) => console.error(`[SyncContext] ${message}`)),
  });

  const unsubscribeResults = coordinator.onSyncComplete((result) => {
    if (result.success) {
      queue.markSucceeded('sync');
    } else if (result.error?.retryable) {
      queue.enqueue('sync', result.error.message);
    }
  });

  console.log('[SyncContext] Cloud sync ready');

  let disposed = false;

  return {
    drive,
    backup,
    coordinator,
    queue,
    store,
    preferences,
    restoreFromCloud,
    dispose: () => {
      if (disposed) {
        return;
      }
      disposed = true;
      unsubscribeResults();
      unbindStore();
      queue.dispose();
      coordinator.dispose();
      console.log('[SyncContext] Disposed');
    },
  };
}
