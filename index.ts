/**
 * FutureProof Cloud Sync
 *
 * Public entry point. Most applications only need `createSyncContext`.
 */

export * from '@/types';

export {
  FutureProofError,
  StorageError,
  BackupValidationError,
  ConfigError,
  CloudDriveError,
  unwrapCloudResult,
  handleError,
} from '@/lib/errors';

export {
  DEFAULT_CLOUD_CONFIG,
  loadCloudConfig,
  loadSyncConfig,
  validateSyncConfig,
  type CloudConfig,
} from '@/lib/config/cloud-config';

export * from '@/lib/cloud';
export * from '@/lib/export';
export * from '@/lib/sync';

export {
  FilePreferences,
  MemoryPreferences,
  type PreferencesStore,
  type PreferenceValue,
} from '@/lib/storage/preferences';

export {
  createSyncStore,
  bindSyncStore,
  calculateSyncStats,
  formatTimeSinceSync,
  type SyncStore,
  type SyncStoreApi,
  type SyncHistoryEntry,
  type SyncStats,
} from '@/stores/syncStore';

export {
  createSyncContext,
  type SyncContext,
  type SyncContextOptions,
} from '@/lib/sync-context';
