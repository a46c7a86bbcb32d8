/**
 * Backup Module for FutureProof
 *
 * Backup document assembly, validation and restore.
 */

export {
  BackupService,
  BACKUP_VERSION,
  DEFAULT_APP_VERSION,
  toRestoredState,
  validateBackup,
  type BackupData,
  type BackupServiceOptions,
  type CloudSyncExecutor,
  type RestoreSummary,
  type TransactionBackupData,
  type VaultBackupData,
} from './backup-service';
