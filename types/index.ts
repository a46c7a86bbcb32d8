/**
 * FutureProof Type Definitions
 *
 * Usage:
 * ```typescript
 * import type { SyncStatus, Vault } from '@/types';
 * ```
 */

// ============================================
// Local Data Types
// ============================================

export type {
  VaultId,
  TransactionId,
  VaultType,
  Vault,
  Transaction,
  UserSettings,
  RestoredState,
  VaultDataSource,
} from './database';

export { createVaultId, createTransactionId, VAULT_TYPES } from './database';

// ============================================
// Sync Types
// ============================================

export type {
  SyncReason,
  SyncStatus,
  CloudErrorKind,
  ClassifiedError,
  CloudResult,
  PendingSyncRequest,
  SyncAttempt,
  SyncRunResult,
  SyncConfig,
  Unsubscribe,
  SyncStatusListener,
  SyncCompleteListener,
} from './sync';

export {
  DEFAULT_SYNC_CONFIG,
  getSyncReasonLabel,
  getSyncStatusMessage,
  isActiveStatus,
} from './sync';
