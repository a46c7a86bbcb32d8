/**
 * Local Data Types for FutureProof
 *
 * Shapes of the application state the backup assembler reads and restores.
 * Storage mechanics live outside this package; these are the records a
 * data source hands over.
 */

// ============================================
// Branded Types for Type Safety
// ============================================

/** Unique identifier for vaults */
export type VaultId = string & { readonly __brand: 'VaultId' };

/** Unique identifier for transactions */
export type TransactionId = string & { readonly __brand: 'TransactionId' };

// ============================================
// Helper Functions for Branded Types
// ============================================

export function createVaultId(id: string): VaultId {
  return id as VaultId;
}

export function createTransactionId(id: string): TransactionId {
  return id as TransactionId;
}

// ============================================
// Vault
// ============================================

/**
 * Kind of vault shown in the vault picker.
 */
export type VaultType = 'personal' | 'business' | 'household' | 'savings' | 'custom';

export const VAULT_TYPES: readonly VaultType[] = [
  'personal',
  'business',
  'household',
  'savings',
  'custom',
] as const;

/**
 * A user-defined named container of transactions.
 */
export interface Vault {
  id: VaultId;

  /** Display name ("Personal", "Business") */
  name: string;

  type: VaultType;

  /** Whether this is the vault currently open */
  isActive: boolean;

  /** Cached transaction count */
  transactionCount: number;

  lastModified: Date;
}

// ============================================
// Transaction
// ============================================

/**
 * A single income or expense entry.
 */
export interface Transaction {
  id: TransactionId;

  /** Negative for expenses, positive for income */
  amount: number;

  category: string;

  note: string | null;

  /** When the money moved */
  date: Date;

  /** Household the transaction is shared with ('' when personal) */
  householdId: string;

  createdAt: Date;
}

// ============================================
// Settings
// ============================================

/**
 * Flat user settings carried along in backups.
 */
export type UserSettings = Record<string, string | number | boolean | null>;

// ============================================
// Data Source
// ============================================

/**
 * Application state as restored from a backup.
 */
export interface RestoredState {
  vaults: Array<{ vault: Vault; transactions: Transaction[] }>;
  settings: UserSettings | null;
}

/**
 * Boundary to the application's storage. The backup assembler reads the
 * full current state through it and writes restored state back.
 */
export interface VaultDataSource {
  getVaults(): Promise<Vault[]>;
  getTransactions(vaultId: VaultId): Promise<Transaction[]>;
  getSettings(): Promise<UserSettings | null>;
  restore(state: RestoredState): Promise<void>;
}
