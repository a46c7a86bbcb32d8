/**
 * Backup Service for FutureProof
 *
 * Serializes every vault with its transactions and the user settings into a
 * single backup document, validates documents coming back, and restores them
 * into the application's data source.
 *
 * The same document format is used for the cloud drive and for local
 * export files.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { format } from 'date-fns';
import { checkEstimatedSize } from '@/lib/cloud/backup-guard';
import type { CloudDriveService } from '@/lib/cloud/cloud-drive-service';
import { createClassifiedError } from '@/lib/cloud/error-classifier';
import { BackupValidationError } from '@/lib/errors';
import {
  VAULT_TYPES,
  createTransactionId,
  createVaultId,
  type RestoredState,
  type Transaction,
  type UserSettings,
  type Vault,
  type VaultDataSource,
  type VaultType,
} from '@/types/database';
import type { CloudResult } from '@/types/sync';

// ============================================
// Types
// ============================================

export const BACKUP_VERSION = '2.0';

export const DEFAULT_APP_VERSION = '2.0.0';

export interface TransactionBackupData {
  id: string;
  amount: number;
  category: string;
  note: string | null;
  date: string;
  householdId: string;
  createdAt: string;
}

export interface VaultBackupData {
  vaultId: string;
  name: string;
  type: VaultType;
  isActive: boolean;
  transactionCount: number;
  lastModified: string;
  transactions: TransactionBackupData[];
}

/**
 * Complete backup document.
 */
export interface BackupData {
  version: string;
  exportDate: string;
  appVersion: string;
  vaultsCount: number;
  vaults: VaultBackupData[];
  settings: UserSettings | null;
}

export interface RestoreSummary {
  vaultsRestored: number;
  transactionsRestored: number;
}

/**
 * The one capability the sync coordinator needs from the assembler.
 */
export interface CloudSyncExecutor {
  triggerCloudSync(): Promise<CloudResult<void>>;
}

export interface BackupServiceOptions {
  dataSource: VaultDataSource;
  drive: CloudDriveService;
  appVersion?: string;
}

// ============================================
// Serialization Helpers
// ============================================

function transactionToBackup(tx: Transaction): TransactionBackupData {
  return {
    id: tx.id,
    amount: tx.amount,
    category: tx.category,
    note: tx.note,
    date: tx.date.toISOString(),
    householdId: tx.householdId,
    createdAt: tx.createdAt.toISOString(),
  };
}

function vaultToBackup(
  vault: Vault,
  transactions: Transaction[]
): VaultBackupData {
  return {
    vaultId: vault.id,
    name: vault.name,
    type: vault.type,
    isActive: vault.isActive,
    transactionCount: vault.transactionCount,
    lastModified: vault.lastModified.toISOString(),
    transactions: transactions.map(transactionToBackup),
  };
}

// ============================================
// Validation Helpers
// ============================================

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: JsonObject, field: string, where: string): string {
  const value = obj[field];
  if (typeof value !== 'string') {
    throw new Error(`${where}: "${field}" must be a string`);
  }
  return value;
}

function requireDateString(
  obj: JsonObject,
  field: string,
  where: string
): string {
  const value = requireString(obj, field, where);
  if (Number.isNaN(new Date(value).getTime())) {
    throw new Error(`${where}: "${field}" is not a valid date`);
  }
  return value;
}

function isVaultType(value: unknown): value is VaultType {
  return VAULT_TYPES.some((type) => type === value);
}

function parseTransaction(raw: unknown, where: string): TransactionBackupData {
  if (!isJsonObject(raw)) {
    throw new Error(`${where} is not an object`);
  }

  const amount = raw.amount;
  if (typeof amount !== 'number' || !Number.isFinite(amount)) {
    throw new Error(`${where}: "amount" must be a number`);
  }

  const note = raw.note;
  const householdId = raw.householdId;

  return {
    id: requireString(raw, 'id', where),
    amount,
    category: requireString(raw, 'category', where),
    note: typeof note === 'string' ? note : null,
    date: requireDateString(raw, 'date', where),
    householdId: typeof householdId === 'string' ? householdId : '',
    createdAt: requireDateString(raw, 'createdAt', where),
  };
}

function parseVault(raw: unknown, index: number): VaultBackupData {
  const where = `vault #${index}`;
  if (!isJsonObject(raw)) {
    throw new Error(`${where} is not an object`);
  }

  const type = raw.type;
  const isActive = raw.isActive;
  const transactionCount = raw.transactionCount;
  const transactions = raw.transactions;

  let rawTransactions: unknown[] = [];
  if (Array.isArray(transactions)) {
    rawTransactions = transactions;
  } else if (transactions !== undefined) {
    throw new Error(`${where}: "transactions" must be an array`);
  }

  return {
    vaultId: requireString(raw, 'vaultId', where),
    name: requireString(raw, 'name', where),
    // Types added by newer app versions fall back to custom
    type: isVaultType(type) ? type : 'custom',
    isActive: typeof isActive === 'boolean' ? isActive : false,
    transactionCount:
      typeof transactionCount === 'number' && Number.isInteger(transactionCount)
        ? transactionCount
        : 0,
    lastModified: requireDateString(raw, 'lastModified', where),
    transactions: rawTransactions.map((tx, txIndex) =>
      parseTransaction(tx, `${where} transaction #${txIndex}`)
    ),
  };
}

function parseSettings(raw: unknown): UserSettings | null {
  if (!isJsonObject(raw)) {
    return null;
  }
  const settings: UserSettings = {};
  for (const [key, value] of Object.entries(raw)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      settings[key] = value;
    }
  }
  return settings;
}

/**
 * Convert a validated backup into domain records.
 */
export function toRestoredState(data: BackupData): RestoredState {
  return {
    vaults: data.vaults.map((vault) => ({
      vault: {
        id: createVaultId(vault.vaultId),
        name: vault.name,
        type: vault.type,
        isActive: vault.isActive,
        transactionCount: vault.transactionCount,
        lastModified: new Date(vault.lastModified),
      },
      transactions: vault.transactions.map((tx) => ({
        id: createTransactionId(tx.id),
        amount: tx.amount,
        category: tx.category,
        note: tx.note,
        date: new Date(tx.date),
        householdId: tx.householdId,
        createdAt: new Date(tx.createdAt),
      })),
    })),
    settings: data.settings,
  };
}

/**
 * Validate and parse a backup document.
 *
 * @throws BackupValidationError
 */
export function validateBackup(json: string): BackupData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new BackupValidationError(
      `Invalid JSON format: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isJsonObject(parsed)) {
    throw new BackupValidationError(
      'Failed to parse backup: expected a JSON object'
    );
  }

  const version = parsed.version;
  if (typeof version !== 'string' || version.length === 0) {
    throw new BackupValidationError('Missing version information');
  }

  const rawVaults = parsed.vaults;
  if (!Array.isArray(rawVaults) || rawVaults.length === 0) {
    throw new BackupValidationError('No vaults found in backup');
  }

  try {
    const vaults = rawVaults.map(parseVault);
    const appVersion = parsed.appVersion;

    return {
      version,
      exportDate: requireDateString(parsed, 'exportDate', 'backup'),
      appVersion: typeof appVersion === 'string' ? appVersion : 'unknown',
      vaultsCount: vaults.length,
      vaults,
      settings: parseSettings(parsed.settings),
    };
  } catch (error) {
    throw new BackupValidationError(
      `Failed to parse backup: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

// ============================================
// Backup Service Implementation
// ============================================

export class BackupService implements CloudSyncExecutor {
  private readonly dataSource: VaultDataSource;
  private readonly drive: CloudDriveService;
  private readonly appVersion: string;

  constructor(options: BackupServiceOptions) {
    this.dataSource = options.dataSource;
    this.drive = options.drive;
    this.appVersion = options.appVersion ?? DEFAULT_APP_VERSION;
  }

  /**
   * Export all vaults, their transactions and the settings.
   */
  async exportAllVaults(): Promise<BackupData> {
    const vaults = await this.dataSource.getVaults();

    const vaultsData: VaultBackupData[] = [];
    for (const vault of vaults) {
      const transactions = await this.dataSource.getTransactions(vault.id);
      vaultsData.push(vaultToBackup(vault, transactions));
    }

    return {
      version: BACKUP_VERSION,
      exportDate: new Date().toISOString(),
      appVersion: this.appVersion,
      vaultsCount: vaults.length,
      vaults: vaultsData,
      settings: await this.dataSource.getSettings(),
    };
  }

  /**
   * Export everything and save it to the cloud drive.
   *
   * Export failures are thrown; drive failures come back as a result.
   */
  async triggerCloudSync(): Promise<CloudResult<void>> {
    const data = await this.exportAllVaults();

    const transactionCount = data.vaults.reduce(
      (sum, vault) => sum + vault.transactions.length,
      0
    );
    const { minTransactionBytes, maxDataSizeBytes } = this.drive.config;
    const estimateFailure = checkEstimatedSize(
      transactionCount,
      minTransactionBytes,
      maxDataSizeBytes
    );
    if (estimateFailure) {
      console.warn(
        `[BackupService] Backup of ${transactionCount} transactions is too large`
      );
      return { success: false, error: estimateFailure };
    }

    console.log(
      `[BackupService] Uploading ${data.vaultsCount} vaults, ${transactionCount} transactions`
    );
    return this.drive.saveVaults(this.getExportAsString(data));
  }

  /**
   * Load the cloud backup, validate it and hand it to the data source.
   */
  async restoreFromCloud(): Promise<CloudResult<RestoreSummary>> {
    const loaded = await this.drive.loadVaults();
    if (!loaded.success) {
      return loaded;
    }

    let data: BackupData;
    try {
      data = validateBackup(loaded.data);
    } catch (error) {
      const message =
        error instanceof BackupValidationError
          ? error.message
          : 'Cloud backup could not be read.';
      console.error('[BackupService] Cloud backup rejected:', message);
      return {
        success: false,
        error: createClassifiedError('unknown', {
          title: 'Invalid Backup',
          message,
          retryable: false,
        }),
      };
    }

    const state = toRestoredState(data);
    try {
      await this.dataSource.restore(state);
    } catch (error) {
      console.error('[BackupService] Restore failed:', error);
      return {
        success: false,
        error: createClassifiedError('unknown', {
          title: 'Restore Failed',
          message: 'Backup was downloaded but could not be restored.',
          retryable: false,
          technicalDetails:
            error instanceof Error ? error.message : String(error),
        }),
      };
    }

    const summary: RestoreSummary = {
      vaultsRestored: state.vaults.length,
      transactionsRestored: state.vaults.reduce(
        (sum, entry) => sum + entry.transactions.length,
        0
      ),
    };
    console.log(
      `[BackupService] Restored ${summary.vaultsRestored} vaults, ${summary.transactionsRestored} transactions`
    );
    return { success: true, data: summary };
  }

  /**
   * Write a backup to `<directory>/futureproof_backup_<yyyy-MM-dd>.json`.
   *
   * @returns The path written
   */
  async saveExportToFile(data: BackupData, directory: string): Promise<string> {
    await mkdir(directory, { recursive: true });
    const fileName = `futureproof_backup_${format(new Date(), 'yyyy-MM-dd')}.json`;
    const filePath = path.join(directory, fileName);
    await writeFile(filePath, this.getExportAsString(data), 'utf8');
    console.log(`[BackupService] Export written to ${filePath}`);
    return filePath;
  }

  getExportAsString(data: BackupData): string {
    return JSON.stringify(data);
  }
}
