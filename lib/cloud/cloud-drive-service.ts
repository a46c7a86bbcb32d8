/**
 * Cloud Drive Service
 *
 * Wraps a RemoteBackupTransport with the pre-flight guard and error
 * classification. Every operation resolves to a CloudResult; nothing here
 * throws to the caller.
 */

import { DEFAULT_CLOUD_CONFIG, type CloudConfig } from '@/lib/config/cloud-config';
import {
  getBooleanPreference,
  getDatePreference,
  type PreferencesStore,
} from '@/lib/storage/preferences';
import type { UserSettings } from '@/types/database';
import type { ClassifiedError, CloudResult } from '@/types/sync';
import { checkFileName, checkPayload } from './backup-guard';
import {
  createClassifiedError,
  defaultErrorClassifier,
  type ErrorClassifier,
} from './error-classifier';
import type { RemoteBackupTransport } from './transport';

// ============================================
// Types
// ============================================

export interface CloudDriveServiceOptions {
  transport: RemoteBackupTransport;
  preferences: PreferencesStore;
  config?: Partial<CloudConfig>;
  classifier?: ErrorClassifier;
}

interface TransferOptions {
  /** Record the transfer as the last successful sync */
  updateSyncTime: boolean;
}

function ok<T>(data: T): CloudResult<T> {
  return { success: true, data };
}

function fail<T>(error: ClassifiedError): CloudResult<T> {
  return { success: false, error };
}

// ============================================
// Service
// ============================================

export class CloudDriveService {
  private readonly transport: RemoteBackupTransport;
  private readonly preferences: PreferencesStore;
  private readonly classifier: ErrorClassifier;
  readonly config: CloudConfig;

  constructor(options: CloudDriveServiceOptions) {
    this.transport = options.transport;
    this.preferences = options.preferences;
    this.classifier = options.classifier ?? defaultErrorClassifier;
    this.config = { ...DEFAULT_CLOUD_CONFIG, ...options.config };
  }

  // ---------- Preferences ----------

  async isEnabled(): Promise<boolean> {
    return getBooleanPreference(this.preferences, this.config.enabledKey, false);
  }

  async setEnabled(enabled: boolean): Promise<void> {
    await this.preferences.set(this.config.enabledKey, enabled);
    console.log(`[CloudDrive] Cloud sync ${enabled ? 'enabled' : 'disabled'}`);
  }

  /**
   * Time of the last successful vaults transfer, or null when unknown.
   */
  async getLastSyncTime(): Promise<Date | null> {
    return getDatePreference(this.preferences, this.config.lastSyncKey);
  }

  private async updateLastSyncTime(): Promise<void> {
    try {
      await this.preferences.set(
        this.config.lastSyncKey,
        new Date().toISOString()
      );
    } catch (error) {
      // The transfer itself succeeded; only the bookkeeping is lost
      console.error('[CloudDrive] Failed to record last sync time:', error);
    }
  }

  // ---------- Internal transfer helpers ----------

  private classify(rawError: unknown, operation: string): ClassifiedError {
    const classified = this.classifier.classify(rawError);
    console.error(
      `[CloudDrive] ${operation} failed (${classified.kind}):`,
      classified.technicalDetails ?? classified.message
    );
    return classified;
  }

  private async saveToFile(
    fileName: string,
    payload: string,
    options: TransferOptions
  ): Promise<CloudResult<void>> {
    const guardFailure =
      checkFileName(fileName) ??
      checkPayload(payload, this.config.maxDataSizeBytes);
    if (guardFailure) {
      console.warn(
        `[CloudDrive] Refusing to save ${fileName}: ${guardFailure.kind}`
      );
      return fail(guardFailure);
    }

    try {
      await this.transport.save(fileName, payload);
    } catch (error) {
      return fail(this.classify(error, `Save ${fileName}`));
    }

    if (options.updateSyncTime) {
      await this.updateLastSyncTime();
    }
    console.log(
      `[CloudDrive] Saved ${fileName} (${Buffer.byteLength(payload, 'utf8')} bytes)`
    );
    return ok(undefined);
  }

  private async loadFromFile(
    fileName: string,
    options: TransferOptions
  ): Promise<CloudResult<string>> {
    const nameFailure = checkFileName(fileName);
    if (nameFailure) {
      return fail(nameFailure);
    }

    let payload: string;
    try {
      payload = await this.transport.load(fileName);
    } catch (error) {
      return fail(this.classify(error, `Load ${fileName}`));
    }

    if (payload.trim().length === 0) {
      return fail(createClassifiedError('fileNotFound'));
    }

    if (options.updateSyncTime) {
      await this.updateLastSyncTime();
    }
    return ok(payload);
  }

  // ---------- Vaults ----------

  /**
   * Save the serialized vaults backup.
   */
  async saveVaults(payload: string): Promise<CloudResult<void>> {
    return this.saveToFile(this.config.vaultsFileName, payload, {
      updateSyncTime: true,
    });
  }

  /**
   * Load the serialized vaults backup. Parsing is left to the caller.
   */
  async loadVaults(): Promise<CloudResult<string>> {
    return this.loadFromFile(this.config.vaultsFileName, {
      updateSyncTime: true,
    });
  }

  /**
   * Whether a vaults backup exists. Any failure reads as false.
   */
  async vaultsExist(): Promise<boolean> {
    try {
      return await this.transport.exists(this.config.vaultsFileName);
    } catch (error) {
      console.warn('[CloudDrive] Existence check failed:', error);
      return false;
    }
  }

  async deleteVaults(): Promise<CloudResult<void>> {
    try {
      await this.transport.delete(this.config.vaultsFileName);
      console.log('[CloudDrive] Deleted vaults backup');
      return ok(undefined);
    } catch (error) {
      return fail(this.classify(error, 'Delete vaults'));
    }
  }

  async listFiles(): Promise<CloudResult<string[]>> {
    try {
      return ok(await this.transport.list());
    } catch (error) {
      return fail(this.classify(error, 'List files'));
    }
  }

  // ---------- Settings ----------

  /**
   * Save settings on their own. Does not count as a sync.
   */
  async saveSettings(settings: UserSettings): Promise<CloudResult<void>> {
    const payload =
      Object.keys(settings).length === 0 ? '' : JSON.stringify(settings);
    return this.saveToFile(this.config.settingsFileName, payload, {
      updateSyncTime: false,
    });
  }

  async loadSettings(): Promise<CloudResult<UserSettings>> {
    const loaded = await this.loadFromFile(this.config.settingsFileName, {
      updateSyncTime: false,
    });
    if (!loaded.success) {
      return loaded;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(loaded.data);
    } catch (error) {
      return fail(
        createClassifiedError('unknown', {
          message: 'Cloud settings are corrupted.',
          retryable: false,
          technicalDetails: error instanceof Error ? error.message : String(error),
        })
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return fail(
        createClassifiedError('unknown', {
          message: 'Cloud settings are corrupted.',
          retryable: false,
        })
      );
    }

    const settings: UserSettings = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
      ) {
        settings[key] = value;
      }
    }
    return ok(settings);
  }
}
