/**
 * Cloud Sync Configuration
 *
 * Storage constants for the cloud drive and environment overrides for the
 * coordinator's timing policy.
 */

import { ConfigError } from '@/lib/errors';
import { DEFAULT_SYNC_CONFIG, type SyncConfig } from '@/types/sync';

// ============================================
// Cloud Drive Configuration
// ============================================

export interface CloudConfig {
  /** Drive file holding vaults, transactions and settings */
  vaultsFileName: string;

  /** Drive file holding settings only */
  settingsFileName: string;

  /** Hard ceiling on a serialized blob, in bytes */
  maxDataSizeBytes: number;

  /** Lower bound of serialized bytes per transaction, for the pre-flight estimate */
  minTransactionBytes: number;

  /** Preference key of the last successful transfer (ISO string) */
  lastSyncKey: string;

  /** Preference key of the enabled flag */
  enabledKey: string;

  /** Root directory of the file drive transport, when one is used */
  driveDirectory: string | null;
}

export const DEFAULT_CLOUD_CONFIG: CloudConfig = {
  vaultsFileName: 'vaults',
  settingsFileName: 'settings',
  maxDataSizeBytes: 10 * 1024 * 1024, // 10 MiB
  minTransactionBytes: 128,
  lastSyncKey: 'cloud_last_sync',
  enabledKey: 'cloud_enabled',
  driveDirectory: null,
} as const;

// ============================================
// Environment Overrides
// ============================================

type Env = Record<string, string | undefined>;

const SYNC_ENV_KEYS: Record<
  Exclude<keyof SyncConfig, 'retryJitterRatio'>,
  string
> = {
  debounceDelayMs: 'FUTUREPROOF_SYNC_DEBOUNCE_MS',
  maxSyncIntervalMs: 'FUTUREPROOF_SYNC_MAX_INTERVAL_MS',
  maxSyncAttempts: 'FUTUREPROOF_SYNC_MAX_ATTEMPTS',
  retryDelayBaseMs: 'FUTUREPROOF_SYNC_RETRY_BASE_MS',
  maxRetryDelayMs: 'FUTUREPROOF_SYNC_RETRY_MAX_MS',
  successStatusResetMs: 'FUTUREPROOF_SYNC_SUCCESS_RESET_MS',
  errorStatusResetMs: 'FUTUREPROOF_SYNC_ERROR_RESET_MS',
};

/**
 * Parse an integer env value. Returns null (with a warning) when the value
 * is set but unusable, undefined when it is not set at all.
 */
function readInteger(
  env: Env,
  key: string,
  minimum: number
): number | null | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < minimum) {
    console.warn(
      `[Config] Ignoring ${key}=${raw}: expected an integer >= ${minimum}`
    );
    return null;
  }
  return value;
}

/**
 * Build the coordinator config from defaults and FUTUREPROOF_SYNC_* variables.
 */
export function loadSyncConfig(env: Env = process.env): SyncConfig {
  const config: SyncConfig = { ...DEFAULT_SYNC_CONFIG };

  for (const [field, key] of Object.entries(SYNC_ENV_KEYS)) {
    const minimum = field === 'maxSyncAttempts' ? 1 : 0;
    const value = readInteger(env, key, minimum);
    if (typeof value === 'number') {
      Object.assign(config, { [field]: value });
    }
  }

  return config;
}

/**
 * Build the drive config from defaults and FUTUREPROOF_CLOUD_* variables.
 */
export function loadCloudConfig(env: Env = process.env): CloudConfig {
  const config: CloudConfig = { ...DEFAULT_CLOUD_CONFIG };

  const directory = env.FUTUREPROOF_CLOUD_DIR?.trim();
  if (directory) {
    config.driveDirectory = directory;
  }

  const maxBytes = readInteger(env, 'FUTUREPROOF_CLOUD_MAX_BYTES', 1);
  if (typeof maxBytes === 'number') {
    config.maxDataSizeBytes = maxBytes;
  }

  return config;
}

/**
 * Reject configurations the coordinator cannot run with.
 */
export function validateSyncConfig(config: SyncConfig): void {
  const delays: Array<keyof SyncConfig> = [
    'debounceDelayMs',
    'maxSyncIntervalMs',
    'retryDelayBaseMs',
    'maxRetryDelayMs',
    'successStatusResetMs',
    'errorStatusResetMs',
  ];

  for (const field of delays) {
    if (!Number.isFinite(config[field]) || config[field] < 0) {
      throw new ConfigError(`${field} must be a non-negative number`);
    }
  }

  if (!Number.isInteger(config.maxSyncAttempts) || config.maxSyncAttempts < 1) {
    throw new ConfigError('maxSyncAttempts must be an integer >= 1');
  }

  if (config.maxRetryDelayMs < config.retryDelayBaseMs) {
    throw new ConfigError('maxRetryDelayMs must not be below retryDelayBaseMs');
  }

  if (config.retryJitterRatio < 0 || config.retryJitterRatio > 1) {
    throw new ConfigError('retryJitterRatio must be between 0 and 1');
  }
}
