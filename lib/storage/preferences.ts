/**
 * Preferences Storage
 *
 * Small key/value store for cloud sync bookkeeping (enabled flag, last
 * successful transfer). Two implementations: in-memory for tests and
 * embedding, and a JSON file for persistence across restarts.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { StorageError, isNotFoundError } from '@/lib/errors';

// ============================================
// Types
// ============================================

export type PreferenceValue = string | number | boolean;

export interface PreferencesStore {
  get(key: string): Promise<PreferenceValue | null>;
  set(key: string, value: PreferenceValue): Promise<void>;
  remove(key: string): Promise<void>;
}

// ============================================
// In-memory Implementation
// ============================================

export class MemoryPreferences implements PreferencesStore {
  private values = new Map<string, PreferenceValue>();

  constructor(initial?: Record<string, PreferenceValue>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.values.set(key, value);
      }
    }
  }

  async get(key: string): Promise<PreferenceValue | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: PreferenceValue): Promise<void> {
    this.values.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.values.delete(key);
  }
}

// ============================================
// JSON File Implementation
// ============================================

function isPreferenceValue(value: unknown): value is PreferenceValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Persists preferences as one JSON object. The file is read lazily on first
 * access and rewritten through a temp file on every change.
 */
export class FilePreferences implements PreferencesStore {
  private cache: Promise<Map<string, PreferenceValue>> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private load(): Promise<Map<string, PreferenceValue>> {
    if (!this.cache) {
      this.cache = this.readFromDisk();
      // A failed read is retried on next access
      this.cache.catch(() => {
        this.cache = null;
      });
    }
    return this.cache;
  }

  private async readFromDisk(): Promise<Map<string, PreferenceValue>> {
    const values = new Map<string, PreferenceValue>();
    let raw: string | null = null;

    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw new StorageError(
          `Failed to read preferences: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      console.debug('[Preferences] No preferences file yet:', this.filePath);
    }

    if (raw !== null) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw new StorageError(
          `Preferences file is corrupted: ${error instanceof Error ? error.message : String(error)}`
        );
      }

      if (typeof parsed === 'object' && parsed !== null) {
        for (const [key, value] of Object.entries(parsed)) {
          if (isPreferenceValue(value)) {
            values.set(key, value);
          }
        }
      }
    }

    return values;
  }

  private persist(values: Map<string, PreferenceValue>): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(values), null, 2);

    const write = async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const temp = `${this.filePath}.${uuidv4()}.tmp`;
      try {
        await writeFile(temp, snapshot, 'utf8');
        await rename(temp, this.filePath);
      } catch (error) {
        await rm(temp, { force: true });
        throw new StorageError(
          `Failed to write preferences: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    };

    // Serialize writes so an older snapshot never lands last
    const next = this.writeChain.then(write, write);
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  async get(key: string): Promise<PreferenceValue | null> {
    const values = await this.load();
    return values.get(key) ?? null;
  }

  async set(key: string, value: PreferenceValue): Promise<void> {
    const values = await this.load();
    values.set(key, value);
    await this.persist(values);
  }

  async remove(key: string): Promise<void> {
    const values = await this.load();
    if (values.delete(key)) {
      await this.persist(values);
    }
  }
}

// ============================================
// Typed Helpers
// ============================================

/**
 * Read an ISO timestamp preference. Missing or unparsable values read as null.
 */
export async function getDatePreference(
  store: PreferencesStore,
  key: string
): Promise<Date | null> {
  const value = await store.get(key);
  if (typeof value !== 'string') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export async function getBooleanPreference(
  store: PreferencesStore,
  key: string,
  fallback: boolean
): Promise<boolean> {
  const value = await store.get(key);
  return typeof value === 'boolean' ? value : fallback;
}
