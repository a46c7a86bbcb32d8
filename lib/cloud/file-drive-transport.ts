/**
 * File Drive Transport
 *
 * Stores backup blobs as `<root>/<name>.json` inside a drive directory,
 * typically a locally mounted cloud drive folder that the OS syncs.
 * Writes go through a temp file and a rename so a reader never sees a
 * half-written blob.
 */

import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { isNotFoundError } from '@/lib/errors';
import type { RemoteBackupTransport } from './transport';

const BLOB_EXTENSION = '.json';

export class FileDriveTransport implements RemoteBackupTransport {
  constructor(private readonly rootDirectory: string) {}

  private pathFor(name: string): string {
    return path.join(this.rootDirectory, `${name}${BLOB_EXTENSION}`);
  }

  async save(name: string, blob: string): Promise<void> {
    await mkdir(this.rootDirectory, { recursive: true });

    const target = this.pathFor(name);
    const temp = `${target}.${uuidv4()}.tmp`;

    try {
      await writeFile(temp, blob, 'utf8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async load(name: string): Promise<string> {
    return readFile(this.pathFor(name), 'utf8');
  }

  async exists(name: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(name));
      return info.isFile();
    } catch (error) {
      console.debug('[FileDriveTransport] exists check failed:', error);
      return false;
    }
  }

  async delete(name: string): Promise<void> {
    await rm(this.pathFor(name));
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.rootDirectory);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.endsWith(BLOB_EXTENSION))
      .map((entry) => entry.slice(0, -BLOB_EXTENSION.length))
      .sort();
  }
}
