/**
 * Interface for the remote backup transport.
 *
 * A transport moves opaque blobs identified by a validated name. Failures
 * surface as rejected promises carrying whatever the underlying store
 * produced; classification happens in the drive service.
 */
export interface RemoteBackupTransport {
  /**
   * Stores a blob under the given name, replacing any previous one.
   */
  save(name: string, blob: string): Promise<void>;

  /**
   * Reads the blob stored under the given name.
   */
  load(name: string): Promise<string>;

  /**
   * Whether a blob exists under the given name.
   */
  exists(name: string): Promise<boolean>;

  /**
   * Removes the blob stored under the given name.
   */
  delete(name: string): Promise<void>;

  /**
   * Names of all stored blobs.
   */
  list(): Promise<string[]>;
}
