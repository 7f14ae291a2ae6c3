import { Readable } from 'stream';

export interface StoreOptions {
  contentType?: string;
}

/**
 * Durable storage for confirmed attachment bytes. Implementations reject on
 * I/O failure; callers do not retry.
 */
export interface StorageBackend {
  /** Copies the file at `sourcePath` to `destinationKey`. */
  store(sourcePath: string, destinationKey: string, options?: StoreOptions): Promise<void>;

  /** Removes the stored file. A key that does not exist is not an error. */
  delete(destinationKey: string): Promise<void>;

  /** Opens the stored bytes. */
  retrieve(destinationKey: string): Promise<Readable>;
}
