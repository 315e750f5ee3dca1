/**
 * Swappable blob storage used for the fetch cache and exhibit batches.
 * Allows switching between the local filesystem and S3-compatible object stores.
 */
export interface BlobStorage {
  /**
   * Write a named blob. The write is all-or-nothing: readers see either the
   * previous blob or the complete new one.
   * @param path - Relative path within storage (e.g., "3f2a...e1.jsonl")
   */
  save(path: string, content: Buffer): Promise<void>;

  /**
   * @throws StorageError when the blob is missing or unreadable
   */
  read(path: string): Promise<Buffer>;

  exists(path: string): Promise<boolean>;
}

export type StorageArea = 'cache' | 'output';
