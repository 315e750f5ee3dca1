import { BlobStorage, StorageArea } from './storage.interface.js';
import { LocalBlobStorage } from './local-storage.service.js';
import { S3BlobStorage } from './s3-storage.service.js';
import { getEnvironment } from '../../config/environment.js';

/**
 * Creates the storage backing one area (fetch cache or exhibit batches)
 * based on environment configuration
 */
export function createBlobStorage(area: StorageArea): BlobStorage {
  const env = getEnvironment();
  const root = area === 'cache' ? env.EDGAR_CACHE_PATH : env.EDGAR_OUTPUT_PATH;

  if (env.EDGAR_STORAGE_TYPE === 's3') {
    return new S3BlobStorage(root);
  }

  return new LocalBlobStorage(root);
}
