import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { BlobStorage } from './storage.interface.js';
import { StorageError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';

/**
 * Local filesystem implementation of BlobStorage rooted at one directory
 */
export class LocalBlobStorage implements BlobStorage {
  private logger;

  constructor(private readonly basePath: string) {
    this.logger = getLogger();
  }

  async save(relativePath: string, content: Buffer): Promise<void> {
    const fullPath = this.resolve(relativePath);
    const tempPath = `${fullPath}.${crypto.randomBytes(6).toString('hex')}.tmp`;

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(tempPath, content);
      await fs.rename(tempPath, fullPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      this.logger.error({ path: relativePath, error }, 'Failed to save blob to local storage');
      throw new StorageError('save', relativePath, error);
    }

    this.logger.debug({ path: relativePath, size: content.length }, 'Saved blob to local storage');
  }

  async read(relativePath: string): Promise<Buffer> {
    try {
      const content = await fs.readFile(this.resolve(relativePath));
      this.logger.debug({ path: relativePath, size: content.length }, 'Read blob from local storage');
      return content;
    } catch (error) {
      this.logger.error({ path: relativePath, error }, 'Failed to read blob from local storage');
      throw new StorageError('read', relativePath, error);
    }
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(relativePath));
      return true;
    } catch {
      return false;
    }
  }

  private resolve(relativePath: string): string {
    return path.join(this.basePath, relativePath);
  }
}
