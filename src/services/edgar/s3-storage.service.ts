import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { BlobStorage } from './storage.interface.js';
import { getEnvironment } from '../../config/environment.js';
import { ConfigurationError, StorageError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';

/**
 * S3-compatible implementation of BlobStorage
 * Compatible with AWS S3, DigitalOcean Spaces and other S3 endpoints.
 * A single PutObject is atomic, so batches are never visible half-written.
 */
export class S3BlobStorage implements BlobStorage {
  private client: S3Client;
  private bucket: string;
  private logger;

  constructor(private readonly prefix: string) {
    const env = getEnvironment();

    if (!env.EDGAR_S3_BUCKET) {
      throw new ConfigurationError('EDGAR_S3_BUCKET must be set when using S3 storage');
    }

    if (!env.EDGAR_S3_ACCESS_KEY || !env.EDGAR_S3_SECRET_KEY) {
      throw new ConfigurationError(
        'EDGAR_S3_ACCESS_KEY and EDGAR_S3_SECRET_KEY must be set when using S3 storage',
      );
    }

    this.bucket = env.EDGAR_S3_BUCKET;
    this.logger = getLogger();

    this.client = new S3Client({
      endpoint: env.EDGAR_S3_ENDPOINT,
      region: env.EDGAR_S3_REGION || 'us-east-1',
      credentials: {
        accessKeyId: env.EDGAR_S3_ACCESS_KEY,
        secretAccessKey: env.EDGAR_S3_SECRET_KEY,
      },
    });
  }

  async save(relativePath: string, content: Buffer): Promise<void> {
    const key = this.keyFor(relativePath);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: content,
          ContentType: this.getContentType(relativePath),
        }),
      );
    } catch (error) {
      this.logger.error({ key, error, bucket: this.bucket }, 'Failed to save blob to S3');
      throw new StorageError('save', key, error);
    }

    this.logger.debug({ key, size: content.length, bucket: this.bucket }, 'Saved blob to S3 storage');
  }

  async read(relativePath: string): Promise<Buffer> {
    const key = this.keyFor(relativePath);

    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        }),
      );

      if (!response.Body) {
        throw new Error('Empty response body from S3');
      }

      const content = Buffer.from(await response.Body.transformToByteArray());

      this.logger.debug({ key, size: content.length, bucket: this.bucket }, 'Read blob from S3 storage');

      return content;
    } catch (error) {
      this.logger.error({ key, error, bucket: this.bucket }, 'Failed to read blob from S3');
      throw new StorageError('read', key, error);
    }
  }

  async exists(relativePath: string): Promise<boolean> {
    const key = this.keyFor(relativePath);

    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: key,
        }),
      );
      return true;
    } catch (error) {
      // HeadObject reports a missing key as a 404 NotFound
      if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) {
        return false;
      }

      this.logger.error({ key, error, bucket: this.bucket }, 'Error checking blob existence in S3');
      throw new StorageError('exists', key, error);
    }
  }

  private keyFor(relativePath: string): string {
    const prefix = this.prefix.replace(/^\/+|\/+$/g, '');
    return prefix ? `${prefix}/${relativePath}` : relativePath;
  }

  private getContentType(path: string): string {
    if (path.endsWith('.jsonl')) {
      return 'application/x-ndjson';
    }
    if (path.endsWith('.json')) {
      return 'application/json';
    }
    return 'application/octet-stream';
  }
}
