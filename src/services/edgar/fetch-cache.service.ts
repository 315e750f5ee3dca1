import { z } from 'zod';
import { BlobStorage } from './storage.interface.js';
import { CACHE_OPERATIONS } from '../../config/constants.js';
import { CacheEntry, ContentFetcher, FetchResult } from '../../types/edgar.types.js';
import { CacheCorruptionError } from '../../utils/errors.js';
import { computeFingerprint, FingerprintValue } from '../../utils/fingerprint.js';
import { getLogger } from '../../utils/logger.js';

const cacheEntrySchema = z.object({
  fingerprint: z.string().regex(/^[a-f0-9]{32}$/),
  value: z.string(),
  createdAt: z.string().datetime(),
});

export interface CachedCallOptions {
  /** Recompute even when a stored value exists, then overwrite it. */
  force?: boolean;
}

/**
 * Fetch Cache
 *
 * Memoises successful fetch outcomes per call fingerprint in persistent
 * storage, so reruns of the crawl skip anything already retrieved. Failures
 * are handed back to the caller and never stored.
 *
 * The store assumes a single writer; two processes sharing one cache
 * directory need outside coordination.
 */
export class FetchCache {
  private logger;

  constructor(private readonly storage: BlobStorage) {
    this.logger = getLogger();
  }

  async cached(
    op: string,
    args: readonly FingerprintValue[],
    kwargs: Readonly<Record<string, unknown>>,
    compute: () => Promise<FetchResult<Buffer>>,
    options: CachedCallOptions = {},
  ): Promise<FetchResult<Buffer>> {
    const fingerprint = computeFingerprint(op, args, kwargs);

    if (!options.force) {
      const hit = await this.get(fingerprint);
      if (hit) {
        this.logger.trace({ op, fingerprint }, 'Cache hit');
        return { ok: true, value: hit.value };
      }
    }

    const result = await compute();

    if (result.ok) {
      await this.put(fingerprint, result.value);
    } else {
      this.logger.debug({ op, fingerprint, force: options.force === true }, 'Not caching failed call');
    }

    return result;
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const path = this.pathFor(fingerprint);

    if (!(await this.storage.exists(path))) {
      return null;
    }

    const raw = await this.storage.read(path);

    let json: unknown;
    try {
      json = JSON.parse(raw.toString('utf8'));
    } catch (error) {
      throw new CacheCorruptionError(fingerprint, error);
    }

    const parsed = cacheEntrySchema.safeParse(json);
    if (!parsed.success || parsed.data.fingerprint !== fingerprint) {
      throw new CacheCorruptionError(fingerprint, parsed.success ? 'fingerprint mismatch' : parsed.error.issues);
    }

    return {
      fingerprint,
      value: Buffer.from(parsed.data.value, 'base64'),
      createdAt: new Date(parsed.data.createdAt),
    };
  }

  async put(fingerprint: string, value: Buffer, createdAt: Date = new Date()): Promise<void> {
    const entry: z.infer<typeof cacheEntrySchema> = {
      fingerprint,
      value: value.toString('base64'),
      createdAt: createdAt.toISOString(),
    };

    await this.storage.save(this.pathFor(fingerprint), Buffer.from(JSON.stringify(entry), 'utf8'));
  }

  private pathFor(fingerprint: string): string {
    return `${fingerprint}.json`;
  }
}

/**
 * Raw GET of a URL, memoised under the `crawl_url` operation. The identity
 * string travels as a keyword so it stays out of the fingerprint.
 */
export function crawlUrl(
  cache: FetchCache,
  fetcher: ContentFetcher,
  url: string,
  userAgent: string,
  options: CachedCallOptions = {},
): Promise<FetchResult<Buffer>> {
  return cache.cached(
    CACHE_OPERATIONS.CRAWL_URL,
    [url],
    { userAgent },
    () => fetcher.fetch(url, userAgent),
    options,
  );
}
