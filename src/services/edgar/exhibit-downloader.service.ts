import { FetchCache, crawlUrl } from './fetch-cache.service.js';
import { BlobStorage } from './storage.interface.js';
import { decodeBatch, encodeBatch } from './exhibit-batch.codec.js';
import { BATCH_FILE_EXTENSION } from '../../config/constants.js';
import { ContentFetcher, DownloadOutcome, ExhibitRecord } from '../../types/edgar.types.js';
import { getLogger } from '../../utils/logger.js';
import {
  RetryPassObserver,
  RetryPassPolicy,
  retryPassPolicyFromEnvironment,
  runRetryPasses,
} from '../../utils/retry-passes.js';

export interface ExhibitDownloaderOptions {
  policy?: RetryPassPolicy;
  observer?: RetryPassObserver;
  sleep?: (ms: number) => Promise<void>;
}

const STAGE = 'exhibit-download';

export function batchPathFor(pageKey: string): string {
  return `${pageKey}${BATCH_FILE_EXTENSION}`;
}

/**
 * Exhibit Downloader Service
 *
 * Fills in the content of every located exhibit of one filing index page and
 * persists the batch as `<pageKey>.jsonl`. The batch file is written once,
 * after every exhibit has content; an unfinished batch is never persisted.
 */
export class ExhibitDownloaderService {
  private readonly policy: RetryPassPolicy;
  private logger;

  constructor(
    private readonly cache: FetchCache,
    private readonly fetcher: ContentFetcher,
    private readonly storage: BlobStorage,
    private readonly options: ExhibitDownloaderOptions = {},
  ) {
    this.policy = options.policy ?? retryPassPolicyFromEnvironment();
    this.logger = getLogger();
  }

  /**
   * @param exhibits - Located exhibits of one page; content is filled in place
   * @param skipExisting - Reuse a complete batch already in storage
   */
  async download(
    exhibits: ExhibitRecord[],
    pageKey: string,
    userAgent: string,
    skipExisting: boolean,
  ): Promise<DownloadOutcome> {
    if (exhibits.length === 0) {
      return { status: 'empty', exhibits: [], unresolved: [] };
    }

    const path = batchPathFor(pageKey);
    let batch = exhibits;

    if (skipExisting && (await this.storage.exists(path))) {
      const stored = decodeBatch(path, await this.storage.read(path));

      if (stored.length > 0 && stored.every((exhibit) => exhibit.content !== undefined)) {
        this.logger.debug({ pageKey, exhibits: stored.length }, 'Loaded existing exhibit batch');
        return { status: 'loaded', exhibits: stored, unresolved: [] };
      }

      if (stored.length > 0) {
        this.logger.warn({ pageKey }, 'Stored exhibit batch is incomplete, resuming it');
        batch = stored;
      }
    }

    const pending = batch.filter((exhibit) => exhibit.content === undefined);

    const result = await runRetryPasses({
      stage: STAGE,
      pending,
      policy: this.policy,
      observer: this.options.observer,
      sleep: this.options.sleep,
      attempt: async (exhibit, pass) => {
        const fetched = await crawlUrl(this.cache, this.fetcher, exhibit.documentUrl, userAgent);

        if (!fetched.ok) {
          this.logger.debug(
            { pageKey, url: exhibit.documentUrl, pass, failure: fetched.error },
            'Exhibit fetch failed',
          );
          return false;
        }

        if (exhibit.content === undefined) {
          exhibit.content = fetched.value;
        }
        return true;
      },
    });

    if (result.exhausted) {
      this.logger.warn(
        {
          pageKey,
          passes: result.passes,
          unresolved: result.unresolved.map((exhibit) => exhibit.documentUrl),
        },
        'Exhibit batch left incomplete, nothing written',
      );
      return { status: 'incomplete', exhibits: batch, unresolved: result.unresolved };
    }

    await this.storage.save(path, encodeBatch(batch));

    this.logger.info(
      { pageKey, exhibits: batch.length, passes: result.passes },
      'Saved exhibit batch',
    );

    return { status: 'downloaded', exhibits: batch, unresolved: [] };
  }
}
