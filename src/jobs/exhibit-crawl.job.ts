import { FetchCache } from '../services/edgar/fetch-cache.service.js';
import { IndexAcquisitionService } from '../services/edgar/index-acquisition.service.js';
import { filterIndexRecords } from '../services/edgar/index-filter.service.js';
import { ExhibitLocatorService, documentTypeMatcher } from '../services/edgar/exhibit-locator.service.js';
import { ExhibitDownloaderService } from '../services/edgar/exhibit-downloader.service.js';
import { BlobStorage } from '../services/edgar/storage.interface.js';
import { getEnvironment } from '../config/environment.js';
import { ContentFetcher } from '../types/edgar.types.js';
import { AppError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { RetryPassPolicy, RetryPassReport } from '../utils/retry-passes.js';

export interface ExhibitCrawlOptions {
  startYear: number;
  endYear: number;
  userAgent: string;
  quarters?: readonly number[];
  filingTypes?: readonly string[];
  exhibitTypes?: readonly string[];
  /** Cap on filing index pages visited; 0 visits all of them. */
  pageLimit?: number;
  skipExisting?: boolean;
}

export interface ExhibitCrawlDependencies {
  cache: FetchCache;
  fetcher: ContentFetcher;
  outputStorage: BlobStorage;
  policy?: RetryPassPolicy;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface CrawlStats {
  indices: number;
  filings: number;
  pagesVisited: number;
  /** Filing pages whose fetch failed; they are not retried. */
  pagesUnavailable: number;
  pagesWithoutTable: number;
  batchesLoaded: number;
  batchesWritten: number;
  batchesIncomplete: number;
  exhibitsRetrieved: number;
}

export type CrawlStage = 'index-acquisition' | 'index-filter' | 'exhibits';

export interface CrawlStatus {
  running: boolean;
  stage: CrawlStage | null;
  stuck: boolean;
  lastPass: RetryPassReport | null;
}

/**
 * Exhibit Crawl Job
 *
 * Runs the crawl end to end, one page at a time:
 * master indices → form-type filter → per filing page: locate exhibits → download batch
 *
 * Progress is a running count of retrieved exhibits. When a retry loop keeps
 * coming back with pending items the job flags itself as stuck.
 */
export class ExhibitCrawlJob {
  private acquisition: IndexAcquisitionService;
  private locator: ExhibitLocatorService;
  private downloader: ExhibitDownloaderService;
  private logger;
  private status: CrawlStatus = { running: false, stage: null, stuck: false, lastPass: null };

  constructor(deps: ExhibitCrawlDependencies) {
    const observer = (report: RetryPassReport): void => this.recordPass(report);

    this.acquisition = new IndexAcquisitionService(deps.cache, deps.fetcher, {
      policy: deps.policy,
      observer,
      now: deps.now,
      sleep: deps.sleep,
    });
    this.locator = new ExhibitLocatorService(deps.cache, deps.fetcher);
    this.downloader = new ExhibitDownloaderService(deps.cache, deps.fetcher, deps.outputStorage, {
      policy: deps.policy,
      observer,
      sleep: deps.sleep,
    });
    this.logger = getLogger();
  }

  async run(options: ExhibitCrawlOptions): Promise<CrawlStats> {
    if (this.status.running) {
      throw new AppError('Exhibit crawl already running', 'CRAWL_IN_PROGRESS');
    }

    const env = getEnvironment();
    const filingTypes = options.filingTypes ?? env.EDGAR_FILING_TYPES;
    const exhibitTypes = options.exhibitTypes ?? env.EDGAR_EXHIBIT_TYPES;
    const pageLimit = options.pageLimit ?? env.EDGAR_PAGE_LIMIT;
    const skipExisting = options.skipExisting ?? true;
    const startTime = Date.now();

    const stats: CrawlStats = {
      indices: 0,
      filings: 0,
      pagesVisited: 0,
      pagesUnavailable: 0,
      pagesWithoutTable: 0,
      batchesLoaded: 0,
      batchesWritten: 0,
      batchesIncomplete: 0,
      exhibitsRetrieved: 0,
    };

    this.status = { running: true, stage: 'index-acquisition', stuck: false, lastPass: null };

    this.logger.info(
      {
        startYear: options.startYear,
        endYear: options.endYear,
        quarters: options.quarters,
        filingTypes,
        exhibitTypes,
        pageLimit,
        skipExisting,
      },
      'Starting exhibit crawl',
    );

    try {
      const indices = await this.acquisition.acquireIndices({
        startYear: options.startYear,
        endYear: options.endYear,
        userAgent: options.userAgent,
        quarters: options.quarters,
      });
      stats.indices = indices.length;

      this.enterStage('index-filter');
      this.logger.info({ filingTypes }, 'Filtering indices');
      const { records, malformed } = filterIndexRecords(
        indices.flatMap((index) => index.lines),
        filingTypes,
        env.EDGAR_ARCHIVES_BASE_URL,
      );
      stats.filings = records.length;

      if (malformed > 0) {
        this.logger.warn({ malformed }, 'Skipped malformed index lines');
      }

      const pages = pageLimit > 0 ? records.slice(0, pageLimit) : records;
      const predicate = documentTypeMatcher(exhibitTypes);

      this.enterStage('exhibits');

      for (const filing of pages) {
        const located = await this.locator.locate(filing, predicate, options.userAgent);
        stats.pagesVisited++;

        if (located.status === 'unavailable') {
          stats.pagesUnavailable++;
        } else if (located.status === 'no-table') {
          stats.pagesWithoutTable++;
        }

        const outcome = await this.downloader.download(
          located.exhibits,
          located.pageKey,
          options.userAgent,
          skipExisting,
        );

        switch (outcome.status) {
          case 'loaded':
            stats.batchesLoaded++;
            break;
          case 'downloaded':
            stats.batchesWritten++;
            break;
          case 'incomplete':
            stats.batchesIncomplete++;
            break;
          case 'empty':
            break;
        }

        if (outcome.status === 'loaded' || outcome.status === 'downloaded') {
          stats.exhibitsRetrieved += outcome.exhibits.filter(
            (exhibit) => exhibit.content !== undefined,
          ).length;
        }

        this.logger.info(
          {
            page: stats.pagesVisited,
            total: pages.length,
            pageKey: located.pageKey,
            status: outcome.status,
          },
          `Found ${stats.exhibitsRetrieved} exhibits`,
        );
      }

      this.logger.info({ stats, durationMs: Date.now() - startTime }, 'Exhibit crawl complete');

      return stats;
    } catch (error) {
      this.logger.error({ error, stage: this.status.stage, stats }, 'Exhibit crawl failed');
      throw error;
    } finally {
      this.status = { ...this.status, running: false };
    }
  }

  getStatus(): CrawlStatus {
    return { ...this.status };
  }

  private enterStage(stage: CrawlStage): void {
    this.status = { ...this.status, stage, stuck: false, lastPass: null };
  }

  private recordPass(report: RetryPassReport): void {
    this.status = { ...this.status, stuck: report.stuck, lastPass: report };

    if (report.stuck) {
      this.logger.warn(
        { stage: report.stage, pass: report.pass, pending: report.pending },
        'Retry loop is stuck, still polling',
      );
    } else if (report.pending > 0) {
      this.logger.info(
        { stage: report.stage, pass: report.pass, pending: report.pending },
        `Retrying ${report.pending} items`,
      );
    }
  }
}
