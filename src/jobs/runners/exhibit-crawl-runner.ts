#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadEnvironment } from '../../config/environment.js';
import { createLogger } from '../../utils/logger.js';
import { RateLimiter } from '../../utils/rate-limiter.js';
import { AppError, ConfigurationError } from '../../utils/errors.js';
import { retryPassPolicyFromEnvironment } from '../../utils/retry-passes.js';
import { EdgarArchiveClient } from '../../adapters/edgar/edgar-archive.adapter.js';
import { FetchCache } from '../../services/edgar/fetch-cache.service.js';
import { createBlobStorage } from '../../services/edgar/storage.factory.js';
import { ExhibitCrawlJob } from '../exhibit-crawl.job.js';

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
};

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const parseIntegerList = (value: string): number[] => parseList(value).map(parseInteger);

interface CrawlCommandOptions {
  userAgent?: string;
  quarters?: number[];
  filingTypes?: string[];
  exhibitTypes?: string[];
  limit?: number;
  skipExisting: boolean;
  maxPasses?: number;
}

/**
 * EDGAR Exhibit Crawler
 *
 * Crawls the full-index archive for a year range and saves exhibit batches.
 */
async function main(): Promise<void> {
  const env = loadEnvironment();
  const logger = createLogger();

  const program = new Command()
    .name('edgar-exhibits')
    .description('Crawl SEC EDGAR filings and download matching exhibit documents');

  program
    .command('crawl')
    .argument('<startYear>', 'first year to crawl', parseInteger)
    .argument('<endYear>', 'last year to crawl, inclusive', parseInteger)
    .option('--user-agent <value>', 'identifying string sent with every request')
    .option('--quarters <list>', 'comma-separated quarters, default 1,2,3,4', parseIntegerList)
    .option('--filing-types <list>', 'comma-separated form types to keep', parseList)
    .option('--exhibit-types <list>', 'comma-separated exhibit base tags', parseList)
    .option('--limit <count>', 'max filing pages to visit, 0 for all', parseInteger)
    .option('--no-skip-existing', 're-download batches that already exist')
    .option('--max-passes <count>', 'retry pass ceiling, 0 to poll until done', parseInteger)
    .action(async (startYear: number, endYear: number, options: CrawlCommandOptions) => {
      const userAgent = options.userAgent ?? env.EDGAR_USER_AGENT;
      if (!userAgent) {
        throw new ConfigurationError('Provide --user-agent or set EDGAR_USER_AGENT');
      }

      const fetcher = new EdgarArchiveClient(new RateLimiter(env.EDGAR_REQUESTS_PER_SECOND));
      const job = new ExhibitCrawlJob({
        cache: new FetchCache(createBlobStorage('cache')),
        fetcher,
        outputStorage: createBlobStorage('output'),
        policy: retryPassPolicyFromEnvironment({ maxPasses: options.maxPasses }),
      });

      const stats = await job.run({
        startYear,
        endYear,
        userAgent,
        quarters: options.quarters,
        filingTypes: options.filingTypes,
        exhibitTypes: options.exhibitTypes,
        pageLimit: options.limit,
        skipExisting: options.skipExisting,
      });

      logger.info({ stats }, 'Crawl finished');
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  if (error instanceof AppError) {
    console.error(JSON.stringify(error.toJSON()));
  } else {
    console.error('EDGAR exhibit crawl failed:', error);
  }
  process.exit(1);
});
