import AdmZip from 'adm-zip';
import { FetchCache, crawlUrl } from './fetch-cache.service.js';
import { getEnvironment } from '../../config/environment.js';
import { ALL_QUARTERS, EDGAR_FIRST_INDEX_YEAR, MASTER_INDEX } from '../../config/constants.js';
import {
  AcquiredIndex,
  ContentFetcher,
  Quarter,
  RawIndexLine,
} from '../../types/edgar.types.js';
import { IndexArchiveError, RetryExhaustedError, ValidationError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import {
  RetryPassObserver,
  RetryPassPolicy,
  retryPassPolicyFromEnvironment,
  runRetryPasses,
} from '../../utils/retry-passes.js';

export interface AcquireIndicesRequest {
  startYear: number;
  endYear: number;
  userAgent: string;
  quarters?: readonly number[];
}

export interface IndexAcquisitionOptions {
  policy?: RetryPassPolicy;
  observer?: RetryPassObserver;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

interface IndexPeriod {
  key: string;
  year: number;
  quarter: Quarter;
  url: string;
}

const STAGE = 'index-acquisition';

const isQuarter = (value: number): value is Quarter =>
  (ALL_QUARTERS as readonly number[]).includes(value);

/**
 * Index Acquisition Service
 *
 * Downloads the quarterly EDGAR master index archives for a year range.
 * The first pass reads through the fetch cache; every later pass forces a
 * fresh fetch for whatever is still missing, and the passes continue until
 * all periods are in hand (or the configured pass ceiling is reached).
 */
export class IndexAcquisitionService {
  private readonly policy: RetryPassPolicy;
  private readonly now: () => Date;
  private logger;

  constructor(
    private readonly cache: FetchCache,
    private readonly fetcher: ContentFetcher,
    private readonly options: IndexAcquisitionOptions = {},
  ) {
    this.policy = options.policy ?? retryPassPolicyFromEnvironment();
    this.now = options.now ?? (() => new Date());
    this.logger = getLogger();
  }

  async acquireIndices(request: AcquireIndicesRequest): Promise<AcquiredIndex[]> {
    const periods = this.buildPeriods(request);

    this.logger.info(
      { startYear: request.startYear, endYear: request.endYear, periods: periods.length },
      'Acquiring EDGAR master indices',
    );

    const acquired = new Map<string, AcquiredIndex>();

    const result = await runRetryPasses({
      stage: STAGE,
      pending: periods,
      policy: this.policy,
      observer: this.options.observer,
      sleep: this.options.sleep,
      attempt: async (period, pass) => {
        const index = await this.fetchPeriod(period, request.userAgent, pass > 1);
        if (!index) {
          return false;
        }
        acquired.set(period.key, index);
        return true;
      },
    });

    if (result.exhausted) {
      throw new RetryExhaustedError(
        STAGE,
        result.passes,
        result.unresolved.map((period) => period.key),
      );
    }

    const indices = periods.flatMap((period) => {
      const index = acquired.get(period.key);
      return index ? [index] : [];
    });

    this.logger.info(
      {
        indices: indices.length,
        passes: result.passes,
        lines: indices.reduce((total, index) => total + index.lines.length, 0),
      },
      'Acquired EDGAR master indices',
    );

    return indices;
  }

  /**
   * Every (year, quarter) in range whose period has already started
   */
  private buildPeriods(request: AcquireIndicesRequest): IndexPeriod[] {
    const quarters = this.validateRequest(request);
    const env = getEnvironment();
    const now = this.now();
    const currentYear = now.getFullYear();
    const currentQuarter = Math.ceil((now.getMonth() + 1) / 3);

    const periods: IndexPeriod[] = [];

    for (let year = request.startYear; year <= request.endYear; year++) {
      for (const quarter of quarters) {
        if (year > currentYear || (year === currentYear && quarter > currentQuarter)) {
          this.logger.debug({ year, quarter }, 'Skipping period that has not started');
          continue;
        }

        periods.push({
          key: `${year}-QTR${quarter}`,
          year,
          quarter,
          url: `${env.EDGAR_ARCHIVES_BASE_URL}/edgar/full-index/${year}/QTR${quarter}/master.zip`,
        });
      }
    }

    return periods;
  }

  private validateRequest(request: AcquireIndicesRequest): Quarter[] {
    const quarters = request.quarters ?? ALL_QUARTERS;

    const invalid = quarters.filter((quarter) => !isQuarter(quarter));
    if (invalid.length > 0) {
      throw new ValidationError(`Invalid quarter "${invalid.join(', ')}"`, { quarters });
    }

    if (!Number.isInteger(request.startYear) || !Number.isInteger(request.endYear)) {
      throw new ValidationError('Years must be integers', request);
    }

    if (request.startYear > request.endYear) {
      throw new ValidationError(
        `Start year ${request.startYear} is after end year ${request.endYear}`,
      );
    }

    if (request.startYear < EDGAR_FIRST_INDEX_YEAR) {
      throw new ValidationError(
        `EDGAR full indices start in ${EDGAR_FIRST_INDEX_YEAR}, got ${request.startYear}`,
      );
    }

    return Array.from(new Set(quarters.filter(isQuarter))).sort((a, b) => a - b);
  }

  private async fetchPeriod(
    period: IndexPeriod,
    userAgent: string,
    force: boolean,
  ): Promise<AcquiredIndex | null> {
    this.logger.info({ url: period.url, force }, 'Downloading master index');

    const result = await crawlUrl(this.cache, this.fetcher, period.url, userAgent, { force });

    if (!result.ok) {
      this.logger.warn({ key: period.key, failure: result.error }, 'Master index fetch failed');
      return null;
    }

    try {
      return { ...period, content: result.value, lines: unpackMasterIndex(result.value) };
    } catch (error) {
      if (error instanceof IndexArchiveError) {
        this.logger.warn({ key: period.key, error }, 'Master index could not be unpacked');
        return null;
      }
      throw error;
    }
  }
}

/**
 * Extracts the data lines of `master.idx` from a quarterly archive,
 * dropping the banner and column header block.
 */
export function unpackMasterIndex(content: Buffer): RawIndexLine[] {
  let text: string;

  try {
    const entry = new AdmZip(content).getEntry(MASTER_INDEX.ENTRY_NAME);
    if (!entry) {
      throw new IndexArchiveError(`Archive has no ${MASTER_INDEX.ENTRY_NAME}`);
    }
    text = entry.getData().toString(MASTER_INDEX.ENCODING);
  } catch (error) {
    if (error instanceof IndexArchiveError) {
      throw error;
    }
    throw new IndexArchiveError('Master index archive is unreadable', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return text
    .split(/\r?\n/)
    .slice(MASTER_INDEX.HEADER_LINES)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((original) => {
      const filename = original.split(MASTER_INDEX.DELIMITER).pop() ?? '';
      return { original, indexHtmlUrl: filename.replace(/\.txt$/, '-index.html') };
    });
}
