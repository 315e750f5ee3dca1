import axios, { AxiosInstance } from 'axios';
import { getEnvironment } from '../../config/environment.js';
import { RateLimiter } from '../../utils/rate-limiter.js';
import { getLogger } from '../../utils/logger.js';
import {
  ContentFetcher,
  FetchFailure,
  FetchResult,
} from '../../types/edgar.types.js';

export interface EdgarArchiveClientOptions {
  maxRetries: number;
  backoffFactorMs: number;
  timeoutMs: number;
  retryableStatuses: readonly number[];
  sleep: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

type AttemptResult = FetchResult<Buffer> & { retryable: boolean };

type ResponseBody = ArrayBuffer | Buffer | string;

/**
 * SEC EDGAR Archive Client
 *
 * Fetches raw bytes (index archives, filing index pages, exhibit documents)
 * from www.sec.gov. Every request goes through the shared rate limiter, and
 * transient failures are retried with exponential backoff. Exhausted retries
 * come back as a FetchFailure value; callers decide what happens next.
 */
export class EdgarArchiveClient implements ContentFetcher {
  private readonly http: AxiosInstance;
  private readonly options: EdgarArchiveClientOptions;
  private readonly retryable: ReadonlySet<number>;
  private logger;

  constructor(
    private readonly rateLimiter: RateLimiter,
    options: Partial<EdgarArchiveClientOptions> = {},
    http?: AxiosInstance,
  ) {
    const env = getEnvironment();

    this.options = {
      maxRetries: options.maxRetries ?? env.EDGAR_MAX_RETRIES,
      backoffFactorMs: options.backoffFactorMs ?? env.EDGAR_BACKOFF_FACTOR_MS,
      timeoutMs: options.timeoutMs ?? env.EDGAR_REQUEST_TIMEOUT_MS,
      retryableStatuses: options.retryableStatuses ?? env.EDGAR_RETRYABLE_STATUSES,
      sleep: options.sleep ?? defaultSleep,
    };
    this.retryable = new Set(this.options.retryableStatuses);
    this.http = http ?? axios.create();
    this.logger = getLogger();
  }

  async fetch(url: string, userAgent: string): Promise<FetchResult<Buffer>> {
    const maxAttempts = this.options.maxRetries + 1;
    let last: FetchFailure | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.performRequest(url, userAgent, attempt);

      if (result.ok) {
        return { ok: true, value: result.value };
      }

      last = result.error;

      if (!result.retryable || attempt === maxAttempts) {
        break;
      }

      // 1x, 2x, 4x, 8x ... the backoff factor
      const backoffMs = this.options.backoffFactorMs * Math.pow(2, attempt - 1);
      this.logger.warn(
        { url, attempt, backoffMs, reason: last.reason, status: last.status },
        'Fetch failed, retrying',
      );
      if (backoffMs > 0) {
        await this.options.sleep(backoffMs);
      }
    }

    const failure: FetchFailure = last ?? {
      url,
      reason: 'transport',
      attempts: 0,
      message: 'Fetch was never attempted',
    };

    this.logger.debug({ url, failure }, 'Fetch gave up');

    return { ok: false, error: failure };
  }

  private async performRequest(
    url: string,
    userAgent: string,
    attempt: number,
  ): Promise<AttemptResult> {
    await this.rateLimiter.wait();

    try {
      const response = await this.http.get<ResponseBody>(url, {
        headers: { 'User-Agent': userAgent },
        responseType: 'arraybuffer',
        timeout: this.options.timeoutMs,
        validateStatus: () => true,
      });

      if (response.status >= 200 && response.status < 300) {
        return { ok: true, value: toBuffer(response.data), retryable: false };
      }

      return {
        ok: false,
        error: {
          url,
          reason: 'status',
          status: response.status,
          attempts: attempt,
          message: `HTTP ${response.status} ${response.statusText}`.trim(),
        },
        retryable: this.retryable.has(response.status),
      };
    } catch (error) {
      const timedOut =
        axios.isAxiosError(error) &&
        (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');

      return {
        ok: false,
        error: {
          url,
          reason: timedOut ? 'timeout' : 'transport',
          attempts: attempt,
          message: error instanceof Error ? error.message : String(error),
        },
        retryable: true,
      };
    }
  }
}

function toBuffer(data: ResponseBody): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  return Buffer.from(data);
}
