import { z } from 'zod';

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const optionalUrl = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().url().optional(),
);

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // SEC EDGAR endpoints
  EDGAR_USER_AGENT: optionalString,
  EDGAR_ARCHIVES_BASE_URL: z.string().url().default('https://www.sec.gov/Archives'),
  EDGAR_SITE_BASE_URL: z.string().url().default('https://www.sec.gov'),

  // Fetch client
  EDGAR_REQUESTS_PER_SECOND: z
    .string()
    .transform(Number)
    .pipe(z.number().positive())
    .default('5'),
  EDGAR_REQUEST_TIMEOUT_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('30000'),
  EDGAR_MAX_RETRIES: z
    .string()
    .transform(Number)
    .pipe(z.number().int().nonnegative())
    .default('5'),
  EDGAR_BACKOFF_FACTOR_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().nonnegative())
    .default('500'),
  EDGAR_RETRYABLE_STATUSES: commaList('400,401,403,429,500,502,503,504,505').pipe(
    z.array(z.coerce.number().int().min(100).max(599)),
  ),

  // Retry passes (0 = keep polling until everything resolves)
  EDGAR_RETRY_MAX_PASSES: z
    .string()
    .transform(Number)
    .pipe(z.number().int().nonnegative())
    .default('0'),
  EDGAR_RETRY_PASS_DELAY_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().nonnegative())
    .default('5000'),
  EDGAR_RETRY_STUCK_AFTER_PASSES: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('3'),

  // Storage
  EDGAR_STORAGE_TYPE: z.enum(['local', 's3']).default('local'),
  EDGAR_CACHE_PATH: z.string().default('.cache'),
  EDGAR_OUTPUT_PATH: z.string().default('exhibits'),
  EDGAR_S3_BUCKET: optionalString,
  EDGAR_S3_ENDPOINT: optionalUrl,
  EDGAR_S3_REGION: optionalString,
  EDGAR_S3_ACCESS_KEY: optionalString,
  EDGAR_S3_SECRET_KEY: optionalString,

  // Crawl scope
  EDGAR_FILING_TYPES: commaList('10-K,10-Q,8-K'),
  EDGAR_EXHIBIT_TYPES: commaList('EX-10').transform((tags) =>
    tags.map((tag) => tag.toUpperCase()),
  ),
  EDGAR_PAGE_LIMIT: z
    .string()
    .transform(Number)
    .pipe(z.number().int().nonnegative())
    .default('50'),
});

export type Environment = z.infer<typeof envSchema>;

let _env: Environment | null = null;

export function loadEnvironment(): Environment {
  if (_env) {
    return _env;
  }

  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  _env = parsed.data;
  return _env;
}

export function getEnvironment(): Environment {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnvironment() first.');
  }
  return _env;
}
