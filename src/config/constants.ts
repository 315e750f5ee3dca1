export const EDGAR_FIRST_INDEX_YEAR = 1993;

export const ALL_QUARTERS = [1, 2, 3, 4] as const;

export const MASTER_INDEX = {
  ENTRY_NAME: 'master.idx',
  HEADER_LINES: 11,
  FIELD_COUNT: 5,
  DELIMITER: '|',
  ENCODING: 'latin1',
} as const;

export const FILING_INDEX_PAGE = {
  DOCUMENT_TABLE_SELECTOR: 'table.tableFile[summary="Document Format Files"]',
  CELL_COUNT: 5,
  REPORT_DATE_LABEL: 'Period of Report',
  INLINE_VIEWER_PATH: '/ix',
} as const;

export const CACHE_OPERATIONS = {
  CRAWL_URL: 'crawl_url',
} as const;

// Transport and identity arguments never take part in a cache fingerprint.
export const FINGERPRINT_EXCLUDED_KEYS: ReadonlySet<string> = new Set([
  'session',
  'client',
  'userAgent',
  'user_agent',
]);

export const BATCH_FILE_EXTENSION = '.jsonl';

export const DEFAULT_ARCHIVES_BASE_URL = 'https://www.sec.gov/Archives';

export const DEFAULT_FILING_TYPES: readonly string[] = ['10-K', '10-Q', '8-K'];
