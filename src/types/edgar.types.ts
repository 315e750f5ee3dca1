export type Quarter = 1 | 2 | 3 | 4;

export type FetchFailureReason = 'status' | 'timeout' | 'transport';

export interface FetchFailure {
  url: string;
  reason: FetchFailureReason;
  status?: number;
  attempts: number;
  message: string;
}

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: FetchFailure };

/**
 * Anything able to retrieve raw bytes for a URL on behalf of an identity.
 */
export interface ContentFetcher {
  fetch(url: string, userAgent: string): Promise<FetchResult<Buffer>>;
}

export interface CacheEntry {
  fingerprint: string;
  value: Buffer;
  createdAt: Date;
}

/**
 * One data line of a quarterly master index, before field parsing.
 * `indexHtmlUrl` is still relative to the archives root.
 */
export interface RawIndexLine {
  original: string;
  indexHtmlUrl: string;
}

export interface AcquiredIndex {
  key: string;
  year: number;
  quarter: Quarter;
  url: string;
  content: Buffer;
  lines: RawIndexLine[];
}

export interface FilingIndexRecord {
  readonly cik: string;
  readonly companyName: string;
  readonly filingType: string;
  readonly filingDate: string;
  readonly indexTextUrl: string;
  readonly indexHtmlUrl: string;
}

export interface FilingMetadata {
  cik: string;
  companyName: string;
  filingType: string;
  filingDate: string;
  reportDate: string | null;
  indexTextUrl: string;
}

export interface ExhibitRecord {
  indexHtmlUrl: string;
  filing: FilingMetadata;
  sequence: string;
  description: string;
  documentUrl: string;
  documentType: string;
  size: string;
  filename: string;
  content?: Buffer;
}

export type DocumentTypePredicate = (documentType: string) => boolean;

/**
 * `unavailable`: the page could not be fetched. `no-table`: it was fetched but
 * carries no document table.
 */
export type LocatedPageStatus = 'located' | 'unavailable' | 'no-table';

export interface LocatedPage {
  pageKey: string;
  status: LocatedPageStatus;
  reportDate: string | null;
  exhibits: ExhibitRecord[];
}

export type DownloadStatus = 'empty' | 'loaded' | 'downloaded' | 'incomplete';

export interface DownloadOutcome {
  status: DownloadStatus;
  exhibits: ExhibitRecord[];
  unresolved: ExhibitRecord[];
}
