import AdmZip from 'adm-zip';
import { loadEnvironment } from '../../../config/environment.js';
import { createLogger } from '../../../utils/logger.js';
import { BlobStorage } from '../storage.interface.js';
import { ContentFetcher, ExhibitRecord, FetchResult, FilingIndexRecord } from '../../../types/edgar.types.js';

export const USER_AGENT = 'Test Crawler test@example.com';

export function initTestEnvironment(): void {
  process.env.LOG_LEVEL = 'silent';
  loadEnvironment();
  createLogger();
}

export class InMemoryBlobStorage implements BlobStorage {
  readonly blobs = new Map<string, Buffer>();
  saves = 0;

  async save(path: string, content: Buffer): Promise<void> {
    this.saves++;
    this.blobs.set(path, Buffer.from(content));
  }

  async read(path: string): Promise<Buffer> {
    const blob = this.blobs.get(path);
    if (!blob) {
      throw new Error(`missing blob ${path}`);
    }
    return blob;
  }

  async exists(path: string): Promise<boolean> {
    return this.blobs.has(path);
  }
}

/**
 * Scripted fetcher: each URL plays back its outcomes in order (null is a
 * failure) and keeps repeating the last one. Unknown URLs fail with 404.
 */
export class StubFetcher implements ContentFetcher {
  readonly calls: Array<{ url: string; userAgent: string }> = [];
  private readonly scripts = new Map<string, Array<Buffer | null>>();

  on(url: string, ...outcomes: Array<Buffer | string | null>): this {
    this.scripts.set(
      url,
      outcomes.map((outcome) => (typeof outcome === 'string' ? Buffer.from(outcome, 'utf8') : outcome)),
    );
    return this;
  }

  callsTo(url: string): number {
    return this.calls.filter((call) => call.url === url).length;
  }

  async fetch(url: string, userAgent: string): Promise<FetchResult<Buffer>> {
    this.calls.push({ url, userAgent });

    const script = this.scripts.get(url);
    if (!script || script.length === 0) {
      return { ok: false, error: { url, reason: 'status', status: 404, attempts: 1, message: 'HTTP 404' } };
    }

    const outcome = script.length > 1 ? script.shift() ?? null : script[0];
    if (outcome === null) {
      return { ok: false, error: { url, reason: 'status', status: 503, attempts: 6, message: 'HTTP 503' } };
    }
    return { ok: true, value: outcome };
  }
}

const MASTER_INDEX_HEADER = [
  'Description:           Master Index of EDGAR Dissemination Feed',
  'Last Data Received:    March 31, 2023',
  'Comments:              webmaster@sec.gov',
  'Anonymous FTP:         ftp://ftp.sec.gov/edgar/',
  'Cloud HTTP:            https://www.sec.gov/Archives/',
  '',
  '',
  '',
  'CIK|Company Name|Form Type|Date Filed|Filename',
  '--------------------------------------------------------------------------------',
  '',
];

export function masterIndexZip(lines: string[], entryName = 'master.idx'): Buffer {
  const zip = new AdmZip();
  zip.addFile(entryName, Buffer.from(`${[...MASTER_INDEX_HEADER, ...lines].join('\n')}\n`, 'latin1'));
  return zip.toBuffer();
}

export type PageRow = [sequence: string, description: string, link: string, type: string, size: string];

export function filingIndexPage(rows: PageRow[], reportDate?: string): string {
  const grouping = reportDate
    ? `<div class="formGrouping">
        <div class="infoHead">Filing Date</div><div class="info">2023-11-03</div>
        <div class="infoHead">Period of Report</div><div class="info">${reportDate}</div>
      </div>`
    : '';

  const body = rows
    .map((cells) => `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`)
    .join('\n');

  return `<html><body>
    ${grouping}
    <table class="tableFile" summary="Document Format Files">
      <tr><th scope="col">Seq</th><th scope="col">Description</th><th scope="col">Document</th><th scope="col">Type</th><th scope="col">Size</th></tr>
      ${body}
    </table>
  </body></html>`;
}

export function filingRecord(overrides: Partial<FilingIndexRecord> = {}): FilingIndexRecord {
  return {
    cik: '320193',
    companyName: 'Example Corp',
    filingType: '10-K',
    filingDate: '2023-11-03',
    indexTextUrl: 'https://www.sec.gov/Archives/edgar/data/320193/0000320193-23-000106.txt',
    indexHtmlUrl: 'https://www.sec.gov/Archives/edgar/data/320193/0000320193-23-000106-index.html',
    ...overrides,
  };
}

export function exhibitRecord(documentUrl: string, overrides: Partial<ExhibitRecord> = {}): ExhibitRecord {
  const filename = documentUrl.split('/').slice(-1)[0];
  return {
    indexHtmlUrl: 'https://www.sec.gov/Archives/edgar/data/320193/0000320193-23-000106-index.html',
    filing: {
      cik: '320193',
      companyName: 'Example Corp',
      filingType: '10-K',
      filingDate: '2023-11-03',
      reportDate: '2023-09-30',
      indexTextUrl: 'https://www.sec.gov/Archives/edgar/data/320193/0000320193-23-000106.txt',
    },
    sequence: '2',
    description: 'MATERIAL CONTRACT',
    documentUrl,
    documentType: 'EX-10.1',
    size: '45120',
    filename,
    ...overrides,
  };
}
