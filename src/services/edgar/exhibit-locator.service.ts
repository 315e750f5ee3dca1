import * as cheerio from 'cheerio';
import { FetchCache, crawlUrl } from './fetch-cache.service.js';
import { getEnvironment } from '../../config/environment.js';
import { FILING_INDEX_PAGE } from '../../config/constants.js';
import {
  ContentFetcher,
  DocumentTypePredicate,
  ExhibitRecord,
  FilingIndexRecord,
  LocatedPage,
} from '../../types/edgar.types.js';
import { md5Hex } from '../../utils/fingerprint.js';
import { getLogger } from '../../utils/logger.js';

export interface ParsedFilingIndexPage {
  found: boolean;
  reportDate: string | null;
  exhibits: ExhibitRecord[];
  skippedRows: number;
}

/**
 * Matches a document type against base tags: "EX-10" accepts "EX-10" and any
 * dot-qualified subtype such as "EX-10.1", but not "EX-101".
 */
export function documentTypeMatcher(baseTags: readonly string[]): DocumentTypePredicate {
  const tags = baseTags.map((tag) => tag.trim().toUpperCase()).filter((tag) => tag.length > 0);

  return (documentType: string): boolean => {
    const normalized = documentType.trim().toUpperCase();
    return tags.some((tag) => normalized === tag || normalized.startsWith(`${tag}.`));
  };
}

/**
 * Stable output key of a filing index page
 */
export function pageKeyFor(indexHtmlUrl: string): string {
  return md5Hex(indexHtmlUrl);
}

/**
 * Resolves a document link from the filing index table. Links into the
 * inline XBRL viewer (`/ix?doc=...`) point at the underlying document instead.
 */
export function resolveDocumentUrl(href: string, siteBaseUrl: string): string {
  const url = new URL(href, siteBaseUrl);

  if (url.pathname === FILING_INDEX_PAGE.INLINE_VIEWER_PATH) {
    const doc = url.searchParams.get('doc');
    if (doc) {
      return new URL(doc, siteBaseUrl).toString();
    }
  }

  return url.toString();
}

export function parseFilingIndexPage(
  html: string,
  filing: FilingIndexRecord,
  predicate: DocumentTypePredicate,
  siteBaseUrl: string,
): ParsedFilingIndexPage {
  const $ = cheerio.load(html);

  const reportDateLabel = $('div.infoHead')
    .filter((_, el) => $(el).text().trim() === FILING_INDEX_PAGE.REPORT_DATE_LABEL)
    .first();
  const reportDate = reportDateLabel.length
    ? reportDateLabel.next('div.info').text().trim() || null
    : null;

  const table = $(FILING_INDEX_PAGE.DOCUMENT_TABLE_SELECTOR).first();
  if (table.length === 0) {
    return { found: false, reportDate, exhibits: [], skippedRows: 0 };
  }

  const exhibits: ExhibitRecord[] = [];
  let skippedRows = 0;

  // First row is the column header
  for (const row of table.find('tr').toArray().slice(1)) {
    const cells = $(row).find('td');
    if (cells.length !== FILING_INDEX_PAGE.CELL_COUNT) {
      skippedRows++;
      continue;
    }

    const documentType = cells.eq(3).text().trim().toUpperCase();
    if (!predicate(documentType)) {
      continue;
    }

    const anchor = cells.eq(2).find('a[href]').first();
    const href = anchor.attr('href');
    if (!href) {
      skippedRows++;
      continue;
    }

    let documentUrl: string;
    try {
      documentUrl = resolveDocumentUrl(href, siteBaseUrl);
    } catch {
      skippedRows++;
      continue;
    }

    exhibits.push({
      indexHtmlUrl: filing.indexHtmlUrl,
      filing: {
        cik: filing.cik,
        companyName: filing.companyName,
        filingType: filing.filingType,
        filingDate: filing.filingDate,
        reportDate,
        indexTextUrl: filing.indexTextUrl,
      },
      sequence: cells.eq(0).text().trim(),
      description: cells.eq(1).text().trim(),
      documentUrl,
      documentType,
      size: cells.eq(4).text().trim(),
      filename: anchor.text().trim(),
    });
  }

  return { found: true, reportDate, exhibits, skippedRows };
}

/**
 * Exhibit Locator Service
 * Reads a filing index page and lists the exhibit documents whose type matches
 */
export class ExhibitLocatorService {
  private readonly siteBaseUrl: string;
  private logger;

  constructor(
    private readonly cache: FetchCache,
    private readonly fetcher: ContentFetcher,
    siteBaseUrl?: string,
  ) {
    this.siteBaseUrl = siteBaseUrl ?? getEnvironment().EDGAR_SITE_BASE_URL;
    this.logger = getLogger();
  }

  async locate(
    filing: FilingIndexRecord,
    predicate: DocumentTypePredicate,
    userAgent: string,
  ): Promise<LocatedPage> {
    const pageKey = pageKeyFor(filing.indexHtmlUrl);
    const result = await crawlUrl(this.cache, this.fetcher, filing.indexHtmlUrl, userAgent);

    if (!result.ok) {
      this.logger.warn(
        { url: filing.indexHtmlUrl, failure: result.error },
        'Filing index page unavailable, skipping',
      );
      return { pageKey, status: 'unavailable', reportDate: null, exhibits: [] };
    }

    const page = parseFilingIndexPage(
      result.value.toString('utf8'),
      filing,
      predicate,
      this.siteBaseUrl,
    );

    if (!page.found) {
      this.logger.info({ url: filing.indexHtmlUrl }, 'No document table on filing index page, skipping');
    } else if (page.skippedRows > 0) {
      this.logger.debug(
        { url: filing.indexHtmlUrl, skippedRows: page.skippedRows },
        'Skipped malformed document rows',
      );
    }

    this.logger.debug(
      { url: filing.indexHtmlUrl, pageKey, exhibits: page.exhibits.length },
      'Located exhibits',
    );

    return {
      pageKey,
      status: page.found ? 'located' : 'no-table',
      reportDate: page.reportDate,
      exhibits: page.exhibits,
    };
  }
}
