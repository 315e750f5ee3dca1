import { DEFAULT_ARCHIVES_BASE_URL, DEFAULT_FILING_TYPES, MASTER_INDEX } from '../../config/constants.js';
import { FilingIndexRecord, RawIndexLine } from '../../types/edgar.types.js';

export interface IndexFilterResult {
  records: FilingIndexRecord[];
  malformed: number;
}

/**
 * Splits one `CIK|Company Name|Form Type|Date Filed|Filename` line into a
 * filing record with absolute URLs. Returns null when the field count is off.
 */
export function parseIndexLine(
  line: RawIndexLine,
  archivesBaseUrl: string = DEFAULT_ARCHIVES_BASE_URL,
): FilingIndexRecord | null {
  const fields = line.original.split(MASTER_INDEX.DELIMITER);
  if (fields.length !== MASTER_INDEX.FIELD_COUNT) {
    return null;
  }

  const [cik, companyName, filingType, filingDate, filename] = fields;
  const base = archivesBaseUrl.replace(/\/+$/, '');

  return Object.freeze({
    cik,
    companyName,
    filingType,
    filingDate,
    indexTextUrl: `${base}/${filename}`,
    indexHtmlUrl: `${base}/${line.indexHtmlUrl}`,
  });
}

/**
 * Keeps the filings whose form type is allowed, preserving index order
 */
export function filterIndexRecords(
  lines: readonly RawIndexLine[],
  allowedTypes: readonly string[] = DEFAULT_FILING_TYPES,
  archivesBaseUrl: string = DEFAULT_ARCHIVES_BASE_URL,
): IndexFilterResult {
  const allowed = new Set(allowedTypes);
  const records: FilingIndexRecord[] = [];
  let malformed = 0;

  for (const line of lines) {
    const record = parseIndexLine(line, archivesBaseUrl);
    if (!record) {
      malformed++;
      continue;
    }
    if (allowed.has(record.filingType)) {
      records.push(record);
    }
  }

  return { records, malformed };
}
