import { z } from 'zod';
import { ExhibitRecord } from '../../types/edgar.types.js';
import { BatchFormatError } from '../../utils/errors.js';

const batchLineSchema = z.object({
  indexHtmlUrl: z.string().url(),
  indexTextUrl: z.string(),
  cik: z.string(),
  companyName: z.string(),
  filingType: z.string(),
  filingDate: z.string(),
  reportDate: z.string().nullable(),
  sequence: z.string(),
  description: z.string(),
  documentUrl: z.string().url(),
  documentType: z.string(),
  size: z.string(),
  filename: z.string(),
  content: z.string().nullable(),
});

export type BatchLine = z.infer<typeof batchLineSchema>;

export function toBatchLine(exhibit: ExhibitRecord): BatchLine {
  // Key order is fixed here so rewrites of the same batch are byte-identical
  return {
    indexHtmlUrl: exhibit.indexHtmlUrl,
    indexTextUrl: exhibit.filing.indexTextUrl,
    cik: exhibit.filing.cik,
    companyName: exhibit.filing.companyName,
    filingType: exhibit.filing.filingType,
    filingDate: exhibit.filing.filingDate,
    reportDate: exhibit.filing.reportDate,
    sequence: exhibit.sequence,
    description: exhibit.description,
    documentUrl: exhibit.documentUrl,
    documentType: exhibit.documentType,
    size: exhibit.size,
    filename: exhibit.filename,
    content: exhibit.content ? exhibit.content.toString('base64') : null,
  };
}

export function fromBatchLine(line: BatchLine): ExhibitRecord {
  return {
    indexHtmlUrl: line.indexHtmlUrl,
    filing: {
      cik: line.cik,
      companyName: line.companyName,
      filingType: line.filingType,
      filingDate: line.filingDate,
      reportDate: line.reportDate,
      indexTextUrl: line.indexTextUrl,
    },
    sequence: line.sequence,
    description: line.description,
    documentUrl: line.documentUrl,
    documentType: line.documentType,
    size: line.size,
    filename: line.filename,
    ...(line.content !== null && { content: Buffer.from(line.content, 'base64') }),
  };
}

export function encodeBatch(exhibits: readonly ExhibitRecord[]): Buffer {
  const body = exhibits.map((exhibit) => `${JSON.stringify(toBatchLine(exhibit))}\n`).join('');
  return Buffer.from(body, 'utf8');
}

export function decodeBatch(path: string, raw: Buffer): ExhibitRecord[] {
  const lines = raw.toString('utf8').split('\n');
  const exhibits: ExhibitRecord[] = [];

  lines.forEach((text, index) => {
    if (text.trim().length === 0) {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new BatchFormatError(path, index + 1, error instanceof Error ? error.message : error);
    }

    const parsed = batchLineSchema.safeParse(json);
    if (!parsed.success) {
      throw new BatchFormatError(path, index + 1, parsed.error.issues);
    }

    exhibits.push(fromBatchLine(parsed.data));
  });

  return exhibits;
}
