import { describe, it, expect, beforeAll } from '@jest/globals';
import { ExhibitDownloaderService, batchPathFor } from '../exhibit-downloader.service';
import { FetchCache } from '../fetch-cache.service';
import { decodeBatch, encodeBatch } from '../exhibit-batch.codec';
import { RetryPassPolicy, RetryPassReport } from '../../../utils/retry-passes';
import { InMemoryBlobStorage, StubFetcher, USER_AGENT, exhibitRecord, initTestEnvironment } from './fixtures';

const FOLDER = 'https://www.sec.gov/Archives/edgar/data/320193/000032019323000106';
const DOC_A = `${FOLDER}/ex10-1.htm`;
const DOC_B = `${FOLDER}/ex21.htm`;
const PAGE_KEY = '0123456789abcdef0123456789abcdef';

const policy: RetryPassPolicy = { maxPasses: 0, passDelayMs: 0, stuckAfterPasses: 3 };

function setup(fetcher: StubFetcher, overrides: Partial<RetryPassPolicy> = {}) {
  const output = new InMemoryBlobStorage();
  const reports: RetryPassReport[] = [];
  const downloader = new ExhibitDownloaderService(new FetchCache(new InMemoryBlobStorage()), fetcher, output, {
    policy: { ...policy, ...overrides },
    observer: (report) => reports.push(report),
  });
  return { output, reports, downloader };
}

const located = () => [exhibitRecord(DOC_A), exhibitRecord(DOC_B, { sequence: '4', documentType: 'EX-21' })];

describe('ExhibitDownloaderService', () => {
  beforeAll(() => {
    initTestEnvironment();
  });

  it('should fetch every exhibit and write the batch once', async () => {
    const fetcher = new StubFetcher().on(DOC_A, 'agreement').on(DOC_B, 'subsidiaries');
    const { output, downloader } = setup(fetcher);

    const outcome = await downloader.download(located(), PAGE_KEY, USER_AGENT, true);

    expect(outcome.status).toBe('downloaded');
    expect(outcome.exhibits.map((exhibit) => exhibit.content?.toString('utf8'))).toEqual([
      'agreement',
      'subsidiaries',
    ]);
    expect(output.saves).toBe(1);

    const stored = decodeBatch(batchPathFor(PAGE_KEY), await output.read(`${PAGE_KEY}.jsonl`));
    expect(stored.map((exhibit) => exhibit.content?.toString('utf8'))).toEqual(['agreement', 'subsidiaries']);
  });

  it('should do nothing for a page without exhibits', async () => {
    const fetcher = new StubFetcher();
    const { output, downloader } = setup(fetcher);

    const outcome = await downloader.download([], PAGE_KEY, USER_AGENT, true);

    expect(outcome).toEqual({ status: 'empty', exhibits: [], unresolved: [] });
    expect(output.saves).toBe(0);
    expect(fetcher.calls).toEqual([]);
  });

  it('should load a complete stored batch without fetching', async () => {
    const fetcher = new StubFetcher();
    const { output, downloader } = setup(fetcher);
    const batch = located().map((exhibit) => ({ ...exhibit, content: Buffer.from(exhibit.filename) }));
    await output.save(batchPathFor(PAGE_KEY), encodeBatch(batch));

    const outcome = await downloader.download(located(), PAGE_KEY, USER_AGENT, true);

    expect(outcome.status).toBe('loaded');
    expect(outcome.exhibits.map((exhibit) => exhibit.content?.toString('utf8'))).toEqual([
      'ex10-1.htm',
      'ex21.htm',
    ]);
    expect(fetcher.calls).toEqual([]);
    expect(output.saves).toBe(1);
  });

  it('should download again when told not to skip existing batches', async () => {
    const fetcher = new StubFetcher().on(DOC_A, 'new a').on(DOC_B, 'new b');
    const { output, downloader } = setup(fetcher);
    await output.save(batchPathFor(PAGE_KEY), encodeBatch(located()));

    const outcome = await downloader.download(located(), PAGE_KEY, USER_AGENT, false);

    expect(outcome.status).toBe('downloaded');
    expect(fetcher.calls).toHaveLength(2);
    expect(output.saves).toBe(2);
  });

  it('should resume a stored batch that is missing content', async () => {
    const fetcher = new StubFetcher().on(DOC_B, 'subsidiaries');
    const { output, downloader } = setup(fetcher);
    const partial = located();
    partial[0].content = Buffer.from('kept');
    await output.save(batchPathFor(PAGE_KEY), encodeBatch(partial));

    const outcome = await downloader.download(located(), PAGE_KEY, USER_AGENT, true);

    expect(outcome.status).toBe('downloaded');
    expect(outcome.exhibits.map((exhibit) => exhibit.content?.toString('utf8'))).toEqual(['kept', 'subsidiaries']);
    expect(fetcher.calls.map((call) => call.url)).toEqual([DOC_B]);
  });

  it('should keep polling failed exhibits until they arrive', async () => {
    const fetcher = new StubFetcher().on(DOC_A, 'agreement').on(DOC_B, null, null, 'subsidiaries');
    const { output, reports, downloader } = setup(fetcher);

    const outcome = await downloader.download(located(), PAGE_KEY, USER_AGENT, true);

    expect(outcome.status).toBe('downloaded');
    expect(fetcher.callsTo(DOC_A)).toBe(1);
    expect(fetcher.callsTo(DOC_B)).toBe(3);
    expect(reports.map((report) => report.pending)).toEqual([1, 1, 0]);
    expect(output.saves).toBe(1);
  });

  it('should write nothing when an exhibit never arrives', async () => {
    const fetcher = new StubFetcher().on(DOC_A, 'agreement').on(DOC_B, null);
    const { output, reports, downloader } = setup(fetcher, { maxPasses: 3, stuckAfterPasses: 2 });

    const outcome = await downloader.download(located(), PAGE_KEY, USER_AGENT, true);

    expect(outcome.status).toBe('incomplete');
    expect(outcome.unresolved.map((exhibit) => exhibit.documentUrl)).toEqual([DOC_B]);
    expect(fetcher.callsTo(DOC_B)).toBe(3);
    expect(reports.map((report) => report.stuck)).toEqual([false, true, true]);
    expect(await output.exists(batchPathFor(PAGE_KEY))).toBe(false);
    expect(output.saves).toBe(0);
  });
});
