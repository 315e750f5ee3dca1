import { describe, it, expect, beforeAll } from '@jest/globals';
import AdmZip from 'adm-zip';
import { IndexAcquisitionService, unpackMasterIndex } from '../index-acquisition.service';
import { FetchCache } from '../fetch-cache.service';
import { IndexArchiveError, RetryExhaustedError, ValidationError } from '../../../utils/errors';
import { RetryPassPolicy } from '../../../utils/retry-passes';
import {
  InMemoryBlobStorage,
  StubFetcher,
  USER_AGENT,
  initTestEnvironment,
  masterIndexZip,
} from './fixtures';

const indexUrl = (year: number, quarter: number): string =>
  `https://www.sec.gov/Archives/edgar/full-index/${year}/QTR${quarter}/master.zip`;

const Q1_LINE = '320193|Example Corp|10-K|2023-02-03|edgar/data/320193/0000320193-23-000010.txt';
const Q2_LINE = '789019|Sample Holdings|8-K|2023-04-20|edgar/data/789019/0000789019-23-000042.txt';

const policy: RetryPassPolicy = { maxPasses: 0, passDelayMs: 0, stuckAfterPasses: 3 };

// Mid-May 2023: 2023 Q2 has started, Q3 and Q4 have not
const now = (): Date => new Date(2023, 4, 15);

const serviceFor = (
  fetcher: StubFetcher,
  overrides: Partial<RetryPassPolicy> = {},
): IndexAcquisitionService =>
  new IndexAcquisitionService(new FetchCache(new InMemoryBlobStorage()), fetcher, {
    policy: { ...policy, ...overrides },
    now,
  });

describe('unpackMasterIndex', () => {
  it('should drop the header block and keep data lines', () => {
    const lines = unpackMasterIndex(masterIndexZip([Q1_LINE, '', Q2_LINE]));

    expect(lines).toEqual([
      { original: Q1_LINE, indexHtmlUrl: 'edgar/data/320193/0000320193-23-000010-index.html' },
      { original: Q2_LINE, indexHtmlUrl: 'edgar/data/789019/0000789019-23-000042-index.html' },
    ]);
  });

  it('should decode latin1 company names', () => {
    const line = '1000001|Société Générale|10-Q|2023-05-01|edgar/data/1000001/0001000001-23-000001.txt';

    expect(unpackMasterIndex(masterIndexZip([line]))[0].original).toBe(line);
  });

  it('should reject an archive without master.idx', () => {
    expect(() => unpackMasterIndex(masterIndexZip([Q1_LINE], 'other.idx'))).toThrow(IndexArchiveError);
  });

  it('should reject bytes that are not an archive', () => {
    expect(() => unpackMasterIndex(Buffer.from('<html>Request Rate Threshold Exceeded</html>'))).toThrow(
      IndexArchiveError,
    );
  });
});

describe('IndexAcquisitionService', () => {
  beforeAll(() => {
    initTestEnvironment();
  });

  it('should fetch every started quarter in order and skip future periods', async () => {
    const fetcher = new StubFetcher()
      .on(indexUrl(2023, 1), masterIndexZip([Q1_LINE]))
      .on(indexUrl(2023, 2), masterIndexZip([Q2_LINE]));

    const indices = await serviceFor(fetcher).acquireIndices({
      startYear: 2023,
      endYear: 2024,
      userAgent: USER_AGENT,
    });

    expect(indices.map((index) => index.key)).toEqual(['2023-QTR1', '2023-QTR2']);
    expect(indices[1].lines).toEqual([
      { original: Q2_LINE, indexHtmlUrl: 'edgar/data/789019/0000789019-23-000042-index.html' },
    ]);
    expect(fetcher.calls.map((call) => call.url)).toEqual([indexUrl(2023, 1), indexUrl(2023, 2)]);
  });

  it('should only fetch the requested quarters', async () => {
    const fetcher = new StubFetcher().on(indexUrl(2022, 3), masterIndexZip([Q1_LINE]));

    const indices = await serviceFor(fetcher).acquireIndices({
      startYear: 2022,
      endYear: 2022,
      userAgent: USER_AGENT,
      quarters: [3],
    });

    expect(indices.map((index) => index.url)).toEqual([indexUrl(2022, 3)]);
  });

  it('should keep polling failed quarters until they arrive', async () => {
    const fetcher = new StubFetcher()
      .on(indexUrl(2023, 1), null, null, masterIndexZip([Q1_LINE]))
      .on(indexUrl(2023, 2), masterIndexZip([Q2_LINE]));

    const indices = await serviceFor(fetcher).acquireIndices({
      startYear: 2023,
      endYear: 2023,
      userAgent: USER_AGENT,
    });

    expect(indices.map((index) => index.key)).toEqual(['2023-QTR1', '2023-QTR2']);
    expect(fetcher.callsTo(indexUrl(2023, 1))).toBe(3);
    expect(fetcher.callsTo(indexUrl(2023, 2))).toBe(1);
  });

  it('should bypass a cached payload that cannot be unpacked', async () => {
    const fetcher = new StubFetcher().on(
      indexUrl(2023, 1),
      '<html>Request Rate Threshold Exceeded</html>',
      masterIndexZip([Q1_LINE]),
    );

    const indices = await serviceFor(fetcher).acquireIndices({
      startYear: 2023,
      endYear: 2023,
      userAgent: USER_AGENT,
      quarters: [1],
    });

    expect(indices[0].lines).toHaveLength(1);
    expect(fetcher.callsTo(indexUrl(2023, 1))).toBe(2);
  });

  it('should give up at the pass ceiling', async () => {
    const fetcher = new StubFetcher()
      .on(indexUrl(2023, 1), masterIndexZip([Q1_LINE]))
      .on(indexUrl(2023, 2), null);

    const attempt = serviceFor(fetcher, { maxPasses: 2 }).acquireIndices({
      startYear: 2023,
      endYear: 2023,
      userAgent: USER_AGENT,
    });

    await expect(attempt).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(attempt).rejects.toMatchObject({
      details: { stage: 'index-acquisition', passes: 2, unresolved: ['2023-QTR2'] },
    });
    expect(fetcher.callsTo(indexUrl(2023, 2))).toBe(2);
  });

  it('should reject quarters outside 1-4', async () => {
    await expect(
      serviceFor(new StubFetcher()).acquireIndices({
        startYear: 2023,
        endYear: 2023,
        userAgent: USER_AGENT,
        quarters: [1, 5],
      }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject an inverted year range', async () => {
    await expect(
      serviceFor(new StubFetcher()).acquireIndices({
        startYear: 2023,
        endYear: 2021,
        userAgent: USER_AGENT,
      }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('should store the archive bytes it acquired', async () => {
    const archive = masterIndexZip([Q1_LINE]);
    const fetcher = new StubFetcher().on(indexUrl(2023, 1), archive);

    const [index] = await serviceFor(fetcher).acquireIndices({
      startYear: 2023,
      endYear: 2023,
      userAgent: USER_AGENT,
      quarters: [1],
    });

    expect(new AdmZip(index.content).getEntries().map((entry) => entry.entryName)).toEqual(['master.idx']);
  });
});
