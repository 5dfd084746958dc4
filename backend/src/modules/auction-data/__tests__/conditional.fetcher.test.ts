import { describe, it, expect, vi } from 'vitest';
import { AxiosError } from 'axios';
import { NetworkError, UpstreamError } from '../../../common/errors.js';
import { silentLogger } from '../../../common/logger.js';
import { ConditionalFetcher, filenameFromDisposition } from '../ingest/conditional.fetcher.js';
import { RevalidationCache } from '../ingest/revalidation.cache.js';
import { SAMPLE_CSV, requestHeader, respond, scriptedHttp } from './fixtures.js';

const SOURCE = 'https://feed.example.test/auction.csv';

describe('ConditionalFetcher', () => {
  it('should download in full and store validators on 200', async () => {
    const cache = new RevalidationCache();
    const http = scriptedHttp((config) =>
      respond(config, 200, SAMPLE_CSV, {
        etag: '"abc"',
        'last-modified': 'Fri, 05 Sep 2025 09:00:00 GMT',
        'content-disposition': 'attachment; filename="auction_data_250905.csv"',
      })
    );
    const fetcher = new ConditionalFetcher(http, cache, silentLogger);

    const result = await fetcher.fetch(SOURCE);

    expect(result.kind).toBe('changed');
    if (result.kind !== 'changed') return;
    expect(result.status).toBe(200);
    expect(result.document.content.toString('utf-8')).toBe(SAMPLE_CSV);
    expect(result.document.remoteFilename).toBe('auction_data_250905.csv');
    expect(cache.get(SOURCE)).toEqual({ etag: '"abc"', lastModified: 'Fri, 05 Sep 2025 09:00:00 GMT' });
  });

  it('should send stored validators as conditional headers', async () => {
    const cache = new RevalidationCache();
    await cache.commit(SOURCE, { etag: '"abc"', lastModified: 'Fri, 05 Sep 2025 09:00:00 GMT' });

    const seen: Array<{ ifNoneMatch?: string; ifModifiedSince?: string }> = [];
    const http = scriptedHttp((config) => {
      seen.push({
        ifNoneMatch: requestHeader(config, 'If-None-Match'),
        ifModifiedSince: requestHeader(config, 'If-Modified-Since'),
      });
      return respond(config, 304);
    });
    const fetcher = new ConditionalFetcher(http, cache, silentLogger);

    const result = await fetcher.fetch(SOURCE);

    expect(result).toEqual({ kind: 'unchanged', status: 304 });
    expect(seen).toEqual([{ ifNoneMatch: '"abc"', ifModifiedSince: 'Fri, 05 Sep 2025 09:00:00 GMT' }]);
  });

  it('should omit conditional headers when forced', async () => {
    const cache = new RevalidationCache();
    await cache.commit(SOURCE, { etag: '"abc"' });

    let ifNoneMatch: string | undefined = 'unset';
    const http = scriptedHttp((config) => {
      ifNoneMatch = requestHeader(config, 'If-None-Match');
      return respond(config, 200, SAMPLE_CSV, { etag: '"def"' });
    });
    const fetcher = new ConditionalFetcher(http, cache, silentLogger);

    await fetcher.fetch(SOURCE, { force: true });

    expect(ifNoneMatch).toBeUndefined();
    expect(cache.get(SOURCE)?.etag).toBe('"def"');
  });

  it('should raise UpstreamError and keep validators on a non-2xx status', async () => {
    const cache = new RevalidationCache();
    await cache.commit(SOURCE, { etag: '"abc"' });
    const http = scriptedHttp((config) => respond(config, 503, 'busy', { etag: '"zzz"' }));
    const fetcher = new ConditionalFetcher(http, cache, silentLogger);

    const error = await fetcher.fetch(SOURCE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 503 });
    expect(cache.get(SOURCE)?.etag).toBe('"abc"');
  });

  it('should raise a retryable NetworkError when no response arrives', async () => {
    const cache = new RevalidationCache();
    await cache.commit(SOURCE, { etag: '"abc"' });
    const http = scriptedHttp(() => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED');
    });
    const fetcher = new ConditionalFetcher(http, cache, silentLogger);

    const error = await fetcher.fetch(SOURCE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ retryable: true });
    expect(cache.get(SOURCE)?.etag).toBe('"abc"');
  });

  it('should forget validators on invalidate', async () => {
    const cache = new RevalidationCache();
    await cache.commit(SOURCE, { etag: '"abc"' });
    const fetcher = new ConditionalFetcher(scriptedHttp((config) => respond(config, 304)), cache, silentLogger);

    await fetcher.invalidate(SOURCE);

    expect(cache.get(SOURCE)).toBeUndefined();
  });

  it('should log each fetch through the injected logger', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const fetcher = new ConditionalFetcher(
      scriptedHttp((config) => respond(config, 304)),
      new RevalidationCache(),
      logger
    );

    await fetcher.fetch(SOURCE);

    expect(logger.info).toHaveBeenCalledWith({ url: SOURCE, conditional: false }, 'Fetching source');
  });
});

describe('filenameFromDisposition', () => {
  it('should read quoted and bare filenames', () => {
    expect(filenameFromDisposition('attachment; filename="auction_data_250905.csv"')).toBe('auction_data_250905.csv');
    expect(filenameFromDisposition('attachment; filename=auction_data_250905.csv')).toBe('auction_data_250905.csv');
  });

  it('should prefer the RFC 5987 form', () => {
    expect(
      filenameFromDisposition("attachment; filename=\"fallback.csv\"; filename*=UTF-8''%EA%B2%BD%EB%A7%A4_250905.csv")
    ).toBe('경매_250905.csv');
  });

  it('should return undefined without a header', () => {
    expect(filenameFromDisposition(undefined)).toBeUndefined();
    expect(filenameFromDisposition('inline')).toBeUndefined();
  });
});
