import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RevalidationCache } from '../ingest/revalidation.cache.js';
import { makeTempDir, removeDir } from './fixtures.js';

const URL_A = 'https://feed.example.test/auction.csv';

describe('RevalidationCache', () => {
  let dir: string;
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await makeTempDir('cache');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should return undefined for an unknown URL', () => {
    const cache = new RevalidationCache();
    expect(cache.get(URL_A)).toBeUndefined();
  });

  it('should return the last committed validators', async () => {
    const cache = new RevalidationCache();
    await cache.commit(URL_A, { etag: '"v1"' });
    await cache.commit(URL_A, { etag: '"v2"', lastModified: 'Mon, 08 Sep 2025 00:00:00 GMT' });

    expect(cache.get(URL_A)).toEqual({ etag: '"v2"', lastModified: 'Mon, 08 Sep 2025 00:00:00 GMT' });
  });

  it('should forget a URL', async () => {
    const cache = new RevalidationCache();
    await cache.commit(URL_A, { etag: '"v1"' });
    await cache.forget(URL_A);
    expect(cache.get(URL_A)).toBeUndefined();
  });

  it('should persist and reload validators', async () => {
    const persistPath = path.join(dir, 'nested', 'validators.json');
    const first = new RevalidationCache({ persistPath, logger: mockLogger });
    await first.commit(URL_A, { etag: '"v7"' });

    const second = new RevalidationCache({ persistPath, logger: mockLogger });
    await second.load();
    expect(second.get(URL_A)).toEqual({ etag: '"v7"', lastModified: undefined });

    const leftovers = (await fs.readdir(path.dirname(persistPath))).filter((n) => n.endsWith('.tmp'));
    expect(leftovers).toEqual([]);
  });

  it('should keep the later commit when commits overlap', async () => {
    const persistPath = path.join(dir, 'validators.json');
    const cache = new RevalidationCache({ persistPath, logger: mockLogger });

    await Promise.all([
      cache.commit(URL_A, { etag: '"early"' }),
      cache.commit(URL_A, { etag: '"late"' }),
    ]);

    const reloaded = new RevalidationCache({ persistPath, logger: mockLogger });
    await reloaded.load();
    expect(reloaded.get(URL_A)?.etag).toBe('"late"');
  });

  it('should start empty when the file is missing', async () => {
    const cache = new RevalidationCache({ persistPath: path.join(dir, 'absent.json'), logger: mockLogger });
    await cache.load();
    expect(cache.get(URL_A)).toBeUndefined();
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it('should start empty and warn when the file is not JSON', async () => {
    const persistPath = path.join(dir, 'validators.json');
    await fs.writeFile(persistPath, '{not json', 'utf-8');

    const cache = new RevalidationCache({ persistPath, logger: mockLogger });
    await cache.load();

    expect(cache.get(URL_A)).toBeUndefined();
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('should drop malformed entries on load', async () => {
    const persistPath = path.join(dir, 'validators.json');
    await fs.writeFile(
      persistPath,
      JSON.stringify({
        [URL_A]: { etag: '"ok"', savedAt: '2025-09-08T00:00:00.000Z' },
        'https://other.example.test/x.csv': { etag: 42, savedAt: '2025-09-08T00:00:00.000Z' },
      }),
      'utf-8'
    );

    const cache = new RevalidationCache({ persistPath, logger: mockLogger });
    await cache.load();

    expect(cache.get(URL_A)?.etag).toBe('"ok"');
    expect(cache.get('https://other.example.test/x.csv')).toBeUndefined();
  });
});
