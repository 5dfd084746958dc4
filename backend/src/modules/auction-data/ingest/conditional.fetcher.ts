/**
 * CONDITIONAL FETCHER
 *
 * GET with If-None-Match / If-Modified-Since taken from the RevalidationCache.
 *   304        → unchanged (storage is never touched)
 *   2xx        → changed, validators committed after the body is read
 *   other      → UpstreamError
 *   no answer  → NetworkError (retryable)
 */

import { AxiosHeaders } from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { NetworkError, UpstreamError, errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { defaultLogger } from '../../../common/logger.js';
import type { FetchResult, Validators } from '../contracts/auction.contracts.js';
import type { RevalidationCache } from './revalidation.cache.js';

export interface FetchOptions {
  /** Skip conditional headers and download unconditionally */
  force?: boolean;
}

function headerValue(headers: AxiosResponse['headers'], name: string): string | undefined {
  const value: unknown = headers instanceof AxiosHeaders ? headers.get(name) : headers[name.toLowerCase()];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  return null;
}

function decodeFilename(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch {
    return undefined;
  }
}

/** filename*=UTF-8''… wins over filename="…" */
export function filenameFromDisposition(value: string | undefined): string | undefined {
  if (!value) return undefined;

  const extended = /filename\*\s*=\s*(?:[\w-]+'[^']*')?"?([^";]+)"?/i.exec(value);
  if (extended) {
    const decoded = decodeFilename(extended[1].trim());
    if (decoded) return decoded;
  }

  const plain = /filename\s*=\s*"?([^";]+)"?/i.exec(value);
  return plain ? plain[1].trim() : undefined;
}

export class ConditionalFetcher {
  constructor(
    private readonly http: AxiosInstance,
    private readonly cache: RevalidationCache,
    private readonly logger: Logger = defaultLogger
  ) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const known = options.force ? undefined : this.cache.get(url);
    const headers: Record<string, string> = {};
    if (known?.etag) headers['If-None-Match'] = known.etag;
    if (known?.lastModified) headers['If-Modified-Since'] = known.lastModified;

    this.logger.info({ url, conditional: Object.keys(headers).length > 0 }, 'Fetching source');

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, {
        headers,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
    } catch (err) {
      throw new NetworkError(`Request to ${url} failed: ${errorMessage(err)}`);
    }

    if (response.status === 304) {
      this.logger.info({ url }, 'Source not modified');
      return { kind: 'unchanged', status: 304 };
    }

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(response.status, `Upstream returned HTTP ${response.status} for ${url}`);
    }

    const content = toBuffer(response.data);
    if (!content) {
      throw new UpstreamError(response.status, `Upstream body for ${url} could not be read`);
    }

    const validators: Validators = {
      etag: headerValue(response.headers, 'etag'),
      lastModified: headerValue(response.headers, 'last-modified'),
    };
    await this.cache.commit(url, validators);

    this.logger.info({ url, status: response.status, bytes: content.length }, 'Source downloaded');

    return {
      kind: 'changed',
      status: response.status,
      document: {
        content,
        validators,
        remoteFilename: filenameFromDisposition(headerValue(response.headers, 'content-disposition')),
        fetchedAt: new Date(),
      },
    };
  }

  /**
   * Drop stored validators so the next fetch downloads in full. Used when a
   * downloaded document could not be committed to storage.
   */
  async invalidate(url: string): Promise<void> {
    await this.cache.forget(url);
  }
}
