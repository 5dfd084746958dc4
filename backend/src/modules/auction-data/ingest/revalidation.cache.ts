/**
 * REVALIDATION CACHE
 *
 * Last-seen ETag / Last-Modified per source URL. One instance is created at
 * process start and handed to the ConditionalFetcher, which is its only
 * reader and writer.
 *
 * Optional persistence: a JSON file rewritten via tmp + rename after each
 * commit. Writes are chained so they land in commit order.
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, hasErrorCode } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { defaultLogger } from '../../../common/logger.js';
import type { Validators } from '../contracts/auction.contracts.js';

export interface ValidatorEntry extends Validators {
  savedAt: string;
}

export interface RevalidationCacheOptions {
  /** JSON file to load from and persist to; omit for in-memory only */
  persistPath?: string;
  logger?: Logger;
}

function optionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isValidatorEntry(value: unknown): value is ValidatorEntry {
  if (typeof value !== 'object' || value === null || !('savedAt' in value)) return false;
  if (typeof value.savedAt !== 'string') return false;
  const etag = 'etag' in value ? value.etag : undefined;
  const lastModified = 'lastModified' in value ? value.lastModified : undefined;
  return optionalString(etag) && optionalString(lastModified);
}

export class RevalidationCache {
  private entries = new Map<string, ValidatorEntry>();
  private persistChain: Promise<void> = Promise.resolve();
  private readonly persistPath?: string;
  private readonly logger: Logger;

  constructor(options: RevalidationCacheOptions = {}) {
    this.persistPath = options.persistPath;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Load persisted validators. A missing or unreadable file starts empty:
   * the next fetch is then a full download, which is always safe.
   */
  async load(): Promise<void> {
    if (!this.persistPath) return;

    let raw: string;
    try {
      raw = await fs.readFile(this.persistPath, 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return;
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn({ path: this.persistPath }, 'Validator cache is not valid JSON, starting empty');
      return;
    }
    if (typeof parsed !== 'object' || parsed === null) return;

    for (const [url, entry] of Object.entries(parsed)) {
      if (isValidatorEntry(entry)) {
        this.entries.set(url, entry);
      }
    }
  }

  get(url: string): Validators | undefined {
    const entry = this.entries.get(url);
    if (!entry) return undefined;
    return { etag: entry.etag, lastModified: entry.lastModified };
  }

  /**
   * Record validators of a fully read response. Last commit wins: a
   * concurrent fetch that finishes later overwrites an earlier one.
   */
  async commit(url: string, validators: Validators): Promise<void> {
    this.entries.set(url, {
      etag: validators.etag,
      lastModified: validators.lastModified,
      savedAt: new Date().toISOString(),
    });
    await this.persist();
  }

  async forget(url: string): Promise<void> {
    this.entries.delete(url);
    await this.persist();
  }

  private persist(): Promise<void> {
    const target = this.persistPath;
    if (!target) return Promise.resolve();

    const run = async () => {
      const snapshot = JSON.stringify(Object.fromEntries(this.entries), null, 2);
      await fs.mkdir(path.dirname(target), { recursive: true });
      const tmp = `${target}.${uuidv4()}.tmp`;
      await fs.writeFile(tmp, snapshot, 'utf-8');
      await fs.rename(tmp, target);
    };

    // Memory is already updated; a failed write is logged, never thrown
    this.persistChain = this.persistChain.then(run).catch((err: unknown) => {
      this.logger.error({ path: target, err: errorMessage(err) }, 'Failed to persist validator cache');
    });
    return this.persistChain;
  }
}
