/**
 * FILESYSTEM BACKEND
 *
 * Layout under rootDir:
 *   <YYMMDD>.json                                   current batch (meta + raw CSV)
 *   history/<YYMMDD>/<ingestedAtMs>-<uuid>.json     append-only copies
 *
 * A replace writes a uniquely named temp file in the same directory and
 * renames it over the target, so a reader opens either the old file or the
 * new one. Concurrent replaces of one date: last rename wins.
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AppError, NotFoundError, WriteError, errorMessage, hasErrorCode } from '../../../common/errors.js';
import type {
  AuctionBatch,
  HistoryEntry,
  NewAuctionBatch,
  StorageDate,
} from '../contracts/auction.contracts.js';
import type { StorageBackend } from './storage.backend.js';
import { assertStorageDate, sortDatesDesc } from './storage.backend.js';

interface BatchEnvelope {
  date: string;
  filename: string;
  fingerprint: string;
  rowCount: number;
  columns: string[];
  updatedAt: string;
  content: string;
}

interface HistoryEnvelope extends BatchEnvelope {
  ingestedAt: string;
}

const CURRENT_FILE_RE = /^(\d{6})\.json$/;

function isBatchEnvelope(value: unknown): value is BatchEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'date' in value && typeof value.date === 'string' &&
    'filename' in value && typeof value.filename === 'string' &&
    'fingerprint' in value && typeof value.fingerprint === 'string' &&
    'rowCount' in value && typeof value.rowCount === 'number' &&
    'columns' in value && Array.isArray(value.columns) &&
    value.columns.every((c) => typeof c === 'string') &&
    'updatedAt' in value && typeof value.updatedAt === 'string' &&
    'content' in value && typeof value.content === 'string'
  );
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isHistoryEnvelope(value: unknown): value is HistoryEnvelope {
  return isBatchEnvelope(value) && 'ingestedAt' in value && typeof value.ingestedAt === 'string';
}

function toEnvelope(batch: NewAuctionBatch): BatchEnvelope {
  return {
    date: batch.date,
    filename: batch.filename,
    fingerprint: batch.fingerprint,
    rowCount: batch.rowCount,
    columns: batch.columns,
    updatedAt: batch.updatedAt.toISOString(),
    content: batch.content,
  };
}

export interface FilesystemBackendOptions {
  rootDir: string;
  historyEnabled: boolean;
}

export class FilesystemBackend implements StorageBackend {
  readonly kind = 'filesystem';
  readonly historyEnabled: boolean;
  private readonly rootDir: string;

  constructor(options: FilesystemBackendOptions) {
    this.rootDir = options.rootDir;
    this.historyEnabled = options.historyEnabled;
  }

  private currentPath(date: StorageDate): string {
    assertStorageDate(date);
    return path.join(this.rootDir, `${date}.json`);
  }

  private historyDir(date: StorageDate): string {
    assertStorageDate(date);
    return path.join(this.rootDir, 'history', date);
  }

  async ensureExists(date: StorageDate): Promise<boolean> {
    try {
      await fs.access(this.currentPath(date));
      return true;
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return false;
      throw err;
    }
  }

  async readCurrent(date: StorageDate): Promise<AuctionBatch> {
    const file = this.currentPath(date);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        throw new NotFoundError(`No auction data for ${date}`);
      }
      throw err;
    }

    const parsed = parseJson(raw);
    if (!isBatchEnvelope(parsed)) {
      throw new AppError('CORRUPT_BATCH', `Stored batch for ${date} is unreadable`, 500);
    }

    return {
      date: parsed.date,
      filename: parsed.filename,
      fingerprint: parsed.fingerprint,
      rowCount: parsed.rowCount,
      updatedAt: new Date(parsed.updatedAt),
      content: parsed.content,
    };
  }

  async replaceCurrent(date: StorageDate, batch: NewAuctionBatch): Promise<void> {
    const target = this.currentPath(date);
    const tmp = path.join(this.rootDir, `.${date}.${uuidv4()}.tmp`);

    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(toEnvelope(batch)), 'utf-8');
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new WriteError(`Failed to replace batch ${date}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async appendHistory(date: StorageDate, batch: NewAuctionBatch, ingestedAt: Date): Promise<void> {
    const dir = this.historyDir(date);
    const entry: HistoryEnvelope = { ...toEnvelope(batch), ingestedAt: ingestedAt.toISOString() };

    try {
      await fs.mkdir(dir, { recursive: true });
      // 'wx' fails rather than overwrite an existing entry
      await fs.writeFile(path.join(dir, `${ingestedAt.getTime()}-${uuidv4()}.json`), JSON.stringify(entry), {
        encoding: 'utf-8',
        flag: 'wx',
      });
    } catch (err) {
      throw new WriteError(`Failed to append history for ${date}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async listHistory(date: StorageDate): Promise<HistoryEntry[]> {
    const dir = this.historyDir(date);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw err;
    }

    const entries: HistoryEntry[] = [];
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      const parsed = parseJson(await fs.readFile(path.join(dir, name), 'utf-8'));
      if (!isHistoryEnvelope(parsed)) continue;
      entries.push({
        date: parsed.date,
        filename: parsed.filename,
        fingerprint: parsed.fingerprint,
        rowCount: parsed.rowCount,
        ingestedAt: new Date(parsed.ingestedAt),
      });
    }
    return entries.sort((a, b) => a.ingestedAt.getTime() - b.ingestedAt.getTime());
  }

  async serializeToCsv(date: StorageDate): Promise<string> {
    const batch = await this.readCurrent(date);
    return batch.content;
  }

  async listDates(): Promise<StorageDate[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.rootDir);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw err;
    }

    const dates: StorageDate[] = [];
    for (const name of names) {
      const match = CURRENT_FILE_RE.exec(name);
      if (match) dates.push(match[1]);
    }
    return sortDatesDesc(dates);
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
