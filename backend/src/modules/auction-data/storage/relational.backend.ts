/**
 * RELATIONAL BACKEND (SQLite)
 *
 *   auction_batches   one row per date: meta + header order
 *   auction_records   one row per AuctionRow, PK (date, row_index)
 *   auction_history   append-only, surrogate id + ingested_at
 *
 * replaceCurrent deletes and reinserts a date's rows inside one transaction;
 * readers see the committed set before or after it, never a mix.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { AppError, NotFoundError, WriteError, errorMessage } from '../../../common/errors.js';
import type {
  AuctionBatch,
  AuctionField,
  AuctionRow,
  HistoryEntry,
  NewAuctionBatch,
  StorageDate,
} from '../contracts/auction.contracts.js';
import { serializeRows } from './csv.serializer.js';
import type { StorageBackend } from './storage.backend.js';
import { assertStorageDate, sortDatesDesc } from './storage.backend.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

const RECORD_COLUMNS: ReadonlyArray<readonly [AuctionField, string]> = [
  ['sellNumber', 'sell_number'],
  ['carNumber', 'car_number'],
  ['vin', 'vin'],
  ['auctionName', 'auction_name'],
  ['postTitle', 'post_title'],
  ['title', 'title'],
  ['year', 'year'],
  ['km', 'km'],
  ['price', 'price'],
  ['color', 'color'],
  ['fuel', 'fuel'],
  ['trans', 'trans'],
  ['score', 'score'],
  ['image', 'image'],
];

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS auction_batches (
    date TEXT PRIMARY KEY,
    filename TEXT NOT NULL,
    fingerprint TEXT NOT NULL,
    row_count INTEGER NOT NULL,
    columns TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS auction_records (
    date TEXT NOT NULL,
    row_index INTEGER NOT NULL,
    ${RECORD_COLUMNS.map(([, column]) => `${column} TEXT NOT NULL DEFAULT ''`).join(',\n    ')},
    extra TEXT NOT NULL DEFAULT '{}',
    PRIMARY KEY (date, row_index)
  );

  CREATE TABLE IF NOT EXISTS auction_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    filename TEXT NOT NULL,
    fingerprint TEXT NOT NULL,
    row_count INTEGER NOT NULL,
    columns TEXT NOT NULL,
    content TEXT NOT NULL,
    ingested_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_auction_history_date ON auction_history(date, ingested_at);
`;

interface BatchRow {
  date: string;
  filename: string;
  fingerprint: string;
  row_count: number;
  columns: string;
  updated_at: string;
}

interface RecordRow {
  row_index: number;
  extra: string;
  [column: string]: string | number;
}

interface HistoryRow {
  date: string;
  filename: string;
  fingerprint: string;
  row_count: number;
  ingested_at: string;
}

type RecordParams = Record<string, string | number>;

// ═══════════════════════════════════════════════════════════════
// MAPPING
// ═══════════════════════════════════════════════════════════════

function parseStringList(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((c) => typeof c === 'string')) {
    throw new AppError('CORRUPT_BATCH', 'Stored column list is unreadable', 500);
  }
  return parsed;
}

function parseExtra(raw: string): Record<string, string> {
  const parsed: unknown = JSON.parse(raw);
  const extra: Record<string, string> = {};
  if (typeof parsed !== 'object' || parsed === null) return extra;
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') extra[key] = value;
  }
  return extra;
}

function toRecordParams(date: StorageDate, row: AuctionRow): RecordParams {
  const params: RecordParams = {
    date,
    row_index: row.rowIndex,
    extra: JSON.stringify(row.extra),
  };
  for (const [field, column] of RECORD_COLUMNS) {
    params[column] = row[field];
  }
  return params;
}

export function rowFromRecord(record: RecordRow): AuctionRow {
  const row: AuctionRow = {
    rowIndex: record.row_index,
    sellNumber: '',
    carNumber: '',
    vin: '',
    auctionName: '',
    postTitle: '',
    title: '',
    year: '',
    km: '',
    price: '',
    color: '',
    fuel: '',
    trans: '',
    score: '',
    image: '',
    extra: parseExtra(record.extra),
  };
  for (const [field, column] of RECORD_COLUMNS) {
    row[field] = String(record[column] ?? '');
  }
  return row;
}

// ═══════════════════════════════════════════════════════════════
// BACKEND
// ═══════════════════════════════════════════════════════════════

export interface RelationalBackendOptions {
  /** SQLite file, or ':memory:' */
  path: string;
  historyEnabled: boolean;
}

export class RelationalBackend implements StorageBackend {
  readonly kind = 'relational';
  readonly historyEnabled: boolean;
  private readonly db: Database.Database;

  constructor(options: RelationalBackendOptions) {
    this.historyEnabled = options.historyEnabled;

    if (options.path !== ':memory:') {
      fs.mkdirSync(path.dirname(options.path), { recursive: true });
    }
    this.db = new Database(options.path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
  }

  async ensureExists(date: StorageDate): Promise<boolean> {
    assertStorageDate(date);
    const found = this.db
      .prepare<[string], { date: string }>('SELECT date FROM auction_batches WHERE date = ?')
      .get(date);
    return found !== undefined;
  }

  async readCurrent(date: StorageDate): Promise<AuctionBatch> {
    assertStorageDate(date);

    const read = this.db.transaction(() => {
      const meta = this.db
        .prepare<[string], BatchRow>('SELECT * FROM auction_batches WHERE date = ?')
        .get(date);
      if (!meta) return null;
      const records = this.db
        .prepare<[string], RecordRow>('SELECT * FROM auction_records WHERE date = ? ORDER BY row_index')
        .all(date);
      return { meta, records };
    });

    const snapshot = read();
    if (!snapshot) {
      throw new NotFoundError(`No auction data for ${date}`);
    }

    const { meta, records } = snapshot;
    return {
      date: meta.date,
      filename: meta.filename,
      fingerprint: meta.fingerprint,
      rowCount: meta.row_count,
      updatedAt: new Date(meta.updated_at),
      content: serializeRows(parseStringList(meta.columns), records.map(rowFromRecord)),
    };
  }

  async replaceCurrent(date: StorageDate, batch: NewAuctionBatch): Promise<void> {
    assertStorageDate(date);

    const upsertBatch = this.db.prepare(`
      INSERT INTO auction_batches (date, filename, fingerprint, row_count, columns, updated_at)
      VALUES (@date, @filename, @fingerprint, @row_count, @columns, @updated_at)
      ON CONFLICT(date) DO UPDATE SET
        filename = excluded.filename,
        fingerprint = excluded.fingerprint,
        row_count = excluded.row_count,
        columns = excluded.columns,
        updated_at = excluded.updated_at
    `);
    const deleteRecords = this.db.prepare('DELETE FROM auction_records WHERE date = ?');
    const columnList = RECORD_COLUMNS.map(([, column]) => column);
    const insertRecord = this.db.prepare(`
      INSERT INTO auction_records (date, row_index, ${columnList.join(', ')}, extra)
      VALUES (@date, @row_index, ${columnList.map((c) => `@${c}`).join(', ')}, @extra)
    `);

    const replace = this.db.transaction((rows: AuctionRow[]) => {
      upsertBatch.run({
        date,
        filename: batch.filename,
        fingerprint: batch.fingerprint,
        row_count: batch.rowCount,
        columns: JSON.stringify(batch.columns),
        updated_at: batch.updatedAt.toISOString(),
      });
      deleteRecords.run(date);
      for (const row of rows) {
        insertRecord.run(toRecordParams(date, row));
      }
    });

    try {
      replace(batch.rows);
    } catch (err) {
      throw new WriteError(`Failed to replace batch ${date}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async appendHistory(date: StorageDate, batch: NewAuctionBatch, ingestedAt: Date): Promise<void> {
    assertStorageDate(date);
    try {
      this.db
        .prepare(`
          INSERT INTO auction_history (date, filename, fingerprint, row_count, columns, content, ingested_at)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          date,
          batch.filename,
          batch.fingerprint,
          batch.rowCount,
          JSON.stringify(batch.columns),
          batch.content,
          ingestedAt.toISOString()
        );
    } catch (err) {
      throw new WriteError(`Failed to append history for ${date}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async listHistory(date: StorageDate): Promise<HistoryEntry[]> {
    assertStorageDate(date);
    const rows = this.db
      .prepare<[string], HistoryRow>(
        'SELECT date, filename, fingerprint, row_count, ingested_at FROM auction_history WHERE date = ? ORDER BY ingested_at, id'
      )
      .all(date);
    return rows.map((row) => ({
      date: row.date,
      filename: row.filename,
      fingerprint: row.fingerprint,
      rowCount: row.row_count,
      ingestedAt: new Date(row.ingested_at),
    }));
  }

  async serializeToCsv(date: StorageDate): Promise<string> {
    const batch = await this.readCurrent(date);
    return batch.content;
  }

  async listDates(): Promise<StorageDate[]> {
    const rows = this.db.prepare<[], { date: string }>('SELECT date FROM auction_batches').all();
    return sortDatesDesc(rows.map((r) => r.date));
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
