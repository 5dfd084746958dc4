/**
 * AUCTION CSV PARSER
 *
 * Maps the upstream CSV onto AuctionRow by header name, so upstream column
 * reordering does not matter. Rows that cannot be read or mapped become
 * warnings; only a document with no usable header is fatal here. Zero
 * surviving rows is judged by the pipeline.
 *
 * Values are kept verbatim (no trimming) so a stored row set re-serializes
 * to the same field values it was parsed from.
 */

import { parse } from 'csv-parse/sync';
import { ParseError, errorMessage } from '../../../common/errors.js';
import type {
  AuctionField,
  AuctionRow,
  ParseWarning,
  ParsedCsv,
} from '../contracts/auction.contracts.js';

// ═══════════════════════════════════════════════════════════════
// COLUMN LAYOUT
// ═══════════════════════════════════════════════════════════════

const FIELD_BY_HEADER: Readonly<Record<string, AuctionField>> = {
  sell_number: 'sellNumber',
  car_number: 'carNumber',
  vin: 'vin',
  auction_name: 'auctionName',
  'post title': 'postTitle',
  title: 'title',
  year: 'year',
  km: 'km',
  price: 'price',
  color: 'color',
  fuel: 'fuel',
  trans: 'trans',
  score: 'score',
  image: 'image',
};

const REQUIRED_HEADERS = ['sell_number', 'car_number'] as const;

const SELL_NUMBER_RE = /^(\d+|\d{1,3}(,\d{3})+)$/;

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

export function fieldForHeader(header: string): AuctionField | undefined {
  return FIELD_BY_HEADER[normalizeHeader(header)];
}

function emptyRow(rowIndex: number): AuctionRow {
  return {
    rowIndex,
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
    extra: {},
  };
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'))
  );
}

// ═══════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════

interface SkippedRecord {
  /** Position among all records, header included */
  position: number;
  reason: string;
}

interface SourceRecords {
  records: string[][];
  /** Position of each returned record among all records, header included */
  positions: number[];
  skipped: SkippedRecord[];
}

function readRecords(text: string): SourceRecords {
  const positions: number[] = [];
  const skipped: SkippedRecord[] = [];
  let position = 0;
  let lastSkippedLine: number | undefined;

  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      on_record: (record) => {
        positions.push(position++);
        return record;
      },
      on_skip: (err) => {
        // One record can raise several errors; it is still one skipped record
        const line = err && typeof err.lines === 'number' ? err.lines : undefined;
        if (line === undefined || line !== lastSkippedLine) {
          skipped.push({ position: position++, reason: `malformed CSV: ${err ? err.message : 'unreadable record'}` });
        }
        lastSkippedLine = line;
        return undefined;
      },
    });
  } catch (err) {
    throw new ParseError(`Malformed CSV: ${errorMessage(err)}`);
  }
  if (!isStringMatrix(records)) {
    throw new ParseError('Malformed CSV: unexpected record shape');
  }
  return { records, positions, skipped };
}

function checkHeader(columns: string[]): void {
  const normalized = columns.map(normalizeHeader);

  const missing = REQUIRED_HEADERS.filter((h) => !normalized.includes(h));
  if (missing.length > 0) {
    throw new ParseError(`CSV header is missing required column(s): ${missing.join(', ')}`);
  }

  const seen = new Set<string>();
  for (const name of normalized) {
    if (seen.has(name)) {
      throw new ParseError(`CSV header repeats column "${name}"`);
    }
    seen.add(name);
  }
}

function mapRecord(columns: string[], record: string[], rowIndex: number): AuctionRow | string {
  if (record.length !== columns.length) {
    return `expected ${columns.length} columns, got ${record.length}`;
  }

  const row = emptyRow(rowIndex);
  columns.forEach((column, i) => {
    const field = fieldForHeader(column);
    if (field) {
      row[field] = record[i];
    } else {
      row.extra[column] = record[i];
    }
  });

  if (!SELL_NUMBER_RE.test(row.sellNumber.trim())) {
    return `sell_number "${row.sellNumber}" is not a number`;
  }
  if (row.carNumber.trim() === '') {
    return 'car_number is empty';
  }
  return row;
}

export function parseAuctionCsv(text: string): ParsedCsv {
  const { records, positions, skipped } = readRecords(text);
  if (records.length === 0 && skipped.length === 0) {
    throw new ParseError('CSV is empty');
  }
  if (positions[0] !== 0) {
    throw new ParseError(`CSV header is malformed: ${skipped[0]?.reason ?? 'unreadable'}`);
  }

  const [columns, ...data] = records;
  checkHeader(columns);

  const rows: AuctionRow[] = [];
  const warnings: ParseWarning[] = skipped.map((s) => ({ rowIndex: s.position - 1, reason: s.reason }));

  data.forEach((record, i) => {
    const rowIndex = positions[i + 1] - 1;
    const mapped = mapRecord(columns, record, rowIndex);
    if (typeof mapped === 'string') {
      warnings.push({ rowIndex, reason: mapped });
    } else {
      rows.push(mapped);
    }
  });

  warnings.sort((a, b) => a.rowIndex - b.rowIndex);
  return { columns, rows, rowCount: rows.length, warnings };
}
