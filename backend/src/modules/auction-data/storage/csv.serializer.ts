/**
 * Row set → CSV text, for row-oriented backends.
 * Column order is the stored header order; rows keep their rowIndex order.
 */

import type { AuctionRow } from '../contracts/auction.contracts.js';
import { fieldForHeader } from '../ingest/csv_record.parser.js';

export function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function cellFor(row: AuctionRow, column: string): string {
  const field = fieldForHeader(column);
  if (field) return row[field];
  return row.extra[column] ?? '';
}

export function serializeRows(columns: string[], rows: AuctionRow[]): string {
  const ordered = [...rows].sort((a, b) => a.rowIndex - b.rowIndex);
  const lines = [
    columns.map(escapeCsvCell).join(','),
    ...ordered.map((row) => columns.map((c) => escapeCsvCell(cellFor(row, c))).join(',')),
  ];
  return lines.join('\n') + '\n';
}
