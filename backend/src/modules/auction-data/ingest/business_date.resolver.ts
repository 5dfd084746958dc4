/**
 * BUSINESS DATE RESOLVER
 *
 * Data published for business day N is filed under the next business day.
 * Weekends collapse onto Monday:
 *   Mon..Thu → +1 day
 *   Fri      → Mon (+3)
 *   Sat      → Mon (+2)
 *   Sun      → Mon (+1)
 *
 * All arithmetic runs on UTC calendar fields; nothing here reads the wall clock.
 */

import { ValidationError } from '../../../common/errors.js';
import type { StorageDate } from '../contracts/auction.contracts.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// Indexed by Date#getUTCDay(): Sun=0 .. Sat=6
const DAYS_TO_NEXT_BUSINESS_DAY = [1, 1, 1, 1, 1, 3, 2] as const;

// ═══════════════════════════════════════════════════════════════
// YYMMDD
// ═══════════════════════════════════════════════════════════════

function toCalendarDate(value: string): Date | null {
  if (!/^\d{6}$/.test(value)) return null;
  const year = 2000 + Number(value.slice(0, 2));
  const month = Number(value.slice(2, 4));
  const day = Number(value.slice(4, 6));
  const date = new Date(Date.UTC(year, month - 1, day));
  // Reject rollovers such as 250230 → March 2nd
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

export function isValidYymmdd(value: string): boolean {
  return toCalendarDate(value) !== null;
}

/** YYMMDD → UTC midnight of that calendar day */
export function parseYymmdd(value: string): Date {
  const date = toCalendarDate(value);
  if (!date) {
    throw new ValidationError(`Invalid date "${value}", expected YYMMDD`);
  }
  return date;
}

export function formatYymmdd(date: Date): StorageDate {
  const yy = String(date.getUTCFullYear() % 100).padStart(2, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${yy}${mm}${dd}`;
}

// ═══════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════

export function resolveStorageDate(claimed: Date): StorageDate {
  const shift = DAYS_TO_NEXT_BUSINESS_DAY[claimed.getUTCDay()];
  return formatYymmdd(new Date(claimed.getTime() + shift * DAY_MS));
}

export function nextBusinessDay(yymmdd: string): StorageDate {
  return resolveStorageDate(parseYymmdd(yymmdd));
}

/**
 * Source dates that map onto a storage date, most likely first.
 * Tue..Fri → [previous day]; Mon → [Sun, Sat, Fri].
 */
export function previousSourceCandidates(storageDate: StorageDate): StorageDate[] {
  const date = parseYymmdd(storageDate);
  const back = (days: number) => formatYymmdd(new Date(date.getTime() - days * DAY_MS));
  const weekday = date.getUTCDay();

  if (weekday >= 2 && weekday <= 5) {
    return [back(1)];
  }
  if (weekday === 1) {
    return [back(1), back(2), back(3)];
  }
  // Weekend storage dates never come out of resolveStorageDate
  return [];
}

// ═══════════════════════════════════════════════════════════════
// CLAIMED DATE
// ═══════════════════════════════════════════════════════════════

/** Calendar day of `at` in a fixed-offset timezone, as YYMMDD */
export function calendarDayAt(at: Date, utcOffsetMinutes: number): StorageDate {
  return formatYymmdd(new Date(at.getTime() + utcOffsetMinutes * 60_000));
}

/** Pulls YYMMDD out of names like `auction_data_250905.csv` */
export function dateFromFilename(filename: string): StorageDate | null {
  const match = /(?:^|\D)(\d{6})\.csv$/i.exec(filename.trim());
  if (!match) return null;
  return isValidYymmdd(match[1]) ? match[1] : null;
}
