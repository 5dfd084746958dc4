/**
 * STORAGE BACKEND
 *
 * Capability set shared by every persistence variant. The variant is picked
 * once from StorageConfig; nothing downstream inspects which one it got.
 *
 * Guarantees each implementation owes the pipeline:
 *   - at most one current batch per date
 *   - replaceCurrent is atomic w.r.t. readers of the same date
 *   - appendHistory only ever adds
 */

import { ValidationError } from '../../../common/errors.js';
import { isValidYymmdd } from '../ingest/business_date.resolver.js';
import type {
  AuctionBatch,
  HistoryEntry,
  NewAuctionBatch,
  StorageDate,
} from '../contracts/auction.contracts.js';

export interface StorageBackend {
  readonly kind: 'filesystem' | 'relational' | 'document';
  readonly historyEnabled: boolean;

  /** Whether a current batch exists for `date`. No side effects. */
  ensureExists(date: StorageDate): Promise<boolean>;

  /** @throws NotFoundError */
  readCurrent(date: StorageDate): Promise<AuctionBatch>;

  /** @throws WriteError */
  replaceCurrent(date: StorageDate, batch: NewAuctionBatch): Promise<void>;

  /** @throws WriteError */
  appendHistory(date: StorageDate, batch: NewAuctionBatch, ingestedAt: Date): Promise<void>;

  /** Oldest first; empty when history is disabled or never written */
  listHistory(date: StorageDate): Promise<HistoryEntry[]>;

  /** @throws NotFoundError */
  serializeToCsv(date: StorageDate): Promise<string>;

  /** Dates with a current batch, newest first */
  listDates(): Promise<StorageDate[]>;

  close(): Promise<void>;
}

/** Newest first; YYMMDD sorts lexically within one century. */
export function sortDatesDesc(dates: Iterable<StorageDate>): StorageDate[] {
  return [...dates].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}

/** Dates become file names and keys; anything but a real YYMMDD is refused. */
export function assertStorageDate(date: string): void {
  if (!isValidYymmdd(date)) {
    throw new ValidationError(`Invalid storage date "${date}", expected YYMMDD`);
  }
}
