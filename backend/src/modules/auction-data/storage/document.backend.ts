/**
 * DOCUMENT BACKEND (MongoDB)
 *
 * One document per date in `auction_data`, raw CSV inline. A replace is a
 * single-document upsert, which MongoDB applies atomically. The connection
 * is owned by db/mongoose.ts, not by this class.
 */

import { NotFoundError, WriteError, errorMessage, hasErrorCode } from '../../../common/errors.js';
import type {
  AuctionBatch,
  HistoryEntry,
  NewAuctionBatch,
  StorageDate,
} from '../contracts/auction.contracts.js';
import type { AuctionBatchDoc, AuctionHistoryDoc } from './auction_batch.model.js';
import { AuctionBatchModel, AuctionHistoryModel } from './auction_batch.model.js';
import type { StorageBackend } from './storage.backend.js';
import { assertStorageDate, sortDatesDesc } from './storage.backend.js';

const DUPLICATE_KEY = 11000;

export function docFromBatch(batch: NewAuctionBatch): AuctionBatchDoc {
  return {
    date: batch.date,
    filename: batch.filename,
    fingerprint: batch.fingerprint,
    rowCount: batch.rowCount,
    columns: [...batch.columns],
    content: batch.content,
    updatedAt: batch.updatedAt,
  };
}

export function batchFromDoc(doc: Omit<AuctionBatchDoc, 'columns'>): AuctionBatch {
  return {
    date: doc.date,
    filename: doc.filename,
    fingerprint: doc.fingerprint,
    rowCount: doc.rowCount,
    updatedAt: new Date(doc.updatedAt),
    content: doc.content,
  };
}

export function historyFromDoc(doc: Pick<AuctionHistoryDoc, 'date' | 'filename' | 'fingerprint' | 'rowCount' | 'ingestedAt'>): HistoryEntry {
  return {
    date: doc.date,
    filename: doc.filename,
    fingerprint: doc.fingerprint,
    rowCount: doc.rowCount,
    ingestedAt: new Date(doc.ingestedAt),
  };
}

export class DocumentBackend implements StorageBackend {
  readonly kind = 'document';

  constructor(readonly historyEnabled: boolean) {}

  async ensureExists(date: StorageDate): Promise<boolean> {
    assertStorageDate(date);
    const found = await AuctionBatchModel.exists({ date });
    return found !== null;
  }

  async readCurrent(date: StorageDate): Promise<AuctionBatch> {
    assertStorageDate(date);
    const doc = await AuctionBatchModel.findOne({ date }).lean().exec();
    if (!doc) {
      throw new NotFoundError(`No auction data for ${date}`);
    }
    return batchFromDoc(doc);
  }

  async replaceCurrent(date: StorageDate, batch: NewAuctionBatch): Promise<void> {
    assertStorageDate(date);
    const upsert = () =>
      AuctionBatchModel.updateOne({ date }, { $set: docFromBatch(batch) }, { upsert: true }).exec();

    try {
      try {
        await upsert();
      } catch (err) {
        // Two first-time upserts race on the unique index; the loser retries as an update
        if (!hasErrorCode(err, DUPLICATE_KEY)) throw err;
        await upsert();
      }
    } catch (err) {
      throw new WriteError(`Failed to replace batch ${date}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async appendHistory(date: StorageDate, batch: NewAuctionBatch, ingestedAt: Date): Promise<void> {
    assertStorageDate(date);
    try {
      await AuctionHistoryModel.create({ ...docFromBatch(batch), ingestedAt });
    } catch (err) {
      throw new WriteError(`Failed to append history for ${date}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async listHistory(date: StorageDate): Promise<HistoryEntry[]> {
    assertStorageDate(date);
    const docs = await AuctionHistoryModel.find({ date }).sort({ ingestedAt: 1 }).lean().exec();
    return docs.map(historyFromDoc);
  }

  async serializeToCsv(date: StorageDate): Promise<string> {
    const batch = await this.readCurrent(date);
    return batch.content;
  }

  async listDates(): Promise<StorageDate[]> {
    const docs = await AuctionBatchModel.find({}, { date: 1, _id: 0 }).lean().exec();
    return sortDatesDesc(docs.map((d) => d.date));
  }

  async close(): Promise<void> {
    // Connection lifecycle belongs to db/mongoose.ts
  }
}
