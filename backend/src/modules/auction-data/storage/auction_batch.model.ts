/**
 * AUCTION DATA — MongoDB Models
 */

import mongoose, { Schema } from 'mongoose';

export interface AuctionBatchDoc {
  date: string;
  filename: string;
  fingerprint: string;
  rowCount: number;
  columns: string[];
  content: string;
  updatedAt: Date;
}

export interface AuctionHistoryDoc extends AuctionBatchDoc {
  ingestedAt: Date;
}

// ═══════════════════════════════════════════════════════════════
// CURRENT BATCH (one document per date)
// ═══════════════════════════════════════════════════════════════

const AuctionBatchSchema = new Schema<AuctionBatchDoc>({
  date: { type: String, required: true, unique: true, index: true },
  filename: { type: String, required: true },
  fingerprint: { type: String, required: true },
  rowCount: { type: Number, required: true },
  columns: [{ type: String }],
  content: { type: String, required: true },
  updatedAt: { type: Date, required: true },
}, {
  collection: 'auction_data',
  versionKey: false,
});

export const AuctionBatchModel = mongoose.model<AuctionBatchDoc>('AuctionBatch', AuctionBatchSchema);

// ═══════════════════════════════════════════════════════════════
// HISTORY (append-only)
// ═══════════════════════════════════════════════════════════════

const AuctionHistorySchema = new Schema<AuctionHistoryDoc>({
  date: { type: String, required: true, index: true },
  filename: { type: String, required: true },
  fingerprint: { type: String, required: true },
  rowCount: { type: Number, required: true },
  columns: [{ type: String }],
  content: { type: String, required: true },
  updatedAt: { type: Date, required: true },
  ingestedAt: { type: Date, required: true },
}, {
  collection: 'auction_data_history',
  versionKey: false,
});

AuctionHistorySchema.index({ date: 1, ingestedAt: 1 });

export const AuctionHistoryModel = mongoose.model<AuctionHistoryDoc>('AuctionHistory', AuctionHistorySchema);
