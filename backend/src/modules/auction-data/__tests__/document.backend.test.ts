import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../common/errors.js';
import { AuctionBatchModel, AuctionHistoryModel } from '../storage/auction_batch.model.js';
import { DocumentBackend, batchFromDoc, docFromBatch, historyFromDoc } from '../storage/document.backend.js';
import { SAMPLE_CSV, batchFor } from './fixtures.js';

describe('DocumentBackend (mapping only, no server)', () => {
  it('should map a batch to one document per date', () => {
    const batch = batchFor('250908', SAMPLE_CSV);
    const doc = docFromBatch(batch);

    expect(doc).toEqual({
      date: '250908',
      filename: 'auction_data_250908.csv',
      fingerprint: batch.fingerprint,
      rowCount: 3,
      columns: ['sell_number', 'car_number', 'title', 'year', 'km', 'price', 'lane'],
      content: SAMPLE_CSV,
      updatedAt: new Date('2025-09-08T00:00:00.000Z'),
    });
  });

  it('should map a stored document back to a batch', () => {
    const batch = batchFor('250908', SAMPLE_CSV);
    expect(batchFromDoc(docFromBatch(batch))).toEqual({
      date: '250908',
      filename: 'auction_data_250908.csv',
      fingerprint: batch.fingerprint,
      rowCount: 3,
      updatedAt: new Date('2025-09-08T00:00:00.000Z'),
      content: SAMPLE_CSV,
    });
  });

  it('should map history documents', () => {
    const entry = historyFromDoc({
      date: '250908',
      filename: 'auction_data_250908.csv',
      fingerprint: 'f1',
      rowCount: 3,
      ingestedAt: new Date('2025-09-08T01:00:00.000Z'),
    });
    expect(entry.ingestedAt.toISOString()).toBe('2025-09-08T01:00:00.000Z');
  });

  it('should declare a unique index on date for current batches', () => {
    const indexes = AuctionBatchModel.schema.indexes();
    expect(indexes).toContainEqual([{ date: 1 }, expect.objectContaining({ unique: true })]);
    expect(AuctionBatchModel.collection.collectionName).toBe('auction_data');
    expect(AuctionHistoryModel.collection.collectionName).toBe('auction_data_history');
  });

  it('should validate dates before touching the database', async () => {
    const store = new DocumentBackend(false);
    await expect(store.ensureExists('2509')).rejects.toBeInstanceOf(ValidationError);
  });
});
