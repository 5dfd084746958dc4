/**
 * AUCTION DATA SERVICE
 *
 * What the HTTP layer, the cron job and the scripts talk to.
 * Reads go straight to the storage backend; ingestion goes through the pipeline.
 */

import { ConfigurationError, ValidationError } from '../../../common/errors.js';
import type {
  IngestionOptions,
  IngestionResult,
  PagedDates,
  StorageDate,
} from '../contracts/auction.contracts.js';
import type { IngestionPipeline } from '../ingest/ingestion.pipeline.js';
import type { StorageBackend } from '../storage/storage.backend.js';
import { assertStorageDate } from '../storage/storage.backend.js';

export const MAX_PAGE_SIZE = 100;

export interface CsvFile {
  filename: string;
  content: string;
}

export interface AuctionDataServiceDeps {
  storage: StorageBackend;
  pipeline: IngestionPipeline;
  /** Empty disables triggerIngestion */
  sourceUrl: string;
}

export class AuctionDataService {
  constructor(private readonly deps: AuctionDataServiceDeps) {}

  get storage(): StorageBackend {
    return this.deps.storage;
  }

  get crawlEnabled(): boolean {
    return this.deps.sourceUrl !== '';
  }

  /** Dates with a current batch, newest first */
  listDates(): Promise<StorageDate[]> {
    return this.deps.storage.listDates();
  }

  async listDatesPaged(page: number, size: number): Promise<PagedDates> {
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be an integer >= 1');
    }
    if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
      throw new ValidationError(`size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }

    const all = await this.deps.storage.listDates();
    const start = (page - 1) * size;
    return {
      items: all.slice(start, start + size),
      page,
      size,
      total: all.length,
      totalPages: Math.ceil(all.length / size),
    };
  }

  /** @throws ValidationError | NotFoundError */
  async getCsv(date: string): Promise<CsvFile> {
    assertStorageDate(date);
    const batch = await this.deps.storage.readCurrent(date);
    return { filename: batch.filename, content: batch.content };
  }

  /**
   * Run the pipeline once. Failures come back in the result; only a missing
   * source URL is thrown, since no run can start without one.
   */
  async triggerIngestion(options: IngestionOptions = {}): Promise<IngestionResult> {
    if (!this.crawlEnabled) {
      throw new ConfigurationError('CRAWL_URL is not configured');
    }
    return this.deps.pipeline.run(options);
  }

  /** Existence check for admin tooling. Never creates a batch. */
  async ensureDate(date: string): Promise<boolean> {
    assertStorageDate(date);
    return this.deps.storage.ensureExists(date);
  }
}
