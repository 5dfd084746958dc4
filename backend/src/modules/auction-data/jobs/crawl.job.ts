/**
 * Auction Data — Crawl Job
 *
 * Calls triggerIngestion() on a cron schedule. The pipeline holds no lock,
 * so overlapping ticks are skipped here instead.
 */

import cron from 'node-cron';
import { ConfigurationError, errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { defaultLogger } from '../../../common/logger.js';
import type { IngestionResult } from '../contracts/auction.contracts.js';
import type { AuctionDataService } from '../services/auction_data.service.js';

export interface CrawlJobOptions {
  schedule: string;
  timezone?: string;
  logger?: Logger;
}

export class CrawlJob {
  private cronJob: cron.ScheduledTask | null = null;
  private isRunning = false;
  private lastResult: IngestionResult | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly service: AuctionDataService,
    private readonly options: CrawlJobOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.cronJob) {
      this.logger.info({}, '[Crawl] Job already running');
      return;
    }
    if (!cron.validate(this.options.schedule)) {
      throw new ConfigurationError(`Invalid CRAWL_CRON expression "${this.options.schedule}"`);
    }

    this.cronJob = cron.schedule(this.options.schedule, () => {
      void this.runOnce();
    }, { timezone: this.options.timezone ?? 'UTC' });

    this.logger.info({ schedule: this.options.schedule }, '[Crawl] Job started');
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      this.logger.info({}, '[Crawl] Job stopped');
    }
  }

  getStatus(): { scheduled: boolean; running: boolean; lastResult: IngestionResult | null } {
    return {
      scheduled: this.cronJob !== null,
      running: this.isRunning,
      lastResult: this.lastResult,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // TICK
  // ═══════════════════════════════════════════════════════════════

  /**
   * One crawl. Returns null when a previous tick is still in flight or the
   * run could not start; never throws.
   */
  async runOnce(): Promise<IngestionResult | null> {
    if (this.isRunning) {
      this.logger.warn({}, '[Crawl] Previous run still in progress, skipping tick');
      return null;
    }

    this.isRunning = true;
    try {
      const result = await this.service.triggerIngestion();
      this.lastResult = result;
      return result;
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, '[Crawl] Run could not start');
      return null;
    } finally {
      this.isRunning = false;
    }
  }
}
