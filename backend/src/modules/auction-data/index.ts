/**
 * Auction Data Module Public API
 *
 * createAuctionDataModule wires cache → fetcher → pipeline → service once
 * per process; registerAuctionDataRoutes mounts the HTTP surface.
 */

import path from 'path';
import type { AxiosInstance } from 'axios';
import { FastifyInstance } from 'fastify';
import type { Logger } from '../../common/logger.js';
import { defaultLogger } from '../../common/logger.js';
import type { Env } from '../../config/env.js';
import { storageConfigFromEnv } from '../../config/env.js';
import { adminRoutes } from './api/admin.routes.js';
import { auctionRoutes } from './api/auction.routes.js';
import { ConditionalFetcher } from './ingest/conditional.fetcher.js';
import { createHttpClient } from './ingest/http.client.js';
import { IngestionPipeline } from './ingest/ingestion.pipeline.js';
import { RevalidationCache } from './ingest/revalidation.cache.js';
import { CrawlJob } from './jobs/crawl.job.js';
import { AuctionDataService } from './services/auction_data.service.js';
import type { StorageBackend } from './storage/storage.backend.js';
import { openStorageBackend } from './storage/storage.factory.js';

export * from './contracts/auction.contracts.js';
export { AuctionDataService } from './services/auction_data.service.js';
export { IngestionPipeline } from './ingest/ingestion.pipeline.js';
export { CrawlJob } from './jobs/crawl.job.js';
export type { StorageBackend } from './storage/storage.backend.js';
export { createStorageBackend, openStorageBackend } from './storage/storage.factory.js';
export { backfillFromDirectory, migrateStore } from './ops/backfill.service.js';

export interface AuctionDataModule {
  service: AuctionDataService;
  pipeline: IngestionPipeline;
  storage: StorageBackend;
  cache: RevalidationCache;
  /** Present only when CRAWL_CRON is set */
  job: CrawlJob | null;
  close(): Promise<void>;
}

export interface AuctionDataModuleOverrides {
  storage?: StorageBackend;
  http?: AxiosInstance;
  now?: () => Date;
}

export async function createAuctionDataModule(
  env: Env,
  logger: Logger = defaultLogger,
  overrides: AuctionDataModuleOverrides = {}
): Promise<AuctionDataModule> {
  const cache = new RevalidationCache({
    persistPath: env.VALIDATOR_CACHE_PATH ? path.resolve(env.VALIDATOR_CACHE_PATH) : undefined,
    logger,
  });
  await cache.load();

  const http = overrides.http ?? createHttpClient({
    timeoutMs: env.HTTP_TIMEOUT_MS,
    userAgent: `${env.APP_NAME}/${env.APP_VERSION}`,
    proxyUrl: env.HTTP_PROXY_URL || undefined,
  });
  const storage = overrides.storage ?? (await openStorageBackend(storageConfigFromEnv(env)));

  const pipeline = new IngestionPipeline({
    sourceUrl: env.CRAWL_URL,
    fetcher: new ConditionalFetcher(http, cache, logger),
    storage,
    filenamePrefix: env.FILENAME_PREFIX,
    sourceUtcOffsetMinutes: env.SOURCE_UTC_OFFSET_MINUTES,
    shrinkWarnRatio: env.SHRINK_WARN_RATIO,
    logger,
    now: overrides.now,
  });
  const service = new AuctionDataService({ storage, pipeline, sourceUrl: env.CRAWL_URL });
  const job = env.CRAWL_CRON ? new CrawlJob(service, { schedule: env.CRAWL_CRON, logger }) : null;

  console.log(`[AuctionData] Module ready (storage=${storage.kind}, history=${storage.historyEnabled}, crawl=${service.crawlEnabled})`);

  return {
    service,
    pipeline,
    storage,
    cache,
    job,
    async close() {
      job?.stop();
      await storage.close();
    },
  };
}

export async function registerAuctionDataRoutes(
  fastify: FastifyInstance,
  opts: { service: AuctionDataService; adminToken: string }
): Promise<void> {
  await fastify.register(auctionRoutes, { service: opts.service });
  await fastify.register(adminRoutes, { service: opts.service, adminToken: opts.adminToken });
}
