/**
 * AUCTION DATA API — Entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { disconnectMongo } from './db/mongoose.js';
import { createAuctionDataModule, registerAuctionDataRoutes } from './modules/auction-data/index.js';

async function main() {
  const env = loadEnv();

  const app = buildApp(env);
  const auctionData = await createAuctionDataModule(env, app.log);

  await app.register(registerAuctionDataRoutes, {
    service: auctionData.service,
    adminToken: env.ADMIN_TOKEN,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    await app.close();
    await auctionData.close();
    await disconnectMongo();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Server] Auction Data API listening on ${env.HOST}:${env.PORT}`);

  auctionData.job?.start();

  if (env.CRAWL_ON_STARTUP) {
    if (auctionData.job) {
      await auctionData.job.runOnce();
    } else if (auctionData.service.crawlEnabled) {
      const result = await auctionData.service.triggerIngestion();
      console.log(`[Crawl] Startup crawl: ${result.status}`);
    }
  }
}

main().catch((err: unknown) => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
