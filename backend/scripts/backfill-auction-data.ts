#!/usr/bin/env npx tsx
/**
 * Backfill the configured store from a directory of auction CSV exports.
 *
 *   npx tsx backend/scripts/backfill-auction-data.ts --dry-run
 *   npx tsx backend/scripts/backfill-auction-data.ts --dir ./sources --overwrite --limit 50
 */

import 'dotenv/config';
import path from 'path';
import { parseArgs } from 'node:util';
import { loadEnv } from '../src/config/env.js';
import { disconnectMongo } from '../src/db/mongoose.js';
import { createAuctionDataModule } from '../src/modules/auction-data/index.js';
import { backfillFromDirectory } from '../src/modules/auction-data/ops/backfill.service.js';

async function main(): Promise<number> {
  const env = loadEnv();
  const { values } = parseArgs({
    options: {
      dir: { type: 'string', default: env.SOURCES_DIR },
      prefix: { type: 'string', default: env.FILENAME_PREFIX },
      overwrite: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      limit: { type: 'string', default: '0' },
    },
  });

  const limit = Number(values.limit);
  if (!Number.isInteger(limit) || limit < 0) {
    console.error(`[Backfill] --limit must be a non-negative integer, got "${values.limit}"`);
    return 2;
  }

  const auctionData = await createAuctionDataModule(env);

  try {
    const summary = await backfillFromDirectory(path.resolve(values.dir), auctionData.pipeline, {
      filenamePrefix: values.prefix,
      overwrite: values.overwrite,
      dryRun: values['dry-run'],
      limit,
    });
    for (const failure of summary.failures) {
      console.error(`[Backfill] ${failure.file}: ${failure.message}`);
    }
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await auctionData.close();
    await disconnectMongo();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('[Backfill] Fatal:', err);
    process.exit(1);
  });
