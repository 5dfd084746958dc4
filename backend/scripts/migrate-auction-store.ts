#!/usr/bin/env npx tsx
/**
 * Copy every current batch from one storage backend into another.
 *
 *   npx tsx backend/scripts/migrate-auction-store.ts --from filesystem --to relational
 *   npx tsx backend/scripts/migrate-auction-store.ts --from document --to relational --overwrite --dry-run
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';
import type { Env } from '../src/config/env.js';
import { loadEnv, storageConfigFromEnv } from '../src/config/env.js';
import { disconnectMongo } from '../src/db/mongoose.js';
import { migrateStore } from '../src/modules/auction-data/ops/backfill.service.js';
import { openStorageBackend } from '../src/modules/auction-data/storage/storage.factory.js';

const KINDS = ['filesystem', 'relational', 'document'] as const;
type StorageKind = Env['STORAGE_BACKEND'];

function toKind(value: string | undefined, flag: string): StorageKind {
  const kind = KINDS.find((k) => k === value);
  if (!kind) {
    throw new Error(`--${flag} must be one of ${KINDS.join(', ')}`);
  }
  return kind;
}

async function main(): Promise<number> {
  const env = loadEnv();
  const { values } = parseArgs({
    options: {
      from: { type: 'string' },
      to: { type: 'string' },
      overwrite: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
    },
  });

  const from = toKind(values.from, 'from');
  const to = toKind(values.to, 'to');
  if (from === to) {
    console.error('[Migrate] --from and --to must differ');
    return 2;
  }

  const source = await openStorageBackend(storageConfigFromEnv({ ...env, STORAGE_BACKEND: from }));
  const target = await openStorageBackend(storageConfigFromEnv({ ...env, STORAGE_BACKEND: to }));

  try {
    const summary = await migrateStore(source, target, {
      overwrite: values.overwrite,
      dryRun: values['dry-run'],
    });
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await source.close();
    await target.close();
    await disconnectMongo();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('[Migrate] Fatal:', err);
    process.exit(1);
  });
