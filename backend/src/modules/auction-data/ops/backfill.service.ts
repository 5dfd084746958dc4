/**
 * AUCTION DATA — Backfill & Migration
 *
 * backfillFromDirectory: ingest `<prefix>YYMMDD.csv` files from a local
 *   directory through the same parse / fingerprint / replace path as a crawl.
 * migrateStore: copy every current batch from one backend into another.
 */

import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { defaultLogger } from '../../../common/logger.js';
import type { StorageDate } from '../contracts/auction.contracts.js';
import { isValidYymmdd, nextBusinessDay } from '../ingest/business_date.resolver.js';
import { parseAuctionCsv } from '../ingest/csv_record.parser.js';
import type { IngestionPipeline } from '../ingest/ingestion.pipeline.js';
import type { StorageBackend } from '../storage/storage.backend.js';

export interface BackfillOptions {
  filenamePrefix: string;
  /** Re-ingest dates that already have a batch */
  overwrite?: boolean;
  /** Report what would happen without writing */
  dryRun?: boolean;
  /** Process at most N matching files; 0 or undefined means all */
  limit?: number;
  logger?: Logger;
}

export interface BackfillFailure {
  file: string;
  message: string;
}

export interface BackfillSummary {
  scanned: number;
  ingested: number;
  unchanged: number;
  skipped: number;
  planned: number;
  failed: number;
  failures: BackfillFailure[];
}

export interface MigrateOptions {
  overwrite?: boolean;
  dryRun?: boolean;
  logger?: Logger;
}

export interface MigrateSummary {
  scanned: number;
  copied: number;
  skipped: number;
  planned: number;
  failed: number;
  failures: { date: StorageDate; message: string }[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matching files in name order, paired with their source date */
export async function listSourceFiles(
  dir: string,
  filenamePrefix: string
): Promise<{ file: string; sourceDate: StorageDate }[]> {
  const pattern = new RegExp(`^${escapeRegExp(filenamePrefix)}(\\d{6})\\.csv$`);
  const names = (await fs.readdir(dir)).sort();

  const files: { file: string; sourceDate: StorageDate }[] = [];
  for (const name of names) {
    const match = pattern.exec(name);
    if (match && isValidYymmdd(match[1])) {
      files.push({ file: name, sourceDate: match[1] });
    }
  }
  return files;
}

// ═══════════════════════════════════════════════════════════════
// BACKFILL
// ═══════════════════════════════════════════════════════════════

export async function backfillFromDirectory(
  dir: string,
  pipeline: IngestionPipeline,
  options: BackfillOptions
): Promise<BackfillSummary> {
  const logger = options.logger ?? defaultLogger;
  const summary: BackfillSummary = {
    scanned: 0,
    ingested: 0,
    unchanged: 0,
    skipped: 0,
    planned: 0,
    failed: 0,
    failures: [],
  };

  let files = await listSourceFiles(dir, options.filenamePrefix);
  if (options.limit && options.limit > 0) {
    files = files.slice(0, options.limit);
  }

  for (const { file, sourceDate } of files) {
    summary.scanned++;
    const storageDate = nextBusinessDay(sourceDate);

    if (!options.overwrite && (await pipeline.storage.ensureExists(storageDate))) {
      summary.skipped++;
      logger.info({ file, storageDate }, '[Backfill] Exists, skipping');
      continue;
    }

    if (options.dryRun) {
      summary.planned++;
      logger.info({ file, sourceDate, storageDate }, '[Backfill] Would ingest');
      continue;
    }

    const fullPath = path.join(dir, file);
    const [content, stat] = await Promise.all([fs.readFile(fullPath), fs.stat(fullPath)]);
    const result = await pipeline.ingest(
      { content, validators: {}, remoteFilename: file, fetchedAt: stat.mtime },
      { date: sourceDate }
    );

    if (result.status === 'written') {
      summary.ingested++;
    } else if (result.status === 'unchanged') {
      summary.unchanged++;
    } else {
      summary.failed++;
      summary.failures.push({ file, message: result.error?.message ?? 'unknown failure' });
    }
  }

  logger.info({ dir, ...summary, failures: summary.failures.length }, '[Backfill] Done');
  return summary;
}

// ═══════════════════════════════════════════════════════════════
// MIGRATE
// ═══════════════════════════════════════════════════════════════

export async function migrateStore(
  from: StorageBackend,
  to: StorageBackend,
  options: MigrateOptions = {}
): Promise<MigrateSummary> {
  const logger = options.logger ?? defaultLogger;
  const summary: MigrateSummary = { scanned: 0, copied: 0, skipped: 0, planned: 0, failed: 0, failures: [] };

  // Oldest first, so a partial run leaves a contiguous prefix behind
  const dates = (await from.listDates()).reverse();

  for (const date of dates) {
    summary.scanned++;

    if (!options.overwrite && (await to.ensureExists(date))) {
      summary.skipped++;
      continue;
    }
    if (options.dryRun) {
      summary.planned++;
      logger.info({ date, from: from.kind, to: to.kind }, '[Migrate] Would copy');
      continue;
    }

    try {
      const batch = await from.readCurrent(date);
      const parsed = parseAuctionCsv(batch.content);
      await to.replaceCurrent(date, {
        ...batch,
        rowCount: parsed.rowCount,
        columns: parsed.columns,
        rows: parsed.rows,
      });
      summary.copied++;
    } catch (err) {
      summary.failed++;
      summary.failures.push({ date, message: errorMessage(err) });
      logger.error({ date, err: errorMessage(err) }, '[Migrate] Copy failed');
    }
  }

  logger.info({ from: from.kind, to: to.kind, ...summary, failures: summary.failures.length }, '[Migrate] Done');
  return summary;
}
