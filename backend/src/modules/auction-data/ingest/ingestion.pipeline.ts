/**
 * INGESTION PIPELINE
 *
 * Idle → Fetching → (Skipped | Parsing) → Resolving → Comparing
 *      → (NoOpWrite | Writing) → [HistoryAppending] → Done
 *
 * Any step may land in Failed. The pipeline never retries and never throws:
 * every run ends in an IngestionResult carrying the states it visited.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AppError,
  ConfigurationError,
  NetworkError,
  NotFoundError,
  ParseError,
  UpstreamError,
  ValidationError,
  WriteError,
  errorMessage,
  isRetryable,
} from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { defaultLogger } from '../../../common/logger.js';
import type {
  AuctionBatch,
  IngestionFailure,
  IngestionFailureKind,
  IngestionOptions,
  IngestionResult,
  IngestionStatus,
  NewAuctionBatch,
  ParsedCsv,
  PipelineState,
  SourceDocument,
  StorageDate,
} from '../contracts/auction.contracts.js';
import { serializeRows } from '../storage/csv.serializer.js';
import type { StorageBackend } from '../storage/storage.backend.js';
import {
  calendarDayAt,
  dateFromFilename,
  parseYymmdd,
  resolveStorageDate,
} from './business_date.resolver.js';
import type { ConditionalFetcher } from './conditional.fetcher.js';
import { decodeCsvBytes, fingerprint } from './content.fingerprint.js';
import { parseAuctionCsv } from './csv_record.parser.js';

export interface IngestionPipelineOptions {
  sourceUrl: string;
  fetcher: ConditionalFetcher;
  storage: StorageBackend;
  filenamePrefix: string;
  /** Timezone of the source, used when nothing names the claimed date */
  sourceUtcOffsetMinutes: number;
  /** Warn when rowCount < ratio × previous rowCount; 0 disables */
  shrinkWarnRatio: number;
  logger?: Logger;
  now?: () => Date;
}

interface RunContext {
  runId: string;
  options: IngestionOptions;
  status: IngestionStatus;
  fetched: boolean;
  document?: SourceDocument;
  text?: string;
  parsed?: ParsedCsv;
  claimedDate?: StorageDate;
  storageDate?: StorageDate;
  fingerprint?: string;
  previous?: AuctionBatch;
  batch?: NewAuctionBatch;
  shrinkWarning?: string;
  historyAppended: boolean;
  historyError?: string;
  error?: IngestionFailure;
}

const TERMINAL: ReadonlySet<PipelineState> = new Set(['Done', 'Failed']);

// Kind reported for errors that are not AppErrors, by the state that raised them
const FALLBACK_KIND: Partial<Record<PipelineState, IngestionFailureKind>> = {
  Idle: 'ValidationError',
  Fetching: 'NetworkError',
  Parsing: 'ParseError',
  Resolving: 'ValidationError',
};

function kindOf(err: unknown, state: PipelineState): IngestionFailureKind {
  if (err instanceof NetworkError) return 'NetworkError';
  if (err instanceof UpstreamError) return 'UpstreamError';
  if (err instanceof ParseError) return 'ParseError';
  if (err instanceof WriteError) return 'WriteError';
  if (err instanceof NotFoundError) return 'NotFoundError';
  if (err instanceof ValidationError) return 'ValidationError';
  if (err instanceof ConfigurationError) return 'ConfigurationError';
  return FALLBACK_KIND[state] ?? 'WriteError';
}

function toFailure(err: unknown, state: PipelineState): IngestionFailure {
  const kind = kindOf(err, state);
  const failure: IngestionFailure = {
    kind,
    message: errorMessage(err),
    // Unwrapped errors raised while fetching count as network failures
    retryable: isRetryable(err) || kind === 'NetworkError',
  };
  if (err instanceof UpstreamError) failure.status = err.status;
  return failure;
}

export class IngestionPipeline {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: IngestionPipelineOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  get storage(): StorageBackend {
    return this.options.storage;
  }

  /** Fetch the configured source and reconcile it into storage. */
  run(options: IngestionOptions = {}): Promise<IngestionResult> {
    return this.execute(options);
  }

  /** Reconcile a document obtained elsewhere (backfill). Starts at Parsing. */
  ingest(document: SourceDocument, options: IngestionOptions = {}): Promise<IngestionResult> {
    return this.execute(options, document);
  }

  // ═══════════════════════════════════════════════════════════════
  // DRIVER
  // ═══════════════════════════════════════════════════════════════

  private async execute(options: IngestionOptions, document?: SourceDocument): Promise<IngestionResult> {
    const startedAt = this.now();
    const ctx: RunContext = {
      runId: uuidv4(),
      options,
      status: 'failed',
      fetched: false,
      document,
      historyAppended: false,
    };

    let state: PipelineState = 'Idle';
    const trace: PipelineState[] = [state];

    while (!TERMINAL.has(state)) {
      try {
        state = await this.transition(state, ctx);
      } catch (err) {
        ctx.error = toFailure(err, state);
        ctx.status = 'failed';
        this.logger.error({ runId: ctx.runId, state, kind: ctx.error.kind, err: ctx.error.message }, 'Ingestion failed');
        state = 'Failed';
      }
      trace.push(state);
    }

    if (state === 'Failed' && ctx.fetched) {
      // Downloaded content never reached storage: forget its validators so
      // the next run downloads it again instead of getting a 304
      await this.options.fetcher.invalidate(this.options.sourceUrl);
    }

    const completedAt = this.now();
    const result: IngestionResult = {
      ok: state === 'Done',
      runId: ctx.runId,
      status: ctx.status,
      trace,
      claimedDate: ctx.claimedDate,
      storageDate: ctx.storageDate,
      filename: ctx.batch?.filename,
      fingerprint: ctx.fingerprint,
      rowCount: ctx.parsed?.rowCount,
      previousRowCount: ctx.previous?.rowCount,
      warnings: ctx.parsed?.warnings ?? [],
      shrinkWarning: ctx.shrinkWarning,
      historyAppended: ctx.historyAppended,
      historyError: ctx.historyError,
      error: ctx.error,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    this.logger.info(
      { runId: ctx.runId, status: result.status, storageDate: result.storageDate, rowCount: result.rowCount, durationMs: result.durationMs },
      'Ingestion finished'
    );
    return result;
  }

  private async transition(state: PipelineState, ctx: RunContext): Promise<PipelineState> {
    switch (state) {
      case 'Idle':
        return this.start(ctx);
      case 'Fetching':
        return this.fetchSource(ctx);
      case 'Skipped':
        return 'Done';
      case 'Parsing':
        return this.parse(ctx);
      case 'Resolving':
        return this.resolve(ctx);
      case 'Comparing':
        return this.compare(ctx);
      case 'NoOpWrite':
        return 'Done';
      case 'Writing':
        return this.write(ctx);
      case 'HistoryAppending':
        return this.appendHistory(ctx);
      case 'Done':
      case 'Failed':
        return state;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // STEPS
  // ═══════════════════════════════════════════════════════════════

  private async start(ctx: RunContext): Promise<PipelineState> {
    if (ctx.options.date !== undefined) {
      parseYymmdd(ctx.options.date);
    }
    this.logger.info({ runId: ctx.runId, date: ctx.options.date, force: ctx.options.force === true }, 'Ingestion started');
    return ctx.document ? 'Parsing' : 'Fetching';
  }

  private async fetchSource(ctx: RunContext): Promise<PipelineState> {
    if (!this.options.sourceUrl) {
      throw new ConfigurationError('No source URL configured');
    }

    const result = await this.options.fetcher.fetch(this.options.sourceUrl, { force: ctx.options.force });
    if (result.kind === 'unchanged') {
      ctx.status = 'skipped';
      return 'Skipped';
    }

    ctx.fetched = true;
    ctx.document = result.document;
    return 'Parsing';
  }

  private async parse(ctx: RunContext): Promise<PipelineState> {
    const document = this.requireDocument(ctx);
    ctx.text = decodeCsvBytes(document.content);
    ctx.parsed = parseAuctionCsv(ctx.text);

    if (ctx.parsed.warnings.length > 0) {
      this.logger.warn(
        { runId: ctx.runId, skipped: ctx.parsed.warnings.length, first: ctx.parsed.warnings[0] },
        'Malformed rows skipped'
      );
    }
    if (ctx.parsed.rowCount === 0) {
      throw new ParseError(`No valid rows in source (${ctx.parsed.warnings.length} malformed)`);
    }
    return 'Resolving';
  }

  private async resolve(ctx: RunContext): Promise<PipelineState> {
    const document = this.requireDocument(ctx);
    const claimed =
      ctx.options.date ??
      (document.remoteFilename ? dateFromFilename(document.remoteFilename) : null) ??
      calendarDayAt(document.fetchedAt, this.options.sourceUtcOffsetMinutes);

    ctx.claimedDate = claimed;
    ctx.storageDate = resolveStorageDate(parseYymmdd(claimed));
    return 'Comparing';
  }

  private async compare(ctx: RunContext): Promise<PipelineState> {
    const document = this.requireDocument(ctx);
    const date = this.requireStorageDate(ctx);
    ctx.fingerprint = fingerprint(document.content);

    try {
      ctx.previous = await this.options.storage.readCurrent(date);
    } catch (err) {
      if (!(err instanceof NotFoundError)) {
        throw new WriteError(`Could not read current batch ${date}: ${errorMessage(err)}`, { cause: err });
      }
    }

    if (ctx.previous && ctx.previous.fingerprint === ctx.fingerprint) {
      ctx.status = 'unchanged';
      this.logger.info({ runId: ctx.runId, date }, 'Content identical to stored batch');
      return 'NoOpWrite';
    }
    return 'Writing';
  }

  private async write(ctx: RunContext): Promise<PipelineState> {
    const date = this.requireStorageDate(ctx);
    const parsed = ctx.parsed;
    if (!parsed || ctx.text === undefined || ctx.fingerprint === undefined) {
      throw new AppError('PIPELINE_STATE', 'Writing reached without a parsed document');
    }

    const previousCount = ctx.previous?.rowCount;
    if (
      previousCount !== undefined &&
      this.options.shrinkWarnRatio > 0 &&
      parsed.rowCount < previousCount * this.options.shrinkWarnRatio
    ) {
      ctx.shrinkWarning = `Row count dropped from ${previousCount} to ${parsed.rowCount}`;
      this.logger.warn({ runId: ctx.runId, date, previousCount, rowCount: parsed.rowCount }, 'Batch shrank sharply');
    }

    ctx.batch = {
      date,
      filename: `${this.options.filenamePrefix}${date}.csv`,
      fingerprint: ctx.fingerprint,
      rowCount: parsed.rowCount,
      updatedAt: this.now(),
      // Malformed source rows are not carried into storage
      content: serializeRows(parsed.columns, parsed.rows),
      columns: parsed.columns,
      rows: parsed.rows,
    };

    await this.options.storage.replaceCurrent(date, ctx.batch);
    ctx.status = 'written';
    this.logger.info({ runId: ctx.runId, date, rowCount: parsed.rowCount }, 'Batch written');

    return this.options.storage.historyEnabled ? 'HistoryAppending' : 'Done';
  }

  private async appendHistory(ctx: RunContext): Promise<PipelineState> {
    const date = this.requireStorageDate(ctx);
    const batch = ctx.batch;
    if (!batch) {
      throw new AppError('PIPELINE_STATE', 'HistoryAppending reached without a batch');
    }

    // The replace is already committed; a history failure is reported, not rolled back
    try {
      await this.options.storage.appendHistory(date, batch, this.now());
      ctx.historyAppended = true;
    } catch (err) {
      ctx.historyError = errorMessage(err);
      this.logger.error({ runId: ctx.runId, date, err: ctx.historyError }, 'History append failed');
    }
    return 'Done';
  }

  private requireDocument(ctx: RunContext): SourceDocument {
    if (!ctx.document) {
      throw new AppError('PIPELINE_STATE', 'No source document in context');
    }
    return ctx.document;
  }

  private requireStorageDate(ctx: RunContext): StorageDate {
    if (!ctx.storageDate) {
      throw new AppError('PIPELINE_STATE', 'No storage date in context');
    }
    return ctx.storageDate;
  }
}
