/**
 * AUCTION DATA CONTRACTS
 *
 * Shapes shared by the fetch → resolve → ingest pipeline, the storage
 * backends and the API layer.
 */

// ═══════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════

/** Calendar key in YYMMDD form, 2000-based year. */
export type StorageDate = string;

// ═══════════════════════════════════════════════════════════════
// FETCH
// ═══════════════════════════════════════════════════════════════

export interface Validators {
  etag?: string;
  lastModified?: string;
}

export interface SourceDocument {
  content: Buffer;
  validators: Validators;
  /** Filename advertised by the upstream Content-Disposition header, if any */
  remoteFilename?: string;
  fetchedAt: Date;
}

export type FetchResult =
  | { kind: 'unchanged'; status: 304 }
  | { kind: 'changed'; status: number; document: SourceDocument };

// ═══════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════

export interface AuctionRow {
  /** 0-based position of the row among the data rows of the source CSV */
  rowIndex: number;
  sellNumber: string;
  carNumber: string;
  vin: string;
  auctionName: string;
  postTitle: string;
  title: string;
  year: string;
  km: string;
  price: string;
  color: string;
  fuel: string;
  trans: string;
  score: string;
  image: string;
  /** Columns outside the fixed field set, keyed by header name */
  extra: Record<string, string>;
}

export type AuctionField = Exclude<keyof AuctionRow, 'rowIndex' | 'extra'>;

export interface ParseWarning {
  rowIndex: number;
  reason: string;
}

export interface ParsedCsv {
  columns: string[];
  rows: AuctionRow[];
  rowCount: number;
  warnings: ParseWarning[];
}

// ═══════════════════════════════════════════════════════════════
// STORAGE
// ═══════════════════════════════════════════════════════════════

/** Current snapshot for one storage date, as read back from a backend. */
export interface AuctionBatch {
  date: StorageDate;
  filename: string;
  fingerprint: string;
  rowCount: number;
  updatedAt: Date;
  /** CSV text (raw for content-oriented backends, re-serialized for row-oriented ones) */
  content: string;
}

/** What the pipeline hands to replaceCurrent/appendHistory. */
export interface NewAuctionBatch extends AuctionBatch {
  columns: string[];
  rows: AuctionRow[];
}

export interface HistoryEntry {
  date: StorageDate;
  filename: string;
  fingerprint: string;
  rowCount: number;
  ingestedAt: Date;
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════

export type PipelineState =
  | 'Idle'
  | 'Fetching'
  | 'Skipped'
  | 'Parsing'
  | 'Resolving'
  | 'Comparing'
  | 'NoOpWrite'
  | 'Writing'
  | 'HistoryAppending'
  | 'Done'
  | 'Failed';

export type IngestionFailureKind =
  | 'NetworkError'
  | 'UpstreamError'
  | 'ParseError'
  | 'WriteError'
  | 'NotFoundError'
  | 'ValidationError'
  | 'ConfigurationError';

export interface IngestionFailure {
  kind: IngestionFailureKind;
  message: string;
  retryable: boolean;
  /** Upstream HTTP status for UpstreamError */
  status?: number;
}

export type IngestionStatus = 'skipped' | 'unchanged' | 'written' | 'failed';

export interface IngestionResult {
  ok: boolean;
  runId: string;
  status: IngestionStatus;
  /** States visited, in order, ending in Done or Failed */
  trace: PipelineState[];
  claimedDate?: StorageDate;
  storageDate?: StorageDate;
  filename?: string;
  fingerprint?: string;
  rowCount?: number;
  previousRowCount?: number;
  warnings: ParseWarning[];
  /** Set when the new batch is much smaller than the one it replaced */
  shrinkWarning?: string;
  historyAppended: boolean;
  historyError?: string;
  error?: IngestionFailure;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface IngestionOptions {
  /** YYMMDD override for the claimed source date */
  date?: string;
  /** Re-fetch without conditional validators */
  force?: boolean;
}

export interface PagedDates {
  items: StorageDate[];
  page: number;
  size: number;
  total: number;
  totalPages: number;
}
