/**
 * APP ERRORS
 *
 * Every error that crosses a module boundary is an AppError.
 * The Fastify error handler maps statusCode/code straight to the response.
 */

export class AppError extends Error {
  statusCode: number;
  code: string;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// INGESTION FAILURE KINDS
// ═══════════════════════════════════════════════════════════════

/** Transport failed before a response arrived. The caller may retry. */
export class NetworkError extends AppError {
  readonly retryable = true;

  constructor(message: string) {
    super('NETWORK_ERROR', message, 503);
    this.name = 'NetworkError';
  }
}

/** Upstream answered with something other than 2xx/304. */
export class UpstreamError extends AppError {
  status: number;

  constructor(status: number, message?: string) {
    super('UPSTREAM_ERROR', message ?? `Upstream returned HTTP ${status}`, 502);
    this.name = 'UpstreamError';
    this.status = status;
  }
}

/** No row of the document could be recovered. */
export class ParseError extends AppError {
  constructor(message: string) {
    super('PARSE_ERROR', message, 422);
    this.name = 'ParseError';
  }
}

export class WriteError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WRITE_ERROR', message, 500);
    this.name = 'WriteError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
    this.name = 'NotFoundError';
  }
}

// ═══════════════════════════════════════════════════════════════
// REQUEST / BOOT ERRORS
// ═══════════════════════════════════════════════════════════════

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Unauthorized') {
    super('UNAUTHORIZED', message, 401);
    this.name = 'AuthenticationError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message, 500);
    this.name = 'ConfigurationError';
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof NetworkError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system errors carry `code` (ENOENT, EEXIST); MongoDB server errors a number (11000) */
export function hasErrorCode(err: unknown, code: string | number): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
