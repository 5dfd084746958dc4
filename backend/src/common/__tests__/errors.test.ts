import { describe, it, expect } from 'vitest';
import {
  NetworkError,
  NotFoundError,
  ParseError,
  UpstreamError,
  errorMessage,
  hasErrorCode,
  isRetryable,
} from '../errors.js';

describe('isRetryable', () => {
  it('should retry network failures only', () => {
    expect(isRetryable(new NetworkError('socket hang up'))).toBe(true);
    expect(isRetryable(new UpstreamError(503))).toBe(false);
    expect(isRetryable(new ParseError('CSV is empty'))).toBe(false);
    expect(isRetryable(new Error('boom'))).toBe(false);
    expect(isRetryable('offline')).toBe(false);
  });
});

describe('hasErrorCode', () => {
  it('should match string and numeric codes exactly', () => {
    const enoent = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    const duplicate = Object.assign(new Error('E11000 duplicate key'), { code: 11000 });

    expect(hasErrorCode(enoent, 'ENOENT')).toBe(true);
    expect(hasErrorCode(enoent, 'EEXIST')).toBe(false);
    expect(hasErrorCode(duplicate, 11000)).toBe(true);
    expect(hasErrorCode(duplicate, '11000')).toBe(false);
    expect(hasErrorCode(new Error('plain'), 'ENOENT')).toBe(false);
    expect(hasErrorCode({ code: 'ENOENT' }, 'ENOENT')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('should read the message of errors and stringify anything else', () => {
    expect(errorMessage(new NotFoundError('No data for 250908'))).toBe('No data for 250908');
    expect(errorMessage(42)).toBe('42');
  });
});
