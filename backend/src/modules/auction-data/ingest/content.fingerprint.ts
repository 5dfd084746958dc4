/**
 * Content fingerprint + text decoding for the upstream CSV.
 *
 * The fingerprint is SHA-256 over the exact bytes, computed before any
 * decoding, so it changes only when upstream content changes.
 */

import { createHash } from 'node:crypto';

export function fingerprint(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex');
}

const utf8 = new TextDecoder('utf-8', { fatal: true });
// Legacy exports of the feed were CP949; euc-kr is its WHATWG label
const cp949 = new TextDecoder('euc-kr');

/** UTF-8 (BOM stripped), falling back to CP949 for legacy bytes */
export function decodeCsvBytes(content: Buffer): string {
  try {
    return utf8.decode(content);
  } catch (err) {
    if (err instanceof TypeError) {
      return cp949.decode(content);
    }
    throw err;
  }
}
