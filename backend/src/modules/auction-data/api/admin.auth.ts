/**
 * AUCTION DATA — Admin Authentication
 *
 * Token from `Authorization: Bearer <token>` or `X-Admin-Token`.
 * An unset ADMIN_TOKEN rejects every request.
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { AuthenticationError } from '../../../common/errors.js';

export function extractAdminToken(req: FastifyRequest): string | undefined {
  const authorization = req.headers.authorization;
  if (authorization) {
    const parts = authorization.trim().split(/\s+/);
    if (parts.length === 2 && parts[0].toLowerCase() === 'bearer') {
      return parts[1];
    }
  }

  const header = req.headers['x-admin-token'];
  if (typeof header === 'string' && header !== '') return header;
  return undefined;
}

export function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf-8');
  const b = Buffer.from(expected, 'utf-8');
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/**
 * @throws AuthenticationError
 */
export function requireAdminAuth(req: FastifyRequest, adminToken: string): void {
  const token = extractAdminToken(req);
  if (!adminToken || !token || !tokensMatch(token, adminToken)) {
    throw new AuthenticationError();
  }
}
