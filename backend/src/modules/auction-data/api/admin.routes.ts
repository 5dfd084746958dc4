/**
 * AUCTION DATA — Admin Routes
 *
 * POST /api/admin/crawl?date&force    run the ingestion pipeline once
 * GET  /api/admin/dates/:date         does a current batch exist, and which
 *                                     source dates would land on it?
 *
 * Both require the admin token.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../../common/errors.js';
import type { IngestionFailureKind } from '../contracts/auction.contracts.js';
import { previousSourceCandidates } from '../ingest/business_date.resolver.js';
import type { AuctionDataService } from '../services/auction_data.service.js';
import { requireAdminAuth } from './admin.auth.js';

export interface AdminRoutesOptions {
  service: AuctionDataService;
  adminToken: string;
}

const STATUS_BY_FAILURE: Record<IngestionFailureKind, number> = {
  NetworkError: 503,
  UpstreamError: 502,
  ParseError: 422,
  WriteError: 500,
  NotFoundError: 404,
  ValidationError: 400,
  ConfigurationError: 500,
};

function parseFlag(value: string | undefined): boolean {
  if (value === undefined || value === '' || value === 'false' || value === '0') return false;
  if (value === 'true' || value === '1') return true;
  throw new ValidationError('force must be true or false');
}

export async function adminRoutes(fastify: FastifyInstance, opts: AdminRoutesOptions): Promise<void> {
  const { service, adminToken } = opts;

  fastify.addHook('preHandler', async (request) => {
    requireAdminAuth(request, adminToken);
  });

  fastify.post('/api/admin/crawl', async (
    request: FastifyRequest<{ Querystring: { date?: string; force?: string } }>,
    reply: FastifyReply
  ) => {
    const date = request.query.date || undefined;
    const force = parseFlag(request.query.force);

    const result = await service.triggerIngestion({ date, force });
    const status = result.error ? STATUS_BY_FAILURE[result.error.kind] : 200;
    return reply.status(status).send(result);
  });

  fastify.get('/api/admin/dates/:date', async (
    request: FastifyRequest<{ Params: { date: string } }>
  ) => {
    const { date } = request.params;
    const exists = await service.ensureDate(date);
    return { ok: true, date, exists, sourceCandidates: previousSourceCandidates(date) };
  });
}
