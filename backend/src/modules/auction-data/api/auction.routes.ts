/**
 * AUCTION DATA — Public Routes
 *
 * GET /api/dates
 * GET /api/dates/paged?page&size
 * GET /api/csv/:date
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../../common/errors.js';
import type { AuctionDataService } from '../services/auction_data.service.js';

export interface AuctionRoutesOptions {
  service: AuctionDataService;
}

const DEFAULT_PAGE_SIZE = 20;

function toInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') return fallback;
  if (!/^-?\d+$/.test(value)) {
    throw new ValidationError(`${name} must be an integer`);
  }
  return Number(value);
}

/** RFC 6266 attachment header; ASCII fallback plus UTF-8 form */
export function attachmentHeader(filename: string): string {
  const ascii = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export async function auctionRoutes(fastify: FastifyInstance, opts: AuctionRoutesOptions): Promise<void> {
  const { service } = opts;

  fastify.get('/api/dates', async () => {
    const dates = await service.listDates();
    return { ok: true, dates };
  });

  fastify.get('/api/dates/paged', async (
    request: FastifyRequest<{ Querystring: { page?: string; size?: string } }>
  ) => {
    const page = toInt(request.query.page, 1, 'page');
    const size = toInt(request.query.size, DEFAULT_PAGE_SIZE, 'size');
    const paged = await service.listDatesPaged(page, size);
    return { ok: true, ...paged };
  });

  fastify.get('/api/csv/:date', async (
    request: FastifyRequest<{ Params: { date: string } }>,
    reply: FastifyReply
  ) => {
    const { filename, content } = await service.getCsv(request.params.date);
    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', attachmentHeader(filename))
      .send(content);
  });
}
