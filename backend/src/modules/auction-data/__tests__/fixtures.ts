/**
 * Shared test helpers: CSV samples, a scripted axios instance, temp dirs.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import axios, { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import type { AuctionRow, NewAuctionBatch } from '../contracts/auction.contracts.js';
import { fingerprint } from '../ingest/content.fingerprint.js';
import { parseAuctionCsv } from '../ingest/csv_record.parser.js';

export const HEADER = 'sell_number,car_number,title,year,km,price,lane';

export const ROWS = [
  '1001,12가3456,Sonata DN8,2019,"45,000",1250,A',
  '1002,34나5678,Avante CN7,2020,"30,120",980,B',
  '1003,56다7890,"Grandeur ""Le Blanc""",2021,12000,2890,A',
];

export function csv(...rows: string[]): string {
  return [HEADER, ...rows].join('\n') + '\n';
}

export const SAMPLE_CSV = csv(...ROWS);

export function batchFor(date: string, text: string, updatedAt = new Date('2025-09-08T00:00:00.000Z')): NewAuctionBatch {
  const parsed = parseAuctionCsv(text);
  return {
    date,
    filename: `auction_data_${date}.csv`,
    fingerprint: fingerprint(Buffer.from(text, 'utf-8')),
    rowCount: parsed.rowCount,
    updatedAt,
    content: text,
    columns: parsed.columns,
    rows: parsed.rows,
  };
}

export function rowsOf(text: string): AuctionRow[] {
  return parseAuctionCsv(text).rows;
}

// ═══════════════════════════════════════════════════════════════
// HTTP STAND-IN
// ═══════════════════════════════════════════════════════════════

export type ScriptedHandler = (config: InternalAxiosRequestConfig) => AxiosResponse | Promise<AxiosResponse>;

/** axios instance whose transport is the given function */
export function scriptedHttp(handler: ScriptedHandler): AxiosInstance {
  return axios.create({ adapter: async (config) => handler(config) });
}

export function respond(
  config: InternalAxiosRequestConfig,
  status: number,
  body = '',
  headers: Record<string, string> = {}
): AxiosResponse {
  return {
    data: Buffer.from(body, 'utf-8'),
    status,
    statusText: String(status),
    headers,
    config,
  };
}

export function requestHeader(config: InternalAxiosRequestConfig, name: string): string | undefined {
  const value = config.headers.get(name);
  return typeof value === 'string' ? value : undefined;
}

// ═══════════════════════════════════════════════════════════════
// TEMP DIRS
// ═══════════════════════════════════════════════════════════════

export async function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `auction-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
