import process from 'node:process';

import { config } from './config/index.js';
import { HttpError } from './errors.js';
import type { ParsedRequest } from './http/request.js';
import {
  createResponse,
  jsonResponse,
  type ResponseChunk,
  streamResponse,
} from './http/response.js';
import { RouteTable } from './http/router.js';

const MAX_STREAM_CHUNKS = 100;
const DEFAULT_STREAM_CHUNKS = 5;

function resolveChunkCount(request: ParsedRequest): number {
  const raw = request.queryParam('chunks');
  if (raw === undefined) return DEFAULT_STREAM_CHUNKS;

  const count = Number(raw);
  if (!Number.isInteger(count) || count < 1 || count > MAX_STREAM_CHUNKS) {
    throw new HttpError(
      `chunks must be an integer between 1 and ${MAX_STREAM_CHUNKS}`,
      400,
      'INVALID_CHUNKS',
      { chunks: raw }
    );
  }
  return count;
}

async function* countChunks(count: number): AsyncGenerator<ResponseChunk> {
  for (let index = 1; index <= count; index += 1) {
    yield `chunk ${index}\n`;
  }
}

export function createDemoRoutes(): RouteTable {
  return new RouteTable()
    .get('/health', () =>
      jsonResponse(200, {
        status: 'healthy',
        name: config.server.name,
        version: config.server.version,
        uptime: process.uptime(),
      })
    )
    .post('/echo', (request) => {
      const contentType =
        request.headers.get('content-type') ?? 'application/octet-stream';
      return createResponse(200, request.bodyBytes(), [
        ['Content-Type', contentType],
      ]);
    })
    .get('/stream', (request) =>
      streamResponse(200, countChunks(resolveChunkCount(request)), {
        headers: [['Content-Type', 'text/plain; charset=utf-8']],
      })
    );
}
