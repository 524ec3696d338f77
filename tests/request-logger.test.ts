import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createDispatchContext,
  createPipeline,
  shortCircuit,
} from '../src/http/pipeline.js';
import { ParsedRequest } from '../src/http/request.js';
import { emptyResponse, textResponse } from '../src/http/response.js';
import { requestLogger } from '../src/middleware/request-logger.js';
import { type Deferred, deferred } from './helpers/sources.js';

function fakeClock(...readings: number[]): () => number {
  let index = 0;
  return () => {
    const value = readings[Math.min(index, readings.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

describe('requestLogger', () => {
  it('logs method, path, status and duration', async () => {
    const lines: string[] = [];
    const pipeline = createPipeline({
      middleware: [
        requestLogger({
          now: fakeClock(100, 142.4),
          log: (message) => {
            lines.push(message);
          },
        }),
      ],
      handler: () => textResponse(201, 'made'),
    });

    await pipeline.dispatch(
      ParsedRequest.empty('POST', '/items?draft=1'),
      createDispatchContext({
        connectionId: 'conn-1',
        requestId: 'req-1',
        requestIndex: 1,
      })
    );
    assert.deepEqual(lines, ['POST /items - 201 (42ms)']);
  });

  it('still logs when a later hook short-circuits', async () => {
    const lines: string[] = [];
    const pipeline = createPipeline({
      middleware: [
        requestLogger({
          now: fakeClock(0, 5),
          log: (message) => {
            lines.push(message);
          },
        }),
        { name: 'deny', before: () => shortCircuit(emptyResponse(403)) },
      ],
      handler: () => textResponse(200, 'unreachable'),
    });

    await pipeline.dispatch(
      ParsedRequest.empty('GET', '/secret'),
      createDispatchContext({
        connectionId: 'conn-1',
        requestId: 'req-2',
        requestIndex: 2,
      })
    );
    assert.deepEqual(lines, ['GET /secret - 403 (5ms)']);
  });

  it('times overlapping requests on one pipeline independently', async () => {
    let clock = 0;
    const lines: string[] = [];
    const gates = new Map<string, Deferred>([
      ['/slow', deferred()],
      ['/fast', deferred()],
    ]);
    const pipeline = createPipeline({
      middleware: [
        requestLogger({
          now: () => clock,
          log: (message) => {
            lines.push(message);
          },
        }),
      ],
      handler: async (request) => {
        await gates.get(request.path)?.promise;
        return textResponse(200, 'done');
      },
    });
    const dispatch = (path: string, requestId: string) =>
      pipeline.dispatch(
        ParsedRequest.empty('GET', path),
        createDispatchContext({ connectionId: 'conn-1', requestId, requestIndex: 1 })
      );

    const slow = dispatch('/slow', 'req-same');
    clock = 10;
    const fast = dispatch('/fast', 'req-same');

    clock = 25;
    gates.get('/fast')?.resolve();
    await fast;
    clock = 40;
    gates.get('/slow')?.resolve();
    await slow;

    assert.deepEqual(lines, ['GET /fast - 200 (15ms)', 'GET /slow - 200 (40ms)']);
  });
});
