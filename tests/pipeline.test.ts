import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { HttpError } from '../src/errors.js';
import {
  createPipeline,
  createDispatchContext,
  type DispatchContext,
  type Middleware,
  proceed,
  shortCircuit,
} from '../src/http/pipeline.js';
import { ParsedRequest } from '../src/http/request.js';
import {
  getHeader,
  type ResponseSpec,
  textResponse,
  withHeader,
} from '../src/http/response.js';
import { getConnectionId, getRequestId } from '../src/services/context.js';

const context: DispatchContext = createDispatchContext({
  connectionId: 'conn-1',
  requestId: 'req-1',
  requestIndex: 1,
});

function bodyText(response: ResponseSpec): string {
  return response.body.kind === 'bytes' ? response.body.data.toString('utf8') : '';
}

function recording(name: string, calls: string[]): Middleware {
  return {
    name,
    before: () => {
      calls.push(`${name}:before`);
    },
    after: () => {
      calls.push(`${name}:after`);
    },
  };
}

describe('createPipeline', () => {
  it('runs before-hooks in order and after-hooks in reverse', async () => {
    const calls: string[] = [];
    const pipeline = createPipeline({
      middleware: [recording('a', calls), recording('b', calls)],
      handler: () => {
        calls.push('handler');
        return textResponse(200, 'done');
      },
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.equal(response.status, 200);
    assert.deepEqual(calls, ['a:before', 'b:before', 'handler', 'b:after', 'a:after']);
  });

  it('runs every after-hook when a before-hook short-circuits', async () => {
    const calls: string[] = [];
    const gate: Middleware = {
      name: 'gate',
      before: () => {
        calls.push('gate:before');
        return shortCircuit(textResponse(403, 'denied'));
      },
      after: () => {
        calls.push('gate:after');
      },
    };
    const pipeline = createPipeline({
      middleware: [recording('outer', calls), gate, recording('inner', calls)],
      handler: () => {
        calls.push('handler');
        return textResponse(200, 'unreachable');
      },
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.equal(response.status, 403);
    assert.deepEqual(calls, [
      'outer:before',
      'gate:before',
      'inner:after',
      'gate:after',
      'outer:after',
    ]);
  });

  it('hands a replaced request to later hooks and the handler', async () => {
    const rewrite: Middleware = {
      name: 'rewrite',
      before: (request) => proceed(request.with({ target: '/rewritten?x=1' })),
    };
    const pipeline = createPipeline({
      middleware: [rewrite],
      handler: (request) => textResponse(200, `${request.path} ${request.queryParam('x') ?? ''}`),
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/orig'), context);
    assert.equal(bodyText(response), '/rewritten 1');
  });

  it('lets after-hooks rewrite the response', async () => {
    const tag: Middleware = {
      name: 'tag',
      after: (_request, response) => withHeader(response, 'X-Tag', 'seen'),
    };
    const pipeline = createPipeline({
      middleware: [tag],
      handler: () => textResponse(200, 'ok'),
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.equal(getHeader(response, 'x-tag'), 'seen');
  });

  it('turns a throwing handler into a 500 that after-hooks still see', async () => {
    const seen: number[] = [];
    const pipeline = createPipeline({
      middleware: [
        {
          name: 'observer',
          after: (_request, response) => {
            seen.push(response.status);
          },
        },
      ],
      handler: () => {
        throw new Error('handler exploded');
      },
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.equal(response.status, 500);
    assert.equal(bodyText(response), 'Internal Server Error\n');
    assert.deepEqual(seen, [500]);
  });

  it('keeps the status of a thrown HttpError', async () => {
    const pipeline = createPipeline({
      handler: async () => {
        throw new HttpError('Missing field', 422);
      },
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('POST', '/'), context);
    assert.equal(response.status, 422);
    assert.equal(bodyText(response), 'Missing field\n');
  });

  it('short-circuits with a 500 when a before-hook throws', async () => {
    const calls: string[] = [];
    const pipeline = createPipeline({
      middleware: [
        recording('outer', calls),
        {
          name: 'broken',
          before: () => {
            throw new Error('before failed');
          },
        },
        recording('inner', calls),
      ],
      handler: () => {
        calls.push('handler');
        return textResponse(200, 'ok');
      },
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.equal(response.status, 500);
    assert.deepEqual(calls, ['outer:before', 'inner:after', 'outer:after']);
  });

  it('continues the after chain past a throwing after-hook', async () => {
    const seen: number[] = [];
    const pipeline = createPipeline({
      middleware: [
        {
          name: 'outer',
          after: (_request, response) => {
            seen.push(response.status);
          },
        },
        {
          name: 'broken',
          after: () => {
            throw new Error('after failed');
          },
        },
      ],
      handler: () => textResponse(200, 'ok'),
    });

    const response = await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.equal(response.status, 500);
    assert.deepEqual(seen, [500]);
  });

  it('exposes the connection and request ids to async context', async () => {
    let ids: [string | undefined, string | undefined] = [undefined, undefined];
    const pipeline = createPipeline({
      handler: async () => {
        await Promise.resolve();
        ids = [getConnectionId(), getRequestId()];
        return textResponse(200, 'ok');
      },
    });

    await pipeline.dispatch(ParsedRequest.empty('GET', '/'), context);
    assert.deepEqual(ids, ['conn-1', 'req-1']);
    assert.equal(getConnectionId(), undefined);
  });

  it('is frozen after construction', () => {
    const pipeline = createPipeline({
      middleware: [recording('a', [])],
      handler: () => textResponse(200, 'ok'),
    });
    assert.equal(Object.isFrozen(pipeline), true);
    assert.equal(Object.isFrozen(pipeline.middleware), true);
  });
});
