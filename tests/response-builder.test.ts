import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ResponseSerializationError } from '../src/errors.js';
import {
  createResponse,
  emptyResponse,
  jsonResponse,
  type ResponseSpec,
  streamResponse,
  textResponse,
} from '../src/http/response.js';
import {
  encodeResponse,
  type SerializedResponse,
  serializeResponse,
} from '../src/http/response-builder.js';
import { collect, produce, trackedSource } from './helpers/sources.js';
import { headerValue, parseResponses } from './helpers/wire.js';

function headText(serialized: SerializedResponse): string {
  return serialized.head.toString('latin1');
}

describe('serializeResponse: owned bodies', () => {
  it('adds Content-Length and appends the body after the blank line', () => {
    const serialized = serializeResponse(createResponse(200, 'ok'));
    const text = headText(serialized);

    assert.equal(
      text,
      'HTTP/1.1 200 OK\r\n' +
        'Content-Type: text/plain; charset=utf-8\r\n' +
        'Content-Length: 2\r\n' +
        '\r\n' +
        'ok'
    );
    assert.ok(text.endsWith('\r\n\r\nok'));
    assert.equal(serialized.body, null);
  });

  it('keeps caller headers in order and does not duplicate them', () => {
    const serialized = serializeResponse(
      createResponse(201, 'abc', [
        ['X-First', '1'],
        ['Content-Length', '3'],
        ['Content-Type', 'text/csv'],
      ])
    );
    assert.equal(
      headText(serialized),
      'HTTP/1.1 201 Created\r\n' +
        'X-First: 1\r\n' +
        'Content-Length: 3\r\n' +
        'Content-Type: text/csv\r\n' +
        '\r\n' +
        'abc'
    );
  });

  it('frames an empty body with Content-Length: 0', () => {
    assert.equal(
      headText(serializeResponse(createResponse(200))),
      'HTTP/1.1 200 OK\r\nContent-Length: 0\r\n\r\n'
    );
  });

  it('omits framing and body for 204 and 304', () => {
    assert.equal(
      headText(serializeResponse(emptyResponse(204))),
      'HTTP/1.1 204 No Content\r\n\r\n'
    );
    assert.equal(
      headText(serializeResponse(createResponse(304, 'stale'))),
      'HTTP/1.1 304 Not Modified\r\n\r\n'
    );
  });

  it('sends headers but no body bytes for HEAD', () => {
    assert.equal(
      headText(serializeResponse(textResponse(200, 'hello'), { headRequest: true })),
      'HTTP/1.1 200 OK\r\n' +
        'Content-Type: text/plain; charset=utf-8\r\n' +
        'Content-Length: 5\r\n' +
        '\r\n'
    );
  });

  it('uses the reason override or the status class fallback', () => {
    const custom: ResponseSpec = { ...emptyResponse(299), reason: 'Custom' };
    assert.ok(headText(serializeResponse(custom)).startsWith('HTTP/1.1 299 Custom\r\n'));
    assert.ok(
      headText(serializeResponse(emptyResponse(299))).startsWith('HTTP/1.1 299 Success\r\n')
    );
  });
});

describe('serializeResponse: Connection header', () => {
  it('announces closure', () => {
    const text = headText(serializeResponse(createResponse(200), { keepAlive: false }));
    assert.equal(
      text,
      'HTTP/1.1 200 OK\r\nContent-Length: 0\r\nConnection: close\r\n\r\n'
    );
  });

  it('confirms keep-alive to HTTP/1.0 peers', () => {
    const text = headText(
      serializeResponse(createResponse(200), { keepAlive: true, requestVersion: '1.0' })
    );
    assert.equal(
      text,
      'HTTP/1.1 200 OK\r\nContent-Length: 0\r\nConnection: keep-alive\r\n\r\n'
    );
  });

  it('replaces a caller Connection header with the connection decision', () => {
    const response = createResponse(200, undefined, { Connection: 'keep-alive' });
    assert.equal(
      headText(serializeResponse(response, { keepAlive: false })),
      'HTTP/1.1 200 OK\r\nContent-Length: 0\r\nConnection: close\r\n\r\n'
    );
  });
});

describe('serializeResponse: streamed bodies', () => {
  it('frames unknown-length streams as chunked and skips empty chunks', async () => {
    const serialized = serializeResponse(
      streamResponse(200, produce('ab', '', Buffer.from('cde')))
    );
    assert.equal(
      headText(serialized),
      'HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n'
    );
    assert.equal(await collect(serialized.body), '2\r\nab\r\n3\r\ncde\r\n0\r\n\r\n');
  });

  it('passes known-length streams through raw', async () => {
    const serialized = serializeResponse(
      streamResponse(200, produce('ab', 'cd'), { length: 4 })
    );
    assert.equal(headText(serialized), 'HTTP/1.1 200 OK\r\nContent-Length: 4\r\n\r\n');
    assert.equal(await collect(serialized.body), 'abcd');
  });

  it('fails when a stream overruns or underruns its declared length', async () => {
    const over = serializeResponse(streamResponse(200, produce('abcd'), { length: 3 }));
    await assert.rejects(collect(over.body), /exceeded its declared length of 3 bytes/);

    const under = serializeResponse(streamResponse(200, produce('ab'), { length: 5 }));
    await assert.rejects(collect(under.body), /ended after 2 of 5 declared bytes/);
  });

  it('returns the producer when iteration stops early', async () => {
    const { source, state } = trackedSource(['a', 'b', 'c']);
    const serialized = serializeResponse(streamResponse(200, source));
    assert.ok(serialized.body);
    for await (const chunk of serialized.body) {
      assert.equal(chunk.toString('latin1'), '1\r\na\r\n');
      break;
    }
    assert.equal(state.returned, true);
  });

  it('does not return a producer that ran to completion', async () => {
    const { source, state } = trackedSource(['a']);
    const serialized = serializeResponse(streamResponse(200, source));
    assert.equal(await collect(serialized.body), '1\r\na\r\n0\r\n\r\n');
    await serialized.dispose();
    assert.equal(state.returned, false);
  });

  it('releases the producer of a HEAD response on dispose', async () => {
    const { source, state } = trackedSource(['a']);
    const serialized = serializeResponse(streamResponse(200, source), {
      headRequest: true,
    });
    assert.equal(serialized.body, null);
    await serialized.dispose();
    assert.equal(state.returned, true);
  });
});

describe('serializeResponse: rejected responses', () => {
  const fallback =
    'HTTP/1.1 500 Internal Server Error\r\n' +
    'Content-Type: text/plain; charset=utf-8\r\n' +
    'Content-Length: 22\r\n' +
    '\r\n' +
    'Internal Server Error\n';

  it('throws from encodeResponse on header injection', () => {
    assert.throws(
      () => encodeResponse(createResponse(200, 'x', { 'X-Bad': 'a\r\nInjected: 1' })),
      ResponseSerializationError
    );
  });

  it('replaces bad header names, bad values and bad statuses with a 500', () => {
    const badName = serializeResponse(createResponse(200, 'x', { 'Bad Header': 'v' }));
    assert.equal(badName.status, 500);
    assert.equal(headText(badName), fallback);

    const badValue = serializeResponse(createResponse(200, 'x', { 'X-Bad': 'a\nb' }));
    assert.equal(headText(badValue), fallback);

    const badStatus = serializeResponse(createResponse(42, 'x'));
    assert.equal(headText(badStatus), fallback);
  });

  it('releases the rejected stream producer', async () => {
    const { source, state } = trackedSource(['a']);
    const serialized = serializeResponse(
      streamResponse(200, source, { headers: { 'X-Bad': 'a\r\n' } })
    );
    assert.equal(serialized.body, null);
    await serialized.dispose();
    assert.equal(state.returned, true);
  });

  it('rejects characters whose latin1 low byte is CR or LF', () => {
    const value = serializeResponse(
      createResponse(200, 'ok', [['X-Note', 'a\u010d\u010aX-Injected: yes']])
    );
    assert.equal(value.status, 500);
    assert.equal(headText(value), fallback);

    const reason = serializeResponse({
      ...createResponse(200, 'ok'),
      reason: 'OK\u010d\u010aSet-Cookie: a=b',
    });
    assert.equal(reason.status, 500);
    assert.equal(headText(reason), fallback);
  });

  it('rejects Transfer-Encoding on owned or length-framed bodies', () => {
    const owned = serializeResponse(
      createResponse(200, 'ok', { 'Transfer-Encoding': 'chunked' })
    );
    assert.equal(headText(owned), fallback);

    const sized = serializeResponse(
      streamResponse(200, produce('ok'), {
        length: 2,
        headers: { 'Transfer-Encoding': 'chunked' },
      })
    );
    assert.equal(headText(sized), fallback);

    const gzip = serializeResponse(
      streamResponse(200, produce('ok'), { headers: { 'Transfer-Encoding': 'gzip' } })
    );
    assert.equal(headText(gzip), fallback);
  });
});

describe('serializeResponse: caller framing', () => {
  it('chunks a stream under the caller Transfer-Encoding without repeating it', async () => {
    const serialized = serializeResponse(
      streamResponse(200, produce('ab'), {
        headers: { 'Transfer-Encoding': 'chunked' },
      })
    );

    assert.equal(
      headText(serialized),
      'HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n'
    );
    assert.equal(await collect(serialized.body), '2\r\nab\r\n0\r\n\r\n');
  });
});

describe('serializeResponse: round trip', () => {
  it('re-parses to the same status, headers and body', () => {
    const response = jsonResponse(200, { ok: true }, [['X-Trace', 'abc']]);
    const wire = headText(serializeResponse(response));
    const [parsed] = parseResponses(wire);

    assert.ok(parsed);
    assert.equal(parsed.status, 200);
    assert.equal(parsed.reason, 'OK');
    assert.deepEqual(parsed.headers, [
      ['content-type', 'application/json'],
      ['x-trace', 'abc'],
      ['content-length', '11'],
    ]);
    assert.equal(parsed.body, '{"ok":true}');
    assert.equal(headerValue(parsed, 'Content-Length'), '11');
  });
});
