import { getErrorMessage, ResponseSerializationError } from '../errors.js';
import { logWarn } from '../services/logger.js';

import type { HttpVersion } from './request.js';
import {
  errorResponse,
  type HeaderEntry,
  type ResponseChunk,
  type ResponseSpec,
} from './response.js';
import { getReasonPhrase, isValidStatusCode, statusForbidsBody } from './status.js';

export interface SerializeOptions {
  /** `false` adds `Connection: close`. */
  readonly keepAlive?: boolean;
  /** A kept-alive HTTP/1.0 peer is told so explicitly. */
  readonly requestVersion?: HttpVersion;
  /** Responses to HEAD carry headers only. */
  readonly headRequest?: boolean;
}

export interface SerializedResponse {
  readonly status: number;
  /** Status line, headers, blank line and, for owned bodies, the body. */
  readonly head: Buffer;
  /** Framed remainder for streamed bodies. */
  readonly body: AsyncIterable<Buffer> | null;
  /** Releases the body producer if it was not run to completion. */
  dispose(): Promise<void>;
}

const CRLF = Buffer.from('\r\n', 'latin1');
const LAST_CHUNK = Buffer.from('0\r\n\r\n', 'latin1');
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
// Heads are written as latin1, which keeps only the low byte of each code unit.
const FORBIDDEN_VALUE_CHARS = /[\r\n\0\u0100-\uffff]/;
const DEFAULT_CONTENT_TYPE = 'text/plain; charset=utf-8';

async function noop(): Promise<void> {}

function toBuffer(chunk: ResponseChunk): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (Buffer.isBuffer(chunk)) return chunk;
  return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

function frameChunk(data: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(`${data.length.toString(16)}\r\n`, 'latin1'),
    data,
    CRLF,
  ]);
}

async function releaseSource(source: AsyncIterable<ResponseChunk>): Promise<void> {
  await source[Symbol.asyncIterator]().return?.();
}

/**
 * Pulls a response stream and frames it for the wire. Breaking out of the
 * iteration, or calling `close`, returns the underlying producer.
 */
class FramedBody implements AsyncIterable<Buffer> {
  private finished = false;
  private sent = 0;

  constructor(
    private readonly iterator: AsyncIterator<ResponseChunk>,
    private readonly chunked: boolean,
    private readonly declaredLength: number | undefined
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<Buffer> {
    try {
      for (;;) {
        const result = await this.iterator.next();
        if (result.done) break;

        const data = toBuffer(result.value);
        if (data.length === 0) continue;

        this.sent += data.length;
        if (this.declaredLength !== undefined && this.sent > this.declaredLength) {
          throw new Error(
            `Response stream exceeded its declared length of ${this.declaredLength} bytes`
          );
        }
        yield this.chunked ? frameChunk(data) : data;
      }

      this.finished = true;
      if (this.declaredLength !== undefined && this.sent !== this.declaredLength) {
        throw new Error(
          `Response stream ended after ${this.sent} of ${this.declaredLength} declared bytes`
        );
      }
      if (this.chunked) yield LAST_CHUNK;
    } finally {
      await this.close();
    }
  }

  async close(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    await this.iterator.return?.();
  }
}

function validateHeaders(headers: readonly HeaderEntry[]): void {
  for (const [name, value] of headers) {
    if (!TOKEN.test(name)) {
      throw new ResponseSerializationError(
        `Invalid response header name: ${JSON.stringify(name)}`,
        name
      );
    }
    if (FORBIDDEN_VALUE_CHARS.test(value)) {
      throw new ResponseSerializationError(
        `Response header ${name} contains a line break, NUL or non-latin1 character`,
        name
      );
    }
  }
}

function resolveReason(spec: ResponseSpec): string {
  if (!isValidStatusCode(spec.status)) {
    throw new ResponseSerializationError(
      `Invalid response status: ${spec.status}`,
      ':status'
    );
  }
  const reason = spec.reason ?? getReasonPhrase(spec.status);
  if (FORBIDDEN_VALUE_CHARS.test(reason)) {
    throw new ResponseSerializationError(
      'Reason phrase contains a line break, NUL or non-latin1 character',
      ':reason'
    );
  }
  return reason;
}

function hasField(headers: readonly HeaderEntry[], lowerName: string): boolean {
  return headers.some(([name]) => name.toLowerCase() === lowerName);
}

function rejectEncoding(message: string): never {
  throw new ResponseSerializationError(message, 'Transfer-Encoding');
}

type CallerFraming = 'length' | 'chunked' | null;

/**
 * Framing the caller chose through its own headers. `Transfer-Encoding` is
 * only honoured as a bare `chunked` on a streamed body of unknown length.
 */
function callerFraming(spec: ResponseSpec, bodyAllowed: boolean): CallerFraming {
  const encodings = spec.headers.filter(
    ([name]) => name.toLowerCase() === 'transfer-encoding'
  );
  const setLength = hasField(spec.headers, 'content-length');
  if (encodings.length === 0) return setLength ? 'length' : null;

  if (!bodyAllowed) {
    rejectEncoding(`Transfer-Encoding is not allowed on a ${spec.status} response`);
  }
  if (spec.body.kind !== 'stream') {
    rejectEncoding('Transfer-Encoding is only allowed on a streamed body');
  }
  if (
    encodings.length > 1 ||
    encodings.some(([, value]) => value.trim().toLowerCase() !== 'chunked')
  ) {
    rejectEncoding('Only a single Transfer-Encoding: chunked is supported');
  }
  if (setLength || spec.body.length !== undefined) {
    rejectEncoding('Transfer-Encoding conflicts with a declared length');
  }
  return 'chunked';
}

function connectionField(options: SerializeOptions): HeaderEntry | null {
  if (options.keepAlive === false) return ['Connection', 'close'];
  if (options.requestVersion === '1.0') return ['Connection', 'keep-alive'];
  return null;
}

function encodeHead(
  status: number,
  reason: string,
  headers: readonly HeaderEntry[]
): string {
  let head = `HTTP/1.1 ${status} ${reason}\r\n`;
  for (const [name, value] of headers) head += `${name}: ${value}\r\n`;
  return `${head}\r\n`;
}

/**
 * Serializes a response, throwing {@link ResponseSerializationError} when a
 * header would corrupt message framing.
 */
export function encodeResponse(
  spec: ResponseSpec,
  options: SerializeOptions = {}
): SerializedResponse {
  const reason = resolveReason(spec);
  validateHeaders(spec.headers);

  const { body } = spec;
  const bodyAllowed = !statusForbidsBody(spec.status);
  const sendBody = bodyAllowed && options.headRequest !== true;

  const framing = callerFraming(spec, bodyAllowed);
  const headers: HeaderEntry[] = spec.headers.filter(
    ([name]) => name.toLowerCase() !== 'connection'
  );

  if (bodyAllowed) {
    if (body.kind === 'bytes') {
      if (body.data.length > 0 && !hasField(headers, 'content-type')) {
        headers.push(['Content-Type', DEFAULT_CONTENT_TYPE]);
      }
      if (framing === null) {
        headers.push(['Content-Length', String(body.data.length)]);
      }
    } else if (body.kind === 'stream') {
      if (framing === null) {
        headers.push(
          body.length === undefined
            ? ['Transfer-Encoding', 'chunked']
            : ['Content-Length', String(body.length)]
        );
      }
    } else if (framing === null) {
      headers.push(['Content-Length', '0']);
    }
  }

  const connection = connectionField(options);
  if (connection) headers.push(connection);

  const headBytes = Buffer.from(encodeHead(spec.status, reason, headers), 'latin1');

  if (body.kind === 'bytes') {
    return {
      status: spec.status,
      head: sendBody ? Buffer.concat([headBytes, body.data]) : headBytes,
      body: null,
      dispose: noop,
    };
  }

  if (body.kind === 'stream') {
    const { source } = body;
    if (!sendBody) {
      return {
        status: spec.status,
        head: headBytes,
        body: null,
        dispose: () => releaseSource(source),
      };
    }
    const chunked =
      framing === 'chunked' || (framing === null && body.length === undefined);
    const framed = new FramedBody(
      source[Symbol.asyncIterator](),
      chunked,
      body.length
    );
    return {
      status: spec.status,
      head: headBytes,
      body: framed,
      dispose: () => framed.close(),
    };
  }

  return { status: spec.status, head: headBytes, body: null, dispose: noop };
}

/**
 * Serializes a response. A response whose headers would corrupt framing is
 * replaced with a generic 500, and its body producer is released on dispose.
 */
export function serializeResponse(
  spec: ResponseSpec,
  options: SerializeOptions = {}
): SerializedResponse {
  try {
    return encodeResponse(spec, options);
  } catch (error) {
    if (!(error instanceof ResponseSerializationError)) throw error;

    logWarn('Rejected response with invalid framing', {
      status: spec.status,
      header: error.header,
      reason: getErrorMessage(error),
    });

    const fallback = encodeResponse(errorResponse(500), options);
    const rejected = spec.body;
    return {
      ...fallback,
      dispose: async () => {
        if (rejected.kind === 'stream') await releaseSource(rejected.source);
      },
    };
  }
}
