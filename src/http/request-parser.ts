import type { RequestLimits } from '../config/types.js';

import { type HeaderField, HeaderList } from './headers.js';
import { type HttpVersion, ParsedRequest, type RequestBody } from './request.js';

export type ParseStage = 'head' | 'body';

export type ParseOutcome =
  | {
      readonly kind: 'complete';
      readonly request: ParsedRequest;
      readonly bytesConsumed: number;
    }
  | { readonly kind: 'incomplete'; readonly stage: ParseStage }
  | {
      readonly kind: 'malformed';
      readonly reason: string;
      readonly status: number;
    };

const CR = 0x0d;
const LF = 0x0a;
const SP = 0x20;
const HTAB = 0x09;
const COLON = 0x3a;
const SEMICOLON = 0x3b;
const DEL = 0x7f;

const CRLF = Buffer.from('\r\n', 'latin1');
const HEAD_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');

/** Longest chunk-size line (size plus extensions) accepted. */
const MAX_CHUNK_LINE_BYTES = 1024;
/** 12 hex digits already exceed any configurable body limit. */
const MAX_CHUNK_SIZE_DIGITS = 12;

const TCHAR = new Uint8Array(256);
for (const char of "!#$%&'*+-.^_`|~") TCHAR[char.charCodeAt(0)] = 1;
for (let c = 0x30; c <= 0x39; c += 1) TCHAR[c] = 1;
for (let c = 0x41; c <= 0x5a; c += 1) TCHAR[c] = 1;
for (let c = 0x61; c <= 0x7a; c += 1) TCHAR[c] = 1;

const ABSOLUTE_FORM = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;
const VERSION_SYNTAX = /^HTTP\/\d\.\d$/;
const DECIMAL = /^\d+$/;
const HEX = /^[0-9a-f]+$/i;

interface Span {
  readonly start: number;
  readonly end: number;
}

interface FieldSpan {
  readonly name: Span;
  readonly value: Span;
}

type Framing =
  | { readonly kind: 'none' }
  | { readonly kind: 'fixed'; readonly length: number }
  | { readonly kind: 'chunked' };

interface ParsedHead {
  readonly method: string;
  readonly target: string;
  readonly version: HttpVersion;
  readonly fields: readonly FieldSpan[];
  readonly headEnd: number;
  readonly framing: Framing;
}

interface ChunkCursor {
  pos: number;
  total: number;
  inTrailers: boolean;
  readonly spans: Span[];
  readonly trailers: FieldSpan[];
}

class Malformed extends Error {
  override name = 'Malformed';

  constructor(
    message: string,
    readonly status = 400
  ) {
    super(message);
  }
}

function malformed(
  reason: string,
  status = 400
): Extract<ParseOutcome, { kind: 'malformed' }> {
  return { kind: 'malformed', reason, status };
}

function incomplete(stage: ParseStage): ParseOutcome {
  return { kind: 'incomplete', stage };
}

function isToken(buf: Buffer, span: Span): boolean {
  if (span.end <= span.start) return false;
  for (let i = span.start; i < span.end; i += 1) {
    if (TCHAR[buf[i]] !== 1) return false;
  }
  return true;
}

function isOws(byte: number): boolean {
  return byte === SP || byte === HTAB;
}

/** Field values may hold visible ASCII, obs-text, SP and HTAB only. */
function isFieldValue(buf: Buffer, span: Span): boolean {
  for (let i = span.start; i < span.end; i += 1) {
    const byte = buf[i];
    if (byte === HTAB) continue;
    if (byte < SP || byte === DEL) return false;
  }
  return true;
}

function isTargetByte(byte: number): boolean {
  return byte > SP && byte < DEL;
}

function trimOws(buf: Buffer, span: Span): Span {
  let { start, end } = span;
  while (start < end && isOws(buf[start])) start += 1;
  while (end > start && isOws(buf[end - 1])) end -= 1;
  return { start, end };
}

function latin1(buf: Buffer, span: Span): string {
  return buf.toString('latin1', span.start, span.end);
}

function nameIs(buf: Buffer, span: Span, lowerName: string): boolean {
  return latin1(buf, span).toLowerCase() === lowerName;
}

function toView(buf: Buffer, span: Span): Buffer {
  return buf.subarray(span.start, span.end);
}

function toHeaderList(buf: Buffer, fields: readonly FieldSpan[]): HeaderList {
  return new HeaderList(
    fields.map(
      (field): HeaderField => ({
        name: toView(buf, field.name),
        value: toView(buf, field.value),
      })
    )
  );
}

/**
 * Parses one header or trailer line. `end` excludes the CRLF.
 */
function parseFieldLine(buf: Buffer, start: number, end: number): FieldSpan {
  if (isOws(buf[start])) {
    throw new Malformed('Obsolete header line folding is not supported');
  }
  const colon = buf.indexOf(COLON, start);
  if (colon === -1 || colon >= end) {
    throw new Malformed('Header line is missing a colon');
  }
  const name = { start, end: colon };
  if (!isToken(buf, name)) {
    throw new Malformed('Invalid header field name');
  }
  const value = trimOws(buf, { start: colon + 1, end });
  if (!isFieldValue(buf, value)) {
    throw new Malformed('Invalid header field value');
  }
  return { name, value };
}

function parseRequestLine(
  buf: Buffer,
  start: number,
  end: number
): Pick<ParsedHead, 'method' | 'target' | 'version'> {
  const firstSpace = buf.indexOf(SP, start);
  if (firstSpace === -1 || firstSpace >= end) {
    throw new Malformed('Malformed request line');
  }
  const secondSpace = buf.indexOf(SP, firstSpace + 1);
  if (secondSpace === -1 || secondSpace >= end) {
    throw new Malformed('Malformed request line');
  }

  const methodSpan = { start, end: firstSpace };
  if (!isToken(buf, methodSpan)) throw new Malformed('Invalid request method');

  const targetSpan = { start: firstSpace + 1, end: secondSpace };
  if (targetSpan.end <= targetSpan.start) {
    throw new Malformed('Empty request target');
  }
  for (let i = targetSpan.start; i < targetSpan.end; i += 1) {
    if (!isTargetByte(buf[i])) throw new Malformed('Invalid request target');
  }

  const method = latin1(buf, methodSpan);
  const target = latin1(buf, targetSpan);
  const versionToken = latin1(buf, { start: secondSpace + 1, end });

  if (!target.startsWith('/') && !ABSOLUTE_FORM.test(target)) {
    if (target !== '*' || method !== 'OPTIONS') {
      throw new Malformed('Invalid request target');
    }
  }

  if (versionToken === 'HTTP/1.1') return { method, target, version: '1.1' };
  if (versionToken === 'HTTP/1.0') return { method, target, version: '1.0' };
  if (VERSION_SYNTAX.test(versionToken)) {
    throw new Malformed('Unsupported HTTP version', 505);
  }
  throw new Malformed('Invalid HTTP version');
}

function resolveFraming(
  buf: Buffer,
  fields: readonly FieldSpan[],
  limits: RequestLimits
): Framing {
  const lengths = fields.filter((f) => nameIs(buf, f.name, 'content-length'));
  const encodings = fields.filter((f) =>
    nameIs(buf, f.name, 'transfer-encoding')
  );

  if (lengths.length > 0 && encodings.length > 0) {
    throw new Malformed('Both Content-Length and Transfer-Encoding present');
  }
  if (lengths.length > 1) throw new Malformed('Duplicate Content-Length');
  if (encodings.length > 1) throw new Malformed('Duplicate Transfer-Encoding');

  const [lengthField] = lengths;
  if (lengthField) {
    const raw = latin1(buf, lengthField.value);
    if (!DECIMAL.test(raw)) throw new Malformed('Invalid Content-Length');
    const length = Number(raw);
    if (!Number.isSafeInteger(length) || length > limits.maxBodyBytes) {
      throw new Malformed('Request body too large', 413);
    }
    return length === 0 ? { kind: 'none' } : { kind: 'fixed', length };
  }

  const [encodingField] = encodings;
  if (encodingField) {
    const coding = latin1(buf, encodingField.value).trim().toLowerCase();
    if (coding !== 'chunked') {
      throw new Malformed('Unsupported transfer coding', 501);
    }
    return { kind: 'chunked' };
  }

  return { kind: 'none' };
}

/**
 * Resumable HTTP/1.1 request parser.
 *
 * `parse` is always handed the whole unconsumed tail of the connection
 * buffer. Between calls it remembers byte offsets (never buffer views) into
 * that tail, so the buffer may move the tail to new memory between reads.
 * State resets after every complete or malformed outcome.
 */
export class RequestParser {
  private scanFrom = 0;
  private lastLength = 0;
  private head: ParsedHead | null = null;
  private cursor: ChunkCursor | null = null;

  constructor(private readonly limits: RequestLimits) {}

  reset(): void {
    this.scanFrom = 0;
    this.lastLength = 0;
    this.head = null;
    this.cursor = null;
  }

  parse(tail: Buffer): ParseOutcome {
    // A shorter tail means the caller consumed bytes; memoized offsets are stale.
    if (tail.length < this.lastLength) this.reset();
    this.lastLength = tail.length;

    try {
      const outcome = this.step(tail);
      if (outcome.kind !== 'incomplete') this.reset();
      return outcome;
    } catch (error) {
      this.reset();
      if (error instanceof Malformed) {
        return malformed(error.message, error.status);
      }
      throw error;
    }
  }

  private step(tail: Buffer): ParseOutcome {
    this.head ??= this.parseHead(tail);
    if (!this.head) return incomplete('head');

    const { framing, headEnd } = this.head;
    switch (framing.kind) {
      case 'none':
        return this.complete(tail, this.head, { kind: 'empty' }, headEnd, []);
      case 'fixed': {
        const end = headEnd + framing.length;
        if (tail.length < end) return incomplete('body');
        return this.complete(
          tail,
          this.head,
          { kind: 'fixed', data: tail.subarray(headEnd, end) },
          end,
          []
        );
      }
      case 'chunked':
        return this.parseChunked(tail, this.head);
    }
  }

  private parseHead(tail: Buffer): ParsedHead | null {
    const { maxRequestLineBytes, maxHeaderBytes, maxHeaderCount } = this.limits;

    // Empty lines ahead of a request line are ignored.
    let start = 0;
    while (tail[start] === CR && tail[start + 1] === LF) start += 2;
    if (start > maxHeaderBytes) {
      throw new Malformed('Too many empty lines before request line');
    }

    const lineEnd = tail.indexOf(CRLF, start);
    if (lineEnd === -1) {
      if (tail.length - start > maxRequestLineBytes) {
        throw new Malformed('Request line too long', 414);
      }
      return null;
    }
    if (lineEnd - start > maxRequestLineBytes) {
      throw new Malformed('Request line too long', 414);
    }

    const terminator = tail.indexOf(
      HEAD_TERMINATOR,
      Math.max(this.scanFrom, lineEnd)
    );
    if (terminator === -1) {
      if (tail.length - start > maxHeaderBytes) {
        throw new Malformed('Request header block too large', 431);
      }
      this.scanFrom = Math.max(lineEnd, tail.length - HEAD_TERMINATOR.length + 1);
      return null;
    }

    const headEnd = terminator + HEAD_TERMINATOR.length;
    if (headEnd - start > maxHeaderBytes) {
      throw new Malformed('Request header block too large', 431);
    }

    const requestLine = parseRequestLine(tail, start, lineEnd);

    const fields: FieldSpan[] = [];
    let pos = lineEnd + CRLF.length;
    while (pos < terminator + CRLF.length) {
      const end = tail.indexOf(CRLF, pos);
      if (fields.length >= maxHeaderCount) {
        throw new Malformed('Too many request headers', 431);
      }
      fields.push(parseFieldLine(tail, pos, end));
      pos = end + CRLF.length;
    }

    return {
      ...requestLine,
      fields,
      headEnd,
      framing: resolveFraming(tail, fields, this.limits),
    };
  }

  private parseChunked(tail: Buffer, head: ParsedHead): ParseOutcome {
    this.cursor ??= {
      pos: head.headEnd,
      total: 0,
      inTrailers: false,
      spans: [],
      trailers: [],
    };
    const cursor = this.cursor;

    for (;;) {
      const lineEnd = tail.indexOf(CRLF, cursor.pos);

      if (cursor.inTrailers) {
        if (lineEnd === -1) {
          if (tail.length - cursor.pos > this.limits.maxHeaderBytes) {
            throw new Malformed('Chunked trailer section too large', 431);
          }
          return incomplete('body');
        }
        if (lineEnd === cursor.pos) {
          const body: RequestBody = {
            kind: 'chunked',
            chunks: cursor.spans.map((span) => toView(tail, span)),
            length: cursor.total,
          };
          return this.complete(
            tail,
            head,
            body,
            lineEnd + CRLF.length,
            cursor.trailers
          );
        }
        if (cursor.trailers.length >= this.limits.maxHeaderCount) {
          throw new Malformed('Too many trailer fields', 431);
        }
        cursor.trailers.push(parseFieldLine(tail, cursor.pos, lineEnd));
        cursor.pos = lineEnd + CRLF.length;
        continue;
      }

      if (lineEnd === -1) {
        if (tail.length - cursor.pos > MAX_CHUNK_LINE_BYTES) {
          throw new Malformed('Chunk size line too long');
        }
        return incomplete('body');
      }

      const size = this.readChunkSize(tail, cursor.pos, lineEnd);
      if (size === 0) {
        cursor.inTrailers = true;
        cursor.pos = lineEnd + CRLF.length;
        continue;
      }
      if (cursor.total + size > this.limits.maxBodyBytes) {
        throw new Malformed('Request body too large', 413);
      }

      const dataStart = lineEnd + CRLF.length;
      const dataEnd = dataStart + size;
      if (tail.length < dataEnd + CRLF.length) return incomplete('body');
      if (tail[dataEnd] !== CR || tail[dataEnd + 1] !== LF) {
        throw new Malformed('Chunk data is not followed by CRLF');
      }

      cursor.spans.push({ start: dataStart, end: dataEnd });
      cursor.total += size;
      cursor.pos = dataEnd + CRLF.length;
    }
  }

  private readChunkSize(tail: Buffer, start: number, end: number): number {
    if (end - start > MAX_CHUNK_LINE_BYTES) {
      throw new Malformed('Chunk size line too long');
    }
    const extension = tail.indexOf(SEMICOLON, start);
    const sizeEnd = extension !== -1 && extension < end ? extension : end;
    const digits = latin1(tail, trimOws(tail, { start, end: sizeEnd }));

    if (!HEX.test(digits)) throw new Malformed('Invalid chunk size');
    if (digits.length > MAX_CHUNK_SIZE_DIGITS) {
      throw new Malformed('Request body too large', 413);
    }
    return Number.parseInt(digits, 16);
  }

  private complete(
    tail: Buffer,
    head: ParsedHead,
    body: RequestBody,
    bytesConsumed: number,
    trailers: readonly FieldSpan[]
  ): ParseOutcome {
    const request = new ParsedRequest({
      method: head.method,
      target: head.target,
      version: head.version,
      headers: toHeaderList(tail, head.fields),
      trailers: toHeaderList(tail, trailers),
      body,
    });
    return { kind: 'complete', request, bytesConsumed };
  }
}

/** One-shot parse of a tail with no memoized state. */
export function parseRequest(
  tail: Buffer,
  limits: RequestLimits
): ParseOutcome {
  return new RequestParser(limits).parse(tail);
}
