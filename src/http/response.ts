import { getReasonPhrase } from './status.js';

export type HeaderEntry = readonly [name: string, value: string];
export type HeaderInit = readonly HeaderEntry[] | Readonly<Record<string, string>>;

export type ResponseChunk = Uint8Array | string;

export type ResponseBody =
  | { readonly kind: 'empty' }
  | { readonly kind: 'bytes'; readonly data: Buffer }
  | {
      readonly kind: 'stream';
      readonly source: AsyncIterable<ResponseChunk>;
      /** Known total length; without it the body is sent chunked. */
      readonly length?: number;
    };

export interface ResponseSpec {
  readonly status: number;
  /** Overrides the reason phrase from the status table. */
  readonly reason?: string;
  readonly headers: readonly HeaderEntry[];
  readonly body: ResponseBody;
}

const EMPTY_BODY: ResponseBody = { kind: 'empty' };

function isEntryList(init: HeaderInit): init is readonly HeaderEntry[] {
  return Array.isArray(init);
}

function toHeaderEntries(init: HeaderInit | undefined): HeaderEntry[] {
  if (!init) return [];
  if (isEntryList(init)) return [...init];
  return Object.entries(init);
}

function toBody(body: Buffer | string | ResponseBody | undefined): ResponseBody {
  if (body === undefined) return EMPTY_BODY;
  if (typeof body === 'string') {
    return { kind: 'bytes', data: Buffer.from(body, 'utf8') };
  }
  if (Buffer.isBuffer(body)) return { kind: 'bytes', data: body };
  return body;
}

export function createResponse(
  status: number,
  body?: Buffer | string | ResponseBody,
  headers?: HeaderInit
): ResponseSpec {
  return {
    status,
    headers: toHeaderEntries(headers),
    body: toBody(body),
  };
}

export function emptyResponse(status = 204, headers?: HeaderInit): ResponseSpec {
  return createResponse(status, undefined, headers);
}

export function textResponse(
  status: number,
  text: string,
  headers?: HeaderInit
): ResponseSpec {
  return createResponse(status, text, [
    ['Content-Type', 'text/plain; charset=utf-8'],
    ...toHeaderEntries(headers),
  ]);
}

export function jsonResponse(
  status: number,
  value: unknown,
  headers?: HeaderInit
): ResponseSpec {
  return createResponse(status, JSON.stringify(value), [
    ['Content-Type', 'application/json'],
    ...toHeaderEntries(headers),
  ]);
}

export function streamResponse(
  status: number,
  source: AsyncIterable<ResponseChunk>,
  options: { length?: number; headers?: HeaderInit } = {}
): ResponseSpec {
  const body: ResponseBody =
    options.length === undefined
      ? { kind: 'stream', source }
      : { kind: 'stream', source, length: options.length };
  return createResponse(status, body, options.headers);
}

/** Terse plain-text body naming the status, used for protocol errors. */
export function errorResponse(status: number, message?: string): ResponseSpec {
  return textResponse(status, `${message ?? getReasonPhrase(status)}\n`);
}

export function getHeader(
  response: ResponseSpec,
  name: string
): string | undefined {
  const lower = name.toLowerCase();
  return response.headers.find(([key]) => key.toLowerCase() === lower)?.[1];
}

export function hasHeader(response: ResponseSpec, name: string): boolean {
  return getHeader(response, name) !== undefined;
}

/** Appends a header; existing fields with the same name are kept. */
export function withHeader(
  response: ResponseSpec,
  name: string,
  value: string
): ResponseSpec {
  return { ...response, headers: [...response.headers, [name, value]] };
}

export function withoutHeader(
  response: ResponseSpec,
  name: string
): ResponseSpec {
  const lower = name.toLowerCase();
  return {
    ...response,
    headers: response.headers.filter(([key]) => key.toLowerCase() !== lower),
  };
}

/** Replaces every field named `name` with a single one. */
export function setHeader(
  response: ResponseSpec,
  name: string,
  value: string
): ResponseSpec {
  return withHeader(withoutHeader(response, name), name, value);
}
