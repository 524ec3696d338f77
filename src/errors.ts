import { inspect } from 'node:util';

import { isError, isObject } from './type-guards.js';

const DEFAULT_HTTP_STATUS = 500;

/**
 * Application error carrying the HTTP status the pipeline should answer with.
 * Anything else thrown from a hook or handler becomes a plain 500.
 */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    statusCode = DEFAULT_HTTP_STATUS,
    code?: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.code = code ?? `HTTP_${statusCode}`;
    this.details = Object.freeze({ ...details });
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends Error {
  override name = 'ConfigError';
}

export class ResponseSerializationError extends Error {
  override name = 'ResponseSerializationError';

  constructor(
    message: string,
    readonly header: string
  ) {
    super(message);
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  if (!isError(error)) return false;
  if (!('code' in error)) return false;
  return typeof error.code === 'string';
}

const PEER_GONE_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'EPIPE',
  'ECONNABORTED',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

/** Resets and broken pipes are the peer leaving, not a server fault. */
export function isPeerGoneError(error: unknown): boolean {
  return isSystemError(error) && PEER_GONE_CODES.has(error.code ?? '');
}
