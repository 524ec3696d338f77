const BYTES = {
  KB: 1024,
  MB: 1024 * 1024,
} as const;

export const SIZE_LIMITS = {
  REQUEST_LINE: 8 * BYTES.KB,
  HEADER_BLOCK: 16 * BYTES.KB,
  HEADER_COUNT: 100,
  BODY: 1 * BYTES.MB,
  MAX_BODY: 64 * BYTES.MB,
} as const;

export const TIMEOUT = {
  DEFAULT_IDLE_MS: 5_000,
  DEFAULT_HEADERS_MS: 10_000,
  DEFAULT_CLOSE_LINGER_MS: 2_000,
  MIN_MS: 10,
  MAX_MS: 10 * 60 * 1000,
} as const;

export const DEFAULT_MAX_REQUESTS_PER_CONNECTION = 1000;
