import { existsSync } from 'node:fs';
import { createRequire } from 'node:module';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { isObject } from '../type-guards.js';

import {
  DEFAULT_MAX_REQUESTS_PER_CONNECTION,
  SIZE_LIMITS,
  TIMEOUT,
} from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseLogFormat,
  parseLogLevel,
} from './env-parsers.js';
import type { AppConfig } from './types.js';

const require = createRequire(import.meta.url);

// Sources sit two levels below the package root, compiled output three.
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../../../package.json'];

function readPackageVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    if (!existsSync(path)) continue;
    const packageJson: unknown = require(path);
    if (isObject(packageJson) && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  }
  throw new Error('package.json version is missing');
}

export const serverVersion: string = readPackageVersion();

const { env } = process;

export const config: AppConfig = {
  server: {
    name: 'wirehttp',
    version: serverVersion,
    host: env.HOST ?? '127.0.0.1',
    port: parseInteger(env.PORT, 8080, 0, 65535),
    maxConnections: parseInteger(env.MAX_CONNECTIONS, 0, 0, 1_000_000),
  },
  connection: {
    maxRequestLineBytes: parseInteger(
      env.MAX_REQUEST_LINE_BYTES,
      SIZE_LIMITS.REQUEST_LINE,
      64,
      SIZE_LIMITS.HEADER_BLOCK * 4
    ),
    maxHeaderBytes: parseInteger(
      env.MAX_HEADER_BYTES,
      SIZE_LIMITS.HEADER_BLOCK,
      256,
      SIZE_LIMITS.HEADER_BLOCK * 16
    ),
    maxHeaderCount: parseInteger(
      env.MAX_HEADER_COUNT,
      SIZE_LIMITS.HEADER_COUNT,
      1,
      10_000
    ),
    maxBodyBytes: parseInteger(
      env.MAX_BODY_BYTES,
      SIZE_LIMITS.BODY,
      0,
      SIZE_LIMITS.MAX_BODY
    ),
    idleTimeoutMs: parseInteger(
      env.IDLE_TIMEOUT_MS,
      TIMEOUT.DEFAULT_IDLE_MS,
      TIMEOUT.MIN_MS,
      TIMEOUT.MAX_MS
    ),
    headersTimeoutMs: parseInteger(
      env.HEADERS_TIMEOUT_MS,
      TIMEOUT.DEFAULT_HEADERS_MS,
      TIMEOUT.MIN_MS,
      TIMEOUT.MAX_MS
    ),
    closeLingerMs: parseInteger(
      env.CLOSE_LINGER_MS,
      TIMEOUT.DEFAULT_CLOSE_LINGER_MS,
      TIMEOUT.MIN_MS,
      TIMEOUT.MAX_MS
    ),
    maxRequestsPerConnection: parseInteger(
      env.MAX_REQUESTS_PER_CONNECTION,
      DEFAULT_MAX_REQUESTS_PER_CONNECTION,
      0,
      1_000_000
    ),
  },
  logging: {
    enabled: parseBoolean(env.LOG_ENABLED, true),
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
};
