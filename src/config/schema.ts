import { z } from 'zod';

import { ConfigError } from '../errors.js';
import { SIZE_LIMITS, TIMEOUT } from './constants.js';
import { config } from './index.js';
import type { ConnectionOptions } from './types.js';

const timeoutMs = z.number().int().min(TIMEOUT.MIN_MS).max(TIMEOUT.MAX_MS);

const connectionOptionsSchema = z
  .object({
    maxRequestLineBytes: z.number().int().min(16),
    maxHeaderBytes: z.number().int().min(64),
    maxHeaderCount: z.number().int().min(1),
    maxBodyBytes: z.number().int().min(0).max(SIZE_LIMITS.MAX_BODY),
    idleTimeoutMs: timeoutMs,
    headersTimeoutMs: timeoutMs,
    closeLingerMs: timeoutMs,
    maxRequestsPerConnection: z.number().int().min(0),
  })
  .refine((value) => value.maxRequestLineBytes <= value.maxHeaderBytes, {
    message: 'maxRequestLineBytes must not exceed maxHeaderBytes',
    path: ['maxRequestLineBytes'],
  });

export type ConnectionOptionsInput = Partial<ConnectionOptions>;

function definedEntries(
  overrides: ConnectionOptionsInput
): ConnectionOptionsInput {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Merges caller overrides over the environment defaults and validates the
 * result. Throws {@link ConfigError} describing every violated field.
 */
export function resolveConnectionOptions(
  overrides: ConnectionOptionsInput = {},
  defaults: ConnectionOptions = config.connection
): ConnectionOptions {
  const result = connectionOptionsSchema.safeParse({
    ...defaults,
    ...definedEntries(overrides),
  });
  if (!result.success) {
    throw new ConfigError(
      `Invalid connection options: ${formatIssues(result.error)}`
    );
  }
  return Object.freeze(result.data);
}
