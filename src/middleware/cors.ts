import type { Middleware } from '../http/pipeline.js';
import { shortCircuit } from '../http/pipeline.js';
import type { ParsedRequest } from '../http/request.js';
import {
  emptyResponse,
  type HeaderEntry,
  hasHeader,
  type ResponseSpec,
} from '../http/response.js';

export interface CorsOptions {
  /** Exact origins, or `*` for any. */
  readonly origins?: readonly string[];
  readonly methods?: readonly string[];
  readonly headers?: readonly string[];
  readonly maxAgeSeconds?: number;
}

const WILDCARD = '*';
const DEFAULT_METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;
const DEFAULT_HEADERS = ['Content-Type', 'Authorization'] as const;
const DEFAULT_MAX_AGE_SECONDS = 3600;

interface CorsPolicy {
  readonly origins: ReadonlySet<string>;
  readonly allowAll: boolean;
  readonly methods: string;
  readonly headers: string;
  readonly maxAge: string;
}

function buildPolicy(options: CorsOptions): CorsPolicy {
  const origins = new Set(options.origins ?? [WILDCARD]);
  return {
    origins,
    allowAll: origins.has(WILDCARD),
    methods: (options.methods ?? DEFAULT_METHODS).join(', '),
    headers: (options.headers ?? DEFAULT_HEADERS).join(', '),
    maxAge: String(options.maxAgeSeconds ?? DEFAULT_MAX_AGE_SECONDS),
  };
}

/** The `Access-Control-Allow-Origin` value, or null when the origin is refused. */
function resolveAllowOrigin(
  request: ParsedRequest,
  policy: CorsPolicy
): string | null {
  const origin = request.headers.get('origin');
  if (!origin) return null;
  if (policy.allowAll) return WILDCARD;
  return policy.origins.has(origin) ? origin : null;
}

function corsHeaders(allowOrigin: string, policy: CorsPolicy): HeaderEntry[] {
  const headers: HeaderEntry[] = [
    ['Access-Control-Allow-Origin', allowOrigin],
    ['Access-Control-Allow-Methods', policy.methods],
    ['Access-Control-Allow-Headers', policy.headers],
  ];
  if (allowOrigin !== WILDCARD) headers.push(['Vary', 'Origin']);
  return headers;
}

/**
 * Origin allow-list. Preflight `OPTIONS` requests from an allowed origin are
 * answered with 204; other responses to allowed origins are decorated.
 * Requests without an allowed origin pass through untouched.
 */
export function cors(options: CorsOptions = {}): Middleware {
  const policy = buildPolicy(options);

  return {
    name: 'cors',
    before: (request) => {
      if (request.method !== 'OPTIONS') return;
      const allowOrigin = resolveAllowOrigin(request, policy);
      if (!allowOrigin) return;

      return shortCircuit(
        emptyResponse(204, [
          ...corsHeaders(allowOrigin, policy),
          ['Access-Control-Max-Age', policy.maxAge],
        ])
      );
    },
    after: (request, response): ResponseSpec | undefined => {
      if (hasHeader(response, 'access-control-allow-origin')) return;
      const allowOrigin = resolveAllowOrigin(request, policy);
      if (!allowOrigin) return;

      return {
        ...response,
        headers: [...response.headers, ...corsHeaders(allowOrigin, policy)],
      };
    },
  };
}
