import type { Middleware } from '../http/pipeline.js';
import { logInfo } from '../services/logger.js';

export interface RequestLoggerOptions {
  readonly now?: () => number;
  readonly log?: (message: string, meta: Record<string, unknown>) => void;
}

/** Logs `METHOD /path - STATUS (Nms)` once the response is known. */
export function requestLogger(options: RequestLoggerOptions = {}): Middleware {
  const now = options.now ?? (() => performance.now());
  const log = options.log ?? logInfo;
  const startKey = Symbol('request-logger.start');

  return {
    name: 'request-logger',
    before: (_request, context) => {
      context.locals.set(startKey, now());
    },
    after: (request, response, context) => {
      const recorded = context.locals.get(startKey);
      const start = typeof recorded === 'number' ? recorded : now();
      context.locals.delete(startKey);

      const durationMs = Math.round(now() - start);
      log(
        `${request.method} ${request.path} - ${response.status} (${durationMs}ms)`,
        { status: response.status, durationMs }
      );
    },
  };
}
