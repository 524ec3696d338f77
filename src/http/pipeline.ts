import { getErrorMessage, isHttpError, toError } from '../errors.js';
import { runWithRequestContext } from '../services/context.js';
import { logDebug, logError } from '../services/logger.js';

import type { ParsedRequest } from './request.js';
import { errorResponse, type ResponseSpec } from './response.js';

export interface DispatchContext {
  readonly connectionId: string;
  readonly requestId: string;
  /** 1-based position of the request on its connection. */
  readonly requestIndex: number;
  readonly remoteAddress?: string | undefined;
  /**
   * Scratch space owned by this one request, for middleware that carries a
   * value from its before-hook to its after-hook.
   */
  readonly locals: Map<symbol, unknown>;
}

export function createDispatchContext(
  init: Omit<DispatchContext, 'locals'>
): DispatchContext {
  return { ...init, locals: new Map() };
}

export type Handler = (
  request: ParsedRequest,
  context: DispatchContext
) => ResponseSpec | Promise<ResponseSpec>;

export interface Proceed {
  readonly kind: 'proceed';
  readonly request: ParsedRequest;
}

export interface ShortCircuit {
  readonly kind: 'short-circuit';
  readonly response: ResponseSpec;
}

export type BeforeOutcome = Proceed | ShortCircuit | undefined;

export type BeforeHook = (
  request: ParsedRequest,
  context: DispatchContext
) => BeforeOutcome | void | Promise<BeforeOutcome | void>;

export type AfterHook = (
  request: ParsedRequest,
  response: ResponseSpec,
  context: DispatchContext
) => ResponseSpec | void | Promise<ResponseSpec | void>;

export interface Middleware {
  readonly name: string;
  readonly before?: BeforeHook;
  readonly after?: AfterHook;
}

export interface PipelineOptions {
  readonly middleware?: readonly Middleware[];
  readonly handler: Handler;
}

export interface Pipeline {
  readonly middleware: readonly Middleware[];
  /** Resolves with a response for every request; never rejects. */
  dispatch(request: ParsedRequest, context: DispatchContext): Promise<ResponseSpec>;
}

/** Replaces the request seen by later hooks and the handler. */
export function proceed(request: ParsedRequest): Proceed {
  return { kind: 'proceed', request };
}

/** Skips the remaining before-hooks and the handler. */
export function shortCircuit(response: ResponseSpec): ShortCircuit {
  return { kind: 'short-circuit', response };
}

function failureStatus(error: unknown): number {
  if (!isHttpError(error)) return 500;
  const status = error.statusCode;
  return Number.isInteger(status) && status >= 400 && status <= 599 ? status : 500;
}

function failureResponse(stage: string, error: unknown): ResponseSpec {
  const status = failureStatus(error);

  if (status < 500) {
    logDebug(`Request rejected in ${stage}`, {
      status,
      error: getErrorMessage(error),
    });
    return errorResponse(status, getErrorMessage(error));
  }

  logError(`Request failed in ${stage}`, toError(error));
  return isHttpError(error)
    ? errorResponse(status, error.message)
    : errorResponse(status);
}

async function runBefore(
  middleware: readonly Middleware[],
  initial: ParsedRequest,
  context: DispatchContext
): Promise<{ request: ParsedRequest; response: ResponseSpec | null }> {
  let request = initial;
  for (const stage of middleware) {
    if (!stage.before) continue;
    try {
      const outcome = await stage.before(request, context);
      if (!outcome) continue;
      if (outcome.kind === 'short-circuit') {
        return { request, response: outcome.response };
      }
      request = outcome.request;
    } catch (error) {
      return { request, response: failureResponse(`${stage.name} (before)`, error) };
    }
  }
  return { request, response: null };
}

async function runHandler(
  handler: Handler,
  request: ParsedRequest,
  context: DispatchContext
): Promise<ResponseSpec> {
  try {
    return await handler(request, context);
  } catch (error) {
    return failureResponse('handler', error);
  }
}

async function runAfter(
  middleware: readonly Middleware[],
  request: ParsedRequest,
  initial: ResponseSpec,
  context: DispatchContext
): Promise<ResponseSpec> {
  let response = initial;
  for (let index = middleware.length - 1; index >= 0; index -= 1) {
    const stage = middleware[index];
    if (!stage?.after) continue;
    try {
      const replacement = await stage.after(request, response, context);
      if (replacement) response = replacement;
    } catch (error) {
      response = failureResponse(`${stage.name} (after)`, error);
    }
  }
  return response;
}

/**
 * Composes middleware around a terminal handler. Before-hooks run in order,
 * after-hooks in reverse, and every after-hook runs even when a before-hook
 * short-circuits or something throws.
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const middleware: readonly Middleware[] = Object.freeze([
    ...(options.middleware ?? []),
  ]);
  const { handler } = options;

  const run = async (
    request: ParsedRequest,
    context: DispatchContext
  ): Promise<ResponseSpec> => {
    const before = await runBefore(middleware, request, context);
    const response =
      before.response ?? (await runHandler(handler, before.request, context));
    return runAfter(middleware, before.request, response, context);
  };

  return Object.freeze({
    middleware,
    dispatch: (request: ParsedRequest, context: DispatchContext) =>
      runWithRequestContext(
        { connectionId: context.connectionId, requestId: context.requestId },
        () => run(request, context)
      ),
  });
}
