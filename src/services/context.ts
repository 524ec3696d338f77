import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContext {
  readonly connectionId: string;
  readonly requestId?: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(
  context: RequestContext,
  fn: () => T
): T {
  return requestContext.run(context, fn);
}

export function getConnectionId(): string | undefined {
  return requestContext.getStore()?.connectionId;
}

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}
