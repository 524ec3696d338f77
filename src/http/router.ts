import type { DispatchContext, Handler } from './pipeline.js';
import type { ParsedRequest } from './request.js';
import { errorResponse, type ResponseSpec } from './response.js';

export interface RouteMatch {
  readonly handler: Handler;
  readonly params?: Readonly<Record<string, string>>;
}

export interface Router {
  resolve(method: string, path: string): RouteMatch | null;
}

const ANY_METHOD = '*';

/** Terminal handler that answers 404 for anything the router does not know. */
export function routeHandler(router: Router): Handler {
  return (request: ParsedRequest, context: DispatchContext) => {
    const match = router.resolve(request.method, request.path);
    if (!match) return notFound(request);

    const routed = match.params ? request.withParams(match.params) : request;
    return match.handler(routed, context);
  };
}

function notFound(request: ParsedRequest): ResponseSpec {
  return errorResponse(404, `No route for ${request.method} ${request.path}`);
}

/** Exact method and path lookup. `*` as the method matches any method. */
export class RouteTable implements Router {
  private readonly routes = new Map<string, Map<string, Handler>>();

  add(method: string, path: string, handler: Handler): this {
    let byMethod = this.routes.get(path);
    if (!byMethod) {
      byMethod = new Map();
      this.routes.set(path, byMethod);
    }
    const key = method === ANY_METHOD ? ANY_METHOD : method.toUpperCase();
    if (byMethod.has(key)) {
      throw new Error(`Route already registered: ${key} ${path}`);
    }
    byMethod.set(key, handler);
    return this;
  }

  get(path: string, handler: Handler): this {
    return this.add('GET', path, handler);
  }

  post(path: string, handler: Handler): this {
    return this.add('POST', path, handler);
  }

  all(path: string, handler: Handler): this {
    return this.add(ANY_METHOD, path, handler);
  }

  resolve(method: string, path: string): RouteMatch | null {
    const byMethod = this.routes.get(path);
    if (!byMethod) return null;
    const handler = byMethod.get(method) ?? byMethod.get(ANY_METHOD);
    return handler ? { handler } : null;
  }
}
