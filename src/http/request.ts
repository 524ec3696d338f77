import { HeaderList } from './headers.js';

export type HttpVersion = '1.0' | '1.1';

export type RequestBody =
  | { readonly kind: 'empty' }
  | { readonly kind: 'fixed'; readonly data: Buffer }
  | {
      readonly kind: 'chunked';
      readonly chunks: readonly Buffer[];
      readonly length: number;
    };

export interface ParsedRequestInit {
  readonly method: string;
  readonly target: string;
  readonly version: HttpVersion;
  readonly headers: HeaderList;
  readonly body: RequestBody;
  readonly trailers?: HeaderList;
  readonly params?: Readonly<Record<string, string>>;
}

const EMPTY_BODY: RequestBody = { kind: 'empty' };
const EMPTY_PARAMS: Readonly<Record<string, string>> = Object.freeze({});

const ABSOLUTE_PREFIX = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i;

function splitTarget(target: string): {
  path: string;
  query: string | undefined;
} {
  const prefix = ABSOLUTE_PREFIX.exec(target);
  const local = prefix ? target.slice(prefix[0].length) : target;

  const queryStart = local.indexOf('?');
  const path = queryStart === -1 ? local : local.slice(0, queryStart);
  const query = queryStart === -1 ? undefined : local.slice(queryStart + 1);

  return { path: path === '' ? '/' : path, query };
}

/**
 * A request as parsed off the wire. Header and body bytes are views into the
 * connection buffer and stay valid while the connection holds its lease.
 */
export class ParsedRequest {
  readonly method: string;
  readonly target: string;
  readonly path: string;
  readonly query: string | undefined;
  readonly version: HttpVersion;
  readonly headers: HeaderList;
  readonly trailers: HeaderList;
  readonly body: RequestBody;
  readonly params: Readonly<Record<string, string>>;

  private searchParams: URLSearchParams | undefined;

  constructor(init: ParsedRequestInit) {
    this.method = init.method;
    this.target = init.target;
    this.version = init.version;
    this.headers = init.headers;
    this.trailers = init.trailers ?? new HeaderList();
    this.body = init.body;
    this.params = init.params ?? EMPTY_PARAMS;

    const { path, query } = splitTarget(init.target);
    this.path = path;
    this.query = query;
  }

  static empty(method: string, target: string): ParsedRequest {
    return new ParsedRequest({
      method,
      target,
      version: '1.1',
      headers: new HeaderList(),
      body: EMPTY_BODY,
    });
  }

  /**
   * HTTP/1.1 persists unless `Connection: close`; HTTP/1.0 closes unless
   * `Connection: keep-alive`.
   */
  get keepAlive(): boolean {
    if (this.headers.hasToken('connection', 'close')) return false;
    if (this.version === '1.0') {
      return this.headers.hasToken('connection', 'keep-alive');
    }
    return true;
  }

  get bodyLength(): number {
    switch (this.body.kind) {
      case 'empty':
        return 0;
      case 'fixed':
        return this.body.data.length;
      case 'chunked':
        return this.body.length;
    }
  }

  /** Fixed bodies come back as the buffer view; chunked ones are joined. */
  bodyBytes(): Buffer {
    switch (this.body.kind) {
      case 'empty':
        return Buffer.alloc(0);
      case 'fixed':
        return this.body.data;
      case 'chunked':
        return Buffer.concat(this.body.chunks, this.body.length);
    }
  }

  text(encoding: BufferEncoding = 'utf8'): string {
    return this.bodyBytes().toString(encoding);
  }

  json(): unknown {
    return JSON.parse(this.text());
  }

  queryParams(): URLSearchParams {
    this.searchParams ??= new URLSearchParams(this.query ?? '');
    return this.searchParams;
  }

  queryParam(key: string): string | undefined {
    return this.queryParams().get(key) ?? undefined;
  }

  with(overrides: Partial<ParsedRequestInit>): ParsedRequest {
    return new ParsedRequest({
      method: this.method,
      target: this.target,
      version: this.version,
      headers: this.headers,
      trailers: this.trailers,
      body: this.body,
      params: this.params,
      ...overrides,
    });
  }

  withParams(params: Readonly<Record<string, string>>): ParsedRequest {
    return this.with({ params });
  }
}
