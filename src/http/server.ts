import { createServer, type Server, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';

import { config } from '../config/index.js';
import {
  type ConnectionOptionsInput,
  resolveConnectionOptions,
} from '../config/schema.js';
import type { ConnectionOptions } from '../config/types.js';
import { logDebug, logInfo } from '../services/logger.js';

import { type ConnectionSummary, HttpConnection } from './connection.js';
import type { Pipeline } from './pipeline.js';
import { applyConnectionLimit } from './server-tuning.js';

interface LiveConnection {
  readonly controller: AbortController;
  readonly done: Promise<ConnectionSummary>;
}

/**
 * Starts one connection task per accepted socket and keeps the live ones so
 * that shutdown can abort them.
 */
export class ConnectionRegistry {
  private readonly live = new Set<LiveConnection>();
  private closed = false;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly options: ConnectionOptions
  ) {}

  get size(): number {
    return this.live.size;
  }

  accept(
    socket: Duplex,
    remoteAddress?: string
  ): Promise<ConnectionSummary> | null {
    if (this.closed) {
      socket.destroy();
      return null;
    }

    const controller = new AbortController();
    const connection = new HttpConnection(socket, {
      pipeline: this.pipeline,
      options: this.options,
      remoteAddress,
      signal: controller.signal,
    });

    const entry: LiveConnection = {
      controller,
      done: connection.run().finally(() => {
        this.live.delete(entry);
      }),
    };
    this.live.add(entry);
    return entry.done;
  }

  /** Stops accepting, aborts every live connection and waits for them. */
  async closeAll(): Promise<ConnectionSummary[]> {
    this.closed = true;
    const entries = [...this.live];
    for (const entry of entries) entry.controller.abort();
    return Promise.all(entries.map((entry) => entry.done));
  }
}

export interface HttpServerOptions {
  readonly pipeline: Pipeline;
  readonly host?: string;
  readonly port?: number;
  readonly maxConnections?: number;
  readonly connection?: ConnectionOptionsInput;
}

export interface HttpServerHandle {
  readonly host: string;
  readonly port: number;
  readonly server: Server;
  shutdown(reason?: string): Promise<void>;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

function resolvePort(server: Server, fallback: number): number {
  const address = server.address();
  if (address && typeof address === 'object') return address.port;
  return fallback;
}

export async function startHttpServer(
  options: HttpServerOptions
): Promise<HttpServerHandle> {
  const host = options.host ?? config.server.host;
  const requestedPort = options.port ?? config.server.port;
  const connectionOptions = resolveConnectionOptions(options.connection);
  const registry = new ConnectionRegistry(options.pipeline, connectionOptions);

  const server = createServer({ pauseOnConnect: true }, (socket: Socket) => {
    void registry.accept(socket, socket.remoteAddress);
  });
  applyConnectionLimit(
    server,
    options.maxConnections ?? config.server.maxConnections
  );

  await listen(server, requestedPort, host);
  const port = resolvePort(server, requestedPort);
  logInfo('HTTP server listening', { host, port });

  let closing: Promise<void> | undefined;
  const shutdown = (reason = 'shutdown'): Promise<void> => {
    closing ??= (async () => {
      logInfo('Shutting down HTTP server', { reason, live: registry.size });
      const serverClosed = closeServer(server);
      const summaries = await registry.closeAll();
      await serverClosed;
      logDebug('HTTP server closed', { aborted: summaries.length });
    })();
    return closing;
  };

  return { host, port, server, shutdown };
}
