import { randomUUID } from 'node:crypto';
import type { Duplex } from 'node:stream';

import { config } from '../config/index.js';
import type { ConnectionOptions } from '../config/types.js';
import { getErrorMessage, isPeerGoneError, toError } from '../errors.js';
import { logDebug, logError, logWarn } from '../services/logger.js';

import { createDispatchContext, type Pipeline } from './pipeline.js';
import { RawBuffer } from './raw-buffer.js';
import type { ParsedRequest } from './request.js';
import { RequestParser } from './request-parser.js';
import { errorResponse, getHeader, type ResponseSpec } from './response.js';
import { type SerializeOptions, serializeResponse } from './response-builder.js';
import { SocketChannel } from './socket-channel.js';

export type ConnectionState =
  | 'awaiting-request'
  | 'parsing-body'
  | 'dispatching'
  | 'writing-response'
  | 'closing';

export type CloseReason =
  | 'peer-closed'
  | 'idle-timeout'
  | 'request-timeout'
  | 'malformed'
  | 'io-error'
  | 'connection-close'
  | 'max-requests'
  | 'write-failed'
  | 'aborted';

export interface ConnectionSummary {
  readonly connectionId: string;
  readonly requests: number;
  readonly reason: CloseReason;
  readonly bytesWritten: number;
}

export interface HttpConnectionInit {
  readonly pipeline: Pipeline;
  readonly options?: ConnectionOptions;
  readonly connectionId?: string;
  readonly remoteAddress?: string | undefined;
  /** Aborting closes the connection from whatever state it is in. */
  readonly signal?: AbortSignal | undefined;
}

const GRACEFUL_CLOSE: ReadonlySet<CloseReason> = new Set<CloseReason>([
  'peer-closed',
  'idle-timeout',
  'request-timeout',
  'malformed',
  'connection-close',
  'max-requests',
]);

/**
 * Drives one client connection: reads bytes, parses requests off the
 * buffered tail, dispatches them through the pipeline and writes the
 * responses, until the connection has a reason to close.
 */
export class HttpConnection {
  readonly id: string;

  private currentState: ConnectionState = 'awaiting-request';
  private readonly channel: SocketChannel;
  private readonly buffer = new RawBuffer();
  private readonly parser: RequestParser;
  private readonly options: ConnectionOptions;
  private readonly pipeline: Pipeline;
  private readonly remoteAddress: string | undefined;
  private readonly signal: AbortSignal | undefined;
  private requests = 0;
  /** When the first byte of the request being assembled arrived. */
  private assemblyStartedAt: number | undefined;
  private running = false;

  constructor(socket: Duplex, init: HttpConnectionInit) {
    this.id = init.connectionId ?? randomUUID();
    this.channel = new SocketChannel(socket);
    this.options = init.options ?? config.connection;
    this.parser = new RequestParser(this.options);
    this.pipeline = init.pipeline;
    this.remoteAddress = init.remoteAddress;
    this.signal = init.signal;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Runs the connection to completion. Never rejects. */
  async run(): Promise<ConnectionSummary> {
    if (this.running) throw new Error(`Connection ${this.id} is already running`);
    this.running = true;

    const onAbort = (): void => {
      this.channel.destroy();
    };
    this.signal?.addEventListener('abort', onAbort, { once: true });

    let reason: CloseReason;
    try {
      reason = await this.loop();
    } catch (error) {
      logError('Connection failed', toError(error));
      reason = 'io-error';
    }

    this.currentState = 'closing';
    try {
      await this.close(reason);
    } finally {
      this.signal?.removeEventListener('abort', onAbort);
      this.parser.reset();
      this.buffer.dispose();
    }

    const summary: ConnectionSummary = {
      connectionId: this.id,
      requests: this.requests,
      reason,
      bytesWritten: this.channel.bytesWritten,
    };
    logDebug('Connection closed', { ...summary });
    return summary;
  }

  /** Half-closes unless the socket is already unusable or the close was forced. */
  private async close(reason: CloseReason): Promise<void> {
    if (!GRACEFUL_CLOSE.has(reason)) {
      this.channel.destroy();
      return;
    }
    await this.channel.shutdown(this.options.closeLingerMs);
  }

  private async loop(): Promise<CloseReason> {
    for (;;) {
      if (this.signal?.aborted) return 'aborted';

      const outcome = this.parser.parse(this.buffer.view());

      if (outcome.kind === 'incomplete') {
        this.currentState =
          outcome.stage === 'body' ? 'parsing-body' : 'awaiting-request';
        const reason = await this.fill();
        if (reason) return reason;
        continue;
      }

      if (outcome.kind === 'malformed') {
        logDebug('Rejecting malformed request', {
          connectionId: this.id,
          status: outcome.status,
          reason: outcome.reason,
        });
        await this.writeBestEffort(errorResponse(outcome.status, outcome.reason));
        return 'malformed';
      }

      const reason = await this.serve(outcome.request, outcome.bytesConsumed);
      if (reason) return reason;
      this.currentState = 'awaiting-request';
    }
  }

  /** Reads more bytes. Returns a close reason when reading cannot continue. */
  private async fill(): Promise<CloseReason | null> {
    const assembling = !this.buffer.isEmpty();
    if (assembling) this.assemblyStartedAt ??= Date.now();

    const timeoutMs = assembling
      ? Math.max(
          0,
          (this.assemblyStartedAt ?? Date.now()) +
            this.options.headersTimeoutMs -
            Date.now()
        )
      : this.options.idleTimeoutMs;

    const result = await this.channel.read({ timeoutMs, signal: this.signal });
    switch (result.kind) {
      case 'data':
        this.buffer.append(result.chunk);
        return null;
      case 'eof':
        if (assembling) {
          logDebug('Peer closed with a partial request buffered', {
            connectionId: this.id,
            buffered: this.buffer.length,
          });
        }
        return 'peer-closed';
      case 'timeout':
        if (!assembling) return 'idle-timeout';
        await this.writeBestEffort(errorResponse(408));
        return 'request-timeout';
      case 'aborted':
        return 'aborted';
      case 'error':
        this.logIoError('Connection read failed', result.error);
        return 'io-error';
    }
  }

  private async serve(
    request: ParsedRequest,
    bytesConsumed: number
  ): Promise<CloseReason | null> {
    const release = this.buffer.lease();
    this.buffer.consume(bytesConsumed);
    this.assemblyStartedAt = undefined;
    this.requests += 1;

    try {
      this.currentState = 'dispatching';
      const context = createDispatchContext({
        connectionId: this.id,
        requestId: randomUUID(),
        requestIndex: this.requests,
        remoteAddress: this.remoteAddress,
      });
      const response = await this.pipeline.dispatch(request, context);

      if (this.signal?.aborted) {
        await serializeResponse(response).dispose();
        return 'aborted';
      }

      const closeReason = this.closeReasonFor(request, response);
      this.currentState = 'writing-response';
      const written = await this.writeResponse(response, {
        keepAlive: closeReason === null,
        requestVersion: request.version,
        headRequest: request.method === 'HEAD',
      });
      if (!written) return this.signal?.aborted ? 'aborted' : 'write-failed';
      return closeReason;
    } finally {
      release();
    }
  }

  private closeReasonFor(
    request: ParsedRequest,
    response: ResponseSpec
  ): CloseReason | null {
    if (!request.keepAlive) return 'connection-close';
    if (hasCloseToken(getHeader(response, 'connection'))) {
      return 'connection-close';
    }
    const max = this.options.maxRequestsPerConnection;
    if (max > 0 && this.requests >= max) return 'max-requests';
    return null;
  }

  private async writeResponse(
    response: ResponseSpec,
    options: SerializeOptions
  ): Promise<boolean> {
    const serialized = serializeResponse(response, options);
    try {
      await this.channel.write(serialized.head);
      if (serialized.body) {
        for await (const chunk of serialized.body) {
          await this.channel.write(chunk);
        }
      }
      return true;
    } catch (error) {
      this.logIoError('Response write failed', error);
      return false;
    } finally {
      try {
        await serialized.dispose();
      } catch (error) {
        logWarn('Failed to release response body', {
          connectionId: this.id,
          error: getErrorMessage(error),
        });
      }
    }
  }

  /** Error responses sent right before closing; failures only get logged. */
  private async writeBestEffort(response: ResponseSpec): Promise<void> {
    if (this.channel.isDestroyed) return;
    this.currentState = 'writing-response';
    await this.writeResponse(response, { keepAlive: false });
  }

  private logIoError(message: string, error: unknown): void {
    const meta = { connectionId: this.id, error: getErrorMessage(error) };
    if (isPeerGoneError(error)) {
      logDebug(message, meta);
      return;
    }
    logWarn(message, meta);
  }
}

function hasCloseToken(value: string | undefined): boolean {
  if (!value) return false;
  return value
    .split(',')
    .some((token) => token.trim().toLowerCase() === 'close');
}

export function serveConnection(
  socket: Duplex,
  init: HttpConnectionInit
): Promise<ConnectionSummary> {
  return new HttpConnection(socket, init).run();
}
