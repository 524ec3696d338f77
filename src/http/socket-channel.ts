import type { Duplex } from 'node:stream';

import { toError } from '../errors.js';

export type ReadResult =
  | { readonly kind: 'data'; readonly chunk: Buffer }
  | { readonly kind: 'eof' }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'aborted' }
  | { readonly kind: 'error'; readonly error: Error };

export interface ReadOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
}

type Reader = (result: ReadResult) => void;

function toChunk(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (typeof data === 'string') return Buffer.from(data, 'latin1');
  if (data instanceof Uint8Array) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  throw new TypeError('Socket produced a non-binary chunk');
}

/**
 * Promise-based reads and writes over a duplex stream. The stream stays
 * paused unless a read is pending, so bytes are pulled only when the
 * connection asks for them.
 */
export class SocketChannel {
  private readonly pending: Buffer[] = [];
  private reader: Reader | null = null;
  private ended = false;
  private failure: Error | null = null;
  private destroyed = false;
  private closed = false;
  /** Input is discarded once the connection is shutting down. */
  private draining = false;
  private onClosed: (() => void) | null = null;
  private written = 0;

  constructor(private readonly socket: Duplex) {
    socket.on('data', (data: unknown) => {
      if (this.draining) return;
      socket.pause();
      this.deliver({ kind: 'data', chunk: toChunk(data) });
    });
    socket.on('end', () => {
      this.ended = true;
      this.deliver({ kind: 'eof' });
    });
    socket.on('close', () => {
      this.ended = true;
      this.closed = true;
      this.onClosed?.();
      this.deliver({ kind: 'eof' });
    });
    socket.on('error', (error: unknown) => {
      this.failure = toError(error);
      this.deliver({ kind: 'error', error: this.failure });
    });
    socket.pause();
  }

  get bytesWritten(): number {
    return this.written;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  read(options: ReadOptions): Promise<ReadResult> {
    const buffered = this.pending.shift();
    if (buffered) return Promise.resolve({ kind: 'data', chunk: buffered });
    if (this.failure) {
      return Promise.resolve({ kind: 'error', error: this.failure });
    }
    if (this.ended) return Promise.resolve({ kind: 'eof' });
    if (this.destroyed || options.signal?.aborted) {
      return Promise.resolve({ kind: 'aborted' });
    }
    if (this.reader) {
      return Promise.reject(new Error('A read is already pending'));
    }

    return new Promise<ReadResult>((resolve) => {
      const { signal } = options;

      const onAbort = (): void => {
        settle({ kind: 'aborted' });
      };
      const timer = setTimeout(() => {
        settle({ kind: 'timeout' });
      }, options.timeoutMs);

      const settle: Reader = (result) => {
        if (this.reader !== settle) return;
        this.reader = null;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (result.kind !== 'data') this.socket.pause();
        resolve(result);
      };

      this.reader = settle;
      signal?.addEventListener('abort', onAbort, { once: true });
      this.socket.resume();
    });
  }

  write(data: Buffer): Promise<void> {
    if (this.destroyed) {
      return Promise.reject(new Error('Cannot write to a destroyed connection'));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        this.written += data.length;
        resolve();
      });
    });
  }

  /**
   * Graceful close: ends the write side once queued writes flush, then
   * discards input until the peer closes too or `lingerMs` passes. Unread
   * input left on a destroyed socket makes the kernel answer with a reset.
   */
  async shutdown(lingerMs: number): Promise<void> {
    if (this.destroyed) return;
    this.draining = true;
    this.pending.length = 0;

    if (!this.closed) {
      await new Promise<void>((resolve) => {
        let timer: NodeJS.Timeout | undefined;
        const done = (): void => {
          clearTimeout(timer);
          this.onClosed = null;
          resolve();
        };
        timer = setTimeout(done, lingerMs);
        this.onClosed = done;
        this.socket.end();
        this.socket.resume();
      });
    }
    this.destroy();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.reader?.({ kind: 'aborted' });
    this.onClosed?.();
    this.socket.destroy();
  }

  private deliver(result: ReadResult): void {
    if (this.reader) {
      this.reader(result);
      return;
    }
    if (result.kind === 'data') this.pending.push(result.chunk);
  }
}
