const DEFAULT_INITIAL_CAPACITY = 4 * 1024;
const EMPTY = Buffer.alloc(0);

/**
 * Per-connection receive buffer holding the unconsumed tail of the byte
 * stream.
 *
 * Bytes that a lease holder may still be viewing are never overwritten:
 * appends only write past the live tail, and compaction or growth moves the
 * tail into fresh memory while any lease is outstanding. With no lease held
 * the tail is compacted in place.
 */
export class RawBuffer {
  private data: Buffer;
  private start = 0;
  private end = 0;
  private leases = 0;

  constructor(initialCapacity = DEFAULT_INITIAL_CAPACITY) {
    this.data = Buffer.allocUnsafe(initialCapacity);
  }

  get length(): number {
    return this.end - this.start;
  }

  get capacity(): number {
    return this.data.length;
  }

  get leased(): boolean {
    return this.leases > 0;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /** Zero-copy view of the unconsumed tail. */
  view(): Buffer {
    return this.data.subarray(this.start, this.end);
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    if (this.end + chunk.length > this.data.length) {
      this.makeRoom(chunk.length);
    }
    this.data.set(chunk, this.end);
    this.end += chunk.length;
  }

  /** Drops `count` leading bytes; they are never parsed again. */
  consume(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this.length) {
      throw new RangeError(
        `Cannot consume ${count} bytes from a buffer holding ${this.length}`
      );
    }
    this.start += count;
    if (this.start === this.end && this.leases === 0) {
      this.start = 0;
      this.end = 0;
    }
  }

  /**
   * Pins the current memory. Returns an idempotent release function.
   */
  lease(): () => void {
    this.leases += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.leases -= 1;
      if (this.leases === 0 && this.start === this.end) {
        this.start = 0;
        this.end = 0;
      }
    };
  }

  /** Releases the memory. Outstanding views keep their own reference. */
  dispose(): void {
    this.data = EMPTY;
    this.start = 0;
    this.end = 0;
    this.leases = 0;
  }

  private makeRoom(incoming: number): void {
    const needed = this.length + incoming;

    if (this.leases === 0 && needed <= this.data.length) {
      this.data.copyWithin(0, this.start, this.end);
      this.end = this.length;
      this.start = 0;
      return;
    }

    let capacity = Math.max(this.data.length, DEFAULT_INITIAL_CAPACITY);
    while (capacity < needed) capacity *= 2;

    const next = Buffer.allocUnsafe(capacity);
    this.data.copy(next, 0, this.start, this.end);
    this.end = this.length;
    this.start = 0;
    this.data = next;
  }
}
