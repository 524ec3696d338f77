import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { RawBuffer } from '../src/http/raw-buffer.js';

function text(buffer: Buffer): string {
  return buffer.toString('latin1');
}

describe('RawBuffer', () => {
  it('keeps only the unconsumed tail', () => {
    const buffer = new RawBuffer(16);
    buffer.append(Buffer.from('hello world'));
    buffer.consume(6);
    assert.equal(text(buffer.view()), 'world');
    assert.equal(buffer.length, 5);
  });

  it('rejects consuming more than it holds', () => {
    const buffer = new RawBuffer(16);
    buffer.append(Buffer.from('abc'));
    assert.throws(() => buffer.consume(4), RangeError);
    assert.throws(() => buffer.consume(-1), RangeError);
    assert.throws(() => buffer.consume(1.5), RangeError);
  });

  it('compacts in place when nothing is leased', () => {
    const buffer = new RawBuffer(8);
    buffer.append(Buffer.from('abcdef'));
    buffer.consume(4);
    buffer.append(Buffer.from('ghij'));
    assert.equal(text(buffer.view()), 'efghij');
    assert.equal(buffer.capacity, 8);
  });

  it('never overwrites bytes under a lease', () => {
    const buffer = new RawBuffer(8);
    buffer.append(Buffer.from('abcdef'));
    const leasedView = buffer.view();
    const release = buffer.lease();

    buffer.consume(4);
    buffer.append(Buffer.from('ghij'));

    assert.equal(text(leasedView), 'abcdef');
    assert.equal(text(buffer.view()), 'efghij');
    assert.equal(buffer.capacity, 4096);
    release();
  });

  it('appends past a leased, fully consumed region', () => {
    const buffer = new RawBuffer(16);
    buffer.append(Buffer.from('abcd'));
    const leasedView = buffer.view();
    const release = buffer.lease();

    buffer.consume(4);
    buffer.append(Buffer.from('wxyz'));

    assert.equal(text(leasedView), 'abcd');
    assert.equal(text(buffer.view()), 'wxyz');
    release();
  });

  it('releases leases idempotently', () => {
    const buffer = new RawBuffer(16);
    const first = buffer.lease();
    const second = buffer.lease();
    first();
    first();
    assert.equal(buffer.leased, true);
    second();
    assert.equal(buffer.leased, false);
  });

  it('reuses memory from the start once empty and unleased', () => {
    const buffer = new RawBuffer(8);
    buffer.append(Buffer.from('abcdef'));
    const release = buffer.lease();
    buffer.consume(6);
    release();

    buffer.append(Buffer.from('12345678'));
    assert.equal(text(buffer.view()), '12345678');
    assert.equal(buffer.capacity, 8);
  });
});
