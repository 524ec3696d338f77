import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  getErrorMessage,
  HttpError,
  isHttpError,
  isPeerGoneError,
  isSystemError,
  toError,
} from '../src/errors.js';

function systemError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(code), { code });
}

describe('HttpError', () => {
  it('defaults to a 500 with a derived code', () => {
    const error = new HttpError('boom');
    assert.equal(error.name, 'HttpError');
    assert.equal(error.statusCode, 500);
    assert.equal(error.code, 'HTTP_500');
    assert.deepEqual(error.details, {});
    assert.equal(isHttpError(error), true);
  });

  it('keeps status, code and frozen details', () => {
    const error = new HttpError('bad field', 422, 'BAD_FIELD', { field: 'name' });
    assert.equal(error.statusCode, 422);
    assert.equal(error.code, 'BAD_FIELD');
    assert.deepEqual(error.details, { field: 'name' });
    assert.equal(Object.isFrozen(error.details), true);
  });

  it('is not confused with plain errors', () => {
    assert.equal(isHttpError(new Error('plain')), false);
  });
});

describe('getErrorMessage', () => {
  it('reads messages from errors, strings and message-bearing objects', () => {
    assert.equal(getErrorMessage(new Error('x')), 'x');
    assert.equal(getErrorMessage('plain'), 'plain');
    assert.equal(getErrorMessage({ message: 'from object' }), 'from object');
  });

  it('falls back for empty values', () => {
    assert.equal(getErrorMessage(null), 'Unknown error');
    assert.equal(getErrorMessage(undefined), 'Unknown error');
    assert.equal(getErrorMessage(42), '42');
  });
});

describe('toError', () => {
  it('wraps non-errors and passes errors through', () => {
    const original = new Error('same');
    assert.equal(toError(original), original);

    const wrapped = toError('text');
    assert.ok(wrapped instanceof Error);
    assert.equal(wrapped.message, 'text');
  });
});

describe('isPeerGoneError', () => {
  it('recognises resets and broken pipes', () => {
    assert.equal(isPeerGoneError(systemError('ECONNRESET')), true);
    assert.equal(isPeerGoneError(systemError('EPIPE')), true);
  });

  it('ignores other failures', () => {
    assert.equal(isSystemError(systemError('EACCES')), true);
    assert.equal(isPeerGoneError(systemError('EACCES')), false);
    assert.equal(isPeerGoneError(new Error('plain')), false);
  });
});
