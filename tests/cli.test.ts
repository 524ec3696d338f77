import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { type CliValues, parseCliArgs, renderCliUsage } from '../src/cli.js';

function assertParseSuccess(args: readonly string[]): CliValues {
  const result = parseCliArgs(args);
  if (!result.ok)
    throw new Error(`Expected parse success, got: ${result.message}`);
  return result.values;
}

function assertParseError(args: readonly string[]): string {
  const result = parseCliArgs(args);
  assert.equal(result.ok, false);
  if (result.ok) {
    throw new Error('Expected parse error but parsing succeeded');
  }
  return result.message;
}

describe('parseCliArgs', () => {
  it('parses long-form flags', () => {
    assert.deepEqual(assertParseSuccess(['--host', '0.0.0.0', '--port', '9000']), {
      host: '0.0.0.0',
      port: 9000,
      help: false,
      version: false,
    });
  });

  it('parses short-form aliases', () => {
    assert.deepEqual(assertParseSuccess(['-H', 'localhost', '-p', '0']), {
      host: 'localhost',
      port: 0,
      help: false,
      version: false,
    });
    assert.deepEqual(assertParseSuccess(['-h']), {
      host: undefined,
      port: undefined,
      help: true,
      version: false,
    });
    assert.deepEqual(assertParseSuccess(['-v']), {
      host: undefined,
      port: undefined,
      help: false,
      version: true,
    });
  });

  it('rejects ports outside 0-65535', () => {
    assert.equal(assertParseError(['--port', '70000']), 'Invalid port: 70000');
    assert.equal(assertParseError(['--port', 'http']), 'Invalid port: http');
  });

  it('rejects an empty host', () => {
    assert.equal(assertParseError(['--host', ' ']), 'Host must not be empty');
  });

  it('rejects unknown options', () => {
    const message = assertParseError(['--unknown']);
    assert.match(message, /unknown option/i);
  });

  it('rejects positional arguments', () => {
    const message = assertParseError(['serve']);
    assert.match(message, /unexpected argument|positionals/i);
  });
});

describe('renderCliUsage', () => {
  it('includes short and long options', () => {
    const usage = renderCliUsage();
    assert.match(usage, /--host\|-H/);
    assert.match(usage, /--port\|-p/);
    assert.match(usage, /--help\|-h/);
    assert.match(usage, /--version\|-v/);
  });
});
