import { parseArgs } from 'node:util';

import { getErrorMessage } from './errors.js';

export interface CliValues {
  readonly host: string | undefined;
  readonly port: number | undefined;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Minimal HTTP/1.1 server',
  '',
  'Usage:',
  '  wirehttp [--host|-H <host>] [--port|-p <port>] [--help|-h] [--version|-v]',
  '',
  'Options:',
  '  --host, -H    Interface to bind (default: HOST or 127.0.0.1).',
  '  --port, -p    Port to listen on (default: PORT or 8080).',
  '  --help, -h    Show this help message.',
  '  --version, -v Show server version.',
  '',
] as const;

const optionSchema = {
  host: { type: 'string', short: 'H' },
  port: { type: 'string', short: 'p' },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

const PORT_PATTERN = /^\d{1,5}$/;
const MAX_PORT = 65_535;

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const port = PORT_PATTERN.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isInteger(port) || port > MAX_PORT) {
    throw new Error(`Invalid port: ${raw}`);
  }
  return port;
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: false,
    });

    const host = values.host?.trim();
    if (host === '') throw new Error('Host must not be empty');

    return {
      ok: true,
      values: {
        host,
        port: parsePort(values.port),
        help: values.help,
        version: values.version,
      },
    };
  } catch (error: unknown) {
    return {
      ok: false,
      message: getErrorMessage(error),
    };
  }
}
