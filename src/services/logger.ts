import process from 'node:process';
import { inspect } from 'node:util';

import { config } from '../config/index.js';
import type { LogLevel, LogMetadata } from '../config/types.js';

import { getConnectionId, getRequestId } from './context.js';

function contextMetadata(): LogMetadata {
  const connectionId = getConnectionId();
  const requestId = getRequestId();

  const meta: LogMetadata = {};
  if (connectionId) meta.connectionId = connectionId;
  if (requestId) meta.requestId = requestId;
  return meta;
}

function mergeMetadata(meta?: LogMetadata): LogMetadata {
  return { ...contextMetadata(), ...meta };
}

function formatMetadata(meta: LogMetadata): string {
  if (Object.keys(meta).length === 0) return '';
  return ` ${inspect(meta, { breakLength: Infinity, colors: false, compact: true, sorted: true })}`;
}

function createTimestamp(): string {
  return new Date().toISOString();
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  const merged = mergeMetadata(meta);
  if (config.logging.format === 'json') {
    return JSON.stringify({
      timestamp: createTimestamp(),
      level: level.toUpperCase(),
      message,
      ...merged,
    });
  }
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(merged)}`;
}

function shouldLog(level: LogLevel): boolean {
  if (!config.logging.enabled) return false;
  if (level === 'debug') return config.logging.level === 'debug';
  if (level === 'info') {
    return config.logging.level === 'debug' || config.logging.level === 'info';
  }
  if (level === 'warn') return config.logging.level !== 'error';
  return true;
}

function write(level: LogLevel, message: string, meta?: LogMetadata): void {
  process.stderr.write(`${formatLogEntry(level, message, meta)}\n`);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  if (shouldLog('info')) write('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  if (shouldLog('debug')) write('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  if (shouldLog('warn')) write('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  if (!shouldLog('error')) return;

  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});

  write('error', message, errorMeta);
}
