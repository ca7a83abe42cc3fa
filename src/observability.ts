import { AsyncLocalStorage } from 'node:async_hooks';
import process from 'node:process';
import { inspect, stripVTControlCharacters } from 'node:util';

import { config, type LogLevel } from './config.js';

export type LogMetadata = Record<string, unknown>;

interface RequestContext {
  readonly requestId: string;
  readonly operationId?: string;
}

const requestContext = new AsyncLocalStorage<RequestContext>();
let stderrAvailable = true;

process.stderr.on('error', () => {
  stderrAvailable = false;
});

export function runWithRequestContext<T>(
  context: RequestContext,
  fn: () => T
): T {
  return requestContext.run(context, fn);
}

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}

export function getOperationId(): string | undefined {
  return requestContext.getStore()?.operationId;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.logging.level];
}

function buildContextMetadata(): LogMetadata | undefined {
  const ctx = requestContext.getStore();
  if (!ctx) return undefined;

  const meta: LogMetadata = { requestId: ctx.requestId };
  if (ctx.operationId && ctx.operationId !== ctx.requestId) {
    meta['operationId'] = ctx.operationId;
  }
  return meta;
}

function mergeMetadata(meta?: LogMetadata): LogMetadata | undefined {
  const contextMeta = buildContextMetadata();
  const hasMeta = meta !== undefined && Object.keys(meta).length > 0;

  if (!contextMeta && !hasMeta) return undefined;
  if (!contextMeta) return meta;
  if (!hasMeta) return contextMeta;

  return { ...contextMeta, ...meta };
}

function formatMetadata(meta?: LogMetadata): string {
  const merged = mergeMetadata(meta);
  if (!merged) return '';

  return ` ${inspect(merged, { breakLength: Infinity, colors: false, compact: true, sorted: true })}`;
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  const timestamp = new Date().toISOString();
  if (config.logging.format === 'json') {
    return JSON.stringify({
      timestamp,
      level: level.toUpperCase(),
      message,
      ...mergeMetadata(meta),
    });
  }
  return `[${timestamp}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

function safeWriteStderr(line: string): void {
  if (!stderrAvailable) return;
  if (process.stderr.destroyed || process.stderr.writableEnded) {
    stderrAvailable = false;
    return;
  }
  try {
    process.stderr.write(line);
  } catch {
    // EPIPE and friends: stop writing, keep running.
    stderrAvailable = false;
  }
}

function writeLog(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!shouldLog(level)) return;
  const line = formatLogEntry(level, message, meta);
  safeWriteStderr(`${stripVTControlCharacters(line)}\n`);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  writeLog('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  writeLog('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  writeLog('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  writeLog('error', message, errorMeta);
}

export function redactUrl(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    url.username = '';
    url.password = '';
    url.hash = '';
    url.search = '';
    return url.toString();
  } catch {
    return rawUrl;
  }
}
