import { readFileSync } from 'node:fs';
import process from 'node:process';

const packageJson: unknown = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8')
);

function readPackageVersion(value: unknown): string {
  if (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  ) {
    return value.version;
  }
  throw new Error('package.json version is missing');
}

export const serverVersion: string = readPackageVersion(packageJson);

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const { env } = process;

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (!envValue) return defaultValue;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (min !== undefined && parsed < min) return defaultValue;
  if (max !== undefined && parsed > max) return defaultValue;
  return parsed;
}

function parseOptionalInteger(
  envValue: string | undefined,
  min: number
): number | undefined {
  const parsed = parseInteger(envValue, Number.NaN, min);
  return Number.isNaN(parsed) ? undefined : parsed;
}

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.trim().toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

export function parsePort(envValue: string | undefined): number {
  if (envValue?.trim() === '0') return 0;
  return parseInteger(envValue, 8080, 1, 65535);
}

const DEFAULT_USER_AGENT = `page-analyzer/${serverVersion}`;
const DEFAULT_MAX_CONTENT_LENGTH = 10 * 1024 * 1024;

export const config = {
  server: {
    name: 'page-analyzer',
    version: serverVersion,
    host: (env.HOST ?? '127.0.0.1').trim(),
    port: parsePort(env.PORT),
    shutdownTimeoutMs: parseInteger(env.SHUTDOWN_TIMEOUT_MS, 10000, 0),
    http: {
      headersTimeoutMs: parseOptionalInteger(env.HTTP_HEADERS_TIMEOUT_MS, 1),
      requestTimeoutMs: parseOptionalInteger(env.HTTP_REQUEST_TIMEOUT_MS, 0),
      keepAliveTimeoutMs: parseOptionalInteger(
        env.HTTP_KEEP_ALIVE_TIMEOUT_MS,
        0
      ),
    },
  },
  fetcher: {
    timeout: parseInteger(env.FETCH_TIMEOUT_MS, 5000, 1000, 60000),
    maxRedirects: parseInteger(env.MAX_REDIRECTS, 10, 0, 20),
    maxContentLength: parseInteger(
      env.MAX_CONTENT_LENGTH,
      DEFAULT_MAX_CONTENT_LENGTH,
      1
    ),
    userAgent: env.USER_AGENT ?? DEFAULT_USER_AGENT,
  },
  analysis: {
    timeoutMs: parseInteger(env.ANALYSIS_TIMEOUT_MS, 60000, 1000),
    probeConcurrency: parseInteger(env.PROBE_CONCURRENCY, 10, 1, 100),
  },
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
  constants: {
    maxUrlLength: 2048,
  },
};
