import type { Server } from 'node:http';

import { config } from './config.js';
import { logDebug } from './observability.js';

interface HttpTimeouts {
  readonly headersTimeoutMs: number | undefined;
  readonly requestTimeoutMs: number | undefined;
  readonly keepAliveTimeoutMs: number | undefined;
}

function setIfDefined<T>(
  value: T | undefined,
  setter: (resolved: T) => void
): void {
  if (value === undefined) return;
  setter(value);
}

export function applyHttpServerTuning(
  server: Server,
  timeouts: HttpTimeouts = config.server.http
): void {
  setIfDefined(timeouts.headersTimeoutMs, (value) => {
    server.headersTimeout = value;
  });
  setIfDefined(timeouts.requestTimeoutMs, (value) => {
    server.requestTimeout = value;
  });
  setIfDefined(timeouts.keepAliveTimeoutMs, (value) => {
    server.keepAliveTimeout = value;
  });
}

export function drainConnectionsOnShutdown(server: Server): void {
  server.closeIdleConnections();
  logDebug('Closed idle HTTP connections during shutdown');
}
