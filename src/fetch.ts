import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import os from 'node:os';
import { performance } from 'node:perf_hooks';

import type { Dispatcher } from 'undici';
import { Agent } from 'undici';

import { config } from './config.js';
import { FetchError, getErrorMessage, isSystemError } from './errors.js';
import {
  getOperationId,
  getRequestId,
  logDebug,
  logWarn,
  redactUrl,
} from './observability.js';
import { isAbortError, isTimeoutError } from './type-guards.js';

/* -------------------------------------------------------------------------------------------------
 * Public types
 * ------------------------------------------------------------------------------------------------- */

export type HttpMethod = 'GET' | 'HEAD';

export interface WebPage {
  readonly body: Uint8Array;
  readonly status: number;
  /** Final URL after redirects. */
  readonly url: string;
}

/**
 * Outbound HTTP capability. Any HTTP response resolves, whatever its status;
 * transport failures, timeouts, cancellation and oversized bodies reject with
 * `FetchError`.
 */
export interface WebClient {
  fetch(signal: AbortSignal, url: string, method: HttpMethod): Promise<WebPage>;
}

export interface WebClientOptions {
  readonly timeoutMs?: number;
  readonly maxRedirects?: number;
  readonly maxContentLength?: number;
  readonly userAgent?: string;
  readonly dispatcher?: Dispatcher;
}

/* -------------------------------------------------------------------------------------------------
 * Dispatcher / Agent lifecycle
 * ------------------------------------------------------------------------------------------------- */

function getAgentOptions(): ConstructorParameters<typeof Agent>[0] {
  const cpuCount = os.availableParallelism();
  return {
    keepAliveTimeout: 60000,
    connections: Math.max(cpuCount * 2, 25),
    pipelining: 1,
  };
}

export const dispatcher: Dispatcher = new Agent(getAgentOptions());

export async function closeAgents(): Promise<void> {
  await dispatcher.close();
}

/* -------------------------------------------------------------------------------------------------
 * Fetch error mapping
 * ------------------------------------------------------------------------------------------------- */

class FetchErrorFactory {
  canceled(url: string): FetchError {
    return new FetchError('Request was canceled', url, 499, {
      reason: 'aborted',
    });
  }

  timeout(url: string, timeoutMs: number): FetchError {
    return new FetchError(`Request timeout after ${timeoutMs}ms`, url, 504, {
      timeout: timeoutMs,
    });
  }

  tooManyRedirects(url: string): FetchError {
    return new FetchError('Too many redirects', url);
  }

  missingRedirectLocation(url: string): FetchError {
    return new FetchError('Redirect response missing Location header', url);
  }

  invalidRedirectTarget(url: string, location: string): FetchError {
    return new FetchError('Invalid redirect target', url, undefined, {
      location,
    });
  }

  sizeLimit(url: string, maxBytes: number): FetchError {
    return new FetchError(
      `Response exceeds maximum size of ${maxBytes} bytes`,
      url,
      undefined,
      { maxBytes }
    );
  }

  network(url: string, message: string, code?: string): FetchError {
    return new FetchError(
      `Network error: Could not reach ${redactUrl(url)}`,
      url,
      undefined,
      { message, ...(code ? { code } : {}) }
    );
  }
}

const fetchErrors = new FetchErrorFactory();

function networkErrorCode(error: Error): string | undefined {
  if (isSystemError(error)) return error.code;
  return isSystemError(error.cause) ? error.cause.code : undefined;
}

function mapFetchError(
  error: unknown,
  url: string,
  timeoutMs: number,
  callerSignal: AbortSignal
): FetchError {
  if (error instanceof FetchError) return error;

  if (callerSignal.aborted) return fetchErrors.canceled(url);
  if (isTimeoutError(error)) return fetchErrors.timeout(url, timeoutMs);
  if (isAbortError(error)) return fetchErrors.canceled(url);

  if (error instanceof Error) {
    return fetchErrors.network(url, error.message, networkErrorCode(error));
  }
  return fetchErrors.network(url, getErrorMessage(error));
}

/* -------------------------------------------------------------------------------------------------
 * Telemetry (diagnostics channel + logging)
 * ------------------------------------------------------------------------------------------------- */

interface CorrelationFields {
  contextRequestId?: string;
  operationId?: string;
}

type FetchChannelEvent =
  | ({
      v: 1;
      type: 'start';
      requestId: string;
      method: string;
      url: string;
    } & CorrelationFields)
  | ({
      v: 1;
      type: 'end';
      requestId: string;
      status: number;
      duration: number;
    } & CorrelationFields)
  | ({
      v: 1;
      type: 'error';
      requestId: string;
      url: string;
      error: string;
      code?: string;
      status?: number;
      duration: number;
    } & CorrelationFields);

const fetchChannel = diagnosticsChannel.channel('page-analyzer.fetch');

export interface FetchTelemetryContext {
  requestId: string;
  startTime: number;
  url: string;
  method: HttpMethod;
  correlation: CorrelationFields;
}

const SLOW_REQUEST_THRESHOLD_MS = 5000;

function currentCorrelation(): CorrelationFields {
  const contextRequestId = getRequestId();
  const operationId = getOperationId();
  return {
    ...(contextRequestId ? { contextRequestId } : {}),
    ...(operationId ? { operationId } : {}),
  };
}

class FetchTelemetry {
  start(url: string, method: HttpMethod): FetchTelemetryContext {
    const ctx: FetchTelemetryContext = {
      requestId: randomUUID(),
      startTime: performance.now(),
      url: redactUrl(url),
      method,
      correlation: currentCorrelation(),
    };

    this.publish({
      v: 1,
      type: 'start',
      requestId: ctx.requestId,
      method: ctx.method,
      url: ctx.url,
      ...ctx.correlation,
    });
    logDebug('HTTP Request', {
      requestId: ctx.requestId,
      method: ctx.method,
      url: ctx.url,
    });

    return ctx;
  }

  recordResponse(
    context: FetchTelemetryContext,
    response: Response,
    size: number
  ): void {
    const duration = performance.now() - context.startTime;
    const durationLabel = `${Math.round(duration)}ms`;

    this.publish({
      v: 1,
      type: 'end',
      requestId: context.requestId,
      status: response.status,
      duration,
      ...context.correlation,
    });

    const contentType = response.headers.get('content-type') ?? undefined;
    logDebug('HTTP Response', {
      requestId: context.requestId,
      method: context.method,
      status: response.status,
      url: context.url,
      duration: durationLabel,
      size,
      ...(contentType ? { contentType } : {}),
    });

    if (duration > SLOW_REQUEST_THRESHOLD_MS) {
      logWarn('Slow HTTP request detected', {
        requestId: context.requestId,
        url: context.url,
        duration: durationLabel,
      });
    }
  }

  recordError(context: FetchTelemetryContext, error: FetchError): void {
    const duration = performance.now() - context.startTime;
    const code =
      typeof error.details['code'] === 'string'
        ? error.details['code']
        : undefined;

    this.publish({
      v: 1,
      type: 'error',
      requestId: context.requestId,
      url: context.url,
      error: error.message,
      duration,
      ...(code !== undefined ? { code } : {}),
      ...(error.httpStatus !== undefined ? { status: error.httpStatus } : {}),
      ...context.correlation,
    });

    // Cancellation is the normal end of a probe whose pool was stopped.
    const log = error.httpStatus === 499 ? logDebug : logWarn;
    log('HTTP Request Error', {
      requestId: context.requestId,
      method: context.method,
      url: context.url,
      status: error.httpStatus,
      code,
      error: error.message,
    });
  }

  private publish(event: FetchChannelEvent): void {
    if (!fetchChannel.hasSubscribers) return;
    try {
      fetchChannel.publish(event);
    } catch {
      // Subscriber failures must not reach the request path.
    }
  }
}

const telemetry = new FetchTelemetry();

/* -------------------------------------------------------------------------------------------------
 * Redirect handling
 * ------------------------------------------------------------------------------------------------- */

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function cancelResponseBody(response: Response): void {
  response.body?.cancel().catch((error: unknown) => {
    logDebug('Response body cancel failed', { error: getErrorMessage(error) });
  });
}

type RequestOptions = RequestInit & { dispatcher: Dispatcher };

class RedirectFollower {
  constructor(private readonly maxRedirects: number) {}

  async follow(
    url: string,
    init: RequestOptions
  ): Promise<{ response: Response; url: string }> {
    let currentUrl = url;

    for (let redirects = 0; ; redirects += 1) {
      const response = await fetch(currentUrl, {
        ...init,
        redirect: 'manual',
      });
      if (!REDIRECT_STATUSES.has(response.status)) {
        return { response, url: currentUrl };
      }

      cancelResponseBody(response);
      if (redirects >= this.maxRedirects) {
        throw fetchErrors.tooManyRedirects(currentUrl);
      }
      currentUrl = this.resolveTarget(response, currentUrl);
    }
  }

  private resolveTarget(response: Response, currentUrl: string): string {
    const location = response.headers.get('location');
    if (!location) throw fetchErrors.missingRedirectLocation(currentUrl);

    if (!URL.canParse(location, currentUrl)) {
      throw fetchErrors.invalidRedirectTarget(currentUrl, location);
    }
    const target = new URL(location, currentUrl);
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      throw fetchErrors.invalidRedirectTarget(currentUrl, location);
    }
    return target.href;
  }
}

/* -------------------------------------------------------------------------------------------------
 * Response reading (max size + abort-aware streaming)
 * ------------------------------------------------------------------------------------------------- */

function assertContentLengthWithinLimit(
  response: Response,
  url: string,
  maxBytes: number
): void {
  const header = response.headers.get('content-length');
  if (!header) return;

  const contentLength = Number.parseInt(header, 10);
  if (Number.isNaN(contentLength) || contentLength <= maxBytes) return;

  cancelResponseBody(response);
  throw fetchErrors.sizeLimit(url, maxBytes);
}

async function cancelReader(
  reader: ReadableStreamDefaultReader<Uint8Array>
): Promise<void> {
  try {
    await reader.cancel();
  } catch (error: unknown) {
    logDebug('Response reader cancel failed', {
      error: getErrorMessage(error),
    });
  }
}

async function readStreamWithLimit(
  stream: ReadableStream<Uint8Array>,
  url: string,
  maxBytes: number,
  signal: AbortSignal
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;

  const reader = stream.getReader();
  try {
    signal.throwIfAborted();
    let result = await reader.read();
    while (!result.done) {
      total += result.value.byteLength;
      if (total > maxBytes) throw fetchErrors.sizeLimit(url, maxBytes);
      chunks.push(result.value);

      signal.throwIfAborted();
      result = await reader.read();
    }
  } catch (error: unknown) {
    await cancelReader(reader);
    throw error;
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(chunks, total);
}

async function readBody(
  response: Response,
  url: string,
  maxBytes: number,
  signal: AbortSignal
): Promise<Uint8Array> {
  assertContentLengthWithinLimit(response, url, maxBytes);
  if (!response.body) return new Uint8Array(0);
  return readStreamWithLimit(response.body, url, maxBytes, signal);
}

/* -------------------------------------------------------------------------------------------------
 * HTTP web client
 * ------------------------------------------------------------------------------------------------- */

const ACCEPT_HEADER =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8';

export class HttpWebClient implements WebClient {
  private readonly timeoutMs: number;
  private readonly maxContentLength: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly dispatcher: Dispatcher;
  private readonly redirects: RedirectFollower;

  constructor(options: WebClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.fetcher.timeout;
    this.maxContentLength =
      options.maxContentLength ?? config.fetcher.maxContentLength;
    this.dispatcher = options.dispatcher ?? dispatcher;
    this.redirects = new RedirectFollower(
      Math.max(0, options.maxRedirects ?? config.fetcher.maxRedirects)
    );
    this.headers = {
      'User-Agent': options.userAgent ?? config.fetcher.userAgent,
      Accept: ACCEPT_HEADER,
      'Accept-Language': 'en-US,en;q=0.5',
      'Accept-Encoding': 'gzip, deflate, br',
      Connection: 'keep-alive',
    };
  }

  async fetch(
    signal: AbortSignal,
    url: string,
    method: HttpMethod
  ): Promise<WebPage> {
    const requestSignal = AbortSignal.any([
      signal,
      AbortSignal.timeout(this.timeoutMs),
    ]);
    const init: RequestOptions = {
      method,
      headers: { ...this.headers },
      signal: requestSignal,
      dispatcher: this.dispatcher,
    };

    const ctx = telemetry.start(url, method);
    try {
      const { response, url: finalUrl } = await this.redirects.follow(
        url,
        init
      );
      ctx.url = redactUrl(finalUrl);

      let body: Uint8Array;
      if (method === 'HEAD') {
        cancelResponseBody(response);
        body = new Uint8Array(0);
      } else {
        body = await readBody(
          response,
          finalUrl,
          this.maxContentLength,
          requestSignal
        );
      }

      telemetry.recordResponse(ctx, response, body.byteLength);
      return { body, status: response.status, url: finalUrl };
    } catch (error: unknown) {
      const mapped = mapFetchError(error, url, this.timeoutMs, signal);
      telemetry.recordError(ctx, mapped);
      throw mapped;
    }
  }
}
