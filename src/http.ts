import { randomUUID } from 'node:crypto';
import { once } from 'node:events';
import type { Server } from 'node:http';
import process from 'node:process';

import type {
  Express,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from 'express';
import { z } from 'zod';

import type { Analyzer } from './analyzer.js';
import { config } from './config.js';
import { AppError, getErrorMessage, ValidationError } from './errors.js';
import { closeAgents } from './fetch.js';
import {
  logDebug,
  logError,
  logInfo,
  logWarn,
  redactUrl,
  runWithRequestContext,
} from './observability.js';
import {
  applyHttpServerTuning,
  drainConnectionsOnShutdown,
} from './server-tuning.js';

export type AnalysisService = Pick<Analyzer, 'analyze'>;

export interface AppOptions {
  readonly analyzer: AnalysisService;
  /** Deadline for one analysis. Defaults to `ANALYSIS_TIMEOUT_MS`. */
  readonly analysisTimeoutMs?: number;
}

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 128;

/* -------------------------------------------------------------------------------------------------
 * Error responses
 * ------------------------------------------------------------------------------------------------- */

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Record<string, unknown>;
  };
}

export function buildErrorResponse(error: unknown): ErrorResponse {
  if (!(error instanceof AppError)) {
    return {
      error: {
        message: 'Internal Server Error',
        code: 'INTERNAL_ERROR',
        statusCode: 500,
      },
    };
  }

  const details =
    error.expose && Object.keys(error.details).length > 0
      ? { ...error.details }
      : undefined;
  return {
    error: {
      message: error.expose ? error.message : 'Internal Server Error',
      code: error.code,
      statusCode: error.statusCode,
      ...(details && { details }),
    },
  };
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const body = buildErrorResponse(err);
  const { statusCode } = body.error;
  const message = `HTTP ${statusCode}: ${getErrorMessage(err)} - ${req.method} ${req.path}`;
  if (statusCode >= 500) {
    logError(
      message,
      err instanceof Error ? err : { error: getErrorMessage(err) }
    );
  } else {
    logWarn(message, { code: body.error.code });
  }

  res.status(statusCode).json(body);
}

/* -------------------------------------------------------------------------------------------------
 * Middleware
 * ------------------------------------------------------------------------------------------------- */

function resolveRequestId(req: Request): string {
  const header = req.get(REQUEST_ID_HEADER)?.trim();
  if (header && header.length <= MAX_REQUEST_ID_LENGTH) return header;
  return randomUUID();
}

function createContextMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = resolveRequestId(req);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    runWithRequestContext({ requestId, operationId: requestId }, () => {
      next();
    });
  };
}

export function createCorsMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.setHeader(
      'Access-Control-Allow-Headers',
      `Content-Type, ${REQUEST_ID_HEADER}`
    );

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  };
}

function createRequestLogMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logInfo('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration: `${Math.round(durationMs)}ms`,
      });
    });

    next();
  };
}

function createJsonParseErrorHandler(): (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (
    err: unknown,
    _req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        error: {
          message: 'Request body is not valid JSON',
          code: 'INVALID_JSON',
          statusCode: 400,
        },
      } satisfies ErrorResponse);
      return;
    }
    next(err);
  };
}

/* -------------------------------------------------------------------------------------------------
 * Routes
 * ------------------------------------------------------------------------------------------------- */

function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const { protocol } = new URL(value);
  return protocol === 'http:' || protocol === 'https:';
}

const analyzeRequestSchema = z.object({
  url: z
    .string()
    .trim()
    .min(1, 'url is empty')
    .max(config.constants.maxUrlLength, 'url is too long')
    .refine(isHttpUrl, 'url must be an absolute http or https URL'),
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

function parseAnalyzeRequest(body: unknown): AnalyzeRequest {
  const parsed = analyzeRequestSchema.safeParse(body ?? {});
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  throw new ValidationError(
    issues[0]?.message ?? 'Invalid request body',
    { issues }
  );
}

/**
 * Ties one analysis to the request: aborted when the client goes away or the
 * deadline passes, whichever comes first.
 */
function createAnalysisLifetime(
  res: Response,
  timeoutMs: number
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const timer = setTimeout(() => {
    controller.abort(
      new AppError(
        `Analysis timed out after ${timeoutMs}ms`,
        504,
        'ANALYSIS_TIMEOUT',
        { timeoutMs },
        { expose: true }
      )
    );
  }, timeoutMs);
  timer.unref();

  const onClose = (): void => {
    if (res.writableFinished) return;
    controller.abort(
      new AppError('Client closed the request', 499, 'CLIENT_CLOSED_REQUEST')
    );
  };
  res.on('close', onClose);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      res.off('close', onClose);
    },
  };
}

function createAnalyzeHandler(
  analyzer: AnalysisService,
  timeoutMs: number
): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const { url } = parseAnalyzeRequest(req.body);
    logDebug('Analysis requested', { url: redactUrl(url) });

    const lifetime = createAnalysisLifetime(res, timeoutMs);
    try {
      const { result, error } = await analyzer.analyze(url, {
        signal: lifetime.signal,
      });
      if (error) throw error;
      res.json(result.toResponse());
    } finally {
      lifetime.dispose();
    }
  };
}

function registerRoutes(app: Express, options: AppOptions): void {
  app.get('/ready', (_req, res) => {
    res.type('text/plain').send('OK');
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      name: config.server.name,
      version: config.server.version,
      uptime: process.uptime(),
    });
  });

  app.post(
    '/analyze',
    createAnalyzeHandler(
      options.analyzer,
      options.analysisTimeoutMs ?? config.analysis.timeoutMs
    )
  );

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: {
        message: `Cannot ${req.method} ${req.path}`,
        code: 'NOT_FOUND',
        statusCode: 404,
      },
    } satisfies ErrorResponse);
  });
}

export async function createApp(options: AppOptions): Promise<Express> {
  const { default: express } = await import('express');
  const app = express();
  app.disable('x-powered-by');

  app.use(createContextMiddleware());
  app.use(createRequestLogMiddleware());
  app.use(createCorsMiddleware());
  app.use(express.json({ limit: '16kb' }));
  app.use(createJsonParseErrorHandler());
  registerRoutes(app, options);
  app.use(errorHandler);

  return app;
}

/* -------------------------------------------------------------------------------------------------
 * Server lifecycle
 * ------------------------------------------------------------------------------------------------- */

export interface HttpServerHandle {
  readonly server: Server;
  readonly host: string;
  readonly port: number;
  readonly url: string;
  /** Signal-driven shutdown: drains, closes, then exits the process. */
  shutdown: (signal: string) => Promise<void>;
  /** Closes the server without exiting. */
  stop: () => Promise<void>;
}

export interface StartHttpServerOptions extends AppOptions {
  readonly host?: string;
  readonly port?: number;
  readonly registerSignalHandlers?: boolean;
}

function formatHostForUrl(hostname: string): string {
  return hostname.includes(':') && !hostname.startsWith('[')
    ? `[${hostname}]`
    : hostname;
}

async function closeServer(server: Server): Promise<void> {
  drainConnectionsOnShutdown(server);
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

function scheduleForcedShutdown(timeoutMs: number): void {
  setTimeout(() => {
    logError('Forced shutdown after timeout');
    process.exit(1);
  }, timeoutMs).unref();
}

function createShutdownHandler(
  server: Server
): (signal: string) => Promise<void> {
  let inFlight: Promise<void> | undefined;

  return (signal: string): Promise<void> => {
    if (inFlight) {
      logWarn('Shutdown already in progress; ignoring signal', { signal });
      return inFlight;
    }

    logInfo(`${signal} received, shutting down gracefully...`);
    scheduleForcedShutdown(config.server.shutdownTimeoutMs);

    inFlight = Promise.all([closeServer(server), closeAgents()]).then(
      () => {
        logInfo('HTTP server closed');
        process.exit(0);
      },
      (error: unknown) => {
        logError(
          'Shutdown handler failed',
          error instanceof Error ? error : { error: getErrorMessage(error) }
        );
        process.exit(1);
      }
    );
    return inFlight;
  };
}

function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

export async function startHttpServer(
  options: StartHttpServerOptions
): Promise<HttpServerHandle> {
  const app = await createApp(options);
  const host = options.host ?? config.server.host;
  const server = app.listen(options.port ?? config.server.port, host);
  applyHttpServerTuning(server);

  // Rejects if 'error' fires first, e.g. EADDRINUSE.
  await once(server, 'listening');

  const address = server.address();
  const port =
    typeof address === 'object' && address
      ? address.port
      : (options.port ?? config.server.port);
  const url = `http://${formatHostForUrl(host)}:${port}`;

  server.on('error', (error) => {
    logError('HTTP server error', error);
  });
  logInfo(`${config.server.name} listening at ${url}`, {
    health: `${url}/health`,
    analyze: `${url}/analyze`,
  });

  const shutdown = createShutdownHandler(server);
  if (options.registerSignalHandlers !== false) {
    registerSignalHandlers(shutdown);
  }

  return {
    server,
    host,
    port,
    url,
    shutdown,
    stop: () => closeServer(server),
  };
}
