import { inspect } from 'node:util';

import { isError, isObject } from './type-guards.js';

const DEFAULT_HTTP_STATUS = 502;

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Readonly<Record<string, unknown>>;
  /** Whether the message may be shown to API clients. */
  readonly expose: boolean;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    options?: ErrorOptions & { expose?: boolean }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = Object.freeze({ ...details });
    this.expose = options?.expose ?? statusCode < 500;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class InvalidUrlError extends AppError {
  constructor(readonly url: string, reason: string, options?: ErrorOptions) {
    super(
      `Invalid URL "${url}": ${reason}`,
      400,
      'INVALID_URL',
      { url, reason },
      options
    );
  }
}

export class FetchError extends AppError {
  readonly httpStatus: number | undefined;

  constructor(
    message: string,
    readonly url: string,
    httpStatus?: number,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(
      message,
      httpStatus ?? DEFAULT_HTTP_STATUS,
      httpStatus ? `HTTP_${httpStatus}` : 'FETCH_ERROR',
      { url, httpStatus, ...details },
      { ...options, expose: true }
    );
    this.httpStatus = httpStatus;
  }
}

/**
 * The primary document answered with a status other than 200. Statuses below
 * 400 are reported to clients as 502; `status` keeps the one received.
 */
export class UpstreamStatusError extends FetchError {
  constructor(
    url: string,
    readonly status: number
  ) {
    super(
      `Unexpected status ${status} from ${url}`,
      url,
      status >= 400 ? status : DEFAULT_HTTP_STATUS,
      { status }
    );
  }
}

export class ParseError extends AppError {
  constructor(
    message: string,
    readonly url: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, 422, 'PARSE_ERROR', { url, ...details }, options);
  }
}

export class PoolClosedError extends AppError {
  constructor(label: string, options?: ErrorOptions) {
    super(
      `Task pool is closed; task "${label}" was not accepted`,
      500,
      'POOL_CLOSED',
      { task: label },
      options
    );
  }
}

export class NilTaskError extends AppError {
  constructor(label: string) {
    super(
      `Task "${label}" was submitted without a function`,
      500,
      'NIL_TASK',
      { task: label }
    );
  }
}

export class DuplicateWriteError extends AppError {
  constructor(field: string) {
    super(
      `Analysis field "${field}" was already written`,
      500,
      'DUPLICATE_WRITE',
      { field }
    );
  }
}

/**
 * Wraps the error of a named task. Status, code and visibility are taken
 * from the cause so the boundary reports it as the original kind.
 */
export class TaskFailedError extends AppError {
  readonly task: string;

  constructor(task: string, cause: unknown) {
    const original = toError(cause);
    const appError = original instanceof AppError ? original : undefined;
    super(
      `Task "${task}" failed: ${original.message}`,
      appError?.statusCode ?? 500,
      appError?.code ?? 'TASK_FAILED',
      { ...appError?.details, task },
      { cause: original, expose: appError?.expose ?? false }
    );
    this.task = task;
  }

  /** The innermost error that is not itself a task wrapper. */
  get rootCause(): Error {
    let current: unknown = this.cause;
    while (current instanceof TaskFailedError) current = current.cause;
    return toError(current);
  }
}

export function toError(value: unknown): Error {
  if (isError(value)) return value;
  return new Error(getErrorMessage(value));
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  if (!isError(error)) return false;
  if (!('code' in error)) return false;
  return typeof error.code === 'string';
}
