export function isObject(
  value: unknown
): value is Record<PropertyKey, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function isAbortError(value: unknown): boolean {
  return (
    isError(value) &&
    (value.name === 'AbortError' || value.name === 'TimeoutError')
  );
}

export function isTimeoutError(value: unknown): boolean {
  return isError(value) && value.name === 'TimeoutError';
}
