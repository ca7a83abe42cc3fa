import { getErrorMessage, PoolClosedError } from '../errors.js';
import { logDebug, redactUrl } from '../observability.js';

import { runTasks, TaskPool } from './task-pool.js';

/** Resolves with the HTTP status of `url`, or rejects when it cannot be reached. */
export type ReachabilityProbe = (
  url: string,
  signal: AbortSignal
) => Promise<number>;

export interface FanOutOptions {
  /** Upper bound on probes in flight. */
  readonly concurrency: number;
  readonly signal?: AbortSignal;
  readonly name?: string;
}

async function isReachable(
  probe: ReachabilityProbe,
  url: string,
  signal: AbortSignal
): Promise<boolean> {
  try {
    const status = await probe(url, signal);
    return status < 400;
  } catch (error: unknown) {
    if (signal.aborted) throw error;
    logDebug('Link probe failed', {
      url: redactUrl(url),
      error: getErrorMessage(error),
    });
    return false;
  }
}

/**
 * Probes every URL on a dedicated pool and counts the ones that fail or answer
 * with a status of 400 or above. Per-link failures only affect the count;
 * the returned promise rejects only when `signal` aborts.
 */
export async function countInaccessible(
  urls: readonly string[],
  probe: ReachabilityProbe,
  options: FanOutOptions
): Promise<number> {
  options.signal?.throwIfAborted();
  if (urls.length === 0) return 0;

  const pool = new TaskPool<boolean>({
    parallelism: Math.max(1, Math.min(options.concurrency, urls.length)),
    failFast: false,
    name: options.name ?? 'link-probe',
    ...(options.signal ? { signal: options.signal } : {}),
  });

  let inaccessible = 0;
  const summary = await runTasks(
    pool,
    urls.map((url) => ({
      label: url,
      work: (signal: AbortSignal) => isReachable(probe, url, signal),
    })),
    (_url, reachable) => {
      if (!reachable) inaccessible += 1;
    }
  );

  if (!summary.complete) {
    options.signal?.throwIfAborted();
    throw new PoolClosedError(pool.name, {
      cause: summary.failure?.reason,
    });
  }

  logDebug('Link probing finished', {
    links: urls.length,
    inaccessible,
    concurrency: pool.parallelism,
  });
  return inaccessible;
}
