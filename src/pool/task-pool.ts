import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import {
  getErrorMessage,
  NilTaskError,
  PoolClosedError,
  TaskFailedError,
  toError,
} from '../errors.js';
import { logDebug, logError, logWarn } from '../observability.js';

import { Channel, ChannelClosedError } from './channel.js';

export type TaskFn<R> = (signal: AbortSignal) => Promise<R>;

export type TaskResult<R> =
  | { readonly label: string; readonly status: 'fulfilled'; readonly value: R }
  | {
      readonly label: string;
      readonly status: 'rejected';
      readonly reason: Error;
    };

export interface PoolTask<R> {
  readonly label: string;
  readonly work: TaskFn<R> | undefined;
}

export interface TaskPoolOptions {
  /** Number of workers, all started by the constructor. */
  readonly parallelism: number;
  /** Cancel the pool once the first rejected result has been delivered. */
  readonly failFast: boolean;
  /** Parent lifetime. Aborting it cancels the pool. */
  readonly signal?: AbortSignal;
  /** Capacity of the submission queue and of the results channel. Defaults to `parallelism`. */
  readonly queueCapacity?: number;
  readonly name?: string;
}

interface WorkItem<R> {
  readonly label: string;
  readonly work: TaskFn<R>;
}

type PoolEvent =
  | { v: 1; type: 'start'; pool: string; task: string; worker: number }
  | {
      v: 1;
      type: 'settle';
      pool: string;
      task: string;
      worker: number;
      status: 'fulfilled' | 'rejected';
      durationMs: number;
    }
  | { v: 1; type: 'drop'; pool: string; task: string; worker: number };

const poolChannel = diagnosticsChannel.channel('page-analyzer.pool');

function publishPoolEvent(event: PoolEvent): void {
  if (!poolChannel.hasSubscribers) return;
  try {
    poolChannel.publish(event);
  } catch {
    // Subscriber failures stay out of the worker loop.
  }
}

function linkParentSignal(
  parent: AbortSignal | undefined,
  controller: AbortController
): () => void {
  if (!parent) return () => {};
  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => {};
  }

  const onAbort = (): void => {
    controller.abort(parent.reason);
  };
  parent.addEventListener('abort', onAbort, { once: true });
  return () => {
    parent.removeEventListener('abort', onAbort);
  };
}

let poolSequence = 0;

/**
 * Fixed-size worker pool with a single cancellable lifetime.
 *
 * Shutdown runs once, whatever aborted the lifetime (`stop()`, fail-fast or
 * the parent signal): the submission queue is closed, in-flight tasks are
 * awaited, then the results channel is closed. Items still queued at that
 * point are discarded without a result.
 */
export class TaskPool<R> implements AsyncIterable<TaskResult<R>> {
  readonly name: string;
  readonly parallelism: number;
  readonly failFast: boolean;
  /** Resolves once every worker has exited and the results channel is closed. */
  readonly closed: Promise<void>;

  private readonly controller = new AbortController();
  private readonly submissions: Channel<WorkItem<R>>;
  private readonly completed: Channel<TaskResult<R>>;
  private readonly workers: Promise<void>[];
  private readonly unlinkParent: () => void;

  constructor(options: TaskPoolOptions) {
    if (!Number.isInteger(options.parallelism) || options.parallelism < 1) {
      throw new RangeError(
        `Task pool parallelism must be a positive integer, got ${options.parallelism}`
      );
    }

    poolSequence += 1;
    this.name = options.name ?? `pool-${poolSequence}`;
    this.parallelism = options.parallelism;
    this.failFast = options.failFast;

    const capacity = options.queueCapacity ?? options.parallelism;
    this.submissions = new Channel<WorkItem<R>>(capacity);
    this.completed = new Channel<TaskResult<R>>(capacity);

    this.workers = Array.from({ length: this.parallelism }, (_, index) =>
      this.runWorker(index + 1).catch((error: unknown) => {
        logError('Task pool worker crashed', {
          pool: this.name,
          worker: index + 1,
          error: getErrorMessage(error),
        });
        this.controller.abort(error);
      })
    );

    this.closed = new Promise<void>((resolve) => {
      this.controller.signal.addEventListener(
        'abort',
        () => {
          resolve(this.shutdown());
        },
        { once: true }
      );
    });
    this.unlinkParent = linkParentSignal(options.signal, this.controller);

    logDebug('Task pool started', {
      pool: this.name,
      workers: this.parallelism,
      failFast: this.failFast,
    });
  }

  /** The pool's lifetime, handed to every task. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  async submit(label: string, work: TaskFn<R> | undefined): Promise<void> {
    if (typeof work !== 'function') throw new NilTaskError(label);

    const { signal } = this.controller;
    if (signal.aborted) {
      logWarn('Submit rejected: task pool is shutting down', {
        pool: this.name,
        task: label,
      });
      throw new PoolClosedError(label, { cause: signal.reason });
    }

    try {
      await this.submissions.send({ label, work }, signal);
    } catch (error: unknown) {
      if (!signal.aborted && !(error instanceof ChannelClosedError)) throw error;
      logWarn('Submit failed: task pool was cancelled', {
        pool: this.name,
        task: label,
      });
      throw new PoolClosedError(label, { cause: error });
    }
  }

  stop(): void {
    if (this.controller.signal.aborted) return;
    logDebug('Task pool stop requested', { pool: this.name });
    this.controller.abort();
  }

  /** Iterates delivered results until the results channel closes. */
  results(): AsyncIterable<TaskResult<R>> {
    return this.completed;
  }

  [Symbol.asyncIterator](): AsyncIterator<TaskResult<R>> {
    return this.completed[Symbol.asyncIterator]();
  }

  private async runWorker(workerId: number): Promise<void> {
    const { signal } = this.controller;

    for (;;) {
      if (signal.aborted) break;

      let next: IteratorResult<WorkItem<R>, undefined>;
      try {
        next = await this.submissions.receive(signal);
      } catch (error: unknown) {
        if (signal.aborted) break;
        throw error;
      }
      if (next.done) break;

      if (signal.aborted) {
        this.drop(next.value.label, workerId);
        break;
      }

      await this.execute(workerId, next.value);
    }

    logDebug('Task pool worker exiting', {
      pool: this.name,
      worker: workerId,
    });
  }

  private async execute(workerId: number, item: WorkItem<R>): Promise<void> {
    const { signal } = this.controller;
    const startedAt = performance.now();

    publishPoolEvent({
      v: 1,
      type: 'start',
      pool: this.name,
      task: item.label,
      worker: workerId,
    });

    let result: TaskResult<R>;
    try {
      const value = await item.work(signal);
      result = { label: item.label, status: 'fulfilled', value };
    } catch (error: unknown) {
      result = { label: item.label, status: 'rejected', reason: toError(error) };
    }

    const durationMs = performance.now() - startedAt;
    publishPoolEvent({
      v: 1,
      type: 'settle',
      pool: this.name,
      task: item.label,
      worker: workerId,
      status: result.status,
      durationMs,
    });

    if (result.status === 'rejected') {
      logWarn('Task failed', {
        pool: this.name,
        task: item.label,
        error: result.reason.message,
      });
    } else {
      logDebug('Task completed', {
        pool: this.name,
        task: item.label,
        duration: `${Math.round(durationMs)}ms`,
      });
    }

    try {
      await this.completed.send(result, signal);
    } catch (error: unknown) {
      if (!signal.aborted) throw error;
      this.drop(item.label, workerId);
      return;
    }

    if (result.status === 'rejected' && this.failFast && !signal.aborted) {
      logWarn('Fail-fast: cancelling task pool', {
        pool: this.name,
        task: item.label,
      });
      this.controller.abort(new TaskFailedError(item.label, result.reason));
    }
  }

  private drop(label: string, workerId: number): void {
    publishPoolEvent({
      v: 1,
      type: 'drop',
      pool: this.name,
      task: label,
      worker: workerId,
    });
    logDebug('Task dropped after cancellation', {
      pool: this.name,
      task: label,
    });
  }

  private async shutdown(): Promise<void> {
    logDebug('Task pool cancelled, closing submissions', {
      pool: this.name,
      reason: getErrorMessage(this.controller.signal.reason),
    });

    const discarded = this.submissions.size;
    this.submissions.close();
    if (discarded > 0) {
      logDebug('Discarded queued tasks', { pool: this.name, discarded });
    }

    await Promise.all(this.workers);
    this.completed.close();
    this.unlinkParent();

    logDebug('Task pool workers exited, results closed', { pool: this.name });
  }
}

export interface TaskFailure {
  readonly label: string;
  readonly reason: Error;
}

export interface RunSummary {
  readonly submitted: number;
  readonly settled: number;
  readonly failure: TaskFailure | undefined;
  /** Every task was submitted and settled, and none failed. */
  readonly complete: boolean;
}

/**
 * Submits `tasks` while draining results, so bounded queues cannot stall the
 * producer against the consumer. Returns after one result per submitted task
 * was seen, after the first failure of a fail-fast pool, or after the pool
 * closed early. The pool is always stopped and closed on return.
 */
export async function runTasks<R>(
  pool: TaskPool<R>,
  tasks: readonly PoolTask<R>[],
  onFulfilled: (label: string, value: R) => void
): Promise<RunSummary> {
  let submitted = 0;
  let settled = 0;
  let producing = true;
  let failure: TaskFailure | undefined;

  const produce = async (): Promise<void> => {
    try {
      for (const task of tasks) {
        await pool.submit(task.label, task.work);
        submitted += 1;
      }
    } catch (error: unknown) {
      if (!(error instanceof PoolClosedError)) {
        pool.stop();
        throw error;
      }
    } finally {
      producing = false;
      if (settled >= submitted) pool.stop();
    }
  };

  const consume = async (): Promise<void> => {
    for await (const result of pool) {
      settled += 1;
      if (result.status === 'fulfilled') {
        onFulfilled(result.label, result.value);
      } else {
        failure ??= { label: result.label, reason: result.reason };
        if (pool.failFast) break;
      }
      if (!producing && settled >= submitted) break;
    }
  };

  try {
    await Promise.all([
      produce(),
      consume().finally(() => {
        pool.stop();
      }),
    ]);
  } finally {
    pool.stop();
    await pool.closed;
  }

  return {
    submitted,
    settled,
    failure,
    complete:
      failure === undefined &&
      submitted === tasks.length &&
      settled === submitted,
  };
}
