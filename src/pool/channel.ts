/**
 * Bounded FIFO channel with close-once semantics.
 *
 * `send` waits while the buffer is full and `receive` waits while it is empty;
 * both give up when their `AbortSignal` fires. A capacity of 0 makes every
 * send a hand-off to a waiting receiver.
 */

export class ChannelClosedError extends Error {
  override name = 'ChannelClosedError';

  constructor(operation: 'send' | 'close') {
    super(
      operation === 'close'
        ? 'Channel is already closed'
        : 'Send on closed channel'
    );
  }
}

type Outcome<V> = { ok: true; value: V } | { ok: false; reason: unknown };

interface Waiter<V> {
  settled: boolean;
  settle(outcome: Outcome<V>): void;
}

interface PendingSend<T> {
  readonly waiter: Waiter<void>;
  readonly value: T;
}

const COMPACT_AFTER = 64;

/** Array-backed queue that advances a head index instead of shifting. */
class Queue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head += 1;

    if (this.head > COMPACT_AFTER && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  remove(item: T): void {
    const index = this.items.indexOf(item, this.head);
    if (index >= 0) this.items.splice(index, 1);
  }

  drain(): T[] {
    const rest = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return rest;
  }
}

export class Channel<T extends NonNullable<unknown>>
  implements AsyncIterable<T>
{
  private readonly buffer = new Queue<T>();
  private readonly receivers = new Queue<
    Waiter<IteratorResult<T, undefined>>
  >();
  private readonly senders = new Queue<PendingSend<T>>();
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Invalid channel capacity: ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of values buffered and not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  get waitingSenders(): number {
    return this.senders.length;
  }

  get waitingReceivers(): number {
    return this.receivers.length;
  }

  async send(value: T, signal?: AbortSignal): Promise<void> {
    if (this.isClosed) throw new ChannelClosedError('send');
    signal?.throwIfAborted();

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.settle({ ok: true, value: { done: false, value } });
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return;
    }

    await park<void>(signal, (waiter) => {
      const pending = { waiter, value };
      this.senders.push(pending);
      return () => {
        this.senders.remove(pending);
      };
    });
  }

  async receive(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    signal?.throwIfAborted();

    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      this.refillFromSenders();
      return { done: false, value: buffered };
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.waiter.settle({ ok: true, value: undefined });
      return { done: false, value: sender.value };
    }

    if (this.isClosed) return { done: true, value: undefined };

    return park<IteratorResult<T, undefined>>(signal, (waiter) => {
      this.receivers.push(waiter);
      return () => {
        this.receivers.remove(waiter);
      };
    });
  }

  /**
   * Closes the channel. Waiting receivers see the end of the stream once the
   * buffer is empty; waiting senders are rejected. Closing twice throws.
   */
  close(): void {
    if (this.isClosed) throw new ChannelClosedError('close');
    this.isClosed = true;

    for (const receiver of this.receivers.drain()) {
      receiver.settle({ ok: true, value: { done: true, value: undefined } });
    }
    for (const sender of this.senders.drain()) {
      sender.waiter.settle({
        ok: false,
        reason: new ChannelClosedError('send'),
      });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }

  private refillFromSenders(): void {
    while (this.buffer.length < this.capacity) {
      const sender = this.senders.shift();
      if (!sender) return;
      this.buffer.push(sender.value);
      sender.waiter.settle({ ok: true, value: undefined });
    }
  }
}

// `enqueue` returns the function that takes the waiter back out of its queue;
// an aborted waiter is removed before it settles.
function park<V>(
  signal: AbortSignal | undefined,
  enqueue: (waiter: Waiter<V>) => () => void
): Promise<V> {
  return new Promise<V>((resolve, reject) => {
    const onAbort = (): void => {
      withdraw();
      waiter.settle({ ok: false, reason: signal?.reason });
    };

    const waiter: Waiter<V> = {
      settled: false,
      settle: (outcome) => {
        if (waiter.settled) return;
        waiter.settled = true;
        signal?.removeEventListener('abort', onAbort);
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.reason);
      },
    };

    const withdraw = enqueue(waiter);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
