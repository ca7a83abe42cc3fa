import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Channel, ChannelClosedError } from '../src/pool/channel.js';

async function collect<T extends NonNullable<unknown>>(
  channel: Channel<T>
): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) values.push(value);
  return values;
}

describe('Channel', () => {
  it('rejects invalid capacities', () => {
    assert.throws(() => new Channel<number>(-1), RangeError);
    assert.throws(() => new Channel<number>(1.5), RangeError);
  });

  it('buffers values in FIFO order up to its capacity', async () => {
    const channel = new Channel<number>(3);
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);

    assert.equal(channel.size, 3);
    assert.deepEqual(await channel.receive(), { done: false, value: 1 });
    assert.deepEqual(await channel.receive(), { done: false, value: 2 });
    assert.equal(channel.size, 1);
  });

  it('blocks a sender while the buffer is full', async () => {
    const channel = new Channel<string>(1);
    await channel.send('a');

    let delivered = false;
    const pending = channel.send('b').then(() => {
      delivered = true;
    });
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(delivered, false);

    assert.deepEqual(await channel.receive(), { done: false, value: 'a' });
    await pending;
    assert.equal(delivered, true);
    assert.deepEqual(await channel.receive(), { done: false, value: 'b' });
  });

  it('hands values straight to a waiting receiver when unbuffered', async () => {
    const channel = new Channel<number>(0);
    const received = channel.receive();

    await channel.send(42);

    assert.deepEqual(await received, { done: false, value: 42 });
    assert.equal(channel.size, 0);
  });

  it('delivers buffered values after close, then ends', async () => {
    const channel = new Channel<number>(4);
    await channel.send(1);
    await channel.send(2);
    channel.close();

    assert.equal(channel.closed, true);
    assert.deepEqual(await collect(channel), [1, 2]);
    assert.deepEqual(await channel.receive(), { done: true, value: undefined });
  });

  it('wakes waiting receivers with the end of the stream on close', async () => {
    const channel = new Channel<number>(1);
    const waiting = channel.receive();

    channel.close();

    assert.deepEqual(await waiting, { done: true, value: undefined });
  });

  it('rejects parked and later senders once closed', async () => {
    const channel = new Channel<number>(0);
    const parked = channel.send(1);

    channel.close();

    await assert.rejects(parked, ChannelClosedError);
    await assert.rejects(channel.send(2), ChannelClosedError);
  });

  it('throws when closed twice', () => {
    const channel = new Channel<number>(1);
    channel.close();

    assert.throws(() => channel.close(), {
      name: 'ChannelClosedError',
      message: 'Channel is already closed',
    });
  });

  it('rejects a waiting receiver with the abort reason', async () => {
    const channel = new Channel<number>(1);
    const controller = new AbortController();
    const waiting = channel.receive(controller.signal);

    controller.abort(new Error('stop waiting'));

    await assert.rejects(waiting, /stop waiting/);
    assert.equal(channel.waitingReceivers, 0);

    await channel.send(7);
    assert.deepEqual(await channel.receive(), { done: false, value: 7 });
  });

  it('rejects a parked sender with the abort reason and drops its value', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);
    const controller = new AbortController();
    const parked = channel.send(2, controller.signal);

    controller.abort(new Error('gave up'));

    await assert.rejects(parked, /gave up/);
    assert.equal(channel.waitingSenders, 0);
    assert.deepEqual(await channel.receive(), { done: false, value: 1 });
    assert.equal(channel.size, 0);
  });

  it('moves parked senders into the buffer as space frees up', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);
    const second = channel.send(2);
    const third = channel.send(3);

    assert.deepEqual(await channel.receive(), { done: false, value: 1 });
    await second;
    assert.equal(channel.size, 1);

    assert.deepEqual(await channel.receive(), { done: false, value: 2 });
    await third;
    assert.deepEqual(await channel.receive(), { done: false, value: 3 });
  });

  it('does not keep abandoned waiters queued', async () => {
    const channel = new Channel<number>(0);
    const controller = new AbortController();
    const receives = Array.from({ length: 100 }, () =>
      channel.receive(controller.signal)
    );
    const sends = Array.from({ length: 100 }, (_, index) =>
      channel.send(index, controller.signal)
    );
    // With receivers waiting, every send above is a hand-off.
    assert.equal(channel.waitingReceivers, 0);
    assert.equal(channel.waitingSenders, 0);
    await Promise.all(sends);
    assert.deepEqual(await receives[99], { done: false, value: 99 });

    const abandoned = new AbortController();
    const waiting = Array.from({ length: 100 }, () =>
      channel.receive(abandoned.signal)
    );
    const live = channel.receive();
    assert.equal(channel.waitingReceivers, 101);

    abandoned.abort(new Error('gone'));
    for (const receive of waiting) await assert.rejects(receive, /gone/);
    assert.equal(channel.waitingReceivers, 1);

    await channel.send(5);
    assert.deepEqual(await live, { done: false, value: 5 });
    assert.equal(channel.waitingReceivers, 0);
  });

  it('removes aborted senders from the queue', async () => {
    const channel = new Channel<number>(0);
    const controller = new AbortController();
    const parked = Array.from({ length: 50 }, (_, index) =>
      channel.send(index, controller.signal)
    );
    const kept = channel.send(99);
    assert.equal(channel.waitingSenders, 51);

    controller.abort(new Error('gave up'));
    for (const send of parked) await assert.rejects(send, /gave up/);
    assert.equal(channel.waitingSenders, 1);

    assert.deepEqual(await channel.receive(), { done: false, value: 99 });
    await kept;
    assert.equal(channel.waitingSenders, 0);
  });
});
