import { describe, expect, it } from 'vitest';

import {
  ChannelClosedError,
  ProgressChannel,
  consumeProgress,
} from '../../src/jobs/progress';

describe('progress channel', () => {
  it('delivers values in send order and ends after close', async () => {
    const channel = new ProgressChannel<number>(4);
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) {
      received.push(value);
    }

    expect(received).toEqual([1, 2, 3]);
    await expect(channel.receive()).resolves.toEqual({ value: undefined, done: true });
  });

  it('makes the producer wait while the buffer is full', async () => {
    const channel = new ProgressChannel<string>(1);
    await channel.send('a');

    let secondSent = false;
    const pending = channel.send('b').then(() => {
      secondSent = true;
    });

    await Promise.resolve();
    expect(secondSent).toBe(false);
    expect(channel.size).toBe(1);

    await expect(channel.receive()).resolves.toEqual({ value: 'a', done: false });
    await pending;
    expect(secondSent).toBe(true);
    await expect(channel.receive()).resolves.toEqual({ value: 'b', done: false });
  });

  it('hands a value straight to a waiting receiver', async () => {
    const channel = new ProgressChannel<number>(1);
    const next = channel.receive();

    await channel.send(7);

    await expect(next).resolves.toEqual({ value: 7, done: false });
    expect(channel.size).toBe(0);
  });

  it('rejects sends after close and tolerates repeated close', async () => {
    const channel = new ProgressChannel<number>();
    channel.close();
    channel.close();

    expect(channel.closed).toBe(true);
    await expect(channel.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('rejects a producer still blocked when the channel is closed', async () => {
    const channel = new ProgressChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);

    channel.close();

    await expect(blocked).rejects.toBeInstanceOf(ChannelClosedError);
    await expect(channel.receive()).resolves.toEqual({ value: 1, done: false });
    await expect(channel.receive()).resolves.toEqual({ value: undefined, done: true });
  });

  it('resolves waiting receivers with done on close', async () => {
    const channel = new ProgressChannel<number>();
    const next = channel.receive();

    channel.close();

    await expect(next).resolves.toEqual({ value: undefined, done: true });
  });

  it('refuses a capacity below one', () => {
    expect(() => new ProgressChannel(0)).toThrow(RangeError);
    expect(() => new ProgressChannel(1.5)).toThrow(RangeError);
  });
});

describe('consumeProgress', () => {
  it('drains until the producer closes the channel', async () => {
    const channel = new ProgressChannel<number>(2);
    const seen: number[] = [];
    const consumer = consumeProgress(channel, (value) => {
      seen.push(value);
    });

    for (let i = 0; i < 5; i += 1) {
      await channel.send(i);
    }
    channel.close();

    await expect(consumer).resolves.toBe(5);
    expect(seen).toEqual([0, 1, 2, 3, 4]);
  });

  it('keeps draining after a handler failure and rethrows the first one', async () => {
    const channel = new ProgressChannel<number>(1);
    const seen: number[] = [];
    const consumer = consumeProgress(channel, (value) => {
      seen.push(value);
      if (value === 1) throw new Error('render failed');
    });

    await channel.send(0);
    await channel.send(1);
    await channel.send(2);
    channel.close();

    await expect(consumer).rejects.toThrow('render failed');
    expect(seen).toEqual([0, 1, 2]);
  });
});
