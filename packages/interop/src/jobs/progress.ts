import type { ProgressUpdate } from '@app/contracts';

export const DEFAULT_PROGRESS_CAPACITY = 16;

/** Producer side of a progress stream, as seen by the engine. */
export interface ProgressSink<T = ProgressUpdate> {
  send(value: T): Promise<void>;
  close(): void;
}

export class ChannelClosedError extends Error {
  constructor() {
    super('progress channel is closed');
    this.name = 'ChannelClosedError';
  }
}

type PendingSend<T> = {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
};

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Bounded, ordered, single-producer/single-consumer queue.
 *
 * `send` resolves once the value is buffered and waits while the buffer is
 * full. The producer closes the channel when it is done; the consumer keeps
 * reading buffered values after close and then sees the end of iteration.
 */
export class ProgressChannel<T = ProgressUpdate> implements ProgressSink<T>, AsyncIterable<T> {
  readonly capacity: number;

  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(capacity: number = DEFAULT_PROGRESS_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`progress channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of buffered values not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitWaitingSender();
      return Promise.resolve({ value, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    // Only reachable when something other than the producer closed the channel.
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push(sender.value);
    sender.resolve();
  }
}

/**
 * Consumer task: drains the channel until it is closed, handing each value to
 * `handler`. A failing handler does not stop the drain (the producer would
 * otherwise block on a full buffer); the first failure is rethrown once the
 * channel is closed.
 */
export async function consumeProgress<T>(
  channel: AsyncIterable<T>,
  handler: (value: T) => void | Promise<void>,
): Promise<number> {
  let received = 0;
  let firstError: unknown = null;
  let failed = false;

  for await (const value of channel) {
    received += 1;
    try {
      await handler(value);
    } catch (error) {
      if (!failed) {
        failed = true;
        firstError = error;
      }
    }
  }

  if (failed) {
    throw firstError;
  }
  return received;
}
