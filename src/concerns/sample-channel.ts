import { ChannelClosedError, HeatmapError } from '../errors.js';
import { RingQueue } from './ring-queue.js';

export interface SampleChannelOptions {
  /** Items buffered before `send` starts waiting for the consumer. */
  capacity: number;
  /** Number of `done()` calls that close the channel. */
  producers: number;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

interface Waiter {
  wake: () => void;
}

/**
 * Bounded channel with many producers and a single consumer.
 *
 * Each producer calls `done()` once when it stops sending. The channel closes
 * after the last one; buffered items are still delivered, then iteration ends.
 */
export class SampleChannel<T extends object> implements AsyncIterable<T> {
  readonly capacity: number;
  private buffer: RingQueue<T>;
  private receivers = new RingQueue<{ resolve: Receiver<T> }>(1);
  private blockedSenders = new RingQueue<Waiter>();
  private openProducers: number;
  private _closed = false;

  constructor(options: SampleChannelOptions) {
    const { capacity, producers } = options;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new HeatmapError('SampleChannel capacity must be a positive integer', { capacity });
    }
    if (!Number.isInteger(producers) || producers < 0) {
      throw new HeatmapError('SampleChannel producers must be a non-negative integer', { producers });
    }

    this.capacity = capacity;
    this.buffer = new RingQueue<T>(capacity);
    this.openProducers = producers;
    if (producers === 0) {
      this._closed = true;
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  get pendingProducers(): number {
    return this.openProducers;
  }

  async send(item: T): Promise<void> {
    if (this._closed) {
      throw new ChannelClosedError();
    }

    const receiver = this.receivers.dequeue();
    if (receiver) {
      receiver.resolve({ value: item, done: false });
      return;
    }

    while (this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.blockedSenders.enqueue({ wake: resolve }));
      if (this._closed) {
        throw new ChannelClosedError();
      }
    }

    this.buffer.enqueue(item);
  }

  /** Signals that one producer finished. */
  done(): void {
    if (this.openProducers === 0) {
      throw new HeatmapError('SampleChannel.done() called more times than there are producers');
    }

    this.openProducers--;
    if (this.openProducers === 0) {
      this._close();
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.dequeue();
    if (item !== null) {
      this.blockedSenders.dequeue()?.wake();
      return Promise.resolve({ value: item, done: false });
    }

    if (this._closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => this.receivers.enqueue({ resolve }));
  }

  /** Reads until the channel closes. */
  async drain(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive()
    };
  }

  private _close(): void {
    this._closed = true;
    this.receivers.drain(({ resolve }) => resolve({ value: undefined, done: true }));
    this.blockedSenders.drain(({ wake }) => wake());
  }
}
