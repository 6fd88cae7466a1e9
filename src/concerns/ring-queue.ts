/**
 * Growable FIFO over a power-of-two ring buffer. Indexes are masked instead of
 * taken modulo, and the buffer doubles when it fills.
 */
export class RingQueue<T extends object> {
  private buffer: Array<T | undefined>;
  private mask: number;
  private head: number;
  private tail: number;

  constructor(capacity: number = 32) {
    const size = this._normalizeCapacity(capacity);
    this.buffer = new Array(size);
    this.mask = size - 1;
    this.head = 0;
    this.tail = 0;
  }

  get length(): number {
    return this.tail - this.head;
  }

  enqueue(value: T): void {
    if (this.length >= this.buffer.length) {
      this._grow();
    }
    this.buffer[this.tail & this.mask] = value;
    this.tail++;
  }

  dequeue(): T | null {
    if (this.head === this.tail) {
      return null;
    }
    const index = this.head & this.mask;
    const value = this.buffer[index];
    this.buffer[index] = undefined;
    this.head++;
    if (this.head === this.tail) {
      this.head = 0;
      this.tail = 0;
    }
    return value ?? null;
  }

  /** Removes every queued item, handing each to `callback` in FIFO order. */
  drain(callback: (item: T) => void): void {
    let item = this.dequeue();
    while (item !== null) {
      callback(item);
      item = this.dequeue();
    }
  }

  toArray(): T[] {
    const snapshot: T[] = [];
    for (let i = this.head; i < this.tail; i++) {
      const value = this.buffer[i & this.mask];
      if (value !== undefined) {
        snapshot.push(value);
      }
    }
    return snapshot;
  }

  private _grow(): void {
    const newSize = this.buffer.length * 2;
    const next: Array<T | undefined> = new Array(newSize);
    const len = this.length;
    for (let i = 0; i < len; i++) {
      next[i] = this.buffer[(this.head + i) & this.mask];
    }
    this.buffer = next;
    this.mask = newSize - 1;
    this.head = 0;
    this.tail = len;
  }

  private _normalizeCapacity(value: number): number {
    let size = 8;
    const normalized = Number.isFinite(value) && value > 0 ? Math.ceil(value) : size;
    while (size < normalized) {
      size <<= 1;
    }
    return size;
  }
}
