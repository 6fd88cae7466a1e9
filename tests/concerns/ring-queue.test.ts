import { describe, it, expect } from 'vitest';
import { RingQueue } from '../../src/concerns/ring-queue.js';

interface Item {
  id: number;
}

describe('RingQueue', () => {
  it('should dequeue in insertion order', () => {
    const queue = new RingQueue<Item>();
    queue.enqueue({ id: 1 });
    queue.enqueue({ id: 2 });
    queue.enqueue({ id: 3 });

    expect(queue.length).toBe(3);
    expect(queue.dequeue()).toEqual({ id: 1 });
    expect(queue.dequeue()).toEqual({ id: 2 });
    expect(queue.length).toBe(1);
  });

  it('should return null when empty', () => {
    const queue = new RingQueue<Item>();
    expect(queue.dequeue()).toBeNull();
  });

  it('should grow past its initial capacity and keep order', () => {
    const queue = new RingQueue<Item>(2);
    for (let id = 0; id < 20; id++) {
      queue.enqueue({ id });
    }

    expect(queue.length).toBe(20);
    expect(queue.toArray().map((item) => item.id)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it('should keep order across wrap-around', () => {
    const queue = new RingQueue<Item>(8);
    for (let id = 0; id < 6; id++) queue.enqueue({ id });
    for (let i = 0; i < 4; i++) queue.dequeue();
    for (let id = 6; id < 12; id++) queue.enqueue({ id });

    expect(queue.toArray().map((item) => item.id)).toEqual([4, 5, 6, 7, 8, 9, 10, 11]);
  });

  it('should drain every item in order', () => {
    const queue = new RingQueue<Item>();
    queue.enqueue({ id: 1 });
    queue.enqueue({ id: 2 });

    const seen: number[] = [];
    queue.drain((item) => seen.push(item.id));

    expect(seen).toEqual([1, 2]);
    expect(queue.length).toBe(0);
  });
});
