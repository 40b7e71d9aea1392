/**
 * RingBuffer - fixed-capacity circular buffer
 *
 * Once full, each push overwrites the oldest item in O(1).
 */
export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private readonly capacity: number;
  private head = 0; // next write position
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError("RingBuffer capacity must be a positive integer");
    }
    this.capacity = capacity;
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }
  }

  /** Items from newest to oldest, without copying the buffer */
  *newestFirst(): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head - 1 - i + this.capacity) % this.capacity];
      if (item !== undefined) {
        yield item;
      }
    }
  }

  getLast(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  size(): number {
    return this.count;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
