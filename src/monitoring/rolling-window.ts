/**
 * Fixed-capacity ring buffer. Pushing into a full window overwrites the
 * oldest entry.
 */
export class RollingWindow<T> {
  private readonly buffer: Array<T | undefined>;
  private readonly capacity: number;
  private start = 0;
  private length = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<T | undefined>(capacity);
  }

  /**
   * Append a value, returning the evicted one when the window was full
   */
  public push(value: T): T | undefined {
    if (this.length < this.capacity) {
      this.buffer[(this.start + this.length) % this.capacity] = value;
      this.length += 1;
      return undefined;
    }

    const evicted = this.buffer[this.start];
    this.buffer[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  public get size(): number {
    return this.length;
  }

  public get maxSize(): number {
    return this.capacity;
  }

  public isFull(): boolean {
    return this.length === this.capacity;
  }

  /**
   * Contents, oldest first
   */
  public toArray(): T[] {
    const values: T[] = [];
    for (let i = 0; i < this.length; i++) {
      const value = this.buffer[(this.start + i) % this.capacity];
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }

  public clear(): void {
    this.buffer.fill(undefined);
    this.start = 0;
    this.length = 0;
  }
}
