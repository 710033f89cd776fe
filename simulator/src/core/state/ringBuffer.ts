/**
 * 고정 용량 링 버퍼
 *
 * 용량을 넘기면 가장 오래된 항목부터 밀려난다.
 */

export class RingBuffer<T> {
  readonly capacity: number;
  private items: (T | undefined)[];
  private head = 0; // 가장 오래된 항목 위치
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`링 버퍼 용량은 양의 정수여야 합니다: ${capacity}`);
    }
    this.capacity = capacity;
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    const index = (this.head + this.count) % this.capacity;
    this.items[index] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  pushAll(items: Iterable<T>): void {
    for (const item of items) {
      this.push(item);
    }
  }

  /**
   * 오래된 순 배열
   */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  /**
   * 최근 n개 (오래된 순)
   */
  tail(n: number): T[] {
    const all = this.toArray();
    return n >= all.length ? all : all.slice(all.length - Math.max(0, n));
  }

  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.items[(this.head + this.count - 1) % this.capacity];
  }

  clear(): void {
    this.items = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
