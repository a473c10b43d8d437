/**
 * 定长留言缓冲：写满后丢弃最旧的一条。
 * 每回合一只，限制简报留言的数量。
 */
export class RingBuffer<T> {
  private readonly items: T[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid ring buffer capacity: ${capacity}`);
    }
  }

  /** 写入一条；已满时返回被挤掉的最旧一条 */
  push(item: T): { dropped?: T } {
    this.items.push(item);
    if (this.items.length <= this.capacity) return {};
    const [dropped] = this.items.splice(0, 1);
    return { dropped };
  }

  /** 旧 → 新 */
  to_array(): T[] {
    return [...this.items];
  }
}
