/**
 * Bounded in-process buffer of the most recent items; oldest entries fall off.
 */
export class ShortTermMemory<T> {
  private items: T[] = [];
  private capacity: number;

  constructor(capacity = 8) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  recent(limit: number): T[] {
    if (limit <= 0) return [];
    return this.items.slice(-limit);
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
