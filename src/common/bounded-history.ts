// bounded-history.ts - Newest-last list that drops its oldest entries past a cap

export class BoundedHistory<T> {
  private items: T[] = [];
  private readonly cap: number;

  constructor(cap: number) {
    if (!Number.isInteger(cap) || cap <= 0) {
      throw new Error(`Invalid history cap: ${cap}`);
    }
    this.cap = cap;
  }

  get length(): number {
    return this.items.length;
  }

  get capacity(): number {
    return this.cap;
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.cap) {
      this.items.splice(0, this.items.length - this.cap);
    }
  }

  /** Keep only the newest `retain` entries. */
  trimTo(retain: number): void {
    if (retain < 0) return;
    if (this.items.length > retain) {
      this.items.splice(0, this.items.length - retain);
    }
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate);
  }

  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
