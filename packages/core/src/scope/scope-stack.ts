/**
 * Last-in-first-out ledger of work to undo when a scope ends.
 */
export class ScopeStack<T> {
  private entries: T[] = [];

  push(entry: T): void {
    this.entries.push(entry);
  }

  pop(): T | undefined {
    return this.entries.pop();
  }

  peek(): T | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Entries in the order they would be popped. */
  toArray(): T[] {
    return [...this.entries].reverse();
  }

  /** Removes every entry and returns them in pop order. */
  clear(): T[] {
    const remaining = this.toArray();
    this.entries = [];
    return remaining;
  }
}
