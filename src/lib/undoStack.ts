export const DEFAULT_UNDO_CAPACITY = 100;

/**
 * Bounded LIFO history. Pushing onto a full stack evicts the oldest entry.
 */
export class UndoStack<T> {
  private readonly entries: T[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_UNDO_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Undo capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size() {
    return this.entries.length;
  }

  canUndo() {
    return this.entries.length > 0;
  }

  push(entry: T) {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  pop(): T | undefined {
    return this.entries.pop();
  }

  peek(): T | undefined {
    return this.entries[this.entries.length - 1];
  }

  clear() {
    this.entries.length = 0;
  }
}
