/**
 * Insertion-ordered set
 * @module @rbac-sync/shared/utils/ordered-set
 */

/**
 * Set that keeps first-insertion order and serializes to an array.
 * Used for the identifier lists in RBACRule status.
 */
export class OrderedSet<T> implements Iterable<T> {
  private readonly items: Set<T>;

  constructor(values: Iterable<T> = []) {
    this.items = new Set(values);
  }

  static from<T>(values: Iterable<T> | undefined): OrderedSet<T> {
    return new OrderedSet(values ?? []);
  }

  get size(): number {
    return this.items.size;
  }

  has(value: T): boolean {
    return this.items.has(value);
  }

  /**
   * Add a value; returns false when it was already present
   */
  add(value: T): boolean {
    if (this.items.has(value)) {
      return false;
    }
    this.items.add(value);
    return true;
  }

  /**
   * Remove exactly this value; returns false when it was absent
   */
  delete(value: T): boolean {
    return this.items.delete(value);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items.values();
  }
}

/**
 * De-duplicate while keeping the first occurrence of each value
 */
export function uniqueBy<T>(values: Iterable<T>, keyOf: (value: T) => string): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const value of values) {
    const key = keyOf(value);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}
