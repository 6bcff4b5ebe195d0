/**
 * Unordered membership set with snapshot iteration.
 *
 * Iterating a bag walks a copy, so members may be added or removed
 * from inside the loop.
 */
export class Bag<T> {
  private readonly members = new Set<T>();

  /** Returns false when the member was already present. */
  add(member: T): boolean {
    if (this.members.has(member)) return false;
    this.members.add(member);
    return true;
  }

  /** Returns false when the member was not present. */
  delete(member: T): boolean {
    return this.members.delete(member);
  }

  has(member: T): boolean {
    return this.members.has(member);
  }

  get empty(): boolean {
    return this.members.size === 0;
  }

  get size(): number {
    return this.members.size;
  }

  /** Remove and return every member. */
  drain(): T[] {
    const all = [...this.members];
    this.members.clear();
    return all;
  }

  toArray(): T[] {
    return [...this.members];
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.toArray()[Symbol.iterator]();
  }
}
