/**
 * Sorted array of handles mirrored by a doubly linked sequence.
 *
 * The array is the authority for binary search; the links give O(1)
 * predecessor/successor traversal in the same order. Both the raw
 * control cache and the simple-element registry are built on this.
 */

import assert from "node:assert";

import { OK, fail, ok, errorFromException, type Result } from "./errors.js";

export type Comparator<K> = (a: K, b: K) => number;

export interface SearchResult {
  /** Last probed slot, -1 for an empty sequence. */
  index: number;
  /** Sign of the last comparison: 0 on an exact match, otherwise the insertion side. */
  dir: number;
}

export interface SortedSequenceOptions {
  /** Growth step of the backing capacity. Default: 32. */
  chunk?: number;
  /** Upper bound on the backing capacity. Default: unbounded. */
  capacity?: number;
}

interface Link<T> {
  prev: T | null;
  next: T | null;
}

export class SortedSequence<T extends K, K = T> {
  private items: T[] = [];
  private readonly links = new Map<T, Link<T>>();
  private head: T | null = null;
  private tail: T | null = null;
  private alloc = 0;
  private compare: Comparator<K>;
  private readonly chunk: number;
  private readonly capacity: number;

  constructor(compare: Comparator<K>, options: SortedSequenceOptions = {}) {
    this.compare = compare;
    this.chunk = options.chunk ?? 32;
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
  }

  get count(): number {
    return this.items.length;
  }

  get comparator(): Comparator<K> {
    return this.compare;
  }

  /** Allocated slots; grows in chunks, never per element. */
  get allocated(): number {
    return this.alloc;
  }

  search(probe: K): SearchResult {
    assert(typeof this.compare === "function", "sorted sequence has no comparator");
    let lo = 0;
    let hi = this.items.length;
    let idx = -1;
    let c = 0;
    while (lo < hi) {
      idx = (lo + hi) >>> 1;
      c = this.compare(probe, this.items[idx]);
      if (c < 0) hi = idx;
      else if (c > 0) lo = idx + 1;
      else break;
    }
    return { index: idx, dir: c };
  }

  find(probe: K): T | null {
    const { index, dir } = this.search(probe);
    if (index < 0 || dir !== 0) return null;
    return this.items[index];
  }

  /** Position of this exact handle, or -1. */
  indexOf(item: T): number {
    if (!this.links.has(item)) return -1;
    const { index, dir } = this.search(item);
    if (index < 0 || dir !== 0 || this.items[index] !== item) return -1;
    return index;
  }

  insert(item: T): Result<number> {
    if (this.links.has(item)) {
      return fail("InvalidArgument", "element is already in the sequence");
    }
    const { index: probed, dir } = this.search(item);
    if (probed >= 0 && dir === 0) {
      return fail("InvalidArgument", "an element with the same key is already present");
    }
    const grown = this.grow();
    if (!grown.ok) return grown;

    if (this.items.length === 0) {
      this.linkAfter(item, null);
      this.items.push(item);
      return ok(0);
    }

    let index = probed;
    if (dir > 0) {
      this.linkAfter(item, this.items[index]);
      index++;
    } else {
      this.linkBefore(item, this.items[index]);
    }
    this.items.splice(index, 0, item);
    return ok(index);
  }

  removeAt(index: number): T {
    assert(index >= 0 && index < this.items.length, `index ${index} out of range`);
    const [item] = this.items.splice(index, 1);
    this.unlink(item);
    return item;
  }

  /**
   * Replace the whole content, then sort. Fails without touching the
   * current content when the capacity cannot hold every item.
   */
  replaceAll(items: T[]): Result<void> {
    if (items.length > this.capacity) {
      return fail(
        "OutOfMemory",
        `cannot hold ${items.length} elements (capacity ${this.capacity})`,
      );
    }
    const sorted = items.slice();
    try {
      sorted.sort(this.compare);
    } catch (err) {
      return { ok: false, error: errorFromException(err, "sort failed") };
    }
    this.alloc = Math.max(this.alloc, sorted.length);
    this.items = sorted;
    this.relink();
    return OK;
  }

  /**
   * Install a comparator and fully re-sort. On failure the previous
   * comparator and order remain in place.
   */
  resort(compare: Comparator<K>): Result<void> {
    const sorted = this.items.slice();
    try {
      sorted.sort(compare);
    } catch (err) {
      return { ok: false, error: errorFromException(err, "re-sort failed") };
    }
    this.compare = compare;
    this.items = sorted;
    this.relink();
    return OK;
  }

  clear(): void {
    this.items = [];
    this.links.clear();
    this.head = null;
    this.tail = null;
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  first(): T | null {
    return this.head;
  }

  last(): T | null {
    return this.tail;
  }

  next(item: T): T | null {
    return this.links.get(item)?.next ?? null;
  }

  prev(item: T): T | null {
    return this.links.get(item)?.prev ?? null;
  }

  has(item: T): boolean {
    return this.links.has(item);
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let item = this.head; item !== null; item = this.next(item)) {
      yield item;
    }
  }

  toArray(): T[] {
    return this.items.slice();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private grow(): Result<void> {
    if (this.items.length < this.alloc) return OK;
    const next = Math.min(this.alloc + this.chunk, this.capacity);
    if (next <= this.items.length) {
      return fail(
        "OutOfMemory",
        `cannot grow past ${this.items.length} elements (capacity ${this.capacity})`,
      );
    }
    this.alloc = next;
    return OK;
  }

  private linkAfter(item: T, anchor: T | null): void {
    const link: Link<T> = { prev: anchor, next: null };
    if (anchor === null) {
      link.next = this.head;
      if (this.head !== null) this.linkOf(this.head).prev = item;
      this.head = item;
      if (this.tail === null) this.tail = item;
    } else {
      const anchorLink = this.linkOf(anchor);
      link.next = anchorLink.next;
      if (anchorLink.next !== null) this.linkOf(anchorLink.next).prev = item;
      else this.tail = item;
      anchorLink.next = item;
    }
    this.links.set(item, link);
  }

  private linkBefore(item: T, anchor: T): void {
    const anchorLink = this.linkOf(anchor);
    if (anchorLink.prev === null) {
      this.linkAfter(item, null);
    } else {
      this.linkAfter(item, anchorLink.prev);
    }
  }

  private unlink(item: T): void {
    const link = this.linkOf(item);
    if (link.prev !== null) this.linkOf(link.prev).next = link.next;
    else this.head = link.next;
    if (link.next !== null) this.linkOf(link.next).prev = link.prev;
    else this.tail = link.prev;
    this.links.delete(item);
  }

  private relink(): void {
    this.links.clear();
    this.head = this.items[0] ?? null;
    this.tail = this.items[this.items.length - 1] ?? null;
    this.items.forEach((item, i) => {
      this.links.set(item, {
        prev: this.items[i - 1] ?? null,
        next: this.items[i + 1] ?? null,
      });
    });
  }

  private linkOf(item: T): Link<T> {
    const link = this.links.get(item);
    assert(link, "element is not linked into the sequence");
    return link;
  }
}
