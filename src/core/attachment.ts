/**
 * Many-to-many attachment between abstracted (simple) elements and raw
 * control elements.
 *
 * Each side owns a bag per participant. Bags exist only while they have
 * members: the first attach allocates one, the last detach releases it.
 */

import { Bag } from "./bag.js";

export class AttachmentRelation<A, R> {
  /** For each raw element, the abstracted elements referencing it. */
  private readonly byRaw = new Map<R, Bag<A>>();
  /** For each abstracted element, the raw elements it references. */
  private readonly byAbstracted = new Map<A, Bag<R>>();

  attach(abstracted: A, raw: R): void {
    let rawBag = this.byRaw.get(raw);
    if (!rawBag) {
      rawBag = new Bag<A>();
      this.byRaw.set(raw, rawBag);
    }
    let ownBag = this.byAbstracted.get(abstracted);
    if (!ownBag) {
      ownBag = new Bag<R>();
      this.byAbstracted.set(abstracted, ownBag);
    }
    rawBag.add(abstracted);
    ownBag.add(raw);
  }

  /**
   * Remove the pair from both sides. Safe on partial state: a side that
   * no longer holds the pair is left alone. Returns true when either
   * side changed.
   */
  detach(abstracted: A, raw: R): boolean {
    let changed = false;
    const rawBag = this.byRaw.get(raw);
    if (rawBag) {
      changed = rawBag.delete(abstracted) || changed;
      if (rawBag.empty) this.byRaw.delete(raw);
    }
    const ownBag = this.byAbstracted.get(abstracted);
    if (ownBag) {
      changed = ownBag.delete(raw) || changed;
      if (ownBag.empty) this.byAbstracted.delete(abstracted);
    }
    return changed;
  }

  /** Detach every raw element of `abstracted`; returns what was detached. */
  detachAll(abstracted: A): R[] {
    const raws = this.rawOf(abstracted);
    for (const raw of raws) this.detach(abstracted, raw);
    return raws;
  }

  isAttached(abstracted: A, raw: R): boolean {
    return this.byRaw.get(raw)?.has(abstracted) ?? false;
  }

  abstractedOf(raw: R): A[] {
    return this.byRaw.get(raw)?.toArray() ?? [];
  }

  rawOf(abstracted: A): R[] {
    return this.byAbstracted.get(abstracted)?.toArray() ?? [];
  }

  isEmptyOfRawRefs(abstracted: A): boolean {
    return !this.byAbstracted.has(abstracted);
  }

  hasRawBag(raw: R): boolean {
    return this.byRaw.has(raw);
  }

  get rawBagCount(): number {
    return this.byRaw.size;
  }
}
