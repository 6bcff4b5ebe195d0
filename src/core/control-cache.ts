/**
 * High-level cached view of a control transport.
 *
 * Mirrors the transport's raw elements in a sorted sequence and turns
 * driver add/remove/value/info events into cache mutations and callbacks.
 */

import assert from "node:assert";

import {
  compareControlsDefault,
  getCompareWeight,
  type ControlComparator,
  type ControlKey,
} from "./compare-weight.js";
import { MixerError, OK, fail, failWith, ok, type Result } from "./errors.js";
import { SortedSequence, type SearchResult } from "./sorted-sequence.js";
import {
  ELEM_NAME_MAXLEN,
  EVENT_MASK_ADD,
  EVENT_MASK_INFO,
  EVENT_MASK_REMOVE,
  EVENT_MASK_VALUE,
  type ControlEvent,
  type ControlTransport,
  type ElementId,
  type ElementInfo,
  type PollDescriptor,
} from "../transport/types.js";
import { createLogger } from "../utils/logger.js";
import { truncateUtf8 } from "../utils/text.js";

const log = createLogger("cache");

/** Cache-level subscriber: receives ADD for every new element. */
export type ControlCacheCallback = (
  mask: number,
  elem: ControlElement,
) => MixerError | void;

/** Element-level subscriber: receives VALUE, INFO and REMOVE. */
export type ControlElementCallback = (
  mask: number,
  elem: ControlElement,
) => MixerError | void;

// ---------------------------------------------------------------------------
// Raw element
// ---------------------------------------------------------------------------

export class ControlElement implements ControlKey {
  readonly id: ElementId;
  readonly compareWeight: number;
  readonly cache: ControlCache;
  private callback: ControlElementCallback | null = null;
  private released = false;

  constructor(cache: ControlCache, id: ElementId) {
    this.cache = cache;
    this.id = { ...id, name: truncateUtf8(id.name, ELEM_NAME_MAXLEN) };
    this.compareWeight = getCompareWeight(this.id.name);
  }

  get name(): string {
    return this.id.name;
  }

  get index(): number {
    return this.id.index;
  }

  get numid(): number {
    return this.id.numid;
  }

  get iface(): ElementId["iface"] {
    return this.id.iface;
  }

  /** True once the element has left its cache. */
  get isReleased(): boolean {
    return this.released;
  }

  setCallback(callback: ControlElementCallback | null): void {
    this.callback = callback;
  }

  info(): Result<ElementInfo> {
    if (this.released) return fail("NotFound", `control "${this.name}" was removed`);
    return this.cache.transport.info(this.id);
  }

  read(): Result<number[]> {
    if (this.released) return fail("NotFound", `control "${this.name}" was removed`);
    return this.cache.transport.read(this.id);
  }

  write(values: number[]): Result<boolean> {
    if (this.released) return fail("NotFound", `control "${this.name}" was removed`);
    return this.cache.transport.write(this.id, values);
  }

  /** @internal */
  throwEvent(mask: number): MixerError | void {
    return this.callback?.(mask, this);
  }

  /** @internal */
  release(): void {
    this.released = true;
    this.callback = null;
  }
}

function probeFor(id: ElementId): ControlKey {
  const name = truncateUtf8(id.name, ELEM_NAME_MAXLEN);
  return { id: { ...id, name }, compareWeight: getCompareWeight(name) };
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export interface ControlCacheOptions {
  compare?: ControlComparator;
  /** Maximum number of cached elements. Default: unbounded. */
  capacity?: number;
}

export class ControlCache {
  readonly transport: ControlTransport;
  private readonly elems: SortedSequence<ControlElement, ControlKey>;
  private callback: ControlCacheCallback | null = null;

  constructor(transport: ControlTransport, options: ControlCacheOptions = {}) {
    this.transport = transport;
    this.elems = new SortedSequence<ControlElement, ControlKey>(
      options.compare ?? compareControlsDefault,
      { capacity: options.capacity },
    );
  }

  get count(): number {
    return this.elems.count;
  }

  setCallback(callback: ControlCacheCallback | null): void {
    this.callback = callback;
  }

  /**
   * Enumerate every element from the transport, sort, then announce each
   * one in sorted order. On an allocation failure the cache stays empty.
   */
  load(): Result<void> {
    assert(this.elems.count === 0, "cache is already loaded");

    let listed = this.transport.list(0);
    if (!listed.ok) return listed;
    // The element count can grow between the sizing call and the fetch.
    while (listed.value.count !== listed.value.ids.length) {
      listed = this.transport.list(listed.value.count);
      if (!listed.ok) return listed;
    }

    const elements = listed.value.ids.map((id) => new ControlElement(this, id));
    const loaded = this.elems.replaceAll(elements);
    if (!loaded.ok) {
      this.elems.clear();
      return loaded;
    }
    log.debug(`loaded ${elements.length} controls from ${this.transport.name}`);

    for (const elem of this.elems) {
      const err = this.throwEvent(EVENT_MASK_ADD, elem);
      if (err instanceof MixerError) return failWith(err);
    }
    return OK;
  }

  /** Binary search with the active comparator; `dir` is the insertion hint on a miss. */
  search(id: ElementId): SearchResult {
    return this.elems.search(probeFor(id));
  }

  find(id: ElementId): ControlElement | null {
    return this.elems.find(probeFor(id));
  }

  /** Cache a new element and announce it. */
  insert(id: ElementId): Result<ControlElement> {
    const elem = new ControlElement(this, id);
    const inserted = this.elems.insert(elem);
    if (!inserted.ok) return inserted;
    const err = this.throwEvent(EVENT_MASK_ADD, elem);
    if (err instanceof MixerError) return failWith(err);
    return ok(elem);
  }

  /** Announce the removal to the element's subscriber, then drop it. */
  remove(elem: ControlElement): Result<void> {
    const idx = this.elems.indexOf(elem);
    if (idx < 0) return fail("NotFound", `control "${elem.name}" is not cached`);
    return this.removeAt(idx);
  }

  /**
   * Replace the comparator (null restores the default) and re-sort.
   * The previous comparator stays active if sorting fails.
   */
  setCompare(compare: ControlComparator | null): Result<void> {
    return this.elems.resort(compare ?? compareControlsDefault);
  }

  handleEvent(event: ControlEvent): Result<void> {
    const { mask, id } = event;
    if (mask === EVENT_MASK_REMOVE) {
      const { index, dir } = this.search(id);
      if (index < 0 || dir !== 0) {
        return fail("NotFound", `remove event for unknown control "${id.name}"`);
      }
      return this.removeAt(index);
    }
    if (mask & EVENT_MASK_ADD) {
      const inserted = this.insert(id);
      if (!inserted.ok) return inserted;
    }
    if (mask & (EVENT_MASK_VALUE | EVENT_MASK_INFO)) {
      const elem = this.find(id);
      if (!elem) return fail("NotFound", `event for unknown control "${id.name}"`);
      const err = elem.throwEvent(mask & (EVENT_MASK_VALUE | EVENT_MASK_INFO));
      if (err instanceof MixerError) return failWith(err);
    }
    return OK;
  }

  /** Drain pending transport events; returns how many were handled. */
  handleEvents(): Result<number> {
    let count = 0;
    for (;;) {
      const next = this.transport.readEvent();
      if (!next.ok) return next;
      if (next.value === null) break;
      const handled = this.handleEvent(next.value);
      if (!handled.ok) return handled;
      count++;
    }
    return ok(count);
  }

  first(): ControlElement | null {
    return this.elems.first();
  }

  last(): ControlElement | null {
    return this.elems.last();
  }

  next(elem: ControlElement): ControlElement | null {
    return this.elems.next(elem);
  }

  prev(elem: ControlElement): ControlElement | null {
    return this.elems.prev(elem);
  }

  [Symbol.iterator](): IterableIterator<ControlElement> {
    return this.elems[Symbol.iterator]();
  }

  pollDescriptors(): PollDescriptor[] {
    return this.transport.pollDescriptors();
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return this.transport.waitReady(timeoutMs, signal);
  }

  /** Remove every element, last first, announcing each removal. */
  free(): void {
    while (this.elems.count > 0) {
      const removed = this.removeAt(this.elems.count - 1);
      if (!removed.ok) log.warn(`while freeing ${this.transport.name}: ${removed.error.message}`);
    }
  }

  close(): Result<void> {
    this.free();
    return this.transport.close();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private removeAt(index: number): Result<void> {
    const elem = this.elems.at(index);
    assert(elem, `no control at ${index}`);
    const err = elem.throwEvent(EVENT_MASK_REMOVE);
    this.elems.removeAt(index);
    elem.release();
    if (err instanceof MixerError) return failWith(err);
    return OK;
  }

  private throwEvent(mask: number, elem: ControlElement): MixerError | void {
    return this.callback?.(mask, elem);
  }
}
