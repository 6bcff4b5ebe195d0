/**
 * Simple-element registry.
 *
 * Owns the sorted set of simple elements, the attachment relation to raw
 * control elements, and the control caches feeding it. Raw-element events
 * are routed through the backend's event handler and re-published to
 * registry subscribers.
 */

import { AttachmentRelation } from "./attachment.js";
import { compareNames, getCompareWeight } from "./compare-weight.js";
import { ControlCache, type ControlElement } from "./control-cache.js";
import { MixerError, OK, fail, failWith, ok, type Result } from "./errors.js";
import { SortedSequence } from "./sorted-sequence.js";
import {
  MIXER_ELEM_NAME_MAXLEN,
  type ElementOps,
  type MixerElementId,
} from "./types.js";
import {
  EVENT_MASK_ADD,
  EVENT_MASK_INFO,
  EVENT_MASK_REMOVE,
  EVENT_MASK_VALUE,
  POLLERR,
  POLLIN,
  POLLNVAL,
  type ControlTransport,
  type PollDescriptor,
} from "../transport/types.js";
import { createLogger } from "../utils/logger.js";
import { truncateUtf8 } from "../utils/text.js";

const log = createLogger("mixer");

/** Maximum number of control transports one mixer may attach. */
export const MAX_CONTROLS = 8;

/** Transports currently attached to any mixer. */
const attachedTransports = new WeakSet<ControlTransport>();

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ElementState = "unattached" | "attached" | "removed";

export type MixerCallback = (mask: number, elem: MixerElement) => MixerError | void;
export type MixerElementCallback = (mask: number, elem: MixerElement) => MixerError | void;

/**
 * Backend hook for raw-element events. `melem` is null for ADD, which is
 * where a backend decides what to build from the new control.
 */
export type MixerEventHandler = (
  mask: number,
  celem: ControlElement,
  melem: MixerElement | null,
) => MixerError | void;

export interface MixerElementKey {
  readonly id: MixerElementId;
  readonly compareWeight: number;
}

export type MixerComparator = (a: MixerElementKey, b: MixerElementKey) => number;

export interface MixerElementInit {
  id: MixerElementId;
  /** Defaults to the weight of the element name. */
  compareWeight?: number;
  ops: ElementOps;
  caps?: number;
  captureGroup?: number;
  privateData?: unknown;
  privateFree?: (elem: MixerElement) => void;
}

export const compareMixerElementsDefault: MixerComparator = (a, b) => {
  const d = a.compareWeight - b.compareWeight;
  if (d !== 0) return d;
  const n = compareNames(a.id.name, b.id.name);
  if (n !== 0) return n;
  return a.id.index - b.id.index;
};

// ---------------------------------------------------------------------------
// Simple element
// ---------------------------------------------------------------------------

export class MixerElement implements MixerElementKey {
  readonly mixer: Mixer;
  readonly id: MixerElementId;
  readonly compareWeight: number;
  readonly ops: ElementOps;
  caps: number;
  captureGroup: number;
  /** Free slot for the element subscriber. */
  callbackPrivate: unknown = undefined;
  private callback: MixerElementCallback | null = null;
  private readonly privateData: unknown;
  private readonly privateFree: ((elem: MixerElement) => void) | undefined;
  private removed = false;

  constructor(mixer: Mixer, init: MixerElementInit) {
    const name = truncateUtf8(init.id.name, MIXER_ELEM_NAME_MAXLEN);
    this.mixer = mixer;
    this.id = { name, index: init.id.index };
    this.compareWeight = init.compareWeight ?? getCompareWeight(name);
    this.ops = init.ops;
    this.caps = init.caps ?? 0;
    this.captureGroup = init.captureGroup ?? 0;
    this.privateData = init.privateData;
    this.privateFree = init.privateFree;
  }

  get name(): string {
    return this.id.name;
  }

  get index(): number {
    return this.id.index;
  }

  get state(): ElementState {
    if (this.removed) return "removed";
    return this.mixer.isEmpty(this) ? "unattached" : "attached";
  }

  getPrivate(): unknown {
    return this.privateData;
  }

  setCallback(callback: MixerElementCallback | null): void {
    this.callback = callback;
  }

  /** @internal */
  notify(mask: number): MixerError | void {
    return this.callback?.(mask, this);
  }

  /** @internal */
  release(): void {
    this.removed = true;
    this.callback = null;
    this.privateFree?.(this);
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export interface MixerOptions {
  compare?: MixerComparator;
  /** Capacity passed to every control cache this mixer attaches. */
  controlCapacity?: number;
}

export class Mixer {
  readonly name: string;
  /** Free slot for the registry subscriber. */
  callbackPrivate: unknown = undefined;
  private readonly elems: SortedSequence<MixerElement, MixerElementKey>;
  private readonly relation = new AttachmentRelation<MixerElement, ControlElement>();
  private readonly caches: ControlCache[] = [];
  private readonly controlCapacity: number | undefined;
  private callback: MixerCallback | null = null;
  private eventHandler: MixerEventHandler;
  private events = 0;

  constructor(name: string, options: MixerOptions = {}) {
    this.name = name;
    this.elems = new SortedSequence<MixerElement, MixerElementKey>(
      options.compare ?? compareMixerElementsDefault,
    );
    this.controlCapacity = options.controlCapacity;
    this.eventHandler = (mask, _celem, melem) => this.republish(mask, melem);
  }

  get count(): number {
    return this.elems.count;
  }

  /** Events thrown since the last handleEvents() call. */
  get eventCount(): number {
    return this.events;
  }

  get controls(): readonly ControlCache[] {
    return this.caches;
  }

  // -------------------------------------------------------------------------
  // Control attachment
  // -------------------------------------------------------------------------

  /** Put a transport under this mixer and subscribe to its events. */
  attachControl(transport: ControlTransport): Result<ControlCache> {
    if (attachedTransports.has(transport)) {
      return fail("Busy", `control "${transport.name}" is already attached to a mixer`);
    }
    if (this.caches.length >= MAX_CONTROLS) {
      return fail("InvalidArgument", `a mixer can attach at most ${MAX_CONTROLS} controls`);
    }
    const subscribed = transport.subscribeEvents(true);
    if (!subscribed.ok) return subscribed;

    const cache = new ControlCache(transport, { capacity: this.controlCapacity });
    cache.setCallback((mask, celem) => this.onControlEvent(mask, celem));
    this.caches.push(cache);
    attachedTransports.add(transport);
    log.debug(`${this.name}: attached ${transport.name}`);
    return ok(cache);
  }

  /** Load every attached control cache; backends build elements from the ADD events. */
  load(): Result<void> {
    for (const cache of this.caches) {
      if (cache.count > 0) continue;
      const loaded = cache.load();
      if (!loaded.ok) return loaded;
    }
    return OK;
  }

  setEventHandler(handler: MixerEventHandler): void {
    this.eventHandler = handler;
  }

  // -------------------------------------------------------------------------
  // Element lifecycle
  // -------------------------------------------------------------------------

  createElement(init: MixerElementInit): MixerElement {
    return new MixerElement(this, init);
  }

  addElement(elem: MixerElement): Result<void> {
    if (elem.mixer !== this) return fail("InvalidArgument", "element belongs to another mixer");
    if (elem.state === "removed") return fail("InvalidArgument", `element "${elem.name}" was removed`);
    const inserted = this.elems.insert(elem);
    if (!inserted.ok) return inserted;
    const err = this.throwEvent(EVENT_MASK_ADD, elem);
    if (err instanceof MixerError) return failWith(err);
    return OK;
  }

  /**
   * Detach every raw element, announce the removal, drop the element from
   * the registry and run its private-data destructor.
   */
  removeElement(elem: MixerElement): Result<void> {
    const idx = this.elems.indexOf(elem);
    if (idx < 0) return fail("InvalidArgument", `element "${elem.name}" is not registered`);
    this.relation.detachAll(elem);
    const err = this.throwEvent(EVENT_MASK_REMOVE, elem);
    this.elems.removeAt(idx);
    elem.release();
    if (err instanceof MixerError) return failWith(err);
    return OK;
  }

  attach(elem: MixerElement, celem: ControlElement): Result<void> {
    if (elem.state === "removed") return fail("InvalidArgument", `element "${elem.name}" was removed`);
    if (celem.isReleased) return fail("NotFound", `control "${celem.name}" was removed`);
    this.relation.attach(elem, celem);
    return OK;
  }

  /** Inverse of attach; a no-op for a pair that is not attached. */
  detach(elem: MixerElement, celem: ControlElement): void {
    this.relation.detach(elem, celem);
  }

  isEmpty(elem: MixerElement): boolean {
    return this.relation.isEmptyOfRawRefs(elem);
  }

  /** Raw elements attached to `elem`. */
  controlsOf(elem: MixerElement): ControlElement[] {
    return this.relation.rawOf(elem);
  }

  /** Simple elements referencing `celem`. */
  elementsOf(celem: ControlElement): MixerElement[] {
    return this.relation.abstractedOf(celem);
  }

  /** Whether `celem` still has an attachment bag. */
  hasAttachments(celem: ControlElement): boolean {
    return this.relation.hasRawBag(celem);
  }

  // -------------------------------------------------------------------------
  // Ordering and traversal
  // -------------------------------------------------------------------------

  setCompare(compare: MixerComparator | null): Result<void> {
    return this.elems.resort(compare ?? compareMixerElementsDefault);
  }

  findElement(id: MixerElementId): MixerElement | null {
    for (const elem of this.elems) {
      if (elem.id.name === id.name && elem.id.index === id.index) return elem;
    }
    return null;
  }

  first(): MixerElement | null {
    return this.elems.first();
  }

  last(): MixerElement | null {
    return this.elems.last();
  }

  next(elem: MixerElement): MixerElement | null {
    return this.elems.next(elem);
  }

  prev(elem: MixerElement): MixerElement | null {
    return this.elems.prev(elem);
  }

  [Symbol.iterator](): IterableIterator<MixerElement> {
    return this.elems[Symbol.iterator]();
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  setCallback(callback: MixerCallback | null): void {
    this.callback = callback;
  }

  /** Announce that an element's values changed. */
  elemValue(elem: MixerElement): Result<void> {
    const err = this.throwEvent(EVENT_MASK_VALUE, elem);
    return err instanceof MixerError ? failWith(err) : OK;
  }

  /** Announce that an element's description (caps, ranges) changed. */
  elemInfo(elem: MixerElement): Result<void> {
    const err = this.throwEvent(EVENT_MASK_INFO, elem);
    return err instanceof MixerError ? failWith(err) : OK;
  }

  /** Drain every attached control; returns the number of mixer events thrown. */
  handleEvents(): Result<number> {
    this.events = 0;
    for (const cache of this.caches) {
      const handled = cache.handleEvents();
      if (!handled.ok) return handled;
    }
    return ok(this.events);
  }

  pollDescriptors(): PollDescriptor[] {
    return this.caches.flatMap((cache) => cache.pollDescriptors());
  }

  pollDescriptorsRevents(pfds: PollDescriptor[]): Result<number> {
    if (pfds.length === 0) return fail("InvalidArgument", "no poll descriptors given");
    let revents = 0;
    for (const pfd of pfds) revents |= pfd.revents & (POLLIN | POLLERR | POLLNVAL);
    return ok(revents);
  }

  /**
   * Wait up to `timeoutMs` for any attached control to have events
   * pending. 0 polls without waiting; unbounded waits are not offered.
   */
  async wait(timeoutMs: number): Promise<Result<boolean>> {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      return fail("InvalidArgument", `timeout must be a finite number >= 0, got ${timeoutMs}`);
    }
    if (this.caches.length === 0) return ok(false);
    const controller = new AbortController();
    try {
      const ready = await Promise.race(
        this.caches.map((cache) => cache.wait(timeoutMs, controller.signal)),
      );
      return ok(ready);
    } finally {
      controller.abort();
    }
  }

  /**
   * Free every control (backends tear their elements down on the REMOVE
   * events), remove what is left and close the transports.
   */
  close(): Result<void> {
    let result: Result<void> = OK;
    for (const cache of this.caches) {
      const closed = cache.close();
      attachedTransports.delete(cache.transport);
      if (!closed.ok) result = closed;
    }
    this.caches.length = 0;
    for (let elem = this.elems.last(); elem !== null; elem = this.elems.last()) {
      const removed = this.removeElement(elem);
      if (!removed.ok) result = removed;
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private onControlEvent(mask: number, celem: ControlElement): MixerError | void {
    if (!(mask & EVENT_MASK_ADD)) return;
    celem.setCallback((elemMask, elem) => this.onControlElementEvent(elemMask, elem));
    return this.eventHandler(mask, celem, null);
  }

  private onControlElementEvent(mask: number, celem: ControlElement): MixerError | void {
    const members = this.relation.abstractedOf(celem);
    if (mask === EVENT_MASK_REMOVE) {
      // Removal must reach every member even when one of them fails.
      let res: MixerError | undefined;
      for (const melem of members) {
        if (!this.relation.isAttached(melem, celem)) continue;
        const err = this.eventHandler(mask, celem, melem);
        if (err instanceof MixerError) res = err;
        this.relation.detach(melem, celem);
      }
      return res;
    }
    if (mask & (EVENT_MASK_VALUE | EVENT_MASK_INFO)) {
      for (const melem of members) {
        if (!this.relation.isAttached(melem, celem)) continue;
        const err = this.eventHandler(mask, celem, melem);
        if (err instanceof MixerError) return err;
      }
    }
  }

  /** Default event handler: re-publish raw events on the simple element. */
  private republish(mask: number, melem: MixerElement | null): MixerError | void {
    if (melem === null) return;
    return this.throwEvent(mask, melem);
  }

  private throwEvent(mask: number, elem: MixerElement): MixerError | void {
    this.events++;
    const err = elem.notify(mask);
    if (err instanceof MixerError) return err;
    return this.callback?.(mask, elem);
  }
}
