/**
 * In-process control transport backed by a card profile.
 *
 * Holds the controls and their values in memory, queues change events
 * while subscribed and wakes pollers through an EventEmitter. Used by the
 * MCP server as its device and by the tests as a stand-in driver.
 */

import { EventEmitter } from "node:events";

import { OK, fail, ok, type Result } from "../core/errors.js";
import type { CardControl, CardProfile } from "../devices/types.js";
import {
  ControlEvents,
  POLLIN,
  POLLNVAL,
  type ControlEvent,
  type ControlTransport,
  type ElementId,
  type ElementInfo,
  type ElementList,
  type PollDescriptor,
} from "./types.js";

/** Description fields a hot-plugged driver may change in place. */
export interface InfoChanges {
  count?: number;
  range?: [number, number];
}

interface ControlSlot {
  info: ElementInfo;
  values: number[];
}

let nextFd = 100;

export class VirtualCard implements ControlTransport {
  readonly name: string;
  private readonly slots = new Map<number, ControlSlot>();
  private readonly queue: ControlEvent[] = [];
  private readonly emitter = new EventEmitter();
  private readonly fd = nextFd++;
  private nextNumid = 1;
  private subscribed = false;
  private closed = false;

  constructor(name: string, controls: CardControl[] = []) {
    this.name = name;
    // Waiters of every concurrent mixer.wait() race share this emitter.
    this.emitter.setMaxListeners(0);
    for (const control of controls) {
      const added = this.addControl(control);
      if (!added.ok) throw added.error;
    }
  }

  static fromProfile(profile: CardProfile, name = profile.name): VirtualCard {
    return new VirtualCard(name, profile.controls);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pendingEvents(): number {
    return this.queue.length;
  }

  // -------------------------------------------------------------------------
  // Hot-plug
  // -------------------------------------------------------------------------

  /** Create a control and announce it. */
  addControl(control: CardControl): Result<ElementId> {
    if (this.closed) return this.closedError();
    const id: ElementId = {
      numid: this.nextNumid,
      iface: control.iface ?? "mixer",
      device: 0,
      subdevice: 0,
      name: control.name,
      index: control.index ?? 0,
    };
    if (this.lookup(id, false)) {
      return fail("Busy", `control "${control.name}" index ${id.index} already exists`);
    }
    if (control.count < 1) return fail("InvalidArgument", `control "${control.name}" has no channels`);

    const info = describe(id, control);
    if (info.type === "enumerated" && (info.items ?? []).length === 0) {
      return fail("InvalidArgument", `enumerated control "${control.name}" has no items`);
    }
    const initial = clamp(control.initial ?? info.min, info.min, info.max);
    this.slots.set(id.numid, { info, values: new Array<number>(control.count).fill(initial) });
    this.nextNumid++;
    this.push(ControlEvents.added(id));
    return ok(id);
  }

  /** Drop a control and announce the removal. */
  removeControl(id: ElementId): Result<void> {
    if (this.closed) return this.closedError();
    const slot = this.lookup(id);
    if (!slot) return fail("NotFound", `no control "${id.name}" on ${this.name}`);
    this.slots.delete(slot.info.id.numid);
    this.push(ControlEvents.removed(slot.info.id));
    return OK;
  }

  /**
   * Announce a description change. A new channel count or range reshapes
   * the stored values: extra channels copy channel 0 and every value is
   * clamped into the range.
   */
  touchInfo(id: ElementId, changes: InfoChanges = {}): Result<void> {
    if (this.closed) return this.closedError();
    const slot = this.lookup(id);
    if (!slot) return fail("NotFound", `no control "${id.name}" on ${this.name}`);
    const { info } = slot;
    const count = changes.count ?? info.count;
    if (!Number.isInteger(count) || count < 1) {
      return fail("InvalidArgument", `control "${info.id.name}" cannot have ${count} channels`);
    }
    if (changes.range) {
      if (info.type !== "integer") {
        return fail("InvalidArgument", `control "${info.id.name}" has a fixed range`);
      }
      [info.min, info.max] = changes.range;
    }
    info.count = count;
    slot.values = Array.from({ length: count }, (_, i) =>
      clamp(slot.values[i] ?? slot.values[0], info.min, info.max),
    );
    this.push(ControlEvents.infoChanged(info.id));
    return OK;
  }

  // -------------------------------------------------------------------------
  // ControlTransport
  // -------------------------------------------------------------------------

  list(space: number): Result<ElementList> {
    if (this.closed) return this.closedError();
    const all = [...this.slots.values()].map((slot) => ({ ...slot.info.id }));
    return ok({ count: all.length, ids: all.slice(0, Math.max(0, space)) });
  }

  info(id: ElementId): Result<ElementInfo> {
    if (this.closed) return this.closedError();
    const slot = this.lookup(id);
    if (!slot) return fail("NotFound", `no control "${id.name}" on ${this.name}`);
    return ok({ ...slot.info, id: { ...slot.info.id }, items: slot.info.items?.slice() });
  }

  read(id: ElementId): Result<number[]> {
    if (this.closed) return this.closedError();
    const slot = this.lookup(id);
    if (!slot) return fail("NotFound", `no control "${id.name}" on ${this.name}`);
    return ok(slot.values.slice());
  }

  write(id: ElementId, values: number[]): Result<boolean> {
    if (this.closed) return this.closedError();
    const slot = this.lookup(id);
    if (!slot) return fail("NotFound", `no control "${id.name}" on ${this.name}`);
    const { info } = slot;
    if (!info.writable) return fail("InvalidArgument", `control "${info.id.name}" is read-only`);
    if (values.length !== info.count) {
      return fail(
        "InvalidArgument",
        `control "${info.id.name}" takes ${info.count} values, got ${values.length}`,
      );
    }
    for (const value of values) {
      if (!Number.isInteger(value) || value < info.min || value > info.max) {
        return fail(
          "InvalidArgument",
          `value ${value} out of range [${info.min}, ${info.max}] for "${info.id.name}"`,
        );
      }
    }

    const changed = values.some((value, i) => value !== slot.values[i]);
    if (changed) {
      slot.values = values.slice();
      this.push(ControlEvents.valueChanged(info.id));
    }
    return ok(changed);
  }

  subscribeEvents(enable: boolean): Result<void> {
    if (this.closed) return this.closedError();
    this.subscribed = enable;
    if (!enable) this.queue.length = 0;
    return OK;
  }

  pollDescriptors(): PollDescriptor[] {
    let revents = 0;
    if (this.closed) revents = POLLNVAL;
    else if (this.queue.length > 0) revents = POLLIN;
    return [{ fd: this.fd, events: POLLIN, revents }];
  }

  readEvent(): Result<ControlEvent | null> {
    if (this.closed) return this.closedError();
    return ok(this.queue.shift() ?? null);
  }

  waitReady(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    if (this.queue.length > 0) return Promise.resolve(true);
    if (timeoutMs <= 0 || signal?.aborted) return Promise.resolve(false);

    return new Promise((resolve) => {
      const finish = (ready: boolean) => {
        clearTimeout(timer);
        this.emitter.off("ready", onReady);
        signal?.removeEventListener("abort", onAbort);
        resolve(ready);
      };
      const onReady = () => finish(!this.closed && this.queue.length > 0);
      const onAbort = () => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);
      this.emitter.on("ready", onReady);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  close(): Result<void> {
    if (this.closed) return this.closedError();
    this.closed = true;
    this.subscribed = false;
    this.queue.length = 0;
    this.emitter.emit("ready");
    return OK;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private lookup(id: ElementId, byNumid = true): ControlSlot | undefined {
    if (byNumid && id.numid > 0) return this.slots.get(id.numid);
    for (const slot of this.slots.values()) {
      const other = slot.info.id;
      if (
        other.iface === id.iface &&
        other.device === id.device &&
        other.subdevice === id.subdevice &&
        other.name === id.name &&
        other.index === id.index
      ) {
        return slot;
      }
    }
    return undefined;
  }

  private push(event: ControlEvent): void {
    if (!this.subscribed) return;
    this.queue.push({ mask: event.mask, id: { ...event.id } });
    this.emitter.emit("ready");
  }

  private closedError(): Result<never> {
    return fail("Io", `control ${this.name} is closed`);
  }
}

function describe(id: ElementId, control: CardControl): ElementInfo {
  const info: ElementInfo = {
    id,
    type: control.type,
    count: control.count,
    min: 0,
    max: 1,
    readable: true,
    writable: true,
  };
  if (control.type === "integer") {
    [info.min, info.max] = control.range ?? [0, 100];
  } else if (control.type === "enumerated") {
    info.items = control.items?.slice() ?? [];
    info.max = info.items.length - 1;
  }
  if (control.db) [info.dbMin, info.dbMax] = control.db;
  return info;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
