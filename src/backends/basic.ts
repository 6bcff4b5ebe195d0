/**
 * Name-grouping backend.
 *
 * Folds mixer-interface controls into simple elements by their name
 * suffix: "PCM Playback Volume" and "PCM Playback Switch" both become the
 * playback half of "PCM". Enumerated controls become their own element.
 *
 *   "<Base> Playback Volume|Switch" -> playback volume/switch
 *   "<Base> Capture Volume|Switch"  -> capture volume/switch
 *   "<Base> Volume|Switch"          -> common volume/switch
 *   enumerated "<Name>"             -> capture enum if the name says Capture
 */

import { OK, fail, ok, type MixerError, type Result } from "../core/errors.js";
import type { ControlElement } from "../core/control-cache.js";
import type { Mixer, MixerElement } from "../core/mixer.js";
import { Cap, type Direction, type ElementOps, type Rounding, type VolumeRange } from "../core/types.js";
import {
  EVENT_MASK_ADD,
  EVENT_MASK_INFO,
  EVENT_MASK_REMOVE,
  EVENT_MASK_VALUE,
  type ElementInfo,
} from "../transport/types.js";
import type { Logger } from "../utils/logger.js";
import { attachDevice } from "./none.js";
import type { MixerBackend } from "./types.js";

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type Role =
  | "pvolume"
  | "pswitch"
  | "cvolume"
  | "cswitch"
  | "gvolume"
  | "gswitch"
  | "penum"
  | "cenum";

export interface Classified {
  base: string;
  role: Role;
}

const SUFFIXES: [suffix: string, role: Role][] = [
  ["Playback Volume", "pvolume"],
  ["Playback Switch", "pswitch"],
  ["Capture Volume", "cvolume"],
  ["Capture Switch", "cswitch"],
  ["Volume", "gvolume"],
  ["Switch", "gswitch"],
];

/**
 * Map a raw control to the simple element it belongs to, or null when
 * this backend has no use for it.
 */
export function classifyControl(info: ElementInfo): Classified | null {
  const { name, iface } = info.id;
  if (iface !== "mixer") return null;

  if (info.type === "enumerated") {
    return { base: name, role: name.includes("Capture") ? "cenum" : "penum" };
  }

  for (const [suffix, role] of SUFFIXES) {
    let base: string;
    if (name === suffix) {
      // "Capture Volume" alone is the capture half of "Capture".
      base = suffix.split(" ")[0];
      if (role === "gvolume" || role === "gswitch") return null;
    } else if (name.endsWith(` ${suffix}`)) {
      base = name.slice(0, -suffix.length - 1);
    } else {
      continue;
    }
    const isVolume = role.endsWith("volume");
    if (isVolume && info.type !== "integer") return null;
    return { base, role };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Per-element state
// ---------------------------------------------------------------------------

interface RoleSlot {
  celem: ControlElement;
  info: ElementInfo;
  /** Range presented to the user; follows the raw range until set. */
  user: VolumeRange;
  userSet: boolean;
}

export class BasicElementState {
  readonly roles = new Map<Role, RoleSlot>();

  caps(): number {
    let caps = 0;
    for (const [role, slot] of this.roles) {
      const joined = slot.info.count === 1;
      switch (role) {
        case "pvolume":
          caps |= Cap.PVolume | (joined ? Cap.PVolumeJoin : 0);
          break;
        case "pswitch":
          caps |= Cap.PSwitch | (joined ? Cap.PSwitchJoin : 0);
          break;
        case "cvolume":
          caps |= Cap.CVolume | (joined ? Cap.CVolumeJoin : 0);
          break;
        case "cswitch":
          caps |= Cap.CSwitch | (joined ? Cap.CSwitchJoin : 0);
          break;
        case "gvolume":
          caps |= Cap.GVolume;
          break;
        case "gswitch":
          caps |= Cap.GSwitch;
          break;
        case "penum":
          caps |= Cap.PEnum;
          break;
        case "cenum":
          caps |= Cap.CEnum;
          break;
      }
    }
    return caps;
  }

  roleOf(celem: ControlElement): Role | null {
    for (const [role, slot] of this.roles) {
      if (slot.celem === celem) return role;
    }
    return null;
  }
}

function volumeRole(dir: Direction): Role {
  if (dir === "playback") return "pvolume";
  if (dir === "capture") return "cvolume";
  return "gvolume";
}

function switchRole(dir: Direction): Role {
  if (dir === "playback") return "pswitch";
  if (dir === "capture") return "cswitch";
  return "gswitch";
}

function stateOf(elem: MixerElement): BasicElementState | null {
  const state = elem.getPrivate();
  return state instanceof BasicElementState ? state : null;
}

function slotFor(elem: MixerElement, role: Role): Result<RoleSlot> {
  const slot = stateOf(elem)?.roles.get(role);
  if (!slot) return fail("Unsupported", `element "${elem.name}" has no ${role} control`);
  return ok(slot);
}

function enumSlot(elem: MixerElement): Result<RoleSlot> {
  const roles = stateOf(elem)?.roles;
  const slot = roles?.get("penum") ?? roles?.get("cenum");
  if (!slot) return fail("Unsupported", `element "${elem.name}" is not enumerated`);
  return ok(slot);
}

// ---------------------------------------------------------------------------
// Value conversion
// ---------------------------------------------------------------------------

function rescale(value: number, from: VolumeRange, to: VolumeRange): number {
  if (from.max === from.min) return to.min;
  return to.min + Math.round(((value - from.min) * (to.max - to.min)) / (from.max - from.min));
}

function rawRange(info: ElementInfo): VolumeRange {
  return { min: info.min, max: info.max };
}

function dbRange(slot: RoleSlot): Result<VolumeRange> {
  const { dbMin, dbMax } = slot.info;
  if (dbMin === undefined || dbMax === undefined) {
    return fail("Unsupported", `control "${slot.info.id.name}" has no dB information`);
  }
  return ok({ min: dbMin, max: dbMax });
}

function rawToDb(slot: RoleSlot, raw: number): Result<number> {
  const db = dbRange(slot);
  if (!db.ok) return db;
  return ok(rescale(raw, rawRange(slot.info), db.value));
}

function dbToRaw(slot: RoleSlot, db: number, rounding: Rounding): Result<number> {
  const range = dbRange(slot);
  if (!range.ok) return range;
  const { min, max } = slot.info;
  if (range.value.max === range.value.min) return ok(min);
  const exact = min + ((db - range.value.min) * (max - min)) / (range.value.max - range.value.min);
  const rounded = rounding < 0 ? Math.floor(exact) : rounding > 0 ? Math.ceil(exact) : Math.round(exact);
  return ok(Math.min(max, Math.max(min, rounded)));
}

/** Value index for a channel; mono controls answer on every channel. */
function channelIndex(slot: RoleSlot, channel: number): Result<number> {
  if (slot.info.count === 1) return ok(0);
  if (!Number.isInteger(channel) || channel < 0 || channel >= slot.info.count) {
    return fail("InvalidArgument", `control "${slot.info.id.name}" has no channel ${channel}`);
  }
  return ok(channel);
}

function readChannel(slot: RoleSlot, channel: number): Result<number> {
  const idx = channelIndex(slot, channel);
  if (!idx.ok) return idx;
  const values = slot.celem.read();
  if (!values.ok) return values;
  return ok(values.value[idx.value]);
}

function writeChannel(slot: RoleSlot, channel: number, raw: number): Result<void> {
  const idx = channelIndex(slot, channel);
  if (!idx.ok) return idx;
  const values = slot.celem.read();
  if (!values.ok) return values;
  const next = values.value.slice();
  next[idx.value] = raw;
  const written = slot.celem.write(next);
  return written.ok ? OK : written;
}

// ---------------------------------------------------------------------------
// Capability table
// ---------------------------------------------------------------------------

export const basicOps: ElementOps = {
  isActive: () => true,

  hasChannel(elem, dir, channel) {
    return channel >= 0 && channel < basicOps.getChannels(elem, dir);
  },

  isEnumerated(elem, dir) {
    const roles = stateOf(elem)?.roles;
    if (!roles) return false;
    if (dir === "playback") return roles.has("penum");
    if (dir === "capture") return roles.has("cenum");
    return roles.has("penum") || roles.has("cenum");
  },

  getEnumCount(elem) {
    const slot = enumSlot(elem);
    if (!slot.ok) return slot;
    return ok(slot.value.info.items?.length ?? 0);
  },

  getChannels(elem, dir) {
    const roles = stateOf(elem)?.roles;
    const slot = roles?.get(volumeRole(dir)) ?? roles?.get(switchRole(dir));
    return slot?.info.count ?? 0;
  },

  getRange(elem, dir) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    return ok({ ...slot.value.user });
  },

  setRange(elem, dir, range) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    slot.value.user = { ...range };
    slot.value.userSet = true;
    return OK;
  },

  getDbRange(elem, dir) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    return dbRange(slot.value);
  },

  askVolDb(elem, dir, value) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    return rawToDb(slot.value, rescale(value, slot.value.user, rawRange(slot.value.info)));
  },

  askDbVol(elem, dir, db, rounding) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    const raw = dbToRaw(slot.value, db, rounding);
    if (!raw.ok) return raw;
    return ok(rescale(raw.value, rawRange(slot.value.info), slot.value.user));
  },

  getVolume(elem, dir, channel) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    const raw = readChannel(slot.value, channel);
    if (!raw.ok) return raw;
    return ok(rescale(raw.value, rawRange(slot.value.info), slot.value.user));
  },

  getDb(elem, dir, channel) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    const raw = readChannel(slot.value, channel);
    if (!raw.ok) return raw;
    return rawToDb(slot.value, raw.value);
  },

  setVolume(elem, dir, channel, value) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    const { user } = slot.value;
    if (value < user.min || value > user.max) {
      return fail("InvalidArgument", `volume ${value} outside [${user.min}, ${user.max}]`);
    }
    return writeChannel(slot.value, channel, rescale(value, user, rawRange(slot.value.info)));
  },

  setDb(elem, dir, channel, db, rounding) {
    const slot = slotFor(elem, volumeRole(dir));
    if (!slot.ok) return slot;
    const raw = dbToRaw(slot.value, db, rounding);
    if (!raw.ok) return raw;
    return writeChannel(slot.value, channel, raw.value);
  },

  getSwitch(elem, dir, channel) {
    const slot = slotFor(elem, switchRole(dir));
    if (!slot.ok) return slot;
    const raw = readChannel(slot.value, channel);
    if (!raw.ok) return raw;
    return ok(raw.value !== slot.value.info.min);
  },

  setSwitch(elem, dir, channel, on) {
    const slot = slotFor(elem, switchRole(dir));
    if (!slot.ok) return slot;
    const { min, max } = slot.value.info;
    return writeChannel(slot.value, channel, on ? max : min);
  },

  enumItemName(elem, item) {
    const slot = enumSlot(elem);
    if (!slot.ok) return slot;
    const name = slot.value.info.items?.[item];
    if (name === undefined) {
      return fail("InvalidArgument", `element "${elem.name}" has no item ${item}`);
    }
    return ok(name);
  },

  getEnumItem(elem, channel) {
    const slot = enumSlot(elem);
    if (!slot.ok) return slot;
    return readChannel(slot.value, channel);
  },

  setEnumItem(elem, channel, item) {
    const slot = enumSlot(elem);
    if (!slot.ok) return slot;
    return writeChannel(slot.value, channel, item);
  },
};

// ---------------------------------------------------------------------------
// Event handling
// ---------------------------------------------------------------------------

function onAdd(mixer: Mixer, celem: ControlElement, log: Logger): MixerError | void {
  const info = celem.info();
  if (!info.ok) return info.error;
  const classified = classifyControl(info.value);
  if (!classified) {
    log.debug(`ignoring control "${celem.name}"`);
    return;
  }
  const slot: RoleSlot = { celem, info: info.value, user: rawRange(info.value), userSet: false };
  const id = { name: classified.base, index: celem.index };

  const existing = mixer.findElement(id);
  const existingState = existing ? stateOf(existing) : null;
  if (existing && existingState) {
    if (existingState.roles.has(classified.role)) {
      log.warn(`"${celem.name}" duplicates the ${classified.role} of "${existing.name}"`);
      return;
    }
    existingState.roles.set(classified.role, slot);
    const attached = mixer.attach(existing, celem);
    if (!attached.ok) return attached.error;
    existing.caps = existingState.caps();
    const announced = mixer.elemInfo(existing);
    return announced.ok ? undefined : announced.error;
  }

  const state = new BasicElementState();
  state.roles.set(classified.role, slot);
  const elem = mixer.createElement({
    id,
    ops: basicOps,
    caps: state.caps(),
    privateData: state,
    privateFree: () => state.roles.clear(),
  });
  const attached = mixer.attach(elem, celem);
  if (!attached.ok) return attached.error;
  const added = mixer.addElement(elem);
  if (!added.ok) {
    mixer.detach(elem, celem);
    return added.error;
  }
}

function onRemove(mixer: Mixer, celem: ControlElement, melem: MixerElement): MixerError | void {
  const state = stateOf(melem);
  const role = state?.roleOf(celem);
  if (!state || !role) return;
  state.roles.delete(role);
  if (state.roles.size === 0) {
    const removed = mixer.removeElement(melem);
    return removed.ok ? undefined : removed.error;
  }
  melem.caps = state.caps();
  const announced = mixer.elemInfo(melem);
  return announced.ok ? undefined : announced.error;
}

function onChange(mixer: Mixer, mask: number, celem: ControlElement, melem: MixerElement): MixerError | void {
  if (mask & EVENT_MASK_INFO) {
    const state = stateOf(melem);
    const role = state?.roleOf(celem);
    const slot = state && role ? state.roles.get(role) : undefined;
    if (state && slot) {
      const info = celem.info();
      if (!info.ok) return info.error;
      slot.info = info.value;
      if (!slot.userSet) slot.user = rawRange(info.value);
      // The channel count decides the joined bits.
      melem.caps = state.caps();
    }
    const announced = mixer.elemInfo(melem);
    if (!announced.ok) return announced.error;
  }
  if (mask & EVENT_MASK_VALUE) {
    const announced = mixer.elemValue(melem);
    if (!announced.ok) return announced.error;
  }
}

export const basicBackend: MixerBackend = {
  type: "basic",
  open(mixer, ctx) {
    const attached = attachDevice(mixer, ctx);
    if (!attached.ok) return attached;
    mixer.setEventHandler((mask, celem, melem) => {
      if (melem === null) {
        return mask & EVENT_MASK_ADD ? onAdd(mixer, celem, ctx.logger) : undefined;
      }
      if (mask === EVENT_MASK_REMOVE) return onRemove(mixer, celem, melem);
      return onChange(mixer, mask, celem, melem);
    });
    return OK;
  },
};
