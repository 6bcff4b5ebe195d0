/**
 * Control transport contract.
 *
 * A transport exposes a flat, unordered set of raw control elements with
 * read/write/poll semantics. The cache layer consumes it; nothing here
 * knows about ordering or grouping.
 */

import type { Result } from "../core/errors.js";

// ---------------------------------------------------------------------------
// Element identification
// ---------------------------------------------------------------------------

export type ElementInterface =
  | "card"
  | "hwdep"
  | "mixer"
  | "pcm"
  | "rawmidi"
  | "timer"
  | "sequencer";

/** Interface classes in driver numbering order; the default comparator sorts by it. */
export const INTERFACE_ORDER: Record<ElementInterface, number> = {
  card: 0,
  hwdep: 1,
  mixer: 2,
  pcm: 3,
  rawmidi: 4,
  timer: 5,
  sequencer: 6,
};

/** Longest element name the driver keeps, in UTF-8 bytes (44 with the terminator). */
export const ELEM_NAME_MAXLEN = 43;

export interface ElementId {
  /** Driver-assigned numeric id, stable for the control's lifetime. 0 = unknown. */
  numid: number;
  iface: ElementInterface;
  device: number;
  subdevice: number;
  name: string;
  /** Disambiguates controls sharing a name. */
  index: number;
}

export type ElementType = "boolean" | "integer" | "enumerated";

export interface ElementInfo {
  id: ElementId;
  type: ElementType;
  /** Number of channels (values) the control carries. */
  count: number;
  min: number;
  max: number;
  /** dB range in hundredths of a dB, when the driver publishes one. */
  dbMin?: number;
  dbMax?: number;
  /** Item names for enumerated controls. */
  items?: string[];
  readable: boolean;
  writable: boolean;
}

export interface ElementList {
  /** Total number of elements the transport currently has. */
  count: number;
  /** Up to `space` ids; fewer than `count` means the caller must ask again. */
  ids: ElementId[];
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export const EVENT_MASK_VALUE = 1 << 0;
export const EVENT_MASK_INFO = 1 << 1;
export const EVENT_MASK_ADD = 1 << 2;
export const EVENT_MASK_TLV = 1 << 3;
/** A remove is never combined with another bit. */
export const EVENT_MASK_REMOVE = 0xffffffff;

export interface ControlEvent {
  mask: number;
  id: ElementId;
}

export const ControlEvents = {
  added: (id: ElementId): ControlEvent => ({ mask: EVENT_MASK_ADD, id }),
  removed: (id: ElementId): ControlEvent => ({ mask: EVENT_MASK_REMOVE, id }),
  valueChanged: (id: ElementId): ControlEvent => ({ mask: EVENT_MASK_VALUE, id }),
  infoChanged: (id: ElementId): ControlEvent => ({ mask: EVENT_MASK_INFO, id }),
};

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

export const POLLIN = 0x001;
export const POLLERR = 0x008;
export const POLLNVAL = 0x020;

export interface PollDescriptor {
  fd: number;
  events: number;
  revents: number;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface ControlTransport {
  readonly name: string;
  list(space: number): Result<ElementList>;
  info(id: ElementId): Result<ElementInfo>;
  read(id: ElementId): Result<number[]>;
  /** Resolves to true when the stored value changed. */
  write(id: ElementId, values: number[]): Result<boolean>;
  subscribeEvents(enable: boolean): Result<void>;
  pollDescriptors(): PollDescriptor[];
  /** Next pending event, or null when reading would block. */
  readEvent(): Result<ControlEvent | null>;
  /**
   * Wait until an event is pending. Resolves false on timeout or abort.
   * A timeout of 0 checks readiness without waiting.
   */
  waitReady(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;
  close(): Result<void>;
}
