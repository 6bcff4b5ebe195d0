/**
 * Mixer MCP tools: inspect and drive open mixers.
 *
 * Executors return human-readable text and throw MixerError on failure;
 * the server entry point turns that into an error response.
 */

import { MixerError, ok, unwrap, type Result } from "../core/errors.js";
import type { Mixer, MixerElement } from "../core/mixer.js";
import * as simple from "../core/simple.js";
import { Cap, type Direction } from "../core/types.js";
import type { MixerSession } from "./session.js";

const DIRECTIONS: Direction[] = ["playback", "capture", "common"];

const CAP_NAMES: [bit: number, name: string][] = [
  [Cap.GVolume, "volume"],
  [Cap.GSwitch, "switch"],
  [Cap.PVolume, "pvolume"],
  [Cap.PVolumeJoin, "pvolume-joined"],
  [Cap.PSwitch, "pswitch"],
  [Cap.PSwitchJoin, "pswitch-joined"],
  [Cap.CVolume, "cvolume"],
  [Cap.CVolumeJoin, "cvolume-joined"],
  [Cap.CSwitch, "cswitch"],
  [Cap.CSwitchJoin, "cswitch-joined"],
  [Cap.CSwitchExcl, "cswitch-exclusive"],
  [Cap.PEnum, "penum"],
  [Cap.CEnum, "cenum"],
];

export interface MixerInput {
  mixer: string;
}

export interface ElementInput extends MixerInput {
  element: string;
  index: number;
}

export interface SetVolumeInput extends ElementInput {
  direction: Direction;
  channel?: number;
  value: number;
  db: boolean;
}

export interface SetSwitchInput extends ElementInput {
  direction: Direction;
  channel?: number;
  on: boolean;
}

export interface SetEnumItemInput extends ElementInput {
  channel: number;
  item: number | string;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatCaps(caps: number): string {
  const names = CAP_NAMES.filter(([bit]) => caps & bit).map(([, name]) => name);
  return names.length > 0 ? names.join(",") : "none";
}

function channelValues<T>(
  elem: MixerElement,
  dir: Direction,
  read: (channel: number) => Result<T>,
): string {
  const values: string[] = [];
  for (let chn = 0; chn < simple.getChannels(elem, dir); chn++) {
    const value = read(chn);
    values.push(value.ok ? String(value.value) : "?");
  }
  return `[${values.join(", ")}]`;
}

function describeDirection(elem: MixerElement, dir: Direction): string[] {
  const parts: string[] = [];
  if (simple.hasVolume(elem, dir)) {
    const range = unwrap(simple.getVolumeRange(elem, dir));
    const volumes = channelValues(elem, dir, (chn) => simple.getVolume(elem, dir, chn));
    parts.push(`${dir} volume ${volumes} range ${range.min}..${range.max}`);
  }
  if (simple.hasSwitch(elem, dir)) {
    const switches = channelValues(elem, dir, (chn) => {
      const on = simple.getSwitch(elem, dir, chn);
      return on.ok ? ok(on.value ? "on" : "off") : on;
    });
    parts.push(`${dir} switch ${switches}`);
  }
  return parts;
}

function describeElement(elem: MixerElement): string {
  const lines = [`"${elem.name}",${elem.index}  caps=${formatCaps(elem.caps)}`];
  for (const dir of DIRECTIONS) {
    for (const part of describeDirection(elem, dir)) lines.push(`  ${part}`);
  }
  if (simple.isEnum(elem, "common")) {
    const count = unwrap(simple.getEnumItems(elem));
    const names: string[] = [];
    for (let i = 0; i < count; i++) names.push(unwrap(simple.getEnumItemName(elem, i)));
    const current = unwrap(simple.getEnumItem(elem, 0));
    lines.push(`  items [${names.join(", ")}] selected ${names[current] ?? current}`);
  }
  return lines.join("\n");
}

function findElement(mixer: Mixer, input: ElementInput): MixerElement {
  const elem = mixer.findElement({ name: input.element, index: input.index });
  if (!elem) {
    const available = [...mixer].map((e) => e.name).join(", ");
    throw new MixerError(
      "NotFound",
      `No element "${input.element}",${input.index} on ${mixer.name}. Available: ${available || "none"}`,
    );
  }
  return elem;
}

// ---------------------------------------------------------------------------
// Executors
// ---------------------------------------------------------------------------

/** Raw controls of every attached card, in cache order. */
export async function executeListControls(session: MixerSession, input: MixerInput): Promise<string> {
  const mixer = await session.get(input.mixer);
  const lines: string[] = [];
  for (const cache of mixer.controls) {
    lines.push(`${cache.transport.name} (${cache.count} controls)`);
    for (const celem of cache) {
      lines.push(
        `  #${celem.numid} ${celem.iface} "${celem.name}",${celem.index}  weight=${celem.compareWeight}`,
      );
    }
  }
  if (lines.length === 0) return `${mixer.name}: no controls attached`;
  return lines.join("\n");
}

/** Simple elements with their capabilities and current values. */
export async function executeListElements(session: MixerSession, input: MixerInput): Promise<string> {
  const mixer = await session.get(input.mixer);
  if (mixer.count === 0) return `${mixer.name}: no simple elements`;
  const blocks = [...mixer].map(describeElement);
  return `${mixer.name}: ${mixer.count} elements\n${blocks.join("\n")}`;
}

export async function executeSetVolume(session: MixerSession, input: SetVolumeInput): Promise<string> {
  const mixer = await session.get(input.mixer);
  const elem = findElement(mixer, input);
  const { direction: dir, channel, value } = input;

  if (input.db) {
    unwrap(
      channel === undefined
        ? simple.setDbAll(elem, dir, value)
        : simple.setDb(elem, dir, channel, value),
    );
  } else {
    unwrap(
      channel === undefined
        ? simple.setVolumeAll(elem, dir, value)
        : simple.setVolume(elem, dir, channel, value),
    );
  }

  const target = channel === undefined ? "all channels" : `channel ${channel} (${simple.channelName(channel)})`;
  const unit = input.db ? " (1/100 dB)" : "";
  return `Set ${dir} volume of "${elem.name}" ${target} to ${value}${unit}\n${describeElement(elem)}`;
}

export async function executeSetSwitch(session: MixerSession, input: SetSwitchInput): Promise<string> {
  const mixer = await session.get(input.mixer);
  const elem = findElement(mixer, input);
  const { direction: dir, channel, on } = input;

  unwrap(
    channel === undefined
      ? simple.setSwitchAll(elem, dir, on)
      : simple.setSwitch(elem, dir, channel, on),
  );

  const target = channel === undefined ? "all channels" : `channel ${channel} (${simple.channelName(channel)})`;
  return `Set ${dir} switch of "${elem.name}" ${target} ${on ? "on" : "off"}\n${describeElement(elem)}`;
}

export async function executeSetEnumItem(session: MixerSession, input: SetEnumItemInput): Promise<string> {
  const mixer = await session.get(input.mixer);
  const elem = findElement(mixer, input);

  let item: number;
  if (typeof input.item === "number") {
    item = input.item;
  } else {
    const count = unwrap(simple.getEnumItems(elem));
    const names: string[] = [];
    for (let i = 0; i < count; i++) names.push(unwrap(simple.getEnumItemName(elem, i)));
    item = names.indexOf(input.item);
    if (item < 0) {
      throw new MixerError(
        "InvalidArgument",
        `"${elem.name}" has no item "${input.item}". Items: ${names.join(", ")}`,
      );
    }
  }

  unwrap(simple.setEnumItem(elem, input.channel, item));
  const name = unwrap(simple.getEnumItemName(elem, item));
  return `Selected item ${item} ("${name}") of "${elem.name}" on channel ${input.channel}`;
}

export async function executeHandleEvents(session: MixerSession, input: MixerInput): Promise<string> {
  const mixer = await session.get(input.mixer);
  const count = unwrap(mixer.handleEvents());
  return `${mixer.name}: handled events, ${count} element event${count === 1 ? "" : "s"} thrown`;
}
