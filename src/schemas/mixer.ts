/**
 * Zod schemas for mixer tool parameters.
 */

import { z } from "zod";

const mixerName = z
  .string()
  .min(1)
  .default("default")
  .describe('Mixer definition from the configuration. Default: "default".');

const elementName = z
  .string()
  .min(1)
  .max(59)
  .describe('Simple element name as shown by list_elements, e.g. "Master", "PCM".');

const elementIndex = z
  .number()
  .int()
  .min(0)
  .default(0)
  .describe("Element index, for elements sharing a name. Default: 0.");

const channel = z
  .number()
  .int()
  .min(0)
  .max(31)
  .optional()
  .describe("Channel (0 = front left, 1 = front right, ...). Omit to set every channel.");

export const listControlsSchema = {
  mixer: mixerName,
};

export const listElementsSchema = {
  mixer: mixerName,
};

export const setVolumeSchema = {
  mixer: mixerName,
  element: elementName,
  index: elementIndex,
  direction: z
    .enum(["playback", "capture", "common"])
    .default("playback")
    .describe('Which half of the element to change. Default: "playback".'),
  channel,
  value: z.number().describe("Volume in the element's range, or in hundredths of a dB when db is true."),
  db: z.boolean().default(false).describe("Interpret value as hundredths of a dB."),
};

export const setSwitchSchema = {
  mixer: mixerName,
  element: elementName,
  index: elementIndex,
  direction: z
    .enum(["playback", "capture", "common"])
    .default("playback")
    .describe('Which half of the element to change. Default: "playback".'),
  channel,
  on: z.boolean().describe("true = unmuted / enabled."),
};

export const setEnumItemSchema = {
  mixer: mixerName,
  element: elementName,
  index: elementIndex,
  channel: z.number().int().min(0).max(31).default(0).describe("Channel. Default: 0."),
  item: z
    .union([z.number().int().min(0), z.string().min(1)])
    .describe('Item position or item name, e.g. 1 or "Line".'),
};

export const handleEventsSchema = {
  mixer: mixerName,
};
