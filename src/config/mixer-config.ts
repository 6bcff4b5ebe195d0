/**
 * Mixer configuration registry.
 *
 * `amixer.<name>` holds a definition (or the name of another one),
 * `amixer_type.<type>` tells where an external backend module lives.
 */

import fs from "node:fs/promises";
import { z } from "zod";

import { fail, ok, type Result } from "../core/errors.js";

/** Longest alias chain followed before giving up. */
export const MAX_ALIAS_HOPS = 8;

const GENERIC_KEYS = new Set(["comment", "type", "hint"]);

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const mixerDefinitionSchema = z
  .object({
    type: z.string().min(1),
    device: z.string().min(1).optional(),
    hint: z.string().optional(),
    comment: z.string().optional(),
  })
  .catchall(z.unknown());

export const mixerTypeSchema = z
  .object({
    lib: z.string().min(1).optional(),
    open: z.string().min(1).optional(),
    comment: z.string().optional(),
  })
  .strict();

export const mixerConfigSchema = z.object({
  amixer: z.record(z.union([z.string().min(1), mixerDefinitionSchema])).default({}),
  amixer_type: z.record(mixerTypeSchema).default({}),
});

export type MixerDefinition = z.infer<typeof mixerDefinitionSchema>;
export type MixerTypeDefinition = z.infer<typeof mixerTypeSchema>;
export type MixerConfig = z.infer<typeof mixerConfigSchema>;

export interface ResolvedDefinition {
  /** Name of the definition the alias chain ended at. */
  name: string;
  definition: MixerDefinition;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function defaultConfigPath(): string | URL {
  return process.env.MIXER_CONFIG ?? new URL("../../config/mixers.json", import.meta.url);
}

export function parseMixerConfig(raw: unknown): Result<MixerConfig> {
  const parsed = mixerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return fail("InvalidArgument", `invalid mixer configuration: ${issues}`, parsed.error);
  }
  return ok(parsed.data);
}

/** Read and validate a configuration file. */
export async function loadMixerConfig(
  path: string | URL = defaultConfigPath(),
): Promise<Result<MixerConfig>> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (err) {
    return fail("Io", `cannot read mixer configuration ${String(path)}`, err);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return fail("InvalidArgument", `mixer configuration ${String(path)} is not valid JSON`, err);
  }
  return parseMixerConfig(raw);
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/** Follow aliases from `name` to a definition. */
export function resolveMixerDefinition(
  config: MixerConfig,
  name: string,
): Result<ResolvedDefinition> {
  let current = name;
  for (let hops = 0; hops <= MAX_ALIAS_HOPS; hops++) {
    const entry = config.amixer[current];
    if (entry === undefined) {
      return fail("NotFound", `unknown mixer definition "${current}"`);
    }
    if (typeof entry !== "string") return ok({ name: current, definition: entry });
    current = entry;
  }
  return fail("InvalidArgument", `alias chain from "${name}" exceeds ${MAX_ALIAS_HOPS} hops`);
}

export function isGenericConfigKey(key: string): boolean {
  return GENERIC_KEYS.has(key);
}

/** Backend-specific keys of a definition. */
export function backendParams(definition: MixerDefinition): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(definition).filter(([key]) => !isGenericConfigKey(key)),
  );
}
