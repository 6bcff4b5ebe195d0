/**
 * Backend registry.
 *
 * Built-in backends are looked up first. Any other type is imported as a
 * module: the `lib` of its `amixer_type` entry, or `mixer-backend-<type>`.
 * Imported backends are cached for the process lifetime.
 */

import type { MixerTypeDefinition } from "../config/mixer-config.js";
import { fail, ok, type Result } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";
import { basicBackend } from "./basic.js";
import { noneBackend } from "./none.js";
import type { MixerBackend } from "./types.js";

const log = createLogger("backends");

const builtins = new Map<string, MixerBackend>([
  [noneBackend.type, noneBackend],
  [basicBackend.type, basicBackend],
]);

const imported = new Map<string, MixerBackend>();

/** Module a backend type is loaded from when no `lib` is configured. */
export function defaultBackendModule(type: string): string {
  return `mixer-backend-${type}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isMixerBackend(value: unknown): value is MixerBackend {
  return isRecord(value) && typeof value.type === "string" && typeof value.open === "function";
}

export function builtinBackendTypes(): string[] {
  return [...builtins.keys()];
}

export async function getBackend(
  type: string,
  types: Record<string, MixerTypeDefinition> = {},
): Promise<Result<MixerBackend>> {
  const builtin = builtins.get(type);
  if (builtin) return ok(builtin);

  const definition = types[type];
  const specifier = definition?.lib ?? defaultBackendModule(type);
  const symbol = definition?.open ?? "default";
  const key = `${specifier}#${symbol}`;

  const cached = imported.get(key);
  if (cached) return ok(cached);

  let mod: unknown;
  try {
    mod = await import(specifier);
  } catch (err) {
    return fail("NotFound", `cannot load backend "${type}" from ${specifier}`, err);
  }
  const candidate = isRecord(mod) ? mod[symbol] : undefined;
  if (!isMixerBackend(candidate)) {
    return fail("InvalidArgument", `${specifier} does not export a mixer backend as "${symbol}"`);
  }
  imported.set(key, candidate);
  log.debug(`loaded backend "${type}" from ${specifier}`);
  return ok(candidate);
}

/** Forget imported backends. */
export function clearBackendCache(): void {
  imported.clear();
}
