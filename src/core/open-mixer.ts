/**
 * Open a mixer from a configuration definition.
 */

import { getBackend } from "../backends/index.js";
import type { MixerBackend, OpenControl } from "../backends/types.js";
import { resolveMixerDefinition, type MixerConfig } from "../config/mixer-config.js";
import { createLogger } from "../utils/logger.js";
import { ok, type Result } from "./errors.js";
import { Mixer, type MixerOptions } from "./mixer.js";

const log = createLogger("open");

export interface OpenMixerOptions extends MixerOptions {
  /** Definition name, looked up in `config.amixer`. */
  name: string;
  config: MixerConfig;
  openControl: OpenControl;
  /** Backends tried before the built-in and imported ones. */
  backends?: MixerBackend[];
}

async function resolveBackend(
  type: string,
  options: OpenMixerOptions,
): Promise<Result<MixerBackend>> {
  const local = options.backends?.find((backend) => backend.type === type);
  if (local) return ok(local);
  return getBackend(type, options.config.amixer_type);
}

/**
 * Resolve the definition and its backend, let the backend attach its
 * controls, then load them. The mixer is closed again on any failure.
 */
export async function openMixer(options: OpenMixerOptions): Promise<Result<Mixer>> {
  const resolved = resolveMixerDefinition(options.config, options.name);
  if (!resolved.ok) return resolved;
  const { name, definition } = resolved.value;

  const backend = await resolveBackend(definition.type, options);
  if (!backend.ok) return backend;

  const mixer = new Mixer(name, {
    compare: options.compare,
    controlCapacity: options.controlCapacity,
  });
  const opened = backend.value.open(mixer, {
    name,
    definition,
    openControl: options.openControl,
    logger: createLogger(`backend:${definition.type}`),
  });
  const loaded = opened.ok ? mixer.load() : opened;
  if (!loaded.ok) {
    const closed = mixer.close();
    if (!closed.ok) log.warn(`closing ${name} after a failed open: ${closed.error.message}`);
    return loaded;
  }
  log.info(`opened ${name} (${definition.type}) with ${mixer.count} elements`);
  return ok(mixer);
}
