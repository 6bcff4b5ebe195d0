/**
 * Backend contract.
 *
 * A backend attaches controls to a fresh mixer and installs the event
 * handler that turns raw controls into simple elements.
 */

import type { MixerDefinition } from "../config/mixer-config.js";
import type { Result } from "../core/errors.js";
import type { Mixer } from "../core/mixer.js";
import type { ControlTransport } from "../transport/types.js";
import type { Logger } from "../utils/logger.js";

/** Opens the transport for a device name from a mixer definition. */
export type OpenControl = (device: string) => Result<ControlTransport>;

export interface BackendContext {
  /** Definition name the alias chain resolved to. */
  name: string;
  definition: MixerDefinition;
  openControl: OpenControl;
  logger: Logger;
}

export interface MixerBackend {
  readonly type: string;
  open(mixer: Mixer, ctx: BackendContext): Result<void>;
}
