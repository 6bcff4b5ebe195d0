/**
 * Backend that attaches the definition's device and builds nothing on
 * top of it. Raw controls stay reachable through `mixer.controls`.
 */

import { OK, fail, type Result } from "../core/errors.js";
import type { Mixer } from "../core/mixer.js";
import type { BackendContext, MixerBackend } from "./types.js";

/** Open and attach the `device` of a definition. */
export function attachDevice(mixer: Mixer, ctx: BackendContext): Result<void> {
  const { device } = ctx.definition;
  if (device === undefined) {
    return fail("InvalidArgument", `mixer definition "${ctx.name}" has no device`);
  }
  const opened = ctx.openControl(device);
  if (!opened.ok) return opened;
  const attached = mixer.attachControl(opened.value);
  if (!attached.ok) {
    const closed = opened.value.close();
    if (!closed.ok) ctx.logger.warn(`closing ${device}: ${closed.error.message}`);
    return attached;
  }
  return OK;
}

export const noneBackend: MixerBackend = {
  type: "none",
  open: attachDevice,
};
