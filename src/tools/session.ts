/**
 * Mixers kept open for the server's lifetime, one per definition name.
 */

import type { OpenControl } from "../backends/types.js";
import { loadMixerConfig, type MixerConfig } from "../config/mixer-config.js";
import { ok, unwrap, type Result } from "../core/errors.js";
import type { Mixer } from "../core/mixer.js";
import { openMixer } from "../core/open-mixer.js";
import { getCard } from "../devices/index.js";
import type { ControlTransport } from "../transport/types.js";
import { VirtualCard } from "../transport/virtual-card.js";

/** Open a virtual card for a device name from the card registry. */
export const openVirtualCard: OpenControl = (device): Result<ControlTransport> => {
  const profile = getCard(device);
  if (!profile.ok) return profile;
  return ok(VirtualCard.fromProfile(profile.value, device));
};

export interface MixerSessionOptions {
  /** Defaults to the configuration file. */
  config?: MixerConfig;
  openControl?: OpenControl;
}

export class MixerSession {
  private readonly mixers = new Map<string, Promise<Mixer>>();
  private config: MixerConfig | null;
  private readonly openControl: OpenControl;

  constructor(options: MixerSessionOptions = {}) {
    this.config = options.config ?? null;
    this.openControl = options.openControl ?? openVirtualCard;
  }

  /**
   * The open mixer for a definition name, opening it on first use.
   * Throws MixerError when it cannot be opened.
   */
  get(name: string): Promise<Mixer> {
    let mixer = this.mixers.get(name);
    if (!mixer) {
      mixer = this.open(name);
      this.mixers.set(name, mixer);
      // A failed open is retried on the next call.
      void mixer.catch(() => this.mixers.delete(name));
    }
    return mixer;
  }

  async closeAll(): Promise<void> {
    const open = [...this.mixers.values()];
    this.mixers.clear();
    for (const settled of await Promise.allSettled(open)) {
      if (settled.status === "fulfilled") unwrap(settled.value.close());
    }
  }

  private async open(name: string): Promise<Mixer> {
    const config = await this.loadConfig();
    return unwrap(await openMixer({ name, config, openControl: this.openControl }));
  }

  private async loadConfig(): Promise<MixerConfig> {
    if (!this.config) this.config = unwrap(await loadMixerConfig());
    return this.config;
  }
}
