/**
 * Profiles the virtual card transport can stand up, keyed by device name.
 */

import { fail, ok, type Result } from "../core/errors.js";
import { demoProfile } from "./demo.js";
import type { CardProfile } from "./types.js";

const PROFILES: readonly CardProfile[] = [demoProfile];

export function cardNames(): string[] {
  return PROFILES.map((profile) => profile.name);
}

/** Profile for a `device` value of a mixer definition; case-insensitive. */
export function getCard(device: string): Result<CardProfile> {
  const wanted = device.toLowerCase();
  const profile = PROFILES.find((candidate) => candidate.name === wanted);
  if (!profile) {
    return fail("NotFound", `no card profile "${device}" (known: ${cardNames().join(", ")})`);
  }
  return ok(profile);
}
