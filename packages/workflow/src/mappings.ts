// ──────────────────────────────────────────────
// MEDIAFORGE - Parameter Mappings
// Derived widget values shared by the factories
// ──────────────────────────────────────────────

import { randomInt } from "node:crypto";
import type { SeedControl } from "@mediaforge/types";

export const MOTION_BUCKET_MIN = 127;
export const MOTION_BUCKET_MAX = 254;
export const PLACEHOLDER_IMAGE = "placeholder.png";

// randomInt() needs max - min < 2^48
const RANDOM_SEED_CEILING = 2 ** 32;

export interface ResolvedSeed {
  seed: number;
  control: SeedControl;
}

export function computeFrameCount(durationSeconds: number, fps: number): number {
  return Math.round(durationSeconds * fps);
}

export function computeMotionBucketId(motionIntensity: number): number {
  if (!(motionIntensity >= 0 && motionIntensity <= 1)) {
    throw new RangeError(`Motion intensity must be within [0, 1], got ${motionIntensity}`);
  }
  return Math.round(MOTION_BUCKET_MIN + motionIntensity * (MOTION_BUCKET_MAX - MOTION_BUCKET_MIN));
}

/** Non-negative seeds are kept as given; anything else draws a fresh positive seed. */
export function resolveSeed(seed: number): ResolvedSeed {
  if (seed >= 0) {
    return { seed, control: "fixed" };
  }
  return { seed: randomInt(1, RANDOM_SEED_CEILING), control: "randomize" };
}
