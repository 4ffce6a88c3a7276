/**
 * Unit conversion and frame quantization.
 *
 * Positions are centimetres, authored distances are metres, speeds resolve
 * to centimetres per second before any motion math runs.
 */

import type { SpeedPreset, SpeedSpec } from "@blocking/schema";

/** Centimetres per second in one mile per hour. */
export const CM_PER_SEC_PER_MPH = 44.704;

/** Named speeds, in metres per second. */
export const SPEED_PRESETS: Readonly<Record<SpeedPreset, number>> = {
  walk: 1.4,
  jog: 3.0,
  run: 5.0,
  sprint: 8.0,
};

export function mphToCmPerSec(mph: number): number {
  return mph * CM_PER_SEC_PER_MPH;
}

export function mpsToCmPerSec(mps: number): number {
  return mps * 100;
}

export function metersToCm(meters: number): number {
  return meters * 100;
}

export function cmToMeters(cm: number): number {
  return cm / 100;
}

/** Resolve a preset-or-raw speed to centimetres per second. */
export function speedToCmPerSec(speed: SpeedSpec): number {
  if ("preset" in speed) {
    return mpsToCmPerSec(SPEED_PRESETS[speed.preset]);
  }
  switch (speed.unit) {
    case "mph":
      return mphToCmPerSec(speed.value);
    case "mps":
      return mpsToCmPerSec(speed.value);
    case "cmps":
      return speed.value;
  }
}

/**
 * Quantize a time to a frame number: `floor(seconds * fps)`.
 *
 * A tiny epsilon absorbs float error so that `0.7 * 30` lands on frame 21
 * rather than 20.
 */
export function toFrame(seconds: number, fps: number): number {
  return Math.max(0, Math.floor(seconds * fps + 1e-9));
}
