/**
 * Per-property keyframe tracks.
 *
 * A track keeps its keys sorted by frame with at most one key per frame:
 * writing to an occupied frame replaces the key (last write wins).
 */

import type { Interpolation, Keyframe, PropertyValueMap, Rotator, Vec3 } from "@blocking/schema";
import { lerpVec, vecEquals } from "./motion-math.js";

export type ValueEquals<V> = (a: V, b: V) => boolean;

export class KeyframeTrack<V> {
  private readonly keys: Keyframe<V>[] = [];
  private readonly equals: ValueEquals<V>;

  constructor(equals: ValueEquals<V>) {
    this.equals = equals;
  }

  /** Keys in frame order. */
  get keyframes(): readonly Keyframe<V>[] {
    return this.keys;
  }

  get length(): number {
    return this.keys.length;
  }

  last(): Keyframe<V> | undefined {
    return this.keys[this.keys.length - 1];
  }

  set(frame: number, value: V, interpolation: Interpolation = "cubic"): void {
    const key: Keyframe<V> = { frame, value, interpolation };
    let index = this.keys.length;
    while (index > 0) {
      const previous = this.keys[index - 1];
      if (previous === undefined || previous.frame < frame) {
        break;
      }
      if (previous.frame === frame) {
        this.keys[index - 1] = key;
        return;
      }
      index--;
    }
    this.keys.splice(index, 0, key);
  }

  /** Remove every key with `from <= frame <= to`. */
  removeRange(from: number, to: number): void {
    for (let i = this.keys.length - 1; i >= 0; i--) {
      const key = this.keys[i];
      if (key !== undefined && key.frame >= from && key.frame <= to) {
        this.keys.splice(i, 1);
      }
    }
  }

  /**
   * Keys with redundant holds removed: inside a run of three or more equal
   * consecutive values only the first and last key survive.
   */
  compacted(): Keyframe<V>[] {
    const out: Keyframe<V>[] = [];
    for (const key of this.keys) {
      const prev = out[out.length - 1];
      const prevPrev = out[out.length - 2];
      if (
        prev !== undefined &&
        prevPrev !== undefined &&
        this.equals(prev.value, key.value) &&
        this.equals(prevPrev.value, key.value)
      ) {
        out[out.length - 1] = key;
      } else {
        out.push(key);
      }
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// Track sets
// ---------------------------------------------------------------------------

const EPSILON = 1e-6;

function rotatorEquals(a: Rotator, b: Rotator): boolean {
  return (
    Math.abs(a.pitch - b.pitch) <= EPSILON &&
    Math.abs(a.yaw - b.yaw) <= EPSILON &&
    Math.abs(a.roll - b.roll) <= EPSILON
  );
}

function numberEquals(a: number, b: number): boolean {
  return Math.abs(a - b) <= EPSILON;
}

/** One track per keyframed property. */
export type TrackSet = {
  readonly [P in keyof PropertyValueMap]: KeyframeTrack<PropertyValueMap[P]>;
};

export function createTrackSet(): TrackSet {
  return {
    location: new KeyframeTrack<Vec3>((a, b) => vecEquals(a, b, EPSILON)),
    rotation: new KeyframeTrack<Rotator>(rotatorEquals),
    animation: new KeyframeTrack<string>((a, b) => a === b),
    focal_length: new KeyframeTrack<number>(numberEquals),
    focus_distance: new KeyframeTrack<number>(numberEquals),
  };
}

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

/**
 * Position on a location track at a fractional frame, interpolating linearly
 * between the surrounding keys and holding the end values outside them.
 * Returns undefined for an empty track.
 */
export function sampleLocation(track: KeyframeTrack<Vec3>, frame: number): Vec3 | undefined {
  const keys = track.keyframes;
  const first = keys[0];
  if (first === undefined) {
    return undefined;
  }
  if (frame <= first.frame) {
    return first.value;
  }
  for (let i = 1; i < keys.length; i++) {
    const a = keys[i - 1];
    const b = keys[i];
    if (a === undefined || b === undefined) {
      continue;
    }
    if (frame <= b.frame) {
      const span = b.frame - a.frame;
      return span === 0 ? b.value : lerpVec(a.value, b.value, (frame - a.frame) / span);
    }
  }
  return keys[keys.length - 1]?.value;
}
