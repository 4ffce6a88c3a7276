/**
 * Pure motion math: directions, yaw arithmetic, corridor drift, velocity
 * ramps and camera geometry.
 *
 * No actor or time knowledge lives here. Angles are degrees, north is 0°
 * along +X, east is 90° along +Y, and positive yaw turns toward east.
 */

import type { Direction, Vec3 } from "@blocking/schema";

// ---------------------------------------------------------------------------
// Vectors
// ---------------------------------------------------------------------------

export const ORIGIN: Vec3 = { x: 0, y: 0, z: 0 };

export function addVec(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subVec(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scaleVec(v: Vec3, k: number): Vec3 {
  return { x: v.x * k, y: v.y * k, z: v.z * k };
}

/** Linear interpolation between two points, `t` in [0, 1]. */
export function lerpVec(a: Vec3, b: Vec3, t: number): Vec3 {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

export function distance3d(a: Vec3, b: Vec3): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const dz = b.z - a.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

export function vecEquals(a: Vec3, b: Vec3, epsilon = 1e-6): boolean {
  return (
    Math.abs(a.x - b.x) <= epsilon &&
    Math.abs(a.y - b.y) <= epsilon &&
    Math.abs(a.z - b.z) <= epsilon
  );
}

// ---------------------------------------------------------------------------
// Directions
// ---------------------------------------------------------------------------

const CARDINAL_YAW: Readonly<Record<string, number>> = {
  north: 0,
  north_east: 45,
  east: 90,
  south_east: 135,
  south: 180,
  south_west: -135,
  west: -90,
  north_west: -45,
};

const RELATIVE_YAW: Readonly<Record<string, number>> = {
  forward: 0,
  right: 90,
  backward: 180,
  left: -90,
};

/**
 * Heading of a named direction, in degrees.
 *
 * Cardinal directions are absolute. Relative directions are measured from
 * `currentYaw`. The signed `offset` is added to either.
 */
export function directionAngle(direction: Direction, currentYaw = 0, offset = 0): number {
  const cardinal = CARDINAL_YAW[direction];
  if (cardinal !== undefined) {
    return cardinal + offset;
  }
  return currentYaw + (RELATIVE_YAW[direction] ?? 0) + offset;
}

/** Unit vector in the horizontal plane for a heading in degrees. */
export function directionVector(angleDeg: number): Vec3 {
  const rad = (angleDeg * Math.PI) / 180;
  return { x: Math.cos(rad), y: Math.sin(rad), z: 0 };
}

// ---------------------------------------------------------------------------
// Yaw
// ---------------------------------------------------------------------------

/**
 * Signed rotation from `current` to `target` with magnitude at most 180°.
 * Exactly 180° resolves to +180.
 */
export function shortestYawDelta(current: number, target: number): number {
  const delta = (((target - current) % 360) + 360) % 360;
  return delta > 180 ? delta - 360 : delta;
}

/**
 * The yaw equivalent to `target` that is closest to `current`, so that
 * interpolating between the two never wraps the long way round.
 */
export function shortestPathYaw(current: number, target: number): number {
  return current + shortestYawDelta(current, target);
}

// ---------------------------------------------------------------------------
// Corridor drift
// ---------------------------------------------------------------------------

/** Right-hand perpendicular of a horizontal direction. */
export function perpendicular(direction: Vec3): Vec3 {
  return { x: -direction.y, y: direction.x, z: 0 };
}

/** Clamp a signed lateral offset to `[-limit, limit]`. No limit means no clamp. */
export function clampLateral(lateral: number, limit?: number): number {
  if (limit === undefined) {
    return lateral;
  }
  return Math.min(limit, Math.max(-limit, lateral));
}

/**
 * Sideways displacement for a drift of `lateral` (positive is to the right of
 * travel), clamped to the corridor half-width.
 */
export function corridorOffset(direction: Vec3, lateral: number, limit?: number): Vec3 {
  return scaleVec(perpendicular(direction), clampLateral(lateral, limit));
}

// ---------------------------------------------------------------------------
// Velocity ramps
// ---------------------------------------------------------------------------

/** Speed at `fraction` of a linear ramp from `from` to `to`. */
export function rampedSpeed(from: number, to: number, fraction: number): number {
  return from + (to - from) * fraction;
}

/**
 * Distance covered after `elapsed` seconds of a linear ramp from `from` to
 * `to` lasting `duration` seconds. At `elapsed = duration` this is the
 * trapezoid `(from + to) / 2 * duration`.
 */
export function rampedDistance(from: number, to: number, duration: number, elapsed = duration): number {
  if (duration <= 0) {
    return 0;
  }
  return from * elapsed + ((to - from) * elapsed * elapsed) / (2 * duration);
}

// ---------------------------------------------------------------------------
// Camera geometry
// ---------------------------------------------------------------------------

/** Pitch and yaw, in degrees, that aim from `from` at `to`. */
export interface LookAngles {
  readonly pitch: number;
  readonly yaw: number;
}

/**
 * Aim angles from one point to another. Yaw follows `atan2(dy, dx)`; pitch is
 * negative when the target sits above the eye.
 */
export function lookAtRotation(from: Vec3, to: Vec3): LookAngles {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const dz = to.z - from.z;
  const horizontal = Math.sqrt(dx * dx + dy * dy);
  const yaw = (Math.atan2(dy, dx) * 180) / Math.PI;
  const pitch = (-Math.atan2(dz, horizontal) * 180) / Math.PI;
  return { pitch: pitch === 0 ? 0 : pitch, yaw };
}

/**
 * Focal length (mm) that makes a subject of `subjectHeightM` fill `coverage`
 * of a sensor `sensorHeightMm` tall at `distanceM`.
 */
export function focalLengthFor(
  distanceM: number,
  coverage: number,
  subjectHeightM: number,
  sensorHeightMm: number,
): number {
  return (sensorHeightMm * distanceM * coverage) / subjectHeightM;
}
