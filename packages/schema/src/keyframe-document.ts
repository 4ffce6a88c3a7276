/**
 * Keyframe document types: the compiled output handed to a keyframe sink.
 *
 * A keyframe document is frame-indexed and self-contained. Each actor carries
 * one track per animated property, the animation clip sections it plays, and
 * the timeline segments it was resolved into. Scene records (lights,
 * atmosphere, audio, camera cuts) carry no motion and have their presets
 * resolved to raw values.
 *
 * The JSON Schema in `keyframe-document.schema.json` describes the same shape
 * and is used to validate emitted documents.
 */

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A 3-D position in centimetres. X is north, Y is east, Z is up. */
export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** An orientation in degrees. Positive yaw turns toward east. */
export interface Rotator {
  readonly pitch: number;
  readonly yaw: number;
  readonly roll: number;
}

/**
 * How a sink should interpolate from a keyframe to the next one.
 *
 * - `cubic`: eased (default for authored motion)
 * - `linear`: straight (sampled ramps)
 * - `constant`: hold until the next key (clip switches)
 */
export type Interpolation = "cubic" | "linear" | "constant";

/** One keyframe on a property track. */
export interface Keyframe<V> {
  /** `floor(time * fps)`; never negative, non-decreasing along a track. */
  readonly frame: number;
  readonly value: V;
  readonly interpolation: Interpolation;
}

/** Value type of every keyframed property. */
export interface PropertyValueMap {
  readonly location: Vec3;
  readonly rotation: Rotator;
  /** Active animation clip name. */
  readonly animation: string;
  /** Focal length in millimetres. */
  readonly focal_length: number;
  /** Focus distance in metres. */
  readonly focus_distance: number;
}

export type PropertyName = keyof PropertyValueMap;

/** Ordered list of property names, as emitted. */
export const PROPERTY_NAMES: readonly PropertyName[] = [
  "location",
  "rotation",
  "animation",
  "focal_length",
  "focus_distance",
];

/** All tracks of one actor. A property nobody wrote has an empty array. */
export type ActorTracks = {
  readonly [P in PropertyName]: readonly Keyframe<PropertyValueMap[P]>[];
};

// ---------------------------------------------------------------------------
// Actors
// ---------------------------------------------------------------------------

export type ActorKind = "character" | "camera" | "light";

/** A played animation clip, in frames. The end frame is exclusive. */
export interface AnimationSection {
  readonly clip: string;
  readonly startFrame: number;
  readonly endFrame: number;
  /** Playback speed multiplier; absent at normal speed. */
  readonly playRate?: number;
}

/** What a timeline segment was produced by. */
export type SegmentSource = "move" | "face" | "turn" | "stay" | "wait_until";

/** A `[startFrame, endFrame)` span of an actor's timeline. */
export interface SegmentRecord {
  readonly startFrame: number;
  readonly endFrame: number;
  readonly source: SegmentSource;
  /** Position of the producing command in the actor's stream. */
  readonly commandIndex: number;
}

/** Initial pose as declared. */
export interface PoseRecord {
  readonly location: Vec3;
  readonly rotation: Rotator;
  readonly meshYawOffset: number;
}

export interface ActorRecord {
  readonly kind: ActorKind;
  readonly pose: PoseRecord;
  /** Whether the actor received commands (and so was checked for gaps). */
  readonly managed: boolean;
  readonly tracks: ActorTracks;
  readonly animations: readonly AnimationSection[];
  readonly segments: readonly SegmentRecord[];
}

// ---------------------------------------------------------------------------
// Scene
// ---------------------------------------------------------------------------

export type LightKind = "point" | "spot" | "directional" | "rect";

/** A light with all presets resolved to raw values. */
export interface LightRecord {
  readonly name: string;
  readonly lightType: LightKind;
  readonly location: Vec3;
  readonly rotation: Rotator;
  readonly intensity: number;
  /** Linear RGB, each channel in [0, 1]. */
  readonly color: readonly [number, number, number];
  readonly castShadows: boolean;
}

export interface AtmosphereRecord {
  readonly fogDensity: number;
  /** Name of the directional light driving the sky, if any. */
  readonly sunLight: string | null;
}

/** An audio cue, in frames. A null end frame plays the asset to its own end. */
export interface AudioRecord {
  readonly asset: string;
  readonly startFrame: number;
  readonly endFrame: number | null;
  readonly volume: number;
}

/** From `frame` on, the named camera is the active view. */
export interface CameraCutRecord {
  readonly camera: string;
  readonly frame: number;
}

export interface SceneRecord {
  readonly lights: readonly LightRecord[];
  readonly atmosphere: AtmosphereRecord | null;
  readonly audio: readonly AudioRecord[];
  /** Ordered by frame. */
  readonly cuts: readonly CameraCutRecord[];
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export interface KeyframeDocument {
  readonly name: string;
  readonly fps: number;
  /** Plan length in seconds. */
  readonly duration: number;
  /** `floor(duration * fps)`. */
  readonly totalFrames: number;
  /** Actors in declaration order. */
  readonly actors: Readonly<Record<string, ActorRecord>>;
  /** Resolved waypoint table, name to position. */
  readonly waypoints: Readonly<Record<string, Vec3>>;
  readonly scene: SceneRecord;
}
