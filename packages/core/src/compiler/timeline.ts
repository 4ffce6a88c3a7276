/**
 * ActorTimeline: the per-actor state the compile passes advance, and the
 * keyframes, segments and spans they emit along the way.
 *
 * The resolver walks commands through it; the director resolves the
 * till-end hold and closes open spans; the camera passes add derived keys.
 */

import type { Interpolation, Rotator, SegmentSource, Vec3 } from "@blocking/schema";
import type { PlanActor } from "./types.js";
import { createTrackSet } from "./track.js";
import type { TrackSet } from "./track.js";
import { toFrame } from "./units.js";

const TIME_EPSILON = 1e-9;

/** A `[start, end)` span of an actor's timeline, in seconds. */
export interface TimelineSegment {
  readonly start: number;
  readonly end: number;
  readonly source: SegmentSource;
  readonly commandIndex: number;
}

/** A played clip. `end` is null while the clip is still playing. */
export interface AnimationSpan {
  readonly clip: string;
  readonly start: number;
  end: number | null;
  /** Playback speed multiplier. */
  readonly playRate: number;
}

export type CameraEntryKind = "look_at" | "focus" | "zoom";

/**
 * One tracking interval of a camera. Entries of one kind never overlap: a
 * new entry closes the previous one, the last is closed at the plan end.
 */
export interface CameraTimelineEntry {
  readonly kind: CameraEntryKind;
  readonly subject: string;
  /** Height fraction for look-at and focus, coverage for zoom. */
  readonly parameter: number;
  readonly start: number;
  end: number | null;
  readonly commandIndex: number;
}

/** Placeholder for a till-end stay, resolved once the plan length is known. */
export interface TillEndMarker {
  readonly commandIndex: number;
  readonly start: number;
  readonly animation?: string;
}

export class ActorTimeline {
  readonly actor: PlanActor;
  readonly tracks: TrackSet;
  readonly segments: TimelineSegment[] = [];
  readonly animations: AnimationSpan[] = [];
  readonly cameraEntries: CameraTimelineEntry[] = [];
  tillEnd: TillEndMarker | null = null;

  /** Current plan time, seconds. */
  time = 0;
  position: Vec3;
  /** Logical heading; the mesh yaw offset is only added on emission. */
  yaw: number;
  private readonly pitch: number;
  private readonly roll: number;
  private readonly fps: number;

  constructor(actor: PlanActor, fps: number) {
    this.actor = actor;
    this.fps = fps;
    this.tracks = createTrackSet();
    this.position = { ...actor.pose.location };
    this.yaw = actor.pose.rotation.yaw;
    this.pitch = actor.pose.rotation.pitch;
    this.roll = actor.pose.rotation.roll;
  }

  get name(): string {
    return this.actor.name;
  }

  /** An actor that received at least one command is held to the strict director rules. */
  get managed(): boolean {
    return this.actor.commands.length > 0;
  }

  frame(time: number): number {
    return toFrame(time, this.fps);
  }

  /** The rotation as written to the track. */
  emittedRotation(yaw: number = this.yaw, pitch: number = this.pitch): Rotator {
    return { pitch, yaw: yaw + this.actor.pose.meshYawOffset, roll: this.roll };
  }

  keyLocation(time: number, location: Vec3, interpolation: Interpolation = "cubic"): void {
    this.tracks.location.set(this.frame(time), location, interpolation);
  }

  keyRotation(time: number, yaw: number, interpolation: Interpolation = "cubic"): void {
    this.tracks.rotation.set(this.frame(time), this.emittedRotation(yaw), interpolation);
  }

  addSegment(start: number, end: number, source: SegmentSource, commandIndex: number): void {
    this.segments.push({ start, end, source, commandIndex });
  }

  /** Hold the current pose until `end` and advance the clock there. */
  hold(end: number, source: SegmentSource, commandIndex: number): void {
    const start = this.time;
    this.keyLocation(start, this.position);
    this.keyLocation(end, this.position);
    this.keyRotation(start, this.yaw);
    this.keyRotation(end, this.yaw);
    this.addSegment(start, end, source, commandIndex);
    this.time = end;
  }

  // -------------------------------------------------------------------------
  // Animation clips
  // -------------------------------------------------------------------------

  /** Clip currently playing, if any. */
  get activeClip(): AnimationSpan | null {
    return this.openSpan() ?? null;
  }

  /** Close the playing clip (dropping it if it never played) and start `clip`. */
  switchClip(clip: string, time: number, playRate = 1): void {
    this.endClip(time);
    this.animations.push({ clip, start: time, end: null, playRate });
    this.tracks.animation.set(this.frame(time), clip, "constant");
  }

  endClip(time: number): void {
    const open = this.openSpan();
    if (open === undefined) {
      return;
    }
    if (time - open.start <= TIME_EPSILON) {
      this.animations.pop();
    } else {
      open.end = time;
    }
  }

  /**
   * Play `clip` over `[start, end)`, then return to whatever was playing
   * before it, at its own play rate. With nothing playing before, the
   * overlay clip keeps playing until the next clip switch or the plan end,
   * as its animation track key does.
   */
  overlayClip(clip: string | undefined, start: number, end: number): void {
    if (clip === undefined) {
      return;
    }
    const previous = this.activeClip;
    this.switchClip(clip, start);
    if (previous !== null) {
      this.switchClip(previous.clip, end, previous.playRate);
    }
  }

  private openSpan(): AnimationSpan | undefined {
    const last = this.animations[this.animations.length - 1];
    return last !== undefined && last.end === null ? last : undefined;
  }

  // -------------------------------------------------------------------------
  // Camera entries
  // -------------------------------------------------------------------------

  openCameraEntry(kind: CameraEntryKind, subject: string, parameter: number, commandIndex: number): void {
    this.closeCameraEntry(kind, this.time);
    this.cameraEntries.push({ kind, subject, parameter, start: this.time, end: null, commandIndex });
  }

  /** End the open entry of `kind` at `time`; an entry that never ran is dropped. */
  closeCameraEntry(kind: CameraEntryKind, time: number): void {
    const index = this.cameraEntries.findIndex((entry) => entry.kind === kind && entry.end === null);
    const entry = this.cameraEntries[index];
    if (entry === undefined) {
      return;
    }
    if (time - entry.start <= TIME_EPSILON) {
      this.cameraEntries.splice(index, 1);
    } else {
      entry.end = time;
    }
  }
}
