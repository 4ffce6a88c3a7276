/**
 * Camera passes 2-4: look-at rotation, focus distance and auto-zoom.
 *
 * These run only once every actor's position track is final, since a camera
 * samples its subject's resolved position at arbitrary times. Each pass
 * walks the camera's entries of one kind, samples at a fixed cadence and
 * keeps a sample only when it moved far enough from the last kept one.
 * Entry boundaries are always keyed.
 */

import type { Vec3 } from "@blocking/schema";
import { UnknownTrackingSubjectError } from "./errors.js";
import {
  addVec,
  distance3d,
  focalLengthFor,
  lookAtRotation,
  shortestPathYaw,
} from "./motion-math.js";
import type { ResolvedCompileOptions } from "./options.js";
import type { ActorTimeline, CameraEntryKind, CameraTimelineEntry } from "./timeline.js";
import { sampleLocation } from "./track.js";
import { cmToMeters, metersToCm } from "./units.js";

/** Nearest distance, in metres, the zoom math will use. */
const MIN_ZOOM_DISTANCE = 0.1;

/** An entry with its end fixed to the plan. */
interface ClosedEntry {
  readonly entry: CameraTimelineEntry;
  readonly start: number;
  readonly end: number;
}

export function runCameraPasses(
  timelines: ReadonlyMap<string, ActorTimeline>,
  fps: number,
  duration: number,
  options: ResolvedCompileOptions,
): void {
  const cameras = [...timelines.values()].filter((t) => t.cameraEntries.length > 0);

  for (const camera of cameras) {
    checkSubjects(camera, timelines);
  }

  for (const camera of cameras) {
    const pass = new CameraPass(camera, timelines, fps, duration, options);
    const lookAt = pass.lookAt();
    const focus = pass.focus();
    const zoom = pass.zoom();
    options.logger.debug(
      `camera ${camera.name}: ${lookAt} look-at, ${focus} focus, ${zoom} zoom keys`,
    );
  }
}

/**
 * Every subject must exist, must not be the camera itself, and must have a
 * resolved position track.
 */
function checkSubjects(camera: ActorTimeline, timelines: ReadonlyMap<string, ActorTimeline>): void {
  for (const entry of camera.cameraEntries) {
    const context = { commandIndex: entry.commandIndex, time: entry.start };
    const subject = timelines.get(entry.subject);
    if (subject === undefined) {
      throw new UnknownTrackingSubjectError(camera.name, entry.subject, "no such actor", context);
    }
    if (subject === camera) {
      throw new UnknownTrackingSubjectError(camera.name, entry.subject, "a camera cannot track itself", context);
    }
    if (subject.tracks.location.length === 0) {
      throw new UnknownTrackingSubjectError(camera.name, entry.subject, "subject has no resolved position track", context);
    }
  }
}

/** Sample times `start, start + step, ...` below `end`, then `end`. */
export function sampleTimes(start: number, end: number, step: number): number[] {
  const times: number[] = [];
  for (let k = 0; start + k * step < end - 1e-9; k++) {
    times.push(start + k * step);
  }
  times.push(end);
  return times;
}

class CameraPass {
  private readonly camera: ActorTimeline;
  private readonly timelines: ReadonlyMap<string, ActorTimeline>;
  private readonly fps: number;
  private readonly duration: number;
  private readonly options: ResolvedCompileOptions;

  constructor(
    camera: ActorTimeline,
    timelines: ReadonlyMap<string, ActorTimeline>,
    fps: number,
    duration: number,
    options: ResolvedCompileOptions,
  ) {
    this.camera = camera;
    this.timelines = timelines;
    this.fps = fps;
    this.duration = duration;
    this.options = options;
  }

  /**
   * Pass 2: aim at the subject, unwrapping yaw so it never spins the long
   * way. The rotation held just before an entry is re-keyed one frame
   * before it, so the camera does not drift toward the first aim early.
   */
  lookAt(): number {
    let emitted = 0;
    const { meshYawOffset } = this.camera.actor.pose;
    let yaw = this.camera.actor.pose.rotation.yaw;
    for (const { entry, start, end } of this.entries("look_at")) {
      const track = this.camera.tracks.rotation;
      const startFrame = this.camera.frame(start);
      const held = track.keyframes.find((key) => key.frame === startFrame);
      track.removeRange(startFrame, this.camera.frame(end));
      if (held !== undefined) {
        yaw = held.value.yaw - meshYawOffset;
        if (startFrame > 0 && !track.keyframes.some((key) => key.frame === startFrame - 1)) {
          track.set(startFrame - 1, held.value, held.interpolation);
        }
      }
      const times = sampleTimes(start, end, this.options.sampleInterval);
      let last: { pitch: number; yaw: number } | null = null;
      times.forEach((time, i) => {
        const angles = lookAtRotation(this.cameraAt(time), this.aimPoint(entry, time));
        yaw = shortestPathYaw(yaw, angles.yaw);
        const boundary = i === 0 || i === times.length - 1;
        const moved =
          last === null ||
          Math.abs(yaw - last.yaw) > this.options.lookAtEpsilon ||
          Math.abs(angles.pitch - last.pitch) > this.options.lookAtEpsilon;
        if (boundary || moved) {
          track.set(this.camera.frame(time), this.camera.emittedRotation(yaw, angles.pitch));
          last = { pitch: angles.pitch, yaw };
          emitted++;
        }
      });
    }
    return emitted;
  }

  /** Pass 3: focus distance in metres to the aim point. */
  focus(): number {
    let emitted = 0;
    for (const { entry, start, end } of this.entries("focus")) {
      const track = this.camera.tracks.focus_distance;
      track.removeRange(this.camera.frame(start), this.camera.frame(end));
      const times = sampleTimes(start, end, this.options.sampleInterval);
      let last: number | null = null;
      times.forEach((time, i) => {
        const meters = cmToMeters(distance3d(this.cameraAt(time), this.aimPoint(entry, time)));
        const boundary = i === 0 || i === times.length - 1;
        if (boundary || last === null || Math.abs(meters - last) > this.options.focusEpsilon) {
          track.set(this.camera.frame(time), meters);
          last = meters;
          emitted++;
        }
      });
    }
    return emitted;
  }

  /**
   * Pass 4: focal length that keeps the subject at the target coverage,
   * keyed only when it drifts past the relative threshold.
   */
  zoom(): number {
    let emitted = 0;
    const { sensorHeight, subjectHeight, zoomThreshold, sampleInterval } = this.options;
    for (const { entry, start, end } of this.entries("zoom")) {
      const track = this.camera.tracks.focal_length;
      const endFrame = this.camera.frame(end);
      // A fixed focal length that ended this entry keeps its key.
      const fixed = track.keyframes.find((key) => key.frame === endFrame);
      track.removeRange(this.camera.frame(start), endFrame);
      const times = sampleTimes(start, end, sampleInterval);
      let last: number | null = null;
      times.forEach((time, i) => {
        const meters = Math.max(
          MIN_ZOOM_DISTANCE,
          cmToMeters(distance3d(this.cameraAt(time), this.subjectAt(entry.subject, time))),
        );
        const focal = focalLengthFor(meters, entry.parameter, subjectHeight, sensorHeight);
        const boundary = i === 0 || i === times.length - 1;
        if (boundary || last === null || Math.abs(focal - last) / last > zoomThreshold) {
          track.set(this.camera.frame(time), focal);
          last = focal;
          emitted++;
        }
      });
      if (fixed !== undefined) {
        track.set(fixed.frame, fixed.value, fixed.interpolation);
      }
    }
    return emitted;
  }

  // -------------------------------------------------------------------------
  // Sampling helpers
  // -------------------------------------------------------------------------

  /** Entries of one kind, clipped to the plan, in start order. */
  private entries(kind: CameraEntryKind): ClosedEntry[] {
    return this.camera.cameraEntries
      .filter((entry) => entry.kind === kind)
      .map((entry) => ({
        entry,
        start: entry.start,
        end: Math.min(entry.end ?? this.duration, this.duration),
      }))
      .filter((closed) => closed.end > closed.start)
      .sort((a, b) => a.start - b.start);
  }

  private cameraAt(time: number): Vec3 {
    return sampleLocation(this.camera.tracks.location, time * this.fps) ?? this.camera.actor.pose.location;
  }

  private subjectAt(subject: string, time: number): Vec3 {
    const timeline = this.timelines.get(subject);
    const position = timeline === undefined ? undefined : sampleLocation(timeline.tracks.location, time * this.fps);
    if (position === undefined) {
      throw new UnknownTrackingSubjectError(this.camera.name, subject, "subject has no resolved position track");
    }
    return position;
  }

  /** The subject's position raised to `heightFraction` of the nominal subject height. */
  private aimPoint(entry: CameraTimelineEntry, time: number): Vec3 {
    const raise = metersToCm(this.options.subjectHeight) * entry.parameter;
    return addVec(this.subjectAt(entry.subject, time), { x: 0, y: 0, z: raise });
  }
}
