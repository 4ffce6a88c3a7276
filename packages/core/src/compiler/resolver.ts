/**
 * Timeline resolver (pass 1).
 *
 * Walks every actor's command stream in declaration order, solving each
 * move's missing quantity, resolving waypoints and headings, and emitting
 * position, rotation and animation keys into the actor's timeline.
 *
 * Actors are independent except through the waypoint table: a waypoint
 * recorded by one actor may be consumed by a later one, so the table is
 * shared and only ordering across streams decides whether a name exists.
 */

import type { Vec3 } from "@blocking/schema";
import {
  DuplicateWaypointError,
  FacingTargetError,
  InvalidMotionParametersError,
  MotionTimelineError,
  TillEndPlacementError,
  UndefinedWaypointError,
} from "./errors.js";
import type { ErrorContext } from "./errors.js";
import {
  addVec,
  corridorOffset,
  directionAngle,
  directionVector,
  distance3d,
  lerpVec,
  lookAtRotation,
  rampedDistance,
  scaleVec,
  shortestPathYaw,
} from "./motion-math.js";
import type { ResolvedCompileOptions } from "./options.js";
import { ActorTimeline } from "./timeline.js";
import { sampleLocation } from "./track.js";
import type {
  ActorCommand,
  FaceCommand,
  MotionPlan,
  MoveCommand,
  MoveConstraint,
  RotationTiming,
  StayCommand,
  TurnCommand,
  WaitUntilCommand,
} from "./types.js";
import { metersToCm, speedToCmPerSec } from "./units.js";

const TIME_EPSILON = 1e-9;

/** Output of pass 1. */
export interface ResolvedTimelines {
  /** In actor declaration order. */
  readonly timelines: ReadonlyMap<string, ActorTimeline>;
  /** Waypoint table in recording order. */
  readonly waypoints: ReadonlyMap<string, Vec3>;
}

/** What a command can see of the plan while it resolves. */
interface PassState {
  readonly plan: MotionPlan;
  /** Timelines resolved so far, in declaration order. */
  readonly timelines: ReadonlyMap<string, ActorTimeline>;
  readonly waypoints: Map<string, Vec3>;
  readonly options: ResolvedCompileOptions;
}

/**
 * A move with every quantity known. Speeds are cm/s, distance cm.
 * `positionAt` maps elapsed seconds to a position.
 */
export interface SolvedMove {
  readonly duration: number;
  readonly distance: number;
  readonly startSpeed: number;
  readonly endSpeed: number;
  readonly end: Vec3;
  readonly positionAt: (elapsed: number) => Vec3;
}

export function resolveTimelines(plan: MotionPlan, options: ResolvedCompileOptions): ResolvedTimelines {
  const timelines = new Map<string, ActorTimeline>();
  const waypoints = new Map<string, Vec3>();
  const state: PassState = { plan, timelines, waypoints, options };

  for (const actor of plan.actors.values()) {
    const timeline = new ActorTimeline(actor, plan.fps);
    if (actor.focalLength !== undefined) {
      timeline.tracks.focal_length.set(0, actor.focalLength);
    }
    actor.commands.forEach((command, index) => {
      if (timeline.tillEnd !== null) {
        throw new TillEndPlacementError(
          `Command ${index} of "${actor.name}" follows a till-end stay`,
          { actor: actor.name, commandIndex: index },
        );
      }
      applyCommand(timeline, command, index, state);
    });
    timelines.set(actor.name, timeline);
    options.logger.debug(
      `resolved ${actor.name}: ${actor.commands.length} commands, ` +
        `${timeline.segments.length} segments, ends at ${timeline.time.toFixed(3)}s`,
    );
  }

  return { timelines, waypoints };
}

function applyCommand(timeline: ActorTimeline, command: ActorCommand, index: number, state: PassState): void {
  switch (command.type) {
    case "move":
      applyMove(timeline, command, index, state.waypoints, state.options);
      break;
    case "face":
    case "turn":
      applyRotation(timeline, command, index, state);
      break;
    case "stay":
      applyStay(timeline, command, index);
      break;
    case "wait_until":
      applyWaitUntil(timeline, command, index);
      break;
    case "animation":
      timeline.switchClip(command.clip, timeline.time, command.playRate);
      break;
    case "camera_look_at":
      timeline.openCameraEntry("look_at", command.subject, command.heightFraction, index);
      break;
    case "camera_focus":
      timeline.openCameraEntry("focus", command.subject, command.heightFraction, index);
      break;
    case "camera_frame_subject":
      timeline.openCameraEntry("zoom", command.subject, command.coverage, index);
      break;
    case "camera_focal_length":
      timeline.closeCameraEntry("zoom", timeline.time);
      timeline.tracks.focal_length.set(timeline.frame(timeline.time), command.focalLength);
      break;
  }
}

function contextOf(timeline: ActorTimeline, index: number): ErrorContext {
  return { actor: timeline.name, commandIndex: index, time: timeline.time };
}

// ---------------------------------------------------------------------------
// Move
// ---------------------------------------------------------------------------

function requirePositive(value: number, what: string, context: ErrorContext): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new InvalidMotionParametersError(`Move ${what} must be positive, got ${value}`, context);
  }
}

interface SolvedQuantities {
  /** Centimetres. */
  readonly distance: number;
  readonly duration: number;
  /** The constraint speed in cm/s, when one was given. */
  readonly speed?: number;
}

/** Travel time for a distance at a speed, or over a linear ramp ending at that speed. */
function travelTime(distance: number, speed: number, rampFrom: number | undefined): number {
  return rampFrom === undefined ? distance / speed : (2 * distance) / (rampFrom + speed);
}

function solveQuantities(
  c: MoveConstraint,
  rampFrom: number | undefined,
  fixedDistance: number,
  context: ErrorContext,
): SolvedQuantities {
  switch (c.kind) {
    case "distance_time":
      return { distance: metersToCm(c.distance), duration: c.time };
    case "distance_speed": {
      const distance = metersToCm(c.distance);
      const speed = speedToCmPerSec(c.speed);
      requirePositive(speed, "speed", context);
      return { distance, duration: travelTime(distance, speed, rampFrom), speed };
    }
    case "time_speed": {
      const speed = speedToCmPerSec(c.speed);
      requirePositive(speed, "speed", context);
      const distance = rampFrom === undefined ? speed * c.time : ((rampFrom + speed) / 2) * c.time;
      return { distance, duration: c.time, speed };
    }
    case "time":
      return { distance: fixedDistance, duration: c.time };
    case "speed": {
      const speed = speedToCmPerSec(c.speed);
      requirePositive(speed, "speed", context);
      return { distance: fixedDistance, duration: travelTime(fixedDistance, speed, rampFrom), speed };
    }
  }
}

/**
 * Solve a move's duration, distance and speed profile from the actor's
 * current state. With a ramp, the constraint speed is the target speed and
 * distance integrates the linear velocity profile.
 */
export function solveMove(
  command: MoveCommand,
  start: Vec3,
  yaw: number,
  waypoints: ReadonlyMap<string, Vec3>,
  context: ErrorContext,
): SolvedMove {
  const target = command.target;
  const rampFrom = command.rampFrom === undefined ? undefined : speedToCmPerSec(command.rampFrom);
  if (rampFrom !== undefined && (rampFrom < 0 || !Number.isFinite(rampFrom))) {
    throw new InvalidMotionParametersError(`Ramp start speed must not be negative, got ${rampFrom}`, context);
  }

  let direction: Vec3 | null = null;
  let fixedEnd: Vec3 | null = null;
  if (target.kind === "direction") {
    direction = directionVector(directionAngle(target.direction, yaw, target.offset));
  } else if (target.kind === "waypoint") {
    const recorded = waypoints.get(target.waypoint);
    if (recorded === undefined) {
      throw new UndefinedWaypointError(target.waypoint, context);
    }
    fixedEnd = recorded;
  } else {
    fixedEnd = target.location;
  }

  const fixedDistance = fixedEnd === null ? 0 : distance3d(start, fixedEnd);
  const { distance, duration, speed } = solveQuantities(command.constraint, rampFrom, fixedDistance, context);

  requirePositive(distance, "distance", context);
  requirePositive(duration, "time", context);

  let startSpeed: number;
  let endSpeed: number;
  if (rampFrom === undefined) {
    startSpeed = distance / duration;
    endSpeed = startSpeed;
  } else {
    startSpeed = rampFrom;
    endSpeed = speed ?? (2 * distance) / duration - rampFrom;
    if (endSpeed < -TIME_EPSILON) {
      throw new InvalidMotionParametersError(
        `Ramp cannot cover ${distance}cm in ${duration}s starting at ${rampFrom}cm/s`,
        context,
      );
    }
    endSpeed = Math.max(0, endSpeed);
  }
  requirePositive((startSpeed + endSpeed) / 2, "speed", context);

  const along = (elapsed: number): number =>
    rampFrom === undefined ? distance * (elapsed / duration) : rampedDistance(startSpeed, endSpeed, duration, elapsed);

  if (fixedEnd !== null) {
    const end = fixedEnd;
    return {
      duration,
      distance,
      startSpeed,
      endSpeed,
      end,
      positionAt: (elapsed) => lerpVec(start, end, along(elapsed) / distance),
    };
  }

  const heading = direction ?? directionVector(yaw);
  const drift =
    command.drift === undefined
      ? { x: 0, y: 0, z: 0 }
      : corridorOffset(
          heading,
          metersToCm(command.drift.lateral),
          command.drift.limit === undefined ? undefined : metersToCm(command.drift.limit),
        );
  const positionAt = (elapsed: number): Vec3 =>
    addVec(addVec(start, scaleVec(heading, along(elapsed))), scaleVec(drift, elapsed / duration));

  return { duration, distance, startSpeed, endSpeed, end: positionAt(duration), positionAt };
}

function applyMove(
  timeline: ActorTimeline,
  command: MoveCommand,
  index: number,
  waypoints: Map<string, Vec3>,
  options: ResolvedCompileOptions,
): void {
  const context = contextOf(timeline, index);
  const solved = solveMove(command, timeline.position, timeline.yaw, waypoints, context);
  const start = timeline.time;
  const end = start + solved.duration;
  const ramped = command.rampFrom !== undefined;

  timeline.keyLocation(start, timeline.position, ramped ? "linear" : "cubic");
  if (ramped) {
    const step = options.rampSampleInterval;
    for (let k = 1; k * step < solved.duration - TIME_EPSILON; k++) {
      timeline.keyLocation(start + k * step, solved.positionAt(k * step), "linear");
    }
  }
  timeline.keyLocation(end, solved.end);

  const endYaw =
    command.turnBy === undefined ? timeline.yaw : shortestPathYaw(timeline.yaw, timeline.yaw + command.turnBy);
  timeline.keyRotation(start, timeline.yaw);
  timeline.keyRotation(end, endYaw);

  timeline.overlayClip(command.animation, start, end);
  timeline.addSegment(start, end, "move", index);

  if (command.waypoint !== undefined) {
    if (waypoints.has(command.waypoint)) {
      throw new DuplicateWaypointError(command.waypoint, context);
    }
    waypoints.set(command.waypoint, solved.end);
  }

  timeline.position = solved.end;
  timeline.yaw = endYaw;
  timeline.time = end;
}

// ---------------------------------------------------------------------------
// Face / turn / stay / wait
// ---------------------------------------------------------------------------

/**
 * Where `target` stands at `time`. A directed target must already be
 * resolved, so it has to be declared before the actor facing it; an
 * undirected one stays at its declared location.
 */
function targetPosition(target: string, time: number, state: PassState, context: ErrorContext): Vec3 {
  const resolved = state.timelines.get(target);
  if (resolved !== undefined) {
    return sampleLocation(resolved.tracks.location, time * state.plan.fps) ?? resolved.position;
  }
  const actor = state.plan.actors.get(target);
  if (actor === undefined) {
    throw new FacingTargetError(target, "no such actor", context);
  }
  if (actor.commands.length > 0) {
    throw new FacingTargetError(target, "a directed target must be declared before the actor facing it", context);
  }
  return actor.pose.location;
}

function rotationTarget(
  timeline: ActorTimeline,
  command: FaceCommand | TurnCommand,
  state: PassState,
  context: ErrorContext,
): number {
  if (command.type === "turn") {
    return timeline.yaw + command.degrees;
  }
  const { heading } = command;
  switch (heading.kind) {
    case "yaw":
      return heading.yaw;
    case "direction":
      return directionAngle(heading.direction, timeline.yaw, heading.offset);
    case "actor": {
      const at = targetPosition(heading.actor, timeline.time, state, context);
      if (Math.hypot(at.x - timeline.position.x, at.y - timeline.position.y) <= TIME_EPSILON) {
        throw new FacingTargetError(heading.actor, `"${timeline.name}" stands on the same spot`, context);
      }
      return lookAtRotation(timeline.position, at).yaw;
    }
  }
}

/** Seconds a rotation through `degrees` takes. */
function rotationDuration(timing: RotationTiming, degrees: number): number {
  return timing.kind === "duration" ? timing.seconds : Math.abs(degrees) / timing.degreesPerSecond;
}

function applyRotation(
  timeline: ActorTimeline,
  command: FaceCommand | TurnCommand,
  index: number,
  state: PassState,
): void {
  const context = contextOf(timeline, index);
  const { timing } = command;
  if (timing.kind === "duration" && (!(timing.seconds > 0) || !Number.isFinite(timing.seconds))) {
    throw new InvalidMotionParametersError(
      `${command.type} duration must be positive, got ${timing.seconds}`,
      context,
    );
  }
  if (timing.kind === "rate" && (!(timing.degreesPerSecond > 0) || !Number.isFinite(timing.degreesPerSecond))) {
    throw new InvalidMotionParametersError(
      `${command.type} rate must be positive, got ${timing.degreesPerSecond}`,
      context,
    );
  }
  const endYaw = shortestPathYaw(timeline.yaw, rotationTarget(timeline, command, state, context));
  const duration = rotationDuration(timing, endYaw - timeline.yaw);
  if (duration <= TIME_EPSILON) {
    // Already facing the target at a fixed rate.
    return;
  }
  const start = timeline.time;
  const end = start + duration;

  timeline.keyLocation(start, timeline.position);
  timeline.keyLocation(end, timeline.position);
  timeline.keyRotation(start, timeline.yaw);
  timeline.keyRotation(end, endYaw);
  timeline.overlayClip(command.animation, start, end);
  timeline.addSegment(start, end, command.type, index);

  timeline.yaw = endYaw;
  timeline.time = end;
}

function applyStay(timeline: ActorTimeline, command: StayCommand, index: number): void {
  if (command.length.kind === "till_end") {
    timeline.tillEnd = { commandIndex: index, start: timeline.time, animation: command.animation };
    return;
  }
  const seconds = command.length.seconds;
  if (!(seconds > 0) || !Number.isFinite(seconds)) {
    throw new InvalidMotionParametersError(
      `Stay duration must be positive, got ${seconds}`,
      contextOf(timeline, index),
    );
  }
  const start = timeline.time;
  timeline.hold(start + seconds, "stay", index);
  timeline.overlayClip(command.animation, start, start + seconds);
}

function applyWaitUntil(timeline: ActorTimeline, command: WaitUntilCommand, index: number): void {
  const behind = timeline.time - command.time;
  if (behind > TIME_EPSILON) {
    throw new MotionTimelineError(
      `"${timeline.name}" is already at ${timeline.time.toFixed(3)}s, past wait_until ${command.time}s`,
      behind,
      contextOf(timeline, index),
    );
  }
  if (-behind > TIME_EPSILON) {
    timeline.hold(command.time, "wait_until", index);
  }
}
