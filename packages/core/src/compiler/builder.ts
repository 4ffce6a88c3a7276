/**
 * PlanBuilder: the fluent authoring surface for motion plans.
 *
 * Authoring mistakes fail here, at the call that makes them, rather than at
 * compile time: ambiguous or missing move constraints, commands after a
 * till-end stay, references to waypoints nobody recorded yet, unknown
 * actors.
 *
 * @example
 * ```ts
 * const builder = new PlanBuilder({ name: "Sprint", fps: 30, duration: 8 });
 * builder.addActor("Hero", { location: { x: 0, y: 0, z: 0 } });
 * builder
 *   .actor("Hero")
 *   .animation("Idle")
 *   .stay(1)
 *   .animation("Jog_Fwd")
 *   .move("north").timeAtSpeed(5, mph(8))
 *   .stay(2);
 * const plan = builder.build();
 * ```
 */

import type {
  ActorKind,
  Direction,
  Rotator,
  SpeedPreset,
  SpeedSpec,
  Vec3,
} from "@blocking/schema";
import {
  ActorKindError,
  AmbiguousConstraintError,
  DuplicateActorError,
  DuplicateWaypointError,
  InvalidMotionParametersError,
  TillEndPlacementError,
  UndefinedWaypointError,
  UnderconstrainedMotionError,
  UnknownActorError,
} from "./errors.js";
import type { ErrorContext } from "./errors.js";
import type {
  ActorCommand,
  AtmosphereDeclaration,
  AudioCue,
  CameraCut,
  Drift,
  LightDeclaration,
  MotionPlan,
  MoveCommand,
  MoveConstraint,
  MoveTarget,
  PlanActor,
  Pose,
  RotationTiming,
} from "./types.js";

/** Default height fraction for look-at and focus, and default zoom coverage. */
export const DEFAULT_TRACKING_FRACTION = 0.7;
/** Seconds a face or turn takes when no duration is given. */
export const DEFAULT_ROTATION_DURATION = 1;
export const DEFAULT_FPS = 30;

const ZERO_ROTATION: Rotator = { pitch: 0, yaw: 0, roll: 0 };

// ---------------------------------------------------------------------------
// Speed helpers
// ---------------------------------------------------------------------------

export function mph(value: number): SpeedSpec {
  return { unit: "mph", value };
}

export function mps(value: number): SpeedSpec {
  return { unit: "mps", value };
}

export function cmps(value: number): SpeedSpec {
  return { unit: "cmps", value };
}

export function speedPreset(preset: SpeedPreset): SpeedSpec {
  return { preset };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface PlanConfig {
  readonly name: string;
  /** Positive integer. Default 30. */
  readonly fps?: number;
  /** Seconds. When absent the plan runs as long as its longest actor. */
  readonly duration?: number;
}

export interface PoseInput {
  /** Centimetres. */
  readonly location: Vec3;
  readonly rotation?: Rotator;
  readonly meshYawOffset?: number;
}

export interface CameraPoseInput extends PoseInput {
  /** Millimetres, keyed at frame 0. */
  readonly focalLength?: number;
}

export type LightInput = Omit<LightDeclaration, "name">;

export interface RotationOptions {
  /** Seconds. Default 1. */
  readonly duration?: number;
  /** Degrees per second, instead of a duration. */
  readonly rate?: number;
  readonly animation?: string;
}

export interface FaceOptions extends RotationOptions {
  readonly offset?: number;
}

export interface StayOptions {
  readonly animation?: string;
}

export interface AnimationOptions {
  /** Playback speed multiplier. Default 1. */
  readonly playRate?: number;
}

/** Any two of these for a directional move, one of time or speed for a targeted one. */
export interface ConstraintInput {
  /** Metres. */
  readonly distance?: number;
  /** Seconds. */
  readonly time?: number;
  readonly speed?: SpeedSpec;
}

// ---------------------------------------------------------------------------
// Internal stream state
// ---------------------------------------------------------------------------

type Slot =
  | { readonly kind: "command"; readonly command: ActorCommand }
  /** A move draft not yet committed. */
  | { readonly kind: "pending" };

/** Waypoint names in recording order. */
class WaypointTable {
  private readonly names: string[] = [];

  has(name: string): boolean {
    return this.names.includes(name);
  }

  require(name: string, context: ErrorContext): void {
    if (!this.has(name)) {
      throw new UndefinedWaypointError(name, context);
    }
  }

  assertFree(name: string, context: ErrorContext): void {
    if (this.has(name)) {
      throw new DuplicateWaypointError(name, context);
    }
  }

  record(name: string, context: ErrorContext): void {
    this.assertFree(name, context);
    this.names.push(name);
  }

  list(): readonly string[] {
    return [...this.names];
  }
}

/** One actor's declaration and append-only command stream. */
class ActorStream {
  readonly name: string;
  readonly kind: ActorKind;
  readonly pose: Pose;
  readonly focalLength: number | undefined;
  readonly waypoints: WaypointTable;
  /** Every stream of the plan, this one included. */
  readonly roster: ReadonlyMap<string, ActorStream>;
  private readonly slots: Slot[] = [];
  private tillEndIndex: number | null = null;

  constructor(
    name: string,
    kind: ActorKind,
    pose: Pose,
    focalLength: number | undefined,
    waypoints: WaypointTable,
    roster: ReadonlyMap<string, ActorStream>,
  ) {
    this.name = name;
    this.kind = kind;
    this.pose = pose;
    this.focalLength = focalLength;
    this.waypoints = waypoints;
    this.roster = roster;
  }

  context(commandIndex: number = this.slots.length): ErrorContext {
    return { actor: this.name, commandIndex };
  }

  append(command: ActorCommand): void {
    const index = this.nextIndex();
    this.slots.push({ kind: "command", command: Object.freeze(command) });
    if (command.type === "stay" && command.length.kind === "till_end") {
      this.tillEndIndex = index;
    }
  }

  /** Hold a slot for a move draft so the move keeps its place in the stream. */
  reserve(): number {
    const index = this.nextIndex();
    this.slots.push({ kind: "pending" });
    return index;
  }

  fill(index: number, command: MoveCommand): void {
    this.slots[index] = { kind: "command", command: Object.freeze(command) };
  }

  toActor(): PlanActor {
    const commands = this.slots.map((slot, index) => {
      if (slot.kind === "pending") {
        throw new UnderconstrainedMotionError(
          `Move ${index} of "${this.name}" was never given a constraint`,
          this.context(index),
        );
      }
      return slot.command;
    });
    return Object.freeze({
      name: this.name,
      kind: this.kind,
      pose: this.pose,
      focalLength: this.focalLength,
      commands: Object.freeze(commands),
    });
  }

  private nextIndex(): number {
    const index = this.slots.length;
    if (this.tillEndIndex !== null) {
      throw new TillEndPlacementError(
        `"${this.name}" already ends with a till-end stay (command ${this.tillEndIndex}); ` +
          `command ${index} cannot follow it`,
        this.context(index),
      );
    }
    return index;
  }
}

function requireFinite(value: number, what: string, context: ErrorContext): void {
  if (!Number.isFinite(value)) {
    throw new InvalidMotionParametersError(`${what} must be a finite number, got ${value}`, context);
  }
}

function rotationTiming(options: RotationOptions, context: ErrorContext): RotationTiming {
  const { duration, rate } = options;
  if (duration !== undefined && rate !== undefined) {
    throw new AmbiguousConstraintError("A rotation takes a duration or a rate, not both", context);
  }
  if (rate === undefined) {
    return { kind: "duration", seconds: duration ?? DEFAULT_ROTATION_DURATION };
  }
  if (!(rate > 0) || !Number.isFinite(rate)) {
    throw new InvalidMotionParametersError(`Rotation rate must be positive, got ${rate}`, context);
  }
  return { kind: "rate", degreesPerSecond: rate };
}

// ---------------------------------------------------------------------------
// Move drafts
// ---------------------------------------------------------------------------

interface MoveModifiers {
  waypoint?: string;
  rampFrom?: SpeedSpec;
  drift?: Drift;
  turnBy?: number;
  animation?: string;
}

/**
 * A move between its declaration and its constraint.
 *
 * Modifiers may be chained while the draft is unconstrained. Exactly one
 * terminal call commits it; any call after that raises
 * AmbiguousConstraintError. A draft never committed fails `build()`.
 */
abstract class MoveDraft<C> {
  protected readonly stream: ActorStream;
  private readonly cursor: C;
  protected readonly index: number;
  private readonly target: MoveTarget;
  private readonly modifiers: MoveModifiers = {};
  private committed = false;

  constructor(stream: ActorStream, cursor: C, target: MoveTarget) {
    this.stream = stream;
    this.cursor = cursor;
    this.target = target;
    this.index = stream.reserve();
  }

  /** Record the end position under `name`. */
  waypoint(name: string): this {
    this.assertOpen("waypoint");
    this.stream.waypoints.assertFree(name, this.context());
    this.modifiers.waypoint = name;
    return this;
  }

  /** Ramp velocity linearly from `from` to the constraint speed. */
  ramp(from: SpeedSpec): this {
    this.assertOpen("ramp");
    this.modifiers.rampFrom = from;
    return this;
  }

  /** Turn by `degrees` over the course of the move. */
  turnBy(degrees: number): this {
    this.assertOpen("turnBy");
    requireFinite(degrees, "turnBy", this.context());
    this.modifiers.turnBy = degrees;
    return this;
  }

  /** Play `clip` for the move only. */
  animation(clip: string): this {
    this.assertOpen("animation");
    this.modifiers.animation = clip;
    return this;
  }

  protected setDrift(drift: Drift): void {
    this.assertOpen("drift");
    this.modifiers.drift = drift;
  }

  protected context(): ErrorContext {
    return this.stream.context(this.index);
  }

  protected assertOpen(call: string): void {
    if (this.committed) {
      throw new AmbiguousConstraintError(
        `Move ${this.index} of "${this.stream.name}" is already constrained; ${call}() cannot follow`,
        this.context(),
      );
    }
  }

  protected commit(constraint: MoveConstraint, call: string): C {
    this.assertOpen(call);
    const { waypoint } = this.modifiers;
    if (waypoint !== undefined) {
      this.stream.waypoints.record(waypoint, this.context());
    }
    this.committed = true;
    this.stream.fill(this.index, { type: "move", target: this.target, constraint, ...this.modifiers });
    return this.cursor;
  }
}

/** A move along a direction: give two of distance, time and speed. */
export class DirectionalMove<C> extends MoveDraft<C> {
  /** Drift `lateral` metres sideways over the move, clamped to `±limit`. */
  drift(lateral: number, limit?: number): this {
    this.setDrift(limit === undefined ? { lateral } : { lateral, limit });
    return this;
  }

  distanceInTime(distance: number, time: number): C {
    return this.commit({ kind: "distance_time", distance, time }, "distanceInTime");
  }

  distanceAtSpeed(distance: number, speed: SpeedSpec): C {
    return this.commit({ kind: "distance_speed", distance, speed }, "distanceAtSpeed");
  }

  timeAtSpeed(time: number, speed: SpeedSpec): C {
    return this.commit({ kind: "time_speed", time, speed }, "timeAtSpeed");
  }

  /** Commit from a loose set of quantities; exactly two must be present. */
  constrain(input: ConstraintInput): C {
    this.assertOpen("constrain");
    const { distance, time, speed } = input;
    const given = [distance, time, speed].filter((q) => q !== undefined).length;
    if (given > 2) {
      throw new AmbiguousConstraintError(
        `Move ${this.index} of "${this.stream.name}" gives distance, time and speed; pick two`,
        this.context(),
      );
    }
    if (distance !== undefined && time !== undefined) {
      return this.distanceInTime(distance, time);
    }
    if (distance !== undefined && speed !== undefined) {
      return this.distanceAtSpeed(distance, speed);
    }
    if (time !== undefined && speed !== undefined) {
      return this.timeAtSpeed(time, speed);
    }
    throw new UnderconstrainedMotionError(
      `Move ${this.index} of "${this.stream.name}" needs two of distance, time and speed`,
      this.context(),
    );
  }
}

/** A move to a fixed point: the distance is known, give time or speed. */
export class TargetedMove<C> extends MoveDraft<C> {
  inTime(time: number): C {
    return this.commit({ kind: "time", time }, "inTime");
  }

  atSpeed(speed: SpeedSpec): C {
    return this.commit({ kind: "speed", speed }, "atSpeed");
  }

  constrain(input: ConstraintInput): C {
    this.assertOpen("constrain");
    const { distance, time, speed } = input;
    if (distance !== undefined || (time !== undefined && speed !== undefined)) {
      throw new AmbiguousConstraintError(
        `Move ${this.index} of "${this.stream.name}" has a fixed target; give only time or speed`,
        this.context(),
      );
    }
    if (time !== undefined) {
      return this.inTime(time);
    }
    if (speed !== undefined) {
      return this.atSpeed(speed);
    }
    throw new UnderconstrainedMotionError(
      `Move ${this.index} of "${this.stream.name}" needs a time or a speed`,
      this.context(),
    );
  }
}

// ---------------------------------------------------------------------------
// Cursors
// ---------------------------------------------------------------------------

/** Appends commands to one actor's stream. Every method returns the cursor. */
export class ActorCursor {
  protected readonly stream: ActorStream;

  /** @internal */
  constructor(stream: ActorStream) {
    this.stream = stream;
  }

  get name(): string {
    return this.stream.name;
  }

  /** Start a move along `direction`, `offset` degrees added to its angle. */
  move(direction: Direction, offset = 0): DirectionalMove<this> {
    requireFinite(offset, "Direction offset", this.stream.context());
    return new DirectionalMove(this.stream, this, { kind: "direction", direction, offset });
  }

  moveToWaypoint(waypoint: string): TargetedMove<this> {
    this.stream.waypoints.require(waypoint, this.stream.context());
    return new TargetedMove(this.stream, this, { kind: "waypoint", waypoint });
  }

  moveToLocation(location: Vec3): TargetedMove<this> {
    return new TargetedMove(this.stream, this, { kind: "location", location: { ...location } });
  }

  face(direction: Direction, options: FaceOptions = {}): this {
    const offset = options.offset ?? 0;
    requireFinite(offset, "Direction offset", this.stream.context());
    this.stream.append({
      type: "face",
      heading: { kind: "direction", direction, offset },
      timing: rotationTiming(options, this.stream.context()),
      animation: options.animation,
    });
    return this;
  }

  faceYaw(yaw: number, options: RotationOptions = {}): this {
    requireFinite(yaw, "Yaw", this.stream.context());
    this.stream.append({
      type: "face",
      heading: { kind: "yaw", yaw },
      timing: rotationTiming(options, this.stream.context()),
      animation: options.animation,
    });
    return this;
  }

  /**
   * Turn toward `target`'s position at the time this rotation starts. A
   * directed target must be declared before this actor, so that its
   * position is already resolved.
   */
  faceActor(target: string, options: RotationOptions = {}): this {
    const context = this.stream.context();
    if (!this.stream.roster.has(target)) {
      throw new UnknownActorError(target, context);
    }
    if (target === this.stream.name) {
      throw new InvalidMotionParametersError(`"${target}" cannot face itself`, context);
    }
    this.stream.append({
      type: "face",
      heading: { kind: "actor", actor: target },
      timing: rotationTiming(options, context),
      animation: options.animation,
    });
    return this;
  }

  /** Turn by relative `degrees`; positive turns right. */
  turn(degrees: number, options: RotationOptions = {}): this {
    requireFinite(degrees, "Turn", this.stream.context());
    this.stream.append({
      type: "turn",
      degrees,
      timing: rotationTiming(options, this.stream.context()),
      animation: options.animation,
    });
    return this;
  }

  turnLeft(degrees: number, options: RotationOptions = {}): this {
    this.requireTurnAngle(degrees);
    return this.turn(-degrees, options);
  }

  turnRight(degrees: number, options: RotationOptions = {}): this {
    this.requireTurnAngle(degrees);
    return this.turn(degrees, options);
  }

  stay(seconds: number, options: StayOptions = {}): this {
    this.stream.append({ type: "stay", length: { kind: "seconds", seconds }, animation: options.animation });
    return this;
  }

  /** Hold until the plan ends. Must be the actor's last command. */
  stayTillEnd(options: StayOptions = {}): this {
    this.stream.append({ type: "stay", length: { kind: "till_end" }, animation: options.animation });
    return this;
  }

  animation(clip: string, options: AnimationOptions = {}): this {
    const { playRate } = options;
    if (playRate === undefined) {
      this.stream.append({ type: "animation", clip });
      return this;
    }
    if (!(playRate > 0) || !Number.isFinite(playRate)) {
      throw new InvalidMotionParametersError(`Play rate must be positive, got ${playRate}`, this.stream.context());
    }
    this.stream.append({ type: "animation", clip, playRate });
    return this;
  }

  /** Hold until absolute plan time `time`. */
  waitUntil(time: number): this {
    requireFinite(time, "wait_until time", this.stream.context());
    this.stream.append({ type: "wait_until", time });
    return this;
  }

  private requireTurnAngle(degrees: number): void {
    if (!(degrees >= 0) || !Number.isFinite(degrees)) {
      throw new InvalidMotionParametersError(
        `A left or right turn takes a non-negative angle, got ${degrees}`,
        this.stream.context(),
      );
    }
  }
}

/** An actor cursor with the camera tracking commands. */
export class CameraCursor extends ActorCursor {
  lookAt(subject: string, heightFraction = DEFAULT_TRACKING_FRACTION): this {
    this.requireFraction(heightFraction, "Height fraction", false);
    this.stream.append({ type: "camera_look_at", subject, heightFraction });
    return this;
  }

  focusOn(subject: string, heightFraction = DEFAULT_TRACKING_FRACTION): this {
    this.requireFraction(heightFraction, "Height fraction", false);
    this.stream.append({ type: "camera_focus", subject, heightFraction });
    return this;
  }

  /** Auto-zoom so that `subject` fills `coverage` of the frame height. */
  frameSubject(subject: string, coverage = DEFAULT_TRACKING_FRACTION): this {
    this.requireFraction(coverage, "Coverage", true);
    this.stream.append({ type: "camera_frame_subject", subject, coverage });
    return this;
  }

  /** Fix the focal length (mm), ending any auto-zoom. */
  focalLength(focalLength: number): this {
    if (!(focalLength > 0) || !Number.isFinite(focalLength)) {
      throw new InvalidMotionParametersError(
        `Focal length must be positive, got ${focalLength}`,
        this.stream.context(),
      );
    }
    this.stream.append({ type: "camera_focal_length", focalLength });
    return this;
  }

  /** Coverage lies in (0, 1]; a height fraction only needs to be non-negative. */
  private requireFraction(value: number, what: string, bounded: boolean): void {
    const valid = bounded ? value > 0 && value <= 1 : value >= 0 && Number.isFinite(value);
    if (!valid) {
      throw new InvalidMotionParametersError(
        `${what} must be ${bounded ? "in (0, 1]" : "non-negative"}, got ${value}`,
        this.stream.context(),
      );
    }
  }
}

/**
 * Cursors handed out inside a `simultaneous` block. The first time a block
 * addresses an actor, that actor waits until the fork time.
 */
export interface ForkScope {
  readonly time: number;
  actor(name: string): ActorCursor;
  camera(name: string): CameraCursor;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class PlanBuilder {
  private readonly name: string;
  private readonly fps: number;
  private readonly duration: number | undefined;
  private readonly streams = new Map<string, ActorStream>();
  private readonly waypoints = new WaypointTable();
  private readonly lights: LightDeclaration[] = [];
  private readonly audio: AudioCue[] = [];
  private readonly cuts: CameraCut[] = [];
  private atmosphere: AtmosphereDeclaration | null = null;
  private forkTime = 0;

  constructor(config: PlanConfig) {
    const fps = config.fps ?? DEFAULT_FPS;
    if (!Number.isInteger(fps) || fps <= 0) {
      throw new RangeError(`fps must be a positive integer, got ${fps}`);
    }
    if (config.duration !== undefined && (!(config.duration > 0) || !Number.isFinite(config.duration))) {
      throw new RangeError(`duration must be positive, got ${config.duration}`);
    }
    this.name = config.name;
    this.fps = fps;
    this.duration = config.duration;
  }

  // -------------------------------------------------------------------------
  // Declarations
  // -------------------------------------------------------------------------

  addActor(name: string, pose: PoseInput): ActorCursor {
    return new ActorCursor(this.declare(name, "character", pose, undefined));
  }

  addCamera(name: string, pose: CameraPoseInput): CameraCursor {
    if (pose.focalLength !== undefined && !(pose.focalLength > 0)) {
      throw new InvalidMotionParametersError(`Focal length must be positive, got ${pose.focalLength}`, {
        actor: name,
      });
    }
    return new CameraCursor(this.declare(name, "camera", pose, pose.focalLength));
  }

  /** Declare a light. Lights are actors too, so they may also be moved. */
  addLight(name: string, light: LightInput): ActorCursor {
    const stream = this.declare(
      name,
      "light",
      { location: light.location ?? { x: 0, y: 0, z: 0 }, rotation: light.rotation },
      undefined,
    );
    this.lights.push(structuredClone({ name, ...light }));
    return new ActorCursor(stream);
  }

  addAtmosphere(atmosphere: AtmosphereDeclaration): this {
    if (atmosphere.sunLight !== undefined) {
      this.requireKind(atmosphere.sunLight, "light");
    }
    this.atmosphere = { ...atmosphere };
    return this;
  }

  addAudio(cue: AudioCue): this {
    this.audio.push({ ...cue });
    return this;
  }

  /** From `time` on, `camera` is the active view. */
  cameraCut(camera: string, time: number): this {
    this.requireKind(camera, "camera");
    if (!(time >= 0)) {
      throw new InvalidMotionParametersError(`Camera cut time must not be negative, got ${time}`, {
        actor: camera,
        time,
      });
    }
    this.cuts.push({ camera, time });
    return this;
  }

  // -------------------------------------------------------------------------
  // Cursors
  // -------------------------------------------------------------------------

  actor(name: string): ActorCursor {
    return new ActorCursor(this.stream(name));
  }

  camera(name: string): CameraCursor {
    return new CameraCursor(this.requireKind(name, "camera"));
  }

  /** Set the time at which the next `simultaneous` block forks. */
  atTime(time: number): this {
    if (!(time >= 0) || !Number.isFinite(time)) {
      throw new InvalidMotionParametersError(`Fork time must not be negative, got ${time}`, { time });
    }
    this.forkTime = time;
    return this;
  }

  /**
   * Fork at the current `atTime` cursor: every actor the block addresses
   * starts from that time. There is no join; each stream continues at its
   * own pace afterwards.
   */
  simultaneous(block: (scope: ForkScope) => void): this {
    const time = this.forkTime;
    const started = new Set<string>();
    const enter = (name: string): ActorStream => {
      const stream = this.stream(name);
      if (!started.has(name)) {
        started.add(name);
        stream.append({ type: "wait_until", time });
      }
      return stream;
    };
    block({
      time,
      actor: (name) => new ActorCursor(enter(name)),
      camera: (name) => {
        this.requireKind(name, "camera");
        return new CameraCursor(enter(name));
      },
    });
    return this;
  }

  /** Freeze everything authored so far into a MotionPlan. */
  build(): MotionPlan {
    const actors = new Map<string, PlanActor>();
    for (const [name, stream] of this.streams) {
      actors.set(name, stream.toActor());
    }
    return Object.freeze({
      name: this.name,
      fps: this.fps,
      duration: this.duration,
      actors,
      waypointNames: this.waypoints.list(),
      scene: Object.freeze({
        lights: [...this.lights],
        atmosphere: this.atmosphere,
        audio: [...this.audio],
        cuts: [...this.cuts],
      }),
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private declare(name: string, kind: ActorKind, pose: PoseInput, focalLength: number | undefined): ActorStream {
    if (this.streams.has(name)) {
      throw new DuplicateActorError(name);
    }
    const stream = new ActorStream(
      name,
      kind,
      {
        location: { ...pose.location },
        rotation: { ...(pose.rotation ?? ZERO_ROTATION) },
        meshYawOffset: pose.meshYawOffset ?? 0,
      },
      focalLength,
      this.waypoints,
      this.streams,
    );
    this.streams.set(name, stream);
    return stream;
  }

  private stream(name: string): ActorStream {
    const stream = this.streams.get(name);
    if (stream === undefined) {
      throw new UnknownActorError(name);
    }
    return stream;
  }

  private requireKind(name: string, kind: ActorKind): ActorStream {
    const stream = this.stream(name);
    if (stream.kind !== kind) {
      throw new ActorKindError(name, kind, stream.kind);
    }
    return stream;
  }
}
