/**
 * Core types of a motion plan.
 *
 * A MotionPlan is the immutable output of the PlanBuilder: global config,
 * the declared actors with one command stream each, the waypoint names the
 * streams record, and the presentation-only scene declarations.
 */

import type {
  ActorKind,
  CardinalDirection,
  ColorSpec,
  Direction,
  IntensitySpec,
  LightType,
  Rotator,
  SpeedSpec,
  SunAngleSpec,
  Vec3,
} from "@blocking/schema";

// ---------------------------------------------------------------------------
// Actors
// ---------------------------------------------------------------------------

/** Initial placement of an actor. */
export interface Pose {
  /** Centimetres. */
  readonly location: Vec3;
  readonly rotation: Rotator;
  /**
   * Added to every emitted yaw. Lets a mesh whose forward axis is not +X
   * face the logical heading; motion math ignores it.
   */
  readonly meshYawOffset: number;
}

/** A declared actor and its command stream. */
export interface PlanActor {
  readonly name: string;
  readonly kind: ActorKind;
  readonly pose: Pose;
  /** Cameras only: focal length (mm) at frame 0. */
  readonly focalLength?: number;
  readonly commands: readonly ActorCommand[];
}

// ---------------------------------------------------------------------------
// Move
// ---------------------------------------------------------------------------

/** Where a move goes: along a direction, or to a fixed point. */
export type MoveTarget =
  | { readonly kind: "direction"; readonly direction: Direction; readonly offset: number }
  | { readonly kind: "waypoint"; readonly waypoint: string }
  | { readonly kind: "location"; readonly location: Vec3 };

/**
 * The two quantities a move was given. Directional moves take a pair and
 * solve the third; targeted moves know their distance and take one more.
 * Distances are metres, times seconds.
 */
export type MoveConstraint =
  | { readonly kind: "distance_time"; readonly distance: number; readonly time: number }
  | { readonly kind: "distance_speed"; readonly distance: number; readonly speed: SpeedSpec }
  | { readonly kind: "time_speed"; readonly time: number; readonly speed: SpeedSpec }
  | { readonly kind: "time"; readonly time: number }
  | { readonly kind: "speed"; readonly speed: SpeedSpec };

/** Lateral drift inside a corridor, in metres. Positive drifts right. */
export interface Drift {
  readonly lateral: number;
  /** Corridor half-width. Unbounded when absent. */
  readonly limit?: number;
}

export interface MoveCommand {
  readonly type: "move";
  readonly target: MoveTarget;
  readonly constraint: MoveConstraint;
  /** Record the end position under this name. */
  readonly waypoint?: string;
  /** Ramp linearly from this speed; the constraint speed becomes the target. */
  readonly rampFrom?: SpeedSpec;
  readonly drift?: Drift;
  /** Relative turn, in degrees, performed over the move. */
  readonly turnBy?: number;
  readonly animation?: string;
}

// ---------------------------------------------------------------------------
// Other actor commands
// ---------------------------------------------------------------------------

export type Heading =
  | { readonly kind: "direction"; readonly direction: Direction; readonly offset: number }
  | { readonly kind: "yaw"; readonly yaw: number }
  /** Toward another actor's position at the moment the rotation starts. */
  | { readonly kind: "actor"; readonly actor: string };

/** How long a face or turn takes: a fixed time, or a constant angular rate. */
export type RotationTiming =
  | { readonly kind: "duration"; readonly seconds: number }
  | { readonly kind: "rate"; readonly degreesPerSecond: number };

export interface FaceCommand {
  readonly type: "face";
  readonly heading: Heading;
  readonly timing: RotationTiming;
  readonly animation?: string;
}

/** Relative rotation; positive turns right (toward east from north). */
export interface TurnCommand {
  readonly type: "turn";
  readonly degrees: number;
  readonly timing: RotationTiming;
  readonly animation?: string;
}

/** A hold for a fixed time, or until the plan ends. */
export type StayLength =
  | { readonly kind: "seconds"; readonly seconds: number }
  | { readonly kind: "till_end" };

export interface StayCommand {
  readonly type: "stay";
  readonly length: StayLength;
  readonly animation?: string;
}

/** Hold until an absolute plan time. */
export interface WaitUntilCommand {
  readonly type: "wait_until";
  readonly time: number;
}

export interface AnimationCommand {
  readonly type: "animation";
  readonly clip: string;
  /** Playback speed of the clip; 1 when absent. */
  readonly playRate?: number;
}

/** Aim the camera (or its focus) at a subject's point `heightFraction` up its body. */
export interface CameraTrackCommand {
  readonly type: "camera_look_at" | "camera_focus";
  readonly subject: string;
  readonly heightFraction: number;
}

/** Zoom so that the subject fills `coverage` of the frame height. */
export interface CameraFrameCommand {
  readonly type: "camera_frame_subject";
  readonly subject: string;
  readonly coverage: number;
}

/** Fix the focal length (mm), ending any auto-zoom. */
export interface CameraFocalLengthCommand {
  readonly type: "camera_focal_length";
  readonly focalLength: number;
}

export type CameraCommand = CameraTrackCommand | CameraFrameCommand | CameraFocalLengthCommand;

export type ActorCommand =
  | MoveCommand
  | FaceCommand
  | TurnCommand
  | StayCommand
  | WaitUntilCommand
  | AnimationCommand
  | CameraCommand;

export type ActorCommandType = ActorCommand["type"];

// ---------------------------------------------------------------------------
// Scene
// ---------------------------------------------------------------------------

export interface LightDeclaration {
  readonly name: string;
  readonly lightType: LightType;
  readonly location?: Vec3;
  readonly rotation?: Rotator;
  /** Directional lights: the compass side the light comes from. */
  readonly from?: CardinalDirection;
  /** Directional lights: elevation. */
  readonly angle?: SunAngleSpec;
  readonly intensity?: IntensitySpec;
  readonly color?: ColorSpec;
  readonly castShadows?: boolean;
}

export interface AtmosphereDeclaration {
  readonly fogDensity?: number;
  readonly sunLight?: string;
}

export interface AudioCue {
  readonly asset: string;
  /** Seconds. */
  readonly start?: number;
  readonly duration?: number;
  readonly volume?: number;
}

export interface CameraCut {
  readonly camera: string;
  readonly time: number;
}

export interface SceneDeclarations {
  readonly lights: readonly LightDeclaration[];
  readonly atmosphere: AtmosphereDeclaration | null;
  readonly audio: readonly AudioCue[];
  readonly cuts: readonly CameraCut[];
}

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

export interface MotionPlan {
  readonly name: string;
  readonly fps: number;
  /** Seconds. When absent, the latest end time across actors. */
  readonly duration?: number;
  /** Declaration order is preserved. */
  readonly actors: ReadonlyMap<string, PlanActor>;
  /** Waypoint names recorded by the streams, in recording order. */
  readonly waypointNames: readonly string[];
  readonly scene: SceneDeclarations;
}
