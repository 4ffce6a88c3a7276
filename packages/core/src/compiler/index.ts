/**
 * Compiler module: public API exports.
 */

// Authoring
export {
  PlanBuilder,
  ActorCursor,
  CameraCursor,
  DirectionalMove,
  TargetedMove,
  DEFAULT_FPS,
  DEFAULT_ROTATION_DURATION,
  DEFAULT_TRACKING_FRACTION,
  mph,
  mps,
  cmps,
  speedPreset,
} from "./builder.js";
export type {
  PlanConfig,
  PoseInput,
  CameraPoseInput,
  LightInput,
  RotationOptions,
  FaceOptions,
  StayOptions,
  AnimationOptions,
  ConstraintInput,
  ForkScope,
} from "./builder.js";
export { fromCommandDocument, toCommandDocument } from "./command-document.js";

// Plan types
export type {
  Pose,
  PlanActor,
  MoveTarget,
  MoveConstraint,
  Drift,
  MoveCommand,
  Heading,
  RotationTiming,
  FaceCommand,
  TurnCommand,
  StayLength,
  StayCommand,
  WaitUntilCommand,
  AnimationCommand,
  CameraTrackCommand,
  CameraFrameCommand,
  CameraFocalLengthCommand,
  CameraCommand,
  ActorCommand,
  ActorCommandType,
  LightDeclaration,
  AtmosphereDeclaration,
  AudioCue,
  CameraCut,
  SceneDeclarations,
  MotionPlan,
} from "./types.js";

// Compilation
export { compile } from "./compiler.js";
export { DEFAULT_COMPILE_OPTIONS, resolveCompileOptions } from "./options.js";
export type { CompileOptions, ResolvedCompileOptions } from "./options.js";
export { resolveTimelines, solveMove } from "./resolver.js";
export type { ResolvedTimelines, SolvedMove } from "./resolver.js";
export { runCameraPasses, sampleTimes } from "./camera-passes.js";
export { planDuration, finalizeTimelines, validateTimelines } from "./director.js";
export { exportDocument } from "./export.js";
export { ActorTimeline } from "./timeline.js";
export type {
  TimelineSegment,
  AnimationSpan,
  CameraEntryKind,
  CameraTimelineEntry,
  TillEndMarker,
} from "./timeline.js";
export { KeyframeTrack, createTrackSet, sampleLocation } from "./track.js";
export type { TrackSet, ValueEquals } from "./track.js";

// Delivery
export { deliver } from "./sink.js";
export type { KeyframeSink, SinkResult } from "./sink.js";
export { RecordingSink } from "./recording-sink.js";

// Scene presets
export {
  INTENSITY_PRESETS,
  COLOR_PRESETS,
  SUN_ANGLE_PRESETS,
  resolveIntensity,
  resolveColor,
  resolveSunPitch,
  resolveLight,
  resolveScene,
} from "./scene.js";

// Errors
export {
  MotionPlanError,
  AmbiguousConstraintError,
  UnderconstrainedMotionError,
  UndefinedWaypointError,
  DuplicateWaypointError,
  InvalidMotionParametersError,
  UnknownTrackingSubjectError,
  FacingTargetError,
  MotionTimelineError,
  TimelineOverflowError,
  TillEndPlacementError,
  UnknownActorError,
  DuplicateActorError,
  ActorKindError,
  CommandDocumentError,
} from "./errors.js";
export type { ErrorContext, MotionPlanErrorCode } from "./errors.js";

// Logging
export { silentLogger, createConsoleLogger } from "./logger.js";
export type { PlanLogger, ConsoleLoggerOptions } from "./logger.js";

// Math and units
export {
  ORIGIN,
  addVec,
  subVec,
  scaleVec,
  lerpVec,
  distance3d,
  vecEquals,
  directionAngle,
  directionVector,
  shortestYawDelta,
  shortestPathYaw,
  perpendicular,
  clampLateral,
  corridorOffset,
  rampedSpeed,
  rampedDistance,
  lookAtRotation,
  focalLengthFor,
} from "./motion-math.js";
export type { LookAngles } from "./motion-math.js";
export {
  CM_PER_SEC_PER_MPH,
  SPEED_PRESETS,
  mphToCmPerSec,
  mpsToCmPerSec,
  metersToCm,
  cmToMeters,
  speedToCmPerSec,
  toFrame,
} from "./units.js";
