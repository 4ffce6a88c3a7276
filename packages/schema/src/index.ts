/**
 * @blocking/schema: serialized contracts of the motion compiler.
 *
 * The command document is the input (a zod schema is its source of truth);
 * the keyframe document is the output (a JSON Schema describes it, and the
 * TypeScript types below are aligned with it).
 */

export {
  CARDINAL_DIRECTIONS,
  RELATIVE_DIRECTIONS,
  SPEED_UNITS,
  SPEED_PRESET_NAMES,
  LIGHT_TYPES,
  LIGHT_INTENSITY_PRESET_NAMES,
  LIGHT_COLOR_PRESET_NAMES,
  SUN_ANGLE_PRESET_NAMES,
  vector3TupleSchema,
  rotationTupleSchema,
  speedSchema,
  commandRecordSchema,
  commandDocumentSchema,
  parseCommandDocument,
} from "./command-document.js";

export type {
  CardinalDirection,
  RelativeDirection,
  Direction,
  SpeedUnit,
  SpeedPreset,
  LightType,
  LightIntensityPreset,
  LightColorPreset,
  SunAnglePreset,
  Vector3Tuple,
  RotationTuple,
  SpeedSpec,
  IntensitySpec,
  ColorSpec,
  SunAngleSpec,
  CommandRecord,
  CommandDocument,
  CommandTag,
  CommandRecordOf,
  CommandDocumentParseResult,
} from "./command-document.js";

export { PROPERTY_NAMES } from "./keyframe-document.js";

export type {
  Vec3,
  Rotator,
  Interpolation,
  Keyframe,
  PropertyValueMap,
  PropertyName,
  ActorTracks,
  ActorKind,
  AnimationSection,
  SegmentSource,
  SegmentRecord,
  PoseRecord,
  ActorRecord,
  LightKind,
  LightRecord,
  AtmosphereRecord,
  AudioRecord,
  CameraCutRecord,
  SceneRecord,
  KeyframeDocument,
} from "./keyframe-document.js";
