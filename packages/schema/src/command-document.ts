/**
 * The command document: the serialized form of a motion plan.
 *
 * Authoring tools, agents and hand-written scripts produce this JSON; the
 * compiler parses it with the zod schemas below and replays it through the
 * plan builder. The schemas are the source of truth: every TypeScript type in
 * this file is inferred from them.
 *
 * @example
 * ```json
 * {
 *   "name": "Sprint",
 *   "fps": 30,
 *   "duration": 8,
 *   "commands": [
 *     { "command": "add_actor", "actor": "Hero", "location": [0, 0, 0] },
 *     { "command": "animation", "actor": "Hero", "clip": "Jog_Fwd" },
 *     { "command": "move", "actor": "Hero", "direction": "north",
 *       "time": 5, "speed": { "unit": "mph", "value": 8 } },
 *     { "command": "stay", "actor": "Hero", "tillEnd": true }
 *   ]
 * }
 * ```
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Vocabulary
// ---------------------------------------------------------------------------

/** Absolute compass directions, 45° apart. North is +X, east is +Y. */
export const CARDINAL_DIRECTIONS = [
  "north",
  "north_east",
  "east",
  "south_east",
  "south",
  "south_west",
  "west",
  "north_west",
] as const;

/** Directions measured from the actor's current facing. */
export const RELATIVE_DIRECTIONS = ["forward", "right", "backward", "left"] as const;

export const SPEED_UNITS = ["mph", "mps", "cmps"] as const;

export const SPEED_PRESET_NAMES = ["walk", "jog", "run", "sprint"] as const;

export const LIGHT_TYPES = ["point", "spot", "directional", "rect"] as const;

export const LIGHT_INTENSITY_PRESET_NAMES = [
  "very_dim",
  "dim",
  "soft",
  "moderate",
  "normal",
  "bright",
  "very_bright",
  "intense",
  "extreme",
] as const;

export const LIGHT_COLOR_PRESET_NAMES = [
  "deep_sunset",
  "sunset",
  "golden",
  "warm_white",
  "white",
  "cool_white",
  "overcast",
  "moonlight",
] as const;

/** Sun elevation presets, from grazing to straight down. */
export const SUN_ANGLE_PRESET_NAMES = [
  "horizon",
  "low",
  "low_high",
  "medium",
  "medium_high",
  "high",
  "very_high",
  "overhead",
] as const;

export type CardinalDirection = (typeof CARDINAL_DIRECTIONS)[number];
export type RelativeDirection = (typeof RELATIVE_DIRECTIONS)[number];
export type Direction = CardinalDirection | RelativeDirection;
export type SpeedUnit = (typeof SPEED_UNITS)[number];
export type SpeedPreset = (typeof SPEED_PRESET_NAMES)[number];
export type LightType = (typeof LIGHT_TYPES)[number];
export type LightIntensityPreset = (typeof LIGHT_INTENSITY_PRESET_NAMES)[number];
export type LightColorPreset = (typeof LIGHT_COLOR_PRESET_NAMES)[number];
export type SunAnglePreset = (typeof SUN_ANGLE_PRESET_NAMES)[number];

// ---------------------------------------------------------------------------
// Shared value schemas
// ---------------------------------------------------------------------------

const directionSchema = z.enum([...CARDINAL_DIRECTIONS, ...RELATIVE_DIRECTIONS]);

/** `[x, y, z]` in centimetres. */
export const vector3TupleSchema = z.tuple([z.number(), z.number(), z.number()]);

/** `[pitch, yaw, roll]` in degrees. */
export const rotationTupleSchema = z.tuple([z.number(), z.number(), z.number()]);

/** A speed: either a raw value with its unit, or a named preset. */
export const speedSchema = z.union([
  z.object({ unit: z.enum(SPEED_UNITS), value: z.number() }).strict(),
  z.object({ preset: z.enum(SPEED_PRESET_NAMES) }).strict(),
]);

const intensitySchema = z.union([
  z.object({ preset: z.enum(LIGHT_INTENSITY_PRESET_NAMES) }).strict(),
  z.object({ value: z.number().nonnegative() }).strict(),
]);

const channel = z.number().min(0).max(1);

/** Raw colors are linear RGB, each channel in [0, 1]. */
const colorSchema = z.union([
  z.object({ preset: z.enum(LIGHT_COLOR_PRESET_NAMES) }).strict(),
  z.object({ rgb: z.tuple([channel, channel, channel]) }).strict(),
]);

const sunAngleSchema = z.union([
  z.object({ preset: z.enum(SUN_ANGLE_PRESET_NAMES) }).strict(),
  z.object({ pitch: z.number() }).strict(),
]);

const actorName = z.string().min(1);

// ---------------------------------------------------------------------------
// Declaration records
// ---------------------------------------------------------------------------

const addActorSchema = z
  .object({
    command: z.literal("add_actor"),
    actor: actorName,
    location: vector3TupleSchema,
    rotation: rotationTupleSchema.optional(),
    meshYawOffset: z.number().optional(),
  })
  .strict();

const addCameraSchema = z
  .object({
    command: z.literal("add_camera"),
    actor: actorName,
    location: vector3TupleSchema,
    rotation: rotationTupleSchema.optional(),
    focalLength: z.number().positive().optional(),
  })
  .strict();

const addLightSchema = z
  .object({
    command: z.literal("add_light"),
    actor: actorName,
    lightType: z.enum(LIGHT_TYPES),
    location: vector3TupleSchema.optional(),
    rotation: rotationTupleSchema.optional(),
    from: z.enum(CARDINAL_DIRECTIONS).optional(),
    angle: sunAngleSchema.optional(),
    intensity: intensitySchema.optional(),
    color: colorSchema.optional(),
    castShadows: z.boolean().optional(),
  })
  .strict();

const addAtmosphereSchema = z
  .object({
    command: z.literal("add_atmosphere"),
    fogDensity: z.number().nonnegative().optional(),
    sunLight: actorName.optional(),
  })
  .strict();

const addAudioSchema = z
  .object({
    command: z.literal("add_audio"),
    asset: z.string().min(1),
    start: z.number().nonnegative().optional(),
    duration: z.number().positive().optional(),
    volume: z.number().nonnegative().optional(),
  })
  .strict();

/** Switch the active camera at an absolute plan time. */
const cameraCutSchema = z
  .object({
    command: z.literal("camera_cut"),
    camera: actorName,
    time: z.number().nonnegative(),
  })
  .strict();

// ---------------------------------------------------------------------------
// Actor command records
// ---------------------------------------------------------------------------

const moveSchema = z
  .object({
    command: z.literal("move"),
    actor: actorName,
    direction: directionSchema.optional(),
    offset: z.number().optional(),
    toWaypoint: z.string().min(1).optional(),
    toLocation: vector3TupleSchema.optional(),
    distance: z.number().optional(),
    time: z.number().optional(),
    speed: speedSchema.optional(),
    waypoint: z.string().min(1).optional(),
    rampFrom: speedSchema.optional(),
    drift: z
      .object({ lateral: z.number(), limit: z.number().nonnegative().optional() })
      .strict()
      .optional(),
    turnBy: z.number().optional(),
    animation: z.string().min(1).optional(),
  })
  .strict();

const faceSchema = z
  .object({
    command: z.literal("face"),
    actor: actorName,
    direction: directionSchema.optional(),
    offset: z.number().optional(),
    yaw: z.number().optional(),
    /** Face toward another actor. */
    toward: actorName.optional(),
    duration: z.number().optional(),
    /** Degrees per second, instead of a duration. */
    rate: z.number().optional(),
    animation: z.string().min(1).optional(),
  })
  .strict();

const turnSchema = z
  .object({
    command: z.literal("turn"),
    actor: actorName,
    degrees: z.number(),
    duration: z.number().optional(),
    rate: z.number().optional(),
    animation: z.string().min(1).optional(),
  })
  .strict();

const staySchema = z
  .object({
    command: z.literal("stay"),
    actor: actorName,
    seconds: z.number().optional(),
    tillEnd: z.boolean().optional(),
    animation: z.string().min(1).optional(),
  })
  .strict();

const waitUntilSchema = z
  .object({
    command: z.literal("wait_until"),
    actor: actorName,
    time: z.number().nonnegative(),
  })
  .strict();

const animationSchema = z
  .object({
    command: z.literal("animation"),
    actor: actorName,
    clip: z.string().min(1),
    playRate: z.number().positive().optional(),
  })
  .strict();

const cameraLookAtSchema = z
  .object({
    command: z.literal("camera_look_at"),
    actor: actorName,
    subject: actorName,
    heightFraction: z.number().nonnegative().optional(),
  })
  .strict();

const cameraFocusSchema = z
  .object({
    command: z.literal("camera_focus"),
    actor: actorName,
    subject: actorName,
    heightFraction: z.number().nonnegative().optional(),
  })
  .strict();

const cameraFrameSubjectSchema = z
  .object({
    command: z.literal("camera_frame_subject"),
    actor: actorName,
    subject: actorName,
    coverage: z.number().optional(),
  })
  .strict();

const cameraFocalLengthSchema = z
  .object({
    command: z.literal("camera_focal_length"),
    actor: actorName,
    focalLength: z.number().positive(),
  })
  .strict();

/** One record of a command document, discriminated by `command`. */
export const commandRecordSchema = z.discriminatedUnion("command", [
  addActorSchema,
  addCameraSchema,
  addLightSchema,
  addAtmosphereSchema,
  addAudioSchema,
  cameraCutSchema,
  moveSchema,
  faceSchema,
  turnSchema,
  staySchema,
  waitUntilSchema,
  animationSchema,
  cameraLookAtSchema,
  cameraFocusSchema,
  cameraFrameSubjectSchema,
  cameraFocalLengthSchema,
]);

/** The root of a command document. */
export const commandDocumentSchema = z
  .object({
    name: z.string().min(1),
    fps: z.number().int().positive(),
    duration: z.number().positive().optional(),
    commands: z.array(commandRecordSchema),
  })
  .strict();

export type Vector3Tuple = z.infer<typeof vector3TupleSchema>;
export type RotationTuple = z.infer<typeof rotationTupleSchema>;
export type SpeedSpec = z.infer<typeof speedSchema>;
export type IntensitySpec = z.infer<typeof intensitySchema>;
export type ColorSpec = z.infer<typeof colorSchema>;
export type SunAngleSpec = z.infer<typeof sunAngleSchema>;
export type CommandRecord = z.infer<typeof commandRecordSchema>;
export type CommandDocument = z.infer<typeof commandDocumentSchema>;

/** Tag of any command record. */
export type CommandTag = CommandRecord["command"];

/** Narrow a command record type by its tag. */
export type CommandRecordOf<T extends CommandTag> = Extract<CommandRecord, { command: T }>;

/** Result of parsing an untrusted command document. */
export type CommandDocumentParseResult =
  | { readonly ok: true; readonly document: CommandDocument }
  | { readonly ok: false; readonly issues: readonly string[] };

/**
 * Parse an untrusted value (typically `JSON.parse` output) as a command document.
 *
 * Issues are flattened to `"path: message"` strings, with the path written
 * as dotted keys (`commands.3.speed`).
 */
export function parseCommandDocument(input: unknown): CommandDocumentParseResult {
  const result = commandDocumentSchema.safeParse(input);
  if (result.success) {
    return { ok: true, document: result.data };
  }
  return {
    ok: false,
    issues: result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}
