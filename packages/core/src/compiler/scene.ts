/**
 * Scene declarations: lights, atmosphere, audio cues and camera cuts.
 *
 * None of these take part in motion. Presets are resolved here, at export,
 * through the lookup tables below.
 */

import type {
  AudioRecord,
  CameraCutRecord,
  ColorSpec,
  IntensitySpec,
  LightColorPreset,
  LightIntensityPreset,
  LightRecord,
  Rotator,
  SceneRecord,
  SunAnglePreset,
  SunAngleSpec,
  Vec3,
} from "@blocking/schema";
import { directionAngle } from "./motion-math.js";
import type { LightDeclaration, SceneDeclarations } from "./types.js";
import { toFrame } from "./units.js";

/** Light intensity presets. */
export const INTENSITY_PRESETS: Readonly<Record<LightIntensityPreset, number>> = {
  very_dim: 2,
  dim: 4,
  soft: 6,
  moderate: 8,
  normal: 10,
  bright: 12,
  very_bright: 14,
  intense: 16,
  extreme: 18,
};

/** Light color presets, 0-255 per channel. */
export const COLOR_PRESETS: Readonly<Record<LightColorPreset, readonly [number, number, number]>> = {
  deep_sunset: [255, 153, 77],
  sunset: [255, 179, 128],
  golden: [255, 217, 179],
  warm_white: [255, 242, 230],
  white: [255, 255, 255],
  cool_white: [242, 242, 255],
  overcast: [204, 217, 255],
  moonlight: [153, 179, 255],
};

/** Sun elevation presets, as pitch in degrees. */
export const SUN_ANGLE_PRESETS: Readonly<Record<SunAnglePreset, number>> = {
  horizon: -5,
  low: -15,
  low_high: -25,
  medium: -45,
  medium_high: -60,
  high: -75,
  very_high: -85,
  overhead: -90,
};

const DEFAULT_FOG_DENSITY = 0.02;
const DIRECTIONAL_DEFAULT_LOCATION: Vec3 = { x: 0, y: 0, z: 1000 };

export function resolveIntensity(spec: IntensitySpec | undefined): number {
  if (spec === undefined) {
    return INTENSITY_PRESETS.normal;
  }
  return "preset" in spec ? INTENSITY_PRESETS[spec.preset] : spec.value;
}

/** Resolve a color to linear RGB in [0, 1]. Raw colors are taken as already normalized. */
export function resolveColor(spec: ColorSpec | undefined): readonly [number, number, number] {
  if (spec === undefined) {
    return [1, 1, 1];
  }
  if ("rgb" in spec) {
    const [r, g, b] = spec.rgb;
    return [r, g, b];
  }
  const [r, g, b] = COLOR_PRESETS[spec.preset];
  return [r / 255, g / 255, b / 255];
}

export function resolveSunPitch(spec: SunAngleSpec | undefined): number {
  if (spec === undefined) {
    return SUN_ANGLE_PRESETS.medium;
  }
  return "preset" in spec ? SUN_ANGLE_PRESETS[spec.preset] : spec.pitch;
}

function resolveLightRotation(light: LightDeclaration): Rotator {
  if (light.from !== undefined) {
    return { pitch: resolveSunPitch(light.angle), yaw: directionAngle(light.from), roll: 0 };
  }
  return light.rotation === undefined ? { pitch: 0, yaw: 0, roll: 0 } : { ...light.rotation };
}

export function resolveLight(light: LightDeclaration): LightRecord {
  const fallbackLocation = light.lightType === "directional" ? DIRECTIONAL_DEFAULT_LOCATION : { x: 0, y: 0, z: 0 };
  return {
    name: light.name,
    lightType: light.lightType,
    location: { ...(light.location ?? fallbackLocation) },
    rotation: resolveLightRotation(light),
    intensity: resolveIntensity(light.intensity),
    color: resolveColor(light.color),
    castShadows: light.castShadows ?? true,
  };
}

/** Resolve every scene declaration to frame-indexed records. */
export function resolveScene(scene: SceneDeclarations, fps: number): SceneRecord {
  const audio: AudioRecord[] = scene.audio.map((cue) => {
    const start = cue.start ?? 0;
    return {
      asset: cue.asset,
      startFrame: toFrame(start, fps),
      endFrame: cue.duration === undefined ? null : toFrame(start + cue.duration, fps),
      volume: cue.volume ?? 1,
    };
  });

  const cuts: CameraCutRecord[] = scene.cuts
    .map((cut) => ({ camera: cut.camera, frame: toFrame(cut.time, fps) }))
    .sort((a, b) => a.frame - b.frame);

  return {
    lights: scene.lights.map(resolveLight),
    atmosphere:
      scene.atmosphere === null
        ? null
        : {
            fogDensity: scene.atmosphere.fogDensity ?? DEFAULT_FOG_DENSITY,
            sunLight: scene.atmosphere.sunLight ?? null,
          },
    audio,
    cuts,
  };
}
