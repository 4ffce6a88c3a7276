import { describe, it, expect } from "vitest";
import {
  resolveColor,
  resolveIntensity,
  resolveLight,
  resolveScene,
  resolveSunPitch,
} from "../src/compiler/scene.js";

describe("light presets", () => {
  it("resolves intensity presets and raw values", () => {
    expect(resolveIntensity(undefined)).toBe(10);
    expect(resolveIntensity({ preset: "very_dim" })).toBe(2);
    expect(resolveIntensity({ preset: "extreme" })).toBe(18);
    expect(resolveIntensity({ value: 3.5 })).toBe(3.5);
  });

  it("normalizes color presets to [0, 1]", () => {
    expect(resolveColor(undefined)).toEqual([1, 1, 1]);
    expect(resolveColor({ preset: "white" })).toEqual([1, 1, 1]);
    expect(resolveColor({ preset: "golden" })).toEqual([1, 217 / 255, 179 / 255]);
    expect(resolveColor({ rgb: [0.2, 0.4, 0.6] })).toEqual([0.2, 0.4, 0.6]);
  });

  it("maps sun angles to downward pitch", () => {
    expect(resolveSunPitch(undefined)).toBe(-45);
    expect(resolveSunPitch({ preset: "horizon" })).toBe(-5);
    expect(resolveSunPitch({ preset: "overhead" })).toBe(-90);
    expect(resolveSunPitch({ pitch: -30 })).toBe(-30);
  });
});

describe("resolveLight", () => {
  it("aims a directional light from its compass side", () => {
    expect(
      resolveLight({ name: "Sun", lightType: "directional", from: "west", angle: { preset: "low" } }),
    ).toEqual({
      name: "Sun",
      lightType: "directional",
      location: { x: 0, y: 0, z: 1000 },
      rotation: { pitch: -15, yaw: -90, roll: 0 },
      intensity: 10,
      color: [1, 1, 1],
      castShadows: true,
    });
  });

  it("keeps an explicit placement", () => {
    const light = resolveLight({
      name: "Key",
      lightType: "spot",
      location: { x: 100, y: 0, z: 250 },
      rotation: { pitch: -30, yaw: 180, roll: 0 },
      intensity: { preset: "soft" },
      castShadows: false,
    });
    expect(light.location).toEqual({ x: 100, y: 0, z: 250 });
    expect(light.rotation).toEqual({ pitch: -30, yaw: 180, roll: 0 });
    expect(light.intensity).toBe(6);
    expect(light.castShadows).toBe(false);
  });

  it("puts an unplaced point light at the origin", () => {
    const light = resolveLight({ name: "Fill", lightType: "point" });
    expect(light.location).toEqual({ x: 0, y: 0, z: 0 });
    expect(light.rotation).toEqual({ pitch: 0, yaw: 0, roll: 0 });
  });
});

describe("resolveScene", () => {
  it("converts audio and cuts to frames, cuts in frame order", () => {
    const scene = resolveScene(
      {
        lights: [],
        atmosphere: { sunLight: "Sun" },
        audio: [
          { asset: "steps.wav", start: 1, duration: 2 },
          { asset: "music.wav", volume: 0.4 },
        ],
        cuts: [
          { camera: "Wide", time: 3 },
          { camera: "Close", time: 0.5 },
        ],
      },
      30,
    );
    expect(scene.audio).toEqual([
      { asset: "steps.wav", startFrame: 30, endFrame: 90, volume: 1 },
      { asset: "music.wav", startFrame: 0, endFrame: null, volume: 0.4 },
    ]);
    expect(scene.cuts).toEqual([
      { camera: "Close", frame: 15 },
      { camera: "Wide", frame: 90 },
    ]);
    expect(scene.atmosphere).toEqual({ fogDensity: 0.02, sunLight: "Sun" });
  });
});
