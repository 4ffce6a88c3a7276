import { describe, it, expect } from "vitest";
import { parseCommandDocument } from "../src/command-document.js";

// ---------------------------------------------------------------------------
// Valid documents
// ---------------------------------------------------------------------------

describe("parseCommandDocument: valid documents", () => {
  it("accepts a minimal document with no commands", () => {
    const result = parseCommandDocument({ name: "Empty", fps: 24, commands: [] });
    expect(result.ok).toBe(true);
  });

  it("accepts the jog example", () => {
    const result = parseCommandDocument({
      name: "Jog",
      fps: 30,
      duration: 8,
      commands: [
        { command: "add_actor", actor: "Hero", location: [0, 0, 0] },
        { command: "animation", actor: "Hero", clip: "Idle" },
        { command: "stay", actor: "Hero", seconds: 1 },
        { command: "animation", actor: "Hero", clip: "Jog_Fwd" },
        {
          command: "move",
          actor: "Hero",
          direction: "north",
          time: 5,
          speed: { unit: "mph", value: 8 },
        },
        { command: "stay", actor: "Hero", seconds: 2 },
      ],
    });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.document.commands).toHaveLength(6);
      expect(result.document.commands[4]?.command).toBe("move");
    }
  });

  it("accepts preset speeds, cameras and scene records", () => {
    const result = parseCommandDocument({
      name: "Scene",
      fps: 60,
      commands: [
        { command: "add_actor", actor: "Runner", location: [0, 0, 0], meshYawOffset: -90 },
        { command: "add_camera", actor: "Cam", location: [1000, 0, 200], focalLength: 35 },
        {
          command: "add_light",
          actor: "Sun",
          lightType: "directional",
          from: "west",
          angle: { preset: "low" },
          intensity: { preset: "bright" },
          color: { preset: "golden" },
        },
        { command: "add_atmosphere", fogDensity: 0.02, sunLight: "Sun" },
        { command: "add_audio", asset: "audio/placeholder.wav", volume: 0.5 },
        { command: "move", actor: "Runner", direction: "forward", distance: 10, speed: { preset: "run" } },
        { command: "camera_frame_subject", actor: "Cam", subject: "Runner", coverage: 0.6 },
        { command: "stay", actor: "Cam", tillEnd: true },
      ],
    });
    expect(result.ok).toBe(true);
  });

  it("accepts rotation rates, facing targets and clip play rates", () => {
    const result = parseCommandDocument({
      name: "Duel",
      fps: 30,
      commands: [
        { command: "add_actor", actor: "Villain", location: [1000, 0, 0] },
        { command: "add_actor", actor: "Hero", location: [0, 0, 0] },
        { command: "animation", actor: "Hero", clip: "Walk", playRate: 0.5 },
        { command: "face", actor: "Hero", toward: "Villain", rate: 90 },
        { command: "turn", actor: "Hero", degrees: -45, rate: 30 },
      ],
    });
    expect(result.ok).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Invalid documents
// ---------------------------------------------------------------------------

describe("parseCommandDocument: invalid documents", () => {
  it("rejects a document without fps", () => {
    const result = parseCommandDocument({ name: "NoFps", commands: [] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]?.startsWith("fps: ")).toBe(true);
    }
  });

  it("rejects a fractional fps", () => {
    const result = parseCommandDocument({ name: "Frac", fps: 29.97, commands: [] });
    expect(result.ok).toBe(false);
  });

  it("rejects an unknown command tag", () => {
    const result = parseCommandDocument({
      name: "Bad",
      fps: 30,
      commands: [{ command: "teleport", actor: "Hero" }],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.startsWith("commands.0.command: ")).toBe(true);
    }
  });

  it("rejects an unknown direction with the field path", () => {
    const result = parseCommandDocument({
      name: "Bad",
      fps: 30,
      commands: [{ command: "move", actor: "Hero", direction: "up", time: 1, distance: 1 }],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.startsWith("commands.0.direction: ")).toBe(true);
    }
  });

  it("rejects unrecognized fields on a record", () => {
    const result = parseCommandDocument({
      name: "Bad",
      fps: 30,
      commands: [{ command: "animation", actor: "Hero", clip: "Idle", blend: 0.2 }],
    });
    expect(result.ok).toBe(false);
  });

  it("rejects a non-positive play rate", () => {
    const result = parseCommandDocument({
      name: "Bad",
      fps: 30,
      commands: [{ command: "animation", actor: "Hero", clip: "Idle", playRate: 0 }],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.startsWith("commands.0.playRate: ")).toBe(true);
    }
  });

  it("rejects a speed that mixes preset and raw value", () => {
    const result = parseCommandDocument({
      name: "Bad",
      fps: 30,
      commands: [
        {
          command: "move",
          actor: "Hero",
          direction: "north",
          time: 1,
          speed: { preset: "walk", unit: "mph", value: 3 },
        },
      ],
    });
    expect(result.ok).toBe(false);
  });
});
