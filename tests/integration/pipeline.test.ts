/**
 * Integration test: Builder → Compiler → Keyframe document
 *
 * Proves the full pipeline works end-to-end:
 * 1. A plan authored with the fluent builder (characters, a tracking camera, scene declarations)
 * 2. The same plan serialized to a command document and replayed
 * 3. compile() running every pass
 * 4. RecordingSink capturing the delivered document, checked against the JSON Schema
 *
 * No engine involved: this is pure data flow verification.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeAll } from "vitest";
import ajvModule from "ajv/dist/2020.js";
import type { AnySchema, ValidateFunction } from "ajv/dist/2020.js";
import {
  PlanBuilder,
  RecordingSink,
  cmps,
  compile,
  deliver,
  fromCommandDocument,
  mps,
  toCommandDocument,
} from "@blocking/core";
import type { MotionPlan } from "@blocking/core";
import type { KeyframeDocument } from "@blocking/schema";

const Ajv2020 = ajvModule.default;

let validate: ValidateFunction;

beforeAll(() => {
  const schemaPath = fileURLToPath(
    new URL("../../packages/schema/src/keyframe-document.schema.json", import.meta.url),
  );
  const schema: AnySchema = JSON.parse(readFileSync(schemaPath, "utf-8"));
  validate = new Ajv2020({ allErrors: true }).compile(schema);
});

// ---------------------------------------------------------------------------
// Fixture plan
// ---------------------------------------------------------------------------

function chasePlan(): MotionPlan {
  const b = new PlanBuilder({ name: "Chase", fps: 24, duration: 10 });
  b.addActor("Runner", { location: { x: 0, y: 0, z: 0 } });
  b.addActor("Sidekick", { location: { x: 0, y: 300, z: 0 } });
  b.addCamera("Cam", { location: { x: -500, y: -500, z: 170 }, focalLength: 35 });
  b.addLight("Sun", { lightType: "directional", from: "west", angle: { preset: "low" } });
  b.addAtmosphere({ fogDensity: 0.03, sunLight: "Sun" });
  b.addAudio({ asset: "footsteps.wav", start: 0, duration: 8 });
  b.cameraCut("Cam", 0);

  b.actor("Runner")
    .animation("Jog_Fwd", { playRate: 1.2 })
    .move("north").ramp(cmps(0)).waypoint("Mid").distanceInTime(10, 4)
    .move("north_east").timeAtSpeed(3, mps(3))
    .face("south")
    .stayTillEnd({ animation: "Idle" });

  b.atTime(2).simultaneous((fork) => {
    fork.actor("Sidekick").moveToWaypoint("Mid").inTime(4).stayTillEnd();
  });

  b.camera("Cam")
    .lookAt("Runner")
    .focusOn("Runner")
    .frameSubject("Runner", 0.5)
    .stay(5)
    .focalLength(50)
    .stayTillEnd();

  return b.build();
}

function expectTiled(doc: KeyframeDocument): void {
  for (const [name, actor] of Object.entries(doc.actors)) {
    if (!actor.managed) {
      continue;
    }
    let cursor = 0;
    for (const segment of actor.segments) {
      expect({ name, frame: segment.startFrame }).toEqual({ name, frame: cursor });
      cursor = segment.endFrame;
    }
    expect({ name, frame: cursor }).toEqual({ name, frame: doc.totalFrames });
  }
}

// ===========================================================================
// Tests
// ===========================================================================

describe("Integration: builder → compile → sink", () => {
  it("emits a document that matches the keyframe JSON Schema", () => {
    const doc = compile(chasePlan());
    const valid = validate(doc);
    expect(validate.errors ?? []).toEqual([]);
    expect(valid).toBe(true);
  });

  it("covers the whole plan with every managed actor", () => {
    const doc = compile(chasePlan());
    expect(doc.totalFrames).toBe(240);
    expect(doc.actors["Sun"]?.managed).toBe(false);
    expectTiled(doc);
  });

  it("shares waypoints across actors", () => {
    const doc = compile(chasePlan());
    expect(doc.waypoints).toEqual({ Mid: { x: 1000, y: 0, z: 0 } });

    const sidekick = doc.actors["Sidekick"];
    expect(sidekick?.segments.map((s) => [s.source, s.startFrame, s.endFrame])).toEqual([
      ["wait_until", 0, 48],
      ["move", 48, 144],
      ["stay", 144, 240],
    ]);
    expect(sidekick?.tracks.location[sidekick.tracks.location.length - 1]?.value).toEqual({ x: 1000, y: 0, z: 0 });
  });

  it("derives camera tracks and keeps the fixed focal length", () => {
    const cam = compile(chasePlan()).actors["Cam"];
    const focal = cam?.tracks.focal_length ?? [];

    expect(cam?.tracks.rotation.length).toBeGreaterThanOrEqual(2);
    expect(cam?.tracks.focus_distance[0]?.frame).toBe(0);
    expect(focal[0]?.frame).toBe(0);
    expect(focal[focal.length - 1]).toEqual({ frame: 120, value: 50, interpolation: "cubic" });
  });

  it("resolves scene declarations", () => {
    const { scene } = compile(chasePlan());
    expect(scene.lights.map((l) => [l.name, l.rotation.yaw, l.rotation.pitch])).toEqual([["Sun", -90, -15]]);
    expect(scene.atmosphere).toEqual({ fogDensity: 0.03, sunLight: "Sun" });
    expect(scene.audio).toEqual([{ asset: "footsteps.wav", startFrame: 0, endFrame: 192, volume: 1 }]);
    expect(scene.cuts).toEqual([{ camera: "Cam", frame: 0 }]);
  });

  it("compiles a replayed command document to the same keyframes", () => {
    const plan = chasePlan();
    const replayed = fromCommandDocument(JSON.parse(JSON.stringify(toCommandDocument(plan))));
    expect(compile(replayed)).toEqual(compile(plan));
  });

  it("delivers the document to a sink", async () => {
    const sink = new RecordingSink();
    const result = await deliver(chasePlan(), sink);
    expect(result).toEqual({ ok: true });
    expect(sink.last()).toEqual(compile(chasePlan()));
  });

  it("reports the first compile error by code", async () => {
    const b = new PlanBuilder({ name: "Broken", duration: 4 });
    b.addActor("Follower", { location: { x: 0, y: 0, z: 0 } });
    b.addActor("Leader", { location: { x: 0, y: 0, z: 0 } });
    b.actor("Leader").move("east").waypoint("Spot").distanceInTime(2, 2).stayTillEnd();
    b.actor("Follower").moveToWaypoint("Spot").inTime(2).stayTillEnd();

    const sink = new RecordingSink();
    const result = await deliver(b.build(), sink);
    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.error.code).toBe("UNDEFINED_WAYPOINT");
    expect(sink.documents).toHaveLength(0);
  });
});
