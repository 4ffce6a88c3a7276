import { describe, it, expect } from "vitest";
import type { Vec3 } from "@blocking/schema";
import { PlanBuilder, cmps, mph } from "../src/compiler/builder.js";
import type { PoseInput } from "../src/compiler/builder.js";
import {
  FacingTargetError,
  InvalidMotionParametersError,
  MotionTimelineError,
  TillEndPlacementError,
  UndefinedWaypointError,
} from "../src/compiler/errors.js";
import { resolveCompileOptions } from "../src/compiler/options.js";
import { resolveTimelines, solveMove } from "../src/compiler/resolver.js";
import type { ResolvedTimelines } from "../src/compiler/resolver.js";
import type { ActorTimeline } from "../src/compiler/timeline.js";
import type { MotionPlan, MoveCommand } from "../src/compiler/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ORIGIN = { x: 0, y: 0, z: 0 };

function resolve(author: (builder: PlanBuilder) => void, pose: PoseInput = { location: ORIGIN }): ResolvedTimelines {
  const builder = new PlanBuilder({ name: "Test", fps: 30 });
  builder.addActor("Hero", pose);
  author(builder);
  return resolveTimelines(builder.build(), resolveCompileOptions());
}

function hero(resolved: ResolvedTimelines): ActorTimeline {
  const timeline = resolved.timelines.get("Hero");
  if (timeline === undefined) {
    throw new Error("Hero was not resolved");
  }
  return timeline;
}

function move(command: Omit<MoveCommand, "type">): MoveCommand {
  return { type: "move", ...command };
}

const NORTH = { kind: "direction", direction: "north", offset: 0 } as const;

// ---------------------------------------------------------------------------
// solveMove
// ---------------------------------------------------------------------------

describe("solveMove", () => {
  const context = { actor: "Hero", commandIndex: 0 };
  const empty: ReadonlyMap<string, Vec3> = new Map();

  it("solves the same move from any two of distance, time and speed", () => {
    const byDistanceTime = solveMove(
      move({ target: NORTH, constraint: { kind: "distance_time", distance: 10, time: 4 } }),
      ORIGIN, 0, empty, context,
    );
    const byDistanceSpeed = solveMove(
      move({ target: NORTH, constraint: { kind: "distance_speed", distance: 10, speed: cmps(250) } }),
      ORIGIN, 0, empty, context,
    );
    const byTimeSpeed = solveMove(
      move({ target: NORTH, constraint: { kind: "time_speed", time: 4, speed: cmps(250) } }),
      ORIGIN, 0, empty, context,
    );

    for (const solved of [byDistanceTime, byDistanceSpeed, byTimeSpeed]) {
      expect(solved.duration).toBe(4);
      expect(solved.distance).toBe(1000);
      expect(solved.startSpeed).toBe(250);
      expect(solved.endSpeed).toBe(250);
      expect(solved.end).toEqual({ x: 1000, y: 0, z: 0 });
    }
  });

  it("travels relative to the current yaw for relative directions", () => {
    const solved = solveMove(
      move({
        target: { kind: "direction", direction: "forward", offset: 0 },
        constraint: { kind: "distance_time", distance: 2, time: 1 },
      }),
      ORIGIN, 90, empty, context,
    );
    expect(solved.end.x).toBeCloseTo(0, 9);
    expect(solved.end.y).toBeCloseTo(200, 9);
  });

  it("integrates a ramp from rest to the solved end speed", () => {
    const solved = solveMove(
      move({ target: NORTH, constraint: { kind: "distance_time", distance: 8, time: 4 }, rampFrom: cmps(0) }),
      ORIGIN, 0, empty, context,
    );
    expect(solved.startSpeed).toBe(0);
    expect(solved.endSpeed).toBe(400);
    expect(solved.positionAt(2)).toEqual({ x: 200, y: 0, z: 0 });
    expect(solved.end).toEqual({ x: 800, y: 0, z: 0 });
  });

  it("treats the constraint speed as the ramp target", () => {
    const solved = solveMove(
      move({ target: NORTH, constraint: { kind: "time_speed", time: 2, speed: cmps(300) }, rampFrom: cmps(100) }),
      ORIGIN, 0, empty, context,
    );
    expect(solved.distance).toBe(400);
    expect(solved.endSpeed).toBe(300);
  });

  it("rejects a ramp that would need a negative end speed", () => {
    expect(() =>
      solveMove(
        move({ target: NORTH, constraint: { kind: "distance_time", distance: 4, time: 2 }, rampFrom: cmps(500) }),
        ORIGIN, 0, empty, context,
      ),
    ).toThrow(InvalidMotionParametersError);
  });

  it("drifts to the right of travel in proportion to elapsed time", () => {
    const solved = solveMove(
      move({ target: NORTH, constraint: { kind: "distance_time", distance: 10, time: 5 }, drift: { lateral: 2 } }),
      ORIGIN, 0, empty, context,
    );
    expect(solved.end.x).toBe(1000);
    expect(solved.end.y).toBe(200);
    expect(solved.positionAt(2.5).y).toBe(100);
  });

  it("clamps drift to the corridor", () => {
    const solved = solveMove(
      move({
        target: NORTH,
        constraint: { kind: "distance_time", distance: 10, time: 5 },
        drift: { lateral: 5, limit: 1 },
      }),
      ORIGIN, 0, empty, context,
    );
    expect(solved.end.y).toBe(100);
  });

  it("composes a ramp with drift independently", () => {
    const solved = solveMove(
      move({
        target: NORTH,
        constraint: { kind: "distance_time", distance: 8, time: 4 },
        rampFrom: cmps(0),
        drift: { lateral: 2 },
      }),
      ORIGIN, 0, empty, context,
    );
    expect(solved.positionAt(2)).toEqual({ x: 200, y: 100, z: 0 });
  });

  it("derives the distance of a targeted move", () => {
    const solved = solveMove(
      move({ target: { kind: "location", location: { x: 300, y: 400, z: 0 } }, constraint: { kind: "speed", speed: cmps(100) } }),
      ORIGIN, 0, empty, context,
    );
    expect(solved.distance).toBe(500);
    expect(solved.duration).toBe(5);
    expect(solved.end).toEqual({ x: 300, y: 400, z: 0 });
  });

  it("rejects non-positive quantities", () => {
    expect(() =>
      solveMove(move({ target: NORTH, constraint: { kind: "distance_time", distance: 0, time: 2 } }), ORIGIN, 0, empty, context),
    ).toThrow(InvalidMotionParametersError);
    expect(() =>
      solveMove(move({ target: NORTH, constraint: { kind: "time_speed", time: 2, speed: mph(-3) } }), ORIGIN, 0, empty, context),
    ).toThrow(InvalidMotionParametersError);
    expect(() =>
      solveMove(
        move({ target: { kind: "location", location: ORIGIN }, constraint: { kind: "time", time: 2 } }),
        ORIGIN, 0, empty, context,
      ),
    ).toThrow(InvalidMotionParametersError);
  });

  it("rejects an unrecorded waypoint", () => {
    expect(() =>
      solveMove(
        move({ target: { kind: "waypoint", waypoint: "Nowhere" }, constraint: { kind: "time", time: 1 } }),
        ORIGIN, 0, empty, context,
      ),
    ).toThrow(UndefinedWaypointError);
  });
});

// ---------------------------------------------------------------------------
// resolveTimelines
// ---------------------------------------------------------------------------

describe("resolveTimelines", () => {
  it("keys a move's start and end and advances the clock", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").stay(1).move("north").timeAtSpeed(5, mph(8))));
    const keys = timeline.tracks.location.keyframes;
    expect(keys.map((k) => k.frame)).toEqual([0, 30, 180]);
    expect(keys[2]?.value.x).toBeCloseTo(1788.16, 6);
    expect(timeline.time).toBe(6);
    expect(timeline.segments).toEqual([
      { start: 0, end: 1, source: "stay", commandIndex: 0 },
      { start: 1, end: 6, source: "move", commandIndex: 1 },
    ]);
  });

  it("rotates the short way: yaw 10 to 350 ends at -10", () => {
    const timeline = hero(
      resolve((b) => b.actor("Hero").faceYaw(350), {
        location: ORIGIN,
        rotation: { pitch: 0, yaw: 10, roll: 0 },
      }),
    );
    expect(timeline.tracks.rotation.keyframes.map((k) => [k.frame, k.value.yaw])).toEqual([
      [0, 10],
      [30, -10],
    ]);
    expect(timeline.yaw).toBe(-10);
  });

  it("turns over a move with turnBy", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").move("north").turnBy(270).distanceInTime(2, 2)));
    expect(timeline.tracks.rotation.last()?.value.yaw).toBe(-90);
  });

  it("adds the mesh yaw offset on emission only", () => {
    const timeline = hero(
      resolve((b) => b.actor("Hero").turn(90).move("forward").distanceInTime(1, 1), {
        location: ORIGIN,
        meshYawOffset: -90,
      }),
    );
    const yaws = timeline.tracks.rotation.keyframes.map((k) => k.value.yaw);
    expect(yaws).toEqual([-90, 0, 0]);
    expect(timeline.position.y).toBeCloseTo(100, 9);
    expect(timeline.position.x).toBeCloseTo(0, 9);
  });

  it("keys ramped moves with linear samples", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").move("north").ramp(cmps(0)).distanceInTime(8, 4)));
    const keys = timeline.tracks.location.keyframes;
    expect(keys.map((k) => k.frame)).toEqual([0, 15, 30, 45, 60, 75, 90, 105, 120]);
    expect(keys[4]?.value).toEqual({ x: 200, y: 0, z: 0 });
    expect(keys[4]?.interpolation).toBe("linear");
    expect(keys[8]?.interpolation).toBe("cubic");
  });

  it("overlays a clip for a stay and returns to the previous one", () => {
    const timeline = hero(
      resolve((b) => b.actor("Hero").animation("Idle").stay(1).stay(2, { animation: "Wave" }).stay(1)),
    );
    expect(timeline.animations).toEqual([
      { clip: "Idle", start: 0, end: 1, playRate: 1 },
      { clip: "Wave", start: 1, end: 3, playRate: 1 },
      { clip: "Idle", start: 3, end: null, playRate: 1 },
    ]);
    expect(timeline.tracks.animation.keyframes).toEqual([
      { frame: 0, value: "Idle", interpolation: "constant" },
      { frame: 30, value: "Wave", interpolation: "constant" },
      { frame: 90, value: "Idle", interpolation: "constant" },
    ]);
  });

  it("keeps an overlay clip playing when nothing played before it", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").move("north").animation("Walk").distanceInTime(3, 3).stay(2)));
    expect(timeline.animations).toEqual([{ clip: "Walk", start: 0, end: null, playRate: 1 }]);
    expect(timeline.tracks.animation.keyframes).toEqual([{ frame: 0, value: "Walk", interpolation: "constant" }]);
  });

  it("returns to the previous clip at its own play rate", () => {
    const timeline = hero(
      resolve((b) =>
        b.actor("Hero").animation("Walk", { playRate: 2 }).stay(1).stay(1, { animation: "Wave" }).stay(1),
      ),
    );
    expect(timeline.animations).toEqual([
      { clip: "Walk", start: 0, end: 1, playRate: 2 },
      { clip: "Wave", start: 1, end: 2, playRate: 1 },
      { clip: "Walk", start: 2, end: null, playRate: 2 },
    ]);
  });

  it("holds until a later wait_until time", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").stay(1).waitUntil(3)));
    expect(timeline.segments[1]).toEqual({ start: 1, end: 3, source: "wait_until", commandIndex: 1 });
  });

  it("rejects a wait_until the actor has already passed", () => {
    try {
      resolve((b) => b.actor("Hero").stay(3).waitUntil(2));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MotionTimelineError);
      expect(err instanceof MotionTimelineError ? err.gap : null).toBe(1);
    }
  });

  it("rejects non-positive stays and rotations", () => {
    expect(() => resolve((b) => b.actor("Hero").stay(0))).toThrow(InvalidMotionParametersError);
    expect(() => resolve((b) => b.actor("Hero").turn(90, { duration: 0 }))).toThrow(InvalidMotionParametersError);
  });

  it("rejects infinite stays and rotations in an open-ended plan", () => {
    expect(() => resolve((b) => b.actor("Hero").stay(Infinity))).toThrow(InvalidMotionParametersError);
    expect(() => resolve((b) => b.actor("Hero").turn(90, { duration: Infinity }))).toThrow(
      InvalidMotionParametersError,
    );
  });

  it("locates errors by actor and command index", () => {
    try {
      resolve((b) => b.actor("Hero").stay(1).move("north").distanceInTime(-2, 1));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidMotionParametersError);
      expect(err instanceof InvalidMotionParametersError ? err.context : null).toEqual({
        actor: "Hero",
        commandIndex: 1,
        time: 1,
      });
    }
  });

  it("keys the camera's declared focal length at frame 0", () => {
    const builder = new PlanBuilder({ name: "Test" });
    builder.addCamera("Cam", { location: ORIGIN, focalLength: 35 });
    const cam = resolveTimelines(builder.build(), resolveCompileOptions()).timelines.get("Cam");
    expect(cam?.tracks.focal_length.keyframes).toEqual([{ frame: 0, value: 35, interpolation: "cubic" }]);
  });

  it("rejects a command after a till-end stay", () => {
    const plan: MotionPlan = {
      name: "Handmade",
      fps: 30,
      actors: new Map([
        [
          "Hero",
          {
            name: "Hero",
            kind: "character",
            pose: { location: ORIGIN, rotation: { pitch: 0, yaw: 0, roll: 0 }, meshYawOffset: 0 },
            commands: [
              { type: "stay", length: { kind: "till_end" } },
              { type: "stay", length: { kind: "seconds", seconds: 1 } },
            ],
          },
        ],
      ]),
      waypointNames: [],
      scene: { lights: [], atmosphere: null, audio: [], cuts: [] },
    };
    expect(() => resolveTimelines(plan, resolveCompileOptions())).toThrow(TillEndPlacementError);
  });
});

// ---------------------------------------------------------------------------
// Waypoints
// ---------------------------------------------------------------------------

describe("waypoints", () => {
  it("returns to the exact recorded position", () => {
    const resolved = resolve((b) =>
      b
        .actor("Hero")
        .move("north").waypoint("Mark").distanceInTime(5, 5)
        .move("east").distanceInTime(3, 3)
        .moveToWaypoint("Mark").inTime(2),
    );
    const mark = resolved.waypoints.get("Mark");
    expect(mark).toEqual({ x: 500, y: 0, z: 0 });
    expect(hero(resolved).position).toEqual(mark);
    expect(hero(resolved).tracks.location.last()?.value).toEqual(mark);
  });

  it("are resolved in actor order across streams", () => {
    const builder = new PlanBuilder({ name: "Test", fps: 30 });
    builder.addActor("Follower", { location: ORIGIN });
    builder.addActor("Leader", { location: ORIGIN });
    builder.actor("Leader").move("north").waypoint("Spot").distanceInTime(2, 2);
    builder.actor("Follower").moveToWaypoint("Spot").inTime(2);
    expect(() => resolveTimelines(builder.build(), resolveCompileOptions())).toThrow(UndefinedWaypointError);
  });

  it("lets a later actor consume an earlier actor's waypoint", () => {
    const builder = new PlanBuilder({ name: "Test", fps: 30 });
    builder.addActor("Leader", { location: ORIGIN });
    builder.addActor("Follower", { location: { x: 0, y: 300, z: 0 } });
    builder.actor("Leader").move("north").waypoint("Spot").distanceInTime(4, 2);
    builder.actor("Follower").moveToWaypoint("Spot").inTime(5);
    const follower = resolveTimelines(builder.build(), resolveCompileOptions()).timelines.get("Follower");
    expect(follower?.position).toEqual({ x: 400, y: 0, z: 0 });
    expect(follower?.time).toBe(5);
  });
});

// ---------------------------------------------------------------------------
// Rotation rates and facing
// ---------------------------------------------------------------------------

describe("rotation", () => {
  it("derives a turn's duration from its rate", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").turn(90, { rate: 45 })));
    expect(timeline.segments).toEqual([{ start: 0, end: 2, source: "turn", commandIndex: 0 }]);
    expect(timeline.tracks.rotation.keyframes.map((k) => [k.frame, k.value.yaw])).toEqual([
      [0, 0],
      [60, 90],
    ]);
  });

  it("skips a rate rotation that is already at its target", () => {
    const timeline = hero(resolve((b) => b.actor("Hero").faceYaw(0, { rate: 30 }).stay(1)));
    expect(timeline.segments).toEqual([{ start: 0, end: 1, source: "stay", commandIndex: 1 }]);
  });

  it("faces where an earlier actor stands when the rotation starts", () => {
    const builder = new PlanBuilder({ name: "Glance", fps: 30 });
    builder.addActor("Leader", { location: ORIGIN });
    builder.addActor("Hero", { location: { x: -500, y: 0, z: 0 } });
    builder.actor("Leader").move("east").distanceInTime(10, 2);
    builder.actor("Hero").stay(2).faceActor("Leader");

    const timeline = resolveTimelines(builder.build(), resolveCompileOptions()).timelines.get("Hero");
    const yaw = (Math.atan2(1000, 500) * 180) / Math.PI;
    expect(timeline?.segments[1]).toEqual({ start: 2, end: 3, source: "face", commandIndex: 1 });
    expect(timeline?.yaw).toBeCloseTo(yaw, 9);
  });

  it("faces an undirected actor at its declared location", () => {
    const timeline = hero(
      resolve((b) => {
        b.addActor("Prop", { location: { x: 0, y: -1000, z: 0 } });
        b.actor("Hero").faceActor("Prop");
      }),
    );
    expect(timeline.yaw).toBeCloseTo(-90, 9);
  });

  it("rejects facing a directed actor declared later", () => {
    expect(() =>
      resolve((b) => {
        b.addActor("Leader", { location: { x: 1000, y: 0, z: 0 } });
        b.actor("Leader").stayTillEnd();
        b.actor("Hero").faceActor("Leader");
      }),
    ).toThrow(FacingTargetError);
  });

  it("rejects facing an actor on the same spot", () => {
    expect(() =>
      resolve((b) => {
        b.addActor("Prop", { location: ORIGIN });
        b.actor("Hero").faceActor("Prop");
      }),
    ).toThrow(FacingTargetError);
  });
});
