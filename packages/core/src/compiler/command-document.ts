/**
 * Command documents in and out of the builder.
 *
 * A parsed document is replayed record by record through PlanBuilder, so a
 * document and fluent code share one set of authoring checks.
 */

import { parseCommandDocument } from "@blocking/schema";
import type {
  CommandDocument,
  CommandRecord,
  CommandRecordOf,
  RotationTuple,
  Vector3Tuple,
} from "@blocking/schema";
import type { Rotator, Vec3 } from "@blocking/schema";
import { PlanBuilder } from "./builder.js";
import type { ActorCursor, DirectionalMove, TargetedMove } from "./builder.js";
import { CommandDocumentError, MotionPlanError } from "./errors.js";
import type {
  ActorCommand,
  FaceCommand,
  LightDeclaration,
  MotionPlan,
  MoveCommand,
  PlanActor,
  RotationTiming,
} from "./types.js";

function vec(tuple: Vector3Tuple): Vec3 {
  return { x: tuple[0], y: tuple[1], z: tuple[2] };
}

function rotator(tuple: RotationTuple | undefined): Rotator | undefined {
  return tuple === undefined ? undefined : { pitch: tuple[0], yaw: tuple[1], roll: tuple[2] };
}

function tupleOf(v: Vec3): Vector3Tuple {
  return [v.x, v.y, v.z];
}

function rotationTupleOf(r: Rotator): RotationTuple {
  return [r.pitch, r.yaw, r.roll];
}

// ---------------------------------------------------------------------------
// Document → plan
// ---------------------------------------------------------------------------

/**
 * Parse an untrusted value as a command document and build its plan.
 *
 * @throws CommandDocumentError when the value does not match the schema,
 *   or when a record is missing fields its shape needs.
 * @throws MotionPlanError subclasses for authoring errors found on replay,
 *   with the offending record's index as `context.recordIndex`.
 */
export function fromCommandDocument(input: unknown): MotionPlan {
  const parsed = parseCommandDocument(input);
  if (!parsed.ok) {
    throw new CommandDocumentError(
      `Invalid command document (${parsed.issues.length} issue${parsed.issues.length === 1 ? "" : "s"})`,
      parsed.issues,
    );
  }
  return replay(parsed.document);
}

function replay(document: CommandDocument): MotionPlan {
  const builder = new PlanBuilder({ name: document.name, fps: document.fps, duration: document.duration });
  document.commands.forEach((record, index) => {
    try {
      applyRecord(builder, record, index);
    } catch (err) {
      if (err instanceof MotionPlanError && !(err instanceof CommandDocumentError)) {
        throw err.atRecord(index);
      }
      throw err;
    }
  });
  return builder.build();
}

function invalid(index: number, message: string, actor?: string): CommandDocumentError {
  return new CommandDocumentError(`commands.${index}: ${message}`, [`commands.${index}: ${message}`], {
    actor,
    recordIndex: index,
  });
}

function applyRecord(builder: PlanBuilder, record: CommandRecord, index: number): void {
  switch (record.command) {
    case "add_actor":
      builder.addActor(record.actor, {
        location: vec(record.location),
        rotation: rotator(record.rotation),
        meshYawOffset: record.meshYawOffset,
      });
      return;
    case "add_camera":
      builder.addCamera(record.actor, {
        location: vec(record.location),
        rotation: rotator(record.rotation),
        focalLength: record.focalLength,
      });
      return;
    case "add_light":
      builder.addLight(record.actor, {
        lightType: record.lightType,
        location: record.location === undefined ? undefined : vec(record.location),
        rotation: rotator(record.rotation),
        from: record.from,
        angle: record.angle,
        intensity: record.intensity,
        color: record.color,
        castShadows: record.castShadows,
      });
      return;
    case "add_atmosphere":
      builder.addAtmosphere({ fogDensity: record.fogDensity, sunLight: record.sunLight });
      return;
    case "add_audio":
      builder.addAudio({
        asset: record.asset,
        start: record.start,
        duration: record.duration,
        volume: record.volume,
      });
      return;
    case "camera_cut":
      builder.cameraCut(record.camera, record.time);
      return;
    case "move":
      applyMove(builder.actor(record.actor), record, index);
      return;
    case "face": {
      const cursor = builder.actor(record.actor);
      const options = { duration: record.duration, rate: record.rate, animation: record.animation };
      const headings = [record.direction, record.yaw, record.toward].filter((h) => h !== undefined);
      if (headings.length !== 1) {
        throw invalid(index, "face needs exactly one of direction, yaw and toward", record.actor);
      }
      if (record.direction !== undefined) {
        cursor.face(record.direction, { ...options, offset: record.offset });
      } else if (record.yaw !== undefined) {
        cursor.faceYaw(record.yaw, options);
      } else if (record.toward !== undefined) {
        cursor.faceActor(record.toward, options);
      }
      return;
    }
    case "turn":
      builder.actor(record.actor).turn(record.degrees, {
        duration: record.duration,
        rate: record.rate,
        animation: record.animation,
      });
      return;
    case "stay": {
      const cursor = builder.actor(record.actor);
      const options = { animation: record.animation };
      if (record.tillEnd === true) {
        if (record.seconds !== undefined) {
          throw invalid(index, "stay takes seconds or tillEnd, not both", record.actor);
        }
        cursor.stayTillEnd(options);
      } else if (record.seconds !== undefined) {
        cursor.stay(record.seconds, options);
      } else {
        throw invalid(index, "stay needs seconds or tillEnd", record.actor);
      }
      return;
    }
    case "wait_until":
      builder.actor(record.actor).waitUntil(record.time);
      return;
    case "animation":
      builder.actor(record.actor).animation(record.clip, { playRate: record.playRate });
      return;
    case "camera_look_at":
      builder.camera(record.actor).lookAt(record.subject, record.heightFraction);
      return;
    case "camera_focus":
      builder.camera(record.actor).focusOn(record.subject, record.heightFraction);
      return;
    case "camera_frame_subject":
      builder.camera(record.actor).frameSubject(record.subject, record.coverage);
      return;
    case "camera_focal_length":
      builder.camera(record.actor).focalLength(record.focalLength);
      return;
  }
}

function applyModifiers(
  draft: DirectionalMove<ActorCursor> | TargetedMove<ActorCursor>,
  record: CommandRecordOf<"move">,
): void {
  if (record.waypoint !== undefined) {
    draft.waypoint(record.waypoint);
  }
  if (record.rampFrom !== undefined) {
    draft.ramp(record.rampFrom);
  }
  if (record.turnBy !== undefined) {
    draft.turnBy(record.turnBy);
  }
  if (record.animation !== undefined) {
    draft.animation(record.animation);
  }
}

function applyMove(cursor: ActorCursor, record: CommandRecordOf<"move">, index: number): void {
  const targets = [record.direction, record.toWaypoint, record.toLocation].filter((t) => t !== undefined);
  if (targets.length !== 1) {
    throw invalid(index, "move needs exactly one of direction, toWaypoint and toLocation", record.actor);
  }
  const constraint = { distance: record.distance, time: record.time, speed: record.speed };

  if (record.direction !== undefined) {
    const draft = cursor.move(record.direction, record.offset);
    if (record.drift !== undefined) {
      draft.drift(record.drift.lateral, record.drift.limit);
    }
    applyModifiers(draft, record);
    draft.constrain(constraint);
    return;
  }

  if (record.offset !== undefined || record.drift !== undefined) {
    throw invalid(index, "offset and drift only apply to a move along a direction", record.actor);
  }
  if (record.toWaypoint !== undefined) {
    const draft = cursor.moveToWaypoint(record.toWaypoint);
    applyModifiers(draft, record);
    draft.constrain(constraint);
  } else if (record.toLocation !== undefined) {
    const draft = cursor.moveToLocation(vec(record.toLocation));
    applyModifiers(draft, record);
    draft.constrain(constraint);
  }
}

// ---------------------------------------------------------------------------
// Plan → document
// ---------------------------------------------------------------------------

function moveRecord(actor: string, command: MoveCommand): CommandRecordOf<"move"> {
  const { target, constraint } = command;
  return {
    command: "move",
    actor,
    ...(target.kind === "direction" ? { direction: target.direction, offset: target.offset } : {}),
    ...(target.kind === "waypoint" ? { toWaypoint: target.waypoint } : {}),
    ...(target.kind === "location" ? { toLocation: tupleOf(target.location) } : {}),
    ...("distance" in constraint ? { distance: constraint.distance } : {}),
    ...("time" in constraint ? { time: constraint.time } : {}),
    ...("speed" in constraint ? { speed: constraint.speed } : {}),
    ...(command.waypoint === undefined ? {} : { waypoint: command.waypoint }),
    ...(command.rampFrom === undefined ? {} : { rampFrom: command.rampFrom }),
    ...(command.drift === undefined ? {} : { drift: { ...command.drift } }),
    ...(command.turnBy === undefined ? {} : { turnBy: command.turnBy }),
    ...(command.animation === undefined ? {} : { animation: command.animation }),
  };
}

function timingFields(timing: RotationTiming): { duration: number } | { rate: number } {
  return timing.kind === "duration" ? { duration: timing.seconds } : { rate: timing.degreesPerSecond };
}

function faceRecord(actor: string, command: FaceCommand): CommandRecordOf<"face"> {
  const { heading } = command;
  return {
    command: "face",
    actor,
    ...(heading.kind === "direction" ? { direction: heading.direction, offset: heading.offset } : {}),
    ...(heading.kind === "yaw" ? { yaw: heading.yaw } : {}),
    ...(heading.kind === "actor" ? { toward: heading.actor } : {}),
    ...timingFields(command.timing),
    ...(command.animation === undefined ? {} : { animation: command.animation }),
  };
}

function commandRecord(actor: string, command: ActorCommand): CommandRecord {
  const animation = "animation" in command && command.animation !== undefined ? { animation: command.animation } : {};
  switch (command.type) {
    case "move":
      return moveRecord(actor, command);
    case "face":
      return faceRecord(actor, command);
    case "turn":
      return { command: "turn", actor, degrees: command.degrees, ...timingFields(command.timing), ...animation };
    case "stay":
      return command.length.kind === "till_end"
        ? { command: "stay", actor, tillEnd: true, ...animation }
        : { command: "stay", actor, seconds: command.length.seconds, ...animation };
    case "wait_until":
      return { command: "wait_until", actor, time: command.time };
    case "animation":
      return command.playRate === undefined
        ? { command: "animation", actor, clip: command.clip }
        : { command: "animation", actor, clip: command.clip, playRate: command.playRate };
    case "camera_look_at":
      return { command: "camera_look_at", actor, subject: command.subject, heightFraction: command.heightFraction };
    case "camera_focus":
      return { command: "camera_focus", actor, subject: command.subject, heightFraction: command.heightFraction };
    case "camera_frame_subject":
      return { command: "camera_frame_subject", actor, subject: command.subject, coverage: command.coverage };
    case "camera_focal_length":
      return { command: "camera_focal_length", actor, focalLength: command.focalLength };
  }
}

function lightRecord(light: LightDeclaration): CommandRecordOf<"add_light"> {
  return {
    command: "add_light",
    actor: light.name,
    lightType: light.lightType,
    ...(light.location === undefined ? {} : { location: tupleOf(light.location) }),
    ...(light.rotation === undefined ? {} : { rotation: rotationTupleOf(light.rotation) }),
    ...(light.from === undefined ? {} : { from: light.from }),
    ...(light.angle === undefined ? {} : { angle: light.angle }),
    ...(light.intensity === undefined ? {} : { intensity: light.intensity }),
    ...(light.color === undefined ? {} : { color: light.color }),
    ...(light.castShadows === undefined ? {} : { castShadows: light.castShadows }),
  };
}

function declarationRecord(actor: PlanActor, lights: readonly LightDeclaration[]): CommandRecord | null {
  const location = tupleOf(actor.pose.location);
  const rotation = rotationTupleOf(actor.pose.rotation);
  switch (actor.kind) {
    case "character":
      return { command: "add_actor", actor: actor.name, location, rotation, meshYawOffset: actor.pose.meshYawOffset };
    case "camera":
      return actor.focalLength === undefined
        ? { command: "add_camera", actor: actor.name, location, rotation }
        : { command: "add_camera", actor: actor.name, location, rotation, focalLength: actor.focalLength };
    case "light": {
      const light = lights.find((l) => l.name === actor.name);
      return light === undefined ? null : lightRecord(light);
    }
  }
}

/**
 * Serialize a plan as a command document. Declarations come first, then each
 * actor's stream in declaration order, so a replay rebuilds the same plan.
 * Fork structure is not kept: it is already flattened into `wait_until`.
 */
export function toCommandDocument(plan: MotionPlan): CommandDocument {
  const commands: CommandRecord[] = [];

  for (const actor of plan.actors.values()) {
    const record = declarationRecord(actor, plan.scene.lights);
    if (record !== null) {
      commands.push(record);
    }
  }
  if (plan.scene.atmosphere !== null) {
    commands.push({ command: "add_atmosphere", ...plan.scene.atmosphere });
  }
  for (const cue of plan.scene.audio) {
    commands.push({ command: "add_audio", ...cue });
  }
  for (const cut of plan.scene.cuts) {
    commands.push({ command: "camera_cut", camera: cut.camera, time: cut.time });
  }
  for (const actor of plan.actors.values()) {
    for (const command of actor.commands) {
      commands.push(commandRecord(actor.name, command));
    }
  }

  return plan.duration === undefined
    ? { name: plan.name, fps: plan.fps, commands }
    : { name: plan.name, fps: plan.fps, duration: plan.duration, commands };
}
