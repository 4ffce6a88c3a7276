/**
 * Export: turn finalized timelines into a frame-indexed keyframe document.
 *
 * Every position and rotation in the document is a fresh object, so a
 * consumer may edit the document without touching the plan or another
 * compile's output.
 */

import type {
  ActorRecord,
  ActorTracks,
  AnimationSection,
  Keyframe,
  KeyframeDocument,
  Rotator,
  Vec3,
} from "@blocking/schema";
import { resolveScene } from "./scene.js";
import type { ActorTimeline, AnimationSpan } from "./timeline.js";
import type { MotionPlan } from "./types.js";
import { toFrame } from "./units.js";

const copyVec = (v: Vec3): Vec3 => ({ x: v.x, y: v.y, z: v.z });
const copyRotator = (r: Rotator): Rotator => ({ pitch: r.pitch, yaw: r.yaw, roll: r.roll });
const same = <V>(value: V): V => value;

function copyKeys<V>(keys: readonly Keyframe<V>[], copy: (value: V) => V): Keyframe<V>[] {
  return keys.map((key) => ({ frame: key.frame, value: copy(key.value), interpolation: key.interpolation }));
}

function exportTracks(timeline: ActorTimeline): ActorTracks {
  const { tracks } = timeline;
  return {
    location: copyKeys(tracks.location.compacted(), copyVec),
    rotation: copyKeys(tracks.rotation.compacted(), copyRotator),
    animation: copyKeys(tracks.animation.compacted(), same),
    focal_length: copyKeys(tracks.focal_length.compacted(), same),
    focus_distance: copyKeys(tracks.focus_distance.compacted(), same),
  };
}

/** A section names its play rate only when the clip is not played at normal speed. */
function exportSection(span: AnimationSpan, fps: number, duration: number): AnimationSection {
  const section = {
    clip: span.clip,
    startFrame: toFrame(span.start, fps),
    endFrame: toFrame(span.end ?? duration, fps),
  };
  return span.playRate === 1 ? section : { ...section, playRate: span.playRate };
}

function exportActor(timeline: ActorTimeline, fps: number, duration: number): ActorRecord {
  const { actor } = timeline;
  return {
    kind: actor.kind,
    pose: {
      location: copyVec(actor.pose.location),
      rotation: copyRotator(actor.pose.rotation),
      meshYawOffset: actor.pose.meshYawOffset,
    },
    managed: timeline.managed,
    tracks: exportTracks(timeline),
    animations: timeline.animations.map((span) => exportSection(span, fps, duration)),
    segments: timeline.segments.map((segment) => ({
      startFrame: toFrame(segment.start, fps),
      endFrame: toFrame(segment.end, fps),
      source: segment.source,
      commandIndex: segment.commandIndex,
    })),
  };
}

export function exportDocument(
  plan: MotionPlan,
  timelines: ReadonlyMap<string, ActorTimeline>,
  waypoints: ReadonlyMap<string, Vec3>,
  duration: number,
): KeyframeDocument {
  const actors: Record<string, ActorRecord> = {};
  for (const [name, timeline] of timelines) {
    actors[name] = exportActor(timeline, plan.fps, duration);
  }
  return {
    name: plan.name,
    fps: plan.fps,
    duration,
    totalFrames: toFrame(duration, plan.fps),
    actors,
    waypoints: Object.fromEntries([...waypoints].map(([name, at]) => [name, copyVec(at)])),
    scene: resolveScene(plan.scene, plan.fps),
  };
}
