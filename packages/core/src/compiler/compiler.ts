/**
 * compile(): run every pass over a built motion plan.
 *
 * 1. resolve each actor's commands into keys and segments
 * 2. fix the plan length and resolve till-end stays
 * 3. derive camera look-at, focus and zoom keys
 * 4. check that every managed actor covers the whole plan
 * 5. export the keyframe document
 *
 * Any pass may throw a MotionPlanError; nothing is emitted in that case.
 */

import type { KeyframeDocument } from "@blocking/schema";
import { runCameraPasses } from "./camera-passes.js";
import { finalizeTimelines, planDuration, validateTimelines } from "./director.js";
import { exportDocument } from "./export.js";
import { resolveCompileOptions } from "./options.js";
import type { CompileOptions } from "./options.js";
import { resolveTimelines } from "./resolver.js";
import type { MotionPlan } from "./types.js";

export function compile(plan: MotionPlan, options: CompileOptions = {}): KeyframeDocument {
  const resolved = resolveCompileOptions(options);
  const { logger } = resolved;

  const { timelines, waypoints } = resolveTimelines(plan, resolved);
  const duration = planDuration(plan.duration, timelines);
  finalizeTimelines(timelines, duration, logger);
  runCameraPasses(timelines, plan.fps, duration, resolved);
  validateTimelines(timelines, duration);

  const document = exportDocument(plan, timelines, waypoints, duration);
  logger.info(
    `compiled "${plan.name}": ${timelines.size} actors, ${waypoints.size} waypoints, ` +
      `${document.totalFrames} frames at ${plan.fps} fps`,
  );
  return document;
}
