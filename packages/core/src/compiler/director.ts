/**
 * Strict director: plan length, till-end resolution and timeline
 * completeness.
 *
 * Every managed actor must account for the whole plan: its segments start at
 * 0, follow each other without gaps and end exactly at the plan duration.
 * An actor that falls short would silently hold its last pose, so a gap is a
 * hard failure.
 */

import { MotionTimelineError, TimelineOverflowError } from "./errors.js";
import type { PlanLogger } from "./logger.js";
import type { ActorTimeline } from "./timeline.js";

const TIME_EPSILON = 1e-6;

/**
 * Plan length in seconds: the configured duration, or else the latest time
 * any actor reaches before a till-end stay.
 */
export function planDuration(
  configured: number | undefined,
  timelines: ReadonlyMap<string, ActorTimeline>,
): number {
  if (configured !== undefined) {
    return configured;
  }
  let latest = 0;
  for (const timeline of timelines.values()) {
    latest = Math.max(latest, timeline.time);
  }
  return latest;
}

/**
 * Resolve till-end stays to holds ending at `duration`, then close every
 * clip and camera entry still open.
 */
export function finalizeTimelines(
  timelines: ReadonlyMap<string, ActorTimeline>,
  duration: number,
  logger: PlanLogger,
): void {
  for (const timeline of timelines.values()) {
    const marker = timeline.tillEnd;
    if (marker !== null) {
      const remaining = duration - marker.start;
      if (remaining < -TIME_EPSILON) {
        throw new TimelineOverflowError(
          `"${timeline.name}" reaches its till-end stay at ${marker.start.toFixed(3)}s, ` +
            `after the plan ends at ${duration.toFixed(3)}s`,
          -remaining,
          { actor: timeline.name, commandIndex: marker.commandIndex, time: marker.start },
        );
      }
      if (remaining > TIME_EPSILON) {
        timeline.hold(duration, "stay", marker.commandIndex);
        if (marker.animation !== undefined) {
          timeline.switchClip(marker.animation, marker.start);
        }
        logger.debug(`${timeline.name}: till-end stay holds for ${remaining.toFixed(3)}s`);
      }
    }

    timeline.endClip(duration);
    timeline.closeCameraEntry("look_at", duration);
    timeline.closeCameraEntry("focus", duration);
    timeline.closeCameraEntry("zoom", duration);
  }
}

/**
 * Check that every managed actor's segments tile `[0, duration]`.
 *
 * @throws MotionTimelineError on a gap, naming the actor and the gap size.
 * @throws TimelineOverflowError when an actor runs past the plan end.
 */
export function validateTimelines(timelines: ReadonlyMap<string, ActorTimeline>, duration: number): void {
  for (const timeline of timelines.values()) {
    if (!timeline.managed) {
      continue;
    }
    const name = timeline.name;
    let cursor = 0;
    for (const segment of timeline.segments) {
      const gap = segment.start - cursor;
      if (gap > TIME_EPSILON) {
        throw new MotionTimelineError(
          `"${name}" has a ${gap.toFixed(3)}s gap from ${cursor.toFixed(3)}s to ${segment.start.toFixed(3)}s`,
          gap,
          { actor: name, commandIndex: segment.commandIndex, time: cursor },
        );
      }
      if (gap < -TIME_EPSILON) {
        throw new MotionTimelineError(
          `"${name}" has segments overlapping by ${(-gap).toFixed(3)}s at ${segment.start.toFixed(3)}s`,
          -gap,
          { actor: name, commandIndex: segment.commandIndex, time: segment.start },
        );
      }
      cursor = segment.end;
    }

    const last = timeline.segments[timeline.segments.length - 1];
    const shortfall = duration - cursor;
    if (shortfall > TIME_EPSILON) {
      throw new MotionTimelineError(
        `"${name}" timeline ends at ${cursor.toFixed(3)}s, leaving a ${shortfall.toFixed(3)}s gap ` +
          `before the plan ends at ${duration.toFixed(3)}s`,
        shortfall,
        { actor: name, commandIndex: last?.commandIndex, time: cursor },
      );
    }
    if (shortfall < -TIME_EPSILON) {
      throw new TimelineOverflowError(
        `"${name}" timeline ends at ${cursor.toFixed(3)}s, ${(-shortfall).toFixed(3)}s ` +
          `after the plan ends at ${duration.toFixed(3)}s`,
        -shortfall,
        { actor: name, commandIndex: last?.commandIndex, time: cursor },
      );
    }
  }
}
