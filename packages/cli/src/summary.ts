/**
 * One-screen summary of a compiled keyframe document.
 */

import type { ActorRecord, KeyframeDocument } from "@blocking/schema";
import { PROPERTY_NAMES } from "@blocking/schema";

function keyCount(actor: ActorRecord): number {
  return PROPERTY_NAMES.reduce((sum, property) => sum + actor.tracks[property].length, 0);
}

/**
 * @example
 * ```
 * Chase: 240 frames at 30 fps (8.000s)
 *   Hero  character  3 segments  7 keys
 *   Prop  character  unmanaged   0 keys
 * ```
 */
export function formatSummary(document: KeyframeDocument): string[] {
  const entries = Object.entries(document.actors);
  const nameWidth = Math.max(0, ...entries.map(([name]) => name.length));
  const kindWidth = Math.max(0, ...entries.map(([, actor]) => actor.kind.length));

  const lines = [
    `${document.name}: ${document.totalFrames} frames at ${document.fps} fps (${document.duration.toFixed(3)}s)`,
  ];
  for (const [name, actor] of entries) {
    const count = actor.segments.length;
    const segments = actor.managed ? `${count} segment${count === 1 ? "" : "s"}` : "unmanaged";
    lines.push(
      `  ${name.padEnd(nameWidth)}  ${actor.kind.padEnd(kindWidth)}  ${segments.padEnd(11)} ${keyCount(actor)} keys`,
    );
  }
  const waypoints = Object.keys(document.waypoints);
  if (waypoints.length > 0) {
    lines.push(`  waypoints: ${waypoints.join(", ")}`);
  }
  return lines;
}
