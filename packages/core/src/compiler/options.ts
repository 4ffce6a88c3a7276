/**
 * Compile options and their defaults.
 */

import { silentLogger } from "./logger.js";
import type { PlanLogger } from "./logger.js";

export interface CompileOptions {
  /** Seconds between camera samples. */
  readonly sampleInterval?: number;
  /** Relative focal-length change that forces a new zoom key. */
  readonly zoomThreshold?: number;
  /** Degrees of aim change that force a new look-at key. */
  readonly lookAtEpsilon?: number;
  /** Metres of focus change that force a new focus key. */
  readonly focusEpsilon?: number;
  /** Millimetres. */
  readonly sensorHeight?: number;
  /** Nominal subject height, in metres. */
  readonly subjectHeight?: number;
  /** Seconds between position keys on a ramped move. */
  readonly rampSampleInterval?: number;
  readonly logger?: PlanLogger;
}

export type ResolvedCompileOptions = Required<CompileOptions>;

export const DEFAULT_COMPILE_OPTIONS: ResolvedCompileOptions = {
  sampleInterval: 2,
  zoomThreshold: 0.1,
  lookAtEpsilon: 0.1,
  focusEpsilon: 0.01,
  sensorHeight: 24,
  subjectHeight: 1.8,
  rampSampleInterval: 0.5,
  logger: silentLogger,
};

export function resolveCompileOptions(options: CompileOptions = {}): ResolvedCompileOptions {
  const d = DEFAULT_COMPILE_OPTIONS;
  const resolved: ResolvedCompileOptions = {
    sampleInterval: options.sampleInterval ?? d.sampleInterval,
    zoomThreshold: options.zoomThreshold ?? d.zoomThreshold,
    lookAtEpsilon: options.lookAtEpsilon ?? d.lookAtEpsilon,
    focusEpsilon: options.focusEpsilon ?? d.focusEpsilon,
    sensorHeight: options.sensorHeight ?? d.sensorHeight,
    subjectHeight: options.subjectHeight ?? d.subjectHeight,
    rampSampleInterval: options.rampSampleInterval ?? d.rampSampleInterval,
    logger: options.logger ?? d.logger,
  };
  for (const key of ["sampleInterval", "sensorHeight", "subjectHeight", "rampSampleInterval"] as const) {
    if (!(resolved[key] > 0)) {
      throw new RangeError(`${key} must be positive, got ${resolved[key]}`);
    }
  }
  if (resolved.zoomThreshold < 0) {
    throw new RangeError(`zoomThreshold must not be negative, got ${resolved.zoomThreshold}`);
  }
  return resolved;
}
