/**
 * Compile error taxonomy.
 *
 * Every failure is an authoring mistake, deterministic and not retryable.
 * Each error carries a stable `code` and the location of the cause, so the
 * author can find it without re-running with extra diagnostics.
 */

/** Where in the plan an error originates. */
export interface ErrorContext {
  readonly actor?: string;
  /** Index of the offending command in the actor's stream. */
  readonly commandIndex?: number;
  /** Plan time in seconds. */
  readonly time?: number;
  /** Index of the command document record that was being replayed. */
  readonly recordIndex?: number;
}

export type MotionPlanErrorCode =
  | "AMBIGUOUS_CONSTRAINT"
  | "UNDERCONSTRAINED_MOTION"
  | "UNDEFINED_WAYPOINT"
  | "DUPLICATE_WAYPOINT"
  | "INVALID_MOTION_PARAMETERS"
  | "UNKNOWN_TRACKING_SUBJECT"
  | "FACING_TARGET"
  | "MOTION_TIMELINE"
  | "TIMELINE_OVERFLOW"
  | "TILL_END_PLACEMENT"
  | "UNKNOWN_ACTOR"
  | "DUPLICATE_ACTOR"
  | "ACTOR_KIND"
  | "COMMAND_DOCUMENT";

/** Base class of every compile error. */
export class MotionPlanError extends Error {
  readonly code: MotionPlanErrorCode;
  private where: ErrorContext;

  constructor(code: MotionPlanErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.where = context;
  }

  get context(): ErrorContext {
    return this.where;
  }

  /** Attribute the error to record `recordIndex` of a replayed command document. */
  atRecord(recordIndex: number): this {
    this.where = { ...this.where, recordIndex };
    return this;
  }
}

/** A move was given a second constraint after it was already committed. */
export class AmbiguousConstraintError extends MotionPlanError {
  constructor(message: string, context: ErrorContext = {}) {
    super("AMBIGUOUS_CONSTRAINT", message, context);
  }
}

/** A move never received a full constraint pair. */
export class UnderconstrainedMotionError extends MotionPlanError {
  constructor(message: string, context: ErrorContext = {}) {
    super("UNDERCONSTRAINED_MOTION", message, context);
  }
}

export class UndefinedWaypointError extends MotionPlanError {
  readonly waypoint: string;

  constructor(waypoint: string, context: ErrorContext = {}) {
    super("UNDEFINED_WAYPOINT", `Waypoint "${waypoint}" is referenced before it is recorded`, context);
    this.waypoint = waypoint;
  }
}

export class DuplicateWaypointError extends MotionPlanError {
  readonly waypoint: string;

  constructor(waypoint: string, context: ErrorContext = {}) {
    super("DUPLICATE_WAYPOINT", `Waypoint "${waypoint}" is already recorded`, context);
    this.waypoint = waypoint;
  }
}

/** A resolved distance, time or speed is zero or negative. */
export class InvalidMotionParametersError extends MotionPlanError {
  constructor(message: string, context: ErrorContext = {}) {
    super("INVALID_MOTION_PARAMETERS", message, context);
  }
}

export class UnknownTrackingSubjectError extends MotionPlanError {
  readonly camera: string;
  readonly subject: string;

  constructor(camera: string, subject: string, reason: string, context: ErrorContext = {}) {
    super("UNKNOWN_TRACKING_SUBJECT", `Camera "${camera}" tracks "${subject}": ${reason}`, {
      actor: camera,
      ...context,
    });
    this.camera = camera;
    this.subject = subject;
  }
}

/** A face toward another actor cannot be resolved. */
export class FacingTargetError extends MotionPlanError {
  readonly target: string;

  constructor(target: string, reason: string, context: ErrorContext = {}) {
    super("FACING_TARGET", `Cannot face "${target}": ${reason}`, context);
    this.target = target;
  }
}

/** A managed actor's timeline has a gap or starts late. */
export class MotionTimelineError extends MotionPlanError {
  /** Size of the gap in seconds. */
  readonly gap: number;

  constructor(message: string, gap: number, context: ErrorContext = {}) {
    super("MOTION_TIMELINE", message, context);
    this.gap = gap;
  }
}

/** An actor's commands run past the plan duration. */
export class TimelineOverflowError extends MotionPlanError {
  /** Seconds past the end of the plan. */
  readonly overflow: number;

  constructor(message: string, overflow: number, context: ErrorContext = {}) {
    super("TIMELINE_OVERFLOW", message, context);
    this.overflow = overflow;
  }
}

/** A command was added after a till-end stay. */
export class TillEndPlacementError extends MotionPlanError {
  constructor(message: string, context: ErrorContext = {}) {
    super("TILL_END_PLACEMENT", message, context);
  }
}

export class UnknownActorError extends MotionPlanError {
  constructor(actor: string, context: ErrorContext = {}) {
    super("UNKNOWN_ACTOR", `Actor "${actor}" is not declared in the plan`, { actor, ...context });
  }
}

export class DuplicateActorError extends MotionPlanError {
  constructor(actor: string) {
    super("DUPLICATE_ACTOR", `Actor "${actor}" is already declared`, { actor });
  }
}

/** A camera-only operation addressed an actor that is not a camera. */
export class ActorKindError extends MotionPlanError {
  constructor(actor: string, expected: string, actual: string, context: ErrorContext = {}) {
    super("ACTOR_KIND", `Actor "${actor}" is a ${actual}, expected a ${expected}`, { actor, ...context });
  }
}

/** A serialized command document failed validation. */
export class CommandDocumentError extends MotionPlanError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[], context: ErrorContext = {}) {
    super("COMMAND_DOCUMENT", message, context);
    this.issues = issues;
  }
}
