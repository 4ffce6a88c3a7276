/**
 * KeyframeSink: where compiled documents go.
 *
 * The compiler knows nothing about the consumer. A sink receives the
 * finished document and reports back whether it took it; the CLI writes
 * JSON files, tests record in memory, an engine bridge would push keys
 * into a live scene.
 */

import type { KeyframeDocument } from "@blocking/schema";
import { compile } from "./compiler.js";
import { MotionPlanError } from "./errors.js";
import { resolveCompileOptions } from "./options.js";
import type { CompileOptions } from "./options.js";
import type { MotionPlan } from "./types.js";

export type SinkResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: { readonly code: string; readonly message: string } };

export interface KeyframeSink {
  apply(document: KeyframeDocument): SinkResult | Promise<SinkResult>;
}

/**
 * Compile `plan` and hand the document to `sink`.
 *
 * Compile errors are reported as a failed result carrying the error code,
 * so callers see one shape whether the plan or the sink was at fault.
 * Anything that is not a MotionPlanError is rethrown.
 */
export async function deliver(
  plan: MotionPlan,
  sink: KeyframeSink,
  options: CompileOptions = {},
): Promise<SinkResult> {
  const { logger } = resolveCompileOptions(options);
  let document: KeyframeDocument;
  try {
    document = compile(plan, options);
  } catch (err) {
    if (err instanceof MotionPlanError) {
      logger.warn(`${err.name}: ${err.message}`);
      return { ok: false, error: { code: err.code, message: err.message } };
    }
    throw err;
  }

  const result = await sink.apply(document);
  if (!result.ok) {
    logger.warn(`sink rejected "${document.name}": ${result.error.message}`);
  }
  return result;
}
