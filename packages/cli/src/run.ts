/**
 * One compile run: read the command document, build the plan, deliver the
 * compiled document to a JsonFileSink and print a summary.
 *
 * Returns the process exit code. Compile and document errors are reported
 * through the logger as `ErrorName: message`, followed by the record they
 * came from when replay raised them; anything else propagates.
 */

import { readFile } from "node:fs/promises";
import { CommandDocumentError, MotionPlanError, deliver, fromCommandDocument } from "@blocking/core";
import type { MotionPlan, PlanLogger } from "@blocking/core";
import type { CliConfig } from "./config/config.js";
import { JsonFileSink } from "./sink/json-file-sink.js";
import { formatSummary } from "./summary.js";

export interface RunIo {
  readonly logger: PlanLogger;
  /** Receives the summary, one line per call. */
  readonly print: (line: string) => void;
}

const USAGE = "Usage: blocking [--out <dir>] [--sample-interval <s>] [--zoom-threshold <r>] [--verbose] <document.json>";

async function loadPlan(path: string, logger: PlanLogger): Promise<MotionPlan | null> {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    logger.warn(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  try {
    return fromCommandDocument(json);
  } catch (err) {
    if (!(err instanceof MotionPlanError)) {
      throw err;
    }
    logger.warn(`${err.name}: ${err.message}`);
    if (err instanceof CommandDocumentError) {
      for (const issue of err.issues.filter((i) => i !== err.message)) {
        logger.warn(`  ${issue}`);
      }
    } else if (err.context.recordIndex !== undefined) {
      logger.warn(`  at commands.${err.context.recordIndex}`);
    }
    return null;
  }
}

export async function run(config: CliConfig, io: RunIo): Promise<number> {
  const { logger } = io;
  if (config.input === undefined) {
    logger.warn(USAGE);
    return 1;
  }

  const plan = await loadPlan(config.input, logger);
  if (plan === null) {
    return 1;
  }

  const sink = new JsonFileSink(config.outDir);
  const result = await deliver(plan, sink, {
    logger,
    sampleInterval: config.sampleInterval,
    zoomThreshold: config.zoomThreshold,
  });
  if (!result.ok) {
    return 1;
  }

  const document = sink.last;
  if (document !== null) {
    logger.info(`wrote ${sink.pathFor(document)}`);
    for (const line of formatSummary(document)) {
      io.print(line);
    }
  }
  return 0;
}
