/**
 * @blocking/cli: file-based front end of the compiler.
 */

export { parseConfig } from "./config/config.js";
export type { CliConfig } from "./config/config.js";
export { JsonFileSink, keyframeFileName } from "./sink/json-file-sink.js";
export { formatSummary } from "./summary.js";
export { run } from "./run.js";
export type { RunIo } from "./run.js";
