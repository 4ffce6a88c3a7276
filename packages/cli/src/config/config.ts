/**
 * CLI argument parsing for the blocking compiler.
 *
 * Supports:
 *   blocking scene.json
 *   blocking --out build/keys scene.json
 *   blocking --sample-interval 0.5 --zoom-threshold 0.05 --verbose scene.json
 */

/** Parsed configuration for one compile run. */
export interface CliConfig {
  /** Path of the command document to compile. */
  input?: string;
  /** Directory the keyframe document is written to. */
  outDir: string;
  /** Seconds between camera samples. */
  sampleInterval?: number;
  /** Relative focal-length change that forces a zoom key. */
  zoomThreshold?: number;
  /** Print debug lines. */
  verbose: boolean;
}

const DEFAULT_OUT_DIR = "out";

function numberOption(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Parses process.argv into a CliConfig.
 *
 * @param argv - The full process.argv array
 * @param env - Environment; `BLOCKING_OUT_DIR` is the fallback for `--out`
 */
export function parseConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const args = argv.slice(2); // skip node + script

  let input: string | undefined;
  let outDir: string | undefined;
  let sampleInterval: number | undefined;
  let zoomThreshold: number | undefined;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === undefined) {
      break;
    }

    if (arg === "--out" && next !== undefined) {
      outDir = next;
      i++;
    } else if (arg === "--sample-interval" && next !== undefined) {
      sampleInterval = numberOption(arg, next);
      i++;
    } else if (arg === "--zoom-threshold" && next !== undefined) {
      zoomThreshold = numberOption(arg, next);
      i++;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return {
    input,
    outDir: outDir ?? env["BLOCKING_OUT_DIR"] ?? DEFAULT_OUT_DIR,
    sampleInterval,
    zoomThreshold,
    verbose,
  };
}
