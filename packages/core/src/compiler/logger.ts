/**
 * Minimal logger seam for the compiler.
 *
 * The compiler never writes to the console by itself. Callers that want
 * output pass a logger; the CLI uses `createConsoleLogger`.
 */

export interface PlanLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/** Discards everything. The default. */
export const silentLogger: PlanLogger = {
  debug() {},
  info() {},
  warn() {},
};

export interface ConsoleLoggerOptions {
  /** Emit `debug` lines. Default false. */
  readonly verbose?: boolean;
}

/**
 * Logger writing `[prefix] message` lines to stderr.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger("blocking", { verbose: true });
 * logger.info("compiled 3 actors");
 * // stderr: [blocking] compiled 3 actors
 * ```
 */
export function createConsoleLogger(prefix: string, options: ConsoleLoggerOptions = {}): PlanLogger {
  const tag = `[${prefix}]`;
  return {
    debug(message) {
      if (options.verbose === true) {
        console.error(`${tag} ${message}`);
      }
    },
    info(message) {
      console.error(`${tag} ${message}`);
    },
    warn(message) {
      console.warn(`${tag} ${message}`);
    },
  };
}
