/**
 * JsonFileSink: writes each delivered document to
 * `<outDir>/<name>.keyframes.json`.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { KeyframeSink, SinkResult } from "@blocking/core";
import type { KeyframeDocument } from "@blocking/schema";

/** File name for a plan name; anything outside `[A-Za-z0-9_-]` becomes `_`. */
export function keyframeFileName(name: string): string {
  return `${name.replace(/[^A-Za-z0-9_-]+/g, "_")}.keyframes.json`;
}

export class JsonFileSink implements KeyframeSink {
  private readonly outDir: string;
  /** Paths written so far, in order. */
  readonly written: string[] = [];
  /** The last document written. */
  last: KeyframeDocument | null = null;

  constructor(outDir: string) {
    this.outDir = outDir;
  }

  pathFor(document: KeyframeDocument): string {
    return join(this.outDir, keyframeFileName(document.name));
  }

  async apply(document: KeyframeDocument): Promise<SinkResult> {
    const path = this.pathFor(document);
    try {
      await mkdir(this.outDir, { recursive: true });
      await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, "utf8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, error: { code: "WRITE_FAILED", message: `${path}: ${message}` } };
    }
    this.written.push(path);
    this.last = document;
    return { ok: true };
  }
}
