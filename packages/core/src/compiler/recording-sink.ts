/**
 * RecordingSink: keeps every delivered document for test assertions.
 *
 * @example
 * ```ts
 * const sink = new RecordingSink();
 * await deliver(plan, sink);
 *
 * expect(sink.documents).toHaveLength(1);
 * expect(sink.last()?.actors["Hero"]?.segments).toHaveLength(3);
 * ```
 */

import type { KeyframeDocument } from "@blocking/schema";
import type { KeyframeSink, SinkResult } from "./sink.js";

export class RecordingSink implements KeyframeSink {
  /** Documents in delivery order. */
  readonly documents: KeyframeDocument[] = [];
  private readonly reject: string | null;

  /** @param reject - When set, every apply fails with this message after recording. */
  constructor(reject: string | null = null) {
    this.reject = reject;
  }

  apply(document: KeyframeDocument): SinkResult {
    this.documents.push(document);
    if (this.reject !== null) {
      return { ok: false, error: { code: "SINK_REJECTED", message: this.reject } };
    }
    return { ok: true };
  }

  last(): KeyframeDocument | undefined {
    return this.documents[this.documents.length - 1];
  }

  clear(): void {
    this.documents.length = 0;
  }
}
