/**
 * @blocking/core: motion plan builder and keyframe compiler.
 *
 * Builds per-actor command streams, resolves them into frame-indexed
 * keyframes, derives camera tracking and checks that every managed actor
 * covers the whole plan. Runs in Node.js and the browser.
 */

export * from "./compiler/index.js";
