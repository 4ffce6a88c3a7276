import { describe, it, expect } from "vitest";
import { KeyframeTrack, createTrackSet, sampleLocation } from "../src/compiler/track.js";

function numberTrack(): KeyframeTrack<number> {
  return new KeyframeTrack<number>((a, b) => a === b);
}

describe("KeyframeTrack", () => {
  it("keeps keys sorted whatever the insertion order", () => {
    const track = numberTrack();
    track.set(30, 3);
    track.set(0, 1);
    track.set(15, 2);
    expect(track.keyframes.map((k) => k.frame)).toEqual([0, 15, 30]);
  });

  it("replaces a key written to an occupied frame", () => {
    const track = numberTrack();
    track.set(10, 1);
    track.set(10, 2, "linear");
    expect(track.keyframes).toEqual([{ frame: 10, value: 2, interpolation: "linear" }]);
  });

  it("defaults to cubic interpolation", () => {
    const track = numberTrack();
    track.set(0, 5);
    expect(track.last()).toEqual({ frame: 0, value: 5, interpolation: "cubic" });
  });

  it("removes an inclusive frame range", () => {
    const track = numberTrack();
    for (const frame of [0, 10, 20, 30, 40]) {
      track.set(frame, frame);
    }
    track.removeRange(10, 30);
    expect(track.keyframes.map((k) => k.frame)).toEqual([0, 40]);
  });

  it("collapses runs of equal values to their ends", () => {
    const track = numberTrack();
    track.set(0, 1);
    track.set(10, 1);
    track.set(20, 1);
    track.set(30, 2);
    track.set(40, 2);
    expect(track.compacted().map((k) => [k.frame, k.value])).toEqual([
      [0, 1],
      [20, 1],
      [30, 2],
      [40, 2],
    ]);
  });

  it("keeps a hold that is only two keys long", () => {
    const track = numberTrack();
    track.set(0, 1);
    track.set(10, 1);
    track.set(20, 5);
    expect(track.compacted()).toHaveLength(3);
  });
});

describe("createTrackSet", () => {
  it("compares vectors with a tolerance", () => {
    const tracks = createTrackSet();
    tracks.location.set(0, { x: 0, y: 0, z: 0 });
    tracks.location.set(10, { x: 1e-9, y: 0, z: 0 });
    tracks.location.set(20, { x: 0, y: 0, z: 0 });
    expect(tracks.location.compacted().map((k) => k.frame)).toEqual([0, 20]);
  });
});

describe("sampleLocation", () => {
  const tracks = createTrackSet();
  tracks.location.set(0, { x: 0, y: 0, z: 0 });
  tracks.location.set(30, { x: 300, y: 0, z: 0 });
  tracks.location.set(60, { x: 300, y: 600, z: 0 });

  it("interpolates linearly between keys", () => {
    expect(sampleLocation(tracks.location, 15)).toEqual({ x: 150, y: 0, z: 0 });
    expect(sampleLocation(tracks.location, 45)).toEqual({ x: 300, y: 300, z: 0 });
  });

  it("holds the end values outside the keys", () => {
    expect(sampleLocation(tracks.location, -5)).toEqual({ x: 0, y: 0, z: 0 });
    expect(sampleLocation(tracks.location, 90)).toEqual({ x: 300, y: 600, z: 0 });
  });

  it("returns undefined for an empty track", () => {
    expect(sampleLocation(createTrackSet().location, 0)).toBeUndefined();
  });
});
