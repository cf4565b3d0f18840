/**
 * Link Reader Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { LinkReader } from "../../src/serial/link-reader";
import { LinkError } from "../../src/serial/errors";
import type { Sample } from "../../src/state/types";
import { buildFrame, concat } from "../helpers/frames";

function fixedClock(start: number) {
  let now = start;
  return {
    clock: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("LinkReader", () => {
  it("decodes a whole frame", () => {
    const reader = new LinkReader({ clock: () => 5000 });
    reader.feed(buildFrame({ heightMeasuredMm: 123 }));

    const samples = [...reader.poll()];

    assert.strictEqual(samples.length, 1);
    assert.strictEqual(samples[0].heightMeasuredMm, 123);
    assert.strictEqual(samples[0].receivedAt, 5000);
    assert.strictEqual(reader.bufferSize, 0);
  });

  it("reassembles a frame split across reads", () => {
    const time = fixedClock(1000);
    const reader = new LinkReader({ clock: time.clock });
    const frame = buildFrame({ dutyRaw: 800 });

    reader.feed(frame.subarray(0, 7));
    assert.strictEqual([...reader.poll()].length, 0);
    assert.strictEqual(reader.bufferSize, 7);

    time.advance(10);
    reader.feed(frame.subarray(7));
    const samples = [...reader.poll()];

    assert.strictEqual(samples.length, 1);
    assert.strictEqual(samples[0].dutyRaw, 800);
    assert.deepStrictEqual(reader.health(), {
      framesDecoded: 1,
      droppedBytes: 0,
      garbledFrames: 0,
      resyncs: 0,
      lastSampleAt: 1010,
    });
  });

  it("keeps receivedAt strictly increasing under a frozen clock", () => {
    const reader = new LinkReader({ clock: () => 1000 });
    reader.feed(concat(buildFrame(), buildFrame(), buildFrame()));

    const stamps = [...reader.poll()].map((s) => s.receivedAt);

    assert.deepStrictEqual(stamps, [1000, 1001, 1002]);
  });

  it("resyncs past a leading garbage byte", () => {
    const reader = new LinkReader({ clock: () => 0 });
    reader.feed(
      concat(
        new Uint8Array([0xff]),
        buildFrame({ heightSetpointMm: 300 }),
        buildFrame({ heightSetpointMm: 310 }),
        buildFrame({ heightSetpointMm: 320 })
      )
    );

    const samples = [...reader.poll()];

    assert.deepStrictEqual(samples.map((s) => s.heightSetpointMm), [300, 310, 320]);
    const health = reader.health();
    assert.strictEqual(health.droppedBytes, 1);
    assert.strictEqual(health.resyncs, 1);
    assert.strictEqual(health.framesDecoded, 3);
  });

  it("discards the buffer after a frame length of failed offsets", () => {
    const reader = new LinkReader({ clock: () => 0 });
    reader.feed(new Uint8Array(30).fill(0xff));

    assert.strictEqual([...reader.poll()].length, 0);
    assert.strictEqual(reader.bufferSize, 0);
    const health = reader.health();
    assert.strictEqual(health.droppedBytes, 30);
    assert.strictEqual(health.garbledFrames, 1);
    assert.strictEqual(health.framesDecoded, 0);
  });

  it("holds a short garbled tail until more bytes arrive", () => {
    const reader = new LinkReader({ clock: () => 0 });
    reader.feed(new Uint8Array(20).fill(0xff));

    assert.strictEqual([...reader.poll()].length, 0);
    assert.strictEqual(reader.bufferSize, 14);
    assert.strictEqual(reader.health().droppedBytes, 6);
    assert.strictEqual(reader.health().garbledFrames, 0);
  });

  it("drops a stale partial frame after the frame gap", () => {
    const time = fixedClock(1000);
    const reader = new LinkReader({ clock: time.clock, frameGapMs: 40 });

    reader.feed(new Uint8Array([1, 2, 3, 4, 5]));
    assert.strictEqual([...reader.poll()].length, 0);

    time.advance(100);
    reader.feed(buildFrame({ heightMeasuredMm: 77 }));
    const samples = [...reader.poll()];

    assert.strictEqual(samples.length, 1);
    assert.strictEqual(samples[0].heightMeasuredMm, 77);
    assert.strictEqual(samples[0].receivedAt, 1100);
    const health = reader.health();
    assert.strictEqual(health.droppedBytes, 5);
    assert.strictEqual(health.resyncs, 1);
  });

  it("keeps a partial frame when the gap check is disabled", () => {
    const time = fixedClock(0);
    const reader = new LinkReader({ clock: time.clock, frameGapMs: 0 });
    const frame = buildFrame();

    reader.feed(frame.subarray(0, 5));
    time.advance(10_000);
    reader.feed(frame.subarray(5));

    assert.strictEqual([...reader.poll()].length, 1);
    assert.strictEqual(reader.health().droppedBytes, 0);
  });

  it("invokes onSample for each decoded frame", () => {
    const seen: Sample[] = [];
    const reader = new LinkReader({ clock: () => 0, onSample: (s) => seen.push(s) });
    reader.feed(concat(buildFrame({ mode: 0 }), buildFrame({ mode: 2 })));

    const yielded = [...reader.poll()];

    assert.deepStrictEqual(seen.map((s) => s.mode), [0, 2]);
    assert.deepStrictEqual(yielded, seen);
  });

  it("consumes frames lazily", () => {
    const reader = new LinkReader({ clock: () => 0 });
    reader.feed(concat(buildFrame(), buildFrame()));

    for (const _sample of reader.poll()) {
      break;
    }
    assert.strictEqual(reader.bufferSize, 15);
    assert.strictEqual([...reader.poll()].length, 1);
    assert.strictEqual(reader.health().framesDecoded, 2);
  });

  it("refuses bytes after close", () => {
    const reader = new LinkReader();
    reader.feed(new Uint8Array([1, 2, 3]));
    reader.close();

    assert.strictEqual(reader.isClosed(), true);
    assert.strictEqual(reader.bufferSize, 0);
    assert.throws(
      () => reader.feed(new Uint8Array([1])),
      (err: unknown) => err instanceof LinkError && err.code === "Closed"
    );
  });

  it("returns a copy of the health counters", () => {
    const reader = new LinkReader();
    const health = reader.health();
    health.framesDecoded = 99;

    assert.strictEqual(reader.health().framesDecoded, 0);
  });
});
