/**
 * Link Reader
 * Turns the raw serial byte stream into decoded samples
 *
 * The 15-byte telemetry frame has no start marker, so framing is positional.
 * Resync anchors on mode-byte plausibility: on an unknown mode byte exactly one
 * leading byte is dropped and decode is retried on the shifted window. After a
 * full frame length of failed offsets in one poll the buffer is discarded.
 *
 * Limitation: a misaligned window whose first byte happens to be 0..3 decodes
 * as a (wrong) sample. Positional framing cannot tell these apart.
 */

import { PROTOCOL, type LinkHealth, type Sample } from "../state/types";
import { decodeFrame } from "./frame-codec";
import { LinkError } from "./errors";

export type SampleCallback = (sample: Sample) => void;

export interface LinkReaderOptions {
  onSample?: SampleCallback;
  clock?: () => number;   // epoch ms (default: Date.now)
  frameGapMs?: number;    // stale partial-frame gap, 0 disables (default: 40)
}

const FRAME_LENGTH = PROTOCOL.FRAME_LENGTH_RX;

export class LinkReader {
  private buffer: number[] = [];
  private head = 0;
  private lastFeedAt: number | null = null;
  private lastStamp = Number.NEGATIVE_INFINITY;
  private pendingResync = false;
  private closed = false;
  private counters: LinkHealth = {
    framesDecoded: 0,
    droppedBytes: 0,
    garbledFrames: 0,
    resyncs: 0,
    lastSampleAt: null,
  };
  private readonly onSample: SampleCallback | null;
  private readonly clock: () => number;
  private readonly frameGapMs: number;

  constructor(options: LinkReaderOptions = {}) {
    this.onSample = options.onSample ?? null;
    this.clock = options.clock ?? Date.now;
    this.frameGapMs = options.frameGapMs ?? PROTOCOL.FRAME_GAP_MS;
  }

  /**
   * Feed raw bytes from the serial port
   * @throws LinkError if the reader was closed
   */
  feed(data: Uint8Array): void {
    if (this.closed) {
      throw new LinkError("Closed", "Link reader is closed");
    }

    if (this.head > 0) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }

    const now = this.clock();
    if (
      this.frameGapMs > 0 &&
      this.lastFeedAt !== null &&
      now - this.lastFeedAt > this.frameGapMs &&
      this.buffer.length > 0 &&
      this.buffer.length < FRAME_LENGTH
    ) {
      // Partial frame went stale: the rest of it was lost on the link
      this.counters.droppedBytes += this.buffer.length;
      this.buffer = [];
      this.pendingResync = true;
    }
    this.lastFeedAt = now;

    for (const byte of data) {
      this.buffer.push(byte);
    }
  }

  /**
   * Decode every complete frame currently buffered.
   * Lazy: bytes are consumed only as the caller iterates.
   */
  *poll(): Generator<Sample, void, undefined> {
    let failures = 0;

    while (!this.closed && this.buffer.length - this.head >= FRAME_LENGTH) {
      const frame = Uint8Array.from(this.buffer.slice(this.head, this.head + FRAME_LENGTH));
      const stamp = Math.max(this.clock(), this.lastStamp + 1);
      const result = decodeFrame(frame, stamp);

      if (result.ok) {
        this.head += FRAME_LENGTH;
        this.lastStamp = stamp;
        failures = 0;
        if (this.pendingResync) {
          this.counters.resyncs++;
          this.pendingResync = false;
        }
        this.counters.framesDecoded++;
        this.counters.lastSampleAt = stamp;
        this.onSample?.(result.sample);
        yield result.sample;
        continue;
      }

      // Only InvalidMode is possible here: the slice is always full length
      this.head += 1;
      this.counters.droppedBytes++;
      this.pendingResync = true;
      failures++;

      if (failures >= FRAME_LENGTH) {
        this.counters.droppedBytes += this.buffer.length - this.head;
        this.counters.garbledFrames++;
        this.buffer = [];
        this.head = 0;
        return;
      }
    }
  }

  /**
   * Stop the reader. Buffered bytes are discarded; a closed reader is not reused.
   */
  close(): void {
    this.closed = true;
    this.buffer = [];
    this.head = 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Link-health counters (copy)
   */
  health(): LinkHealth {
    return { ...this.counters };
  }

  /**
   * Bytes waiting for a complete frame
   */
  get bufferSize(): number {
    return this.buffer.length - this.head;
  }
}
