/**
 * Ball-in-Tube Frame Codec
 * Byte-exact telemetry decode and command encode
 *
 * RX frame (micro -> host), 15 bytes, big-endian:
 *   [0] mode, [1:3] height SP, [3:5] height, [5:7] ToF avg,
 *   [7:9] temperature x10, [9:11] valve SP, [11:13] valve pos, [13:15] duty
 *
 * TX frame (host -> micro), 7 bytes, big-endian:
 *   [0] mode, [1:3] height target, [3:5] duty target, [5:7] valve target
 */

import {
  LIMITS,
  Mode,
  PROTOCOL,
  type Command,
  type Sample,
} from "../state/types";
import { DecodeError, EncodePreconditionError } from "./errors";

export type DecodeResult =
  | { ok: true; sample: Sample }
  | { ok: false; error: DecodeError };

export type CommandFrameResult =
  | { ok: true; command: Command }
  | { ok: false; error: DecodeError };

/**
 * Read 16-bit big-endian value
 */
export function readU16BE(data: Uint8Array, offset: number): number {
  return (data[offset] << 8) | data[offset + 1];
}

/**
 * Write 16-bit big-endian value
 */
export function writeU16BE(data: Uint8Array, offset: number, value: number): void {
  data[offset] = (value >> 8) & 0xff;
  data[offset + 1] = value & 0xff;
}

export function isMode(value: number): value is Mode {
  return (
    value === Mode.Manual ||
    value === Mode.Fan ||
    value === Mode.Valve ||
    value === Mode.Reset
  );
}

/**
 * Render a tenths value with one decimal using integer arithmetic (235 -> "23.5")
 */
export function formatTenths(tenths: number): string {
  const sign = tenths < 0 ? "-" : "";
  const abs = Math.abs(Math.trunc(tenths));
  return `${sign}${Math.floor(abs / 10)}.${abs % 10}`;
}

/**
 * Decode one telemetry frame. A frame decodes fully or not at all.
 */
export function decodeFrame(frame: Uint8Array, receivedAt: number = Date.now()): DecodeResult {
  if (frame.length !== PROTOCOL.FRAME_LENGTH_RX) {
    return {
      ok: false,
      error: new DecodeError(
        "InvalidLength",
        `Expected ${PROTOCOL.FRAME_LENGTH_RX} bytes, got ${frame.length}`
      ),
    };
  }

  const mode = frame[0];
  if (!isMode(mode)) {
    return {
      ok: false,
      error: new DecodeError("InvalidMode", `Unknown mode byte 0x${mode.toString(16).padStart(2, "0")}`),
    };
  }

  const temperatureTenths = readU16BE(frame, 7);

  return {
    ok: true,
    sample: {
      mode,
      heightSetpointMm: readU16BE(frame, 1),
      heightMeasuredMm: readU16BE(frame, 3),
      tofAverageRaw: readU16BE(frame, 5),
      temperatureTenths,
      temperatureC: temperatureTenths / 10,
      valveSetpointRaw: readU16BE(frame, 9),
      valvePositionRaw: readU16BE(frame, 11),
      dutyRaw: readU16BE(frame, 13),
      receivedAt,
    },
  };
}

function assertField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new EncodePreconditionError(`${name} out of range [0, ${max}]: ${value}`);
  }
}

/**
 * Encode a command frame. No clamping here: the dispatcher clamps first.
 * @throws EncodePreconditionError if a field is outside its domain
 */
export function encodeCommand(cmd: Command): Uint8Array {
  if (!isMode(cmd.mode)) {
    throw new EncodePreconditionError(`Unknown mode: ${cmd.mode}`);
  }
  assertField("heightTargetMm", cmd.heightTargetMm, LIMITS.HEIGHT_MAX_MM);
  assertField("dutyTarget", cmd.dutyTarget, LIMITS.MAX_DUTY_RAW);
  assertField("valveTarget", cmd.valveTarget, LIMITS.MAX_VALVE_STEPS);

  const frame = new Uint8Array(PROTOCOL.FRAME_LENGTH_TX);
  frame[0] = cmd.mode;
  writeU16BE(frame, 1, cmd.heightTargetMm);
  writeU16BE(frame, 3, cmd.dutyTarget);
  writeU16BE(frame, 5, cmd.valveTarget);
  return frame;
}

/**
 * Parse a command frame back into fields (inverse of encodeCommand)
 */
export function parseCommandFrame(frame: Uint8Array): CommandFrameResult {
  if (frame.length !== PROTOCOL.FRAME_LENGTH_TX) {
    return {
      ok: false,
      error: new DecodeError(
        "InvalidLength",
        `Expected ${PROTOCOL.FRAME_LENGTH_TX} bytes, got ${frame.length}`
      ),
    };
  }

  const mode = frame[0];
  if (!isMode(mode)) {
    return {
      ok: false,
      error: new DecodeError("InvalidMode", `Unknown mode byte 0x${mode.toString(16).padStart(2, "0")}`),
    };
  }

  return {
    ok: true,
    command: {
      mode,
      heightTargetMm: readU16BE(frame, 1),
      dutyTarget: readU16BE(frame, 3),
      valveTarget: readU16BE(frame, 5),
    },
  };
}

/**
 * Hex dump for logs ("03 00 00 00 00 00 00")
 */
export function toHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}
