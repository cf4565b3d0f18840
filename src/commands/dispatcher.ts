/**
 * Command Dispatcher
 * Validates operator input, clamps it to engineering limits and encodes it.
 * Writing the frame to the link is the caller's job.
 */

import { LIMITS, Mode, MODE_NAMES, type Command } from "../state/types";
import { encodeCommand, isMode } from "../serial/frame-codec";
import { ValidationError } from "../serial/errors";
import { clamp, percentToDuty, percentToValve } from "../telemetry/units";

export type ModeInput = number | string;
export type NumberInput = number | string;

export type SubmitResult =
  | { ok: true; command: Command; frame: Uint8Array }
  | { ok: false; error: ValidationError };

const MODE_BY_NAME = new Map<string, Mode>(
  Object.values(Mode).map((mode) => [MODE_NAMES[mode], mode])
);

/**
 * Map mode input (0..3, "2", "valve", "Fan") to a Mode
 */
export function parseMode(input: ModeInput): Mode | null {
  if (typeof input === "number") {
    return isMode(input) ? input : null;
  }

  const text = input.trim().toLowerCase();
  const byName = MODE_BY_NAME.get(text);
  if (byName !== undefined) return byName;

  if (/^\d+$/.test(text)) {
    const value = Number(text);
    return isMode(value) ? value : null;
  }
  return null;
}

function parseNumber(input: NumberInput): number {
  if (typeof input === "number") return input;
  const text = input.trim();
  return text === "" ? Number.NaN : Number(text);
}

export class CommandDispatcher {
  /**
   * Validate and clamp raw-unit input, then encode.
   * Range violations are clamped, never rejected.
   */
  submit(
    modeInput: ModeInput,
    heightInput: NumberInput,
    dutyInput: NumberInput,
    valveInput: NumberInput
  ): SubmitResult {
    const mode = parseMode(modeInput);
    if (mode === null) {
      return {
        ok: false,
        error: new ValidationError("InvalidMode", `Invalid mode: ${String(modeInput)}`),
      };
    }

    const fields = [
      ["height", heightInput, LIMITS.HEIGHT_MAX_MM],
      ["duty", dutyInput, LIMITS.MAX_DUTY_RAW],
      ["valve", valveInput, LIMITS.MAX_VALVE_STEPS],
    ] as const;

    const values: number[] = [];
    for (const [name, input, max] of fields) {
      const value = parseNumber(input);
      if (Number.isNaN(value)) {
        return {
          ok: false,
          error: new ValidationError("InvalidNumber", `Invalid ${name}: ${String(input)}`),
        };
      }
      values.push(clamp(Math.round(value), 0, max));
    }

    const command: Command = {
      mode,
      heightTargetMm: values[0],
      dutyTarget: values[1],
      valveTarget: values[2],
    };

    return { ok: true, command, frame: encodeCommand(command) };
  }

  /**
   * Same as submit(), with duty and valve entered as 0..100 %
   */
  submitPercent(
    modeInput: ModeInput,
    heightInput: NumberInput,
    dutyPercentInput: NumberInput,
    valvePercentInput: NumberInput
  ): SubmitResult {
    const duty = parseNumber(dutyPercentInput);
    const valve = parseNumber(valvePercentInput);

    return this.submit(
      modeInput,
      heightInput,
      Number.isNaN(duty) ? dutyPercentInput : percentToDuty(duty),
      Number.isNaN(valve) ? valvePercentInput : percentToValve(valve)
    );
  }

  /**
   * Reset command: mode=Reset, every target zeroed
   */
  reset(): { command: Command; frame: Uint8Array } {
    const command: Command = {
      mode: Mode.Reset,
      heightTargetMm: 0,
      dutyTarget: 0,
      valveTarget: 0,
    };
    return { command, frame: encodeCommand(command) };
  }
}
