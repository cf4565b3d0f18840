/**
 * Command Routes - operator setpoints and reset
 */

import { asRecord, errorResult, fail, inputField, ok, type RouteResult } from "../helpers";
import type { CommandDispatcher, SubmitResult } from "../../commands/dispatcher";
import { toHex } from "../../serial/frame-codec";
import { createLogger } from "../../logger";

const log = createLogger("command");

export interface CommandSink {
  send(frame: Uint8Array): Promise<void>;
}

export interface CommandDependencies {
  connection: CommandSink;
  dispatcher: CommandDispatcher;
}

export function createCommandRoutes(deps: CommandDependencies) {
  async function dispatch(result: SubmitResult): Promise<RouteResult> {
    if (!result.ok) {
      return fail(400, result.error.message, result.error.code);
    }

    try {
      await deps.connection.send(result.frame);
    } catch (err) {
      return errorResult(err);
    }

    const frame = toHex(result.frame);
    log.info(`Sent: ${frame}`);
    return ok({ ok: true, command: result.command, frame });
  }

  return {
    /**
     * POST /api/command
     * Body: { mode, height, duty, valve, unit?: "raw" | "percent" }
     * Absent numeric fields default to 0; present ones must be a number or
     * numeric string. Out-of-range values are clamped.
     */
    async post(body: unknown): Promise<RouteResult> {
      const record = asRecord(body);
      if (!record) {
        return fail(400, "JSON object required", "InvalidBody");
      }

      const mode = inputField(record, "mode");
      if (mode === undefined) {
        return fail(400, "mode required", "InvalidMode");
      }

      const unit = record.unit ?? "raw";
      if (unit !== "raw" && unit !== "percent") {
        return fail(400, `Invalid unit: ${String(unit)}`, "InvalidBody");
      }

      const values: Array<number | string> = [];
      for (const key of ["height", "duty", "valve"]) {
        if (!(key in record)) {
          values.push(0);
          continue;
        }
        const value = inputField(record, key);
        if (value === undefined) {
          return fail(400, `Invalid ${key}: ${JSON.stringify(record[key])}`, "InvalidNumber");
        }
        values.push(value);
      }
      const [height, duty, valve] = values;

      const result = unit === "percent"
        ? deps.dispatcher.submitPercent(mode, height, duty, valve)
        : deps.dispatcher.submit(mode, height, duty, valve);
      return dispatch(result);
    },

    /**
     * POST /api/reset
     * mode=Reset with every target zeroed
     */
    async reset(): Promise<RouteResult> {
      const { command, frame } = deps.dispatcher.reset();
      return dispatch({ ok: true, command, frame });
    },
  };
}
