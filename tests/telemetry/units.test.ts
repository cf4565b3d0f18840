/**
 * Unit Conversion Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  clamp,
  dutyPercent,
  percentToDuty,
  percentToValve,
  toChartSeries,
  valvePercent,
} from "../../src/telemetry/units";
import { makeSample } from "../helpers/frames";

describe("units", () => {
  it("clamps into a range", () => {
    assert.strictEqual(clamp(-1, 0, 10), 0);
    assert.strictEqual(clamp(11, 0, 10), 10);
    assert.strictEqual(clamp(5, 0, 10), 5);
  });

  it("converts raw duty and valve to percent", () => {
    assert.strictEqual(dutyPercent(1023), 100);
    assert.strictEqual(dutyPercent(0), 0);
    assert.strictEqual(valvePercent(420), 100);
    assert.strictEqual(valvePercent(210), 50);
  });

  it("converts percent back to raw with rounding and clamping", () => {
    assert.strictEqual(percentToDuty(50), 512);
    assert.strictEqual(percentToDuty(100), 1023);
    assert.strictEqual(percentToDuty(150), 1023);
    assert.strictEqual(percentToDuty(-5), 0);
    assert.strictEqual(percentToValve(100), 420);
    assert.strictEqual(percentToValve(25), 105);
  });

  it("builds a chart series relative to the first sample", () => {
    const points = toChartSeries([
      makeSample(1000, { heightSetpointMm: 250, heightMeasuredMm: 200, dutyRaw: 1023, valvePositionRaw: 210 }),
      makeSample(1500, { heightSetpointMm: 250, heightMeasuredMm: 240, dutyRaw: 0, valvePositionRaw: 420 }),
    ]);

    assert.deepStrictEqual(points, [
      { t: 0, heightSetpointMm: 250, heightMeasuredMm: 200, dutyPercent: 100, valvePercent: 50 },
      { t: 0.5, heightSetpointMm: 250, heightMeasuredMm: 240, dutyPercent: 0, valvePercent: 100 },
    ]);
  });

  it("returns an empty series for no samples", () => {
    assert.deepStrictEqual(toChartSeries([]), []);
  });
});
