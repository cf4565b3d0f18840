/**
 * Raw firmware units <-> display units
 */

import { LIMITS, type ChartPoint, type Sample } from "../state/types";

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

export function dutyPercent(raw: number): number {
  return (raw / LIMITS.MAX_DUTY_RAW) * 100;
}

export function valvePercent(raw: number): number {
  return (raw / LIMITS.MAX_VALVE_STEPS) * 100;
}

/**
 * Percent (clamped to 0..100) -> raw duty
 */
export function percentToDuty(percent: number): number {
  return Math.round((clamp(percent, 0, 100) * LIMITS.MAX_DUTY_RAW) / 100);
}

/**
 * Percent (clamped to 0..100) -> valve steps
 */
export function percentToValve(percent: number): number {
  return Math.round((clamp(percent, 0, 100) * LIMITS.MAX_VALVE_STEPS) / 100);
}

/**
 * Chart point with time relative to `t0` (epoch ms of first point in view)
 */
export function toChartPoint(sample: Sample, t0: number): ChartPoint {
  return {
    t: (sample.receivedAt - t0) / 1000,
    heightSetpointMm: sample.heightSetpointMm,
    heightMeasuredMm: sample.heightMeasuredMm,
    dutyPercent: dutyPercent(sample.dutyRaw),
    valvePercent: valvePercent(sample.valvePositionRaw),
  };
}

export function toChartSeries(samples: readonly Sample[]): ChartPoint[] {
  if (samples.length === 0) return [];
  const t0 = samples[0].receivedAt;
  return samples.map((s) => toChartPoint(s, t0));
}
