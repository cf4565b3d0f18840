/**
 * Ball-in-Tube Type Definitions
 */

// Protocol constants (fixed by the firmware, no negotiation)
export const PROTOCOL = {
  BAUD_RATE: 115200,
  FRAME_LENGTH_RX: 15, // micro -> host
  FRAME_LENGTH_TX: 7,  // host -> micro
  FRAME_GAP_MS: 40,
} as const;

// Engineering limits
export const LIMITS = {
  HEIGHT_MAX_MM: 500,
  MAX_DUTY_RAW: 1023,   // 10-bit PWM
  MAX_VALVE_STEPS: 420,
} as const;

export const RETENTION = {
  DEFAULT_SECONDS: 60,
  MIN_SECONDS: 5,
  MAX_SECONDS: 600,
} as const;

// Control regime reported by (and sent to) the firmware
export const Mode = {
  Manual: 0,
  Fan: 1,
  Valve: 2,
  Reset: 3,
} as const;

export type Mode = (typeof Mode)[keyof typeof Mode];

export type ModeName = "manual" | "fan" | "valve" | "reset";

export const MODE_NAMES: Record<Mode, ModeName> = {
  [Mode.Manual]: "manual",
  [Mode.Fan]: "fan",
  [Mode.Valve]: "valve",
  [Mode.Reset]: "reset",
};

// One decoded telemetry frame
export interface Sample {
  mode: Mode;
  heightSetpointMm: number;
  heightMeasuredMm: number;
  tofAverageRaw: number;
  temperatureTenths: number; // wire value, tenths of a degree
  temperatureC: number;
  valveSetpointRaw: number;
  valvePositionRaw: number;
  dutyRaw: number;
  receivedAt: number; // host epoch ms, not transmitted
}

// One outbound instruction
export interface Command {
  mode: Mode;
  heightTargetMm: number;
  dutyTarget: number;
  valveTarget: number;
}

// Link-health counters for one reader
export interface LinkHealth {
  framesDecoded: number;
  droppedBytes: number;
  garbledFrames: number;
  resyncs: number;
  lastSampleAt: number | null;
}

// Point for the chart consumer (the four plotted series)
export interface ChartPoint {
  t: number; // seconds since first point in view
  heightSetpointMm: number;
  heightMeasuredMm: number;
  dutyPercent: number;
  valvePercent: number;
}
