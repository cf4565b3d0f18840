/**
 * Configuration from environment variables
 * CLI flags in index.ts override these
 */

import { PROTOCOL, RETENTION } from "./state/types";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
  return level ?? "info";
}

export const config = {
  /**
   * HTTP/WebSocket server port
   * @env TUBE_HTTP_PORT
   * @default 8080
   */
  HTTP_PORT: getEnvNumber("TUBE_HTTP_PORT", 8080),

  /**
   * Serial port path (auto-detect if empty)
   * @env TUBE_SERIAL_PORT
   * @default "" (auto-detect)
   */
  SERIAL_PORT: getEnvString("TUBE_SERIAL_PORT", ""),

  /**
   * Serial baud rate (the firmware is fixed at 115200)
   * @env TUBE_BAUD_RATE
   */
  BAUD_RATE: getEnvNumber("TUBE_BAUD_RATE", PROTOCOL.BAUD_RATE),

  /**
   * Initial sample retention window in seconds (5..600)
   * @env TUBE_RETENTION_SECONDS
   * @default 60
   */
  RETENTION_SECONDS: getEnvNumber("TUBE_RETENTION_SECONDS", RETENTION.DEFAULT_SECONDS),

  /**
   * Gap after which a partial frame is dropped, 0 disables
   * @env TUBE_FRAME_GAP_MS
   * @default 40
   */
  FRAME_GAP_MS: getEnvNumber("TUBE_FRAME_GAP_MS", PROTOCOL.FRAME_GAP_MS),

  /**
   * Push every decoded sample to WebSocket clients
   * @env TUBE_BROADCAST_SAMPLES
   * @default true
   */
  BROADCAST_SAMPLES: getEnvBoolean("TUBE_BROADCAST_SAMPLES", true),

  /**
   * Log level: debug, info, warn, error
   * @env TUBE_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: parseLogLevel(getEnvString("TUBE_LOG_LEVEL", "info")),
};

/**
 * Print current configuration
 */
export function printConfig(): void {
  console.log("Ball-in-Tube Server Configuration:");
  console.log(`  HTTP Port:      ${config.HTTP_PORT}`);
  console.log(`  Serial Port:    ${config.SERIAL_PORT || "(auto-detect)"}`);
  console.log(`  Baud Rate:      ${config.BAUD_RATE}`);
  console.log(`  Retention:      ${config.RETENTION_SECONDS}s`);
  console.log(`  Frame Gap:      ${config.FRAME_GAP_MS || "(disabled)"}${config.FRAME_GAP_MS ? "ms" : ""}`);
  console.log(`  Broadcast:      ${config.BROADCAST_SAMPLES}`);
  console.log(`  Log Level:      ${config.LOG_LEVEL}`);
}
