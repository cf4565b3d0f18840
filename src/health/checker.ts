/**
 * Health Checker
 * Link status with actionable suggestions
 */

import type { DeviceDiscovery } from "../discovery";
import { PROTOCOL, type LinkHealth } from "../state/types";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface CheckResult {
  ok: boolean;
  status: HealthStatus;
  message: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  checks: {
    serial: CheckResult;
    telemetry: CheckResult;
    integrity: CheckResult;
  };
  suggestions: string[];
}

/**
 * What the checker reads from the connection
 */
export interface HealthSource {
  isConnected(): boolean;
  getPort(): string;
  getConnectedAt(): number | null;
  health(): LinkHealth;
}

export interface HealthCheckerOptions {
  staleAfterMs?: number;    // no sample for this long = degraded (default: 1000)
  maxLossRatio?: number;    // dropped bytes / total bytes (default: 0.05)
  clock?: () => number;
}

export class HealthChecker {
  private readonly staleAfterMs: number;
  private readonly maxLossRatio: number;
  private readonly clock: () => number;

  constructor(
    private discovery: DeviceDiscovery,
    private source: HealthSource,
    options: HealthCheckerOptions = {}
  ) {
    this.staleAfterMs = options.staleAfterMs ?? 1000;
    this.maxLossRatio = options.maxLossRatio ?? 0.05;
    this.clock = options.clock ?? Date.now;
  }

  async check(): Promise<HealthReport> {
    const serial = await this.checkSerial();
    const telemetry = this.checkTelemetry();
    const integrity = this.checkIntegrity();

    const checks = { serial, telemetry, integrity };
    const suggestions = this.generateSuggestions(checks);

    const allOk = Object.values(checks).every((c) => c.ok);
    const anyFailed = Object.values(checks).some(
      (c) => c.status === "unhealthy"
    );

    return {
      status: allOk ? "healthy" : anyFailed ? "unhealthy" : "degraded",
      timestamp: new Date(this.clock()).toISOString(),
      checks,
      suggestions,
    };
  }

  private async checkSerial(): Promise<CheckResult> {
    if (this.source.isConnected()) {
      return {
        ok: true,
        status: "healthy",
        message: `Connected to ${this.source.getPort()}`,
        details: { path: this.source.getPort() },
      };
    }

    const result = await this.discovery.findSerial();
    return {
      ok: false,
      status: "unhealthy",
      message: result.found
        ? `Not connected (candidate port ${result.device?.path})`
        : result.error || "No serial port found",
      details: {
        candidate: result.device?.path,
        availablePorts: (await this.discovery.listSerialPorts()).map((p) => p.path),
      },
    };
  }

  private checkTelemetry(): CheckResult {
    const connectedAt = this.source.getConnectedAt();
    if (connectedAt === null) {
      return { ok: false, status: "unhealthy", message: "No link" };
    }

    const { lastSampleAt } = this.source.health();
    const now = this.clock();
    const since = lastSampleAt ?? connectedAt;
    const ageMs = now - since;

    if (ageMs <= this.staleAfterMs) {
      return {
        ok: true,
        status: "healthy",
        message: "Receiving telemetry",
        details: { ageMs },
      };
    }

    return {
      ok: false,
      status: "degraded",
      message: lastSampleAt === null
        ? `No frame decoded ${ageMs}ms after connect`
        : `Last frame ${ageMs}ms ago`,
      details: { ageMs },
    };
  }

  private checkIntegrity(): CheckResult {
    const health = this.source.health();
    const goodBytes = health.framesDecoded * PROTOCOL.FRAME_LENGTH_RX;
    const total = goodBytes + health.droppedBytes;
    const lossRatio = total === 0 ? 0 : health.droppedBytes / total;
    const details = { ...health, lossRatio };

    if (lossRatio <= this.maxLossRatio && health.garbledFrames === 0) {
      return { ok: true, status: "healthy", message: "Framing clean", details };
    }

    return {
      ok: false,
      status: "degraded",
      message: `Link degraded: ${health.droppedBytes} bytes dropped, ${health.garbledFrames} garbled`,
      details,
    };
  }

  private generateSuggestions(checks: HealthReport["checks"]): string[] {
    const suggestions: string[] = [];

    if (!checks.serial.ok) {
      suggestions.push("Connect the board via USB or pair the HC-05 module");
      suggestions.push("Check: ls -la /dev/ttyUSB* /dev/ttyACM* /dev/rfcomm*");
      suggestions.push("Add user to dialout group: sudo usermod -aG dialout $USER");
    }

    if (checks.serial.ok && !checks.telemetry.ok) {
      suggestions.push("Check the firmware is running and transmitting");
      suggestions.push(`Check the baud rate matches the firmware (${PROTOCOL.BAUD_RATE})`);
    }

    if (!checks.integrity.ok) {
      suggestions.push("Check cabling or Bluetooth signal; bytes are being lost");
    }

    return suggestions;
  }
}
