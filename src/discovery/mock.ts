/**
 * Mock Device Discovery for Testing
 * Drop-in replacement for SerialDiscovery
 */

import type { DeviceDiscovery, DeviceInfo, DiscoveryResult } from "./interface";
import { linkKind } from "./interface";

export interface MockDevices {
  serial?: DeviceInfo | null;
  serialPorts?: DeviceInfo[];
}

export class MockDiscovery implements DeviceDiscovery {
  private devices: MockDevices;
  public findSerialCalls = 0;

  constructor(devices: MockDevices = {}) {
    this.devices = devices;
  }

  async findSerial(): Promise<DiscoveryResult> {
    this.findSerialCalls++;

    if (this.devices.serial === null) {
      return { found: false, error: "No USB-serial or Bluetooth SPP port found" };
    }

    if (this.devices.serial) {
      const kind = linkKind(this.devices.serial) ?? undefined;
      return {
        found: true,
        device: this.devices.serial,
        kind,
        method: kind === "bluetooth" ? "bluetooth" : "vid_pid",
      };
    }

    return { found: false, error: "No mock serial configured" };
  }

  async listSerialPorts(): Promise<DeviceInfo[]> {
    return this.devices.serialPorts || [];
  }

  // Helper to update mock state during test
  setDevices(devices: Partial<MockDevices>): void {
    this.devices = { ...this.devices, ...devices };
  }

  reset(): void {
    this.findSerialCalls = 0;
  }
}
