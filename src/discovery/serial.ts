/**
 * Serial Device Discovery
 * USB-serial bridges first, then Bluetooth SPP ports
 */

import { SerialPort } from "serialport";
import type { DeviceDiscovery, DeviceInfo, DiscoveryResult } from "./interface";
import { linkKind } from "./interface";

export type ListPortsFn = () => Promise<DeviceInfo[]>;

/**
 * Port listing through the serialport library
 */
export async function listSystemPorts(): Promise<DeviceInfo[]> {
  const ports = await SerialPort.list();
  return ports.map((p) => ({
    path: p.path,
    vendorId: p.vendorId,
    productId: p.productId,
    manufacturer: p.manufacturer,
    pnpId: p.pnpId,
  }));
}

export class SerialDiscovery implements DeviceDiscovery {
  private envSerialPort?: string;
  private listPortsFn: ListPortsFn;

  constructor(options?: { serialPort?: string; listPorts?: ListPortsFn }) {
    this.envSerialPort = options?.serialPort || process.env.TUBE_SERIAL_PORT;
    this.listPortsFn = options?.listPorts ?? listSystemPorts;
  }

  async findSerial(): Promise<DiscoveryResult> {
    // 1. Explicit port wins
    if (this.envSerialPort) {
      return {
        found: true,
        device: { path: this.envSerialPort },
        method: "env",
      };
    }

    const ports = await this.listSerialPorts();

    // 2. USB-serial bridge by VID
    const usb = ports.find((p) => linkKind(p) === "usb");
    if (usb) {
      return { found: true, device: usb, kind: "usb", method: "vid_pid" };
    }

    // 3. Bluetooth SPP virtual port
    const bluetooth = ports.find((p) => linkKind(p) === "bluetooth");
    if (bluetooth) {
      return { found: true, device: bluetooth, kind: "bluetooth", method: "bluetooth" };
    }

    return {
      found: false,
      error: "No USB-serial or Bluetooth SPP port found",
    };
  }

  async listSerialPorts(): Promise<DeviceInfo[]> {
    return this.listPortsFn();
  }
}
