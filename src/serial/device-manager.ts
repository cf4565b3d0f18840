/**
 * Device Manager
 * Operator-driven port selection, connect and reconnect
 *
 * The link core never retries on its own; every reconnect goes through here.
 */

import type { DeviceDiscovery, LinkKind } from "../discovery";
import { linkKind } from "../discovery";
import { LinkError } from "./errors";

/**
 * Serial port information
 */
export interface PortInfo {
  path: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
  kind: LinkKind | null;
}

/**
 * Current port status
 */
export interface PortStatus {
  port: string;
  connected: boolean;
}

/**
 * The part of TubeConnection the manager drives
 */
export interface ManagedConnection {
  isConnected(): boolean;
  getPort(): string;
  setPort(port: string): void;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

/**
 * DeviceManager - handles device discovery and switching
 *
 * Usage:
 * ```typescript
 * const manager = new DeviceManager(connection, createDiscovery());
 *
 * const ports = await manager.listPorts();
 * await manager.setPort('/dev/rfcomm0');
 * await manager.reconnect();
 * ```
 */
export class DeviceManager {
  private connection: ManagedConnection;
  private discovery: DeviceDiscovery;

  constructor(connection: ManagedConnection, discovery: DeviceDiscovery) {
    this.connection = connection;
    this.discovery = discovery;
  }

  /**
   * List all available serial ports, flagging likely links
   */
  async listPorts(): Promise<PortInfo[]> {
    const ports = await this.discovery.listSerialPorts();
    return ports.map((p) => ({
      path: p.path,
      manufacturer: p.manufacturer,
      vendorId: p.vendorId,
      productId: p.productId,
      kind: linkKind(p),
    }));
  }

  /**
   * Get current port and connection status
   */
  getCurrentPort(): PortStatus {
    return {
      port: this.connection.getPort(),
      connected: this.connection.isConnected(),
    };
  }

  /**
   * Switch to a different serial port and connect
   * @throws LinkError("Open") if the port doesn't exist
   */
  async setPort(port: string): Promise<void> {
    const ports = await this.listPorts();
    if (!ports.find((p) => p.path === port)) {
      throw new LinkError("Open", `Port ${port} not found`);
    }

    await this.connection.disconnect();
    this.connection.setPort(port);
    await this.connection.connect();
  }

  /**
   * Close and reopen the current port (fresh reader and window)
   */
  async reconnect(): Promise<void> {
    await this.connection.disconnect();
    await this.connection.connect();
  }

  /**
   * Connect if not already connected, discovering the port when none is set
   * @returns false when no port could be found
   */
  async connect(): Promise<boolean> {
    if (this.connection.isConnected()) {
      return true;
    }

    if (!this.connection.getPort()) {
      const result = await this.discovery.findSerial();
      if (!result.found || !result.device) {
        return false;
      }
      this.connection.setPort(result.device.path);
    }

    await this.connection.connect();
    return true;
  }

  async disconnect(): Promise<void> {
    await this.connection.disconnect();
  }
}
