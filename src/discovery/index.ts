/**
 * Device Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./serial";
export * from "./mock";

import type { DeviceDiscovery } from "./interface";
import { SerialDiscovery } from "./serial";

/**
 * Create default discovery instance
 */
export function createDiscovery(options?: { serialPort?: string }): DeviceDiscovery {
  return new SerialDiscovery(options);
}
