/**
 * Device Discovery Interface
 * High-level modules depend on this, not on serialport
 */

export type LinkKind = "usb" | "bluetooth";

export interface DeviceInfo {
  path: string;
  vendorId?: string;
  productId?: string;
  manufacturer?: string;
  pnpId?: string;
}

export interface DiscoveryResult {
  found: boolean;
  device?: DeviceInfo;
  kind?: LinkKind;
  error?: string;
  method?: "env" | "vid_pid" | "bluetooth";
}

export interface DeviceDiscovery {
  /**
   * Find the experiment's serial link
   */
  findSerial(): Promise<DiscoveryResult>;

  /**
   * List all available serial ports
   */
  listSerialPorts(): Promise<DeviceInfo[]>;
}

// USB-serial bridges used on the microcontroller boards
export const USB_SERIAL_VENDOR_IDS = [
  "1a86", // WCH CH340
  "0403", // FTDI
  "10c4", // Silicon Labs CP210x
  "2341", // Arduino
  "067b", // Prolific
];

// HC-05 SPP shows up as rfcomm (Linux), tty.HC-05 (macOS) or a BTHENUM COM port (Windows)
const BLUETOOTH_PATTERN = /rfcomm|hc-?05|bluetooth|bthenum/i;

/**
 * Classify a port as a plausible link, or null
 */
export function linkKind(device: DeviceInfo): LinkKind | null {
  const vendorId = device.vendorId?.toLowerCase();
  if (vendorId && USB_SERIAL_VENDOR_IDS.includes(vendorId)) {
    return "usb";
  }
  const haystack = [device.path, device.manufacturer ?? "", device.pnpId ?? ""].join(" ");
  if (BLUETOOTH_PATTERN.test(haystack)) {
    return "bluetooth";
  }
  return null;
}
