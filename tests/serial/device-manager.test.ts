/**
 * DeviceManager Tests
 */

import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { DeviceManager } from "../../src/serial/device-manager";
import { LinkError } from "../../src/serial/errors";
import { MockDiscovery } from "../../src/discovery";
import { MockConnection } from "../helpers/mock-connection";

describe("DeviceManager", () => {
  let connection: MockConnection;
  let discovery: MockDiscovery;
  let manager: DeviceManager;

  beforeEach(() => {
    connection = new MockConnection();
    discovery = new MockDiscovery({
      serial: { path: "/dev/ttyUSB0", vendorId: "1a86" },
      serialPorts: [
        { path: "/dev/ttyUSB0", vendorId: "1a86", productId: "7523", manufacturer: "QinHeng" },
        { path: "/dev/rfcomm0" },
        { path: "/dev/ttyS0" },
      ],
    });
    manager = new DeviceManager(connection, discovery);
  });

  it("lists ports with their link kind", async () => {
    const ports = await manager.listPorts();

    assert.deepStrictEqual(
      ports.map((p) => [p.path, p.kind]),
      [
        ["/dev/ttyUSB0", "usb"],
        ["/dev/rfcomm0", "bluetooth"],
        ["/dev/ttyS0", null],
      ]
    );
    assert.strictEqual(ports[0].manufacturer, "QinHeng");
  });

  it("discovers a port on first connect", async () => {
    assert.strictEqual(await manager.connect(), true);

    assert.strictEqual(discovery.findSerialCalls, 1);
    assert.deepStrictEqual(connection.calls, ["setPort:/dev/ttyUSB0", "connect"]);
    assert.deepStrictEqual(manager.getCurrentPort(), { port: "/dev/ttyUSB0", connected: true });
  });

  it("skips discovery when a port is already set", async () => {
    connection.port = "/dev/rfcomm0";

    await manager.connect();

    assert.strictEqual(discovery.findSerialCalls, 0);
    assert.deepStrictEqual(connection.calls, ["connect"]);
  });

  it("does nothing when already connected", async () => {
    connection.connected = true;

    assert.strictEqual(await manager.connect(), true);
    assert.deepStrictEqual(connection.calls, []);
  });

  it("returns false when nothing is found", async () => {
    discovery.setDevices({ serial: null });

    assert.strictEqual(await manager.connect(), false);
    assert.deepStrictEqual(connection.calls, []);
  });

  it("switches to a listed port", async () => {
    await manager.setPort("/dev/rfcomm0");

    assert.deepStrictEqual(connection.calls, ["disconnect", "setPort:/dev/rfcomm0", "connect"]);
  });

  it("rejects a port that is not listed", async () => {
    await assert.rejects(
      manager.setPort("/dev/ttyUSB7"),
      (err: unknown) =>
        err instanceof LinkError && err.code === "Open" && err.message === "Port /dev/ttyUSB7 not found"
    );
    assert.deepStrictEqual(connection.calls, []);
  });

  it("reconnects through disconnect then connect", async () => {
    await manager.reconnect();
    await manager.disconnect();

    assert.deepStrictEqual(connection.calls, ["disconnect", "connect", "disconnect"]);
  });
});
