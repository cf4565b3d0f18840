/**
 * Port Routes - device selection, connect and disconnect
 */

import { asRecord, errorResult, fail, ok, type RouteResult } from "../helpers";
import type { DeviceManager } from "../../serial/device-manager";

export interface PortDependencies {
  deviceManager: DeviceManager;
}

export function createPortRoutes(deps: PortDependencies) {
  const { deviceManager } = deps;

  return {
    /**
     * GET /api/ports
     */
    async list(): Promise<RouteResult> {
      try {
        return ok({ ports: await deviceManager.listPorts() });
      } catch (err) {
        return errorResult(err);
      }
    },

    /**
     * GET /api/port
     */
    current(): RouteResult {
      return ok(deviceManager.getCurrentPort());
    },

    /**
     * POST /api/port
     * Body: { port }
     */
    async setPort(body: unknown): Promise<RouteResult> {
      const record = asRecord(body);
      const port = record?.port;
      if (typeof port !== "string" || !port) {
        return fail(400, "port required", "InvalidBody");
      }

      try {
        await deviceManager.setPort(port);
        return ok({ status: "ok", ...deviceManager.getCurrentPort() });
      } catch (err) {
        return errorResult(err);
      }
    },

    /**
     * POST /api/connect
     */
    async connect(): Promise<RouteResult> {
      try {
        const connected = await deviceManager.connect();
        if (!connected) {
          return fail(404, "No serial port found");
        }
        return ok({ status: "ok", ...deviceManager.getCurrentPort() });
      } catch (err) {
        return errorResult(err);
      }
    },

    /**
     * POST /api/reconnect
     */
    async reconnect(): Promise<RouteResult> {
      try {
        await deviceManager.reconnect();
        return ok({ status: "ok", ...deviceManager.getCurrentPort() });
      } catch (err) {
        return errorResult(err);
      }
    },

    /**
     * POST /api/disconnect
     */
    async disconnect(): Promise<RouteResult> {
      await deviceManager.disconnect();
      return ok({ status: "ok", ...deviceManager.getCurrentPort() });
    },
  };
}
