/**
 * Health Routes - connection status and link health
 */

import { ok, type RouteResult } from "../helpers";
import type { HealthChecker, HealthSource } from "../../health/checker";

export interface HealthDependencies {
  connection: HealthSource;
  checker: HealthChecker;
  getClientCount: () => number;
}

/**
 * Create health route handlers
 * @param deps Dependencies injected
 */
export function createHealthRoute(deps: HealthDependencies) {
  return {
    /**
     * GET /api/health
     * Connection status, link-health counters and client count
     */
    get(): RouteResult {
      return ok({
        connected: deps.connection.isConnected(),
        port: deps.connection.getPort(),
        clients: deps.getClientCount(),
        link: deps.connection.health(),
      });
    },

    /**
     * GET /api/health/report
     */
    async report(): Promise<RouteResult> {
      const report = await deps.checker.check();
      return { status: report.status === "unhealthy" ? 503 : 200, body: report };
    },
  };
}
