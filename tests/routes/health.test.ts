/**
 * Health Routes Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { createHealthRoute } from "../../src/server/routes/health";
import { HealthChecker, type HealthSource } from "../../src/health/checker";
import { MockDiscovery } from "../../src/discovery";
import type { LinkHealth } from "../../src/state/types";

const LINK: LinkHealth = {
  framesDecoded: 42,
  droppedBytes: 0,
  garbledFrames: 0,
  resyncs: 0,
  lastSampleAt: 5000,
};

function source(connected: boolean): HealthSource {
  return {
    isConnected: () => connected,
    getPort: () => (connected ? "/dev/rfcomm0" : ""),
    getConnectedAt: () => (connected ? 4000 : null),
    health: () => ({ ...LINK }),
  };
}

function routesFor(connected: boolean) {
  const connection = source(connected);
  const checker = new HealthChecker(new MockDiscovery({ serial: null }), connection, {
    clock: () => 5010,
  });
  return createHealthRoute({ connection, checker, getClientCount: () => 2 });
}

describe("Health Routes", () => {
  it("reports link status and counters", () => {
    const result = routesFor(true).get();

    assert.strictEqual(result.status, 200);
    assert.deepStrictEqual(result.body, {
      connected: true,
      port: "/dev/rfcomm0",
      clients: 2,
      link: LINK,
    });
  });

  it("returns 200 for a healthy report", async () => {
    const result = await routesFor(true).report();

    assert.strictEqual(result.status, 200);
  });

  it("returns 503 for an unhealthy report", async () => {
    const result = await routesFor(false).report();

    assert.strictEqual(result.status, 503);
  });
});
