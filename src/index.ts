/**
 * Ball-in-Tube Link Server - Entry Point
 * Serial telemetry/command bridge for the ball-in-tube experiment
 */

import { parseArgs } from "util";
import { TubeConnection } from "./serial/connection";
import { DeviceManager } from "./serial/device-manager";
import { CommandDispatcher } from "./commands/dispatcher";
import { HealthChecker } from "./health/checker";
import { TubeServer } from "./server/http";
import { createDiscovery, linkKind } from "./discovery";
import { formatTenths } from "./serial/frame-codec";
import { MODE_NAMES } from "./state/types";
import { config, printConfig } from "./config";
import { createLogger } from "./logger";

const log = createLogger("main");

// Parse CLI arguments (override ENV defaults)
const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    port: { type: "string", short: "p", default: config.SERIAL_PORT },
    http: { type: "string", short: "h", default: String(config.HTTP_PORT) },
    retention: { type: "string", short: "r", default: String(config.RETENTION_SECONDS) },
    list: { type: "boolean", short: "l", default: false },
    help: { type: "boolean", default: false },
  },
});

// Help
if (values.help) {
  console.log(`
Ball-in-Tube Link Server

Usage:
  npx tsx src/index.ts [options]

Options:
  -p, --port <path>        Serial port (auto-detect if not specified)
  -h, --http <port>        HTTP server port (default: ${config.HTTP_PORT})
  -r, --retention <secs>   Sample retention window, 5-600 (default: ${config.RETENTION_SECONDS})
  -l, --list               List available serial ports
  --help                   Show this help

Environment Variables (overridden by CLI args):
  TUBE_HTTP_PORT          HTTP server port (default: 8080)
  TUBE_SERIAL_PORT        Serial port (auto-detect if empty)
  TUBE_BAUD_RATE          Serial baud rate (default: 115200)
  TUBE_RETENTION_SECONDS  Sample retention window (default: 60)
  TUBE_FRAME_GAP_MS       Drop stale partial frames after this gap (default: 40, 0 disables)
  TUBE_BROADCAST_SAMPLES  Push samples to WebSocket clients (default: true)
  TUBE_LOG_LEVEL          Log level: debug, info, warn, error (default: info)

Examples:
  npx tsx src/index.ts                         # Auto-detect, HTTP:8080
  npx tsx src/index.ts -p /dev/rfcomm0         # HC-05 over Bluetooth
  npx tsx src/index.ts -p COM5 -r 120          # Windows, 2 minute window
`);
  process.exit(0);
}

const discovery = createDiscovery({ serialPort: values.port || undefined });

// List ports
if (values.list) {
  console.log("Available serial ports:");
  const ports = await discovery.listSerialPorts();
  for (const port of ports) {
    const kind = linkKind(port);
    console.log(`  ${port.path}${kind ? ` [${kind}]` : ""}`);
    if (port.manufacturer) console.log(`    Manufacturer: ${port.manufacturer}`);
    if (port.vendorId) console.log(`    VID:PID: ${port.vendorId}:${port.productId}`);
  }
  process.exit(0);
}

const httpPort = parseInt(values.http || String(config.HTTP_PORT), 10);
const retention = parseInt(values.retention || String(config.RETENTION_SECONDS), 10);

printConfig();

let server: TubeServer | null = null;
let sampleCount = 0;

const connection = new TubeConnection({
  port: values.port || "",
  baudRate: config.BAUD_RATE,
  retentionSeconds: Number.isNaN(retention) ? config.RETENTION_SECONDS : retention,
  frameGapMs: config.FRAME_GAP_MS,
  findPort: async () => (await discovery.findSerial()).device?.path ?? null,
  onSample: (sample) => {
    sampleCount++;
    // Periodic one-line summary at debug level (~every 10 s at 40 ms cadence)
    if (sampleCount % 250 === 0) {
      log.debug(
        `#${sampleCount} mode=${MODE_NAMES[sample.mode]} h=${sample.heightMeasuredMm}/${sample.heightSetpointMm}mm ` +
        `T=${formatTenths(sample.temperatureTenths)}C duty=${sample.dutyRaw} valve=${sample.valvePositionRaw}`
      );
    }
    if (config.BROADCAST_SAMPLES) {
      server?.broadcastSample(sample);
    }
  },
  onConnect: () => {
    server?.broadcastLink(true, connection.getPort());
  },
  onDisconnect: () => {
    server?.broadcastLink(false, connection.getPort());
  },
  onError: (err) => {
    // Fatal to this link; reconnecting is the operator's call (POST /api/connect)
    log.error(`Link error (${err.code}): ${err.message}`);
  },
});

const deviceManager = new DeviceManager(connection, discovery);
const checker = new HealthChecker(discovery, connection);
const dispatcher = new CommandDispatcher();

server = new TubeServer({
  port: httpPort,
  connection,
  dispatcher,
  deviceManager,
  checker,
});

// Start server (even if the board is not connected yet)
server.start();

try {
  if (!(await deviceManager.connect())) {
    log.warn("No serial port found; connect later with POST /api/connect");
  }
} catch (err) {
  log.warn(`Initial connect failed: ${err instanceof Error ? err.message : String(err)}`);
}

console.log(`
Ball-in-Tube Link Server started!

  Serial:    ${connection.getPort() || "(not connected)"}
  HTTP:      http://localhost:${httpPort}
  WebSocket: ws://localhost:${httpPort}/ws

API:
  GET  /api/health          - Connection status and link health
  GET  /api/health/report   - Health report with suggestions
  GET  /api/samples         - Sample window (?since=<epoch ms>)
  GET  /api/samples/latest  - Newest sample
  GET  /api/samples/chart   - Chart series (height SP, height, duty %, valve %)
  GET  /api/retention       - Retention window
  POST /api/retention       - Set retention {"seconds":120}
  POST /api/command         - Send command {"mode":"fan","height":250,"duty":0,"valve":0}
  POST /api/reset           - Send reset
  GET  /api/ports           - List serial ports
  POST /api/port            - Switch port {"port":"/dev/rfcomm0"}
  POST /api/connect         - Connect
  POST /api/reconnect       - Reconnect (fresh window)
  POST /api/disconnect      - Disconnect

Press Ctrl+C to stop.
`);

// Graceful shutdown
async function shutdown() {
  console.log("\nShutting down...");
  server?.stop();
  await connection.disconnect();
  process.exit(0);
}

process.on("SIGINT", () => {
  shutdown().catch((err: unknown) => {
    log.error("Shutdown failed:", err);
    process.exit(1);
  });
});
process.on("SIGTERM", () => {
  shutdown().catch((err: unknown) => {
    log.error("Shutdown failed:", err);
    process.exit(1);
  });
});
