/**
 * Ball-in-Tube HTTP API Server
 * REST endpoints and WebSocket sample stream for the chart/UI layer
 */

import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { WebSocketServer, type WebSocket } from "ws";
import type { TubeConnection } from "../serial/connection";
import type { DeviceManager } from "../serial/device-manager";
import type { CommandDispatcher } from "../commands/dispatcher";
import type { HealthChecker } from "../health/checker";
import type { Sample } from "../state/types";
import { createHealthRoute } from "./routes/health";
import { createSampleRoutes } from "./routes/samples";
import { createCommandRoutes } from "./routes/command";
import { createPortRoutes } from "./routes/ports";
import { errorResult, fail, jsonResponse, parseBody, setCorsHeaders, type RouteResult } from "./helpers";
import { createLogger } from "../logger";

const log = createLogger("http");

export interface TubeServerOptions {
  port?: number;
  connection: TubeConnection;
  dispatcher: CommandDispatcher;
  deviceManager: DeviceManager;
  checker: HealthChecker;
}

/**
 * Ball-in-Tube HTTP/WebSocket Server
 */
export class TubeServer {
  private server: ReturnType<typeof createServer> | null = null;
  private wss: WebSocketServer | null = null;
  private port: number;
  private clients: Set<WebSocket> = new Set();
  private healthRoute: ReturnType<typeof createHealthRoute>;
  private sampleRoutes: ReturnType<typeof createSampleRoutes>;
  private commandRoutes: ReturnType<typeof createCommandRoutes>;
  private portRoutes: ReturnType<typeof createPortRoutes>;

  constructor(options: TubeServerOptions) {
    this.port = options.port ?? 8080;

    // Initialize routes (Dependency Injection)
    this.healthRoute = createHealthRoute({
      connection: options.connection,
      checker: options.checker,
      getClientCount: () => this.clients.size,
    });
    this.sampleRoutes = createSampleRoutes({ connection: options.connection });
    this.commandRoutes = createCommandRoutes({
      connection: options.connection,
      dispatcher: options.dispatcher,
    });
    this.portRoutes = createPortRoutes({ deviceManager: options.deviceManager });
  }

  /**
   * Start server
   */
  start(): void {
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error("Unhandled request error:", err);
      });
    });

    this.wss = new WebSocketServer({ server: this.server });

    // Global error handler to prevent server crash
    this.wss.on("error", (err) => {
      log.error("WebSocket server error:", err.message);
    });

    this.wss.on("connection", (ws, req) => {
      const path = (req.url || "/").split("?")[0];
      if (path !== "/ws") {
        ws.close(1008, "Unknown path");
        return;
      }

      this.clients.add(ws);
      log.info(`WebSocket client connected (${this.clients.size})`);

      ws.on("error", (err) => {
        log.warn("WebSocket client error:", err.message);
        this.clients.delete(ws);
      });

      ws.on("close", () => {
        this.clients.delete(ws);
        log.info(`WebSocket client disconnected (${this.clients.size})`);
      });
    });

    this.server.listen(this.port, () => {
      log.info(`Server running on http://localhost:${this.port}`);
    });
  }

  /**
   * Handle HTTP requests
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || "/", `http://localhost:${this.port}`);

    setCorsHeaders(res);

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    let result: RouteResult;
    try {
      result = url.pathname.startsWith("/api/")
        ? await this.handleApi(req, url.pathname.replace("/api/", ""), url.searchParams)
        : fail(404, "Not found");
    } catch (err) {
      log.error("Request error:", err);
      result = errorResult(err);
    }

    jsonResponse(res, result.body, result.status);
  }

  /**
   * Route API requests
   */
  private async handleApi(
    req: IncomingMessage,
    path: string,
    query: URLSearchParams
  ): Promise<RouteResult> {
    const method = req.method || "GET";

    if (method === "GET") {
      switch (path) {
        case "health":
          return this.healthRoute.get();
        case "health/report":
          return this.healthRoute.report();
        case "samples":
          return this.sampleRoutes.list(query);
        case "samples/latest":
          return this.sampleRoutes.latest();
        case "samples/chart":
          return this.sampleRoutes.chart();
        case "retention":
          return this.sampleRoutes.getRetention();
        case "ports":
          return this.portRoutes.list();
        case "port":
          return this.portRoutes.current();
      }
    }

    if (method === "POST") {
      switch (path) {
        case "command":
          return this.commandRoutes.post(await parseBody(req));
        case "reset":
          return this.commandRoutes.reset();
        case "retention":
          return this.sampleRoutes.setRetention(await parseBody(req));
        case "port":
          return this.portRoutes.setPort(await parseBody(req));
        case "connect":
          return this.portRoutes.connect();
        case "reconnect":
          return this.portRoutes.reconnect();
        case "disconnect":
          return this.portRoutes.disconnect();
      }
    }

    return fail(404, "Not found");
  }

  /**
   * Broadcast to all WebSocket clients
   */
  broadcast(data: object): void {
    if (this.clients.size === 0) return;

    const message = JSON.stringify(data);
    // Snapshot to avoid "Set modified during iteration"
    for (const ws of [...this.clients]) {
      if (ws.readyState !== ws.OPEN) continue;
      ws.send(message, (err) => {
        if (err) log.debug("WebSocket send failed:", err.message);
      });
    }
  }

  broadcastSample(sample: Sample): void {
    this.broadcast({ type: "sample", data: sample });
  }

  broadcastLink(connected: boolean, port: string): void {
    this.broadcast({ type: "link", connected, port });
  }

  /**
   * Stop server
   */
  stop(): void {
    for (const ws of this.clients) {
      ws.close();
    }
    this.clients.clear();
    this.wss?.close();
    this.server?.close();
    this.server = null;
    this.wss = null;
  }
}
