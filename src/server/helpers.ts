/**
 * Common HTTP helpers
 */

import type { IncomingMessage, ServerResponse } from "http";
import { LinkError, ValidationError } from "../serial/errors";

/**
 * What a route hands back to the server for writing
 */
export interface RouteResult {
  status: number;
  body: object;
}

export function ok(body: object): RouteResult {
  return { status: 200, body };
}

export function fail(status: number, error: string, code?: string): RouteResult {
  return { status, body: code ? { error, code } : { error } };
}

/**
 * Map thrown errors to HTTP statuses
 */
export function errorResult(err: unknown): RouteResult {
  if (err instanceof ValidationError) {
    return fail(400, err.message, err.code);
  }
  if (err instanceof LinkError) {
    const status = err.code === "NotConnected" ? 409 : 502;
    return fail(status, err.message, err.code);
  }
  return fail(500, err instanceof Error ? err.message : String(err));
}

/**
 * Send JSON response
 */
export function jsonResponse(res: ServerResponse, data: object, status = 200): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

/**
 * Parse request body as JSON
 */
export function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let data = "";
    req.on("data", (chunk) => (data += chunk));
    req.on("end", () => {
      try {
        resolve(data ? JSON.parse(data) : {});
      } catch {
        reject(new ValidationError("InvalidBody", "Invalid JSON"));
      }
    });
    req.on("error", reject);
  });
}

/**
 * Narrow a parsed body to a plain object
 */
export function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Number-or-string field from a body, or undefined
 */
export function inputField(body: Record<string, unknown>, key: string): number | string | undefined {
  const value = body[key];
  return typeof value === "number" || typeof value === "string" ? value : undefined;
}

/**
 * Set CORS headers
 */
export function setCorsHeaders(res: ServerResponse): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}
