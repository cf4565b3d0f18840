/**
 * Sample Routes - window snapshots for chart consumers
 */

import { asRecord, errorResult, fail, inputField, ok, type RouteResult } from "../helpers";
import { toChartSeries } from "../../telemetry/units";
import { formatTenths } from "../../serial/frame-codec";
import type { Sample } from "../../state/types";

export interface SampleSource {
  snapshot(): readonly Sample[];
  since(t: number): readonly Sample[];
  latest(): Sample | null;
  getRetention(): number;
  setRetention(seconds: number): number;
}

export interface SampleDependencies {
  connection: SampleSource;
}

export function createSampleRoutes(deps: SampleDependencies) {
  return {
    /**
     * GET /api/samples[?since=<epoch ms>]
     */
    list(query: URLSearchParams): RouteResult {
      const sinceParam = query.get("since");
      if (sinceParam === null) {
        const samples = deps.connection.snapshot();
        return ok({ count: samples.length, samples });
      }

      const since = Number(sinceParam);
      if (sinceParam.trim() === "" || !Number.isFinite(since)) {
        return fail(400, `Invalid since: ${sinceParam}`, "InvalidNumber");
      }
      const samples = deps.connection.since(since);
      return ok({ count: samples.length, samples });
    },

    /**
     * GET /api/samples/latest
     */
    latest(): RouteResult {
      const sample = deps.connection.latest();
      if (!sample) {
        return fail(404, "No samples");
      }
      return ok({ ...sample, temperature: formatTenths(sample.temperatureTenths) });
    },

    /**
     * GET /api/samples/chart
     * Height SP, measured height, duty % and valve % against relative time
     */
    chart(): RouteResult {
      const points = toChartSeries(deps.connection.snapshot());
      return ok({ retentionSeconds: deps.connection.getRetention(), points });
    },

    /**
     * GET /api/retention
     */
    getRetention(): RouteResult {
      return ok({ seconds: deps.connection.getRetention() });
    },

    /**
     * POST /api/retention
     * Body: { seconds } (clamped to 5..600)
     */
    setRetention(body: unknown): RouteResult {
      const record = asRecord(body);
      const input = record ? inputField(record, "seconds") : undefined;
      if (input === undefined || String(input).trim() === "") {
        return fail(400, "seconds required", "InvalidRetention");
      }

      try {
        const seconds = deps.connection.setRetention(Number(input));
        return ok({ ok: true, seconds });
      } catch (err) {
        return errorResult(err);
      }
    },
  };
}
