import type { Express } from "express";
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";
import { guardAsync } from "../utils/express-async-guard";
import type { CommandCounts, CommandEvent, CommandQueueObserver } from "../services/commands/command-queue";

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "HTTP requests served",
  labelNames: ["method", "route", "status"],
  registers: [registry],
});

const httpRequestDuration = new Histogram({
  name: "http_request_duration_ms",
  help: "HTTP request latency",
  labelNames: ["method", "route", "status"],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
  registers: [registry],
});

const stateIngestTotal = new Counter({
  name: "state_ingest_total",
  help: "Telemetry snapshot submissions by outcome",
  labelNames: ["result"],
  registers: [registry],
});

const commandEventsTotal = new Counter({
  name: "commands_total",
  help: "Command lifecycle events",
  labelNames: ["event"],
  registers: [registry],
});

const commandsByStatus = new Gauge({
  name: "commands_by_status",
  help: "Retained commands per status",
  labelNames: ["status"],
  registers: [registry],
});

export type IngestResult = "updated" | "unauthorized" | "forbidden" | "bad_request";

export const metrics = {
  observeHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const cleanRoute = route || "unknown";
    const status = Number.isFinite(statusCode) ? String(statusCode) : "0";
    httpRequestsTotal.inc({ method: method || "GET", route: cleanRoute, status });
    httpRequestDuration.observe({ method: method || "GET", route: cleanRoute, status }, durationMs);
  },
  recordIngest(result: IngestResult): void {
    stateIngestTotal.inc({ result });
  },
  recordCommandEvent(event: CommandEvent, counts: CommandCounts): void {
    commandEventsTotal.inc({ event });
    for (const [status, value] of Object.entries(counts)) {
      commandsByStatus.set({ status }, value);
    }
  },
};

export const commandMetricsObserver: CommandQueueObserver = {
  onEvent: (event, counts) => metrics.recordCommandEvent(event, counts),
};

export function registerMetricsEndpoint(app: Express): void {
  app.get(
    "/metrics",
    guardAsync(async (_req, res) => {
      res.setHeader("Content-Type", registry.contentType);
      res.send(await registry.metrics());
    }),
  );
}
