import express, { type ErrorRequestHandler, type Express, type Request, type RequestHandler } from "express";
import { formatRequestLine, log } from "./lib/log";
import { metrics, registerMetricsEndpoint } from "./metrics";
import { createCommandsRouter } from "./routes/commands";
import { createStateRouter } from "./routes/state";
import type { CommandQueue } from "./services/commands/command-queue";
import { isApiError } from "./services/errors";
import type { SchemaIndex } from "./services/telemetry/schema-index";
import type { StateStore } from "./services/telemetry/state-store";
import type { StartupConfig } from "./startup-config";

export type AppConfig = Pick<StartupConfig, "apiKey" | "commandToken" | "maxBodyBytes" | "rateLimits">;

export type AppDeps = {
  config: AppConfig;
  store: StateStore;
  schema: SchemaIndex;
  queue: CommandQueue;
  logRequests?: boolean;
};

type BodyParserError = { type: string; status: number; message: string };

const isBodyParserError = (error: unknown): error is BodyParserError =>
  typeof error === "object" &&
  error !== null &&
  "type" in error &&
  typeof error.type === "string" &&
  "status" in error &&
  typeof error.status === "number";

const previewResponseBody = (body: unknown): string | undefined => {
  if (body === undefined) return undefined;
  try {
    return JSON.stringify(body);
  } catch {
    return undefined;
  }
};

const resolveRouteLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === "string") {
    return `${req.baseUrl}${routePath}`;
  }
  return req.baseUrl || "unmatched";
};

const requestLogger = (enabled: boolean): RequestHandler => (req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonPreview: string | undefined;

  const originalResJson = res.json.bind(res);
  res.json = (bodyJson?: unknown) => {
    capturedJsonPreview = previewResponseBody(bodyJson);
    return originalResJson(bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    metrics.observeHttpRequest(req.method, resolveRouteLabel(req), res.statusCode, duration);
    if (enabled && path.startsWith("/api")) {
      log(formatRequestLine(req.method, path, res.statusCode, duration, capturedJsonPreview));
    }
  });

  next();
};

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (res.headersSent) return;
  if (isApiError(err)) {
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return;
  }
  if (isBodyParserError(err) && err.status < 500) {
    const tooLarge = err.type === "entity.too.large";
    res.status(tooLarge ? 413 : 400).json({
      error: tooLarge ? "payload_too_large" : "bad_request",
      message: tooLarge ? "Request body exceeds the size limit" : "Request body could not be parsed",
    });
    return;
  }
  console.error("[express] unhandled error:", err);
  res.status(500).json({ error: "internal_error", message: "Internal server error" });
};

export const createApp = (deps: AppDeps): Express => {
  const { config, store, schema, queue } = deps;
  const app = express();
  app.disable("x-powered-by");
  app.use(requestLogger(deps.logRequests ?? true));

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });
  registerMetricsEndpoint(app);

  app.use(
    "/api",
    createStateRouter({
      store,
      schema,
      apiKey: config.apiKey,
      maxBodyBytes: config.maxBodyBytes,
      rateLimitPerMinute: config.rateLimits.statePerMinute,
    }),
  );
  app.use(
    "/api/commands",
    createCommandsRouter({
      queue,
      commandToken: config.commandToken,
      maxBodyBytes: config.maxBodyBytes,
      rateLimitPerMinute: config.rateLimits.commandsPerMinute,
    }),
  );

  app.use((req, res) => {
    res.status(404).json({ error: "not_found", message: `No route for ${req.method} ${req.path}` });
  });
  app.use(errorHandler);

  return app;
};
