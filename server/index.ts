import path from "node:path";
import { createServer, type Server } from "node:http";
import { fileURLToPath } from "node:url";
import { createApp } from "./app";
import { log } from "./lib/log";
import { commandMetricsObserver } from "./metrics";
import { CommandQueue } from "./services/commands/command-queue";
import { SchemaIndex, SchemaLoadError } from "./services/telemetry/schema-index";
import { StateStore } from "./services/telemetry/state-store";
import { resolveStartupConfig } from "./startup-config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PROJECT_ROOT = path.resolve(__dirname, "..");

const runtimeEnv = process.env.NODE_ENV ?? "development";
let serverInstance: Server | null = null;
let shuttingDown = false;

const loadSchema = (schemaPath: string): SchemaIndex => {
  const resolved = path.isAbsolute(schemaPath) ? schemaPath : path.join(PROJECT_ROOT, schemaPath);
  const schema = SchemaIndex.load(resolved);
  log(`variable schema loaded from ${resolved} (${schema.groupNames().length} groups)`, "schema");
  return schema;
};

const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log(`received ${signal}, closing server`, "server");
  if (!serverInstance) {
    process.exit(0);
  }
  serverInstance.close((error) => {
    if (error) {
      console.error("[server] close failed:", error);
      process.exit(1);
    }
    process.exit(0);
  });
};

const main = () => {
  const config = resolveStartupConfig(process.env, runtimeEnv);
  for (const warning of config.warnings) {
    console.warn(`[config] WARNING: ${warning}`);
  }

  let schema: SchemaIndex;
  try {
    schema = loadSchema(config.schemaPath);
  } catch (error) {
    if (error instanceof SchemaLoadError) {
      console.error(`[schema] ${error.message}${error.source ? ` (${error.source})` : ""}`);
      process.exit(1);
    }
    throw error;
  }

  const app = createApp({
    config,
    schema,
    store: new StateStore(),
    queue: new CommandQueue({
      historyLimit: config.commandHistoryLimit,
      claimLeaseSeconds: config.claimLeaseSeconds,
      observer: commandMetricsObserver,
    }),
  });

  serverInstance = createServer(app);
  serverInstance.listen(config.port, config.host, () => {
    log(`telemetry relay listening on http://${config.host}:${config.port} (NODE_ENV=${runtimeEnv})`, "server");
    log(
      `command history limit ${config.commandHistoryLimit}, claim lease ${config.claimLeaseSeconds > 0 ? `${config.claimLeaseSeconds}s` : "disabled"}`,
      "server",
    );
  });

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

main();
