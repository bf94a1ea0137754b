import express, { Router } from "express";
import type { Request } from "express";
import {
  stateIngestSchema,
  type GroupListResponse,
  type GroupStateResponse,
  type JsonObject,
  type KeyStateResponse,
  type StateIngestResponse,
  type StateResponse,
} from "@shared/telemetry";
import { SIGNATURE_HEADER, verifySignature } from "../auth/signature";
import { metrics } from "../metrics";
import { createRateLimiter } from "../middleware/rate-limit";
import { BadRequestError, ForbiddenError, NotFoundError, UnauthorizedError } from "../services/errors";
import { normalizeName } from "../services/telemetry/json-value";
import type { SchemaIndex } from "../services/telemetry/schema-index";
import type { Snapshot, StateStore } from "../services/telemetry/state-store";
import { byGroup, byPath, flatten, listGroups } from "../services/telemetry/state-views";

export type StateRouterOptions = {
  store: StateStore;
  schema: SchemaIndex;
  apiKey: string;
  maxBodyBytes: number;
  rateLimitPerMinute?: number;
};

const WHOLE_SNAPSHOT_NAMES = new Set(["ALL", "FULL"]);
const TRUTHY = new Set(["1", "true", "yes", "on"]);

const parseFlag = (value: unknown): boolean =>
  typeof value === "string" && TRUTHY.has(value.trim().toLowerCase());

const requireSnapshot = (store: StateStore): Snapshot => {
  const snapshot = store.read();
  if (!snapshot) {
    throw new NotFoundError("No telemetry has been received yet");
  }
  return snapshot;
};

const rawBody = (req: Request): Buffer => {
  const body: unknown = req.body;
  return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
};

const parseIngest = (body: Buffer): { data: JsonObject; timestamp: string | null } => {
  let payload: unknown;
  try {
    payload = JSON.parse(body.toString("utf8"));
  } catch {
    throw new BadRequestError("Body must be valid JSON");
  }
  const parsed = stateIngestSchema.safeParse(payload);
  if (!parsed.success) {
    throw new BadRequestError("Body must be {timestamp, data} with data an object", parsed.error.issues);
  }
  return { data: parsed.data.data, timestamp: parsed.data.timestamp ?? null };
};

export const createStateRouter = (options: StateRouterOptions): Router => {
  const { store, schema, apiKey } = options;
  const router = Router();

  router.post(
    "/state",
    createRateLimiter({ max: options.rateLimitPerMinute ?? 0, scope: "state" }),
    express.raw({ type: () => true, limit: options.maxBodyBytes }),
    (req, res) => {
      const signature = req.get(SIGNATURE_HEADER);
      if (!signature) {
        metrics.recordIngest("unauthorized");
        throw new UnauthorizedError("Missing signature");
      }
      const body = rawBody(req);
      if (!verifySignature(apiKey, body, signature)) {
        metrics.recordIngest("forbidden");
        throw new ForbiddenError("Invalid signature");
      }
      let ingest: { data: JsonObject; timestamp: string | null };
      try {
        ingest = parseIngest(body);
      } catch (error) {
        metrics.recordIngest("bad_request");
        throw error;
      }
      store.replace(ingest.data, ingest.timestamp);
      metrics.recordIngest("updated");
      const response: StateIngestResponse = { status: "updated", updated_keys: Object.keys(ingest.data) };
      res.json(response);
    },
  );

  router.get("/state", (req, res) => {
    const snapshot = requireSnapshot(store);
    const body: StateResponse = {
      last_updated: snapshot.lastUpdated,
      data: parseFlag(req.query.flat) ? flatten(snapshot.data) : snapshot.data,
    };
    res.json(body);
  });

  router.get("/groups", (_req, res) => {
    const snapshot = requireSnapshot(store);
    const groups = listGroups(snapshot.data, schema);
    const body: GroupListResponse = {
      last_updated: snapshot.lastUpdated,
      schema_groups: groups.schemaGroups,
      inferred_groups: groups.inferredGroups,
    };
    res.json(body);
  });

  router.get(/^\/state\/keys\/(.*)$/, (req, res) => {
    const snapshot = requireSnapshot(store);
    const segments = (req.params[0] ?? "")
      .split("/")
      .filter((segment) => segment.length > 0);
    const value = byPath(snapshot.data, schema, segments);
    const body: KeyStateResponse = { last_updated: snapshot.lastUpdated, path: segments.join("/"), value };
    res.json(body);
  });

  router.get("/state/:group", (req, res) => {
    const snapshot = requireSnapshot(store);
    const group = req.params.group;
    const whole = WHOLE_SNAPSHOT_NAMES.has(normalizeName(group));
    const data = whole ? snapshot.data : byGroup(snapshot.data, schema, group);
    if (!whole && Object.keys(data).length === 0) {
      throw new NotFoundError(`No data for group or variable '${group}'`);
    }
    const body: GroupStateResponse = { last_updated: snapshot.lastUpdated, group, data };
    res.json(body);
  });

  return router;
};
