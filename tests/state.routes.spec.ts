import request from "supertest";
import { describe, expect, it } from "vitest";
import { signBody } from "../server/auth/signature";
import { buildTestApp, TEST_API_KEY } from "./fixtures/app";
import { sampleSnapshot } from "./fixtures/snapshot";

const TIMESTAMP = "2024-05-01T12:00:00Z";

const postSigned = (app: ReturnType<typeof buildTestApp>["app"], body: string, secret = TEST_API_KEY) =>
  request(app)
    .post("/api/state")
    .set("Content-Type", "application/json")
    .set("X-Signature", signBody(secret, body))
    .send(body);

const seeded = async () => {
  const ctx = buildTestApp();
  const res = await postSigned(ctx.app, JSON.stringify({ timestamp: TIMESTAMP, data: sampleSnapshot() }));
  expect(res.status).toBe(200);
  return ctx;
};

describe("POST /api/state", () => {
  it("rejects a request without a signature", async () => {
    const { app, store } = buildTestApp();
    const res = await request(app)
      .post("/api/state")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ timestamp: TIMESTAMP, data: { A: 1 } }));
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: "unauthorized", message: "Missing signature" });
    expect(store.read()).toBeNull();
  });

  it("rejects a signature made with another key", async () => {
    const { app, store } = buildTestApp();
    const res = await postSigned(app, JSON.stringify({ timestamp: TIMESTAMP, data: { A: 1 } }), "other-secret");
    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: "forbidden", message: "Invalid signature" });
    expect(store.read()).toBeNull();
  });

  it("compares the signature exactly", async () => {
    const { app } = buildTestApp();
    const body = JSON.stringify({ timestamp: TIMESTAMP, data: { A: 1 } });
    const res = await request(app)
      .post("/api/state")
      .set("Content-Type", "application/json")
      .set("X-Signature", signBody(TEST_API_KEY, body).toUpperCase())
      .send(body);
    expect(res.status).toBe(403);
  });

  it("signs the raw bytes, so re-serialized JSON does not verify", async () => {
    const { app } = buildTestApp();
    const signedFor = JSON.stringify({ timestamp: TIMESTAMP, data: { A: 1 } });
    const res = await request(app)
      .post("/api/state")
      .set("Content-Type", "application/json")
      .set("X-Signature", signBody(TEST_API_KEY, signedFor))
      .send(JSON.stringify({ timestamp: TIMESTAMP, data: { A: 1 } }, null, 2));
    expect(res.status).toBe(403);
  });

  it("rejects a signed body that is not JSON", async () => {
    const { app } = buildTestApp();
    const res = await postSigned(app, "not json");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "bad_request", message: "Body must be valid JSON" });
  });

  it("rejects a signed body whose data is not a mapping", async () => {
    const { app, store } = buildTestApp();
    const res = await postSigned(app, JSON.stringify({ timestamp: TIMESTAMP, data: [1, 2] }));
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("bad_request");
    expect(store.read()).toBeNull();
  });

  it("stores a valid snapshot and lists its top-level keys", async () => {
    const { app, store } = buildTestApp();
    const res = await postSigned(app, JSON.stringify({ timestamp: TIMESTAMP, data: { CORE_STATE: 2, LOOPS: [] } }));
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "updated", updated_keys: ["CORE_STATE", "LOOPS"] });
    expect(store.read()).toEqual({ data: { CORE_STATE: 2, LOOPS: [] }, lastUpdated: TIMESTAMP });
  });

  it("replaces the previous snapshot wholesale", async () => {
    const { app } = await seeded();
    await postSigned(app, JSON.stringify({ data: { TURBINE_RPM: 1200 } }));
    const res = await request(app).get("/api/state");
    expect(res.body).toEqual({ last_updated: null, data: { TURBINE_RPM: 1200 } });
  });
});

describe("GET /api/state", () => {
  it("is not found before the first snapshot", async () => {
    const { app } = buildTestApp();
    for (const path of ["/api/state", "/api/groups", "/api/state/core", "/api/state/keys/CORE_STATE"]) {
      const res = await request(app).get(path);
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "not_found", message: "No telemetry has been received yet" });
    }
  });

  it("returns the raw snapshot", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/state");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ last_updated: TIMESTAMP, data: sampleSnapshot() });
  });

  it("flattens on request", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/state?flat=true");
    expect(res.body.data["LOOPS[1].flow"]).toBe(11.5);
    expect(res.body.data["ALARMS.active[0]"]).toBe("LOW_FLOW");
    expect(res.body.data["ALARMS.acknowledged"]).toEqual([]);
    expect(res.body.data.CORE_STATE).toBe(2);
  });
});

describe("GET /api/state/:group", () => {
  it("returns translated group members", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/state/core");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      last_updated: TIMESTAMP,
      group: "core",
      data: { CORE_TEMP: 512.5, CORE_STATE: "Online", CORE_SCRAM_BUTTON: "Released" },
    });
  });

  it("returns the whole snapshot for ALL and FULL", async () => {
    const { app } = await seeded();
    for (const name of ["all", "FULL"]) {
      const res = await request(app).get(`/api/state/${name}`);
      expect(res.status).toBe(200);
      expect(res.body.data).toEqual(sampleSnapshot());
    }
  });

  it("answers ALL with an empty snapshot but not a group", async () => {
    const { app } = buildTestApp();
    await postSigned(app, JSON.stringify({ timestamp: TIMESTAMP, data: {} }));

    const all = await request(app).get("/api/state/ALL");
    expect(all.status).toBe(200);
    expect(all.body).toEqual({ last_updated: TIMESTAMP, group: "ALL", data: {} });
    expect((await request(app).get("/api/state/core")).status).toBe(404);
  });

  it("is not found when nothing matches", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/state/reactor");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "not_found", message: "No data for group or variable 'reactor'" });
  });
});

describe("GET /api/state/keys/*", () => {
  it("walks nested paths", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/state/keys/LOOPS/1/flow");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ last_updated: TIMESTAMP, path: "LOOPS/1/flow", value: 11.5 });
  });

  it("translates a single top-level key", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/state/keys/core_state");
    expect(res.body.value).toBe("Online");
  });

  it("maps path errors to 400 and 404", async () => {
    const { app } = await seeded();
    expect((await request(app).get("/api/state/keys/LOOPS/first")).status).toBe(400);
    expect((await request(app).get("/api/state/keys/LOOPS/9")).status).toBe(404);
    expect((await request(app).get("/api/state/keys/NOPE")).status).toBe(404);
    expect((await request(app).get("/api/state/keys/")).status).toBe(400);
  });
});

describe("GET /api/groups", () => {
  it("lists schema and inferred groups", async () => {
    const { app } = await seeded();
    const res = await request(app).get("/api/groups");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      last_updated: TIMESTAMP,
      schema_groups: ["COOLANT", "CORE", "TURBINE"],
      inferred_groups: ["ALARMS", "COOLANT", "CORE", "GENERATOR", "LOOPS", "TURBINE", "rod_positions"],
    });
  });
});

describe("ambient routes", () => {
  it("answers health checks and unknown routes", async () => {
    const { app } = buildTestApp();
    const health = await request(app).get("/healthz");
    expect(health.status).toBe(200);
    expect(health.body.status).toBe("ok");

    const missing = await request(app).get("/api/unknown");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "not_found", message: "No route for GET /api/unknown" });
  });

  it("exposes prometheus metrics", async () => {
    const { app } = buildTestApp();
    const res = await request(app).get("/metrics");
    expect(res.status).toBe(200);
    expect(res.text).toContain("# TYPE state_ingest_total counter");
  });
});
