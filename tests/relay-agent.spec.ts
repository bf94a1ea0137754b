import { describe, expect, it, vi, type Mock } from "vitest";
import type { CommandTask, CommandView } from "@shared/commands";
import { SimulatorClient, TelemetryRelayClient } from "../sdk/src/client";
import { parseRelayAgentConfig, resolveServerUrl } from "../sdk/src/config";
import { RelayAgent } from "../sdk/src/runtime";
import type { FetchLike } from "../sdk/src/types";

const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json" } });

const command = (id: string, tasks: CommandTask[]): CommandView => ({
  id,
  purpose: "operator request",
  tasks,
  priority: 0,
  metadata: {},
  guidance: null,
  status: "in_progress",
  created_at: "2024-05-01T12:00:00.000Z",
  claimed_at: "2024-05-01T12:00:01.000Z",
  claimed_by: "agent-1",
  result: null,
});

type Harness = {
  agent: RelayAgent;
  relayFetch: Mock<FetchLike>;
  gameFetch: Mock<FetchLike>;
  sleep: Mock<(ms: number) => Promise<void>>;
  log: Mock<(message: string) => void>;
  reports: unknown[];
};

const buildHarness = (options: {
  commands?: CommandView[];
  game?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
} = {}): Harness => {
  const reports: unknown[] = [];
  let pending = options.commands ?? [];
  const relayFetch = vi.fn<FetchLike>(async (url, init) => {
    if (url.endsWith("/api/state")) {
      return jsonResponse({ status: "updated", updated_keys: ["CORE_STATE", "TURBINE_RPM"] });
    }
    if (url.includes("/api/commands/next")) {
      const batch = pending;
      pending = [];
      return jsonResponse({ commands: batch });
    }
    if (url.endsWith("/result") && typeof init?.body === "string") {
      reports.push(JSON.parse(init.body));
      return jsonResponse({ command: {} });
    }
    return jsonResponse({ error: "not_found" }, 404);
  });
  const gameFetch = vi.fn<FetchLike>(
    options.game ??
      (async (url) =>
        url.includes("WEBSERVER_BATCH_GET")
          ? jsonResponse({ values: { CORE_STATE: "2", TURBINE_RPM: "3000" } })
          : new Response("OK", { status: 200 })),
  );
  const sleep = vi.fn<(ms: number) => Promise<void>>(options.sleep ?? (async () => undefined));
  const log = vi.fn<(message: string) => void>();

  const agent = new RelayAgent({
    relay: new TelemetryRelayClient({
      baseUrl: "http://relay.test",
      apiKey: "test-secret",
      commandToken: "test-token",
      fetch: relayFetch,
    }),
    simulator: new SimulatorClient({ gameUrl: "http://game.test", fetch: gameFetch }),
    clientId: "agent-1",
    commandBatch: 2,
    sleep,
    now: () => new Date("2024-05-01T12:00:05.000Z"),
    log,
  });
  return { agent, relayFetch, gameFetch, sleep, log, reports };
};

describe("RelayAgent", () => {
  it("pushes a snapshot and executes a pulse command", async () => {
    const harness = buildHarness({
      commands: [
        command("c1", [
          {
            operation: "pulse",
            variable: "CORE_SCRAM_BUTTON",
            value: true,
            reset_value: false,
            hold_seconds: 0.5,
          },
        ]),
      ],
    });

    const report = await harness.agent.tick();

    expect(report).toEqual({
      synced: true,
      updatedKeys: 2,
      executed: [{ id: "c1", status: "completed", detail: null, reported: true }],
    });
    const statePush = harness.relayFetch.mock.calls[0]?.[1];
    expect(statePush?.body).toBe(
      JSON.stringify({ timestamp: "2024-05-01T12:00:05.000Z", data: { CORE_STATE: 2, TURBINE_RPM: 3000 } }),
    );
    expect(harness.relayFetch.mock.calls[1]?.[0]).toBe(
      "http://relay.test/api/commands/next?limit=2&client_id=agent-1",
    );
    expect(harness.gameFetch.mock.calls.map((call) => call[0])).toEqual([
      "http://game.test/?Variable=WEBSERVER_BATCH_GET&value=*",
      "http://game.test/?Variable=CORE_SCRAM_BUTTON&value=true",
      "http://game.test/?Variable=CORE_SCRAM_BUTTON&value=false",
    ]);
    expect(harness.sleep).toHaveBeenCalledWith(500);
    expect(harness.reports).toEqual([
      {
        status: "completed",
        detail: null,
        outputs: {
          tasks: [
            {
              index: 0,
              operation: "pulse",
              variable: "CORE_SCRAM_BUTTON",
              writes: [
                { value: "true", response: "OK" },
                { value: "false", response: "OK" },
              ],
            },
          ],
        },
      },
    ]);
  });

  it("stops at the first failing task and reports the failure", async () => {
    const harness = buildHarness({
      commands: [
        command("c2", [
          { operation: "set", variable: "COOLANT_PUMP_STATE", value: 1, reset_value: null, hold_seconds: 0 },
          { operation: "set", variable: "TURBINE_RPM", value: 1500, reset_value: null, hold_seconds: 0 },
          { operation: "set", variable: "GENERATOR_OUTPUT", value: 0, reset_value: null, hold_seconds: 0 },
        ]),
      ],
      game: async (url) => {
        if (url.includes("WEBSERVER_BATCH_GET")) return jsonResponse({ values: {} });
        if (url.includes("TURBINE_RPM")) return new Response("boom", { status: 500 });
        return new Response("OK", { status: 200 });
      },
    });

    const report = await harness.agent.tick();

    const detail =
      "task 1 (TURBINE_RPM) failed: Simulator request failed: 500 http://game.test/?Variable=TURBINE_RPM&value=1500: boom";
    expect(report.executed).toEqual([{ id: "c2", status: "failed", detail, reported: true }]);
    expect(harness.gameFetch).toHaveBeenCalledTimes(3);
    expect(harness.reports).toEqual([
      {
        status: "failed",
        detail,
        outputs: {
          tasks: [
            {
              index: 0,
              operation: "set",
              variable: "COOLANT_PUMP_STATE",
              writes: [{ value: "1", response: "OK" }],
            },
            { index: 1, operation: "set", variable: "TURBINE_RPM", writes: [] },
          ],
        },
      },
    ]);
  });

  it("keeps polling commands when the state sync fails", async () => {
    const harness = buildHarness({
      game: async () => {
        throw new Error("connect ECONNREFUSED");
      },
    });

    const report = await harness.agent.tick();

    expect(report).toEqual({ synced: false, updatedKeys: 0, executed: [] });
    expect(harness.log).toHaveBeenCalledWith("state sync failed: connect ECONNREFUSED");
    expect(harness.relayFetch).toHaveBeenCalledTimes(1);
    expect(harness.relayFetch.mock.calls[0]?.[0]).toContain("/api/commands/next");
  });

  it("runs until stopped", async () => {
    let agent: RelayAgent | null = null;
    const harness = buildHarness({
      sleep: async () => {
        agent?.stop();
      },
    });
    agent = harness.agent;

    await harness.agent.start();

    expect(harness.agent.isRunning).toBe(false);
    expect(harness.sleep).toHaveBeenCalledTimes(1);
    expect(harness.sleep).toHaveBeenCalledWith(1000);
    expect(harness.log).toHaveBeenLastCalledWith("stopped");
  });
});

describe("relay agent config", () => {
  const base = {
    API_URL: "http://relay.test/api/state",
    API_KEY: "test-secret",
    GAME_URL: "http://game.test",
    COMMAND_TOKEN: "test-token",
  };

  it("fills defaults and derives the server root", () => {
    expect(parseRelayAgentConfig(base)).toEqual({
      serverUrl: "http://relay.test",
      apiKey: "test-secret",
      gameUrl: "http://game.test",
      commandToken: "test-token",
      pollIntervalSeconds: 1,
      clientId: "relay-agent",
      commandBatch: 5,
    });
  });

  it("accepts a server root as API_URL", () => {
    expect(resolveServerUrl("http://relay.test/")).toBe("http://relay.test");
    expect(resolveServerUrl("http://relay.test/api/state/")).toBe("http://relay.test");
  });

  it("names the missing keys", () => {
    const { COMMAND_TOKEN: _omitted, ...rest } = base;
    expect(() => parseRelayAgentConfig({ ...rest, COMMAND_BATCH: 0 })).toThrow(
      /COMMAND_TOKEN: Required[\s\S]*COMMAND_BATCH: Number must be greater than or equal to 1/,
    );
  });
});
