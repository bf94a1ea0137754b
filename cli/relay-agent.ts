#!/usr/bin/env node
import path from "node:path";
import { SimulatorClient, TelemetryRelayClient } from "../sdk/src/client";
import { loadRelayAgentConfig } from "../sdk/src/config";
import { RelayAgent } from "../sdk/src/runtime";

const USAGE = `Usage: relay-agent [--config <path>]

Reads the simulator, pushes signed snapshots to the relay server and executes
queued commands. The config path defaults to $RELAY_AGENT_CONFIG or
./relay-agent.config.json.`;

type ParsedArgs = {
  configPath?: string;
  help?: boolean;
};

const parseArgs = (): ParsedArgs => {
  const args = process.argv.slice(2);
  const parsed: ParsedArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--help" || token === "-h") {
      parsed.help = true;
    } else if (token === "--config" || token === "-c") {
      parsed.configPath = args[i + 1];
      i += 1;
    } else if (token.startsWith("--config=")) {
      parsed.configPath = token.split("=", 2)[1];
    }
  }
  return parsed;
};

async function main() {
  const args = parseArgs();
  if (args.help) {
    console.error(USAGE);
    process.exit(0);
  }

  const configPath = path.resolve(
    args.configPath ?? process.env.RELAY_AGENT_CONFIG ?? "relay-agent.config.json",
  );
  const config = await loadRelayAgentConfig(configPath);

  const agent = new RelayAgent({
    relay: new TelemetryRelayClient({
      baseUrl: config.serverUrl,
      apiKey: config.apiKey,
      commandToken: config.commandToken,
    }),
    simulator: new SimulatorClient({ gameUrl: config.gameUrl }),
    clientId: config.clientId,
    commandBatch: config.commandBatch,
    pollIntervalSeconds: config.pollIntervalSeconds,
  });

  const stop = () => agent.stop();
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  await agent.start();
}

main().catch((err) => {
  console.error("[relay-agent]", err instanceof Error ? err.message : err);
  process.exit(1);
});
