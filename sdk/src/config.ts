import fs from "node:fs/promises";
import { z } from "zod";

const STATE_ENDPOINT_SUFFIX = /\/api\/state\/?$/;

export const relayAgentConfigSchema = z.object({
  API_URL: z.string().url(),
  API_KEY: z.string().min(1),
  GAME_URL: z.string().url(),
  COMMAND_TOKEN: z.string().min(1),
  POLL_INTERVAL: z.number().positive().default(1),
  CLIENT_ID: z.string().trim().min(1).default("relay-agent"),
  COMMAND_BATCH: z.number().int().min(1).max(50).default(5),
});

export type RelayAgentConfig = z.infer<typeof relayAgentConfigSchema>;

export type ResolvedRelayAgentConfig = {
  serverUrl: string;
  apiKey: string;
  gameUrl: string;
  commandToken: string;
  pollIntervalSeconds: number;
  clientId: string;
  commandBatch: number;
};

/** API_URL may name either the server root or its `/api/state` endpoint. */
export const resolveServerUrl = (apiUrl: string): string =>
  apiUrl.replace(/\/+$/, "").replace(STATE_ENDPOINT_SUFFIX, "");

export const parseRelayAgentConfig = (raw: unknown): ResolvedRelayAgentConfig => {
  const parsed = relayAgentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new Error(`Invalid relay agent config:\n- ${problems.join("\n- ")}`);
  }
  const config = parsed.data;
  return {
    serverUrl: resolveServerUrl(config.API_URL),
    apiKey: config.API_KEY,
    gameUrl: config.GAME_URL,
    commandToken: config.COMMAND_TOKEN,
    pollIntervalSeconds: config.POLL_INTERVAL,
    clientId: config.CLIENT_ID,
    commandBatch: config.COMMAND_BATCH,
  };
};

export const loadRelayAgentConfig = async (filePath: string): Promise<ResolvedRelayAgentConfig> => {
  const text = await fs.readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file ${filePath} is not valid JSON: ${message}`);
  }
  return parseRelayAgentConfig(raw);
};
