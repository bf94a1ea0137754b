export const DEFAULT_API_KEY = "changeme";
export const DEFAULT_PORT = 8000;
export const DEFAULT_COMMAND_HISTORY_LIMIT = 500;
export const DEFAULT_SCHEMA_PATH = "data/variable-schema.json";
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export type RateLimitConfig = {
  statePerMinute: number;
  commandsPerMinute: number;
};

export type StartupConfig = {
  port: number;
  host: string;
  appEnv: string;
  apiKey: string;
  commandToken: string;
  commandHistoryLimit: number;
  claimLeaseSeconds: number;
  schemaPath: string;
  maxBodyBytes: number;
  rateLimits: RateLimitConfig;
  warnings: string[];
};

const parsePositiveInt = (value: string | undefined): number | null => {
  if (!value?.trim()) return null;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return null;
  return parsed;
};

const parseNonNegative = (value: string | undefined, fallback: number): number => {
  if (!value?.trim()) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
};

export const resolveStartupConfig = (env: NodeJS.ProcessEnv, appEnv: string): StartupConfig => {
  const warnings: string[] = [];
  const apiKey = env.API_KEY?.trim() ? env.API_KEY.trim() : DEFAULT_API_KEY;
  if (apiKey === DEFAULT_API_KEY) {
    warnings.push(`API_KEY is set to the default '${DEFAULT_API_KEY}'; configure a real secret.`);
  }
  const commandToken = env.COMMAND_TOKEN?.trim() ?? "";
  if (!commandToken) {
    warnings.push("COMMAND_TOKEN is not set; every command API call will be rejected.");
  }

  return {
    port: parsePositiveInt(env.PORT) ?? DEFAULT_PORT,
    host: env.HOST?.trim() ? env.HOST.trim() : "0.0.0.0",
    appEnv,
    apiKey,
    commandToken,
    commandHistoryLimit: parsePositiveInt(env.COMMAND_HISTORY_LIMIT) ?? DEFAULT_COMMAND_HISTORY_LIMIT,
    claimLeaseSeconds: parseNonNegative(env.COMMAND_CLAIM_LEASE_SECONDS, 0),
    schemaPath: env.VARIABLE_SCHEMA_PATH?.trim() ? env.VARIABLE_SCHEMA_PATH.trim() : DEFAULT_SCHEMA_PATH,
    maxBodyBytes: parsePositiveInt(env.MAX_BODY_BYTES) ?? DEFAULT_MAX_BODY_BYTES,
    rateLimits: {
      statePerMinute: Math.floor(parseNonNegative(env.STATE_RATE_LIMIT_PER_MIN, 0)),
      commandsPerMinute: Math.floor(parseNonNegative(env.COMMAND_RATE_LIMIT_PER_MIN, 0)),
    },
    warnings,
  };
};
