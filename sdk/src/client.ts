import crypto from "node:crypto";
import type {
  CommandEnvelope,
  CommandListResponse,
  CommandQueuedResponse,
  CommandRequestInput,
  CommandResultRequest,
  CommandView,
  FetchLike,
  JsonObject,
  JsonValue,
  RelayRequestOptions,
  StateIngestResponse,
} from "./types";

export type TelemetryRelayClientOptions = {
  baseUrl: string;
  apiKey: string;
  commandToken?: string;
  headers?: Record<string, string>;
  fetch?: FetchLike;
};

export type SimulatorClientOptions = {
  gameUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

const isHttpUrl = (value?: string): boolean =>
  typeof value === "string" && /^https?:\/\//i.test(value);

const normalizeBaseUrl = (input: string, label: string): string => {
  if (!isHttpUrl(input)) {
    throw new Error(`${label} must be an absolute URL: ${input}`);
  }
  return input.replace(/\/+$/, "");
};

const parseJson = async <T>(res: Response, url: string): Promise<T> => {
  const text = await res.text();
  try {
    return JSON.parse(text) as T;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse JSON from ${url}: ${message}`);
  }
};

const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Hex HMAC-SHA256 of the exact bytes that will be sent. */
export const signPayload = (secret: string, body: string): string =>
  crypto.createHmac("sha256", secret).update(body).digest("hex");

/**
 * Decodes JSON-encoded strings wherever they appear, recursively. The game
 * webserver reports structured variables as JSON text inside its JSON reply.
 */
export const deepParse = (value: unknown): JsonValue => {
  if (typeof value === "string") {
    let decoded: unknown;
    try {
      decoded = JSON.parse(value);
    } catch {
      return value;
    }
    return deepParse(decoded);
  }
  if (Array.isArray(value)) {
    return value.map((item) => deepParse(item));
  }
  if (typeof value === "object" && value !== null) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = deepParse(item);
    }
    return out;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return null;
};

export class RelayHttpError extends Error {
  status: number;
  url: string;
  body?: string;

  constructor(message: string, options: { status: number; url: string; body?: string }) {
    super(message);
    this.name = "RelayHttpError";
    this.status = options.status;
    this.url = options.url;
    this.body = options.body;
  }
}

export class TelemetryRelayClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly commandToken?: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: TelemetryRelayClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl, "baseUrl");
    this.apiKey = options.apiKey;
    this.commandToken = options.commandToken;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetch ?? fetch;
  }

  private commandHeaders(): Record<string, string> {
    if (!this.commandToken) {
      throw new Error("commandToken is required for command API calls");
    }
    return { "X-Command-Token": this.commandToken };
  }

  private async send<T>(
    method: "GET" | "POST",
    path: string,
    init: { body?: string; headers?: Record<string, string> },
    options?: RelayRequestOptions,
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { ...this.headers, ...init.headers, ...(options?.headers ?? {}) };
    if (init.body !== undefined) {
      headers["Content-Type"] = headers["Content-Type"] ?? "application/json";
    }
    const response = await this.fetchImpl(url, {
      method,
      headers,
      body: init.body,
      signal: options?.signal,
    });
    if (!response.ok) {
      const text = await response.text();
      throw new RelayHttpError(`Request failed: ${response.status} ${url}`, {
        status: response.status,
        url,
        body: text,
      });
    }
    return parseJson<T>(response, url);
  }

  async pushState(
    payload: { timestamp: string; data: JsonObject },
    options?: RelayRequestOptions,
  ): Promise<StateIngestResponse> {
    const body = JSON.stringify(payload);
    return this.send<StateIngestResponse>(
      "POST",
      "/api/state",
      { body, headers: { "X-Signature": signPayload(this.apiKey, body) } },
      options,
    );
  }

  async claimCommands(limit: number, clientId: string, options?: RelayRequestOptions): Promise<CommandView[]> {
    const query = new URLSearchParams({ limit: String(limit), client_id: clientId });
    const response = await this.send<CommandListResponse>(
      "GET",
      `/api/commands/next?${query.toString()}`,
      { headers: this.commandHeaders() },
      options,
    );
    return response.commands ?? [];
  }

  async reportResult(
    commandId: string,
    result: CommandResultRequest,
    options?: RelayRequestOptions,
  ): Promise<CommandView> {
    const response = await this.send<CommandEnvelope>(
      "POST",
      `/api/commands/${encodeURIComponent(commandId)}/result`,
      { body: JSON.stringify(result), headers: this.commandHeaders() },
      options,
    );
    return response.command;
  }

  async createCommand(request: CommandRequestInput, options?: RelayRequestOptions): Promise<CommandView> {
    const response = await this.send<CommandQueuedResponse>(
      "POST",
      "/api/commands",
      { body: JSON.stringify(request), headers: this.commandHeaders() },
      options,
    );
    return response.command;
  }

  async getCommand(commandId: string, options?: RelayRequestOptions): Promise<CommandView> {
    const response = await this.send<CommandEnvelope>(
      "GET",
      `/api/commands/${encodeURIComponent(commandId)}`,
      { headers: this.commandHeaders() },
      options,
    );
    return response.command;
  }
}

const formatSimulatorValue = (value: JsonValue): string => {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
};

/** Talks to the game's internal webserver through its `?Variable=&value=` interface. */
export class SimulatorClient {
  private readonly gameUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: SimulatorClientOptions) {
    this.gameUrl = normalizeBaseUrl(options.gameUrl, "gameUrl");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async get(variable: string, value: string): Promise<Response> {
    const query = new URLSearchParams({ Variable: variable, value });
    const url = `${this.gameUrl}/?${query.toString()}`;
    const response = await this.fetchImpl(url, {
      method: "GET",
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      const text = await response.text();
      throw new RelayHttpError(`Simulator request failed: ${response.status} ${url}`, {
        status: response.status,
        url,
        body: text,
      });
    }
    return response;
  }

  async readAll(): Promise<JsonObject> {
    const response = await this.get("WEBSERVER_BATCH_GET", "*");
    const payload = deepParse(await response.json());
    const values = isJsonObject(payload) ? payload.values : undefined;
    if (values === undefined || !isJsonObject(values)) {
      throw new Error("Unexpected payload structure from game webserver");
    }
    return values;
  }

  async setVariable(variable: string, value: JsonValue): Promise<{ value: string; response: string }> {
    const formatted = formatSimulatorValue(value);
    const response = await this.get(variable, formatted);
    return { value: formatted, response: (await response.text()).trim() };
  }
}
