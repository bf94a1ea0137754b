export type {
  CommandEnvelope,
  CommandListResponse,
  CommandQueuedResponse,
  CommandRequest,
  CommandRequestInput,
  CommandResultRequest,
  CommandStatus,
  CommandTask,
  CommandTaskInput,
  CommandView,
  TerminalStatus,
} from "@shared/commands";
export type {
  GroupListResponse,
  GroupStateResponse,
  JsonObject,
  JsonValue,
  KeyStateResponse,
  StateIngest,
  StateIngestResponse,
  StateResponse,
} from "@shared/telemetry";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type RelayRequestOptions = {
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

/** Outcome of one task as reported back in `result.outputs.tasks`. */
export type TaskOutcome = {
  index: number;
  operation: "set" | "pulse";
  variable: string;
  writes: Array<{ value: string; response: string }>;
};

export type ExecutedCommand = {
  id: string;
  status: "completed" | "failed";
  detail: string | null;
  reported: boolean;
};

export type TickReport = {
  synced: boolean;
  updatedKeys: number;
  executed: ExecutedCommand[];
};
