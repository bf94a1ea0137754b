import { randomUUID } from "node:crypto";
import {
  COMMAND_CLAIM_LIMIT_MAX,
  commandRequestSchema,
  type CommandStatus,
  type CommandTask,
  type CommandView,
  type TerminalStatus,
} from "@shared/commands";
import type { JsonValue } from "@shared/telemetry";
import { BadRequestError, ConflictError, NotFoundError } from "../errors";
import { SerialLane } from "./serial-lane";

export const LEASE_EXPIRED_DETAIL = "claim lease expired";

export type CommandEvent = "created" | "claimed" | "completed" | "failed" | "expired" | "evicted";

export type CommandCounts = Record<CommandStatus, number>;

export interface CommandQueueObserver {
  onEvent(event: CommandEvent, counts: CommandCounts): void;
}

export type CommandQueueOptions = {
  historyLimit: number;
  /** 0 disables lease expiry: an abandoned claim then stays in_progress. */
  claimLeaseSeconds?: number;
  now?: () => Date;
  idFactory?: () => string;
  observer?: CommandQueueObserver;
};

export type CommandListFilter = {
  status?: CommandStatus;
  limit?: number;
};

type CommandRecord = CommandView & { sequence: number };

const isTerminal = (status: CommandStatus): boolean => status === "completed" || status === "failed";

const clampClaimLimit = (limit: number): number => {
  if (!Number.isFinite(limit)) return 1;
  return Math.min(COMMAND_CLAIM_LIMIT_MAX, Math.max(1, Math.floor(limit)));
};

const toView = ({ sequence: _sequence, ...view }: CommandRecord): CommandView => ({
  ...view,
  tasks: [...view.tasks],
  result: view.result ? { ...view.result } : null,
});

/**
 * In-memory dispatch queue for operator commands.
 *
 * Every operation runs inside one {@link SerialLane}, so claim selection and
 * result reporting never interleave: a pending command is handed to at most
 * one claimant, and a terminal result is written exactly once.
 */
export class CommandQueue {
  private readonly records = new Map<string, CommandRecord>();
  private readonly lane = new SerialLane();
  private readonly historyLimit: number;
  private readonly leaseMs: number;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly observer?: CommandQueueObserver;
  private nextSequence = 1;

  constructor(options: CommandQueueOptions) {
    this.historyLimit = Math.max(1, Math.floor(options.historyLimit));
    this.leaseMs = Math.max(0, (options.claimLeaseSeconds ?? 0) * 1000);
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
    this.observer = options.observer;
  }

  get size(): number {
    return this.records.size;
  }

  async create(payload: unknown): Promise<CommandView> {
    const parsed = commandRequestSchema.safeParse(payload);
    if (!parsed.success) {
      throw new BadRequestError("Invalid command payload", parsed.error.issues);
    }
    const request = parsed.data;
    return this.lane.run(() => {
      this.expireLeases();
      const tasks: CommandTask[] = request.tasks.map((task) => Object.freeze({ ...task }));
      const record: CommandRecord = {
        id: this.idFactory(),
        purpose: request.purpose,
        tasks,
        priority: request.priority ?? 0,
        metadata: request.metadata ?? {},
        guidance: request.guidance ?? null,
        status: "pending",
        created_at: this.now().toISOString(),
        claimed_at: null,
        claimed_by: null,
        result: null,
        sequence: this.nextSequence++,
      };
      this.records.set(record.id, record);
      this.emit("created");
      this.trim();
      return toView(record);
    });
  }

  async claimNext(limit: number, claimantId: string | null): Promise<CommandView[]> {
    const take = clampClaimLimit(limit);
    return this.lane.run(() => {
      this.expireLeases();
      const selected = Array.from(this.records.values())
        .filter((record) => record.status === "pending")
        .sort((a, b) => b.priority - a.priority || a.sequence - b.sequence)
        .slice(0, take);
      const claimedAt = this.now().toISOString();
      for (const record of selected) {
        record.status = "in_progress";
        record.claimed_at = claimedAt;
        record.claimed_by = claimantId;
        this.emit("claimed");
      }
      return selected.map(toView);
    });
  }

  async reportResult(
    commandId: string,
    status: TerminalStatus,
    detail?: string | null,
    outputs?: JsonValue,
  ): Promise<CommandView> {
    return this.lane.run(() => {
      this.expireLeases();
      const record = this.records.get(commandId);
      if (!record) {
        throw new NotFoundError(`Command ${commandId} not found`);
      }
      if (isTerminal(record.status)) {
        throw new ConflictError(`Command ${commandId} is already ${record.status}`);
      }
      record.status = status;
      record.result = {
        status,
        detail: detail ?? null,
        outputs: outputs ?? null,
        reported_at: this.now().toISOString(),
      };
      this.emit(status);
      const view = toView(record);
      this.trim();
      return view;
    });
  }

  async get(commandId: string): Promise<CommandView> {
    return this.lane.run(() => {
      this.expireLeases();
      const record = this.records.get(commandId);
      if (!record) {
        throw new NotFoundError(`Command ${commandId} not found`);
      }
      return toView(record);
    });
  }

  async list(filter: CommandListFilter = {}): Promise<CommandView[]> {
    return this.lane.run(() => {
      this.expireLeases();
      const matches = Array.from(this.records.values()).filter(
        (record) => !filter.status || record.status === filter.status,
      );
      const limited = filter.limit !== undefined ? matches.slice(-Math.max(1, filter.limit)) : matches;
      return limited.map(toView);
    });
  }

  counts(): CommandCounts {
    const counts: CommandCounts = { pending: 0, in_progress: 0, completed: 0, failed: 0 };
    for (const record of this.records.values()) {
      counts[record.status] += 1;
    }
    return counts;
  }

  private expireLeases(): void {
    if (this.leaseMs <= 0) return;
    const now = this.now();
    const cutoff = now.getTime() - this.leaseMs;
    let expired = false;
    for (const record of this.records.values()) {
      if (record.status !== "in_progress" || !record.claimed_at) continue;
      if (Date.parse(record.claimed_at) > cutoff) continue;
      record.status = "failed";
      record.result = {
        status: "failed",
        detail: LEASE_EXPIRED_DETAIL,
        outputs: null,
        reported_at: now.toISOString(),
      };
      expired = true;
      this.emit("expired");
    }
    if (expired) this.trim();
  }

  // Map iteration follows insertion order, which is sequence order.
  private trim(): void {
    if (this.records.size <= this.historyLimit) return;
    for (const record of Array.from(this.records.values())) {
      if (this.records.size <= this.historyLimit) break;
      if (!isTerminal(record.status)) continue;
      this.records.delete(record.id);
      this.emit("evicted");
    }
  }

  private emit(event: CommandEvent): void {
    this.observer?.onEvent(event, this.counts());
  }
}
