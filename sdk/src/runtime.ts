import { RelayHttpError, type SimulatorClient, type TelemetryRelayClient } from "./client";
import type { CommandTask, CommandView, ExecutedCommand, JsonValue, TaskOutcome, TickReport } from "./types";

export type RelayAgentOptions = {
  relay: TelemetryRelayClient;
  simulator: SimulatorClient;
  clientId: string;
  commandBatch?: number;
  pollIntervalSeconds?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  log?: (message: string) => void;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
const defaultLog = (message: string) => console.log(`[relay-agent] ${message}`);

const describeError = (error: unknown): string => {
  if (error instanceof RelayHttpError) {
    return `${error.message}${error.body ? `: ${error.body}` : ""}`;
  }
  return error instanceof Error ? error.message : String(error);
};

class TaskFailure extends Error {
  outcomes: TaskOutcome[];

  constructor(message: string, outcomes: TaskOutcome[]) {
    super(message);
    this.name = "TaskFailure";
    this.outcomes = outcomes;
  }
}

const outcomesToJson = (outcomes: TaskOutcome[]): JsonValue =>
  outcomes.map((outcome) => ({
    index: outcome.index,
    operation: outcome.operation,
    variable: outcome.variable,
    writes: outcome.writes.map((write) => ({ value: write.value, response: write.response })),
  }));

/**
 * Bridges the simulator and the relay server: each tick pushes one signed
 * snapshot, then claims a batch of commands and executes their tasks in order.
 */
export class RelayAgent {
  private readonly relay: TelemetryRelayClient;
  private readonly simulator: SimulatorClient;
  private readonly clientId: string;
  private readonly commandBatch: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly log: (message: string) => void;
  private running = false;

  constructor(options: RelayAgentOptions) {
    this.relay = options.relay;
    this.simulator = options.simulator;
    this.clientId = options.clientId;
    this.commandBatch = Math.max(1, Math.floor(options.commandBatch ?? 5));
    this.pollIntervalMs = Math.max(0, (options.pollIntervalSeconds ?? 1) * 1000);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? defaultLog;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<TickReport> {
    const report: TickReport = { synced: false, updatedKeys: 0, executed: [] };

    try {
      const data = await this.simulator.readAll();
      const response = await this.relay.pushState({ timestamp: this.now().toISOString(), data });
      report.synced = true;
      report.updatedKeys = response.updated_keys.length;
      this.log(`state sync ok (${report.updatedKeys} keys)`);
    } catch (error) {
      this.log(`state sync failed: ${describeError(error)}`);
    }

    let commands: CommandView[];
    try {
      commands = await this.relay.claimCommands(this.commandBatch, this.clientId);
    } catch (error) {
      this.log(`command poll failed: ${describeError(error)}`);
      return report;
    }

    for (const command of commands) {
      report.executed.push(await this.executeCommand(command));
    }
    return report;
  }

  async executeCommand(command: CommandView): Promise<ExecutedCommand> {
    this.log(`executing ${command.id}: ${command.purpose}`);
    let status: ExecutedCommand["status"] = "completed";
    let detail: string | null = null;
    let outcomes: TaskOutcome[];

    try {
      outcomes = await this.runTasks(command.tasks);
    } catch (error) {
      status = "failed";
      detail = describeError(error);
      outcomes = error instanceof TaskFailure ? error.outcomes : [];
    }

    let reported = false;
    try {
      await this.relay.reportResult(command.id, {
        status,
        detail,
        outputs: { tasks: outcomesToJson(outcomes) },
      });
      reported = true;
    } catch (error) {
      this.log(`result report for ${command.id} failed: ${describeError(error)}`);
    }
    this.log(`${command.id} ${status}${detail ? `: ${detail}` : ""}`);
    return { id: command.id, status, detail, reported };
  }

  private async runTasks(tasks: CommandTask[]): Promise<TaskOutcome[]> {
    const outcomes: TaskOutcome[] = [];
    for (const [index, task] of tasks.entries()) {
      const outcome: TaskOutcome = { index, operation: task.operation, variable: task.variable, writes: [] };
      try {
        outcome.writes.push(await this.simulator.setVariable(task.variable, task.value));
        if (task.operation === "pulse") {
          await this.sleep(task.hold_seconds * 1000);
          outcome.writes.push(await this.simulator.setVariable(task.variable, task.reset_value));
        }
      } catch (error) {
        outcomes.push(outcome);
        throw new TaskFailure(`task ${index} (${task.variable}) failed: ${describeError(error)}`, outcomes);
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.log(`starting as ${this.clientId}, polling every ${this.pollIntervalMs / 1000}s`);
    while (this.running) {
      await this.tick();
      if (!this.running) break;
      await this.sleep(this.pollIntervalMs);
    }
    this.log("stopped");
  }

  stop(): void {
    this.running = false;
  }
}
