import { z } from "zod";
import { jsonObjectSchema, jsonValueSchema, type JsonObject, type JsonValue } from "./telemetry";

export const COMMAND_PRIORITY_MIN = -10;
export const COMMAND_PRIORITY_MAX = 10;
export const COMMAND_CLAIM_LIMIT_MAX = 50;
export const DEFAULT_PULSE_HOLD_SECONDS = 1.0;

export const taskOperationSchema = z.enum(["set", "pulse"]);
export type TaskOperation = z.infer<typeof taskOperationSchema>;

export const commandStatusSchema = z.enum(["pending", "in_progress", "completed", "failed"]);
export type CommandStatus = z.infer<typeof commandStatusSchema>;

export const terminalStatusSchema = z.enum(["completed", "failed"]);
export type TerminalStatus = z.infer<typeof terminalStatusSchema>;

const requiredValueSchema = jsonValueSchema.refine((value) => value !== null, {
  message: "value must not be null",
});

const taskInputSchema = z
  .object({
    operation: taskOperationSchema,
    variable: z.string().trim().min(1).max(200),
    value: requiredValueSchema.optional(),
    reset_value: jsonValueSchema.optional(),
    hold_seconds: z.number().finite().nonnegative().optional(),
    comment: z.string().trim().max(500).optional(),
  })
  .superRefine((task, ctx) => {
    if (task.value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["value"], message: "value is required" });
    }
    if (task.operation === "pulse" && (task.reset_value === undefined || task.reset_value === null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["reset_value"],
        message: "reset_value is required for pulse tasks",
      });
    }
  });

export type CommandTask = {
  operation: TaskOperation;
  variable: string;
  value: JsonValue;
  reset_value: JsonValue;
  hold_seconds: number;
  comment?: string;
};

export const commandTaskSchema: z.ZodType<CommandTask, z.ZodTypeDef, unknown> = taskInputSchema.transform(
  (task): CommandTask => {
    const pulse = task.operation === "pulse";
    return {
      operation: task.operation,
      variable: task.variable,
      value: task.value ?? null,
      reset_value: pulse ? task.reset_value ?? null : null,
      hold_seconds: pulse ? task.hold_seconds ?? DEFAULT_PULSE_HOLD_SECONDS : 0,
      ...(task.comment ? { comment: task.comment } : {}),
    };
  },
);

export const commandRequestSchema = z.object({
  purpose: z.string().trim().min(3).max(200),
  tasks: z.array(commandTaskSchema).min(1).max(100),
  metadata: jsonObjectSchema.optional(),
  priority: z.number().int().min(COMMAND_PRIORITY_MIN).max(COMMAND_PRIORITY_MAX).optional(),
  guidance: jsonValueSchema.optional(),
});
export type CommandRequest = z.infer<typeof commandRequestSchema>;

/** Task shape accepted on submission, before defaults are applied. */
export type CommandTaskInput = {
  operation: TaskOperation;
  variable: string;
  value: JsonValue;
  reset_value?: JsonValue;
  hold_seconds?: number;
  comment?: string;
};

export type CommandRequestInput = Omit<CommandRequest, "tasks"> & { tasks: CommandTaskInput[] };

export const commandResultRequestSchema = z.object({
  status: terminalStatusSchema,
  detail: z.string().max(2000).nullish(),
  outputs: jsonValueSchema.optional(),
});
export type CommandResultRequest = z.infer<typeof commandResultRequestSchema>;

export type CommandResult = {
  status: TerminalStatus;
  detail: string | null;
  outputs: JsonValue;
  reported_at: string;
};

export type CommandView = {
  id: string;
  purpose: string;
  tasks: CommandTask[];
  priority: number;
  metadata: JsonObject;
  guidance: JsonValue;
  status: CommandStatus;
  created_at: string;
  claimed_at: string | null;
  claimed_by: string | null;
  result: CommandResult | null;
};

export type CommandQueuedResponse = {
  status: "queued";
  command: CommandView;
};

export type CommandEnvelope = {
  command: CommandView;
};

export type CommandListResponse = {
  commands: CommandView[];
};
