import express, { Router } from "express";
import { commandResultRequestSchema, commandStatusSchema } from "@shared/commands";
import { requireCommandToken } from "../auth/command-token";
import { log } from "../lib/log";
import { createRateLimiter } from "../middleware/rate-limit";
import type { CommandQueue } from "../services/commands/command-queue";
import { BadRequestError } from "../services/errors";
import { guardAsync } from "../utils/express-async-guard";

export type CommandsRouterOptions = {
  queue: CommandQueue;
  commandToken: string;
  maxBodyBytes: number;
  rateLimitPerMinute?: number;
};

const queryString = (value: unknown): string | undefined => {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const parseLimit = (value: unknown, fallback: number): number => {
  const raw = queryString(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new BadRequestError(`limit must be a number, got '${raw}'`);
  }
  return parsed;
};

export const createCommandsRouter = (options: CommandsRouterOptions): Router => {
  const { queue } = options;
  const router = Router();

  router.use(
    createRateLimiter({ max: options.rateLimitPerMinute ?? 0, scope: "command" }),
    requireCommandToken(options.commandToken),
    express.json({ limit: options.maxBodyBytes }),
  );

  router.post(
    "/",
    guardAsync(async (req, res) => {
      const command = await queue.create(req.body);
      log(`queued ${command.id} (${command.tasks.length} tasks, priority ${command.priority})`, "commands");
      res.status(201).json({ status: "queued", command });
    }),
  );

  router.get(
    "/next",
    guardAsync(async (req, res) => {
      const limit = parseLimit(req.query.limit, 1);
      const clientId = queryString(req.query.client_id) ?? null;
      const commands = await queue.claimNext(limit, clientId);
      if (commands.length > 0) {
        log(`claimed ${commands.map((c) => c.id).join(", ")} for ${clientId ?? "anonymous"}`, "commands");
      }
      res.json({ commands });
    }),
  );

  router.get(
    "/",
    guardAsync(async (req, res) => {
      const rawStatus = queryString(req.query.status);
      const status = rawStatus === undefined ? undefined : commandStatusSchema.safeParse(rawStatus);
      if (status && !status.success) {
        throw new BadRequestError(`Unknown status '${rawStatus}'`);
      }
      const limit = req.query.limit === undefined ? undefined : parseLimit(req.query.limit, 50);
      const commands = await queue.list({ status: status?.data, limit });
      res.json({ commands });
    }),
  );

  router.post(
    "/:id/result",
    guardAsync(async (req, res) => {
      const parsed = commandResultRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new BadRequestError("Invalid result payload", parsed.error.issues);
      }
      const { status, detail, outputs } = parsed.data;
      const command = await queue.reportResult(req.params.id, status, detail, outputs);
      log(`${command.id} reported ${status}`, "commands");
      res.json({ command });
    }),
  );

  router.get(
    "/:id",
    guardAsync(async (req, res) => {
      const command = await queue.get(req.params.id);
      res.json({ command });
    }),
  );

  return router;
};
