import type { Request, RequestHandler } from "express";
import { UnauthorizedError } from "../services/errors";
import { safeEqual } from "./signature";

export const COMMAND_TOKEN_HEADER = "x-command-token";

const readToken = (req: Request): string | undefined => {
  const value = req.get(COMMAND_TOKEN_HEADER)?.trim();
  return value ? value : undefined;
};

/**
 * Rejects the request unless `X-Command-Token` matches the configured token.
 * An empty configured token rejects everything.
 */
export const requireCommandToken = (expected: string): RequestHandler => {
  const configured = expected.trim();
  return (req, _res, next) => {
    const provided = readToken(req);
    if (!configured || !provided || !safeEqual(configured, provided)) {
      next(new UnauthorizedError("Invalid or missing command token"));
      return;
    }
    next();
  };
};
