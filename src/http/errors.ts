import type { NextFunction, Request, Response } from "express";
import {
  NotFoundError,
  PersistenceError,
  ValidationError,
} from "../domain/errors.js";
import { logger } from "../logger.js";

/**
 * Status of an http-errors value (what body-parser rejects with: 400 for bad
 * JSON, 413 for an oversized body, 415 for an unsupported charset) when it is
 * marked safe to expose.
 */
export function exposedStatus(err: unknown): number | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    "expose" in err &&
    typeof err.status === "number" &&
    err.expose === true
  ) {
    return err.status;
  }
  return undefined;
}

export function statusForError(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  const exposed = exposedStatus(err);
  if (exposed !== undefined) return exposed;
  if (err instanceof NotFoundError) return 404;
  return 500;
}

export function errorBody(err: unknown): { error: string; issues?: string[] } {
  if (err instanceof ValidationError && err.issues.length) {
    return { error: err.message, issues: err.issues };
  }
  if (err instanceof ValidationError || err instanceof NotFoundError) {
    return { error: err.message };
  }
  if (err instanceof SyntaxError && exposedStatus(err) === 400) {
    return { error: "Malformed JSON body" };
  }
  if (err instanceof Error && exposedStatus(err) !== undefined) {
    return { error: err.message };
  }
  if (err instanceof PersistenceError) return { error: "Storage failure" };
  return { error: "Internal error" };
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusForError(err);
  if (status >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed`, { err });
  } else {
    logger.debug(`${req.method} ${req.originalUrl} -> ${status}`);
  }
  res.status(status).json(errorBody(err));
}
