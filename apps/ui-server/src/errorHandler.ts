import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { ConfigValidationError, SutBusyError, UnknownSutError } from "@benchfleet/orchestrator";

export class NotFoundError extends Error {}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: "validation_error", details: err.errors });
    return;
  }
  if (err instanceof ConfigValidationError) {
    res.status(400).json({ error: err.code, message: err.message, details: err.issues });
    return;
  }
  if (err instanceof UnknownSutError || err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  if (err instanceof SutBusyError) {
    res.status(409).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof Error) {
    res.status(500).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: "Internal server error" });
}
