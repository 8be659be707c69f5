import type { NextFunction } from "express";
import { ZodError } from "zod";
import { SkyrouteError } from "@skyroute/routing";

/** The slice of an Express response the handler writes to */
export interface JsonReply {
  status(code: number): { json(body: unknown): unknown };
}

export function errorHandler(
  err: unknown,
  _req: unknown,
  res: JsonReply,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.issues,
    });
    return;
  }

  if (err instanceof SkyrouteError) {
    const log = err.status >= 500 ? console.error : console.warn;
    log(`[error] ${err.name}: ${err.message}`);
    res.status(err.status).json({
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof Error) {
    // body-parser and friends tag their errors with a status
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    console.error(`[error] ${err.message}`);
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}
