import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import { BulkLoadValidationError, isEngineError } from "@transit-vibes/engine";

function statusOf(err: Error): number {
  if (isEngineError(err)) return err.status;
  // body-parser and other middleware errors carry a numeric status
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.fields,
    });
    return;
  }

  if (err instanceof BulkLoadValidationError) {
    console.error(`[error] ${err.message}`);
    res.status(err.status).json({ message: err.message, issues: err.issues });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`[error] ${err.message}`);
    } else {
      console.warn(`[error] ${err.message}`);
    }
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}
