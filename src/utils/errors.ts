// upload-reformer/src/utils/errors.ts
import type { Request, Response, NextFunction } from "express";
import { logger } from "./logger";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function asyncWrap(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

function statusFor(err: Error): number {
  return err instanceof HttpError ? err.status : 500;
}

// Central error handler: client errors keep their message, everything else is a 500.
export function errorMiddleware(
  thrown: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const err = toError(thrown);
  const status = statusFor(err);

  if (status >= 500) {
    logger.error(`❌ ${req.method} ${req.originalUrl} failed: ${err.message}`, {
      stack: err.stack,
    });
  } else {
    logger.warn(`Rejected ${req.method} ${req.originalUrl} (${status}): ${err.message}`);
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json({
    error: status >= 500 ? "Internal Server Error" : err.message,
  });
}
