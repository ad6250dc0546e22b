import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import type { ApiError } from "@spark-world/shared";

function statusCodeOf(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (
    err instanceof Error &&
    "statusCode" in err &&
    typeof err.statusCode === "number"
  ) {
    return err.statusCode;
  }
  return 500;
}

/** Forward rejections from async route handlers to the error handler. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  const statusCode = statusCodeOf(err);
  const body: ApiError = {
    error: err instanceof Error ? err.name : "Error",
    message:
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ")
        : err instanceof Error
          ? err.message
          : "Unknown error",
    statusCode,
  };

  if (statusCode >= 500) {
    console.error("[SERVER] Unhandled error:", err);
  }
  res.status(statusCode).json(body);
}
