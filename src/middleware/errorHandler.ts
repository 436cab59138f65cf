// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import { sendError, sendServerError } from "./responseHelper";

function isMalformedJson(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

/**
 * Global error handler. Store and infrastructure failures end here as 500.
 */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isMalformedJson(err)) {
    sendError(res, "Malformed JSON body", 400);
    return;
  }

  const message =
    err instanceof Error ? err.message : typeof err === "string" ? err : "Server error";
  console.error("❌ SERVER ERROR:", err);
  sendServerError(res, message);
}

/**
 * Clean JSON 404 for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    ok: false,
    error: "Not Found",
    path: req.originalUrl,
    method: req.method,
  });
}
