import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import { setCorrelationId } from "../utils/logger";

/**
 * Correlation ID Middleware
 *
 * Propagates X-Request-ID (or generates one) so every log line for a request
 * carries the same ID, and echoes it back in the response headers.
 */
export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const correlationId = req.get("X-Request-ID") || randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader("X-Request-ID", correlationId);
  setCorrelationId(correlationId);

  next();
}
