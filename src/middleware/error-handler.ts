import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational = true,
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new AppError(404, `Route not found: ${req.method} ${req.path}`));
}

/**
 * Status of a 4xx error raised outside the app, such as a body-parser failure.
 */
function clientErrorStatus(err: Error): number | undefined {
  const status = "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) {
  const isAppError = err instanceof AppError;
  const clientStatus = isAppError ? undefined : clientErrorStatus(err);
  const statusCode = isAppError ? err.statusCode : (clientStatus ?? 500);
  const message = isAppError || clientStatus ? err.message : "Internal server error";
  const isOperational = isAppError ? err.isOperational : clientStatus !== undefined;

  const context = {
    path: req.path,
    method: req.method,
    statusCode,
    message,
    isOperational,
  };

  if (statusCode >= 500) {
    logger.error("Request error", context, err);
  } else {
    logger.warn("Request rejected", context);
  }

  if (process.env.NODE_ENV === "production" && !isOperational) {
    res.status(500).json({
      error: "Internal server error",
      message: "An unexpected error occurred",
    });
  } else {
    res.status(statusCode).json({
      error: message,
      stack: process.env.NODE_ENV === "development" ? err.stack : undefined,
    });
  }
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
