import { Request, Response, NextFunction } from "express";
import { container } from "tsyringe";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import {
  ValidationError,
  EntityNotFoundError,
} from "../../../shared/errors/DomainError";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

const isProduction = () => process.env.NODE_ENV === "production";

/**
 * Centralized Error Handler Middleware
 *
 * Maps domain errors to HTTP errors and sends appropriate responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.error("Error handler caught error", err, {
    path: req.path,
    method: req.method,
  });

  if (err instanceof HttpError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(400).json({
      error: err.message,
      code: err.code,
      field: err.field,
    });
    return;
  }

  if (err instanceof EntityNotFoundError) {
    res.status(404).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // InternalError and any other AppError
  if (err instanceof AppError) {
    res.status(500).json({
      error: isProduction() ? "Internal server error" : err.message,
      code: err.code,
    });
    return;
  }

  // Unknown error
  res.status(500).json({
    error: isProduction() ? "Internal server error" : err.message,
    code: "INTERNAL_ERROR",
    ...(!isProduction() && { stack: err.stack }),
  });
}
