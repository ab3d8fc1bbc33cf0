import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError, ErrorCode } from "../errors/AppError";
import { logger } from "../logger";

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  // Handle AppError instances
  if (error instanceof AppError) {
    if (!error.isOperational || error.statusCode >= 500) {
      logger.logError(error, { method: req.method, url: req.originalUrl });
    }
    return res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      ...(error.details && { details: error.details }),
    });
  }

  // Handle validation errors
  if (error instanceof ZodError) {
    return res.status(400).json({
      error: "Validation failed",
      code: ErrorCode.VALIDATION_ERROR,
      details: { issues: error.issues },
    });
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError) {
    return res.status(400).json({
      error: "Malformed request body",
      code: ErrorCode.VALIDATION_ERROR,
    });
  }

  logger.logError(error, { method: req.method, url: req.originalUrl });

  // Default error response
  return res.status(500).json({
    error: "Internal server error",
    code: ErrorCode.INTERNAL_SERVER_ERROR,
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    code: ErrorCode.RESOURCE_NOT_FOUND,
    path: req.path,
    method: req.method,
  });
};
