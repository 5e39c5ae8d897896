import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

// Custom error class
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Validation error class
export class ValidationError extends AppError {
  errors: unknown[];

  constructor(message: string, errors: unknown[] = []) {
    super(message, 400);
    this.errors = errors;
  }
}

// A roster source that could not be read or a report that could not be written
export class RosterFileError extends AppError {
  fileLabel: string;

  constructor(fileLabel: string, message: string, statusCode: number = 422) {
    super(`${fileLabel}: ${message}`, statusCode);
    this.fileLabel = fileLabel;
  }
}

// Invalid environment or duty code configuration; raised at startup
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}

interface ErrorResponseBody {
  error: {
    message: string;
    status: number;
    errors?: unknown[];
    stack?: string;
  };
}

// Not found error handler
export const notFound = (req: Request, res: Response, next: NextFunction) => {
  const error = new AppError(`Not found - ${req.originalUrl}`, 404);
  next(error);
};

// Global error handler middleware
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  let error = err;

  // If not operational error, log it
  if (!(error instanceof AppError) || !error.isOperational) {
    logger.error('Unexpected error:', {
      error: error.message,
      stack: error.stack,
      url: req.url,
      method: req.method,
      ip: req.ip
    });
  }

  // body-parser reports oversized or unreadable bodies with a status of its own
  const bodyStatus = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  if (!(error instanceof AppError) && bodyStatus !== undefined && bodyStatus >= 400 && bodyStatus < 500) {
    error = new AppError(error.message, bodyStatus);
  }

  // Default to 500 server error
  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const message = error.message || 'Internal server error';

  // Send error response
  const response: ErrorResponseBody = {
    error: {
      message,
      status: statusCode
    }
  };

  // Add validation errors if present
  if (error instanceof ValidationError && error.errors.length > 0) {
    response.error.errors = error.errors;
  }

  // Add stack trace in development
  if (process.env.NODE_ENV === 'development') {
    response.error.stack = error.stack;
  }

  res.status(statusCode).json(response);
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Async error wrapper; returns the settled promise so callers can await it
export const asyncHandler = (fn: AsyncRequestHandler) => {
  return (req: Request, res: Response, next: NextFunction): Promise<void> => {
    return Promise.resolve(fn(req, res, next)).catch(next);
  };
};
