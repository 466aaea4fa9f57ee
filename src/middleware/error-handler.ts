/**
 * Error responses for the notification API.
 *
 * Every failure leaves the API as the same JSON body, tagged with the
 * request id so a client report can be matched to the server log.
 *
 * @module middleware/error-handler
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';

export interface ApiError {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  requestId?: string;
  timestamp: number;
  path: string;
}

export enum ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  INTERNAL_ERROR = 'internal_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  DEPENDENCY_ERROR = 'dependency_error'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string): AppError {
    return new AppError(ErrorCode.INVALID_REQUEST, message, 400);
  }

  static notFound(message: string): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  static unavailable(message: string): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503);
  }

  /** An upstream dependency (the summarizer) failed. */
  static dependency(message: string): AppError {
    return new AppError(ErrorCode.DEPENDENCY_ERROR, message, 502);
  }
}

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

type ErrorShape = Pick<ApiError, 'error' | 'message' | 'statusCode' | 'details'>;

function describeError(error: Error): ErrorShape {
  if (error instanceof ZodError) {
    return {
      error: ErrorCode.VALIDATION_ERROR,
      message: 'Request validation failed',
      statusCode: 400,
      details: error.flatten()
    };
  }

  if (error instanceof AppError) {
    return {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details
    };
  }

  // body-parser attaches a statusCode to malformed or oversized bodies
  const statusCode = hasStatusCode(error) ? error.statusCode : 500;
  return {
    error: statusCode < 500 ? ErrorCode.INVALID_REQUEST : ErrorCode.INTERNAL_ERROR,
    message: statusCode < 500 && error.message ? error.message : 'An unexpected error occurred',
    statusCode
  };
}

function buildBody(shape: ErrorShape, req: Request, res: Response): ApiError {
  const requestId = res.getHeader('x-request-id');
  return {
    ...shape,
    requestId: typeof requestId === 'string' ? requestId : undefined,
    timestamp: Date.now(),
    path: req.path
  };
}

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const body = buildBody(describeError(err), req, res);
  const meta = {
    error: err.message,
    path: req.path,
    method: req.method,
    statusCode: body.statusCode
  };

  if (body.statusCode >= 500) {
    logger.error('Request failed', { ...meta, stack: err.stack });
  } else {
    logger.warn('Request rejected', meta);
  }

  res.status(body.statusCode).json(body);
};

/**
 * Forward a rejected handler promise to the error middleware.
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { path: req.path, method: req.method });

  const body = buildBody(
    {
      error: ErrorCode.NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      statusCode: 404
    },
    req,
    res
  );
  res.status(404).json(body);
}
