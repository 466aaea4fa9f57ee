/**
 * Request Context Middleware
 *
 * Adds request ID to all requests for correlation and tracing.
 *
 * @module middleware/request-context
 */

import { Request, Response, NextFunction } from 'express';
import { generateRequestId, setRequestContext } from '../utils/logger';

export const requestContextMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = req.header('x-request-id') || generateRequestId();

  res.setHeader('x-request-id', requestId);

  setRequestContext({
    requestId,
    method: req.method,
    path: req.path
  });

  next();
};
