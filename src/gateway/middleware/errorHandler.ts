/**
 * Gatehouse - Error Handler Middleware
 * Centralized error handling for the gateway
 */

import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';

import { isProduction } from '../../utils/helpers.js';
import logger from '../../utils/logger.js';
import { GatehouseError } from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
}

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Catches everything that escapes the route handlers and answers with JSON
 */
export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorResponse = buildErrorResponse(error, req.requestId);

  logError(error, req, errorResponse);

  if (res.headersSent) {
    next(error);
    return;
  }

  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Build a standardized error response object
 */
export function buildErrorResponse(err: Error, requestId?: string): ErrorResponse {
  let response: ErrorResponse;

  if (err instanceof GatehouseError) {
    response = {
      error: err.message,
      code: err.code,
      statusCode: err.statusCode,
    };
  } else if ('statusCode' in err && typeof err.statusCode === 'number') {
    // Errors raised by Express itself or its body parsers
    response = {
      error: err.message || 'An error occurred',
      code: 'HTTP_ERROR',
      statusCode: err.statusCode,
    };
  } else {
    response = {
      error: isProduction() ? 'Internal server error' : err.message,
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    };
  }

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * Log error with appropriate level and context
 */
function logError(err: Error, req: Request, errorResponse: ErrorResponse): void {
  const logContext = {
    requestId: errorResponse.requestId,
    method: req.method,
    path: req.path,
    statusCode: errorResponse.statusCode,
    errorCode: errorResponse.code,
  };

  if (errorResponse.statusCode >= 500) {
    logger.error(err.message, {
      ...logContext,
      stack: err.stack,
    });
  } else {
    logger.warn(err.message, logContext);
  }
}

// =============================================================================
// Not Found Handler
// =============================================================================

export const notFoundHandler: RequestHandler = (req: Request, res: Response): void => {
  const errorResponse: ErrorResponse = {
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
  };

  if (req.requestId) {
    errorResponse.requestId = req.requestId;
  }

  logger.debug('Route not found', {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
  });

  res.status(404).json(errorResponse);
};

export default errorHandler;
