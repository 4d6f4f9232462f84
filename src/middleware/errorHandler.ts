import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { Logger } from '../types/logger';

// express.json() flags unparsable bodies with status 400 and type 'entity.parse.failed'
const isMalformedBody = (error: Error) =>
  'type' in error && error.type === 'entity.parse.failed';

export const createErrorHandler = (logger: Logger = console): ErrorRequestHandler => (
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    return next(error);
  }

  if (error.name === 'ValidationError') {
    return res.status(400).json({
      error: 'Validation Error',
      message: error.message,
      details: 'details' in error ? error.details : {},
    });
  }

  if (isMalformedBody(error)) {
    return res.status(400).json({
      error: 'Validation Error',
      message: 'Request body is not valid JSON',
    });
  }

  if (error.name === 'NotFoundError') {
    return res.status(404).json({
      error: 'Not Found',
      message: error.message,
    });
  }

  if (error.name === 'BusinessRuleError') {
    return res.status(409).json({
      error: 'Business Rule Violation',
      message: error.message,
    });
  }

  if (error.name === 'UnauthorizedError') {
    return res.status(401).json({
      error: 'Unauthorized',
      message: 'Authentication required',
    });
  }

  logger.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);

  res.status(500).json({
    error: 'Internal Server Error',
    message: 'Something went wrong',
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Not Found',
    message: 'Route not found',
  });
};
