import { Request, Response, NextFunction } from 'express';
import { logger } from '../logger';
import type { ErrorBody } from '../types';

// body-parser attaches the HTTP status to the errors it raises
function statusOf(err: Error): number {
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return 500;
}

export function notFoundHandler(req: Request, res: Response) {
  logger.warn({ module: 'middleware.notFound', method: req.method, path: req.path }, 'Not found');
  const body: ErrorBody = { error: { message: 'Not found' } };
  res.status(404).json(body);
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const statusCode = statusOf(err);

  if (statusCode >= 500) {
    logger.error({
      module: 'middleware.errorHandler',
      error_message: err.message,
      stack_trace: err.stack,
      request_id: req.id,
      path: req.path,
      error_type: err.name,
    }, 'Unhandled error');
  } else {
    logger.warn({
      module: 'middleware.errorHandler',
      error_message: err.message,
      request_id: req.id,
      path: req.path,
      error_type: err.name,
      status_code: statusCode,
    }, 'Request rejected');
  }

  const body: ErrorBody = {
    error: {
      message: statusCode >= 500 ? 'Internal server error' : err.message,
      type: err.name,
      ...(process.env.NODE_ENV !== 'production' && err.stack ? { stack: err.stack } : {}),
    },
  };
  res.status(statusCode).json(body);
}
