import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { describeError } from '@/services/errors';
import { sendError } from '@/utils/errorResponse';
import { getCorrelationId } from './correlation';

/** Status of an exposable http-errors client error, such as a body-parser rejection. */
export function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if (!('expose' in err) || err.expose !== true) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || !Number.isInteger(status)) return undefined;
  return status >= 400 && status < 500 ? status : undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 404, `Route ${req.method} ${req.path} not found`, 'not_found');
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const context = {
    method: req.method,
    path: req.path,
    correlationId: getCorrelationId(res),
    error: describeError(err),
  };
  if (res.headersSent) {
    logger.error('http:error_after_headers', context);
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    logger.warn('http:client_error', { ...context, status });
    sendError(res, status, describeError(err), 'bad_request');
    return;
  }

  logger.error('http:unhandled_error', context);
  sendError(res, 500, 'Internal Server Error', 'internal_error');
}
