// node/src/middleware/correlation.ts — correlation ID carried through logs and responses
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id');
  const correlationId = headerId && headerId.trim() ? headerId.trim() : randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);
  next();
}

export function getCorrelationId(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}
