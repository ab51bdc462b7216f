import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

const CORRELATION_HEADER = 'X-Correlation-Id';

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const correlationId = crypto.randomUUID();
  req.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  const start = Date.now();

  console.log('[API Request]', {
    correlationId,
    method: req.method,
    path: req.path,
    query: req.query,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  });

  // Auth runs after this middleware, so the actor is only known on finish
  res.on('finish', () => {
    console.log('[API Response]', {
      correlationId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      userId: req.auth?.userId,
      role: req.auth?.role,
      duration: `${Date.now() - start}ms`,
    });
  });

  next();
}
