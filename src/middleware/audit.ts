import type { NextFunction, Request, Response } from 'express';
import { buildRequestLogContext, logger } from '../utils/logger.js';
import { recordFailedRequest } from '../observability/failureLedger.js';

export function auditLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  res.on('finish', () => {
    const context = buildRequestLogContext(req);
    const route = `${req.method} ${req.baseUrl}${req.route?.path ?? req.path}`.replace(/\/+/g, '/');
    const normalized: unknown = res.locals.normalizedError;
    if (res.statusCode >= 400) {
      const error = isNormalizedError(normalized) ? normalized : { code: 'ERROR', message: 'Error' };
      recordFailedRequest({
        requestId: req.requestId ?? null,
        route,
        status: res.statusCode,
        code: error.code,
        message: error.message,
        at: Date.now()
      });
    }
    logger.info('request.completed', {
      ...context,
      status: res.statusCode,
      duration_ms: Date.now() - startedAt
    });
  });

  return next();
}

function isNormalizedError(value: unknown): value is { code: string; message: string } {
  return typeof value === 'object'
    && value !== null
    && 'code' in value
    && typeof value.code === 'string'
    && 'message' in value
    && typeof value.message === 'string';
}
