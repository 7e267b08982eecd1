import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.header(name)?.trim();
  return value ? value : undefined;
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const headerTraceId = headerValue(req, 'x-trace-id');
  const requestId = headerValue(req, 'x-request-id') ?? headerTraceId ?? crypto.randomUUID();
  const traceId = headerTraceId ?? requestId;

  req.requestId = requestId;
  req.traceId = traceId;
  res.setHeader('x-trace-id', traceId);
  res.setHeader('x-request-id', requestId);
  return next();
}
