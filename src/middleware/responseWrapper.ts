import type { NextFunction, Request, Response } from 'express';
import { wrapJsonResponse } from '../utils/response.js';

/** Every JSON body leaves as `{ request_id, data }` or `{ request_id, error }`. */
export function responseWrapper(req: Request, res: Response, next: NextFunction) {
  const sendJson = res.json.bind(res);
  res.json = (body: unknown) => sendJson(wrapJsonResponse(req, res, body));
  next();
}
