import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { withRequestId } from '../lib/requestContext';

export const REQUEST_ID_HEADER = 'x-request-id';

// an inbound x-request-id is kept as is
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = req.header(REQUEST_ID_HEADER)?.trim() || uuidv4();
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  withRequestId(requestId, next);
}
