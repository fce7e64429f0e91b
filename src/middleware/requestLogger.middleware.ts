import type { Request, Response, NextFunction } from 'express';

type RequestLogEntry = {
  event: 'http_request' | 'http_request_aborted';
  requestId?: string;
  method: string;
  path: string;
  status?: number;
  durationMs: number;
  bytesIn: number;
  actorId?: string;
  ip?: string;
  timestamp: string;
};

// Probes are logged only when they fail.
const PROBE_PATHS = new Set(['/health/live', '/health/ready']);

function writeEntry(entry: RequestLogEntry) {
  const line = JSON.stringify(entry);
  if (entry.status === undefined || entry.status >= 500) {
    console.error(line);
  } else if (entry.status >= 400) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);
  const path = req.originalUrl.split('?')[0];

  const baseEntry = (): Omit<RequestLogEntry, 'event'> => ({
    requestId: req.requestId,
    method: req.method,
    path,
    durationMs: Date.now() - start,
    bytesIn,
    actorId: req.auth?.userId,
    ip: req.ip,
    timestamp: new Date().toISOString()
  });

  res.on('finish', () => {
    if (PROBE_PATHS.has(path) && res.statusCode < 400) return;
    writeEntry({ event: 'http_request', ...baseEntry(), status: res.statusCode });
  });

  res.on('close', () => {
    if (res.writableFinished) return;
    writeEntry({ event: 'http_request_aborted', ...baseEntry() });
  });

  next();
}
