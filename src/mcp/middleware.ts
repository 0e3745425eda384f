import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

import debug from '../../util/debug.js';
import type { RequestMetrics } from '../metrics.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';
export const PROCESS_TIME_HEADER = 'X-Process-Time';

const formatSeconds = (ms: number) => (ms / 1000).toFixed(3);

export const requestTracking = () => (req: Request, res: Response, next: NextFunction) => {
  const requestId = randomUUID();
  const startedAt = Date.now();
  res.locals.requestId = requestId;
  res.locals.startedAt = startedAt;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  debug.http(`[${requestId}] ${req.method} ${req.originalUrl}`);
  res.on('close', () => {
    const elapsed = formatSeconds(Date.now() - startedAt);
    if (res.writableFinished) {
      debug.http(`[${requestId}] ${res.statusCode} in ${elapsed}s`);
    } else {
      debug.http(`[${requestId}] client went away after ${elapsed}s`);
    }
  });
  next();
};

/** Must run before the response headers go out. */
export const stampProcessTime = (res: Response) => {
  const startedAt: unknown = res.locals.startedAt;
  if (typeof startedAt !== 'number' || res.headersSent) return;
  res.setHeader(PROCESS_TIME_HEADER, formatSeconds(Date.now() - startedAt));
};

export const collectMetrics =
  (metrics: RequestMetrics) => (_req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    let recorded = false;
    const record = (aborted: boolean) => {
      if (recorded) return;
      recorded = true;
      metrics.requestFinished(res.statusCode, Date.now() - startedAt, aborted);
    };

    metrics.requestStarted();
    res.on('finish', () => record(false));
    res.on('close', () => record(!res.writableFinished));
    next();
  };
