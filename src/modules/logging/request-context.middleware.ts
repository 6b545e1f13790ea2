import type { RequestHandler } from 'express';
import { randomUUID } from 'node:crypto';

import { AppLogger } from './app-logger.service';

/**
 * Opens the correlation context for the whole request, ahead of guards,
 * so every log line carries the request id. AccessGuard adds the caller.
 */
export function requestContextMiddleware(logger: AppLogger): RequestHandler {
  return (req, res, next) => {
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();
    res.setHeader('X-Request-Id', requestId);

    logger.runWithContext(
      {
        requestId,
        method: req.method,
        path: req.originalUrl ?? req.url,
        authType: 'public',
        startTime: Date.now(),
      },
      () => next(),
    );
  };
}
