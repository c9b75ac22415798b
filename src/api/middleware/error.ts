import { Request, Response, NextFunction } from 'express';
import { logger } from '../../config/logger';
import { RenderError } from '../../services/conversation/errors';

/**
 * Last handler in the chain: logs the failure and maps it to a status code.
 * Client errors carry their own message; everything else is reported as a
 * failed render.
 */
function statusOf(err: unknown): number {
  if (err instanceof RenderError) return err.statusCode;
  // body-parser marks malformed JSON and oversized bodies with a 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const statusCode = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  logger.error('Request failed', {
    path: req.originalUrl,
    statusCode,
    error: message,
    name: err instanceof Error ? err.name : undefined,
  });

  if (res.headersSent) {
    res.end();
    return;
  }
  if (statusCode < 500) {
    res.status(statusCode).json({ error: message });
    return;
  }
  res.status(statusCode).json({ error: `Render failed: ${message}` });
}
