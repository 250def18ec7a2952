import type { NextFunction, Request, Response } from 'express';
import { HttpError } from '../types.js';

// body-parser rejects malformed JSON with a SyntaxError carrying status 400.
function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) return 400;
  return 500;
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, `Route not found: ${req.method} ${req.path}`));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  if (status >= 500) {
    console.error(`[error] ${req.method} ${req.path}:`, err);
  }
  const message = status >= 500 || !(err instanceof Error) ? 'Unexpected server error' : err.message;
  res.status(status).json({ error: message });
}
