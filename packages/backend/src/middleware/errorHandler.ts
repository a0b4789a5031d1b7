import { Request, Response, NextFunction } from 'express';

export class HttpError extends Error {
  constructor(public status: number, message: string, public details?: string[]) {
    super(message);
    this.name = 'HttpError';
  }
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

/**
 * Error handling middleware
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : 'Internal server error';
  console.error('Error:', err);

  if (res.headersSent) {
    return;
  }

  res.status(status).json({
    status: 'error',
    error: message || 'Internal server error',
    ...(err instanceof HttpError && err.details ? { details: err.details } : {}),
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({ status: 'error', error: `Not found: ${req.method} ${req.path}` });
}
