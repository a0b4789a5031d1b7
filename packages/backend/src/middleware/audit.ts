import { Request, Response, NextFunction } from 'express';

/**
 * Audit logging middleware
 */
export function auditLog(req: Request, res: Response, next: NextFunction) {
  const timestamp = new Date().toISOString();
  const method = req.method;
  const path = req.path;
  const ip = req.ip || req.socket.remoteAddress;

  if (['POST', 'PUT', 'DELETE'].includes(method)) {
    const startedAt = Date.now();
    console.log(`[AUDIT] ${timestamp} - ${method} ${path} - IP: ${ip}`);
    res.on('finish', () => {
      console.log(`[AUDIT] ${method} ${path} -> ${res.statusCode} in ${Date.now() - startedAt}ms`);
    });
  }

  next();
}
