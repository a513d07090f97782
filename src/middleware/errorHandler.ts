import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors';

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const timestamp = new Date().toISOString();

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`[http] ${req.method} ${req.path} failed:`, error);
    }
    res.status(error.statusCode).json({ error: error.message, code: error.code, timestamp });
    return;
  }

  // express.json() rejects malformed bodies with a 400-class error
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR', timestamp });
    return;
  }

  console.error(`[http] Unhandled error in ${req.method} ${req.path}:`, error);
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR', timestamp });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
