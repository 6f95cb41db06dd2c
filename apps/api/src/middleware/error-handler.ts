import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { StorageError } from '@poolwatch/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof StorageError) {
    console.error(`[server] ${err.message}`);
    res.status(err.status).json({ error: 'storage_unavailable', message: err.message });
    return;
  }
  if (err instanceof Error) {
    console.error('[server] unhandled error', err);
    res.status(500).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
