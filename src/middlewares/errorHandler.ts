import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new ApiError(404, 'Route not found'));
};

// Express recognises error middleware by arity, so `_next` has to stay.
export const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof ApiError) {
    if (err.statusCode >= 500) {
      console.error(`❌ ${err.message}`, err.details ?? '');
    }
    res.status(err.statusCode).json({
      success: false,
      error: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({ success: false, error: err.message });
    return;
  }

  // body-parser marks malformed payloads with a 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({ success: false, error: err.message });
    return;
  }

  console.error('❌ Unhandled error:', err);
  res.status(500).json({ success: false, error: 'Internal server error' });
};
