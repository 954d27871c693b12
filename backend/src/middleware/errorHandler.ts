import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { logError } from '../utils/logger';

export class AppError extends Error {
  public statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(new AppError(`Route not found: ${req.method} ${req.path}`, 404));
};

// Express recognises error middleware by its four parameters
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof multer.MulterError) {
    return res.status(400).json({ status: 'error', message: err.message });
  }

  // express.json() parse failures carry their own status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ status: 'error', message: 'Malformed JSON body' });
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logError('Request failed', err, { method: req.method, path: req.path });
    }
    return res.status(err.statusCode).json({ status: 'error', message: err.message });
  }

  logError('Unhandled error', err, { method: req.method, path: req.path });

  const message = process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message;
  return res.status(500).json({ status: 'error', message });
};
