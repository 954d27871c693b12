import { Request, Response, NextFunction } from 'express';
import { logApiRequest, logApiResponse } from '../utils/logger';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  logApiRequest({ method: req.method, path: req.path, ip: req.ip });

  res.on('finish', () => {
    logApiResponse({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
    });
  });

  next();
};
