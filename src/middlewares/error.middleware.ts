import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (err instanceof MulterError) {
    return ResponseHandler.badRequest(res, err.message, { field: err.field });
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return ResponseHandler.badRequest(res, 'Malformed request body');
  }

  if (err instanceof AppError) {
    if (err.statusCode === 401) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    if (err.statusCode >= 500) {
      logger.error('[Error Handler]', {
        message: err.message,
        url: req.originalUrl,
        method: req.method,
      });
    }
    return ResponseHandler.error(res, err.message, err.statusCode, { code: err.code });
  }

  logger.error('[Error Handler]', {
    message: err instanceof Error ? err.message : String(err),
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });
  return ResponseHandler.internalError(res, err);
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
