import { Response } from 'express';
import { logger } from './logging';

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static noContent(res: Response): Response {
    return res.status(204).send();
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    },
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    logger.warn(`[API Error] ${message}`, {
      statusCode,
      code: error?.code,
    });

    return res.status(statusCode).json(response);
  }

  static badRequest(res: Response, message: string = 'Bad request', details?: unknown): Response {
    return this.error(res, message, 400, {
      code: 'BAD_REQUEST',
      details,
    });
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid request data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static unauthorized(res: Response, message: string = 'Could not validate credentials'): Response {
    res.setHeader('WWW-Authenticate', 'Bearer');
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
    });
  }

  static forbidden(
    res: Response,
    message: string = 'You do not have permission to perform this action'
  ): Response {
    return this.error(res, message, 403, {
      code: 'FORBIDDEN',
    });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  static tooManyRequests(
    res: Response,
    message: string = 'Too many requests',
    retryAfter?: number
  ): Response {
    if (retryAfter) {
      res.setHeader('Retry-After', retryAfter.toString());
    }
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  /**
   * The underlying error is logged, never returned to the client.
   */
  static internalError(res: Response, error?: unknown): Response {
    logger.error('[Internal Server Error]', {
      error: error instanceof Error ? error.stack || error.message : error,
    });

    return this.error(res, 'Internal server error', 500, {
      code: 'INTERNAL_ERROR',
    });
  }
}
