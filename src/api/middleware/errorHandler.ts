import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { AppError } from '../../utils/errors';
import { logError } from '../../utils/logger';
import { sanitizeErrorMessage } from '../../utils/pathSecurity';

export interface ErrorHandlerOptions {
  /** Base paths replaced before a message leaves the process */
  redactPaths?: string[];
  /** Include messages and stacks of unexpected errors */
  exposeInternalErrors?: boolean;
}

/**
 * Global error handling middleware
 */
export const createErrorHandler = (options: ErrorHandlerOptions = {}): ErrorRequestHandler => {
  const redactPaths = options.redactPaths ?? [];

  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    logError(err, {
      method: req.method,
      path: req.path,
      query: req.query,
    });

    // Response may already be sent, check before sending
    if (res.headersSent) {
      return;
    }

    // Handle known application errors
    if (err instanceof AppError) {
      res.status(err.statusCode).json({
        success: false,
        error: {
          code: err.code,
          message: sanitizeErrorMessage(err.message, redactPaths),
          ...(err.details !== undefined ? { details: err.details } : {}),
        },
      });
      return;
    }

    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request body is not valid JSON',
        },
      });
      return;
    }

    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: options.exposeInternalErrors
          ? sanitizeErrorMessage(err.message, redactPaths)
          : 'Internal server error',
        ...(options.exposeInternalErrors ? { stack: err.stack } : {}),
      },
    });
  };
};

/**
 * 404 handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
};
