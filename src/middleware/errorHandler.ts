import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ErrorHandler' });

// body-parser marks its own errors with `type` and `status`
function isBodyParseError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'type' in err &&
    err.type === 'entity.parse.failed' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    const level = err.statusCode >= 500 ? 'error' : 'warn';
    logger[level](
      { err, code: err.code, path: req.path, method: req.method },
      err.message
    );

    const details = err.details;
    res.status(err.statusCode).json({
      error: err.code,
      message: err.message,
      ...(details !== undefined ? { details } : {})
    });
    return;
  }

  if (isBodyParseError(err)) {
    logger.warn({ path: req.path, method: req.method }, 'Malformed request body');
    res.status(400).json({ error: 'validation_error', message: 'Malformed request body' });
    return;
  }

  logger.error(
    {
      err,
      path: req.path,
      method: req.method
    },
    'Unhandled error'
  );

  res.status(500).json({
    error: 'internal_server_error',
    message: err instanceof Error ? err.message : 'Internal server error'
  });
}
