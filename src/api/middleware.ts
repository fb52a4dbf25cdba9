/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { TypedError, apiError, createTypedError, errorDomain } from '../domain/errors';
import { logger } from '../logger';

/** An error carrying a typed payload (RegistryError, GraphError, ExecutorError, ...). */
interface TypedErrorCarrier {
  typedError: TypedError;
}

export function isTypedErrorCarrier(err: unknown): err is TypedErrorCarrier {
  if (typeof err !== 'object' || err === null || !('typedError' in err)) return false;
  const typed = err.typedError;
  return typeof typed === 'object' && typed !== null && 'code' in typed && typeof typed.code === 'string';
}

/** Map a typed error to its HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND') && errorDomain(error) === 'VALIDATION') return 404;
  switch (errorDomain(error)) {
    case 'VALIDATION':
      return 400;
    case 'GRAPH':
    case 'RUN':
    case 'NODE':
      return 422;
    default:
      return 500;
  }
}

/** Send a typed error with its mapped status. */
export function sendError(res: Response, error: TypedError): void {
  res.status(getHttpStatus(error)).json(apiError(error));
}

/** Log method, path, status and duration of each request. */
export function requestLogger() {
  const log = logger.child({ module: 'http' });
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request handled', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isTypedErrorCarrier(err)) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // Malformed JSON bodies arrive from express.json() as a SyntaxError with status 400.
  if (err instanceof SyntaxError) {
    sendError(res, createTypedError({ code: 'VALIDATION.MALFORMED_JSON', message: err.message }));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}
