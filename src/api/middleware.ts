/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { EngineError, TypedError, ValidationError, apiError, createTypedError, errorMessage } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** Log one line per completed request. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Map a typed error to its HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'VALIDATION.GRAPH_INVALID' || error.code === 'VALIDATION.UNRESOLVED_AGENT') return 422;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.endsWith('INVALID_TRANSITION')) return 409;
  return 500;
}

/** Send an engine error as a JSON error body. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof EngineError) {
    const typedError = err.typedError;
    const status = err instanceof ValidationError ? 422 : getHttpStatus(typedError);
    log.warn('Request error', { code: typedError.code, status });
    res.status(status).json(apiError(typedError));
    return;
  }

  log.error('Unhandled request error', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: errorMessage(err) || 'Internal server error',
        retryable: false,
      }),
    ),
  );
}

/** Global error handling middleware; also catches malformed JSON bodies. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SyntaxError) {
    res.status(400).json(
      apiError(
        createTypedError({
          code: 'VALIDATION.MALFORMED_BODY',
          message: `Request body is not valid JSON: ${err.message}`,
          retryable: false,
          classification: 'validation',
        }),
      ),
    );
    return;
  }
  sendError(res, err);
}
