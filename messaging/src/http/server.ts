import express, { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError, NotReadyError } from '../errors';
import { logger } from '../logger';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  message: string;
  errors: string[];
}

export const ok = <T>(data: T, message = 'OK'): ApiResponse<T> => ({ success: true, data, message, errors: [] });

export const fail = (message: string, errors: string[] = []): ApiResponse<null> => ({
  success: false,
  data: null,
  message,
  errors,
});

export function createServer(
  serviceName: string,
  liveness: () => Promise<boolean>,
  readiness?: () => Promise<boolean>
): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', async (_req, res) => {
    try {
      const up = await liveness();
      res.status(up ? 200 : 500).json({
        status: up ? 'ok' : 'fail',
        service: serviceName,
        env: process.env.NODE_ENV || 'development',
      });
    } catch (err) {
      logger.warn({ err }, '[HTTP] liveness check threw');
      res.status(500).json({ status: 'fail' });
    }
  });

  app.get('/ready', async (_req, res) => {
    try {
      const ready = await (readiness ?? liveness)();
      res.status(ready ? 200 : 503).json({ status: ready ? 'ready' : 'not_ready' });
    } catch (err) {
      logger.warn({ err }, '[HTTP] readiness check threw');
      res.status(503).json({ status: 'not_ready' });
    }
  });

  return app;
}

/** Forwards rejected promises from async route handlers to the error middleware. */
export const asyncHandler =
  (fn: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch(next);
  };

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(fail(`Route ${req.method} ${req.path} not found`));
}

/**
 * Maps client-facing AppErrors (4xx and not-ready) to their status code and
 * message. Anything else gets a generic message; the error itself is only logged.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && (err.statusCode < 500 || err instanceof NotReadyError)) {
    res.status(err.statusCode).json(fail(err.message, err.details));
    return;
  }
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json(fail('Invalid JSON in request body'));
    return;
  }
  logger.error({ err, method: req.method, path: req.path }, '[HTTP] unhandled error');
  const status = err instanceof AppError ? err.statusCode : 500;
  res.status(status).json(fail('An unexpected error occurred'));
}
