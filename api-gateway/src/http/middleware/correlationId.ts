import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const CORRELATION_HEADER = 'x-correlation-id';

/** Reuses the caller's correlation id or mints one, and echoes it on the response. */
export function correlationId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header(CORRELATION_HEADER)?.trim();
  const id = incoming || uuidv4();
  req.headers[CORRELATION_HEADER] = id;
  res.setHeader(CORRELATION_HEADER, id);
  res.locals.correlationId = id;
  next();
}

export function correlationIdOf(res: Response): string {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : uuidv4();
}
