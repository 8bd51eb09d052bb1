import type { ZodError } from 'zod';

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode = 500,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: string[] = []) {
    super(message, 'validation_failed', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'not_found', 404);
  }
}

export class NotReadyError extends AppError {
  constructor(message = 'Service dependencies are not ready') {
    super(message, 'not_ready', 503);
  }
}

/** A write that should have changed state did not; the message must be retried. */
export class PersistenceError extends AppError {
  constructor(message: string) {
    super(message, 'persistence_failed', 500);
  }
}

/** Broker refused a declaration (usually 406 PRECONDITION_FAILED). Fatal at startup. */
export class TopologyError extends AppError {
  constructor(message: string, readonly resource: string) {
    super(message, 'topology_conflict', 500);
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/** One line per zod issue, e.g. `items.0.quantity: Number must be greater than 0`. */
export const zodIssues = (err: ZodError): string[] =>
  err.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : 'body'}: ${issue.message}`);
