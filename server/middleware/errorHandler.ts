import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";

export interface ProblemDetail {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance: string;
  [key: string]: unknown;
}

export class AppError extends Error {
  constructor(
    public status: number,
    public title: string,
    public detail: string,
    public type: string = 'about:blank',
    public extra?: Record<string, unknown>
  ) {
    super(detail);
    this.name = 'AppError';
  }
}

export const badRequest = (detail: string) => new AppError(400, 'Bad Request', detail);
export const unauthorized = (detail: string) => new AppError(401, 'Unauthorized', detail);
export const forbidden = (detail: string) => new AppError(403, 'Forbidden', detail);
export const notFound = (detail: string) => new AppError(404, 'Not Found', detail);
export const conflict = (detail: string) => new AppError(409, 'Conflict', detail);

export const UNIQUE_VIOLATION = '23505';
export const FOREIGN_KEY_VIOLATION = '23503';

export interface DatabaseError {
  code: string;
  detail?: string;
  constraint_name?: string;
}

export function isDatabaseError(err: unknown): err is DatabaseError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    /^[0-9A-Z]{5}$/.test(err.code)
  );
}

/**
 * Pulls the offending column out of a postgres error detail such as
 * `Key (brand_id)=(12) is not present in table "brands".`
 */
export function offendingColumn(err: DatabaseError): string | undefined {
  const match = err.detail?.match(/^Key \(([^)]+)\)=/);
  return match?.[1];
}

export interface IntegrityMessages {
  /** column -> 409 detail */
  unique?: Record<string, string>;
  /** column -> 400 detail */
  foreignKey?: Record<string, string>;
}

/**
 * Maps unique and foreign key violations to resource specific AppErrors.
 * Anything else is returned untouched so the caller can rethrow it.
 */
export function translateIntegrityError(err: unknown, messages: IntegrityMessages): unknown {
  if (!isDatabaseError(err)) return err;

  const column = offendingColumn(err);
  if (err.code === UNIQUE_VIOLATION) {
    const detail = column ? messages.unique?.[column] : undefined;
    return conflict(detail ?? 'A resource with this identifier already exists');
  }
  if (err.code === FOREIGN_KEY_VIOLATION) {
    const detail = column ? messages.foreignKey?.[column] : undefined;
    return badRequest(detail ?? `Data integrity error: ${err.detail ?? 'referenced resource does not exist'}`);
  }
  return err;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return undefined;
}

export function toProblemDetail(err: unknown, instance: string): ProblemDetail {
  if (err instanceof AppError) {
    return {
      type: err.type,
      title: err.title,
      status: err.status,
      detail: err.detail,
      instance,
      ...err.extra,
    };
  }

  if (err instanceof ZodError) {
    return {
      type: 'about:blank',
      title: 'Validation Error',
      status: 400,
      detail: 'Request validation failed',
      instance,
      errors: err.issues,
    };
  }

  if (isDatabaseError(err) && err.code === UNIQUE_VIOLATION) {
    return {
      type: 'about:blank',
      title: 'Duplicate Resource',
      status: 409,
      detail: 'A resource with this identifier already exists',
      instance,
    };
  }

  if (isDatabaseError(err) && err.code === FOREIGN_KEY_VIOLATION) {
    return {
      type: 'about:blank',
      title: 'Reference Error',
      status: 400,
      detail: 'Referenced resource does not exist',
      instance,
    };
  }

  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 600) {
    // body-parser and friends set .status on their errors
    return {
      type: 'about:blank',
      title: status === 404 ? 'Not Found' : status === 400 ? 'Bad Request' : 'Error',
      status,
      detail: err instanceof Error && err.message ? err.message : 'An error occurred',
      instance,
    };
  }

  return {
    type: 'about:blank',
    title: 'Internal Server Error',
    status: 500,
    detail: 'An unexpected error occurred',
    instance,
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  const problemDetail = toProblemDetail(err, req.url);

  if (problemDetail.status >= 500) {
    console.error(`[error] ${req.method} ${req.url}:`, err);
  }

  res
    .status(problemDetail.status)
    .type('application/problem+json')
    .json(problemDetail);
}

export function notFoundHandler(req: Request, res: Response) {
  res
    .status(404)
    .type('application/problem+json')
    .json({
      type: 'about:blank',
      title: 'Not Found',
      status: 404,
      detail: `No resource found at ${req.path}`,
      instance: req.url,
    });
}
