import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidTypeError, ParseError } from '../../src/domain/errors.js';
import type { Repository } from './repo.js';

/** A failure that maps straight to an HTTP status */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

/** Validate a request body or query, turning schema issues into a 400 */
export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new HttpError(400, message);
  }
  return result.data;
}

/** Read the bearer token from the Authorization header, if any */
export function bearerToken(req: Request): string | undefined {
  const header = req.get('authorization');
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : undefined;
}

/** Reject requests without a live session; remembers the user id for handlers */
export function requireUser(repo: Repository, now: () => Date): RequestHandler {
  return (req, res, next) => {
    const token = bearerToken(req);
    const userId = token ? repo.findSessionUserId(token, now().getTime()) : undefined;
    if (userId === undefined) {
      res.status(401).json({ status: 'error', error: 'Authentication required.' });
      return;
    }
    res.locals.userId = userId;
    next();
  };
}

/** User id stored by requireUser */
export function currentUserId(res: Response): number {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== 'number') {
    throw new HttpError(401, 'Authentication required.');
  }
  return userId;
}

/** Route parameter as a positive integer id */
export function idParam(req: Request, name = 'id'): number {
  const raw = req.params[name];
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new HttpError(400, `Invalid ${name}: ${raw}`);
  }
  return id;
}

/** One line per request: METHOD path status ms */
export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
    });
    next();
  };
}

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ error: 'Not found' });
};

export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  if (error instanceof HttpError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof ParseError || error instanceof InvalidTypeError) {
    res.status(400).json({ error: error.message });
    return;
  }
  // express.json() rejects malformed bodies with a status already set
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  console.error(`Error handling ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({ error: 'Internal server error' });
};
