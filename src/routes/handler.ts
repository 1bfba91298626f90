/**
 * Route helpers: async handlers, error mapping and request identity.
 */
import type { Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { apiError } from '../models/shared.js';
import { AppError, ValidationError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

export const USER_HEADER = 'x-user-id';
export const ANONYMOUS_USER = 'anonymous';

export function sendError(res: Response, err: unknown): void {
  if (err instanceof AppError) {
    res.status(err.status).json(apiError(err.message, err.code));
    return;
  }
  log.error(`Unhandled error: ${errorMessage(err)}`);
  res.status(500).json(apiError('Internal server error', 'INTERNAL_ERROR'));
}

/** Express 4 does not see rejected promises; route them to sendError. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res) => {
    void handler(req, res).catch((err: unknown) => sendError(res, err));
  };
}

export function userIdOf(req: Request): string {
  const header = req.header(USER_HEADER)?.trim();
  return header ? header : ANONYMOUS_USER;
}

export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new ValidationError(`Invalid request: ${issues.join('; ')}`);
  }
  return parsed.data;
}
