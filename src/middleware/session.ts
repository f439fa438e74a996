import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';

export const SESSION_HEADER = 'X-Session-Id';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidSessionId(value: unknown): value is string {
  return typeof value === 'string' && SESSION_ID_PATTERN.test(value);
}

/**
 * Express middleware that attaches a session id to every request.
 * Clients send X-Session-Id; a new id is issued and echoed back when
 * the header is missing or malformed.
 */
export function sessionMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.header(SESSION_HEADER);
  const sessionId = isValidSessionId(header) ? header : randomUUID();

  req.sessionId = sessionId;
  res.setHeader(SESSION_HEADER, sessionId);
  next();
}
