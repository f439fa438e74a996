/**
 * Request helpers for Express
 */

import type { Request } from 'express';

/**
 * Get session id from request, throwing error if not available
 * Use this after sessionMiddleware to ensure the id is present
 */
export function requireSessionId(req: Request): string {
  if (!req.sessionId) {
    throw new Error('Session id is required but not set on request');
  }
  return req.sessionId;
}

/**
 * Read a boolean form field ("true", "1", "on")
 */
export function parseBooleanField(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return false;
  return ['true', '1', 'on', 'yes'].includes(value.trim().toLowerCase());
}
