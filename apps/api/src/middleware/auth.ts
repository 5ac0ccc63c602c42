import { createHash, timingSafeEqual } from 'crypto';
import type { Context, Next } from 'hono';
import { logger } from '../logger';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function keysMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Require `Authorization: Bearer <key>` (or `ApiKey <key>`) matching the
 * configured key.
 */
export function apiKeyAuth(expected: string) {
  return async (c: Context, next: Next) => {
    const authHeader = c.req.header('Authorization');

    if (!authHeader) {
      return c.json({ error: 'Missing Authorization header' }, 401);
    }

    const parts = authHeader.split(' ');
    if (parts.length !== 2) {
      return c.json({ error: 'Invalid Authorization header format' }, 401);
    }

    const [scheme, key] = parts;
    if (scheme !== 'Bearer' && scheme !== 'ApiKey') {
      return c.json({ error: 'Invalid Authorization scheme. Use "Bearer" or "ApiKey"' }, 401);
    }

    if (!keysMatch(key, expected)) {
      logger.warn({ path: c.req.path }, 'Rejected request with invalid API key');
      return c.json({ error: 'Invalid API key' }, 401);
    }

    await next();
  };
}
