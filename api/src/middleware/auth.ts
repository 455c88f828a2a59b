/**
 * Authentication Middleware
 *
 * Resolves the caller from an API key:
 * - Authorization: Bearer <key>
 * - X-API-Key: <key>
 *
 * Sets c.get('user') when the key matches a user. Routes opt in to
 * requireAuth / requireRole.
 */

import type { MiddlewareHandler } from 'hono';
import { getDb } from '@/db/client';
import type { UserRole } from '@/db/schema';
import { findUserByApiKey } from '@/services/user.service';
import type { AuthUser, HonoEnv } from '@/types/hono';
import { UNAUTHENTICATED_MESSAGE, UNAUTHORIZED_MESSAGE } from '@/errors/http';
import { logger } from '@/utils/logger';

function extractApiKey(authorization: string | undefined, apiKeyHeader: string | undefined) {
  if (authorization?.startsWith('Bearer ')) {
    return authorization.substring(7).trim();
  }
  return apiKeyHeader?.trim();
}

/**
 * Authentication resolver middleware
 *
 * Never rejects; unauthenticated requests continue without a user.
 */
export const authResolver: MiddlewareHandler<HonoEnv> = async (c, next) => {
  const apiKey = extractApiKey(c.req.header('Authorization'), c.req.header('X-API-Key'));

  if (apiKey) {
    const user = await findUserByApiKey(getDb(), apiKey);
    if (user) {
      c.set('user', user);
    } else {
      logger.debug('Unknown API key presented', { path: c.req.path });
    }
  }

  return next();
};

/**
 * Require authentication guard (401 without a user)
 */
export const requireAuth: MiddlewareHandler<HonoEnv> = async (c, next) => {
  if (!c.get('user')) {
    c.header('WWW-Authenticate', 'Bearer');
    return c.json({ error: UNAUTHENTICATED_MESSAGE }, 401);
  }
  return next();
};

/**
 * Require one of the given roles (401 without a user, 403 otherwise)
 */
export function requireRole(...roles: UserRole[]): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    const user = c.get('user');
    if (!user) {
      c.header('WWW-Authenticate', 'Bearer');
      return c.json({ error: UNAUTHENTICATED_MESSAGE }, 401);
    }
    if (!roles.includes(user.role)) {
      logger.debug('Role check denied', { userId: user.id, role: user.role, path: c.req.path });
      return c.json({ error: UNAUTHORIZED_MESSAGE }, 403);
    }
    return next();
  };
}

/** Roles allowed to create and modify resources */
export const requireEditor = requireRole('administrator', 'contributor');

/**
 * The authenticated user of a request guarded by requireAuth/requireRole
 */
export function currentUser(c: { get(key: 'user'): AuthUser | undefined }): AuthUser {
  const user = c.get('user');
  if (!user) {
    throw new Error('currentUser() called on a route without an auth guard');
  }
  return user;
}
