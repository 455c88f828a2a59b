/**
 * Security Headers Middleware
 *
 * Responses are JSON or gzip downloads; nothing may be framed or embedded.
 */

import type { Context, Next } from 'hono';

export async function securityHeaders(c: Context, next: Next) {
  c.header('X-Frame-Options', 'DENY');
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
  c.header('Referrer-Policy', 'no-referrer');
  return next();
}
