/**
 * CORS Middleware
 *
 * API-key clients (scripts, the SDK, other servers) send no Origin and get
 * a wildcard. Browser origins listed in CORS_ORIGIN (comma-separated) are
 * echoed with credentials; other origins are echoed without them.
 */

import type { Context, Next } from 'hono';
import { getConfig } from '@/utils/config';

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

function allowedOrigins(): string[] {
  const { corsOrigin, nodeEnv } = getConfig();
  const configured = corsOrigin
    ? corsOrigin
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    : [];
  return nodeEnv === 'production' ? configured : [...DEV_ORIGINS, ...configured];
}

export const corsMiddleware = async (c: Context, next: Next) => {
  const origin = c.req.header('Origin');
  const headers: Record<string, string> = {
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-API-Key',
    'Access-Control-Expose-Headers': 'Content-Length, Content-Disposition',
    'Access-Control-Max-Age': '86400',
  };

  if (!origin) {
    headers['Access-Control-Allow-Origin'] = '*';
  } else if (allowedOrigins().includes(origin)) {
    headers['Access-Control-Allow-Origin'] = origin;
    headers['Access-Control-Allow-Credentials'] = 'true';
    headers['Vary'] = 'Origin';
  } else {
    headers['Access-Control-Allow-Origin'] = origin;
    headers['Vary'] = 'Origin';
  }

  // Preflight: answer directly
  if (c.req.method === 'OPTIONS') {
    return new Response(null, { status: 204, headers });
  }

  for (const [key, value] of Object.entries(headers)) {
    c.header(key, value);
  }

  return next();
};
