/**
 * OLD API Server
 *
 * Hono server for the Online Linguistic Database REST API:
 * - /corpora, /corpusbackups
 * - /forms, /formsearches
 * - /tags, /syntacticcategories
 */

import 'dotenv/config';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { securityHeaders } from '@/middleware/securityHeaders';
import { corsMiddleware } from '@/middleware/cors';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { authResolver } from '@/middleware/auth';
import corporaRoutes from '@/routes/corpora';
import corpusBackupRoutes from '@/routes/corpusBackups';
import formRoutes from '@/routes/forms';
import formSearchRoutes from '@/routes/formSearches';
import syntacticCategoryRoutes from '@/routes/syntacticCategories';
import tagRoutes from '@/routes/tags';
import { applySchema, closeDatabase } from '@/db/client';
import { getConfig } from '@/utils/config';
import { logger } from '@/utils/logger';
import type { HonoEnv } from '@/types/hono';

// Initialize Hono app
const app = new Hono<HonoEnv>();

// Global middleware chain
app.use('*', securityHeaders);
app.use('*', corsMiddleware);
app.onError(errorHandler);
app.use('*', authResolver);

// Health check endpoint
app.get('/health', (c) => {
  return c.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
  });
});

app.route('/corpora', corporaRoutes);
app.route('/corpusbackups', corpusBackupRoutes);
app.route('/forms', formRoutes);
app.route('/formsearches', formSearchRoutes);
app.route('/syntacticcategories', syntacticCategoryRoutes);
app.route('/tags', tagRoutes);

app.notFound(notFoundHandler);

async function start() {
  const config = getConfig();
  await applySchema();

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  logger.info('OLD API server listening', {
    port: config.port,
    storePath: config.storePath,
    env: config.nodeEnv,
  });

  // Graceful shutdown with request drain
  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    server.close(() => {
      logger.info('HTTP server closed, draining connections');
      closeDatabase()
        .then(() => {
          logger.info('Database connections closed');
          process.exit(0);
        })
        .catch((err) => {
          logger.error('Error closing database', { error: String(err) });
          process.exit(1);
        });
    });
    // Force exit after 10 seconds if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

// Start server (skip in test mode)
if (process.env.NODE_ENV !== 'test') {
  start().catch((error) => {
    logger.error('Failed to start server', { error: String(error) });
    process.exit(1);
  });
}

export default app;
