/**
 * Corpus Backup Routes
 *
 * Read-only: backups are written by corpus updates and deletes. Write verbs
 * answer 404 whether or not the caller is authenticated.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { Context } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { requireAuth } from '@/middleware/auth';
import { getDb } from '@/db/client';
import { READ_ONLY_MESSAGE } from '@/errors/http';
import { getCorpusBackup, listCorpusBackups } from '@/services/corpusBackup.service';
import { indexQuerySchema, resourceId, throwOnInvalid } from '@/validators/common';

const corpusBackups = new Hono<HonoEnv>();

const readOnly = (c: Context<HonoEnv>) => c.json({ error: READ_ONLY_MESSAGE }, 404);

corpusBackups.post('/', readOnly);
corpusBackups.get('/new', readOnly);
corpusBackups.put('/:id', readOnly);
corpusBackups.delete('/:id', readOnly);
corpusBackups.get('/:id/edit', readOnly);

/**
 * GET /corpusbackups
 */
corpusBackups.get('/', requireAuth, zValidator('query', indexQuerySchema, throwOnInvalid), async (c) => {
  return c.json(await listCorpusBackups(getDb(), c.req.valid('query')));
});

/**
 * GET /corpusbackups/:id
 */
corpusBackups.get('/:id', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), (raw) => `There is no corpus backup with id ${raw}`);
  return c.json(await getCorpusBackup(getDb(), id));
});

export default corpusBackups;
