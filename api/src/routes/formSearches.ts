/**
 * Form Search Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { currentUser, requireAuth, requireEditor } from '@/middleware/auth';
import { getDb } from '@/db/client';
import {
  createFormSearch,
  deleteFormSearch,
  getFormSearch,
  listFormSearches,
} from '@/services/formSearch.service';
import { indexQuerySchema, resourceId, throwOnInvalid } from '@/validators/common';
import { formSearchBodySchema } from '@/validators/formSearches';

const formSearches = new Hono<HonoEnv>();

const notFound = (id: string) => `There is no form search with id ${id}`;

formSearches.get('/', requireAuth, zValidator('query', indexQuerySchema, throwOnInvalid), async (c) => {
  return c.json(await listFormSearches(getDb(), c.req.valid('query')));
});

formSearches.post(
  '/',
  requireEditor,
  zValidator('json', formSearchBodySchema, throwOnInvalid),
  async (c) => {
    return c.json(await createFormSearch(getDb(), c.req.valid('json'), currentUser(c)));
  }
);

formSearches.get('/:id', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await getFormSearch(getDb(), id));
});

formSearches.delete('/:id', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await deleteFormSearch(getDb(), id));
});

export default formSearches;
