/**
 * Form Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { currentUser, requireAuth, requireEditor } from '@/middleware/auth';
import { getDb } from '@/db/client';
import {
  createForm,
  deleteForm,
  getForm,
  listForms,
  searchForms,
  updateForm,
} from '@/services/form.service';
import { indexQuerySchema, resourceId, searchBodySchema, throwOnInvalid } from '@/validators/common';
import { formBodySchema } from '@/validators/forms';

const forms = new Hono<HonoEnv>();

const notFound = (id: string) => `There is no form with id ${id}`;

forms.get('/', requireAuth, zValidator('query', indexQuerySchema, throwOnInvalid), async (c) => {
  return c.json(await listForms(getDb(), c.req.valid('query')));
});

/**
 * POST /forms/search
 *
 * Body: {query: {filter, order_by?}, paginator?}
 */
forms.post('/search', requireAuth, zValidator('json', searchBodySchema, throwOnInvalid), async (c) => {
  const { query, paginator } = c.req.valid('json');
  return c.json(await searchForms(getDb(), query, paginator));
});

forms.post('/', requireEditor, zValidator('json', formBodySchema, throwOnInvalid), async (c) => {
  return c.json(await createForm(getDb(), c.req.valid('json'), currentUser(c)));
});

forms.get('/:id', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await getForm(getDb(), id));
});

forms.put('/:id', requireEditor, zValidator('json', formBodySchema, throwOnInvalid), async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await updateForm(getDb(), id, c.req.valid('json'), currentUser(c)));
});

forms.delete('/:id', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await deleteForm(getDb(), id));
});

export default forms;
