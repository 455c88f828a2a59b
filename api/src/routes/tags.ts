/**
 * Tag Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireAuth, requireEditor } from '@/middleware/auth';
import { getDb } from '@/db/client';
import { createTag, deleteTag, getTag, listTags, updateTag } from '@/services/tag.service';
import { indexQuerySchema, resourceId, throwOnInvalid } from '@/validators/common';
import { tagBodySchema } from '@/validators/tags';

const tags = new Hono<HonoEnv>();

const notFound = (id: string) => `There is no tag with id ${id}`;

tags.get('/', requireAuth, zValidator('query', indexQuerySchema, throwOnInvalid), async (c) => {
  return c.json(await listTags(getDb(), c.req.valid('query')));
});

tags.post('/', requireEditor, zValidator('json', tagBodySchema, throwOnInvalid), async (c) => {
  return c.json(await createTag(getDb(), c.req.valid('json')));
});

tags.get('/:id', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await getTag(getDb(), id));
});

tags.put('/:id', requireEditor, zValidator('json', tagBodySchema, throwOnInvalid), async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await updateTag(getDb(), id, c.req.valid('json')));
});

tags.delete('/:id', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await deleteTag(getDb(), id));
});

export default tags;
