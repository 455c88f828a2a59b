/**
 * Syntactic Category Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireAuth, requireEditor } from '@/middleware/auth';
import { getDb } from '@/db/client';
import {
  createSyntacticCategory,
  deleteSyntacticCategory,
  getSyntacticCategory,
  listSyntacticCategories,
  updateSyntacticCategory,
} from '@/services/syntacticCategory.service';
import { indexQuerySchema, resourceId, throwOnInvalid } from '@/validators/common';
import { syntacticCategoryBodySchema } from '@/validators/syntacticCategories';

const syntacticCategories = new Hono<HonoEnv>();

const notFound = (id: string) => `There is no syntactic category with id ${id}`;

syntacticCategories.get(
  '/',
  requireAuth,
  zValidator('query', indexQuerySchema, throwOnInvalid),
  async (c) => {
    return c.json(await listSyntacticCategories(getDb(), c.req.valid('query')));
  }
);

syntacticCategories.post(
  '/',
  requireEditor,
  zValidator('json', syntacticCategoryBodySchema, throwOnInvalid),
  async (c) => {
    return c.json(await createSyntacticCategory(getDb(), c.req.valid('json')));
  }
);

// Categories have no related data to offer
syntacticCategories.get('/new', requireEditor, (c) => c.json({}));

syntacticCategories.put(
  '/:id',
  requireEditor,
  zValidator('json', syntacticCategoryBodySchema, throwOnInvalid),
  async (c) => {
    const id = resourceId(c.req.param('id'), notFound);
    return c.json(await updateSyntacticCategory(getDb(), id, c.req.valid('json')));
  }
);

syntacticCategories.delete('/:id', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await deleteSyntacticCategory(getDb(), id));
});

syntacticCategories.get('/:id', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await getSyntacticCategory(getDb(), id));
});

syntacticCategories.get('/:id/edit', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  const syntacticCategory = await getSyntacticCategory(getDb(), id);
  return c.json({ syntactic_category: syntacticCategory, data: {} });
});

export default syntacticCategories;
