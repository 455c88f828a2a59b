/**
 * Corpus Routes
 *
 * Reads need any authenticated user; writes need an administrator or
 * contributor. Exported files are served gzip-compressed.
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { currentUser, requireAuth, requireEditor } from '@/middleware/auth';
import { getDb } from '@/db/client';
import {
  createCorpus,
  deleteCorpus,
  findCorpus,
  getCorpus,
  getCorpusHistory,
  listCorpora,
  searchCorpora,
  updateCorpus,
} from '@/services/corpus.service';
import { serveCorpusFile, writeCorpusToFile } from '@/services/corpusFile.service';
import { CORPUS_FORMAT_NAMES } from '@/services/corpusFormats';
import {
  getLatestFormSearchModification,
  listFormSearchMinis,
} from '@/services/formSearch.service';
import { resolveData } from '@/services/newEditData';
import { getLatestTagModification, listTagMinis } from '@/services/tag.service';
import { getLatestUserModification, listUserMinis } from '@/services/user.service';
import { indexQuerySchema, resourceId, searchBodySchema, throwOnInvalid } from '@/validators/common';
import { corpusBodySchema, writeToFileSchema } from '@/validators/corpora';

const corpora = new Hono<HonoEnv>();

const notFound = (id: string) => `There is no corpus with id ${id}`;

/**
 * 404 for a missing corpus before its request body is validated
 */
const existingCorpus: MiddlewareHandler<HonoEnv, '/:id'> = async (c, next) => {
  await findCorpus(getDb(), resourceId(c.req.param('id'), notFound));
  await next();
};

/**
 * Lists offered to a client building a corpus form
 */
async function getNewEditData(params: Record<string, string | undefined>) {
  const db = getDb();
  const [form_searches, users, tags] = await Promise.all([
    resolveData(params.form_searches, {
      all: () => listFormSearchMinis(db),
      latestModification: () => getLatestFormSearchModification(db),
    }),
    resolveData(params.users, {
      all: () => listUserMinis(db),
      latestModification: () => getLatestUserModification(db),
    }),
    resolveData(params.tags, {
      all: () => listTagMinis(db),
      latestModification: () => getLatestTagModification(db),
    }),
  ]);
  return { form_searches, users, tags, corpus_formats: [...CORPUS_FORMAT_NAMES] };
}

/**
 * GET /corpora
 */
corpora.get('/', requireAuth, zValidator('query', indexQuerySchema, throwOnInvalid), async (c) => {
  return c.json(await listCorpora(getDb(), c.req.valid('query')));
});

/**
 * POST /corpora/search
 *
 * Body: {query: {filter, order_by?}, paginator?}
 */
corpora.post('/search', requireAuth, zValidator('json', searchBodySchema, throwOnInvalid), async (c) => {
  const { query, paginator } = c.req.valid('json');
  return c.json(await searchCorpora(getDb(), query, paginator));
});

/**
 * POST /corpora
 */
corpora.post('/', requireEditor, zValidator('json', corpusBodySchema, throwOnInvalid), async (c) => {
  const corpus = await createCorpus(getDb(), c.req.valid('json'), currentUser(c));
  return c.json(corpus);
});

/**
 * GET /corpora/new
 */
corpora.get('/new', requireEditor, async (c) => {
  return c.json(await getNewEditData(c.req.query()));
});

/**
 * PUT /corpora/:id
 */
corpora.put(
  '/:id',
  requireEditor,
  existingCorpus,
  zValidator('json', corpusBodySchema, throwOnInvalid),
  async (c) => {
    const id = resourceId(c.req.param('id'), notFound);
    const corpus = await updateCorpus(getDb(), id, c.req.valid('json'), currentUser(c));
    return c.json(corpus);
  }
);

/**
 * DELETE /corpora/:id
 */
corpora.delete('/:id', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await deleteCorpus(getDb(), id, currentUser(c)));
});

/**
 * GET /corpora/:id
 */
corpora.get('/:id', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  return c.json(await getCorpus(getDb(), id));
});

/**
 * GET /corpora/:id/edit
 */
corpora.get('/:id/edit', requireEditor, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  const corpus = await getCorpus(getDb(), id);
  return c.json({ corpus, data: await getNewEditData(c.req.query()) });
});

/**
 * GET /corpora/:id/history
 *
 * :id is an integer id or a UUID
 */
corpora.get('/:id/history', requireAuth, async (c) => {
  return c.json(await getCorpusHistory(getDb(), c.req.param('id')));
});

/**
 * PUT /corpora/:id/writetofile
 *
 * Body: {format}
 */
corpora.put(
  '/:id/writetofile',
  requireEditor,
  existingCorpus,
  zValidator('json', writeToFileSchema, throwOnInvalid),
  async (c) => {
    const id = resourceId(c.req.param('id'), notFound);
    const { format } = c.req.valid('json');
    return c.json(await writeCorpusToFile(getDb(), id, format, currentUser(c)));
  }
);

/**
 * GET /corpora/:id/servefile/:fileId
 */
corpora.get('/:id/servefile/:fileId', requireAuth, async (c) => {
  const id = resourceId(c.req.param('id'), notFound);
  const { filename, body } = await serveCorpusFile(getDb(), id, c.req.param('fileId'), currentUser(c));
  return c.body(body, 200, {
    'Content-Type': 'application/gzip',
    'Content-Disposition': `attachment; filename="${filename}"`,
  });
});

export default corpora;
