/**
 * Integration Tests - Corpus API Endpoints
 *
 * Tests:
 * - GET/POST /corpora, GET/PUT/DELETE /corpora/:id
 * - GET /corpora/new, GET /corpora/:id/edit
 * - POST /corpora/search
 * - GET /corpora/:id/history
 */

import { existsSync } from 'fs';
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { corporaForms } from '@/db/schema';
import { NOT_NEW_MESSAGE, UNAUTHENTICATED_MESSAGE, UNAUTHORIZED_MESSAGE } from '@/errors/http';
import type { CorpusDict, CorpusHistory } from '@/services/corpus.service';
import { corpusDirectory } from '@/services/corpusStore';
import type { PaginatedResult } from '@/services/listing';
import type { TagDict } from '@/services/tag.service';
import type { UserMini, TagMini, FormSearchMini } from '@/db/schema';
import {
  createTestForm,
  createTestTag,
  getTestDb,
  resetTestDatabase,
  seedUsers,
  setupTestDatabase,
  teardownTestDatabase,
  type TestUsers,
} from '../../helpers/db';
import { json, request } from '../../helpers/app';

interface NewEditData {
  form_searches: FormSearchMini[];
  users: UserMini[];
  tags: TagMini[];
  corpus_formats: string[];
}

describe('Corpora API Integration Tests', () => {
  let users: TestUsers;

  beforeAll(async () => {
    await setupTestDatabase();
  });

  afterAll(async () => {
    await teardownTestDatabase();
  });

  beforeEach(async () => {
    await resetTestDatabase();
    users = await seedUsers();
  });

  async function createCorpus(body: Record<string, unknown>, user = users.contributor) {
    const response = await request('/corpora', { method: 'POST', user, body });
    return { response, body: await json<CorpusDict>(response) };
  }

  describe('POST /corpora', () => {
    it('should create a corpus from referenced forms', async () => {
      const formOne = await createTestForm(users.contributor.user, { transcription: 'one' });
      const formTwo = await createTestForm(users.contributor.user, { transcription: 'two' });
      const tagId = await createTestTag('semantics');

      const { response, body } = await createCorpus({
        name: 'Corpus of Numbers',
        description: 'Counting words',
        content: `form[${formOne}] form[${formTwo}] form[${formOne}]`,
        tags: [tagId],
      });

      expect(response.status).toBe(200);
      expect(body.id).toBe(1);
      expect(body.name).toBe('Corpus of Numbers');
      expect(body.description).toBe('Counting words');
      expect(body.content).toBe('form[1] form[2] form[1]');
      expect(body.UUID).toMatch(/^[0-9a-f-]{36}$/);
      expect(body.tags).toEqual([{ id: tagId, name: 'semantics' }]);
      expect(body.form_search).toBeNull();
      expect(body.files).toEqual([]);
      expect(body.enterer).toEqual({
        id: users.contributor.user.id,
        first_name: 'Cory',
        last_name: 'Contributor',
        role: 'contributor',
      });
      expect(body.modifier).toEqual(body.enterer);
      expect(body.datetime_entered).toBe(body.datetime_modified);

      const rows = await getTestDb()
        .select({ formId: corporaForms.formId })
        .from(corporaForms)
        .where(eq(corporaForms.corpusId, body.id))
        .orderBy(corporaForms.formId);
      expect(rows).toEqual([{ formId: 1 }, { formId: 2 }]);
    });

    it('should create the corpus file directory', async () => {
      const { body } = await createCorpus({ name: 'Empty' });

      expect(existsSync(corpusDirectory(body.id))).toBe(true);
    });

    it('should default absent optional fields', async () => {
      const { body } = await createCorpus({
        name: 'Bare',
        description: null,
        content: null,
        form_search: null,
        tags: null,
      });

      expect(body.description).toBe('');
      expect(body.content).toBe('');
      expect(body.tags).toEqual([]);
    });

    it('should require a name', async () => {
      const { response, body } = await createCorpus({ content: '' });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { name: 'Please enter a value' } });
    });

    it('should reject a name longer than 255 characters', async () => {
      const { response, body } = await createCorpus({ name: 'x'.repeat(256) });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { name: 'Enter a value not more than 255 characters long' } });
    });

    it('should measure the name length after decomposition', async () => {
      // 200 precomposed characters decompose into 400 code points
      const { response, body } = await createCorpus({ name: '\u00e9'.repeat(200) });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { name: 'Enter a value not more than 255 characters long' } });
    });

    it('should report a form reference beyond the id range as missing', async () => {
      const { response, body } = await createCorpus({ name: 'Huge', content: 'form[3000000000]' });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { content: 'There is no form with id 3000000000.' } });
    });

    it('should reject tag ids beyond the id range', async () => {
      const { response, body } = await createCorpus({ name: 'Huge', tags: [3000000000] });

      expect(response.status).toBe(400);
      expect(body).toEqual({
        errors: { 'tags.0': 'Please enter an integer id less than or equal to 2147483647' },
      });
    });

    it('should reject a form search id beyond the id range', async () => {
      const { response, body } = await createCorpus({ name: 'Huge', form_search: 3000000000 });

      expect(response.status).toBe(400);
      expect(body).toEqual({
        errors: { form_search: 'Please enter an integer id less than or equal to 2147483647' },
      });
    });

    it('should report every invalid reference together', async () => {
      await createCorpus({ name: 'Taken' });

      const { response, body } = await createCorpus({
        name: 'Taken',
        content: 'form[99] and form[98]',
        tags: [42],
        form_search: 7,
      });

      expect(response.status).toBe(400);
      expect(body).toEqual({
        errors: {
          name: 'The submitted value for Corpus.name is not unique.',
          content: 'There is no form with id 99. There is no form with id 98.',
          tags: 'There is no tag with id 42.',
          form_search: 'There is no form search with id 7.',
        },
      });
    });

    it('should reject malformed JSON', async () => {
      const response = await request('/corpora', {
        method: 'POST',
        user: users.contributor,
        rawBody: '{"name": ',
      });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        error: 'JSON decode error: the parameters provided were not valid JSON.',
      });
    });

    it('should forbid viewers', async () => {
      const { response, body } = await createCorpus({ name: 'Nope' }, users.viewer);

      expect(response.status).toBe(403);
      expect(body).toEqual({ error: UNAUTHORIZED_MESSAGE });
    });

    it('should require authentication', async () => {
      const response = await request('/corpora', { method: 'POST', body: { name: 'Nope' } });

      expect(response.status).toBe(401);
      expect(await json(response)).toEqual({ error: UNAUTHENTICATED_MESSAGE });
    });
  });

  describe('GET /corpora/:id', () => {
    it('should return the corpus', async () => {
      const { body: created } = await createCorpus({ name: 'Shown' });

      const response = await request(`/corpora/${created.id}`, { user: users.viewer });

      expect(response.status).toBe(200);
      expect(await json<CorpusDict>(response)).toEqual(created);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request('/corpora/999', { user: users.viewer });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });

    it('should return 404 for a non-numeric id', async () => {
      const response = await request('/corpora/abc', { user: users.viewer });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id abc' });
    });

    it('should return 404 for an id beyond the id range', async () => {
      const response = await request('/corpora/3000000000', { user: users.viewer });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 3000000000' });
    });
  });

  describe('GET /corpora', () => {
    beforeEach(async () => {
      await createCorpus({ name: 'Beta' });
      await createCorpus({ name: 'Alpha' });
      await createCorpus({ name: 'Gamma' });
    });

    it('should list corpora by id', async () => {
      const response = await request('/corpora', { user: users.viewer });
      const body = await json<CorpusDict[]>(response);

      expect(response.status).toBe(200);
      expect(body.map((corpus) => corpus.name)).toEqual(['Beta', 'Alpha', 'Gamma']);
    });

    it('should order by the requested attribute', async () => {
      const response = await request(
        '/corpora?order_by_model=Corpus&order_by_attribute=name&order_by_direction=desc',
        { user: users.viewer }
      );
      const body = await json<CorpusDict[]>(response);

      expect(body.map((corpus) => corpus.name)).toEqual(['Gamma', 'Beta', 'Alpha']);
    });

    it('should fall back to id order for an unknown attribute', async () => {
      const response = await request(
        '/corpora?order_by_model=Corpus&order_by_attribute=colour&order_by_direction=asc',
        { user: users.viewer }
      );
      const body = await json<CorpusDict[]>(response);

      expect(body.map((corpus) => corpus.id)).toEqual([1, 2, 3]);
    });

    it('should reject an invalid direction', async () => {
      const response = await request(
        '/corpora?order_by_model=Corpus&order_by_attribute=name&order_by_direction=sideways',
        { user: users.viewer }
      );

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        errors: { order_by_direction: "Value must be one of: asc; desc (not 'sideways')" },
      });
    });

    it('should paginate', async () => {
      const response = await request('/corpora?page=2&items_per_page=2', { user: users.viewer });
      const body = await json<PaginatedResult<CorpusDict>>(response);

      expect(body.paginator).toEqual({ page: 2, items_per_page: 2, count: 3 });
      expect(body.items.map((corpus) => corpus.name)).toEqual(['Gamma']);
    });

    it('should reject a page below 1', async () => {
      const response = await request('/corpora?page=0&items_per_page=2', { user: users.viewer });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        errors: { page: 'Please enter an integer greater than or equal to 1' },
      });
    });
  });

  describe('POST /corpora/search', () => {
    beforeEach(async () => {
      const tagId = await createTestTag('fieldwork');
      await createCorpus({ name: 'Stories', tags: [tagId] });
      await createCorpus({ name: 'Songs' });
      await createCorpus({ name: 'Elicitation', tags: [tagId] });
    });

    async function search(body: unknown) {
      const response = await request('/corpora/search', { method: 'POST', user: users.viewer, body });
      return { response, body: await json<CorpusDict[]>(response) };
    }

    it('should filter on an attribute', async () => {
      const { response, body } = await search({
        query: { filter: ['Corpus', 'name', 'like', 'S%'] },
      });

      expect(response.status).toBe(200);
      expect(body.map((corpus) => corpus.name)).toEqual(['Stories', 'Songs']);
    });

    it('should filter on a related model', async () => {
      const { body } = await search({
        query: {
          filter: ['Corpus', 'tags', 'name', '=', 'fieldwork'],
          order_by: ['Corpus', 'name', 'asc'],
        },
      });

      expect(body.map((corpus) => corpus.name)).toEqual(['Elicitation', 'Stories']);
    });

    it('should combine filters', async () => {
      const { body } = await search({
        query: {
          filter: [
            'and',
            [
              ['Corpus', 'tags', '=', null],
              ['not', ['Corpus', 'name', 'regex', '^Sto']],
            ],
          ],
        },
      });

      expect(body.map((corpus) => corpus.name)).toEqual(['Songs']);
    });

    it('should paginate search results', async () => {
      const response = await request('/corpora/search', {
        method: 'POST',
        user: users.viewer,
        body: {
          query: { filter: ['Corpus', 'id', '>', 0], order_by: ['Corpus', 'id', 'desc'] },
          paginator: { page: 1, items_per_page: 2 },
        },
      });
      const body = await json<PaginatedResult<CorpusDict>>(response);

      expect(body.paginator).toEqual({ page: 1, items_per_page: 2, count: 3 });
      expect(body.items.map((corpus) => corpus.id)).toEqual([3, 2]);
    });

    it('should reject a malformed query', async () => {
      const { response, body } = await search({ query: {} });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { 'Malformed query error': 'The submitted query was malformed' } });
    });

    it('should reject searching another model', async () => {
      const { response, body } = await search({
        query: { filter: ['Form', 'transcription', '=', 'x'] },
      });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { Form: 'Searching the Form model is not permitted' } });
    });

    it('should reject an invalid order_by', async () => {
      const { response, body } = await search({
        query: { filter: ['Corpus', 'id', '>', 0], order_by: ['Corpus', 'colour', 'asc'] },
      });

      expect(response.status).toBe(400);
      expect(body).toEqual({ errors: { OrderByError: 'The provided order by expression was invalid.' } });
    });

    it('should reject an invalid paginator', async () => {
      const response = await request('/corpora/search', {
        method: 'POST',
        user: users.viewer,
        body: { query: { filter: ['Corpus', 'id', '>', 0] }, paginator: { page: 0, items_per_page: 2 } },
      });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        errors: { 'paginator.page': 'Please enter an integer greater than or equal to 1' },
      });
    });
  });

  describe('PUT /corpora/:id', () => {
    it('should update the corpus and back up the previous version', async () => {
      const formId = await createTestForm(users.contributor.user);
      const { body: created } = await createCorpus({ name: 'Draft', content: `form[${formId}]` });

      const response = await request(`/corpora/${created.id}`, {
        method: 'PUT',
        user: users.admin,
        body: { name: 'Final', content: `form[${formId}]` },
      });
      const updated = await json<CorpusDict>(response);

      expect(response.status).toBe(200);
      expect(updated.name).toBe('Final');
      expect(updated.UUID).toBe(created.UUID);
      expect(updated.enterer).toEqual(created.enterer);
      expect(updated.modifier?.id).toBe(users.admin.user.id);

      const history = await json<CorpusHistory>(
        await request(`/corpora/${created.id}/history`, { user: users.viewer })
      );
      expect(history.corpus?.name).toBe('Final');
      expect(history.previous_versions).toHaveLength(1);
      expect(history.previous_versions[0]).toMatchObject({
        corpus_id: created.id,
        UUID: created.UUID,
        name: 'Draft',
        content: `form[${formId}]`,
        forms: [formId],
        tags: [],
        form_search: null,
        enterer: created.enterer,
        modifier: created.modifier,
        datetime_modified: created.datetime_modified,
      });
    });

    it('should refuse an update that changes nothing', async () => {
      const tagId = await createTestTag('old');
      const { body: created } = await createCorpus({ name: 'Same', description: 'd', tags: [tagId] });

      const response = await request(`/corpora/${created.id}`, {
        method: 'PUT',
        user: users.contributor,
        body: { name: 'Same', description: 'd', tags: [tagId] },
      });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({ error: NOT_NEW_MESSAGE });
    });

    it('should treat a changed tag set as new', async () => {
      const tagId = await createTestTag('old');
      const { body: created } = await createCorpus({ name: 'Tagged', tags: [tagId] });

      const response = await request(`/corpora/${created.id}`, {
        method: 'PUT',
        user: users.contributor,
        body: { name: 'Tagged', tags: [] },
      });

      expect(response.status).toBe(200);
      expect((await json<CorpusDict>(response)).tags).toEqual([]);
    });

    it('should allow keeping its own name', async () => {
      const { body: created } = await createCorpus({ name: 'Keep' });

      const response = await request(`/corpora/${created.id}`, {
        method: 'PUT',
        user: users.contributor,
        body: { name: 'Keep', description: 'now described' },
      });

      expect(response.status).toBe(200);
    });

    it('should reject the name of another corpus', async () => {
      await createCorpus({ name: 'First' });
      const { body: second } = await createCorpus({ name: 'Second' });

      const response = await request(`/corpora/${second.id}`, {
        method: 'PUT',
        user: users.contributor,
        body: { name: 'First' },
      });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        errors: { name: 'The submitted value for Corpus.name is not unique.' },
      });
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request('/corpora/999', {
        method: 'PUT',
        user: users.contributor,
        body: { name: 'Ghost' },
      });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });

    it('should return 404 for an unknown id before validating the body', async () => {
      const response = await request('/corpora/999', {
        method: 'PUT',
        user: users.contributor,
        body: { name: '' },
      });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });
  });

  describe('DELETE /corpora/:id', () => {
    it('should delete the corpus, keep a backup and remove its directory', async () => {
      const { body: created } = await createCorpus({ name: 'Doomed' });

      const response = await request(`/corpora/${created.id}`, { method: 'DELETE', user: users.admin });

      expect(response.status).toBe(200);
      expect(await json<CorpusDict>(response)).toEqual(created);
      expect(existsSync(corpusDirectory(created.id))).toBe(false);

      const missing = await request(`/corpora/${created.id}`, { user: users.viewer });
      expect(missing.status).toBe(404);

      const history = await json<CorpusHistory>(
        await request(`/corpora/${created.id}/history`, { user: users.viewer })
      );
      expect(history.corpus).toBeNull();
      expect(history.previous_versions.map((backup) => backup.name)).toEqual(['Doomed']);

      const byUuid = await json<CorpusHistory>(
        await request(`/corpora/${created.UUID}/history`, { user: users.viewer })
      );
      expect(byUuid).toEqual(history);
    });

    it('should forbid viewers', async () => {
      const { body: created } = await createCorpus({ name: 'Safe' });

      const response = await request(`/corpora/${created.id}`, { method: 'DELETE', user: users.viewer });

      expect(response.status).toBe(403);
    });
  });

  describe('GET /corpora/:id/history', () => {
    it('should list backups newest first', async () => {
      const { body: created } = await createCorpus({ name: 'v1' });
      for (const name of ['v2', 'v3']) {
        await request(`/corpora/${created.id}`, { method: 'PUT', user: users.contributor, body: { name } });
      }

      const response = await request(`/corpora/${created.UUID}/history`, { user: users.viewer });
      const history = await json<CorpusHistory>(response);

      expect(response.status).toBe(200);
      expect(history.corpus?.name).toBe('v3');
      expect(history.previous_versions.map((backup) => backup.name)).toEqual(['v2', 'v1']);
    });

    it('should return an empty history for an unmodified corpus', async () => {
      const { body: created } = await createCorpus({ name: 'Fresh' });

      const history = await json<CorpusHistory>(
        await request(`/corpora/${created.id}/history`, { user: users.viewer })
      );

      expect(history.corpus?.id).toBe(created.id);
      expect(history.previous_versions).toEqual([]);
    });

    it('should return 404 when nothing matches', async () => {
      const response = await request('/corpora/999/history', { user: users.viewer });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'No corpora or corpus backups match 999' });
    });

    it('should return 404 for an id beyond the id range', async () => {
      const response = await request('/corpora/3000000000/history', { user: users.viewer });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'No corpora or corpus backups match 3000000000' });
    });
  });

  describe('GET /corpora/new and /corpora/:id/edit', () => {
    it('should return empty lists unless asked', async () => {
      const response = await request('/corpora/new', { user: users.contributor });

      expect(response.status).toBe(200);
      expect(await json<NewEditData>(response)).toEqual({
        form_searches: [],
        users: [],
        tags: [],
        corpus_formats: ['treebank', 'transcriptions only'],
      });
    });

    it('should return full lists for empty parameters', async () => {
      const tagId = await createTestTag('alpha');

      const response = await request('/corpora/new?tags=&users=', { user: users.contributor });
      const data = await json<NewEditData>(response);

      expect(data.tags).toEqual([{ id: tagId, name: 'alpha' }]);
      expect(data.users.map((user) => user.id)).toEqual([1, 2, 3, 4]);
      expect(data.form_searches).toEqual([]);
    });

    it('should skip lists the client already has', async () => {
      await createTestTag('alpha');
      const tagsResponse = await request('/tags', { user: users.contributor });
      const [tag] = await json<TagDict[]>(tagsResponse);

      const current = await request(`/corpora/new?tags=${encodeURIComponent(tag.datetime_modified)}`, {
        user: users.contributor,
      });
      const stale = await request('/corpora/new?tags=2000-01-01T00:00:00.000Z', {
        user: users.contributor,
      });

      expect((await json<NewEditData>(current)).tags).toEqual([]);
      expect((await json<NewEditData>(stale)).tags).toEqual([{ id: tag.id, name: 'alpha' }]);
    });

    it('should forbid viewers', async () => {
      const response = await request('/corpora/new', { user: users.viewer });

      expect(response.status).toBe(403);
    });

    it('should return the corpus with its data', async () => {
      const { body: created } = await createCorpus({ name: 'Editable' });

      const response = await request(`/corpora/${created.id}/edit`, { user: users.contributor });
      const body = await json<{ corpus: CorpusDict; data: NewEditData }>(response);

      expect(response.status).toBe(200);
      expect(body.corpus).toEqual(created);
      expect(body.data.corpus_formats).toEqual(['treebank', 'transcriptions only']);
    });

    it('should return 404 when editing an unknown corpus', async () => {
      const response = await request('/corpora/999/edit', { user: users.contributor });
      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });
  });
});
