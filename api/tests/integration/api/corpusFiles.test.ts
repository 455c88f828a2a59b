/**
 * Integration Tests - Corpus File Export
 *
 * Tests:
 * - PUT /corpora/:id/writetofile
 * - GET /corpora/:id/servefile/:fileId
 */

import { existsSync, readFileSync } from 'fs';
import { gunzipSync } from 'zlib';
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { UNAUTHORIZED_MESSAGE } from '@/errors/http';
import { deleteForm } from '@/services/form.service';
import type { CorpusDict } from '@/services/corpus.service';
import { compressedPath, corpusFilePath } from '@/services/corpusStore';
import type { FormSearchDict } from '@/services/formSearch.service';
import {
  createTestForm,
  createTestTag,
  getTestDb,
  resetTestDatabase,
  seedUsers,
  setupTestDatabase,
  teardownTestDatabase,
  type TestUser,
  type TestUsers,
} from '../../helpers/db';
import { json, request } from '../../helpers/app';

describe('Corpus File Integration Tests', () => {
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

  async function createCorpus(body: Record<string, unknown>): Promise<CorpusDict> {
    const response = await request('/corpora', { method: 'POST', user: users.contributor, body });
    expect(response.status).toBe(200);
    return json<CorpusDict>(response);
  }

  function writeToFile(corpusId: number, format: unknown, user: TestUser = users.contributor) {
    return request(`/corpora/${corpusId}/writetofile`, { method: 'PUT', user, body: { format } });
  }

  async function createSentenceForms(): Promise<{ first: number; second: number }> {
    const first = await createTestForm(users.contributor.user, {
      transcription: 'nitsspiyi',
      syntax: '(S (V nitsspiyi))',
    });
    const second = await createTestForm(users.contributor.user, {
      transcription: 'oki',
      syntax: '(S (Interj oki))',
    });
    return { first, second };
  }

  describe('PUT /corpora/:id/writetofile', () => {
    it('should write a treebank file in content order', async () => {
      const { first, second } = await createSentenceForms();
      const corpus = await createCorpus({
        name: 'Sentences',
        content: `form[${second}] form[${first}] form[${second}]`,
      });

      const response = await writeToFile(corpus.id, 'treebank');
      const body = await json<CorpusDict>(response);

      expect(response.status).toBe(200);
      expect(body.files).toHaveLength(1);
      expect(body.files[0]).toMatchObject({
        id: 1,
        filename: `corpus_${corpus.id}.tbk`,
        format: 'treebank',
        restricted: false,
        creator: corpus.enterer,
        modifier: corpus.enterer,
      });

      const filePath = corpusFilePath(corpus.id, 'treebank');
      const expected = '(TOP-2 (S (Interj oki)))\n(TOP-1 (S (V nitsspiyi)))\n(TOP-2 (S (Interj oki)))\n';
      expect(readFileSync(filePath, 'utf8')).toBe(expected);
      expect(gunzipSync(readFileSync(compressedPath(filePath))).toString('utf8')).toBe(expected);
    });

    it('should write transcriptions only', async () => {
      const { first, second } = await createSentenceForms();
      const corpus = await createCorpus({ name: 'Words', content: `form[${first}]\nform[${second}]` });

      const response = await writeToFile(corpus.id, 'transcriptions only');
      const body = await json<CorpusDict>(response);

      expect(body.files.map((file) => file.filename)).toEqual([`corpus_${corpus.id}-transcriptions.txt`]);
      expect(readFileSync(corpusFilePath(corpus.id, 'transcriptions only'), 'utf8')).toBe(
        'nitsspiyi\noki\n'
      );
    });

    it('should write an empty file for a corpus without forms', async () => {
      const corpus = await createCorpus({ name: 'Nothing' });

      const response = await writeToFile(corpus.id, 'treebank');

      expect(response.status).toBe(200);
      expect(readFileSync(corpusFilePath(corpus.id, 'treebank'), 'utf8')).toBe('');
    });

    it('should export the matches of the corpus form search', async () => {
      const { first } = await createSentenceForms();
      await createTestForm(users.contributor.user, { transcription: 'aakii' });
      const searchResponse = await request('/formsearches', {
        method: 'POST',
        user: users.contributor,
        body: {
          name: 'short words',
          search: {
            filter: ['Form', 'transcription', 'in', ['oki', 'nitsspiyi']],
            order_by: ['Form', 'id', 'desc'],
          },
        },
      });
      const formSearch = await json<FormSearchDict>(searchResponse);
      const corpus = await createCorpus({
        name: 'Searched',
        content: `form[${first}]`,
        form_search: formSearch.id,
      });

      await writeToFile(corpus.id, 'transcriptions only');

      expect(readFileSync(corpusFilePath(corpus.id, 'transcriptions only'), 'utf8')).toBe('oki\nnitsspiyi\n');
    });

    it('should mark files holding restricted forms', async () => {
      const restrictedTag = await createTestTag('restricted');
      const open = await createTestForm(users.contributor.user, { transcription: 'open' });
      const secret = await createTestForm(users.contributor.user, {
        transcription: 'secret',
        tags: [restrictedTag],
      });
      const corpus = await createCorpus({ name: 'Mixed', content: `form[${open}] form[${secret}]` });

      const body = await json<CorpusDict>(await writeToFile(corpus.id, 'transcriptions only'));

      expect(body.files[0].restricted).toBe(true);
    });

    it('should update the existing file on a second write', async () => {
      const { first } = await createSentenceForms();
      const corpus = await createCorpus({ name: 'Twice', content: `form[${first}]` });

      const once = await json<CorpusDict>(await writeToFile(corpus.id, 'treebank'));
      const twice = await json<CorpusDict>(await writeToFile(corpus.id, 'treebank', users.admin));

      expect(twice.files).toHaveLength(1);
      expect(twice.files[0].id).toBe(once.files[0].id);
      expect(twice.files[0].datetime_created).toBe(once.files[0].datetime_created);
      expect(twice.files[0].creator?.id).toBe(users.contributor.user.id);
      expect(twice.files[0].modifier?.id).toBe(users.admin.user.id);
    });

    it('should keep one file per format', async () => {
      const corpus = await createCorpus({ name: 'Both' });

      await writeToFile(corpus.id, 'treebank');
      const body = await json<CorpusDict>(await writeToFile(corpus.id, 'transcriptions only'));

      expect(body.files.map((file) => file.format)).toEqual(['treebank', 'transcriptions only']);
    });

    it('should reject an unknown format', async () => {
      const corpus = await createCorpus({ name: 'Formats' });

      const response = await writeToFile(corpus.id, 'csv');

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        errors: { format: 'Value must be one of: treebank; transcriptions only' },
      });
    });

    it('should clean up and report a failed export', async () => {
      const formId = await createTestForm(users.contributor.user);
      const corpus = await createCorpus({ name: 'Broken', content: `form[${formId}]` });
      await deleteForm(getTestDb(), formId);

      const response = await writeToFile(corpus.id, 'treebank');

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        error: `Unable to write corpus ${corpus.id} to file with format "treebank". (form ${formId} is not among the forms of corpus ${corpus.id})`,
      });
      const filePath = corpusFilePath(corpus.id, 'treebank');
      expect(existsSync(filePath)).toBe(false);
      expect(existsSync(compressedPath(filePath))).toBe(false);

      const stored = await json<CorpusDict>(await request(`/corpora/${corpus.id}`, { user: users.viewer }));
      expect(stored.files).toEqual([]);
    });

    it('should return 404 for an unknown corpus', async () => {
      const response = await writeToFile(999, 'treebank');

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });

    it('should return 404 for an unknown corpus before checking the format', async () => {
      const response = await writeToFile(999, 'csv');

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });

    it('should forbid viewers', async () => {
      const corpus = await createCorpus({ name: 'Guarded' });

      const response = await writeToFile(corpus.id, 'treebank', users.viewer);

      expect(response.status).toBe(403);
    });
  });

  describe('GET /corpora/:id/servefile/:fileId', () => {
    async function exportedCorpus(restricted: boolean): Promise<{ corpus: CorpusDict; fileId: number }> {
      const tags = restricted ? [await createTestTag('restricted')] : [];
      const formId = await createTestForm(users.contributor.user, { transcription: 'served', tags });
      const corpus = await createCorpus({ name: 'Served', content: `form[${formId}]` });
      const body = await json<CorpusDict>(await writeToFile(corpus.id, 'transcriptions only'));
      return { corpus, fileId: body.files[0].id };
    }

    it('should serve the compressed file', async () => {
      const { corpus, fileId } = await exportedCorpus(false);

      const response = await request(`/corpora/${corpus.id}/servefile/${fileId}`, { user: users.viewer });

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('application/gzip');
      expect(response.headers.get('content-disposition')).toBe(
        `attachment; filename="corpus_${corpus.id}-transcriptions.txt.gz"`
      );
      const bytes = Buffer.from(await response.arrayBuffer());
      expect(gunzipSync(bytes).toString('utf8')).toBe('served\n');
    });

    it('should forbid restricted files to restricted users', async () => {
      const { corpus, fileId } = await exportedCorpus(true);

      const viewer = await request(`/corpora/${corpus.id}/servefile/${fileId}`, { user: users.viewer });
      const contributor = await request(`/corpora/${corpus.id}/servefile/${fileId}`, {
        user: users.contributor,
      });

      expect(viewer.status).toBe(403);
      expect(await json(viewer)).toEqual({ error: UNAUTHORIZED_MESSAGE });
      expect(contributor.status).toBe(403);
    });

    it('should serve restricted files to administrators and unrestricted users', async () => {
      const { corpus, fileId } = await exportedCorpus(true);

      const admin = await request(`/corpora/${corpus.id}/servefile/${fileId}`, { user: users.admin });
      const unrestricted = await request(`/corpora/${corpus.id}/servefile/${fileId}`, {
        user: users.unrestrictedViewer,
      });

      expect(admin.status).toBe(200);
      expect(unrestricted.status).toBe(200);
    });

    it('should return 404 for an unknown corpus', async () => {
      const response = await request('/corpora/999/servefile/1', { user: users.viewer });

      expect(response.status).toBe(404);
      expect(await json(response)).toEqual({ error: 'There is no corpus with id 999' });
    });

    it('should return 400 for an unknown file', async () => {
      const { corpus } = await exportedCorpus(false);

      const response = await request(`/corpora/${corpus.id}/servefile/5`, { user: users.viewer });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        error: `Unable to serve corpus file 5 of corpus ${corpus.id}`,
      });
    });

    it('should return 400 for a file id beyond the id range', async () => {
      const { corpus } = await exportedCorpus(false);

      const response = await request(`/corpora/${corpus.id}/servefile/3000000000`, { user: users.viewer });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        error: `Unable to serve corpus file 3000000000 of corpus ${corpus.id}`,
      });
    });

    it('should return 400 for a non-numeric file id', async () => {
      const { corpus } = await exportedCorpus(false);

      const response = await request(`/corpora/${corpus.id}/servefile/latest`, { user: users.viewer });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        error: `Unable to serve corpus file latest of corpus ${corpus.id}`,
      });
    });

    it('should not serve a file of another corpus', async () => {
      const { fileId } = await exportedCorpus(false);
      const other = await createCorpus({ name: 'Other' });

      const response = await request(`/corpora/${other.id}/servefile/${fileId}`, { user: users.viewer });

      expect(response.status).toBe(400);
      expect(await json(response)).toEqual({
        error: `Unable to serve corpus file ${fileId} of corpus ${other.id}`,
      });
    });

    it('should require authentication', async () => {
      const { corpus, fileId } = await exportedCorpus(false);

      const response = await request(`/corpora/${corpus.id}/servefile/${fileId}`);

      expect(response.status).toBe(401);
    });
  });
});
