/**
 * Corpus Service
 *
 * Corpora are named, described collections of forms. Their forms come from
 * `form[<id>]` references in the content; a corpus may instead name a saved
 * form search, which then decides what an export contains.
 *
 * Every update and delete first stores a backup of the corpus as it was.
 */

import { randomUUID } from 'crypto';
import { and, eq, inArray, ne } from 'drizzle-orm';
import {
  corpora,
  corporaForms,
  corporaTags,
  isStorableId,
  type Corpus,
  type CorpusFile,
  type FormSearch,
  type FormSearchMini,
  type Tag,
  type TagMini,
  type User,
  type UserMini,
} from '@/db/schema';
import type { Database } from '@/db/client';
import {
  BadRequestError,
  InvalidInputError,
  NOT_NEW_MESSAGE,
  NotFoundError,
  type FieldErrors,
} from '@/errors/http';
import type { AuthUser } from '@/types/hono';
import { getFormReferences, normalize, unique } from '@/utils/text';
import { logger } from '@/utils/logger';
import { backupCorpus, findCorpusBackups, type CorpusBackupDict } from './corpusBackup.service';
import { createCorpusDirectory, removeCorpusDirectory } from './corpusStore';
import { findMissingFormIds } from './form.service';
import { formSearchExists, toFormSearchMini } from './formSearch.service';
import { listIndex, listSearch, type IndexParams, type ListResult, type Paginator } from './listing';
import { findMissingTagIds, toTagMini } from './tag.service';
import { toUserMini } from './user.service';

export interface CorpusInput {
  name: string;
  description: string;
  content: string;
  form_search: number | null;
  tags: number[];
}

export interface CorpusFileDict {
  id: number;
  filename: string;
  format: string;
  restricted: boolean;
  creator: UserMini | null;
  modifier: UserMini | null;
  datetime_created: string;
  datetime_modified: string;
}

export interface CorpusDict {
  id: number;
  UUID: string;
  name: string;
  description: string;
  content: string;
  enterer: UserMini | null;
  modifier: UserMini | null;
  form_search: FormSearchMini | null;
  datetime_entered: string;
  datetime_modified: string;
  tags: TagMini[];
  files: CorpusFileDict[];
}

export type CorpusFileWithUsers = CorpusFile & { creator: User | null; modifier: User | null };

export type CorpusWithRelations = Corpus & {
  formSearch: FormSearch | null;
  enterer: User | null;
  modifier: User | null;
  tags: Array<{ tag: Tag }>;
  forms: Array<{ formId: number }>;
  files: CorpusFileWithUsers[];
};

export function toCorpusFileDict(file: CorpusFileWithUsers): CorpusFileDict {
  return {
    id: file.id,
    filename: file.filename,
    format: file.format,
    restricted: file.restricted,
    creator: file.creator ? toUserMini(file.creator) : null,
    modifier: file.modifier ? toUserMini(file.modifier) : null,
    datetime_created: file.datetimeCreated.toISOString(),
    datetime_modified: file.datetimeModified.toISOString(),
  };
}

export function toCorpusDict(corpus: CorpusWithRelations): CorpusDict {
  return {
    id: corpus.id,
    UUID: corpus.uuid,
    name: corpus.name,
    description: corpus.description,
    content: corpus.content,
    enterer: corpus.enterer ? toUserMini(corpus.enterer) : null,
    modifier: corpus.modifier ? toUserMini(corpus.modifier) : null,
    form_search: corpus.formSearch ? toFormSearchMini(corpus.formSearch) : null,
    datetime_entered: corpus.datetimeEntered.toISOString(),
    datetime_modified: corpus.datetimeModified.toISOString(),
    tags: corpus.tags.map(({ tag }) => toTagMini(tag)).sort((a, b) => a.id - b.id),
    files: [...corpus.files].sort((a, b) => a.id - b.id).map(toCorpusFileDict),
  };
}

/**
 * Ids of the corpus's forms, ascending
 */
export function corpusFormIds(corpus: CorpusWithRelations): number[] {
  return corpus.forms.map(({ formId }) => formId).sort((a, b) => a - b);
}

export async function findCorpora(db: Database, ids: number[]): Promise<CorpusWithRelations[]> {
  return db.query.corpora.findMany({
    where: inArray(corpora.id, ids),
    with: {
      formSearch: true,
      enterer: true,
      modifier: true,
      tags: { with: { tag: true } },
      forms: { columns: { formId: true } },
      files: { with: { creator: true, modifier: true } },
    },
  });
}

export async function findCorpus(db: Database, id: number): Promise<CorpusWithRelations> {
  const [corpus] = await findCorpora(db, [id]);
  if (!corpus) {
    throw new NotFoundError(`There is no corpus with id ${id}`);
  }
  return corpus;
}

async function loadCorpusDicts(db: Database, ids: number[]): Promise<CorpusDict[]> {
  const rows = await findCorpora(db, ids);
  return rows.map(toCorpusDict);
}

export function listCorpora(db: Database, params: IndexParams): Promise<ListResult<CorpusDict>> {
  return listIndex(db, 'Corpus', params, loadCorpusDicts);
}

export function searchCorpora(
  db: Database,
  query: unknown,
  paginator?: Paginator
): Promise<ListResult<CorpusDict>> {
  return listSearch(db, 'Corpus', query, paginator, loadCorpusDicts);
}

export async function getCorpus(db: Database, id: number): Promise<CorpusDict> {
  return toCorpusDict(await findCorpus(db, id));
}

// =====================================================
// VALIDATION
// =====================================================

interface NormalizedCorpusInput {
  name: string;
  description: string;
  content: string;
  formSearchId: number | null;
  tagIds: number[];
  formIds: number[];
}

function normalizeInput(input: CorpusInput): NormalizedCorpusInput {
  const content = normalize(input.content);
  return {
    name: normalize(input.name),
    description: normalize(input.description),
    content,
    formSearchId: input.form_search,
    tagIds: unique(input.tags),
    formIds: unique(getFormReferences(content)),
  };
}

/**
 * Check uniqueness and that every referenced form, tag and form search exists
 */
async function validateCorpusInput(
  db: Database,
  input: NormalizedCorpusInput,
  excludeId?: number
): Promise<void> {
  const errors: FieldErrors = {};

  const sameName = eq(corpora.name, input.name);
  const [duplicate] = await db
    .select({ id: corpora.id })
    .from(corpora)
    .where(excludeId === undefined ? sameName : and(sameName, ne(corpora.id, excludeId)))
    .limit(1);
  if (duplicate) {
    errors.name = 'The submitted value for Corpus.name is not unique.';
  }

  const missingForms = await findMissingFormIds(db, input.formIds);
  if (missingForms.length > 0) {
    errors.content = missingForms.map((id) => `There is no form with id ${id}.`).join(' ');
  }

  const [missingTag] = await findMissingTagIds(db, input.tagIds);
  if (missingTag !== undefined) {
    errors.tags = `There is no tag with id ${missingTag}.`;
  }

  if (input.formSearchId !== null && !(await formSearchExists(db, input.formSearchId))) {
    errors.form_search = `There is no form search with id ${input.formSearchId}.`;
  }

  if (Object.keys(errors).length > 0) {
    throw new InvalidInputError(errors);
  }
}

function sameIds(current: number[], next: number[]): boolean {
  const currentSet = new Set(current);
  return currentSet.size === next.length && next.every((id) => currentSet.has(id));
}

function hasChanges(corpus: CorpusWithRelations, input: NormalizedCorpusInput): boolean {
  return (
    corpus.name !== input.name ||
    corpus.description !== input.description ||
    corpus.content !== input.content ||
    corpus.formSearchId !== input.formSearchId ||
    !sameIds(
      corpus.tags.map(({ tag }) => tag.id),
      input.tagIds
    ) ||
    !sameIds(corpusFormIds(corpus), input.formIds)
  );
}

async function replaceCollections(
  tx: Database,
  corpusId: number,
  input: NormalizedCorpusInput
): Promise<void> {
  await tx.delete(corporaTags).where(eq(corporaTags.corpusId, corpusId));
  await tx.delete(corporaForms).where(eq(corporaForms.corpusId, corpusId));
  if (input.tagIds.length > 0) {
    await tx.insert(corporaTags).values(input.tagIds.map((tagId) => ({ corpusId, tagId })));
  }
  if (input.formIds.length > 0) {
    await tx.insert(corporaForms).values(input.formIds.map((formId) => ({ corpusId, formId })));
  }
}

// =====================================================
// MUTATIONS
// =====================================================

export async function createCorpus(db: Database, input: CorpusInput, user: AuthUser): Promise<CorpusDict> {
  const values = normalizeInput(input);
  await validateCorpusInput(db, values);
  const now = new Date();

  const corpusId = await db.transaction(async (tx) => {
    const [corpus] = await tx
      .insert(corpora)
      .values({
        uuid: randomUUID(),
        name: values.name,
        description: values.description,
        content: values.content,
        formSearchId: values.formSearchId,
        entererId: user.id,
        modifierId: user.id,
        datetimeEntered: now,
        datetimeModified: now,
      })
      .returning({ id: corpora.id });

    await replaceCollections(tx, corpus.id, values);
    return corpus.id;
  });

  await createCorpusDirectory(corpusId);
  logger.info('Corpus created', { corpusId, userId: user.id, forms: values.formIds.length });
  return getCorpus(db, corpusId);
}

export async function updateCorpus(
  db: Database,
  id: number,
  input: CorpusInput,
  user: AuthUser
): Promise<CorpusDict> {
  const corpus = await findCorpus(db, id);
  const values = normalizeInput(input);
  await validateCorpusInput(db, values, id);

  if (!hasChanges(corpus, values)) {
    throw new BadRequestError(NOT_NEW_MESSAGE);
  }

  await db.transaction(async (tx) => {
    await backupCorpus(tx, corpus);
    await tx
      .update(corpora)
      .set({
        name: values.name,
        description: values.description,
        content: values.content,
        formSearchId: values.formSearchId,
        modifierId: user.id,
        datetimeModified: new Date(),
      })
      .where(eq(corpora.id, id));
    await replaceCollections(tx, id, values);
  });

  logger.info('Corpus updated', { corpusId: id, userId: user.id });
  return getCorpus(db, id);
}

export async function deleteCorpus(db: Database, id: number, user: AuthUser): Promise<CorpusDict> {
  const corpus = await findCorpus(db, id);

  await db.transaction(async (tx) => {
    await backupCorpus(tx, corpus);
    await tx.delete(corpora).where(eq(corpora.id, id));
  });

  await removeCorpusDirectory(id);
  logger.info('Corpus deleted', { corpusId: id, userId: user.id });
  return toCorpusDict(corpus);
}

// =====================================================
// HISTORY
// =====================================================

export interface CorpusHistory {
  corpus: CorpusDict | null;
  previous_versions: CorpusBackupDict[];
}

/**
 * The corpus matching an integer id or a UUID, with its backups newest first.
 * Backups are still found after the corpus itself is deleted.
 */
export async function getCorpusHistory(db: Database, idOrUuid: string): Promise<CorpusHistory> {
  let corpus: CorpusWithRelations | undefined;
  let backupFilter: { corpusId: number } | { uuid: string };

  if (/^\d+$/.test(idOrUuid)) {
    const id = Number(idOrUuid);
    if (!isStorableId(id)) {
      throw new NotFoundError(`No corpora or corpus backups match ${idOrUuid}`);
    }
    [corpus] = await findCorpora(db, [id]);
    backupFilter = corpus ? { uuid: corpus.uuid } : { corpusId: id };
  } else {
    const [row] = await db
      .select({ id: corpora.id })
      .from(corpora)
      .where(eq(corpora.uuid, idOrUuid))
      .limit(1);
    if (row) {
      [corpus] = await findCorpora(db, [row.id]);
    }
    backupFilter = { uuid: idOrUuid };
  }

  const previousVersions = await findCorpusBackups(db, backupFilter);

  if (!corpus && previousVersions.length === 0) {
    throw new NotFoundError(`No corpora or corpus backups match ${idOrUuid}`);
  }

  return {
    corpus: corpus ? toCorpusDict(corpus) : null,
    previous_versions: previousVersions,
  };
}
