/**
 * Corpus File Service
 *
 * Writes a corpus to disk in one of the corpus formats and serves the
 * compressed result.
 *
 * Export steps:
 * 1. Collect the forms: the saved form search's matches when the corpus has
 *    one, otherwise the forms referenced by its content, in reference order
 * 2. Stream one writer line per form into the text file
 * 3. Gzip the text file beside it
 * 4. Upsert the corpus file row and touch the corpus, in one transaction
 *
 * Any failure removes both files and leaves the metadata untouched.
 * Concurrent exports of the same corpus and format are not coordinated.
 */

import { createReadStream, createWriteStream } from 'fs';
import { readFile, rm } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { and, eq, inArray } from 'drizzle-orm';
import { corpora, corpusFiles, forms, formsTags, isStorableId, tags } from '@/db/schema';
import type { Database } from '@/db/client';
import { BadRequestError, ForbiddenError, NotFoundError } from '@/errors/http';
import type { AuthUser } from '@/types/hono';
import { getFormReferences } from '@/utils/text';
import { logger } from '@/utils/logger';
import {
  corpusFormIds,
  findCorpus,
  getCorpus,
  type CorpusDict,
  type CorpusWithRelations,
} from './corpus.service';
import { CORPUS_FORMATS, type CorpusFormatName, type FormLine } from './corpusFormats';
import { compressedPath, corpusDirectory, corpusFilePath, createCorpusDirectory } from './corpusStore';
import { QueryBuilder } from './queryBuilder';
import { RESTRICTED_TAG_NAME } from './tag.service';

const formLineColumns = {
  id: forms.id,
  transcription: forms.transcription,
  syntax: forms.syntax,
};

/**
 * Forms to export, in output order
 */
async function formsForExport(db: Database, corpus: CorpusWithRelations): Promise<FormLine[]> {
  if (corpus.formSearch) {
    const { where, orderBy } = new QueryBuilder('Form').compileQuery(corpus.formSearch.search);
    return db
      .select(formLineColumns)
      .from(forms)
      .where(where)
      .orderBy(...orderBy);
  }

  const associated = corpusFormIds(corpus);
  const rows =
    associated.length > 0
      ? await db.select(formLineColumns).from(forms).where(inArray(forms.id, associated))
      : [];
  const byId = new Map(rows.map((row) => [row.id, row]));

  return getFormReferences(corpus.content).map((id) => {
    const form = byId.get(id);
    if (!form) {
      throw new Error(`form ${id} is not among the forms of corpus ${corpus.id}`);
    }
    return form;
  });
}

async function includesRestrictedForm(db: Database, formIds: number[]): Promise<boolean> {
  if (formIds.length === 0) return false;
  const [row] = await db
    .select({ formId: formsTags.formId })
    .from(formsTags)
    .innerJoin(tags, eq(tags.id, formsTags.tagId))
    .where(and(eq(tags.name, RESTRICTED_TAG_NAME), inArray(formsTags.formId, formIds)))
    .limit(1);
  return row !== undefined;
}

async function removeFiles(...paths: string[]): Promise<void> {
  await Promise.all(paths.map((filePath) => rm(filePath, { force: true })));
}

export async function writeCorpusToFile(
  db: Database,
  corpusId: number,
  format: CorpusFormatName,
  user: AuthUser
): Promise<CorpusDict> {
  const corpus = await findCorpus(db, corpusId);
  const filePath = corpusFilePath(corpusId, format);
  const gzipPath = compressedPath(filePath);
  const filename = path.basename(filePath);
  const log = logger.child({ corpusId, format });

  let written = 0;
  let restricted = false;

  try {
    await createCorpusDirectory(corpusId);

    const exported = await formsForExport(db, corpus);
    restricted = await includesRestrictedForm(
      db,
      exported.map((form) => form.id)
    );
    written = exported.length;

    const { writer } = CORPUS_FORMATS[format];
    await pipeline(Readable.from(exported.map(writer)), createWriteStream(filePath, 'utf8'));
    await pipeline(createReadStream(filePath), createGzip(), createWriteStream(gzipPath));

    const now = new Date();
    await db.transaction(async (tx) => {
      await tx
        .insert(corpusFiles)
        .values({
          corpusId,
          filename,
          format,
          restricted,
          creatorId: user.id,
          modifierId: user.id,
          datetimeCreated: now,
          datetimeModified: now,
        })
        .onConflictDoUpdate({
          target: [corpusFiles.corpusId, corpusFiles.filename],
          set: { restricted, modifierId: user.id, datetimeModified: now },
        });
      await tx.update(corpora).set({ datetimeModified: now }).where(eq(corpora.id, corpusId));
    });
  } catch (error) {
    await removeFiles(filePath, gzipPath);
    const reason = error instanceof Error ? error.message : String(error);
    log.warn('Corpus export failed', { reason });
    throw new BadRequestError(
      `Unable to write corpus ${corpusId} to file with format "${format}". (${reason})`
    );
  }

  log.info('Corpus written to file', { filename, forms: written, restricted, userId: user.id });
  return getCorpus(db, corpusId);
}

/**
 * Administrators and unrestricted users may access restricted files
 */
export function canAccessCorpusFile(user: AuthUser, file: { restricted: boolean }): boolean {
  return !file.restricted || user.role === 'administrator' || user.unrestricted;
}

export interface ServedCorpusFile {
  filename: string;
  body: Uint8Array<ArrayBuffer>;
}

/**
 * Read the compressed copy of a corpus file
 */
export async function serveCorpusFile(
  db: Database,
  corpusId: number,
  fileId: string,
  user: AuthUser
): Promise<ServedCorpusFile> {
  const [corpus] = await db
    .select({ id: corpora.id })
    .from(corpora)
    .where(eq(corpora.id, corpusId))
    .limit(1);
  if (!corpus) {
    throw new NotFoundError(`There is no corpus with id ${corpusId}`);
  }

  const unservable = new BadRequestError(`Unable to serve corpus file ${fileId} of corpus ${corpusId}`);
  const id = Number(fileId);
  if (!/^\d+$/.test(fileId) || !isStorableId(id)) {
    throw unservable;
  }

  const [file] = await db
    .select()
    .from(corpusFiles)
    .where(and(eq(corpusFiles.id, id), eq(corpusFiles.corpusId, corpusId)))
    .limit(1);
  if (!file) {
    throw unservable;
  }

  if (!canAccessCorpusFile(user, file)) {
    throw new ForbiddenError();
  }

  const filename = `${file.filename}.gz`;
  try {
    const body = await readFile(path.join(corpusDirectory(corpusId), filename));
    return { filename, body: new Uint8Array(body) };
  } catch (error) {
    logger.warn('Corpus file unreadable', {
      corpusId,
      fileId: file.id,
      error: error instanceof Error ? error.message : String(error),
    });
    throw unservable;
  }
}
