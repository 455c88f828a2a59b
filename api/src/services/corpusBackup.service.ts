/**
 * Corpus Backup Service
 *
 * Backups are written only by the corpus service (before each update and on
 * delete) and are read-only over HTTP.
 */

import { desc, eq, inArray } from 'drizzle-orm';
import { corpusBackups, type CorpusBackup, type FormSearchMini, type TagMini, type UserMini } from '@/db/schema';
import type { Database } from '@/db/client';
import { NotFoundError } from '@/errors/http';
import { logger } from '@/utils/logger';
import type { CorpusWithRelations } from './corpus.service';
import { toFormSearchMini } from './formSearch.service';
import { listIndex, type IndexParams, type ListResult } from './listing';
import { toTagMini } from './tag.service';
import { toUserMini } from './user.service';

export interface CorpusBackupDict {
  id: number;
  corpus_id: number;
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
  forms: number[];
}

export function toCorpusBackupDict(backup: CorpusBackup): CorpusBackupDict {
  return {
    id: backup.id,
    corpus_id: backup.corpusId,
    UUID: backup.uuid,
    name: backup.name,
    description: backup.description,
    content: backup.content,
    enterer: backup.enterer ?? null,
    modifier: backup.modifier ?? null,
    form_search: backup.formSearch ?? null,
    datetime_entered: backup.datetimeEntered.toISOString(),
    datetime_modified: backup.datetimeModified.toISOString(),
    tags: backup.tags,
    forms: backup.forms,
  };
}

/**
 * Snapshot a corpus as currently stored
 */
export async function backupCorpus(db: Database, corpus: CorpusWithRelations): Promise<CorpusBackupDict> {
  const [backup] = await db
    .insert(corpusBackups)
    .values({
      corpusId: corpus.id,
      uuid: corpus.uuid,
      name: corpus.name,
      description: corpus.description,
      content: corpus.content,
      formSearch: corpus.formSearch ? toFormSearchMini(corpus.formSearch) : null,
      enterer: corpus.enterer ? toUserMini(corpus.enterer) : null,
      modifier: corpus.modifier ? toUserMini(corpus.modifier) : null,
      tags: corpus.tags.map(({ tag }) => toTagMini(tag)).sort((a, b) => a.id - b.id),
      forms: corpus.forms.map(({ formId }) => formId).sort((a, b) => a - b),
      datetimeEntered: corpus.datetimeEntered,
      datetimeModified: corpus.datetimeModified,
    })
    .returning();

  logger.debug('Corpus backed up', { corpusId: corpus.id, backupId: backup.id });
  return toCorpusBackupDict(backup);
}

async function loadCorpusBackups(db: Database, ids: number[]): Promise<CorpusBackupDict[]> {
  const rows = await db.select().from(corpusBackups).where(inArray(corpusBackups.id, ids));
  return rows.map(toCorpusBackupDict);
}

export function listCorpusBackups(
  db: Database,
  params: IndexParams
): Promise<ListResult<CorpusBackupDict>> {
  return listIndex(db, 'CorpusBackup', params, loadCorpusBackups);
}

export async function getCorpusBackup(db: Database, id: number): Promise<CorpusBackupDict> {
  const [backup] = await db.select().from(corpusBackups).where(eq(corpusBackups.id, id)).limit(1);
  if (!backup) {
    throw new NotFoundError(`There is no corpus backup with id ${id}`);
  }
  return toCorpusBackupDict(backup);
}

/**
 * Backups of one corpus, newest first
 */
export async function findCorpusBackups(
  db: Database,
  match: { corpusId: number } | { uuid: string }
): Promise<CorpusBackupDict[]> {
  const condition =
    'corpusId' in match ? eq(corpusBackups.corpusId, match.corpusId) : eq(corpusBackups.uuid, match.uuid);
  const rows = await db
    .select()
    .from(corpusBackups)
    .where(condition)
    .orderBy(desc(corpusBackups.datetimeModified), desc(corpusBackups.id));
  return rows.map(toCorpusBackupDict);
}
