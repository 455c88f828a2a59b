/**
 * Tag Service
 */

import { and, desc, eq, inArray, ne } from 'drizzle-orm';
import { tags, type Tag, type TagMini } from '@/db/schema';
import type { Database } from '@/db/client';
import { BadRequestError, InvalidInputError, NOT_NEW_MESSAGE, NotFoundError } from '@/errors/http';
import { normalize } from '@/utils/text';
import { logger } from '@/utils/logger';
import { listIndex, type IndexParams, type ListResult } from './listing';

export const RESTRICTED_TAG_NAME = 'restricted';

export interface TagInput {
  name: string;
  description: string;
}

export interface TagDict {
  id: number;
  name: string;
  description: string;
  datetime_modified: string;
}

export function toTagDict(tag: Tag): TagDict {
  return {
    id: tag.id,
    name: tag.name,
    description: tag.description,
    datetime_modified: tag.datetimeModified.toISOString(),
  };
}

export function toTagMini(tag: Pick<Tag, 'id' | 'name'>): TagMini {
  return { id: tag.id, name: tag.name };
}

async function loadTags(db: Database, ids: number[]): Promise<TagDict[]> {
  const rows = await db.select().from(tags).where(inArray(tags.id, ids));
  return rows.map(toTagDict);
}

export function listTags(db: Database, params: IndexParams): Promise<ListResult<TagDict>> {
  return listIndex(db, 'Tag', params, loadTags);
}

async function findTag(db: Database, id: number): Promise<Tag> {
  const [tag] = await db.select().from(tags).where(eq(tags.id, id)).limit(1);
  if (!tag) {
    throw new NotFoundError(`There is no tag with id ${id}`);
  }
  return tag;
}

export async function getTag(db: Database, id: number): Promise<TagDict> {
  return toTagDict(await findTag(db, id));
}

async function assertUniqueName(db: Database, name: string, excludeId?: number): Promise<void> {
  const condition =
    excludeId === undefined ? eq(tags.name, name) : and(eq(tags.name, name), ne(tags.id, excludeId));
  const [existing] = await db.select({ id: tags.id }).from(tags).where(condition).limit(1);
  if (existing) {
    throw new InvalidInputError({ name: 'The submitted value for Tag.name is not unique.' });
  }
}

export async function createTag(db: Database, input: TagInput): Promise<TagDict> {
  const name = normalize(input.name);
  await assertUniqueName(db, name);

  const [tag] = await db
    .insert(tags)
    .values({ name, description: normalize(input.description), datetimeModified: new Date() })
    .returning();

  logger.info('Tag created', { tagId: tag.id });
  return toTagDict(tag);
}

export async function updateTag(db: Database, id: number, input: TagInput): Promise<TagDict> {
  const tag = await findTag(db, id);
  const name = normalize(input.name);
  const description = normalize(input.description);
  await assertUniqueName(db, name, id);

  if (tag.name === name && tag.description === description) {
    throw new BadRequestError(NOT_NEW_MESSAGE);
  }

  const [updated] = await db
    .update(tags)
    .set({ name, description, datetimeModified: new Date() })
    .where(eq(tags.id, id))
    .returning();

  logger.info('Tag updated', { tagId: id });
  return toTagDict(updated);
}

export async function deleteTag(db: Database, id: number): Promise<TagDict> {
  const tag = await findTag(db, id);
  await db.delete(tags).where(eq(tags.id, id));
  logger.info('Tag deleted', { tagId: id });
  return toTagDict(tag);
}

export async function listTagMinis(db: Database): Promise<TagMini[]> {
  const rows = await db.select({ id: tags.id, name: tags.name }).from(tags).orderBy(tags.id);
  return rows.map(toTagMini);
}

export async function getLatestTagModification(db: Database): Promise<Date | null> {
  const [row] = await db
    .select({ datetimeModified: tags.datetimeModified })
    .from(tags)
    .orderBy(desc(tags.datetimeModified))
    .limit(1);
  return row?.datetimeModified ?? null;
}

/**
 * Ids that do not name an existing tag, in input order
 */
export async function findMissingTagIds(db: Database, ids: number[]): Promise<number[]> {
  if (ids.length === 0) return [];
  const rows = await db.select({ id: tags.id }).from(tags).where(inArray(tags.id, ids));
  const found = new Set(rows.map((row) => row.id));
  return ids.filter((id) => !found.has(id));
}
