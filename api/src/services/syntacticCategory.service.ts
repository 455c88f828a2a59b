/**
 * Syntactic Category Service
 *
 * Plain CRUD; categories are referenced by forms.
 */

import { randomUUID } from 'crypto';
import { and, eq, inArray, ne } from 'drizzle-orm';
import { syntacticCategories, type SyntacticCategory } from '@/db/schema';
import type { Database } from '@/db/client';
import { BadRequestError, InvalidInputError, NOT_NEW_MESSAGE, NotFoundError } from '@/errors/http';
import { normalize } from '@/utils/text';
import { logger } from '@/utils/logger';
import { listIndex, type IndexParams, type ListResult } from './listing';

export const SYNTACTIC_CATEGORY_TYPES = ['lexical', 'phrasal', 'sentential'] as const;

export type SyntacticCategoryType = (typeof SYNTACTIC_CATEGORY_TYPES)[number] | '';

export interface SyntacticCategoryInput {
  name: string;
  type: SyntacticCategoryType;
  description: string;
}

export interface SyntacticCategoryDict {
  id: number;
  UUID: string;
  name: string;
  type: string;
  description: string;
  datetime_modified: string;
}

export function toSyntacticCategoryDict(category: SyntacticCategory): SyntacticCategoryDict {
  return {
    id: category.id,
    UUID: category.uuid,
    name: category.name,
    type: category.type,
    description: category.description,
    datetime_modified: category.datetimeModified.toISOString(),
  };
}

async function loadSyntacticCategories(db: Database, ids: number[]): Promise<SyntacticCategoryDict[]> {
  const rows = await db
    .select()
    .from(syntacticCategories)
    .where(inArray(syntacticCategories.id, ids));
  return rows.map(toSyntacticCategoryDict);
}

export function listSyntacticCategories(
  db: Database,
  params: IndexParams
): Promise<ListResult<SyntacticCategoryDict>> {
  return listIndex(db, 'SyntacticCategory', params, loadSyntacticCategories);
}

async function findSyntacticCategory(db: Database, id: number): Promise<SyntacticCategory> {
  const [category] = await db
    .select()
    .from(syntacticCategories)
    .where(eq(syntacticCategories.id, id))
    .limit(1);
  if (!category) {
    throw new NotFoundError(`There is no syntactic category with id ${id}`);
  }
  return category;
}

export async function getSyntacticCategory(db: Database, id: number): Promise<SyntacticCategoryDict> {
  return toSyntacticCategoryDict(await findSyntacticCategory(db, id));
}

async function assertUniqueName(db: Database, name: string, excludeId?: number): Promise<void> {
  const sameName = eq(syntacticCategories.name, name);
  const [existing] = await db
    .select({ id: syntacticCategories.id })
    .from(syntacticCategories)
    .where(excludeId === undefined ? sameName : and(sameName, ne(syntacticCategories.id, excludeId)))
    .limit(1);
  if (existing) {
    throw new InvalidInputError({
      name: 'The submitted value for SyntacticCategory.name is not unique.',
    });
  }
}

export async function createSyntacticCategory(
  db: Database,
  input: SyntacticCategoryInput
): Promise<SyntacticCategoryDict> {
  const name = normalize(input.name);
  await assertUniqueName(db, name);

  const [category] = await db
    .insert(syntacticCategories)
    .values({
      uuid: randomUUID(),
      name,
      type: input.type,
      description: normalize(input.description),
      datetimeModified: new Date(),
    })
    .returning();

  logger.info('Syntactic category created', { syntacticCategoryId: category.id });
  return toSyntacticCategoryDict(category);
}

export async function updateSyntacticCategory(
  db: Database,
  id: number,
  input: SyntacticCategoryInput
): Promise<SyntacticCategoryDict> {
  const category = await findSyntacticCategory(db, id);
  const name = normalize(input.name);
  const description = normalize(input.description);
  await assertUniqueName(db, name, id);

  if (category.name === name && category.type === input.type && category.description === description) {
    throw new BadRequestError(NOT_NEW_MESSAGE);
  }

  const [updated] = await db
    .update(syntacticCategories)
    .set({ name, type: input.type, description, datetimeModified: new Date() })
    .where(eq(syntacticCategories.id, id))
    .returning();

  logger.info('Syntactic category updated', { syntacticCategoryId: id });
  return toSyntacticCategoryDict(updated);
}

export async function deleteSyntacticCategory(db: Database, id: number): Promise<SyntacticCategoryDict> {
  const category = await findSyntacticCategory(db, id);
  await db.delete(syntacticCategories).where(eq(syntacticCategories.id, id));
  logger.info('Syntactic category deleted', { syntacticCategoryId: id });
  return toSyntacticCategoryDict(category);
}

export async function syntacticCategoryExists(db: Database, id: number): Promise<boolean> {
  const [row] = await db
    .select({ id: syntacticCategories.id })
    .from(syntacticCategories)
    .where(eq(syntacticCategories.id, id))
    .limit(1);
  return row !== undefined;
}
