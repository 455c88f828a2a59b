/**
 * Form Search Service
 *
 * Saved Form queries. A search is compiled on save so only valid queries
 * are stored; corpora that reference one export its matches.
 */

import { desc, eq, inArray } from 'drizzle-orm';
import {
  formSearches,
  type FormSearch,
  type FormSearchMini,
  type SavedQuery,
  type User,
  type UserMini,
} from '@/db/schema';
import type { Database } from '@/db/client';
import { InvalidInputError, NotFoundError } from '@/errors/http';
import type { AuthUser } from '@/types/hono';
import { normalize } from '@/utils/text';
import { logger } from '@/utils/logger';
import { checkRegexPatterns, listIndex, type IndexParams, type ListResult } from './listing';
import { QueryBuilder } from './queryBuilder';
import { toUserMini } from './user.service';

export interface FormSearchInput {
  name: string;
  search: SavedQuery;
  description: string;
}

export interface FormSearchDict {
  id: number;
  name: string;
  search: SavedQuery;
  description: string;
  enterer: UserMini | null;
  datetime_modified: string;
}

type FormSearchWithEnterer = FormSearch & { enterer: User | null };

export function toFormSearchDict(formSearch: FormSearchWithEnterer): FormSearchDict {
  return {
    id: formSearch.id,
    name: formSearch.name,
    search: formSearch.search,
    description: formSearch.description,
    enterer: formSearch.enterer ? toUserMini(formSearch.enterer) : null,
    datetime_modified: formSearch.datetimeModified.toISOString(),
  };
}

export function toFormSearchMini(formSearch: Pick<FormSearch, 'id' | 'name'>): FormSearchMini {
  return { id: formSearch.id, name: formSearch.name };
}

async function loadFormSearches(db: Database, ids: number[]): Promise<FormSearchDict[]> {
  const rows = await db.query.formSearches.findMany({
    where: inArray(formSearches.id, ids),
    with: { enterer: true },
  });
  return rows.map(toFormSearchDict);
}

export function listFormSearches(db: Database, params: IndexParams): Promise<ListResult<FormSearchDict>> {
  return listIndex(db, 'FormSearch', params, loadFormSearches);
}

export async function getFormSearch(db: Database, id: number): Promise<FormSearchDict> {
  const [formSearch] = await loadFormSearches(db, [id]);
  if (!formSearch) {
    throw new NotFoundError(`There is no form search with id ${id}`);
  }
  return formSearch;
}

export async function createFormSearch(
  db: Database,
  input: FormSearchInput,
  user: AuthUser
): Promise<FormSearchDict> {
  const name = normalize(input.name);
  const [existing] = await db
    .select({ id: formSearches.id })
    .from(formSearches)
    .where(eq(formSearches.name, name))
    .limit(1);
  if (existing) {
    throw new InvalidInputError({ name: 'The submitted value for FormSearch.name is not unique.' });
  }

  // Throws SearchParseError for an invalid query
  const { patterns } = new QueryBuilder('Form').compileQuery(input.search);
  await checkRegexPatterns(db, patterns);

  const [created] = await db
    .insert(formSearches)
    .values({
      name,
      search: input.search,
      description: normalize(input.description),
      entererId: user.id,
      datetimeModified: new Date(),
    })
    .returning({ id: formSearches.id });

  logger.info('Form search created', { formSearchId: created.id, userId: user.id });
  return getFormSearch(db, created.id);
}

export async function deleteFormSearch(db: Database, id: number): Promise<FormSearchDict> {
  const formSearch = await getFormSearch(db, id);
  await db.delete(formSearches).where(eq(formSearches.id, id));
  logger.info('Form search deleted', { formSearchId: id });
  return formSearch;
}

export async function listFormSearchMinis(db: Database): Promise<FormSearchMini[]> {
  const rows = await db
    .select({ id: formSearches.id, name: formSearches.name })
    .from(formSearches)
    .orderBy(formSearches.id);
  return rows.map(toFormSearchMini);
}

export async function getLatestFormSearchModification(db: Database): Promise<Date | null> {
  const [row] = await db
    .select({ datetimeModified: formSearches.datetimeModified })
    .from(formSearches)
    .orderBy(desc(formSearches.datetimeModified))
    .limit(1);
  return row?.datetimeModified ?? null;
}

export async function formSearchExists(db: Database, id: number): Promise<boolean> {
  const [row] = await db
    .select({ id: formSearches.id })
    .from(formSearches)
    .where(eq(formSearches.id, id))
    .limit(1);
  return row !== undefined;
}
