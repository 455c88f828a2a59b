/**
 * Listing
 *
 * Shared index/search plumbing: select the ordered ids of a model, page
 * them, then load the full entities in that order.
 */

import { count, sql, type SQL } from 'drizzle-orm';
import type { Database } from '@/db/client';
import type { FieldErrors } from '@/errors/http';
import {
  QueryBuilder,
  SearchParseError,
  type ModelName,
  type OrderByParams,
  type RegexPattern,
} from './queryBuilder';

/** SQLSTATE raised for a pattern PostgreSQL cannot compile */
const INVALID_REGULAR_EXPRESSION = '2201B';

export interface Paginator {
  page: number;
  items_per_page: number;
}

export interface PaginatedResult<T> {
  paginator: Paginator & { count: number };
  items: T[];
}

export type ListResult<T> = T[] | PaginatedResult<T>;

export interface ListOptions<T extends { id: number }> {
  where?: SQL;
  orderBy: SQL[];
  paginator?: Paginator;
  /** Load entities for ids; result order is irrelevant */
  load: (db: Database, ids: number[]) => Promise<T[]>;
}

export interface IndexParams extends OrderByParams {
  page?: number;
  items_per_page?: number;
}

/**
 * Pagination applies only when both parameters are given
 */
export function paginatorFromParams(params: IndexParams): Paginator | undefined {
  if (params.page === undefined || params.items_per_page === undefined) {
    return undefined;
  }
  return { page: params.page, items_per_page: params.items_per_page };
}

function sqlState(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return sqlState(error.cause);
  return undefined;
}

/**
 * Compile each regex operand in the database so a bad pattern is reported
 * against its expression instead of failing the whole query
 */
export async function checkRegexPatterns(db: Database, patterns: RegexPattern[]): Promise<void> {
  const errors: FieldErrors = {};
  for (const { key, pattern } of patterns) {
    try {
      await db.execute(sql`select ''::text ~ ${pattern}::text`);
    } catch (error) {
      if (sqlState(error) !== INVALID_REGULAR_EXPRESSION) throw error;
      errors[key] = `The regular expression ${pattern} is not valid`;
    }
  }
  if (Object.keys(errors).length > 0) {
    throw new SearchParseError(errors);
  }
}

function orderByIds<T extends { id: number }>(ids: number[], entities: T[]): T[] {
  const byId = new Map(entities.map((entity) => [entity.id, entity]));
  return ids.flatMap((id) => {
    const entity = byId.get(id);
    return entity ? [entity] : [];
  });
}

export async function listResources<T extends { id: number }>(
  db: Database,
  modelName: ModelName,
  options: ListOptions<T>
): Promise<ListResult<T>> {
  const { table, primaryKey } = new QueryBuilder(modelName).model;

  let idQuery = db
    .select({ id: sql<number>`${primaryKey}` })
    .from(table)
    .where(options.where)
    .orderBy(...options.orderBy)
    .$dynamic();

  const { paginator } = options;
  if (paginator) {
    idQuery = idQuery
      .limit(paginator.items_per_page)
      .offset((paginator.page - 1) * paginator.items_per_page);
  }

  const ids = (await idQuery).map((row) => Number(row.id));
  const items = ids.length > 0 ? orderByIds(ids, await options.load(db, ids)) : [];

  if (!paginator) {
    return items;
  }

  const [total] = await db.select({ count: count() }).from(table).where(options.where);
  return {
    paginator: { ...paginator, count: total?.count ?? 0 },
    items,
  };
}

/**
 * GET index: query-string ordering and pagination
 */
export function listIndex<T extends { id: number }>(
  db: Database,
  modelName: ModelName,
  params: IndexParams,
  load: ListOptions<T>['load']
): Promise<ListResult<T>> {
  const builder = new QueryBuilder(modelName);
  return listResources(db, modelName, {
    orderBy: builder.orderByFromParams(params),
    paginator: paginatorFromParams(params),
    load,
  });
}

/**
 * POST search: compiled query plus optional paginator
 */
export async function listSearch<T extends { id: number }>(
  db: Database,
  modelName: ModelName,
  query: unknown,
  paginator: Paginator | undefined,
  load: ListOptions<T>['load']
): Promise<ListResult<T>> {
  const { where, orderBy, patterns } = new QueryBuilder(modelName).compileQuery(query);
  await checkRegexPatterns(db, patterns);
  return listResources(db, modelName, { where, orderBy, paginator, load });
}
