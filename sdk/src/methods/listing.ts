import type { QueryValue } from '../http.js';
import type { ListInput, Page, SearchInput } from '../types.js';

export type ListResult<T> = T[] | Page<T>;

/**
 * Index query string; ordering and pagination are only sent whole
 */
export function listQuery(input: ListInput = {}): Record<string, QueryValue> {
  return {
    order_by_model: input.orderBy?.model,
    order_by_attribute: input.orderBy?.attribute,
    order_by_direction: input.orderBy?.direction,
    page: input.paginator?.page,
    items_per_page: input.paginator?.items_per_page,
  };
}

export function searchBody(input: SearchInput): Record<string, unknown> {
  return {
    query: input.query,
    ...(input.paginator ? { paginator: input.paginator } : {}),
  };
}
