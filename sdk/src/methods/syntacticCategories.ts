import { OldHttpClient } from '../http.js';
import type { ListInput, SyntacticCategory, SyntacticCategoryInput } from '../types.js';
import { listQuery, type ListResult } from './listing.js';

export async function listSyntacticCategoriesMethod(
  http: OldHttpClient,
  input?: ListInput,
): Promise<ListResult<SyntacticCategory>> {
  return http.request<ListResult<SyntacticCategory>>({
    method: 'GET',
    path: '/syntacticcategories',
    query: listQuery(input),
  });
}

export async function createSyntacticCategoryMethod(
  http: OldHttpClient,
  input: SyntacticCategoryInput,
): Promise<SyntacticCategory> {
  return http.request<SyntacticCategory>({
    method: 'POST',
    path: '/syntacticcategories',
    body: input,
  });
}
