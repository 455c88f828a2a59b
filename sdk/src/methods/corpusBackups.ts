import { OldHttpClient } from '../http.js';
import type { CorpusBackup, ListInput } from '../types.js';
import { listQuery, type ListResult } from './listing.js';

export async function listCorpusBackupsMethod(
  http: OldHttpClient,
  input?: ListInput,
): Promise<ListResult<CorpusBackup>> {
  return http.request<ListResult<CorpusBackup>>({
    method: 'GET',
    path: '/corpusbackups',
    query: listQuery(input),
  });
}

export async function getCorpusBackupMethod(http: OldHttpClient, id: number): Promise<CorpusBackup> {
  return http.request<CorpusBackup>({ method: 'GET', path: `/corpusbackups/${id}` });
}
