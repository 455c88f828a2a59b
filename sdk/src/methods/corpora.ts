import { OldHttpClient } from '../http.js';
import type {
  Corpus,
  CorpusFormatName,
  CorpusHistory,
  CorpusInput,
  DownloadedCorpusFile,
  ListInput,
  SearchInput,
} from '../types.js';
import { listQuery, searchBody, type ListResult } from './listing.js';

function corpusPath(id: number | string, suffix = ''): string {
  return `/corpora/${encodeURIComponent(String(id))}${suffix}`;
}

export async function listCorporaMethod(
  http: OldHttpClient,
  input?: ListInput,
): Promise<ListResult<Corpus>> {
  return http.request<ListResult<Corpus>>({
    method: 'GET',
    path: '/corpora',
    query: listQuery(input),
  });
}

export async function searchCorporaMethod(
  http: OldHttpClient,
  input: SearchInput,
): Promise<ListResult<Corpus>> {
  return http.request<ListResult<Corpus>>({
    method: 'POST',
    path: '/corpora/search',
    body: searchBody(input),
  });
}

export async function getCorpusMethod(http: OldHttpClient, id: number): Promise<Corpus> {
  return http.request<Corpus>({ method: 'GET', path: corpusPath(id) });
}

export async function createCorpusMethod(http: OldHttpClient, input: CorpusInput): Promise<Corpus> {
  return http.request<Corpus>({ method: 'POST', path: '/corpora', body: input });
}

export async function updateCorpusMethod(
  http: OldHttpClient,
  id: number,
  input: CorpusInput,
): Promise<Corpus> {
  return http.request<Corpus>({ method: 'PUT', path: corpusPath(id), body: input });
}

export async function deleteCorpusMethod(http: OldHttpClient, id: number): Promise<Corpus> {
  return http.request<Corpus>({ method: 'DELETE', path: corpusPath(id) });
}

/**
 * History by integer id or UUID; the UUID still resolves after deletion
 */
export async function getCorpusHistoryMethod(
  http: OldHttpClient,
  idOrUuid: number | string,
): Promise<CorpusHistory> {
  return http.request<CorpusHistory>({ method: 'GET', path: corpusPath(idOrUuid, '/history') });
}

export async function writeCorpusToFileMethod(
  http: OldHttpClient,
  id: number,
  format: CorpusFormatName,
): Promise<Corpus> {
  return http.request<Corpus>({
    method: 'PUT',
    path: corpusPath(id, '/writetofile'),
    body: { format },
  });
}

export async function downloadCorpusFileMethod(
  http: OldHttpClient,
  id: number,
  fileId: number,
): Promise<DownloadedCorpusFile> {
  const { body, headers } = await http.requestBinary({
    method: 'GET',
    path: corpusPath(id, `/servefile/${fileId}`),
  });

  return {
    filename: parseFilename(headers['content-disposition']),
    body,
  };
}

function parseFilename(disposition: string | undefined): string | null {
  if (!disposition) return null;
  const match = /filename="?([^";]+)"?/.exec(disposition);
  return match ? match[1] : null;
}
