export interface OldClientConfig {
  apiKey: string;
  baseUrl: string;
  fetch?: typeof globalThis.fetch;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

export type UserRole = 'administrator' | 'contributor' | 'viewer';

export interface UserMini {
  id: number;
  first_name: string;
  last_name: string;
  role: UserRole;
}

export interface TagMini {
  id: number;
  name: string;
}

export interface FormSearchMini {
  id: number;
  name: string;
}

export type CorpusFormatName = 'treebank' | 'transcriptions only';

export interface CorpusFile {
  id: number;
  filename: string;
  format: string;
  restricted: boolean;
  creator: UserMini | null;
  modifier: UserMini | null;
  datetime_created: string;
  datetime_modified: string;
}

export interface Corpus {
  id: number;
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
  files: CorpusFile[];
}

export interface CorpusBackup {
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

export interface CorpusHistory {
  corpus: Corpus | null;
  previous_versions: CorpusBackup[];
}

export interface CorpusInput {
  name: string;
  description?: string;
  /** Forms are referenced as `form[<id>]` */
  content?: string;
  form_search?: number | null;
  tags?: number[];
}

export type SyntacticCategoryType = 'lexical' | 'phrasal' | 'sentential' | '';

export interface SyntacticCategory {
  id: number;
  UUID: string;
  name: string;
  type: SyntacticCategoryType;
  description: string;
  datetime_modified: string;
}

export interface SyntacticCategoryInput {
  name: string;
  type?: SyntacticCategoryType;
  description?: string;
}

// LISTING
// =====================================================

export type OrderDirection = 'asc' | 'desc';

export interface Paginator {
  page: number;
  items_per_page: number;
}

export interface Page<T> {
  paginator: Paginator & { count: number };
  items: T[];
}

export interface ListInput {
  orderBy?: {
    model: string;
    attribute: string;
    direction?: OrderDirection;
  };
  paginator?: Paginator;
}

/**
 * Nested filter expression, e.g. `['Corpus', 'name', 'like', 'S%']`
 * or `['and', [filter, filter]]`
 */
export type SearchFilter = readonly unknown[];

export interface SearchQuery {
  filter: SearchFilter;
  order_by?: readonly [string, string] | readonly [string, string, OrderDirection];
}

export interface SearchInput {
  query: SearchQuery;
  paginator?: Paginator;
}

export interface DownloadedCorpusFile {
  /** From Content-Disposition; null when the header is missing */
  filename: string | null;
  /** gzip-compressed contents */
  body: Uint8Array;
}
