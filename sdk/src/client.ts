import { OldHttpClient } from './http.js';
import {
  createCorpusMethod,
  deleteCorpusMethod,
  downloadCorpusFileMethod,
  getCorpusHistoryMethod,
  getCorpusMethod,
  listCorporaMethod,
  searchCorporaMethod,
  updateCorpusMethod,
  writeCorpusToFileMethod,
} from './methods/corpora.js';
import { getCorpusBackupMethod, listCorpusBackupsMethod } from './methods/corpusBackups.js';
import type { ListResult } from './methods/listing.js';
import {
  createSyntacticCategoryMethod,
  listSyntacticCategoriesMethod,
} from './methods/syntacticCategories.js';
import type {
  Corpus,
  CorpusBackup,
  CorpusFormatName,
  CorpusHistory,
  CorpusInput,
  DownloadedCorpusFile,
  ListInput,
  OldClientConfig,
  Page,
  Paginator,
  SearchInput,
  SyntacticCategory,
  SyntacticCategoryInput,
} from './types.js';

type PagedListInput = ListInput & { paginator: Paginator };
type UnpagedListInput = Omit<ListInput, 'paginator'>;
type PagedSearchInput = SearchInput & { paginator: Paginator };
type UnpagedSearchInput = Omit<SearchInput, 'paginator'>;

export class OldClient {
  private readonly http: OldHttpClient;

  constructor(config: OldClientConfig) {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new Error('OldClient requires a non-empty apiKey');
    }
    if (!config.baseUrl || config.baseUrl.trim().length === 0) {
      throw new Error('OldClient requires a baseUrl');
    }

    this.http = new OldHttpClient(config);
  }

  // Corpora

  listCorpora(input: PagedListInput): Promise<Page<Corpus>>;
  listCorpora(input?: UnpagedListInput): Promise<Corpus[]>;
  async listCorpora(input?: ListInput): Promise<ListResult<Corpus>> {
    return listCorporaMethod(this.http, input);
  }

  searchCorpora(input: PagedSearchInput): Promise<Page<Corpus>>;
  searchCorpora(input: UnpagedSearchInput): Promise<Corpus[]>;
  async searchCorpora(input: SearchInput): Promise<ListResult<Corpus>> {
    return searchCorporaMethod(this.http, input);
  }

  async getCorpus(id: number): Promise<Corpus> {
    return getCorpusMethod(this.http, id);
  }

  async createCorpus(input: CorpusInput): Promise<Corpus> {
    return createCorpusMethod(this.http, input);
  }

  async updateCorpus(id: number, input: CorpusInput): Promise<Corpus> {
    return updateCorpusMethod(this.http, id, input);
  }

  async deleteCorpus(id: number): Promise<Corpus> {
    return deleteCorpusMethod(this.http, id);
  }

  async getCorpusHistory(idOrUuid: number | string): Promise<CorpusHistory> {
    return getCorpusHistoryMethod(this.http, idOrUuid);
  }

  async writeCorpusToFile(id: number, format: CorpusFormatName): Promise<Corpus> {
    return writeCorpusToFileMethod(this.http, id, format);
  }

  async downloadCorpusFile(id: number, fileId: number): Promise<DownloadedCorpusFile> {
    return downloadCorpusFileMethod(this.http, id, fileId);
  }

  // Corpus backups

  listCorpusBackups(input: PagedListInput): Promise<Page<CorpusBackup>>;
  listCorpusBackups(input?: UnpagedListInput): Promise<CorpusBackup[]>;
  async listCorpusBackups(input?: ListInput): Promise<ListResult<CorpusBackup>> {
    return listCorpusBackupsMethod(this.http, input);
  }

  async getCorpusBackup(id: number): Promise<CorpusBackup> {
    return getCorpusBackupMethod(this.http, id);
  }

  // Syntactic categories

  listSyntacticCategories(input: PagedListInput): Promise<Page<SyntacticCategory>>;
  listSyntacticCategories(input?: UnpagedListInput): Promise<SyntacticCategory[]>;
  async listSyntacticCategories(input?: ListInput): Promise<ListResult<SyntacticCategory>> {
    return listSyntacticCategoriesMethod(this.http, input);
  }

  async createSyntacticCategory(input: SyntacticCategoryInput): Promise<SyntacticCategory> {
    return createSyntacticCategoryMethod(this.http, input);
  }
}
