/**
 * Query Builder
 *
 * Translates JSON search expressions into Drizzle SQL predicates and
 * orderings for one model.
 *
 * Query object: { filter: <filter>, order_by?: [model, attribute, direction?] }
 *
 * Filters:
 * - [model, attribute, relation, value]
 * - [model, relationAttribute, attribute, relation, value]
 * - ["and", [filter, ...]] | ["or", [filter, ...]] | ["not", filter]
 *
 * Relations: = != < > <= >= like regex in
 *
 * Every problem found in one query is collected and raised together as a
 * SearchParseError keyed by the offending expression.
 */

import {
  and,
  asc,
  desc,
  eq,
  gt,
  gte,
  inArray,
  isNotNull,
  isNull,
  like,
  lt,
  lte,
  ne,
  not,
  or,
  sql,
  type Column,
  type SQL,
} from 'drizzle-orm';
import type { PgTable } from 'drizzle-orm/pg-core';
import {
  corpora,
  corporaForms,
  corporaTags,
  corpusBackups,
  forms,
  formSearches,
  formsTags,
  syntacticCategories,
  tags,
  users,
} from '@/db/schema';
import type { FieldErrors } from '@/errors/http';

export type ModelName =
  | 'Form'
  | 'Corpus'
  | 'CorpusBackup'
  | 'SyntacticCategory'
  | 'Tag'
  | 'FormSearch'
  | 'User';

type AttributeKind = 'string' | 'number' | 'datetime';

interface Attribute {
  column: Column;
  kind: AttributeKind;
}

interface ScalarRelation {
  kind: 'scalar';
  target: ModelName;
  /** Foreign key column on the owning table */
  foreignKey: Column;
}

interface CollectionRelation {
  kind: 'collection';
  target: ModelName;
  junction: PgTable;
  /** Junction column pointing at the owning model */
  ownerKey: Column;
  /** Junction column pointing at the target model */
  targetKey: Column;
}

type Relation = ScalarRelation | CollectionRelation;

export interface ModelConfig {
  table: PgTable;
  primaryKey: Column;
  attributes: Record<string, Attribute>;
  relations: Record<string, Relation>;
}

export type SearchRelation = '=' | '!=' | '<' | '>' | '<=' | '>=' | 'like' | 'regex' | 'in';

const RELATIONS: readonly SearchRelation[] = ['=', '!=', '<', '>', '<=', '>=', 'like', 'regex', 'in'];

export const MALFORMED_QUERY_KEY = 'Malformed query error';
export const MALFORMED_QUERY_MESSAGE = 'The submitted query was malformed';
export const ORDER_BY_ERROR_KEY = 'OrderByError';
export const ORDER_BY_ERROR_MESSAGE = 'The provided order by expression was invalid.';

const str = (column: Column): Attribute => ({ column, kind: 'string' });
const num = (column: Column): Attribute => ({ column, kind: 'number' });
const datetime = (column: Column): Attribute => ({ column, kind: 'datetime' });

const formAttributes: Record<string, Attribute> = {
  id: num(forms.id),
  UUID: str(forms.uuid),
  transcription: str(forms.transcription),
  morpheme_break: str(forms.morphemeBreak),
  morpheme_gloss: str(forms.morphemeGloss),
  grammaticality: str(forms.grammaticality),
  syntax: str(forms.syntax),
  datetime_entered: datetime(forms.datetimeEntered),
  datetime_modified: datetime(forms.datetimeModified),
};

export const MODELS: Record<ModelName, ModelConfig> = {
  Form: {
    table: forms,
    primaryKey: forms.id,
    attributes: formAttributes,
    relations: {
      tags: {
        kind: 'collection',
        target: 'Tag',
        junction: formsTags,
        ownerKey: formsTags.formId,
        targetKey: formsTags.tagId,
      },
      syntactic_category: {
        kind: 'scalar',
        target: 'SyntacticCategory',
        foreignKey: forms.syntacticCategoryId,
      },
      enterer: { kind: 'scalar', target: 'User', foreignKey: forms.entererId },
      modifier: { kind: 'scalar', target: 'User', foreignKey: forms.modifierId },
    },
  },
  Corpus: {
    table: corpora,
    primaryKey: corpora.id,
    attributes: {
      id: num(corpora.id),
      UUID: str(corpora.uuid),
      name: str(corpora.name),
      description: str(corpora.description),
      content: str(corpora.content),
      datetime_entered: datetime(corpora.datetimeEntered),
      datetime_modified: datetime(corpora.datetimeModified),
    },
    relations: {
      tags: {
        kind: 'collection',
        target: 'Tag',
        junction: corporaTags,
        ownerKey: corporaTags.corpusId,
        targetKey: corporaTags.tagId,
      },
      forms: {
        kind: 'collection',
        target: 'Form',
        junction: corporaForms,
        ownerKey: corporaForms.corpusId,
        targetKey: corporaForms.formId,
      },
      form_search: { kind: 'scalar', target: 'FormSearch', foreignKey: corpora.formSearchId },
      enterer: { kind: 'scalar', target: 'User', foreignKey: corpora.entererId },
      modifier: { kind: 'scalar', target: 'User', foreignKey: corpora.modifierId },
    },
  },
  CorpusBackup: {
    table: corpusBackups,
    primaryKey: corpusBackups.id,
    attributes: {
      id: num(corpusBackups.id),
      corpus_id: num(corpusBackups.corpusId),
      UUID: str(corpusBackups.uuid),
      name: str(corpusBackups.name),
      description: str(corpusBackups.description),
      content: str(corpusBackups.content),
      datetime_entered: datetime(corpusBackups.datetimeEntered),
      datetime_modified: datetime(corpusBackups.datetimeModified),
    },
    relations: {},
  },
  SyntacticCategory: {
    table: syntacticCategories,
    primaryKey: syntacticCategories.id,
    attributes: {
      id: num(syntacticCategories.id),
      UUID: str(syntacticCategories.uuid),
      name: str(syntacticCategories.name),
      type: str(syntacticCategories.type),
      description: str(syntacticCategories.description),
      datetime_modified: datetime(syntacticCategories.datetimeModified),
    },
    relations: {},
  },
  Tag: {
    table: tags,
    primaryKey: tags.id,
    attributes: {
      id: num(tags.id),
      name: str(tags.name),
      description: str(tags.description),
      datetime_modified: datetime(tags.datetimeModified),
    },
    relations: {},
  },
  FormSearch: {
    table: formSearches,
    primaryKey: formSearches.id,
    attributes: {
      id: num(formSearches.id),
      name: str(formSearches.name),
      description: str(formSearches.description),
      datetime_modified: datetime(formSearches.datetimeModified),
    },
    relations: {
      enterer: { kind: 'scalar', target: 'User', foreignKey: formSearches.entererId },
    },
  },
  User: {
    table: users,
    primaryKey: users.id,
    attributes: {
      id: num(users.id),
      username: str(users.username),
      first_name: str(users.firstName),
      last_name: str(users.lastName),
      role: str(users.role),
    },
    relations: {},
  },
};

/**
 * Raised with every error collected while compiling one query
 */
export class SearchParseError extends Error {
  constructor(readonly errors: FieldErrors) {
    super(`Invalid search: ${Object.keys(errors).join(', ')}`);
    this.name = 'SearchParseError';
  }
}

/** A `regex` operand, checked by the database before the query runs */
export interface RegexPattern {
  key: string;
  pattern: string;
}

export interface CompiledQuery {
  where?: SQL;
  orderBy: SQL[];
  patterns: RegexPattern[];
}

export interface OrderByParams {
  order_by_model?: string;
  order_by_attribute?: string;
  order_by_direction?: 'asc' | 'desc';
}

type ScalarValue = string | number | null;

const MIN_INTEGER = -2_147_483_648;
const MAX_INTEGER = 2_147_483_647;

function isSearchRelation(value: unknown): value is SearchRelation {
  return RELATIONS.some((relation) => relation === value);
}

function isScalarValue(value: unknown): value is ScalarValue {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class QueryBuilder {
  readonly model: ModelConfig;
  private patterns: RegexPattern[] = [];

  constructor(readonly modelName: ModelName) {
    this.model = MODELS[modelName];
  }

  /**
   * Compile a full query object ({filter, order_by?})
   */
  compileQuery(query: unknown): CompiledQuery {
    const errors: FieldErrors = {};
    this.patterns = [];

    if (!isRecord(query) || !('filter' in query)) {
      throw new SearchParseError({ [MALFORMED_QUERY_KEY]: MALFORMED_QUERY_MESSAGE });
    }

    const where = this.filterExpression(query.filter, errors);
    const orderBy =
      query.order_by === undefined || query.order_by === null
        ? this.defaultOrderBy()
        : this.orderByExpression(query.order_by, errors);

    if (Object.keys(errors).length > 0) {
      throw new SearchParseError(errors);
    }
    return { where, orderBy, patterns: this.patterns };
  }

  /**
   * Ordering from query-string parameters. Applied only when all three are
   * present; an unknown model or attribute falls back to the primary key.
   */
  orderByFromParams(params: OrderByParams): SQL[] {
    const { order_by_model, order_by_attribute, order_by_direction } = params;
    if (!order_by_model || !order_by_attribute || !order_by_direction) {
      return this.defaultOrderBy();
    }
    const errors: FieldErrors = {};
    const orderBy = this.orderByExpression(
      [order_by_model, order_by_attribute, order_by_direction],
      errors
    );
    return Object.keys(errors).length > 0 ? this.defaultOrderBy() : orderBy;
  }

  defaultOrderBy(): SQL[] {
    return [asc(this.model.primaryKey)];
  }

  // ---------------------------------------------------------------------
  // Filters
  // ---------------------------------------------------------------------

  private filterExpression(filter: unknown, errors: FieldErrors): SQL | undefined {
    if (!Array.isArray(filter) || filter.length === 0) {
      errors[MALFORMED_QUERY_KEY] = MALFORMED_QUERY_MESSAGE;
      return undefined;
    }

    const parts: unknown[] = filter;
    const head = parts[0];

    if (head === 'and' || head === 'or') {
      const operands = parts[1];
      if (parts.length !== 2 || !Array.isArray(operands) || operands.length === 0) {
        errors[MALFORMED_QUERY_KEY] = MALFORMED_QUERY_MESSAGE;
        return undefined;
      }
      const compiled = operands.map((operand: unknown) => this.filterExpression(operand, errors));
      const clauses = compiled.filter((clause): clause is SQL => clause !== undefined);
      if (clauses.length !== compiled.length) return undefined;
      return head === 'and' ? and(...clauses) : or(...clauses);
    }

    if (head === 'not') {
      if (parts.length !== 2) {
        errors[MALFORMED_QUERY_KEY] = MALFORMED_QUERY_MESSAGE;
        return undefined;
      }
      const inner = this.filterExpression(parts[1], errors);
      return inner ? not(inner) : undefined;
    }

    if (parts.length === 4) {
      const [modelName, attribute, relation, value] = parts;
      return this.simpleFilter(modelName, attribute, relation, value, errors);
    }

    if (parts.length === 5) {
      const [modelName, relationName, attribute, relation, value] = parts;
      return this.relationalFilter(modelName, relationName, attribute, relation, value, errors);
    }

    errors[MALFORMED_QUERY_KEY] = MALFORMED_QUERY_MESSAGE;
    return undefined;
  }

  private checkModel(modelName: unknown, errors: FieldErrors): boolean {
    if (modelName !== this.modelName) {
      errors[String(modelName)] = `Searching the ${String(modelName)} model is not permitted`;
      return false;
    }
    return true;
  }

  private simpleFilter(
    modelName: unknown,
    attributeName: unknown,
    relation: unknown,
    value: unknown,
    errors: FieldErrors
  ): SQL | undefined {
    if (!this.checkModel(modelName, errors)) return undefined;
    const name = String(attributeName);

    const attribute = typeof attributeName === 'string' ? this.model.attributes[name] : undefined;
    if (attribute) {
      return comparison(this.modelName, name, attribute, relation, value, errors, this.patterns);
    }

    // [model, relation, "="|"!=", null] tests for the presence of related rows
    const related = typeof attributeName === 'string' ? this.model.relations[name] : undefined;
    if (related && value === null && (relation === '=' || relation === '!=')) {
      const absent = this.relationAbsent(related);
      return relation === '=' ? absent : not(absent);
    }

    if (related) {
      errors[`${this.modelName}.${name}.${String(relation)}`] =
        `The relation ${String(relation)} is not permitted for ${this.modelName}.${name}`;
      return undefined;
    }

    errors[`${this.modelName}.${name}`] = `Searching on ${this.modelName}.${name} is not permitted`;
    return undefined;
  }

  private relationalFilter(
    modelName: unknown,
    relationName: unknown,
    attributeName: unknown,
    relation: unknown,
    value: unknown,
    errors: FieldErrors
  ): SQL | undefined {
    if (!this.checkModel(modelName, errors)) return undefined;
    const relName = String(relationName);
    const related = typeof relationName === 'string' ? this.model.relations[relName] : undefined;
    if (!related) {
      errors[`${this.modelName}.${relName}`] = `Searching on ${this.modelName}.${relName} is not permitted`;
      return undefined;
    }

    const target = MODELS[related.target];
    const attrName = String(attributeName);
    const attribute = typeof attributeName === 'string' ? target.attributes[attrName] : undefined;
    if (!attribute) {
      errors[`${related.target}.${attrName}`] = `Searching on ${related.target}.${attrName} is not permitted`;
      return undefined;
    }

    const condition = comparison(related.target, attrName, attribute, relation, value, errors, this.patterns);
    if (!condition) return undefined;

    if (related.kind === 'scalar') {
      return sql`exists (select 1 from ${target.table} where ${target.primaryKey} = ${related.foreignKey} and ${condition})`;
    }

    return sql`exists (select 1 from ${related.junction} inner join ${target.table} on ${related.targetKey} = ${target.primaryKey} where ${related.ownerKey} = ${this.model.primaryKey} and ${condition})`;
  }

  private relationAbsent(related: Relation): SQL {
    if (related.kind === 'scalar') {
      return isNull(related.foreignKey);
    }
    return sql`not exists (select 1 from ${related.junction} where ${related.ownerKey} = ${this.model.primaryKey})`;
  }

  // ---------------------------------------------------------------------
  // Ordering
  // ---------------------------------------------------------------------

  private orderByExpression(orderBy: unknown, errors: FieldErrors): SQL[] {
    if (!Array.isArray(orderBy) || orderBy.length < 2 || orderBy.length > 3) {
      errors[ORDER_BY_ERROR_KEY] = ORDER_BY_ERROR_MESSAGE;
      return this.defaultOrderBy();
    }

    const terms: unknown[] = orderBy;
    const [modelName, attributeName, direction = 'asc'] = terms;
    const attribute =
      modelName === this.modelName && typeof attributeName === 'string'
        ? this.model.attributes[attributeName]
        : undefined;

    if (!attribute || (direction !== 'asc' && direction !== 'desc')) {
      errors[ORDER_BY_ERROR_KEY] = ORDER_BY_ERROR_MESSAGE;
      return this.defaultOrderBy();
    }

    const primary = direction === 'asc' ? asc(attribute.column) : desc(attribute.column);
    if (attribute.column === this.model.primaryKey) {
      return [primary];
    }
    // Primary key breaks ties so pages are stable
    return [primary, direction === 'asc' ? asc(this.model.primaryKey) : desc(this.model.primaryKey)];
  }
}

// -----------------------------------------------------------------------
// Comparisons
// -----------------------------------------------------------------------

function coerceValue(
  modelName: string,
  attributeName: string,
  attribute: Attribute,
  value: ScalarValue,
  errors: FieldErrors
): ScalarValue | Date | undefined {
  if (value === null) return null;

  switch (attribute.kind) {
    case 'number': {
      const parsed = typeof value === 'number' ? value : Number(value);
      if (typeof value === 'string' && value.trim() === '') break;
      // Every numeric attribute is an INTEGER column
      if (Number.isInteger(parsed) && parsed >= MIN_INTEGER && parsed <= MAX_INTEGER) return parsed;
      break;
    }
    case 'datetime': {
      const parsed = new Date(value);
      if (!Number.isNaN(parsed.getTime())) return parsed;
      errors[`${modelName}.${attributeName}`] = `Invalid datetime value for ${modelName}.${attributeName}`;
      return undefined;
    }
    case 'string':
      return String(value);
  }

  errors[`${modelName}.${attributeName}`] = `Invalid numeric value for ${modelName}.${attributeName}`;
  return undefined;
}

function comparison(
  modelName: string,
  attributeName: string,
  attribute: Attribute,
  relation: unknown,
  rawValue: unknown,
  errors: FieldErrors,
  patterns: RegexPattern[]
): SQL | undefined {
  const key = `${modelName}.${attributeName}`;

  if (!isSearchRelation(relation)) {
    errors[`${key}.${String(relation)}`] =
      `The relation ${String(relation)} is not permitted for ${key}`;
    return undefined;
  }
  const column = attribute.column;

  if (relation === 'in') {
    if (!Array.isArray(rawValue) || !rawValue.every(isScalarValue)) {
      errors[`${key}.in`] = 'The value of an "in" relation must be a list';
      return undefined;
    }
    const values: unknown[] = [];
    for (const item of rawValue) {
      const coerced = coerceValue(modelName, attributeName, attribute, item, errors);
      if (coerced === undefined) return undefined;
      values.push(coerced);
    }
    return values.length === 0 ? sql`false` : inArray(column, values);
  }

  if (!isScalarValue(rawValue)) {
    errors[key] = `Invalid filter value for ${key}`;
    return undefined;
  }

  if (rawValue === null) {
    if (relation === '=') return isNull(column);
    if (relation === '!=') return isNotNull(column);
    errors[`${key}.${relation}`] = `The relation ${relation} cannot be used with a null value`;
    return undefined;
  }

  if (relation === 'like' || relation === 'regex') {
    if (attribute.kind !== 'string' || typeof rawValue !== 'string') {
      errors[`${key}.${relation}`] = `The relation ${relation} is not permitted for ${key}`;
      return undefined;
    }
    if (relation === 'like') return like(column, rawValue);
    patterns.push({ key: `${key}.regex`, pattern: rawValue });
    return sql`${column} ~ ${rawValue}`;
  }

  const value = coerceValue(modelName, attributeName, attribute, rawValue, errors);
  if (value === undefined) return undefined;

  switch (relation) {
    case '=':
      return eq(column, value);
    case '!=':
      return ne(column, value);
    case '<':
      return lt(column, value);
    case '>':
      return gt(column, value);
    case '<=':
      return lte(column, value);
    case '>=':
      return gte(column, value);
  }
}
