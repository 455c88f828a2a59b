/**
 * OLD Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL
 *
 * Mirrors sql/init.sql, which is the DDL actually applied to the database.
 * Relations below drive the relational query API used to eager-load
 * corpora, forms and their collections.
 */

import {
  pgTable,
  varchar,
  boolean,
  timestamp,
  integer,
  jsonb,
  text,
  serial,
  primaryKey,
  unique,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// JSONB Type Definitions for structured fields
export interface Translation {
  transcription: string;
  grammaticality: string;
}

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

/** Saved Form query: `{filter, order_by?}` */
export type SavedQuery = Record<string, unknown>;

export type UserRole = 'administrator' | 'contributor' | 'viewer';

/** Upper bound of the INTEGER id columns */
export const MAX_INTEGER_ID = 2_147_483_647;

export function isStorableId(id: number): boolean {
  return Number.isInteger(id) && id >= 1 && id <= MAX_INTEGER_ID;
}

// =====================================================
// USERS & LOOKUP TABLES
// =====================================================

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  username: varchar('username', { length: 255 }).notNull().unique(),
  firstName: varchar('first_name', { length: 255 }).notNull().default(''),
  lastName: varchar('last_name', { length: 255 }).notNull().default(''),
  email: varchar('email', { length: 255 }).notNull().default(''),
  role: varchar('role', { length: 100 }).notNull().$type<UserRole>(),
  apiKeyHash: varchar('api_key_hash', { length: 64 }).unique(),
  unrestricted: boolean('unrestricted').notNull().default(false),
  datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
});

export const tags = pgTable('tags', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull().unique(),
  description: text('description').notNull().default(''),
  datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
});

export const syntacticCategories = pgTable('syntactic_categories', {
  id: serial('id').primaryKey(),
  uuid: varchar('uuid', { length: 36 }).notNull(),
  name: varchar('name', { length: 255 }).notNull().unique(),
  type: varchar('type', { length: 60 }).notNull().default(''),
  description: text('description').notNull().default(''),
  datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
});

// =====================================================
// FORMS
// =====================================================

export const forms = pgTable('forms', {
  id: serial('id').primaryKey(),
  uuid: varchar('uuid', { length: 36 }).notNull(),
  transcription: varchar('transcription', { length: 510 }).notNull(),
  morphemeBreak: varchar('morpheme_break', { length: 510 }).notNull().default(''),
  morphemeGloss: varchar('morpheme_gloss', { length: 510 }).notNull().default(''),
  grammaticality: varchar('grammaticality', { length: 255 }).notNull().default(''),
  translations: jsonb('translations').notNull().default([]).$type<Translation[]>(),
  syntax: text('syntax').notNull().default(''),
  syntacticCategoryId: integer('syntactic_category_id').references(() => syntacticCategories.id, {
    onDelete: 'set null',
  }),
  entererId: integer('enterer_id').references(() => users.id, { onDelete: 'set null' }),
  modifierId: integer('modifier_id').references(() => users.id, { onDelete: 'set null' }),
  datetimeEntered: timestamp('datetime_entered', { withTimezone: true }).notNull().defaultNow(),
  datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
});

export const formsTags = pgTable(
  'forms_tags',
  {
    formId: integer('form_id')
      .notNull()
      .references(() => forms.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.formId, table.tagId] })]
);

export const formSearches = pgTable('form_searches', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull().unique(),
  search: jsonb('search').notNull().$type<SavedQuery>(),
  description: text('description').notNull().default(''),
  entererId: integer('enterer_id').references(() => users.id, { onDelete: 'set null' }),
  datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
});

// =====================================================
// CORPORA
// =====================================================

export const corpora = pgTable('corpora', {
  id: serial('id').primaryKey(),
  uuid: varchar('uuid', { length: 36 }).notNull(),
  name: varchar('name', { length: 255 }).notNull().unique(),
  description: text('description').notNull().default(''),
  content: text('content').notNull().default(''),
  formSearchId: integer('form_search_id').references(() => formSearches.id, { onDelete: 'set null' }),
  entererId: integer('enterer_id').references(() => users.id, { onDelete: 'set null' }),
  modifierId: integer('modifier_id').references(() => users.id, { onDelete: 'set null' }),
  datetimeEntered: timestamp('datetime_entered', { withTimezone: true }).notNull().defaultNow(),
  datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
});

export const corporaTags = pgTable(
  'corpora_tags',
  {
    corpusId: integer('corpus_id')
      .notNull()
      .references(() => corpora.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.corpusId, table.tagId] })]
);

export const corporaForms = pgTable(
  'corpora_forms',
  {
    corpusId: integer('corpus_id')
      .notNull()
      .references(() => corpora.id, { onDelete: 'cascade' }),
    formId: integer('form_id')
      .notNull()
      .references(() => forms.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.corpusId, table.formId] })]
);

export const corpusFiles = pgTable(
  'corpus_files',
  {
    id: serial('id').primaryKey(),
    corpusId: integer('corpus_id')
      .notNull()
      .references(() => corpora.id, { onDelete: 'cascade' }),
    filename: varchar('filename', { length: 255 }).notNull(),
    format: varchar('format', { length: 255 }).notNull(),
    restricted: boolean('restricted').notNull().default(false),
    creatorId: integer('creator_id').references(() => users.id, { onDelete: 'set null' }),
    modifierId: integer('modifier_id').references(() => users.id, { onDelete: 'set null' }),
    datetimeCreated: timestamp('datetime_created', { withTimezone: true }).notNull().defaultNow(),
    datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('corpus_files_corpus_id_filename_key').on(table.corpusId, table.filename),
    index('idx_corpus_files_corpus').on(table.corpusId),
  ]
);

/**
 * Snapshots of a corpus taken before each update and on delete.
 * No foreign key to corpora: backups outlive their corpus.
 */
export const corpusBackups = pgTable(
  'corpus_backups',
  {
    id: serial('id').primaryKey(),
    corpusId: integer('corpus_id').notNull(),
    uuid: varchar('uuid', { length: 36 }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description').notNull().default(''),
    content: text('content').notNull().default(''),
    formSearch: jsonb('form_search').$type<FormSearchMini | null>(),
    enterer: jsonb('enterer').$type<UserMini | null>(),
    modifier: jsonb('modifier').$type<UserMini | null>(),
    tags: jsonb('tags').notNull().default([]).$type<TagMini[]>(),
    forms: jsonb('forms').notNull().default([]).$type<number[]>(),
    datetimeEntered: timestamp('datetime_entered', { withTimezone: true }).notNull(),
    datetimeModified: timestamp('datetime_modified', { withTimezone: true }).notNull(),
  },
  (table) => [
    index('idx_corpus_backups_corpus').on(table.corpusId),
    index('idx_corpus_backups_uuid').on(table.uuid),
  ]
);

// =====================================================
// RELATIONS
// =====================================================

export const formsRelations = relations(forms, ({ one, many }) => ({
  syntacticCategory: one(syntacticCategories, {
    fields: [forms.syntacticCategoryId],
    references: [syntacticCategories.id],
  }),
  enterer: one(users, { fields: [forms.entererId], references: [users.id], relationName: 'formEnterer' }),
  modifier: one(users, { fields: [forms.modifierId], references: [users.id], relationName: 'formModifier' }),
  tags: many(formsTags),
}));

export const formsTagsRelations = relations(formsTags, ({ one }) => ({
  form: one(forms, { fields: [formsTags.formId], references: [forms.id] }),
  tag: one(tags, { fields: [formsTags.tagId], references: [tags.id] }),
}));

export const formSearchesRelations = relations(formSearches, ({ one }) => ({
  enterer: one(users, { fields: [formSearches.entererId], references: [users.id] }),
}));

export const corporaRelations = relations(corpora, ({ one, many }) => ({
  formSearch: one(formSearches, { fields: [corpora.formSearchId], references: [formSearches.id] }),
  enterer: one(users, { fields: [corpora.entererId], references: [users.id], relationName: 'corpusEnterer' }),
  modifier: one(users, { fields: [corpora.modifierId], references: [users.id], relationName: 'corpusModifier' }),
  tags: many(corporaTags),
  forms: many(corporaForms),
  files: many(corpusFiles),
}));

export const corporaTagsRelations = relations(corporaTags, ({ one }) => ({
  corpus: one(corpora, { fields: [corporaTags.corpusId], references: [corpora.id] }),
  tag: one(tags, { fields: [corporaTags.tagId], references: [tags.id] }),
}));

export const corporaFormsRelations = relations(corporaForms, ({ one }) => ({
  corpus: one(corpora, { fields: [corporaForms.corpusId], references: [corpora.id] }),
  form: one(forms, { fields: [corporaForms.formId], references: [forms.id] }),
}));

export const corpusFilesRelations = relations(corpusFiles, ({ one }) => ({
  corpus: one(corpora, { fields: [corpusFiles.corpusId], references: [corpora.id] }),
  creator: one(users, { fields: [corpusFiles.creatorId], references: [users.id], relationName: 'fileCreator' }),
  modifier: one(users, { fields: [corpusFiles.modifierId], references: [users.id], relationName: 'fileModifier' }),
}));

// Type exports
export type User = typeof users.$inferSelect;
export type Tag = typeof tags.$inferSelect;
export type SyntacticCategory = typeof syntacticCategories.$inferSelect;
export type Form = typeof forms.$inferSelect;
export type FormSearch = typeof formSearches.$inferSelect;
export type Corpus = typeof corpora.$inferSelect;
export type CorpusFile = typeof corpusFiles.$inferSelect;
export type CorpusBackup = typeof corpusBackups.$inferSelect;
export type NewCorpusBackup = typeof corpusBackups.$inferInsert;
