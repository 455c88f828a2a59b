/**
 * Form Service
 *
 * CRUD and search for forms. Deleting a form detaches it from every corpus
 * (join rows cascade); corpus content keeps its references.
 */

import { randomUUID } from 'crypto';
import { eq, inArray } from 'drizzle-orm';
import {
  forms,
  formsTags,
  isStorableId,
  type Form,
  type SyntacticCategory,
  type Tag,
  type TagMini,
  type Translation,
  type User,
  type UserMini,
} from '@/db/schema';
import type { Database } from '@/db/client';
import {
  BadRequestError,
  InvalidInputError,
  NOT_NEW_MESSAGE,
  NotFoundError,
  type FieldErrors,
} from '@/errors/http';
import type { AuthUser } from '@/types/hono';
import { normalize, unique } from '@/utils/text';
import { logger } from '@/utils/logger';
import { listIndex, listSearch, type IndexParams, type ListResult, type Paginator } from './listing';
import { findMissingTagIds, toTagMini } from './tag.service';
import { syntacticCategoryExists } from './syntacticCategory.service';
import { toUserMini } from './user.service';

export interface FormInput {
  transcription: string;
  morpheme_break: string;
  morpheme_gloss: string;
  grammaticality: string;
  translations: Translation[];
  syntax: string;
  syntactic_category: number | null;
  tags: number[];
}

export interface FormDict {
  id: number;
  UUID: string;
  transcription: string;
  morpheme_break: string;
  morpheme_gloss: string;
  grammaticality: string;
  translations: Translation[];
  syntax: string;
  syntactic_category: { id: number; name: string } | null;
  tags: TagMini[];
  enterer: UserMini | null;
  modifier: UserMini | null;
  datetime_entered: string;
  datetime_modified: string;
}

type FormWithRelations = Form & {
  syntacticCategory: SyntacticCategory | null;
  enterer: User | null;
  modifier: User | null;
  tags: Array<{ tag: Tag }>;
};

export function toFormDict(form: FormWithRelations): FormDict {
  return {
    id: form.id,
    UUID: form.uuid,
    transcription: form.transcription,
    morpheme_break: form.morphemeBreak,
    morpheme_gloss: form.morphemeGloss,
    grammaticality: form.grammaticality,
    translations: form.translations,
    syntax: form.syntax,
    syntactic_category: form.syntacticCategory
      ? { id: form.syntacticCategory.id, name: form.syntacticCategory.name }
      : null,
    tags: form.tags.map(({ tag }) => toTagMini(tag)).sort((a, b) => a.id - b.id),
    enterer: form.enterer ? toUserMini(form.enterer) : null,
    modifier: form.modifier ? toUserMini(form.modifier) : null,
    datetime_entered: form.datetimeEntered.toISOString(),
    datetime_modified: form.datetimeModified.toISOString(),
  };
}

async function loadForms(db: Database, ids: number[]): Promise<FormDict[]> {
  const rows = await db.query.forms.findMany({
    where: inArray(forms.id, ids),
    with: {
      syntacticCategory: true,
      enterer: true,
      modifier: true,
      tags: { with: { tag: true } },
    },
  });
  return rows.map(toFormDict);
}

export function listForms(db: Database, params: IndexParams): Promise<ListResult<FormDict>> {
  return listIndex(db, 'Form', params, loadForms);
}

export function searchForms(
  db: Database,
  query: unknown,
  paginator?: Paginator
): Promise<ListResult<FormDict>> {
  return listSearch(db, 'Form', query, paginator, loadForms);
}

export async function getForm(db: Database, id: number): Promise<FormDict> {
  const [form] = await loadForms(db, [id]);
  if (!form) {
    throw new NotFoundError(`There is no form with id ${id}`);
  }
  return form;
}

/**
 * Ids that do not name an existing form, in input order
 */
export async function findMissingFormIds(db: Database, ids: number[]): Promise<number[]> {
  const storable = ids.filter(isStorableId);
  if (storable.length === 0) return ids;
  const rows = await db.select({ id: forms.id }).from(forms).where(inArray(forms.id, storable));
  const found = new Set(rows.map((row) => row.id));
  return ids.filter((id) => !found.has(id));
}

async function validateReferences(db: Database, input: FormInput): Promise<void> {
  const errors: FieldErrors = {};

  const [missingTag] = await findMissingTagIds(db, unique(input.tags));
  if (missingTag !== undefined) {
    errors.tags = `There is no tag with id ${missingTag}.`;
  }
  if (input.syntactic_category !== null && !(await syntacticCategoryExists(db, input.syntactic_category))) {
    errors.syntactic_category = `There is no syntactic category with id ${input.syntactic_category}.`;
  }

  if (Object.keys(errors).length > 0) {
    throw new InvalidInputError(errors);
  }
}

function normalizeInput(input: FormInput) {
  return {
    transcription: normalize(input.transcription),
    morphemeBreak: normalize(input.morpheme_break),
    morphemeGloss: normalize(input.morpheme_gloss),
    grammaticality: input.grammaticality,
    translations: input.translations.map((translation) => ({
      transcription: normalize(translation.transcription),
      grammaticality: translation.grammaticality,
    })),
    syntax: normalize(input.syntax),
    syntacticCategoryId: input.syntactic_category,
  };
}

export async function createForm(db: Database, input: FormInput, user: AuthUser): Promise<FormDict> {
  await validateReferences(db, input);
  const now = new Date();
  const tagIds = unique(input.tags);

  const formId = await db.transaction(async (tx) => {
    const [form] = await tx
      .insert(forms)
      .values({
        ...normalizeInput(input),
        uuid: randomUUID(),
        entererId: user.id,
        modifierId: user.id,
        datetimeEntered: now,
        datetimeModified: now,
      })
      .returning({ id: forms.id });

    if (tagIds.length > 0) {
      await tx.insert(formsTags).values(tagIds.map((tagId) => ({ formId: form.id, tagId })));
    }
    return form.id;
  });

  logger.info('Form created', { formId, userId: user.id });
  return getForm(db, formId);
}

export async function updateForm(
  db: Database,
  id: number,
  input: FormInput,
  user: AuthUser
): Promise<FormDict> {
  const current = await getForm(db, id);
  await validateReferences(db, input);

  const values = normalizeInput(input);
  const tagIds = unique(input.tags);
  const currentTagIds = new Set(current.tags.map((tag) => tag.id));

  const unchanged =
    current.transcription === values.transcription &&
    current.morpheme_break === values.morphemeBreak &&
    current.morpheme_gloss === values.morphemeGloss &&
    current.grammaticality === values.grammaticality &&
    JSON.stringify(current.translations) === JSON.stringify(values.translations) &&
    current.syntax === values.syntax &&
    (current.syntactic_category?.id ?? null) === values.syntacticCategoryId &&
    currentTagIds.size === tagIds.length &&
    tagIds.every((tagId) => currentTagIds.has(tagId));

  if (unchanged) {
    throw new BadRequestError(NOT_NEW_MESSAGE);
  }

  await db.transaction(async (tx) => {
    await tx
      .update(forms)
      .set({ ...values, modifierId: user.id, datetimeModified: new Date() })
      .where(eq(forms.id, id));
    await tx.delete(formsTags).where(eq(formsTags.formId, id));
    if (tagIds.length > 0) {
      await tx.insert(formsTags).values(tagIds.map((tagId) => ({ formId: id, tagId })));
    }
  });

  logger.info('Form updated', { formId: id, userId: user.id });
  return getForm(db, id);
}

export async function deleteForm(db: Database, id: number): Promise<FormDict> {
  const form = await getForm(db, id);
  await db.delete(forms).where(eq(forms.id, id));
  logger.info('Form deleted', { formId: id });
  return form;
}
