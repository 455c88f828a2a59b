/**
 * Corpus file formats
 *
 * Each format names the extension and filename suffix of the export and a
 * writer that renders one form as one line.
 */

import type { Form } from '@/db/schema';

export const CORPUS_FORMAT_NAMES = ['treebank', 'transcriptions only'] as const;

export type CorpusFormatName = (typeof CORPUS_FORMAT_NAMES)[number];

export type FormLine = Pick<Form, 'id' | 'transcription' | 'syntax'>;

export interface CorpusFormat {
  extension: string;
  suffix: string;
  writer: (form: FormLine) => string;
}

export const CORPUS_FORMATS: Record<CorpusFormatName, CorpusFormat> = {
  treebank: {
    extension: 'tbk',
    suffix: '',
    writer: (form) => `(TOP-${form.id} ${form.syntax})\n`,
  },
  'transcriptions only': {
    extension: 'txt',
    suffix: '-transcriptions',
    writer: (form) => `${form.transcription}\n`,
  },
};
