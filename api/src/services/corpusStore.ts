/**
 * Corpus file store
 *
 * Layout under the configured store path:
 *   corpora/corpus_<id>/corpus_<id><suffix>.<extension>      text export
 *   corpora/corpus_<id>/corpus_<id><suffix>.<extension>.gz   served copy
 */

import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { getConfig } from '@/utils/config';
import { logger } from '@/utils/logger';
import { CORPUS_FORMATS, type CorpusFormatName } from './corpusFormats';

export function corpusDirectory(corpusId: number): string {
  return path.join(getConfig().storePath, 'corpora', `corpus_${corpusId}`);
}

export function corpusFilename(corpusId: number, format: CorpusFormatName): string {
  const { suffix, extension } = CORPUS_FORMATS[format];
  return `corpus_${corpusId}${suffix}.${extension}`;
}

export function corpusFilePath(corpusId: number, format: CorpusFormatName): string {
  return path.join(corpusDirectory(corpusId), corpusFilename(corpusId, format));
}

/** Path of the compressed copy of an exported file */
export function compressedPath(filePath: string): string {
  return `${filePath}.gz`;
}

export async function createCorpusDirectory(corpusId: number): Promise<string> {
  const directory = corpusDirectory(corpusId);
  await mkdir(directory, { recursive: true });
  return directory;
}

/**
 * Remove a corpus directory and everything in it. A missing directory is
 * not an error.
 */
export async function removeCorpusDirectory(corpusId: number): Promise<void> {
  const directory = corpusDirectory(corpusId);
  try {
    await rm(directory, { recursive: true, force: true });
  } catch (error) {
    logger.warn('Failed to remove corpus directory', {
      corpusId,
      directory,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
