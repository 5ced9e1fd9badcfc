/**
 * Name Decoder - Pure Functions
 *
 * Action cameras name chaptered recordings <prefix><chapter><file>.MP4,
 * e.g. GX010042.MP4: prefix "GX" (encoding), chapter 01, file number 0042.
 */

import type { DecodedChapterName } from '../../types';

/**
 * Two uppercase letters, 2-digit chapter, 4-digit file number, uppercase extension
 */
export const CHAPTER_FILE_PATTERN = /^[A-Z]{2}(\d{2})(\d{4})\.MP4$/;

/**
 * Decode chapter and session indices from a base file name.
 *
 * @returns the indices, or null when the name does not follow the convention
 */
export function decodeChapterName(filename: string): DecodedChapterName | null {
  const match = CHAPTER_FILE_PATTERN.exec(filename);
  if (!match) {
    return null;
  }

  return {
    chapterIndex: parseInt(match[1], 10),
    sessionIndex: parseInt(match[2], 10),
  };
}

export function isChapterFileName(filename: string): boolean {
  return CHAPTER_FILE_PATTERN.test(filename);
}
