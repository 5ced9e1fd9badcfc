/**
 * Timeline Reconstructor - Pure Functions
 *
 * Derives start/stop times for every chapter of one session by chaining
 * durations from the session's first creation time. Per-chapter creation
 * times after the first are ignored: cameras stamp every chapter of a
 * recording with the same (or a rounded) time.
 *
 * Algorithm:
 * 1. Sort chapters by chapter index
 * 2. First chapter starts at its embedded creation time
 * 3. Each chapter stops at start + duration; the next one starts there
 */

import type { ChapterRecord, TimelineEntry } from '../../types';
import { formatElapsed } from './duration-format';
import { DataIntegrityError } from './errors';
import {
  displayPath,
  validateChapterRecord,
  validateSessionTimeline,
} from './chapter-validator';

/**
 * Sort a session's chapters by chapter index without mutating the input.
 *
 * @throws DataIntegrityError when two chapters share an index
 */
export function sortChapters(records: readonly ChapterRecord[]): ChapterRecord[] {
  const sorted = [...records].sort((a, b) => a.chapterIndex - b.chapterIndex);

  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const curr = sorted[i];
    if (prev.chapterIndex === curr.chapterIndex) {
      throw new DataIntegrityError(
        `Chapter ${curr.chapterIndex} appears twice in one session: ` +
          `${displayPath(prev.relativeFolder, prev.filename)} and ` +
          `${displayPath(curr.relativeFolder, curr.filename)}`,
        'duplicate_chapter',
        curr.path
      );
    }
  }

  return sorted;
}

/**
 * Reconstruct the timeline of one session.
 *
 * Instants are computed from the cumulative duration offset and rounded to
 * the millisecond, so each stop is exactly the next start and rounding does
 * not accumulate over long sessions.
 *
 * @param records - All chapters of a single session, in any order
 * @returns One entry per chapter, in chapter order
 * @throws DataIntegrityError for invalid durations or duplicate chapter indices
 */
export function reconstructSessionTimeline(
  records: readonly ChapterRecord[]
): TimelineEntry[] {
  if (records.length === 0) {
    return [];
  }

  records.forEach(validateChapterRecord);
  const sorted = sortChapters(records);

  const origin = sorted[0].embeddedCreationTime.getTime();
  let offsetSeconds = 0;

  const entries = sorted.map((record): TimelineEntry => {
    const startTime = new Date(origin + Math.round(offsetSeconds * 1000));
    offsetSeconds += record.durationSeconds;
    const stopTime = new Date(origin + Math.round(offsetSeconds * 1000));

    return {
      path: record.path,
      filename: record.filename,
      startTime,
      stopTime,
      duration: formatElapsed(record.durationSeconds),
      durationSeconds: record.durationSeconds,
      chapterIndex: record.chapterIndex,
      sessionIndex: record.sessionIndex,
      folder: record.relativeFolder,
    };
  });

  validateSessionTimeline(entries);
  return entries;
}
