/**
 * Chapter Validator
 *
 * Checks performed before and after timeline reconstruction.
 */

import type { ChapterRecord, TimelineEntry } from '../../types';
import { DataIntegrityError } from './errors';

/**
 * Folder-relative path used in messages, e.g. 'day1/GX010042.MP4'
 */
export function displayPath(folder: string, filename: string): string {
  return folder ? `${folder}/${filename}` : filename;
}

/**
 * @throws DataIntegrityError for a negative or non-finite duration or an invalid timestamp
 */
export function validateChapterRecord(record: ChapterRecord): void {
  if (!Number.isFinite(record.durationSeconds) || record.durationSeconds < 0) {
    throw new DataIntegrityError(
      `Invalid duration ${record.durationSeconds}s for ${displayPath(record.relativeFolder, record.filename)}`,
      'invalid_duration',
      record.path
    );
  }

  if (Number.isNaN(record.embeddedCreationTime.getTime())) {
    throw new DataIntegrityError(
      `Invalid creation time for ${displayPath(record.relativeFolder, record.filename)}`,
      'invalid_timestamp',
      record.path
    );
  }
}

/**
 * Entries must be in chapter order, each non-negative, within the Date
 * range, and chained so that every stop equals the next start.
 *
 * @throws DataIntegrityError naming the first offending file
 */
export function validateSessionTimeline(entries: readonly TimelineEntry[]): void {
  entries.forEach((entry, i) => {
    if (Number.isNaN(entry.startTime.getTime()) || Number.isNaN(entry.stopTime.getTime())) {
      throw new DataIntegrityError(
        `Duration ${entry.durationSeconds}s of ${displayPath(entry.folder, entry.filename)} ` +
          'runs past the supported date range',
        'invalid_duration',
        entry.path
      );
    }

    if (entry.stopTime.getTime() < entry.startTime.getTime()) {
      throw new DataIntegrityError(
        `${entry.filename} stops before it starts`,
        'broken_chain',
        entry.path
      );
    }

    const next = entries[i + 1];
    if (next && next.startTime.getTime() !== entry.stopTime.getTime()) {
      throw new DataIntegrityError(
        `${next.filename} does not start where ${entry.filename} stops`,
        'broken_chain',
        next.path
      );
    }
  });
}
