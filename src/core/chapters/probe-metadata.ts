/**
 * Probe Metadata Parsing - Pure Functions
 *
 * Turns the strings a metadata probe reports into a creation instant
 * and a duration in seconds.
 */

import type { RawProbeMetadata } from '../../ports/probe/metadata-probe.interface';
import { ProbeMetadataError } from './errors';

/**
 * YYYY-MM-DDTHH:MM:SS[.ffffff]Z, always UTC
 */
const CREATION_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z$/;

const DURATION_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export interface ParsedProbeMetadata {
  creationTime: Date;
  durationSeconds: number;
}

/**
 * Parse a creation timestamp. Sub-millisecond digits are truncated.
 *
 * @returns the instant, or null if the string is not a valid UTC timestamp
 */
export function parseCreationTime(value: string): Date | null {
  const match = CREATION_TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction = ''] = match;
  const millis = parseInt((fraction + '000').slice(0, 3), 10);
  const date = new Date(
    Date.UTC(
      parseInt(year, 10),
      parseInt(month, 10) - 1,
      parseInt(day, 10),
      parseInt(hour, 10),
      parseInt(minute, 10),
      parseInt(second, 10),
      millis
    )
  );

  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (
    date.getUTCFullYear() !== parseInt(year, 10) ||
    date.getUTCMonth() !== parseInt(month, 10) - 1 ||
    date.getUTCDate() !== parseInt(day, 10) ||
    date.getUTCHours() !== parseInt(hour, 10) ||
    date.getUTCMinutes() !== parseInt(minute, 10) ||
    date.getUTCSeconds() !== parseInt(second, 10)
  ) {
    return null;
  }

  return date;
}

/**
 * Parse a string-encoded float number of seconds.
 *
 * @returns the number, or null for anything that is not a finite decimal
 */
export function parseDurationSeconds(value: string): number | null {
  const trimmed = value.trim();
  if (!DURATION_PATTERN.test(trimmed)) {
    return null;
  }
  const seconds = Number(trimmed);
  return Number.isFinite(seconds) ? seconds : null;
}

/**
 * Parse raw probe output for one file.
 *
 * Sign is not checked here; see validateChapterRecord.
 *
 * @throws ProbeMetadataError when a field is missing or malformed
 */
export function parseProbeMetadata(
  raw: RawProbeMetadata,
  filePath: string
): ParsedProbeMetadata {
  if (raw.creationTime === undefined || raw.creationTime === '') {
    throw new ProbeMetadataError(`No creation_time reported for ${filePath}`, filePath);
  }
  if (raw.duration === undefined || raw.duration === '') {
    throw new ProbeMetadataError(`No duration reported for ${filePath}`, filePath);
  }

  const creationTime = parseCreationTime(raw.creationTime);
  if (!creationTime) {
    throw new ProbeMetadataError(
      `Unparseable creation_time "${raw.creationTime}" for ${filePath}`,
      filePath
    );
  }

  const durationSeconds = parseDurationSeconds(raw.duration);
  if (durationSeconds === null) {
    throw new ProbeMetadataError(
      `Unparseable duration "${raw.duration}" for ${filePath}`,
      filePath
    );
  }

  return { creationTime, durationSeconds };
}
