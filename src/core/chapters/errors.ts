/**
 * Error types raised while turning probed files into a timeline
 */

import type { TimelineIssueKind } from '../../types';

export type DataIntegrityErrorKind = Extract<
  TimelineIssueKind,
  'invalid_duration' | 'invalid_timestamp' | 'duplicate_chapter' | 'broken_chain'
>;

/**
 * Probe output is missing a field or cannot be parsed
 */
export class ProbeMetadataError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'ProbeMetadataError';
  }
}

/**
 * Chapter data that would corrupt the timeline if used
 */
export class DataIntegrityError extends Error {
  constructor(
    message: string,
    public readonly kind: DataIntegrityErrorKind,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}
