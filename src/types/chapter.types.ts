/**
 * Chapter types - physical video files split by the camera and the
 * reconstructed timeline built from them
 */

/**
 * Chapter and session indices decoded from a file name like GX010042.MP4
 */
export interface DecodedChapterName {
  chapterIndex: number;  // 2-digit position within the session (0-99)
  sessionIndex: number;  // 4-digit file number, carried through for display
}

/**
 * A file found on disk whose name the decoder accepted
 */
export interface ScannedChapterFile extends DecodedChapterName {
  path: string;            // Absolute (or root-joined) path handed to the probe
  filename: string;
  relativeFolder: string;  // '' for the scan root, e.g. 'day1/card2' below it
}

/**
 * One physical video file with its probe data
 */
export interface ChapterRecord extends ScannedChapterFile {
  /** Embedded creation time; authoritative only for a session's first chapter */
  embeddedCreationTime: Date;
  /** Authoritative for every chapter */
  durationSeconds: number;
}

/**
 * Grouping key: the embedded creation time in whole epoch seconds
 */
export type SessionKey = number;

/**
 * Reconstructed start/stop for one chapter
 */
export interface TimelineEntry {
  /** Path of the source file, as scanned */
  readonly path: string;
  readonly filename: string;
  readonly startTime: Date;
  readonly stopTime: Date;
  readonly duration: string;
  readonly durationSeconds: number;
  readonly chapterIndex: number;
  readonly sessionIndex: number;
  readonly folder: string;
}

export type TimelineIssueKind =
  | 'probe_failed'
  | 'invalid_metadata'
  | 'invalid_duration'
  | 'invalid_timestamp'
  | 'duplicate_chapter'
  | 'broken_chain';

/**
 * A file (or session) left out of the timeline, and why
 */
export interface TimelineIssue {
  path: string;
  kind: TimelineIssueKind;
  message: string;
}

export interface SessionSummary {
  key: SessionKey;
  chapters: number;
  startTime: Date;
  stopTime: Date;
}

export interface TimelineReport {
  entries: TimelineEntry[];
  sessions: SessionSummary[];
  issues: TimelineIssue[];
  filesScanned: number;
}

export type OutputFormat = 'table' | 'csv' | 'json';
