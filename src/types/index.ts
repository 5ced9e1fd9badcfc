export type {
  DecodedChapterName,
  ScannedChapterFile,
  ChapterRecord,
  SessionKey,
  TimelineEntry,
  TimelineIssueKind,
  TimelineIssue,
  SessionSummary,
  TimelineReport,
  OutputFormat,
} from './chapter.types';
