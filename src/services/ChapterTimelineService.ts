/**
 * Chapter Timeline Service
 *
 * Builds the recording timeline of a directory of chaptered video files.
 * This service:
 * - Scans the directory for chapter files
 * - Probes each file for creation time and duration (bounded concurrency)
 * - Groups chapters into sessions and reconstructs each session's timeline
 * - Collects files and sessions that had to be left out as issues
 */

import type { IFileSystem } from '../ports/readers/file-system.interface';
import type {
  IMetadataProbe,
  RawProbeMetadata,
} from '../ports/probe/metadata-probe.interface';
import type {
  ChapterRecord,
  ScannedChapterFile,
  SessionSummary,
  TimelineEntry,
  TimelineIssue,
  TimelineReport,
} from '../types';
import { ChapterFileScanner } from '../adapters/readers/chapter-file-scanner';
import {
  DataIntegrityError,
  ProbeMetadataError,
  formatSessionKey,
  groupChaptersBySession,
  parseProbeMetadata,
  reconstructSessionTimeline,
} from '../core/chapters';
import { mapWithConcurrency } from '../core/utils/concurrency';
import { TIMELINE_DEFAULTS } from '../config/timeline.config';

export interface ChapterTimelineDependencies {
  fileSystem: IFileSystem;
  probe: IMetadataProbe;
}

export interface BuildTimelineOptions {
  recursive?: boolean;
  /** Maximum probe calls in flight */
  probeConcurrency?: number;
  /** Abort on the first failing file or session instead of skipping it */
  failFast?: boolean;
  /** Receives progress messages */
  onDebug?: (message: string) => void;
}

type ProbeOutcome =
  | { ok: true; record: ChapterRecord }
  | { ok: false; issue: TimelineIssue };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ChapterTimelineService {
  private readonly scanner: ChapterFileScanner;

  constructor(private readonly deps: ChapterTimelineDependencies) {
    this.scanner = new ChapterFileScanner(deps.fileSystem);
  }

  async buildTimeline(root: string, options: BuildTimelineOptions = {}): Promise<TimelineReport> {
    const {
      recursive = TIMELINE_DEFAULTS.recursive,
      probeConcurrency = TIMELINE_DEFAULTS.probeConcurrency,
      failFast = TIMELINE_DEFAULTS.failFast,
      onDebug = () => undefined,
    } = options;

    const files = await this.scanner.scan(root, { recursive });
    onDebug(`Found ${files.length} chapter file(s) in ${root}`);

    const outcomes = await mapWithConcurrency(files, probeConcurrency, (file) =>
      this.probeFile(file, failFast)
    );

    const records: ChapterRecord[] = [];
    const issues: TimelineIssue[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        records.push(outcome.record);
      } else {
        issues.push(outcome.issue);
      }
    }

    const groups = groupChaptersBySession(records);
    onDebug(`Grouped ${records.length} chapter(s) into ${groups.size} session(s)`);

    const entries: TimelineEntry[] = [];
    const sessions: SessionSummary[] = [];

    for (const [key, members] of groups) {
      let sessionEntries: TimelineEntry[];
      try {
        sessionEntries = reconstructSessionTimeline(members);
      } catch (error) {
        if (failFast || !(error instanceof DataIntegrityError)) {
          throw error;
        }
        issues.push({ path: error.filePath, kind: error.kind, message: error.message });
        onDebug(`Dropped session ${formatSessionKey(key)}: ${error.message}`);
        continue;
      }

      const first = sessionEntries[0];
      const last = sessionEntries[sessionEntries.length - 1];
      sessions.push({
        key,
        chapters: sessionEntries.length,
        startTime: first.startTime,
        stopTime: last.stopTime,
      });
      entries.push(...sessionEntries);
      onDebug(`Session ${formatSessionKey(key)}: ${sessionEntries.length} chapter(s)`);
    }

    return { entries, sessions, issues, filesScanned: files.length };
  }

  private async probeFile(file: ScannedChapterFile, failFast: boolean): Promise<ProbeOutcome> {
    let raw: RawProbeMetadata;
    try {
      raw = await this.deps.probe.probe(file.path);
    } catch (error) {
      if (failFast) {
        throw error;
      }
      return {
        ok: false,
        issue: { path: file.path, kind: 'probe_failed', message: errorMessage(error) },
      };
    }

    try {
      const { creationTime, durationSeconds } = parseProbeMetadata(raw, file.path);
      // Durations are validated per session: a bad chapter drops its whole session
      return {
        ok: true,
        record: { ...file, embeddedCreationTime: creationTime, durationSeconds },
      };
    } catch (error) {
      if (failFast) {
        throw error;
      }
      if (error instanceof ProbeMetadataError) {
        return {
          ok: false,
          issue: { path: file.path, kind: 'invalid_metadata', message: error.message },
        };
      }
      throw error;
    }
  }
}
