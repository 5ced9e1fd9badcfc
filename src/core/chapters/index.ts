/**
 * Chapter Processing Module
 *
 * Pure functions for turning probed chapter files into a timeline:
 * - Name decoding (chapter/session indices from file names)
 * - Session grouping (by creation time, to the second)
 * - Timeline reconstruction (chained start/stop times)
 */

export {
  decodeChapterName,
  isChapterFileName,
  CHAPTER_FILE_PATTERN,
} from './name-decoder';

export {
  parseProbeMetadata,
  parseCreationTime,
  parseDurationSeconds,
  type ParsedProbeMetadata,
} from './probe-metadata';

export {
  groupChaptersBySession,
  toSessionKey,
  formatSessionKey,
} from './session-grouper';

export {
  reconstructSessionTimeline,
  sortChapters,
} from './timeline-reconstructor';

export {
  validateChapterRecord,
  validateSessionTimeline,
  displayPath,
} from './chapter-validator';

export { formatElapsed } from './duration-format';

export {
  ProbeMetadataError,
  DataIntegrityError,
  type DataIntegrityErrorKind,
} from './errors';
