/**
 * Metadata Probe Interface
 *
 * Contract for reading the embedded creation time and duration of a video file.
 * Implementations:
 * - FfprobeMetadataProbe: runs ffprobe through fluent-ffmpeg
 */

/**
 * Metadata as reported by the probe, before parsing
 */
export interface RawProbeMetadata {
  /** e.g. 2024-01-01T00:00:00.000000Z */
  creationTime?: string;
  /** String-encoded float seconds, e.g. "10.010000" */
  duration?: string;
}

export interface IMetadataProbe {
  /**
   * Read the raw metadata of a single file.
   * May be slow (spawns a process) and may reject for unreadable files.
   * @param filePath Path to the video file
   */
  probe(filePath: string): Promise<RawProbeMetadata>;
}
