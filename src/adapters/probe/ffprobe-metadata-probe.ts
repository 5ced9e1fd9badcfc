/**
 * ffprobe Metadata Probe
 *
 * Implements IMetadataProbe by running ffprobe through fluent-ffmpeg and
 * reading the container-level creation_time tag and duration.
 */

import ffmpeg from 'fluent-ffmpeg';
import type {
  IMetadataProbe,
  RawProbeMetadata,
} from '../../ports/probe/metadata-probe.interface';

export interface FfprobeOptions {
  /** Path to the ffprobe binary; fluent-ffmpeg looks on PATH when unset */
  ffprobePath?: string;
}

/**
 * Pick the fields the timeline needs out of ffprobe's format section
 */
export function toRawProbeMetadata(data: ffmpeg.FfprobeData): RawProbeMetadata {
  const { format } = data;
  const creationTime = format.tags?.creation_time;

  return {
    creationTime: creationTime === undefined ? undefined : String(creationTime),
    duration: format.duration === undefined ? undefined : String(format.duration),
  };
}

export class FfprobeMetadataProbe implements IMetadataProbe {
  constructor(private readonly options: FfprobeOptions = {}) {}

  async probe(filePath: string): Promise<RawProbeMetadata> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg(filePath);
      if (this.options.ffprobePath) {
        command.setFfprobePath(this.options.ffprobePath);
      }

      command.ffprobe((err: unknown, data: ffmpeg.FfprobeData) => {
        if (err) {
          reject(err instanceof Error ? err : new Error(`ffprobe failed for ${filePath}`));
          return;
        }
        resolve(toRawProbeMetadata(data));
      });
    });
  }
}
