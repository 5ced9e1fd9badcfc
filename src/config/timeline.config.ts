/**
 * Timeline Configuration
 *
 * Precedence: defaults < config file < FFPROBE_PATH (ffprobe path only) < CLI flags.
 */

import type { OutputFormat } from '../types';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'csv', 'json'];

export const TIMELINE_DEFAULTS = {
  recursive: false,
  /** Used when no format is chosen and no output file is given */
  format: 'table',
  /** Used when no format is chosen but an output file is given */
  fileFormat: 'csv',
  probeConcurrency: 4,
  failFast: false,
} as const;

export interface TimelineConfig {
  recursive: boolean;
  format: OutputFormat;
  output?: string;
  probeConcurrency: number;
  ffprobePath?: string;
  failFast: boolean;
}

/**
 * Settings a config file may carry; every key is optional
 */
export type TimelineConfigFile = Partial<TimelineConfig>;

/**
 * Settings given on the command line; undefined means "not given"
 */
export interface TimelineConfigOverrides {
  recursive?: boolean;
  format?: OutputFormat;
  output?: string;
  concurrency?: number;
  ffprobePath?: string;
  failFast?: boolean;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function isValidConcurrency(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function expectBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid config value for "${key}": expected true or false`);
  }
  return value;
}

function expectString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new Error(`Invalid config value for "${key}": expected a non-empty string`);
  }
  return value;
}

function expectFormat(raw: Record<string, unknown>, key: string): OutputFormat | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isOutputFormat(value)) {
    throw new Error(`Invalid config value for "${key}": expected one of ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

function expectConcurrency(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isValidConcurrency(value)) {
    throw new Error(`Invalid config value for "${key}": expected a positive integer`);
  }
  return value;
}

/**
 * Validate the keys of a loaded config file. Unknown keys are ignored.
 *
 * @throws Error naming the first key with a value of the wrong type
 */
export function parseConfigFile(raw: Record<string, unknown>): TimelineConfigFile {
  return {
    recursive: expectBoolean(raw, 'recursive'),
    format: expectFormat(raw, 'format'),
    output: expectString(raw, 'output'),
    probeConcurrency: expectConcurrency(raw, 'probeConcurrency'),
    ffprobePath: expectString(raw, 'ffprobePath'),
    failFast: expectBoolean(raw, 'failFast'),
  };
}

export function resolveTimelineConfig(
  overrides: TimelineConfigOverrides,
  file: TimelineConfigFile = {},
  env: NodeJS.ProcessEnv = {}
): TimelineConfig {
  const output = overrides.output ?? file.output;
  const envFfprobe = env.FFPROBE_PATH === '' ? undefined : env.FFPROBE_PATH;

  return {
    recursive: overrides.recursive ?? file.recursive ?? TIMELINE_DEFAULTS.recursive,
    format:
      overrides.format ??
      file.format ??
      (output ? TIMELINE_DEFAULTS.fileFormat : TIMELINE_DEFAULTS.format),
    output,
    probeConcurrency:
      overrides.concurrency ?? file.probeConcurrency ?? TIMELINE_DEFAULTS.probeConcurrency,
    ffprobePath: overrides.ffprobePath ?? envFfprobe ?? file.ffprobePath,
    failFast: overrides.failFast ?? file.failFast ?? TIMELINE_DEFAULTS.failFast,
  };
}
