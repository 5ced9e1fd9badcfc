/**
 * CLI Argument Parser for chapter-timeline
 *
 * Usage: chapter-timeline <directory> [-r] [-j | --csv | --format=<fmt>] [-o <file>]
 */

import type { TimelineConfigOverrides } from '../config/timeline.config';
import { OUTPUT_FORMATS, isOutputFormat } from '../config/timeline.config';

export interface TimelineCliArgs extends TimelineConfigOverrides {
  directory?: string;
  configPath?: string;
  silent: boolean;
  debug: boolean;
  help: boolean;
}

export const USAGE = `Usage: chapter-timeline <directory> [options]

Reconstruct start/stop times of chaptered camera recordings.

Options:
  -r, --recursive        Scan subdirectories
  -j, --json             Output JSON
      --csv              Output CSV
      --format=<fmt>     Output format: ${OUTPUT_FORMATS.join(', ')}
  -o, --output=<file>    Write output to a file (CSV unless a format is given)
      --concurrency=<n>  Maximum ffprobe processes at once
      --ffprobe=<path>   Path to the ffprobe binary
      --config=<file>    JSON config file
      --fail-fast        Abort on the first unreadable file
      --debug            Print progress to stderr
      --silent           Print nothing but the output
  -h, --help             Show this help`;

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseConcurrency(value: string): number {
  const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid concurrency: ${value}`);
  }
  return parsed;
}

export function parseArgs(args: string[]): TimelineCliArgs {
  const result: TimelineCliArgs = {
    silent: false,
    debug: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-r' || arg === '--recursive') {
      result.recursive = true;
    } else if (arg === '-j' || arg === '--json') {
      result.format = 'json';
    } else if (arg === '--csv') {
      result.format = 'csv';
    } else if (arg.startsWith('--format=')) {
      const value = arg.slice('--format='.length).toLowerCase();
      if (!isOutputFormat(value)) {
        throw new Error(`Invalid format: ${value}`);
      }
      result.format = value;
    } else if (arg === '-o' || arg === '--output') {
      result.output = requireValue(arg, args[++i]);
    } else if (arg.startsWith('--output=')) {
      result.output = requireValue('--output', arg.slice('--output='.length));
    } else if (arg.startsWith('--concurrency=')) {
      result.concurrency = parseConcurrency(arg.slice('--concurrency='.length));
    } else if (arg.startsWith('--ffprobe=')) {
      result.ffprobePath = requireValue('--ffprobe', arg.slice('--ffprobe='.length));
    } else if (arg.startsWith('--config=')) {
      result.configPath = requireValue('--config', arg.slice('--config='.length));
    } else if (arg === '--fail-fast') {
      result.failFast = true;
    } else if (arg === '--silent') {
      result.silent = true;
    } else if (arg === '--debug' || arg === '--verbose') {
      result.debug = true;
    } else if (arg === '-h' || arg === '--help') {
      result.help = true;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (result.directory === undefined) {
      result.directory = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return result;
}
