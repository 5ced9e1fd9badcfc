#!/usr/bin/env node
/**
 * chapter-timeline - command line entry point
 *
 * Scans a directory of chaptered camera recordings, reconstructs the
 * start/stop time of every chapter and prints (or writes) the result
 * as a table, CSV or JSON.
 */

import type { IFileSystem } from '../ports/readers/file-system.interface';
import type { IMetadataProbe } from '../ports/probe/metadata-probe.interface';
import type { TimelineIssue } from '../types';
import type { TimelineCliArgs } from './cli-args';
import { USAGE } from './cli-args';
import { FileConfigStore } from '../config/file-config-store';
import {
  parseConfigFile,
  resolveTimelineConfig,
  type TimelineConfig,
  type TimelineConfigFile,
} from '../config/timeline.config';
import { ChapterTimelineService } from '../services/ChapterTimelineService';
import { formatTimeline } from '../core/output/result-formatter';

export interface TimelineDependencies {
  fileSystem: IFileSystem;
  createProbe: (config: TimelineConfig) => IMetadataProbe;
  writeStdout: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

export interface TimelineCommandResult {
  exitCode: number;
  entriesWritten: number;
  issues: TimelineIssue[];
  error?: string;
}

/** Every chapter file found was skipped */
export const EXIT_ALL_SKIPPED = 2;

export async function executeTimeline(
  args: TimelineCliArgs,
  deps: TimelineDependencies
): Promise<TimelineCommandResult> {
  const { fileSystem, createProbe, writeStdout, env = {} } = deps;
  const { silent, debug } = args;

  // stdout carries the rendered timeline; diagnostics go to stderr
  const log = (message: string) => {
    if (!silent) {
      console.error(message);
    }
  };

  const logDebug = (message: string) => {
    if (debug) {
      console.error(`[DEBUG] ${message}`);
    }
  };

  const logError = (message: string) => {
    if (debug || !silent) {
      console.error(message);
    }
  };

  if (args.help) {
    writeStdout(USAGE + '\n');
    return { exitCode: 0, entriesWritten: 0, issues: [] };
  }

  if (!args.directory) {
    logError('Error: a directory argument is required');
    logError(USAGE);
    return { exitCode: 1, entriesWritten: 0, issues: [], error: 'Missing directory' };
  }

  try {
    let fileConfig: TimelineConfigFile = {};
    if (args.configPath) {
      if (!(await fileSystem.exists(args.configPath))) {
        throw new Error(`Config file not found: ${args.configPath}`);
      }
      logDebug(`Loading config from ${args.configPath}`);
      fileConfig = parseConfigFile(await new FileConfigStore(fileSystem, args.configPath, log).load());
    }

    const config = resolveTimelineConfig(args, fileConfig, env);
    logDebug(
      `Scanning ${args.directory} (recursive: ${config.recursive}, ` +
        `format: ${config.format}, concurrency: ${config.probeConcurrency})`
    );

    const service = new ChapterTimelineService({
      fileSystem,
      probe: createProbe(config),
    });
    const report = await service.buildTimeline(args.directory, {
      recursive: config.recursive,
      probeConcurrency: config.probeConcurrency,
      failFast: config.failFast,
      onDebug: logDebug,
    });

    for (const issue of report.issues) {
      log(`Skipped ${issue.path}: ${issue.message}`);
    }

    const rendered = formatTimeline(report.entries, config.format);
    if (config.output) {
      await fileSystem.writeFile(config.output, rendered);
      log(`Wrote ${report.entries.length} entr${report.entries.length === 1 ? 'y' : 'ies'} to ${config.output}`);
    } else {
      writeStdout(rendered);
    }

    const allSkipped =
      report.filesScanned > 0 && report.entries.length === 0 && report.issues.length > 0;

    return {
      exitCode: allSkipped ? EXIT_ALL_SKIPPED : 0,
      entriesWritten: report.entries.length,
      issues: report.issues,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logError(`Error: ${message}`);
    return { exitCode: 1, entriesWritten: 0, issues: [], error: message };
  }
}

async function main(): Promise<void> {
  // Loaded lazily so importing this module never pulls in fluent-ffmpeg
  const { parseArgs } = await import('./cli-args');
  const { NodeFileSystem } = await import('../adapters/readers/node-filesystem');
  const { FfprobeMetadataProbe } = await import('../adapters/probe/ffprobe-metadata-probe');

  const args = parseArgs(process.argv.slice(2));
  const result = await executeTimeline(args, {
    fileSystem: new NodeFileSystem(),
    createProbe: (config) => new FfprobeMetadataProbe({ ffprobePath: config.ffprobePath }),
    writeStdout: (text) => process.stdout.write(text),
    env: process.env,
  });

  process.exitCode = result.exitCode;
}

// Main entry point when run directly
if (require.main === module) {
  main().catch((err) => {
    console.error(err instanceof Error ? `Error: ${err.message}` : 'Unknown error');
    process.exit(1);
  });
}
