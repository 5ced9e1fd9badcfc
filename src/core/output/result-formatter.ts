/**
 * Result Formatter - Pure Functions
 *
 * Renders timeline entries as an aligned text table, CSV or JSON.
 * Column order is fixed: Filename, Start Time, Stop Time, Duration,
 * Chapter, Session, Folder.
 */

import type { OutputFormat, TimelineEntry } from '../../types';

export const TIMELINE_COLUMNS = [
  'Filename',
  'Start Time',
  'Stop Time',
  'Duration',
  'Chapter',
  'Session',
  'Folder',
] as const;

export type TimelineColumn = (typeof TIMELINE_COLUMNS)[number];

export interface TimelineJsonRow {
  Filename: string;
  'Start Time': string;
  'Stop Time': string;
  Duration: string;
  Chapter: number;
  Session: number;
  Folder: string;
}

/**
 * YYYY-MM-DD HH:MM:SS in UTC, with .mmm only when milliseconds are non-zero
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  const base = iso.slice(0, 19).replace('T', ' ');
  return date.getUTCMilliseconds() === 0 ? base : `${base}${iso.slice(19, 23)}`;
}

function toCells(entry: TimelineEntry): string[] {
  return [
    entry.filename,
    formatTimestamp(entry.startTime),
    formatTimestamp(entry.stopTime),
    entry.duration,
    String(entry.chapterIndex),
    String(entry.sessionIndex),
    entry.folder,
  ];
}

export function formatTable(entries: readonly TimelineEntry[]): string {
  const rows: string[][] = [[...TIMELINE_COLUMNS], ...entries.map(toCells)];
  const widths = TIMELINE_COLUMNS.map((_, col) =>
    Math.max(...rows.map((row) => row[col].length))
  );

  return rows
    .map((row) => row.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd())
    .join('\n') + '\n';
}

function escapeCsvCell(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function formatCsv(entries: readonly TimelineEntry[]): string {
  const rows: string[][] = [[...TIMELINE_COLUMNS], ...entries.map(toCells)];
  return rows.map((row) => row.map(escapeCsvCell).join(',')).join('\n') + '\n';
}

export function toJsonRow(entry: TimelineEntry): TimelineJsonRow {
  return {
    Filename: entry.filename,
    'Start Time': entry.startTime.toISOString(),
    'Stop Time': entry.stopTime.toISOString(),
    Duration: entry.duration,
    Chapter: entry.chapterIndex,
    Session: entry.sessionIndex,
    Folder: entry.folder,
  };
}

export function formatJson(entries: readonly TimelineEntry[]): string {
  return JSON.stringify(entries.map(toJsonRow), null, 4) + '\n';
}

export function formatTimeline(
  entries: readonly TimelineEntry[],
  format: OutputFormat
): string {
  switch (format) {
    case 'table':
      return formatTable(entries);
    case 'csv':
      return formatCsv(entries);
    case 'json':
      return formatJson(entries);
  }
}
