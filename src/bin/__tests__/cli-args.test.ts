/**
 * CLI Argument Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from '../cli-args';

describe('parseArgs', () => {
  describe('directory', () => {
    it('takes the first positional argument', () => {
      expect(parseArgs(['/videos']).directory).toBe('/videos');
    });

    it('is undefined when missing', () => {
      expect(parseArgs([]).directory).toBeUndefined();
    });

    it('throws on a second positional argument', () => {
      expect(() => parseArgs(['/a', '/b'])).toThrow('Unexpected argument: /b');
    });
  });

  describe('--recursive', () => {
    it('accepts the short and long forms', () => {
      expect(parseArgs(['-r']).recursive).toBe(true);
      expect(parseArgs(['--recursive']).recursive).toBe(true);
    });

    it('stays undefined when absent so config can decide', () => {
      expect(parseArgs(['/videos']).recursive).toBeUndefined();
    });
  });

  describe('output format', () => {
    it('selects JSON with -j or --json', () => {
      expect(parseArgs(['-j']).format).toBe('json');
      expect(parseArgs(['--json']).format).toBe('json');
    });

    it('selects CSV with --csv', () => {
      expect(parseArgs(['--csv']).format).toBe('csv');
    });

    it('parses --format case-insensitively', () => {
      expect(parseArgs(['--format=TABLE']).format).toBe('table');
    });

    it('throws for an invalid format', () => {
      expect(() => parseArgs(['--format=xml'])).toThrow('Invalid format: xml');
    });

    it('lets the last flag win', () => {
      expect(parseArgs(['--json', '--csv']).format).toBe('csv');
    });
  });

  describe('--output', () => {
    it('takes the next argument after -o', () => {
      const result = parseArgs(['/videos', '-o', 'out.csv']);
      expect(result.output).toBe('out.csv');
      expect(result.directory).toBe('/videos');
    });

    it('accepts --output=<path>', () => {
      expect(parseArgs(['--output=timeline.json']).output).toBe('timeline.json');
    });

    it('throws when the value is missing', () => {
      expect(() => parseArgs(['-o'])).toThrow('Missing value for -o');
      expect(() => parseArgs(['--output='])).toThrow('Missing value for --output');
    });
  });

  describe('--concurrency', () => {
    it('parses a positive integer', () => {
      expect(parseArgs(['--concurrency=8']).concurrency).toBe(8);
    });

    it.each(['0', '-1', '2.5', 'many', ''])('rejects %j', (value) => {
      expect(() => parseArgs([`--concurrency=${value}`])).toThrow('Invalid concurrency');
    });
  });

  describe('other flags', () => {
    it('parses ffprobe and config paths', () => {
      const result = parseArgs(['--ffprobe=/usr/local/bin/ffprobe', '--config=timeline.json']);
      expect(result.ffprobePath).toBe('/usr/local/bin/ffprobe');
      expect(result.configPath).toBe('timeline.json');
    });

    it('parses --fail-fast', () => {
      expect(parseArgs(['--fail-fast']).failFast).toBe(true);
      expect(parseArgs([]).failFast).toBeUndefined();
    });

    it('treats --verbose as --debug', () => {
      expect(parseArgs(['--verbose']).debug).toBe(true);
    });

    it('defaults silent, debug and help to false', () => {
      expect(parseArgs([])).toEqual({ silent: false, debug: false, help: false });
    });

    it('parses help', () => {
      expect(parseArgs(['-h']).help).toBe(true);
    });

    it('throws for unknown options', () => {
      expect(() => parseArgs(['--frobnicate'])).toThrow('Unknown option: --frobnicate');
    });
  });
});
