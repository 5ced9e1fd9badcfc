import { describe, it, expect } from 'vitest';
import {
  parseConfigFile,
  resolveTimelineConfig,
  TIMELINE_DEFAULTS,
} from '../timeline.config';

describe('resolveTimelineConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveTimelineConfig({})).toEqual({
      recursive: false,
      format: 'table',
      output: undefined,
      probeConcurrency: TIMELINE_DEFAULTS.probeConcurrency,
      ffprobePath: undefined,
      failFast: false,
    });
  });

  it('defaults to CSV when writing to a file', () => {
    expect(resolveTimelineConfig({ output: 'out.csv' }).format).toBe('csv');
    expect(resolveTimelineConfig({}, { output: 'out.csv' }).format).toBe('csv');
  });

  it('keeps an explicit format when writing to a file', () => {
    expect(resolveTimelineConfig({ output: 'out.json', format: 'json' }).format).toBe('json');
  });

  it('lets the config file override defaults', () => {
    const config = resolveTimelineConfig({}, { recursive: true, probeConcurrency: 2, failFast: true });
    expect(config.recursive).toBe(true);
    expect(config.probeConcurrency).toBe(2);
    expect(config.failFast).toBe(true);
  });

  it('lets CLI flags override the config file', () => {
    const config = resolveTimelineConfig(
      { format: 'json', concurrency: 8 },
      { format: 'csv', probeConcurrency: 2 }
    );
    expect(config.format).toBe('json');
    expect(config.probeConcurrency).toBe(8);
  });

  describe('ffprobe path', () => {
    it('prefers FFPROBE_PATH over the config file', () => {
      const config = resolveTimelineConfig(
        {},
        { ffprobePath: '/from/config' },
        { FFPROBE_PATH: '/from/env' }
      );
      expect(config.ffprobePath).toBe('/from/env');
    });

    it('prefers the CLI flag over FFPROBE_PATH', () => {
      const config = resolveTimelineConfig(
        { ffprobePath: '/from/cli' },
        {},
        { FFPROBE_PATH: '/from/env' }
      );
      expect(config.ffprobePath).toBe('/from/cli');
    });

    it('ignores an empty FFPROBE_PATH', () => {
      const config = resolveTimelineConfig({}, { ffprobePath: '/from/config' }, { FFPROBE_PATH: '' });
      expect(config.ffprobePath).toBe('/from/config');
    });
  });
});

describe('parseConfigFile', () => {
  it('accepts valid keys and ignores unknown ones', () => {
    expect(
      parseConfigFile({ recursive: true, format: 'json', probeConcurrency: 3, theme: 'dark' })
    ).toEqual({
      recursive: true,
      format: 'json',
      output: undefined,
      probeConcurrency: 3,
      ffprobePath: undefined,
      failFast: undefined,
    });
  });

  it('rejects a non-boolean recursive', () => {
    expect(() => parseConfigFile({ recursive: 'yes' })).toThrow(
      'Invalid config value for "recursive": expected true or false'
    );
  });

  it('rejects an unknown format', () => {
    expect(() => parseConfigFile({ format: 'xml' })).toThrow(
      'Invalid config value for "format": expected one of table, csv, json'
    );
  });

  it('rejects a fractional concurrency', () => {
    expect(() => parseConfigFile({ probeConcurrency: 1.5 })).toThrow(
      'Invalid config value for "probeConcurrency": expected a positive integer'
    );
  });

  it('rejects an empty output path', () => {
    expect(() => parseConfigFile({ output: '' })).toThrow(
      'Invalid config value for "output": expected a non-empty string'
    );
  });
});
