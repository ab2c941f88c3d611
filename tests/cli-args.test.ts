/**
 * Tests for command-line parsing and run options
 */

import { describe, it, expect } from 'vitest';
import { parseCliArgs, USAGE } from '../lib/cli-args';
import { Config } from '../lib/config';
import { overridesFromOptions, RunOptionsSchema } from '../lib/pipeline';

describe('parseCliArgs', () => {
  it('should read positionals and options', () => {
    const args = parseCliArgs([
      'https://clipwise.example',
      'episode.txt',
      '--clip-index',
      '2',
      '--whitelist-keywords',
      'editing',
      'short clips',
      '--save-clips',
      '--no-enhance',
    ]);

    expect(args).toEqual({
      url: 'https://clipwise.example',
      transcript_file: 'episode.txt',
      clips_file: undefined,
      options: {
        clip_index: 2,
        whitelist_keywords: ['editing', 'short clips'],
        save_clips: true,
        enhance: false,
      },
    });
  });

  it('should split comma-separated keywords', () => {
    const args = parseCliArgs(['https://clipwise.example', 'episode.txt', '--blacklist-keywords', 'politics, crypto']);

    expect(args.options.blacklist_keywords).toEqual(['politics', 'crypto']);
  });

  it('should accept a clips file in place of a transcript', () => {
    const args = parseCliArgs(['https://clipwise.example', '--clips-file', 'output/clips_abc.json', '--clip-index', '1']);

    expect(args.transcript_file).toBe('');
    expect(args.clips_file).toBe('output/clips_abc.json');
    expect(args.options.clip_index).toBe(1);
  });

  it('should print usage when positionals are missing', () => {
    expect(() => parseCliArgs(['https://clipwise.example'])).toThrow(USAGE);
  });

  it('should reject unknown flags and malformed numbers', () => {
    expect(() => parseCliArgs(['https://clipwise.example', 'episode.txt', '--bogus'])).toThrow(
      'Unknown argument: bogus'
    );
    expect(() => parseCliArgs(['https://clipwise.example', 'episode.txt', '--clip-max', 'many'])).toThrow(
      'Invalid options: clip_max: Expected number, received nan'
    );
    expect(() => parseCliArgs(['https://clipwise.example', 'episode.txt', '--clip-index', '-1'])).toThrow(
      'Invalid options: clip_index: Number must be greater than or equal to 0'
    );
    expect(() => parseCliArgs(['https://clipwise.example', 'episode.txt', '--output-dir'])).toThrow(
      'Not enough arguments following: output-dir'
    );
  });

  it('should leave unset flags out of the run options', () => {
    expect(parseCliArgs(['https://clipwise.example', 'episode.txt']).options).toEqual({});
  });
});

describe('overridesFromOptions', () => {
  it('should map run options onto config sections', () => {
    const options = RunOptionsSchema.parse({
      clip_max: 2,
      blacklist_keywords: 'politics',
      save_clips: true,
      strict: true,
      enhance: false,
      intensity: 'subtle',
    });

    expect(overridesFromOptions(options)).toEqual({
      scoring: { max_clips: 2, blacklist: ['politics'] },
      output: { save_clips: true },
      parsing: { strictness: 'strict' },
      enhancement: { enabled: false, intensity: 'subtle' },
    });
  });

  it('should produce a config that keeps untouched defaults', () => {
    const config = Config.getPipelineConfig(overridesFromOptions({ clip_max: 2 }));

    expect(config.scoring.max_clips).toBe(2);
    expect(config.scoring.whitelist_boost).toBe(0.1);
    expect(config.scoring.overlap_threshold).toBe(0.5);
    expect(config.parsing.timestamp_tolerance_sec).toBe(1);
  });
});

describe('Config.getPipelineConfig', () => {
  it('should reject invalid window settings', () => {
    expect(() => Config.getPipelineConfig({ windowing: { window_sec: 30, slack_sec: 30 } })).toThrow(
      'Invalid window settings: window_sec=30, slack_sec=30'
    );
  });

  it('should reject a non-positive clip count', () => {
    expect(() => Config.getPipelineConfig({ scoring: { max_clips: 0 } })).toThrow('Invalid max_clips: 0');
  });
});
