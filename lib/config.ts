/**
 * Configuration management for the clip pipeline
 *
 * Environment variables are read once, here. Everything downstream receives an
 * explicit PipelineConfig value so concurrent runs can use different settings.
 */

import type { EnhancementIntensity } from './types';

export type StorageBackend = 'vercel-blob' | 'local';
export type TranscriptStrictness = 'lenient' | 'strict';

export interface PipelineConfig {
  credentials: {
    openai_api_key: string;
    firecrawl_api_key: string;
    sync_api_key: string;
    zapcap_api_key: string;
  };
  models: {
    analysis: string;
    scoring: string;
    enhancement: string;
    speech: string;
  };
  storage: {
    backend: StorageBackend;
    local_root: string;
  };
  parsing: {
    strictness: TranscriptStrictness;
    timestamp_tolerance_sec: number;
  };
  windowing: {
    window_sec: number;
    slack_sec: number;
  };
  scoring: {
    max_clips: number;
    whitelist: string[];
    blacklist: string[];
    whitelist_boost: number;
    overlap_threshold: number;
    concurrency: number;
  };
  enhancement: {
    enabled: boolean;
    intensity: EnhancementIntensity;
    include_app_mention: boolean;
  };
  retry: {
    max_attempts: number;
    initial_delay_ms: number;
  };
  media: {
    voices: Record<string, string>;
    speaker_videos: Record<string, string>;
    caption_template_id: string;
    poll_interval_ms: number;
    poll_timeout_ms: number;
  };
  output: {
    output_dir: string;
    save_analysis: boolean;
    save_clips: boolean;
  };
}

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function parseMapping(value: string | undefined): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const pair of parseList(value)) {
    const separator = pair.indexOf('=');
    if (separator > 0) {
      mapping[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }
  }
  return mapping;
}

export class Config {
  // Credentials
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static FIRECRAWL_API_KEY = process.env.FIRECRAWL_API_KEY || '';
  static SYNC_API_KEY = process.env.SYNC_API_KEY || '';
  static ZAPCAP_API_KEY = process.env.ZAPCAP_API_KEY || '';

  // Models
  static ANALYSIS_MODEL = process.env.ANALYSIS_MODEL || 'gpt-4.1';
  static SCORING_MODEL = process.env.SCORING_MODEL || 'gpt-4.1';
  static ENHANCEMENT_MODEL = process.env.ENHANCEMENT_MODEL || 'gpt-4.1';
  static SPEECH_MODEL = process.env.SPEECH_MODEL || 'tts-1-hd';

  // Storage
  static STORAGE_BACKEND: StorageBackend =
    process.env.STORAGE_BACKEND === 'vercel-blob' ? 'vercel-blob' : 'local';
  static LOCAL_STORAGE_ROOT = process.env.LOCAL_STORAGE_ROOT || '.clip-cache';

  // Clip selection
  static CLIP_MAX = parseInt(process.env.CLIP_MAX || '4', 10);
  static WINDOW_SECONDS = parseInt(process.env.WINDOW_SECONDS || '30', 10);
  static WINDOW_SLACK_SECONDS = parseInt(process.env.WINDOW_SLACK_SECONDS || '5', 10);
  static WHITELIST_KEYWORDS = parseList(process.env.WHITELIST_KEYWORDS);
  static BLACKLIST_KEYWORDS = parseList(process.env.BLACKLIST_KEYWORDS);

  // Media
  static SPEAKER_VOICES = parseMapping(
    process.env.SPEAKER_VOICES || 'Speaker A=onyx,Speaker B=shimmer'
  );
  static SPEAKER_VIDEOS = parseMapping(process.env.SPEAKER_VIDEOS);
  static CAPTION_TEMPLATE_ID = process.env.CAPTION_TEMPLATE_ID || 'e7e758de-4eb4-460f-aeca-b2801ac7f8cc';

  // Output
  static OUTPUT_DIR = process.env.OUTPUT_DIR || 'output';

  static getPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
    const defaults: PipelineConfig = {
      credentials: {
        openai_api_key: Config.OPENAI_API_KEY,
        firecrawl_api_key: Config.FIRECRAWL_API_KEY,
        sync_api_key: Config.SYNC_API_KEY,
        zapcap_api_key: Config.ZAPCAP_API_KEY,
      },
      models: {
        analysis: Config.ANALYSIS_MODEL,
        scoring: Config.SCORING_MODEL,
        enhancement: Config.ENHANCEMENT_MODEL,
        speech: Config.SPEECH_MODEL,
      },
      storage: {
        backend: Config.STORAGE_BACKEND,
        local_root: Config.LOCAL_STORAGE_ROOT,
      },
      parsing: {
        strictness: 'lenient',
        timestamp_tolerance_sec: 1,
      },
      windowing: {
        window_sec: Config.WINDOW_SECONDS,
        slack_sec: Config.WINDOW_SLACK_SECONDS,
      },
      scoring: {
        max_clips: Config.CLIP_MAX,
        whitelist: Config.WHITELIST_KEYWORDS,
        blacklist: Config.BLACKLIST_KEYWORDS,
        whitelist_boost: 0.1,
        overlap_threshold: 0.5,
        concurrency: 4,
      },
      enhancement: {
        enabled: true,
        intensity: 'balanced',
        include_app_mention: true,
      },
      retry: {
        max_attempts: 3,
        initial_delay_ms: 1000,
      },
      media: {
        voices: Config.SPEAKER_VOICES,
        speaker_videos: Config.SPEAKER_VIDEOS,
        caption_template_id: Config.CAPTION_TEMPLATE_ID,
        poll_interval_ms: 5000,
        poll_timeout_ms: 10 * 60 * 1000,
      },
      output: {
        output_dir: Config.OUTPUT_DIR,
        save_analysis: false,
        save_clips: false,
      },
    };

    const config: PipelineConfig = {
      credentials: { ...defaults.credentials, ...overrides.credentials },
      models: { ...defaults.models, ...overrides.models },
      storage: { ...defaults.storage, ...overrides.storage },
      parsing: { ...defaults.parsing, ...overrides.parsing },
      windowing: { ...defaults.windowing, ...overrides.windowing },
      scoring: { ...defaults.scoring, ...overrides.scoring },
      enhancement: { ...defaults.enhancement, ...overrides.enhancement },
      retry: { ...defaults.retry, ...overrides.retry },
      media: { ...defaults.media, ...overrides.media },
      output: { ...defaults.output, ...overrides.output },
    };

    Config.validate(config);
    return config;
  }

  static validate(config: PipelineConfig): void {
    const { windowing, scoring, retry } = config;

    if (!(windowing.window_sec > 0) || !(windowing.slack_sec >= 0) || windowing.slack_sec >= windowing.window_sec) {
      throw new Error(
        `Invalid window settings: window_sec=${windowing.window_sec}, slack_sec=${windowing.slack_sec}`
      );
    }
    if (!Number.isInteger(scoring.max_clips) || scoring.max_clips < 1) {
      throw new Error(`Invalid max_clips: ${scoring.max_clips}`);
    }
    if (scoring.overlap_threshold < 0 || scoring.overlap_threshold > 1) {
      throw new Error(`overlap_threshold must be within [0, 1], got ${scoring.overlap_threshold}`);
    }
    if (!Number.isInteger(scoring.concurrency) || scoring.concurrency < 1) {
      throw new Error(`Invalid scoring concurrency: ${scoring.concurrency}`);
    }
    if (!Number.isInteger(retry.max_attempts) || retry.max_attempts < 1) {
      throw new Error(`Invalid retry max_attempts: ${retry.max_attempts}`);
    }
  }
}
